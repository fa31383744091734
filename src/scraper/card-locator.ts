import { logger } from '../logger';
import { resolveChain, type SelectorChain, type SelectorStrategy } from './selector-chain';
import { SELECTORS } from './selectors';
import type { BrowserSession, PageElement } from './types';

export type CardSearch =
  | { found: true; cards: PageElement[]; strategy: SelectorStrategy }
  | {
      found: false;
      /** The page shows Indeed's own "no jobs found" banner */
      siteReportsNoResults: boolean;
    };

async function firstNonEmpty(
  session: BrowserSession,
  chain: SelectorChain,
): Promise<{ cards: PageElement[]; strategy: SelectorStrategy } | null> {
  const match = await resolveChain(chain, async ({ by, selector }) => {
    const cards = await session.findAll(by, selector);
    return cards.length > 0 ? cards : null;
  });
  return match ? { cards: match.value, strategy: match.strategy } : null;
}

/**
 * Finds the listing cards on the results page: class-name strategies first,
 * then CSS. The "no results" banner is probed only once both are exhausted.
 */
export async function locateCards(
  session: BrowserSession,
  chains: { primary: SelectorChain; secondary: SelectorChain } = {
    primary: SELECTORS.search.cardClasses,
    secondary: SELECTORS.search.cardCss,
  },
): Promise<CardSearch> {
  const hit =
    (await firstNonEmpty(session, chains.primary)) ??
    (await firstNonEmpty(session, chains.secondary));

  if (hit) {
    logger.info(`Found ${hit.cards.length} job cards`, {
      selector: hit.strategy.selector,
      by: hit.strategy.by,
    });
    return { found: true, ...hit };
  }

  let siteReportsNoResults = false;
  try {
    const banner = await session.findAll('css', SELECTORS.search.noResults);
    siteReportsNoResults = banner.length > 0;
  } catch (error) {
    logger.debug('No-results probe failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  logger.warn('No job cards found on page', { siteReportsNoResults });
  return { found: false, siteReportsNoResults };
}
