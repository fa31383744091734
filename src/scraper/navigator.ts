import { NavigationError, errorMessage } from '../errors';
import { logger } from '../logger';
import { waitWithin } from './anti-detection';
import { resolveChain, type SelectorChain } from './selector-chain';
import { SELECTORS } from './selectors';
import type { BrowserSession, DelayRange, PageElement, Sleep } from './types';

export type NavigationTarget =
  | { kind: 'direct'; url: string }
  | { kind: 'form'; baseUrl: string; jobTitle: string; location: string };

export interface NavigationResult {
  currentUrl: string;
  /** Problems that did not stop navigation, e.g. a missing "where" input */
  warnings: string[];
}

async function findInput(session: BrowserSession, chain: SelectorChain): Promise<PageElement | null> {
  const match = await resolveChain(chain, async ({ by, selector }) => {
    const [first] = await session.findAll(by, selector);
    return first ?? null;
  });
  return match ? match.value : null;
}

/**
 * Drives the homepage search form. At least one of the two inputs must
 * resolve; a missing one is reported as a warning.
 */
async function submitSearchForm(
  session: BrowserSession,
  target: Extract<NavigationTarget, { kind: 'form' }>,
  warnings: string[],
): Promise<void> {
  const whatInput = await findInput(session, SELECTORS.form.what);
  const whereInput = await findInput(session, SELECTORS.form.where);

  if (!whatInput && !whereInput) {
    throw new NavigationError('Search form inputs not found (neither "what" nor "where")');
  }

  let lastFilled: PageElement | null = null;
  if (whatInput) {
    await whatInput.fill(target.jobTitle);
    lastFilled = whatInput;
  } else {
    warnings.push('"What" input not found; searching by location only');
  }
  if (whereInput) {
    await whereInput.fill(target.location);
    lastFilled = whereInput;
  } else {
    warnings.push('"Where" input not found; searching by title only');
  }

  const submit = await findInput(session, SELECTORS.form.submit);
  if (submit) {
    await submit.click();
  } else if (lastFilled) {
    await lastFilled.press('Enter');
  }
}

/**
 * Brings the session to the results page and waits for client-side
 * rendering. The settle wait is a fixed sleep, paid in full every time.
 */
export async function navigate(
  session: BrowserSession,
  target: NavigationTarget,
  settle: DelayRange,
  wait?: Sleep,
): Promise<NavigationResult> {
  const warnings: string[] = [];
  const entryUrl = target.kind === 'direct' ? target.url : target.baseUrl;

  try {
    await session.goto(entryUrl);
  } catch (error) {
    throw new NavigationError(`Failed to load ${entryUrl}: ${errorMessage(error)}`, { cause: error });
  }

  if (target.kind === 'form') {
    try {
      await submitSearchForm(session, target, warnings);
    } catch (error) {
      if (error instanceof NavigationError) throw error;
      throw new NavigationError(`Search form submission failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  logger.debug('Waiting for results to render');
  const waited = await waitWithin(settle, wait);

  const currentUrl = await session.currentUrl();
  logger.info('Navigation settled', { currentUrl, waited: `${waited}ms`, mode: target.kind });
  return { currentUrl, warnings };
}
