import { errorMessage } from '../errors';
import { logger } from '../logger';
import { buildListingUrl } from './domain-resolver';
import { nonEmpty, resolveChain, type SelectorChain } from './selector-chain';
import { SELECTORS } from './selectors';
import type { Listing, PageElement } from './types';

export const NOT_LISTED = 'Not listed';

export interface ExtractionContext {
  /** Location string the search was run for; fallback for the job location */
  location: string;
  /** Site domain the listing links point at */
  domain: string;
}

export type CardExtraction =
  | { ok: true; listing: Listing }
  | { ok: false; reason: string };

export interface ExtractionSummary {
  listings: Listing[];
  cardsVisited: number;
  parseFailures: number;
}

type Reader = (element: PageElement) => Promise<string | null>;

const readText: Reader = (element) => element.text();

/** Prefers the `title` attribute, which holds the untruncated job title. */
const readTitle: Reader = async (element) =>
  nonEmpty(await element.attribute('title')) ?? element.text();

/**
 * First non-blank value produced by the chain, or null.
 */
async function readField(
  card: PageElement,
  chain: SelectorChain,
  read: Reader,
): Promise<string | null> {
  const match = await resolveChain(chain, async ({ by, selector }) => {
    const element = await card.find(by, selector);
    return nonEmpty(await read(element));
  });
  return match ? match.value : null;
}

/**
 * Listing id from the card root, else from the nested title anchor.
 */
async function readJobKey(card: PageElement): Promise<string | null> {
  const { jobKey, titleLink } = SELECTORS.card;

  try {
    const own = nonEmpty(await card.attribute(jobKey));
    if (own) return own;

    const anchor = await card.find('css', titleLink);
    return nonEmpty(await anchor.attribute(jobKey));
  } catch (error) {
    logger.debug('No listing id on card', { error: errorMessage(error) });
    return null;
  }
}

/**
 * Extracts one listing. Only the title is required; every other field
 * resolves independently and falls back to its sentinel.
 */
export async function extractListing(card: PageElement, context: ExtractionContext): Promise<CardExtraction> {
  const title = await readField(card, SELECTORS.card.title, readTitle);
  if (!title) return { ok: false, reason: 'No title found' };

  const company = await readField(card, SELECTORS.card.company, readText);
  const location = await readField(card, SELECTORS.card.location, readText);
  const salary = await readField(card, SELECTORS.card.salary, readText);
  const jobKey = await readJobKey(card);

  const listing: Listing = {
    title,
    company: company ?? NOT_LISTED,
    location: location ?? context.location.trim(),
    salary: salary ?? NOT_LISTED,
    ...(jobKey ? { link: buildListingUrl(context.domain, jobKey) } : {}),
  };

  return { ok: true, listing: Object.freeze(listing) };
}

/**
 * Extracts listings from at most `maxCards` cards in document order.
 * A failing card is counted and skipped; the rest are still processed.
 */
export async function extractListings(
  cards: readonly PageElement[],
  context: ExtractionContext,
  maxCards: number,
): Promise<ExtractionSummary> {
  const visit = cards.slice(0, Math.max(0, maxCards));
  const listings: Listing[] = [];
  let parseFailures = 0;

  logger.info(`Processing up to ${maxCards} jobs`, { available: cards.length });

  for (let i = 0; i < visit.length; i++) {
    try {
      const result = await extractListing(visit[i], context);
      if (!result.ok) {
        parseFailures++;
        logger.debug(`Job ${i + 1}: ${result.reason}, skipping`);
        continue;
      }
      listings.push(result.listing);
      logger.debug(`Job ${i + 1}: ${result.listing.title.slice(0, 50)}`);
    } catch (error) {
      parseFailures++;
      logger.warn(`Job ${i + 1}: Failed to parse`, { error: errorMessage(error) });
    }
  }

  logger.info(`Successfully scraped ${listings.length} jobs`, {
    visited: visit.length,
    parseFailures,
  });
  return { listings, cardsVisited: visit.length, parseFailures };
}
