import type { AppConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { Reporter } from './notify/reporter';
import { pickDelay, sleep } from './scraper/anti-detection';
import {
  runLocationPipeline,
  type LocationOutcome,
  type PipelineDeps,
} from './scraper/location-pipeline';
import type { LocationResult, RunResult } from './scraper/types';

export interface SearchDeps extends PipelineDeps {
  reporter: Pick<Reporter, 'sendDebug'>;
}

export interface SearchSummary {
  results: RunResult;
  outcomes: LocationOutcome[];
  totalListings: number;
  elapsedMs: number;
}

/**
 * Hands a failed location's trace to the debug sink. Never throws.
 */
async function forwardTrace(outcome: LocationOutcome, reporter: SearchDeps['reporter']): Promise<void> {
  if (outcome.status === 'completed' || outcome.trace.messages.length === 0) return;
  try {
    await reporter.sendDebug(outcome.location, outcome.trace.messages.join('\n'), outcome.trace.screenshot);
  } catch (error) {
    logger.error('Debug sink failed', { location: outcome.location, error: errorMessage(error) });
  }
}

/**
 * Searches every configured location one after another, with a random
 * pause between locations. One browser session is live at a time.
 */
export async function runSearch(config: AppConfig, deps: SearchDeps): Promise<SearchSummary> {
  const started = Date.now();
  const { locations } = config.search;
  const wait = deps.sleep ?? sleep;
  const results = new Map<string, LocationResult>();
  const outcomes: LocationOutcome[] = [];

  for (let i = 0; i < locations.length; i++) {
    const location = locations[i];
    logger.info(`[${i + 1}/${locations.length}] Target: ${location}`);

    const outcome = await runLocationPipeline(location, config, deps);
    outcomes.push(outcome);
    results.set(location, outcome.listings);

    logger.info(`[${i + 1}/${locations.length}] ${location}: ${outcome.listings.length} jobs`, {
      status: outcome.status,
      cardsVisited: outcome.cardsVisited,
      parseFailures: outcome.parseFailures,
    });

    await forwardTrace(outcome, deps.reporter);

    if (i < locations.length - 1) {
      const delay = pickDelay(config.scraper.locationDelay);
      logger.info(`Waiting ${(delay / 1000).toFixed(1)}s before next location...`);
      await wait(delay);
    }
  }

  let totalListings = 0;
  for (const listings of results.values()) totalListings += listings.length;

  return { results, outcomes, totalListings, elapsedMs: Date.now() - started };
}
