import type { AppConfig } from '../config';
import { NavigationError, errorMessage } from '../errors';
import { logger } from '../logger';
import { locateCards } from './card-locator';
import { buildSearchUrl, resolveDomain } from './domain-resolver';
import { extractListings } from './field-extractor';
import { navigate, type NavigationTarget } from './navigator';
import { checkForBlock } from './sentinel';
import { buildSession } from './session-builder';
import {
  createDebugTrace,
  type BrowserSession,
  type DebugTrace,
  type Listing,
  type LocationResult,
  type SessionLauncher,
  type Sleep,
} from './types';

export type LocationStatus =
  | 'completed'
  | 'session-build-failed'
  | 'navigation-failed'
  | 'blocked'
  | 'no-cards'
  | 'failed';

type PipelineState =
  | 'init'
  | 'session-ready'
  | 'navigated'
  | 'checked'
  | 'cards-located'
  | 'extracting'
  | 'done';

export interface LocationOutcome {
  location: string;
  domain: string;
  status: LocationStatus;
  listings: LocationResult;
  /** Populated on failure paths only */
  trace: DebugTrace;
  cardsVisited: number;
  parseFailures: number;
}

/**
 * Holds the release function of the one live session, so a shutdown
 * signal can tear the browser down mid-run.
 */
export class SessionTracker {
  private release: (() => Promise<void>) | null = null;

  track(release: () => Promise<void>): void {
    this.release = release;
  }

  clear(release: () => Promise<void>): void {
    if (this.release === release) this.release = null;
  }

  get active(): boolean {
    return this.release !== null;
  }

  async releaseActive(): Promise<void> {
    const release = this.release;
    this.release = null;
    if (release) await release();
  }
}

export interface PipelineDeps {
  launch: SessionLauncher;
  sleep?: Sleep;
  tracker?: SessionTracker;
}

interface StageResult {
  status: LocationStatus;
  listings: Listing[];
  cardsVisited: number;
  parseFailures: number;
}

function searchTarget(location: string, domain: string, config: AppConfig): NavigationTarget {
  const { jobTitle, mode, sort, maxDaysOld } = config.search;
  if (mode === 'form') {
    return { kind: 'form', baseUrl: `https://${domain}/`, jobTitle, location };
  }
  return { kind: 'direct', url: buildSearchUrl(domain, jobTitle, location, { sort, maxDaysOld }) };
}

/**
 * Best-effort screenshot. Returns null instead of throwing.
 */
async function captureScreenshot(session: BrowserSession): Promise<Buffer | null> {
  try {
    return await session.screenshot();
  } catch (error) {
    logger.warn('Screenshot capture failed', { error: errorMessage(error) });
    return null;
  }
}

async function readPageTitle(session: BrowserSession): Promise<string> {
  try {
    return await session.title();
  } catch (error) {
    logger.debug('Could not read page title', { error: errorMessage(error) });
    return '';
  }
}

/**
 * Runs one location from session start to teardown and always resolves,
 * with an empty result on every failure path. The session is closed
 * exactly once whichever way the pipeline exits.
 */
export async function runLocationPipeline(
  location: string,
  config: AppConfig,
  deps: PipelineDeps,
): Promise<LocationOutcome> {
  const trace = createDebugTrace();
  const domain = resolveDomain(location, config.domains.mappings, config.domains.defaultDomain);
  let state: PipelineState = 'init';

  const advance = (next: PipelineState): void => {
    logger.debug('Pipeline state', { location, from: state, to: next });
    state = next;
  };

  const finish = (result: StageResult): LocationOutcome => {
    advance('done');
    return {
      location,
      domain,
      status: result.status,
      listings: Object.freeze([...result.listings]),
      trace,
      cardsVisited: result.cardsVisited,
      parseFailures: result.parseFailures,
    };
  };

  const empty = (status: LocationStatus): StageResult => ({
    status,
    listings: [],
    cardsVisited: 0,
    parseFailures: 0,
  });

  logger.info(`Processing: ${location}`, { domain, jobTitle: config.search.jobTitle });

  let session: BrowserSession;
  try {
    session = await buildSession(config.scraper.stealth, deps.launch);
  } catch (error) {
    logger.error('Browser session could not be created', { location, error: errorMessage(error) });
    trace.messages.push(`Browser session failed: ${errorMessage(error)}`);
    return finish(empty('session-build-failed'));
  }
  advance('session-ready');

  // Every caller waits on the same close, including a shutdown that lands mid-close
  let closing: Promise<void> | null = null;
  const release = (): Promise<void> => {
    if (!closing) {
      closing = session.close().catch((error: unknown) => {
        logger.error('Session teardown failed', { location, error: errorMessage(error) });
      });
    }
    return closing;
  };
  deps.tracker?.track(release);

  const runStages = async (): Promise<StageResult> => {
    let currentUrl: string;
    try {
      const target = searchTarget(location, domain, config);
      if (target.kind === 'direct') logger.info('Navigating to search results', { url: target.url });
      const result = await navigate(session, target, config.scraper.settleDelay, deps.sleep);
      currentUrl = result.currentUrl;
      for (const warning of result.warnings) {
        logger.warn(warning, { location });
        trace.messages.push(warning);
      }
    } catch (error) {
      if (!(error instanceof NavigationError)) throw error;
      logger.error('Navigation failed', { location, error: error.message });
      trace.messages.push(`Navigation failed: ${error.message}`);
      trace.screenshot = await captureScreenshot(session);
      return empty('navigation-failed');
    }
    advance('navigated');

    const pageTitle = await readPageTitle(session);
    const detection = checkForBlock(currentUrl, pageTitle, config.scraper.blockSignatures, {
      jobTitle: config.search.jobTitle,
      location,
    });
    if (detection.blocked) {
      logger.warn(detection.reason, { location, currentUrl, signature: detection.signature });
      trace.messages.push(detection.reason);
      trace.messages.push(`URL: ${currentUrl}`);
      trace.screenshot = await captureScreenshot(session);
      return empty('blocked');
    }
    advance('checked');

    const search = await locateCards(session);
    advance('cards-located');
    if (!search.found) {
      trace.messages.push('No job cards found on page');
      trace.messages.push(`Page title: ${pageTitle}`);
      trace.messages.push(`URL: ${currentUrl}`);
      if (search.siteReportsNoResults) {
        trace.messages.push("Indeed shows 'No jobs found' message");
      }
      trace.screenshot = await captureScreenshot(session);
      return empty('no-cards');
    }

    advance('extracting');
    const summary = await extractListings(
      search.cards,
      { location, domain },
      config.scraper.maxJobsPerLocation,
    );
    return { status: 'completed', ...summary };
  };

  let result: StageResult;
  try {
    result = await runStages();
  } catch (error) {
    logger.error(`Unexpected error for ${location}`, {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    trace.messages.push(`Unexpected error: ${errorMessage(error)}`);
    trace.screenshot = await captureScreenshot(session);
    result = empty('failed');
  } finally {
    await release();
    deps.tracker?.clear(release);
  }

  return finish(result);
}
