import type { AppConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { Reporter } from './notify/reporter';
import { runSearch, type SearchSummary } from './orchestrator';
import type { PipelineDeps } from './scraper/location-pipeline';

export const NO_RESULTS_NOTE = 'Scraped all locations but found no jobs. Check debug screenshots above.';

export interface JobAlertDeps extends PipelineDeps {
  reporter: Reporter;
}

export interface SchedulerHandle {
  stop(): void;
  /** Resolves once no run is in progress */
  idle(): Promise<void>;
}

/**
 * Executes one alert cycle: search every location, then send exactly one report.
 */
export async function runJobAlert(config: AppConfig, deps: JobAlertDeps): Promise<SearchSummary> {
  logger.info('=== JOB SEARCH: Starting ===', {
    jobTitle: config.search.jobTitle,
    locations: config.search.locations.length,
    mode: config.search.mode,
  });

  const summary = await runSearch(config, deps);

  logger.info('=== JOB SEARCH: Complete ===', {
    totalListings: summary.totalListings,
    elapsed: `${(summary.elapsedMs / 1000).toFixed(1)}s`,
    locations: summary.outcomes.map((o) => ({
      location: o.location,
      jobs: o.listings.length,
      status: o.status,
    })),
  });

  const debugNote = summary.totalListings === 0 ? NO_RESULTS_NOTE : undefined;
  await deps.reporter.sendReport(summary.results, debugNote);

  return summary;
}

/**
 * Runs an alert cycle immediately, then every `intervalMinutes` when that
 * is positive. A tick is skipped while the previous cycle is still running.
 */
export function startScheduler(config: AppConfig, deps: JobAlertDeps): SchedulerHandle {
  let current: Promise<void> | null = null;
  let timer: NodeJS.Timeout | null = null;

  const tick = (): void => {
    if (current) {
      logger.warn('Previous job search still running, skipping');
      return;
    }
    current = runJobAlert(config, deps)
      .then(() => undefined)
      .catch((error) => {
        logger.error('Job search cycle error', {
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      })
      .finally(() => {
        current = null;
      });
  };

  logger.info('Starting job alert scheduler', {
    intervalMinutes: config.schedule.intervalMinutes,
    jobTitle: config.search.jobTitle,
  });

  tick();
  if (config.schedule.intervalMinutes > 0) {
    timer = setInterval(tick, config.schedule.intervalMinutes * 60_000);
  }

  return {
    stop: () => {
      if (timer) clearInterval(timer);
      timer = null;
    },
    idle: async () => {
      while (current) await current;
    },
  };
}
