import { loadConfig, type AppConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { logger } from './logger';
import { SlackReporter } from './notify/slack';
import { runJobAlert, startScheduler, type SchedulerHandle } from './scheduler';
import { SessionTracker } from './scraper/location-pipeline';
import { launchStealthSession } from './scraper/stealth-browser';

const tracker = new SessionTracker();
let schedulerHandle: SchedulerHandle | null = null;

/**
 * Application entry point. Runs one search and exits, or keeps running on
 * the configured interval.
 */
async function main(): Promise<void> {
  logger.info('Starting Indeed job alert');

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const problem of error.problems) logger.error(`Config error: ${problem}`);
    }
    throw error;
  }

  logger.info(`Configuration loaded: ${config.search.locations.length} targets`, {
    jobTitle: config.search.jobTitle,
    mode: config.search.mode,
    maxJobsPerLocation: config.scraper.maxJobsPerLocation,
    intervalMinutes: config.schedule.intervalMinutes,
  });

  const deps = {
    launch: launchStealthSession,
    tracker,
    reporter: new SlackReporter({
      webhookUrl: config.slack.webhookUrl,
      debugDir: config.paths.debugDir,
    }),
  };

  if (config.schedule.intervalMinutes === 0) {
    await runJobAlert(config, deps);
    logger.info('Process completed');
    return;
  }

  schedulerHandle = startScheduler(config, deps);
}

// Graceful shutdown: the live browser session is torn down before exit
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down...`);
  schedulerHandle?.stop();
  await tracker.releaseActive();
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

main().catch((error) => {
  logger.error('Fatal startup error', { error: errorMessage(error) });
  process.exit(1);
});
