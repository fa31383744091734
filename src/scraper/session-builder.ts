import { SessionBuildError, errorMessage } from '../errors';
import { logger } from '../logger';
import type { BrowserSession, SessionLauncher, StealthProfile } from './types';

/**
 * Starts a browser session with the stealth profile applied.
 * Any launcher failure (missing binary, driver mismatch) surfaces as
 * SessionBuildError so the caller can abandon just this location.
 */
export async function buildSession(
  profile: StealthProfile,
  launch: SessionLauncher,
): Promise<BrowserSession> {
  logger.info('Launching browser', {
    headless: profile.headless,
    viewport: `${profile.viewport.width}x${profile.viewport.height}`,
  });

  const launchStart = Date.now();
  try {
    const session = await launch(profile);
    logger.info('Browser session ready', { elapsed: `${Date.now() - launchStart}ms` });
    return session;
  } catch (error) {
    throw new SessionBuildError(`Browser launch failed: ${errorMessage(error)}`, { cause: error });
  }
}
