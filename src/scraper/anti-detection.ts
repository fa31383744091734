import type { DelayRange, Sleep, StealthProfile } from './types';

/**
 * Current desktop Chrome on Windows. Kept fixed so every session presents
 * the same fingerprint as the launch flags below.
 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

/**
 * Builds the stealth profile used for every location.
 */
export function createStealthProfile(overrides: Partial<StealthProfile> = {}): StealthProfile {
  const viewport = overrides.viewport ?? DEFAULT_VIEWPORT;

  return {
    headless: true,
    userAgent: DEFAULT_USER_AGENT,
    locale: 'en-US',
    languages: ['en-US', 'en'],
    pluginCount: 5,
    navigationTimeoutMs: 30_000,
    ...overrides,
    viewport,
    args: overrides.args ?? [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
      '--disable-gpu',
      '--no-first-run',
      '--disable-infobars',
      '--disable-notifications',
      '--disable-blink-features=AutomationControlled',
      '--lang=en-US,en;q=0.9',
      `--window-size=${viewport.width},${viewport.height}`,
    ],
  };
}

/**
 * Generates a random delay in milliseconds within the given range.
 */
export function randomDelay(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Draws a delay from the range; equal bounds give a fixed delay.
 */
export function pickDelay(range: DelayRange): number {
  return range.min === range.max ? range.min : randomDelay(range.min, range.max);
}

/**
 * Waits a delay drawn from the range and returns how long it waited.
 * Always pays the full delay; there is no early exit.
 */
export async function waitWithin(range: DelayRange, wait: Sleep = sleep): Promise<number> {
  const delay = pickDelay(range);
  await wait(delay);
  return delay;
}
