import type { RunResult } from '../scraper/types';

/**
 * Destination for the end-of-run report and for per-location diagnostics.
 * Implementations log their own delivery failures and never throw.
 */
export interface Reporter {
  /** Called exactly once per run with every location's listings. */
  sendReport(results: RunResult, debugNote?: string): Promise<void>;
  /** Out-of-band diagnostics for a location that failed. */
  sendDebug(location: string, details: string, screenshot: Buffer | null): Promise<void>;
}

/**
 * Total listings across all locations.
 */
export function countListings(results: RunResult): number {
  let total = 0;
  for (const listings of results.values()) total += listings.length;
  return total;
}
