/**
 * Failure kinds raised across the scraper. Detection blocks, empty result
 * pages and per-field misses are returned as values; only these are thrown.
 */
export type FailureKind =
  | 'config'
  | 'session-build'
  | 'navigation'
  | 'element-not-found'
  | 'notification-delivery';

export class ScraperError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Browser or driver could not be started for a location. */
export class SessionBuildError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('session-build', message, options);
  }
}

/** Page load failed, or the search form could not be driven. */
export class NavigationError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('navigation', message, options);
  }
}

export class ElementNotFoundError extends ScraperError {
  readonly selector: string;

  constructor(selector: string) {
    super('element-not-found', `No element matches "${selector}"`);
    this.selector = selector;
  }
}

/** Webhook rejected or unreachable. Logged by the reporter, never retried. */
export class NotificationDeliveryError extends ScraperError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super('notification-delivery', message, options);
    this.status = status;
  }
}

export class ConfigError extends ScraperError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super('config', `Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

/**
 * Message of any thrown value, for log metadata.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
