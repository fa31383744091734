/** One job record extracted from a results page. */
export interface Listing {
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly salary: string;
  /** Omitted when the card carries no listing id */
  readonly link?: string;
}

/** Listings for one location, in page order. */
export type LocationResult = readonly Listing[];

/** Location string → its listings, in configured location order. */
export type RunResult = ReadonlyMap<string, LocationResult>;

/** How a selector is interpreted by the browser. */
export type LookupStrategy = 'class-name' | 'css';

/**
 * Diagnostics gathered on a location's failure path.
 * Handed to the debug sink after the pipeline finishes.
 */
export interface DebugTrace {
  messages: string[];
  screenshot: Buffer | null;
}

export function createDebugTrace(): DebugTrace {
  return { messages: [], screenshot: null };
}

/**
 * An element on the page. `find` throws ElementNotFoundError when nothing
 * matches; the readers return null for missing text or attributes.
 */
export interface PageElement {
  find(by: LookupStrategy, selector: string): Promise<PageElement>;
  text(): Promise<string | null>;
  attribute(name: string): Promise<string | null>;
  fill(value: string): Promise<void>;
  press(key: string): Promise<void>;
  click(): Promise<void>;
}

/**
 * A live browser tab bound to one location's pipeline run.
 * `findAll` resolves to an empty list when nothing matches.
 */
export interface BrowserSession {
  goto(url: string): Promise<void>;
  findAll(by: LookupStrategy, selector: string): Promise<PageElement[]>;
  currentUrl(): Promise<string>;
  title(): Promise<string>;
  screenshot(): Promise<Buffer | null>;
  close(): Promise<void>;
}

/** Countermeasures applied to every launched session. */
export interface StealthProfile {
  headless: boolean;
  userAgent: string;
  viewport: { width: number; height: number };
  locale: string;
  languages: string[];
  pluginCount: number;
  /** Extra Chromium switches */
  args: string[];
  navigationTimeoutMs: number;
}

/** Starts a browser and returns a ready session. */
export type SessionLauncher = (profile: StealthProfile) => Promise<BrowserSession>;

/** Inclusive millisecond range; equal bounds mean a fixed delay. */
export interface DelayRange {
  min: number;
  max: number;
}

export type Sleep = (ms: number) => Promise<void>;
