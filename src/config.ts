import dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from './errors';
import { createStealthProfile } from './scraper/anti-detection';
import { DEFAULT_DOMAIN, type DomainMapping } from './scraper/domain-resolver';
import { DEFAULT_BLOCK_SIGNATURES, type BlockSignatures } from './scraper/sentinel';
import type { DelayRange, StealthProfile } from './scraper/types';

dotenv.config();

type Env = Record<string, string | undefined>;

export type SearchMode = 'direct' | 'form';

/**
 * Application configuration, built once at startup and passed explicitly
 * to everything that needs it. Frozen after construction.
 */
export interface AppConfig {
  readonly search: {
    readonly jobTitle: string;
    readonly locations: readonly string[];
    readonly mode: SearchMode;
    readonly sort: string;
    readonly maxDaysOld: number;
  };
  readonly domains: {
    readonly mappings: readonly DomainMapping[];
    readonly defaultDomain: string;
  };
  readonly scraper: {
    readonly maxJobsPerLocation: number;
    readonly settleDelay: DelayRange;
    readonly locationDelay: DelayRange;
    readonly stealth: StealthProfile;
    readonly blockSignatures: BlockSignatures;
  };
  readonly slack: {
    readonly webhookUrl: string;
  };
  readonly schedule: {
    /** 0 runs once and exits */
    readonly intervalMinutes: number;
  };
  readonly paths: {
    readonly debugDir: string;
  };
}

/**
 * Splits the location list, dropping blanks and repeats. Semicolons
 * separate entries when present, so `London, UK;Paris` keeps the comma;
 * otherwise entries are comma-separated.
 */
export function parseLocations(raw: string): string[] {
  const separator = raw.includes(';') ? ';' : ',';
  const seen = new Set<string>();
  for (const part of raw.split(separator)) {
    const location = part.trim();
    if (location) seen.add(location);
  }
  return [...seen];
}

/**
 * Parses `uk:uk.indeed.com,canada:ca.indeed.com` into an ordered table.
 * Keys are lower-cased; entries without a colon are ignored.
 */
export function parseDomainMappings(raw: string): DomainMapping[] {
  const mappings: DomainMapping[] = [];
  for (const entry of raw.split(',')) {
    const sep = entry.indexOf(':');
    if (sep === -1) continue;
    const key = entry.slice(0, sep).trim().toLowerCase();
    const domain = entry.slice(sep + 1).trim();
    if (key && domain) mappings.push({ key, domain });
  }
  return mappings;
}

/**
 * Parses `5000` or `3000-7000` into a millisecond range. Null when malformed.
 */
export function parseDelayRange(raw: string): DelayRange | null {
  const match = raw.trim().match(/^(\d+)(?:\s*-\s*(\d+))?$/);
  if (!match) return null;
  const min = parseInt(match[1], 10);
  const max = match[2] === undefined ? min : parseInt(match[2], 10);
  return max >= min ? { min, max } : null;
}

function parseNonNegativeInt(raw: string): number | null {
  return /^\d+$/.test(raw.trim()) ? parseInt(raw.trim(), 10) : null;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function readConfig(env: Env): { config: AppConfig; errors: string[] } {
  const errors: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      errors.push(`${name} is required`);
      return '';
    }
    return value;
  };

  const optional = <T>(name: string, fallback: T, parse: (raw: string) => T | null): T => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = parse(raw);
    if (parsed === null) {
      errors.push(`${name} is malformed: "${raw}"`);
      return fallback;
    }
    return parsed;
  };

  const webhookUrl = required('SLACK_WEBHOOK_URL');
  if (webhookUrl && !/^https?:\/\//.test(webhookUrl)) {
    errors.push('SLACK_WEBHOOK_URL must be an http(s) URL');
  }

  const jobTitle = required('JOB_TITLE');

  const locationsRaw = required('JOB_LOCATIONS');
  const locations = parseLocations(locationsRaw);
  if (locationsRaw && locations.length === 0) errors.push('JOB_LOCATIONS has no locations');

  const mappingsRaw = required('DOMAIN_MAPPINGS');
  const mappings = parseDomainMappings(mappingsRaw);
  if (mappingsRaw && mappings.length === 0) errors.push('DOMAIN_MAPPINGS has no key:domain entries');

  const maxJobsPerLocation = optional<number>('MAX_JOBS_PER_LOCATION', 10, (raw) => {
    const n = parseNonNegativeInt(raw);
    return n !== null && n > 0 ? n : null;
  });

  const mode = optional<SearchMode>('SEARCH_MODE', 'direct', (raw) => {
    const value = raw.trim().toLowerCase();
    return value === 'direct' || value === 'form' ? value : null;
  });

  const config: AppConfig = {
    search: {
      jobTitle,
      locations,
      mode,
      sort: 'date',
      maxDaysOld: optional<number>('MAX_DAYS_OLD', 7, parseNonNegativeInt),
    },
    domains: {
      mappings,
      defaultDomain: optional<string>('DEFAULT_DOMAIN', DEFAULT_DOMAIN, (raw) => raw.trim()),
    },
    scraper: {
      maxJobsPerLocation,
      settleDelay: optional<DelayRange>('SETTLE_DELAY_MS', { min: 5000, max: 5000 }, parseDelayRange),
      locationDelay: optional<DelayRange>('LOCATION_DELAY_MS', { min: 3000, max: 7000 }, parseDelayRange),
      stealth: createStealthProfile({
        headless: optional<boolean>('HEADLESS', true, (raw) => raw.trim().toLowerCase() !== 'false'),
      }),
      blockSignatures: DEFAULT_BLOCK_SIGNATURES,
    },
    slack: { webhookUrl },
    schedule: {
      intervalMinutes: optional<number>('RUN_INTERVAL_MINUTES', 0, parseNonNegativeInt),
    },
    paths: {
      debugDir: path.resolve(optional<string>('DEBUG_DIR', './debug', (raw) => raw.trim())),
    },
  };

  return { config, errors };
}

/**
 * Validates that all required configuration is set and well-formed.
 */
export function validateConfig(env: Env = process.env): { valid: boolean; errors: string[] } {
  const { errors } = readConfig(env);
  return { valid: errors.length === 0, errors };
}

/**
 * Builds the immutable configuration from the environment (.env included).
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const { config, errors } = readConfig(env);
  if (errors.length > 0) throw new ConfigError(errors);
  return deepFreeze(config);
}
