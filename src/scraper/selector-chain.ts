import { errorMessage } from '../errors';
import { logger } from '../logger';
import type { LookupStrategy } from './types';

export interface SelectorStrategy {
  readonly by: LookupStrategy;
  readonly selector: string;
}

/** Ordered fallback strategies for one logical target. */
export type SelectorChain = readonly SelectorStrategy[];

export interface ChainMatch<T> {
  value: T;
  strategy: SelectorStrategy;
  index: number;
}

/** Shorthand for a chain of CSS selectors. */
export function cssChain(...selectors: string[]): SelectorChain {
  return selectors.map((selector) => ({ by: 'css' as const, selector }));
}

/** Shorthand for a chain of class names. */
export function classChain(...names: string[]): SelectorChain {
  return names.map((selector) => ({ by: 'class-name' as const, selector }));
}

/**
 * Tries each strategy in order and returns the first non-null result.
 * A strategy that throws counts as a miss. Later strategies are not
 * attempted once one matches.
 */
export async function resolveChain<T>(
  chain: SelectorChain,
  attempt: (strategy: SelectorStrategy) => Promise<T | null>,
): Promise<ChainMatch<T> | null> {
  for (let index = 0; index < chain.length; index++) {
    const strategy = chain[index];
    let value: T | null;
    try {
      value = await attempt(strategy);
    } catch (error) {
      logger.debug('Selector strategy failed', {
        selector: strategy.selector,
        by: strategy.by,
        error: errorMessage(error),
      });
      value = null;
    }
    if (value !== null) return { value, strategy, index };
  }
  return null;
}

/**
 * Converts a lookup strategy into a CSS selector. Class names may be
 * compound ("a.b"), which is already valid after the leading dot.
 */
export function toCssSelector(by: LookupStrategy, selector: string): string {
  if (by === 'css') return selector;
  return `.${selector.trim().replace(/\s+/g, '.')}`;
}

/**
 * Trimmed string or null when blank.
 */
export function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
