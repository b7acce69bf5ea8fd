/**
 * Pool Types
 */

/** Value categories the pool deduplicates */
export type PoolCategory = 'int' | 'bool' | 'string' | 'identifier';

export const POOL_CATEGORIES: readonly PoolCategory[] = [
  'int',
  'bool',
  'string',
  'identifier',
];

/** Anything a pooled leaf can hold */
export type PoolValue = number | boolean | string;

export type CategorySizes = Readonly<Record<PoolCategory, number>>;

/** Counters since construction or the last clear() */
export interface PoolStats {
  readonly hits: number;
  readonly misses: number;
  /** Percentage of requests served from cache, two decimals */
  readonly hitRate: number;
  readonly sizes: CategorySizes;
}

/** Rough byte usage per category */
export interface PoolMemoryEstimate {
  readonly int: number;
  readonly bool: number;
  readonly string: number;
  readonly identifier: number;
  readonly total: number;
}

export function isPoolCategory(value: unknown): value is PoolCategory {
  return POOL_CATEGORIES.some((category) => category === value);
}
