/**
 * Node Pool
 * Bounded memoization cache sharing immutable leaf nodes by value.
 */

import { createDefaultPoolPolicy, type PoolPolicy } from '../config/pool-policy.js';
import type { KindMatcher, Node } from '../node/types.js';
import type { PoolCallbacks } from '../observability.js';
import { CategoryLock } from './lock.js';
import {
  POOL_CATEGORIES,
  type CategorySizes,
  type PoolCategory,
  type PoolMemoryEstimate,
  type PoolStats,
  type PoolValue,
} from './types.js';

/** Namespace for entries requested without a kind */
const UNTYPED_NAMESPACE = '*';

/** Rough per-entry cost of a cached node, in bytes */
export const ENTRY_BYTES: Readonly<Record<PoolCategory, number>> = {
  int: 96,
  bool: 92,
  string: 120,
  identifier: 110,
};

export interface NodePoolOptions {
  readonly policy?: PoolPolicy | undefined;
  readonly callbacks?: PoolCallbacks | undefined;
}

/** namespace -> value -> shared node */
type CategoryCache = Map<string, Map<PoolValue, Node>>;

// ============================================================
// NODE POOL
// ============================================================

/**
 * Four independent caches, one per category, each behind its own lock.
 * Entries are filed by kind so two kinds sharing a category never hand
 * out each other's nodes. Once a category is full, further values are
 * constructed fresh and not cached; nothing is ever evicted. The boolean
 * cap applies per kind, so every bool kind can hold both values. Negative
 * zero is never pooled since node equality tells it apart from zero.
 *
 * @example
 * const Lit = definePooledNode('Lit', { value: field.int() });
 * const pool = new NodePool();
 * const five = Lit.create(span, { value: 5 }, pool);
 * Lit.create(span, { value: 5 }, pool) === five; // true
 */
export class NodePool {
  readonly policy: PoolPolicy;
  private readonly callbacks: PoolCallbacks;
  private readonly caches = new Map<PoolCategory, CategoryCache>();
  private readonly locks = new Map<PoolCategory, CategoryLock>();
  private readonly entryCounts = new Map<PoolCategory, number>();
  private hits = 0;
  private misses = 0;

  constructor(options: NodePoolOptions = {}) {
    this.policy = options.policy ?? createDefaultPoolPolicy();
    this.callbacks = options.callbacks ?? {};

    for (const category of POOL_CATEGORIES) {
      this.caches.set(category, new Map());
      this.locks.set(category, new CategoryLock(category));
      this.entryCounts.set(category, 0);
    }
  }

  // ============================================================
  // LOOKUP
  // ============================================================

  /**
   * Shared node for a value, built by factory on the first request.
   * Entries requested this way share one namespace per category.
   *
   * @throws PoolError ARBOR-P001 if factory re-enters this category
   */
  getOrCreate(
    category: PoolCategory,
    value: PoolValue,
    factory: () => Node
  ): Node {
    return this.lookup(category, UNTYPED_NAMESPACE, value, factory, (node) => node);
  }

  /**
   * Typed lookup filed under the matcher's kind.
   * A cached entry that fails the matcher is never returned.
   *
   * @throws PoolError ARBOR-P001 if factory re-enters this category
   */
  getOrCreateKind<N extends Node>(
    matcher: KindMatcher<N>,
    category: PoolCategory,
    value: PoolValue,
    factory: () => N
  ): N {
    return this.lookup(category, matcher.kind, value, factory, (node) =>
      matcher.is(node) ? node : null
    );
  }

  private lookup<N extends Node>(
    category: PoolCategory,
    namespace: string,
    value: PoolValue,
    factory: () => N,
    narrow: (node: Node) => N | null
  ): N {
    return this.lockFor(category).run(() => {
      const entries = this.entriesFor(category, namespace);
      const cached = Object.is(value, -0) ? undefined : entries.get(value);
      const hit = cached === undefined ? null : narrow(cached);

      if (hit !== null) {
        this.hits++;
        this.callbacks.onHit?.({ category, namespace, value });
        return hit;
      }

      this.misses++;
      const node = factory();
      const cacheable =
        cached === undefined && this.admits(category, value, namespace);
      if (cacheable) {
        entries.set(value, node);
        this.entryCounts.set(category, this.sizeOf(category) + 1);
      }
      this.callbacks.onMiss?.({ category, namespace, value, cached: cacheable });
      return node;
    });
  }

  /**
   * True when the policy lets a new value into the category.
   * The bool cap counts entries within `namespace` only.
   */
  admits(
    category: PoolCategory,
    value: PoolValue,
    namespace: string = UNTYPED_NAMESPACE
  ): boolean {
    const size = this.sizeOf(category);

    switch (category) {
      case 'int':
        return (
          typeof value === 'number' &&
          Number.isInteger(value) &&
          !Object.is(value, -0) &&
          value >= this.policy.int.min &&
          value <= this.policy.int.max
        );
      case 'bool':
        return (
          typeof value === 'boolean' &&
          this.entriesFor(category, namespace).size <
            this.policy.bool.maxEntries
        );
      case 'string':
      case 'identifier': {
        const limits = this.policy[category];
        return (
          typeof value === 'string' &&
          value.length <= limits.maxLength &&
          size < limits.maxEntries
        );
      }
    }
  }

  // ============================================================
  // STATS
  // ============================================================

  stats(): PoolStats {
    const total = this.hits + this.misses;
    const hitRate =
      total > 0 ? Math.round((this.hits / total) * 100 * 100) / 100 : 0;

    return {
      hits: this.hits,
      misses: this.misses,
      hitRate,
      sizes: this.sizes(),
    };
  }

  sizes(): CategorySizes {
    return {
      int: this.sizeOf('int'),
      bool: this.sizeOf('bool'),
      string: this.sizeOf('string'),
      identifier: this.sizeOf('identifier'),
    };
  }

  memoryEstimate(): PoolMemoryEstimate {
    const int = this.sizeOf('int') * ENTRY_BYTES.int;
    const bool = this.sizeOf('bool') * ENTRY_BYTES.bool;
    const string = this.sizeOf('string') * ENTRY_BYTES.string;
    const identifier = this.sizeOf('identifier') * ENTRY_BYTES.identifier;

    return { int, bool, string, identifier, total: int + bool + string + identifier };
  }

  /** Drop every entry and reset the counters */
  clear(): void {
    let entries = 0;

    for (const category of POOL_CATEGORIES) {
      this.lockFor(category).run(() => {
        entries += this.sizeOf(category);
        this.caches.get(category)?.clear();
        this.entryCounts.set(category, 0);
      });
    }

    this.hits = 0;
    this.misses = 0;
    this.callbacks.onClear?.({ entries });
  }

  // ============================================================
  // HELPERS
  // ============================================================

  private sizeOf(category: PoolCategory): number {
    return this.entryCounts.get(category) ?? 0;
  }

  private lockFor(category: PoolCategory): CategoryLock {
    const lock = this.locks.get(category);
    if (lock === undefined) {
      throw new TypeError(`Unknown pool category: ${category}`);
    }
    return lock;
  }

  private entriesFor(
    category: PoolCategory,
    namespace: string
  ): Map<PoolValue, Node> {
    const cache = this.caches.get(category);
    if (cache === undefined) {
      throw new TypeError(`Unknown pool category: ${category}`);
    }

    let entries = cache.get(namespace);
    if (entries === undefined) {
      entries = new Map();
      cache.set(namespace, entries);
    }
    return entries;
  }
}
