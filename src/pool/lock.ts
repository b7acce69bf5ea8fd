import { createError } from '../error-classes.js';
import type { PoolCategory } from './types.js';

/**
 * Guard for one pool category.
 * Held for a single getOrCreate or clear call and never re-entered; a
 * factory that asks the pool for its own category fails instead of
 * corrupting the cache it is filling.
 */
export class CategoryLock {
  readonly category: PoolCategory;
  private held = false;

  constructor(category: PoolCategory) {
    this.category = category;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Run fn while holding the lock.
   *
   * @throws PoolError ARBOR-P001 if the lock is already held
   */
  run<T>(fn: () => T): T {
    if (this.held) {
      throw createError('ARBOR-P001', { category: this.category });
    }

    this.held = true;
    try {
      return fn();
    } finally {
      this.held = false;
    }
  }
}
