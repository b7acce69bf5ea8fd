export { CategoryLock } from './lock.js';
export { ENTRY_BYTES, NodePool, type NodePoolOptions } from './node-pool.js';
export {
  isPoolCategory,
  POOL_CATEGORIES,
  type CategorySizes,
  type PoolCategory,
  type PoolMemoryEstimate,
  type PoolStats,
  type PoolValue,
} from './types.js';
