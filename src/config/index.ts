export {
  CONFIG_FILE_NAMES,
  createDefaultPoolPolicy,
  loadPoolPolicy,
  resolvePoolPolicy,
  type EntryCapPolicy,
  type IntRangePolicy,
  type PoolPolicy,
  type TextPolicy,
} from './pool-policy.js';
