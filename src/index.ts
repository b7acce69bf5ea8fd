/**
 * Arbor Module
 * Exports the node kernel, representation strategies, pool, visitors,
 * traversal, validators, diagnostics and configuration
 */

export {
  createSpan,
  EMPTY_SPAN,
  formatSpan,
  spanCovering,
  spanEquals,
  type Span,
} from './source-location.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ArborError,
  ConfigError,
  createError,
  NodeContractError,
  PoolError,
  SchemaError,
  type ArborErrorData,
} from './error-classes.js';
export * from './diagnostics/index.js';
export * from './node/index.js';
export * from './schema/index.js';
export * from './pool/index.js';
export * from './visitor/index.js';
export * from './traversal/index.js';
export * from './validation/index.js';
export * from './config/index.js';
export type {
  CycleEvent,
  NodeValidatedEvent,
  PoolCallbacks,
  PoolClearEvent,
  PoolLookupEvent,
  PoolMissEvent,
  ValidationCallbacks,
} from './observability.js';
