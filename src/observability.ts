/**
 * Observability Types
 *
 * Callbacks a host passes to the pool and validators to watch their work.
 * All callbacks are optional and run synchronously; errors they throw
 * propagate to the caller.
 */

import type { Diagnostic } from './diagnostics/types.js';
import type { Node } from './node/types.js';
import type { PoolCategory, PoolValue } from './pool/types.js';

// ============================================================
// POOL
// ============================================================

/** Callbacks for monitoring the node pool */
export interface PoolCallbacks {
  /** Called when a request is served from the cache */
  onHit?: ((event: PoolLookupEvent) => void) | undefined;
  /** Called when a request constructs a node */
  onMiss?: ((event: PoolMissEvent) => void) | undefined;
  /** Called after every cache has been emptied */
  onClear?: ((event: PoolClearEvent) => void) | undefined;
}

/** Event emitted for a pool hit */
export interface PoolLookupEvent {
  category: PoolCategory;
  /** Kind the entry is filed under */
  namespace: string;
  value: PoolValue;
}

/** Event emitted for a pool miss */
export interface PoolMissEvent extends PoolLookupEvent {
  /** False when the policy kept the fresh node out of the cache */
  cached: boolean;
}

/** Event emitted by clear() */
export interface PoolClearEvent {
  /** Entries dropped across all categories */
  entries: number;
}

// ============================================================
// VALIDATION
// ============================================================

/** Callbacks for monitoring validation walks */
export interface ValidationCallbacks {
  /** Called after a node's own checks ran */
  onNodeValidated?: ((event: NodeValidatedEvent) => void) | undefined;
  /** Called once per detected cycle */
  onCycle?: ((event: CycleEvent) => void) | undefined;
}

/** Event emitted after a node's validate hook */
export interface NodeValidatedEvent {
  node: Node;
  diagnostics: readonly Diagnostic[];
}

/** Event emitted when the walk reaches a node that is still in progress */
export interface CycleEvent {
  /** Repeated node, every step, then the repeated node again */
  path: readonly Node[];
}
