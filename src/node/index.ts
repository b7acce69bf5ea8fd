export type { KindMatcher, Node, NodeKernel } from './types.js';
export { BaseNode, EMPTY_CHILDREN, isNode } from './base-node.js';
export {
  hasDisplayField,
  isValidatable,
  probeDisplayField,
  type DisplayField,
  type DisplayValue,
  type HasDisplayField,
  type Validatable,
} from './capabilities.js';
export {
  defaultKindRegistry,
  KERNEL_METHODS,
  KindRegistry,
  type KindRegistration,
  type NodeClass,
} from './registry.js';
export { attachParents, detachParents } from './parent.js';
