export {
  field,
  RESERVED_FIELD_NAMES,
  type FieldEntry,
  type FieldSpec,
  type FieldSpecMap,
  type FieldValue,
  type FieldValues,
  type NodeFieldSpec,
  type NodeListFieldSpec,
  type PrimitiveFieldSpec,
  type PrimitiveType,
} from './fields.js';
export {
  AbstractKind,
  defineAbstractKind,
  DISPLAY_FIELD_CANDIDATES,
  visitMethodName,
  type DefinitionOptions,
  type KindInfo,
  type RepresentationStrategy,
} from './kind-info.js';
export {
  CompactNode,
  SchemaNode,
  type ValidateHook,
} from './schema-node.js';
export {
  defineNode,
  StandardNode,
  type NodeDefinition,
  type StandardDefinition,
} from './standard.js';
export {
  defineOptimizedNode,
  OptimizedNode,
  type OptimizedDefinition,
} from './optimized.js';
export {
  definePooledNode,
  PooledNode,
  type PooledDefinition,
  type PooledDefinitionOptions,
} from './pooled.js';
export {
  defineValueNode,
  ValueNodeWrapper,
  type NodeValue,
  type ValueDefinition,
} from './value.js';
