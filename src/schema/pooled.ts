/**
 * Pooled Representation
 * Single-value leaf kinds deduplicated through a NodePool.
 */

import type { Diagnostic } from '../diagnostics/types.js';
import { createError } from '../error-classes.js';
import type { Node } from '../node/types.js';
import type { NodePool } from '../pool/node-pool.js';
import type { PoolCategory, PoolValue } from '../pool/types.js';
import type { Span } from '../source-location.js';
import {
  assertFieldValues,
  buildFieldTable,
  freezeFields,
  readField,
  type FieldEntry,
  type FieldSpecMap,
  type FieldValues,
  type PrimitiveType,
} from './fields.js';
import {
  createKindInfo,
  requireLeafKind,
  type DefinitionOptions,
  type KindInfo,
} from './kind-info.js';
import { CompactNode, type ValidateHook } from './schema-node.js';
import { hasKindId, type NodeDefinition } from './standard.js';

/**
 * Leaf node that may be shared across trees.
 * Immutable, so clone() returns the node itself. The parent link is
 * ignored: a shared node has no single parent.
 */
export class PooledNode<
  K extends string = string,
  F extends FieldSpecMap = FieldSpecMap,
> extends CompactNode<K, F> {
  private readonly hook: ValidateHook<PooledNode<K, F>> | undefined;

  constructor(
    info: KindInfo<K>,
    hook: ValidateHook<PooledNode<K, F>> | undefined,
    span: Span,
    fields: FieldValues<F>
  ) {
    super(info, span, fields);
    this.hook = hook;
  }

  override get parent(): Node | null {
    return null;
  }

  override setParent(_parent: Node | null): void {
    // Shared instance; see class doc
  }

  override clone(): PooledNode<K, F> {
    return this;
  }

  validate(): Diagnostic[] {
    return this.hook?.(this) ?? [];
  }

  protected rebuild(fields: FieldValues<F>): PooledNode<K, F> {
    return new PooledNode(
      this.kindInfo,
      this.hook,
      this.span,
      freezeFields(this.kindInfo.kind, this.kindInfo.fieldTable, fields)
    );
  }
}

// ============================================================
// DEFINITION
// ============================================================

export interface PooledDefinitionOptions<N extends Node>
  extends DefinitionOptions<N> {
  /**
   * Pool category for the value field.
   * Defaults to the field's type; 'identifier' must be asked for.
   */
  readonly category?: PoolCategory | undefined;
}

export interface PooledDefinition<K extends string, F extends FieldSpecMap>
  extends NodeDefinition<K, F, PooledNode<K, F>> {
  /** Null when instances are never cached */
  readonly poolCategory: PoolCategory | null;
  /**
   * Shared node for the value, or a fresh one if the kind or value is
   * not poolable.
   */
  create(span: Span, fields: FieldValues<F>, pool: NodePool): PooledNode<K, F>;
}

const CATEGORY_TYPES: Readonly<Record<PoolCategory, PrimitiveType>> = {
  int: 'int',
  bool: 'bool',
  string: 'string',
  identifier: 'string',
};

function defaultCategory(type: PrimitiveType): PoolCategory | null {
  switch (type) {
    case 'int':
    case 'bool':
    case 'string':
      return type;
    case 'float':
      return null;
  }
}

/** Category for a single required field, or null when not poolable */
function resolveCategory(
  kind: string,
  table: readonly FieldEntry[],
  requested: PoolCategory | undefined
): PoolCategory | null {
  const [only, ...rest] = table;
  if (only === undefined || rest.length > 0) {
    return null;
  }
  if (only.spec.category !== 'primitive' || only.spec.optional) {
    return null;
  }

  if (requested === undefined) {
    return defaultCategory(only.spec.type);
  }
  if (CATEGORY_TYPES[requested] !== only.spec.type) {
    throw createError('ARBOR-S004', {
      kind,
      strategy: 'pooled',
      reason: `pool category ${requested} does not fit ${only.spec.type} field ${only.name}`,
    });
  }
  return requested;
}

function isPoolValue(value: unknown): value is PoolValue {
  return (
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'string'
  );
}

/**
 * Declare a pooled leaf kind.
 * Only single-field kinds of an int, bool or string field are cached;
 * other leaf kinds are accepted and built fresh on every call.
 *
 * @throws SchemaError ARBOR-S004 if a field holds nodes or the category
 *   does not fit the field type
 *
 * @example
 * const Ident = definePooledNode('Ident', { name: field.string() }, {
 *   category: 'identifier',
 * });
 * Ident.create(span, { name: 'x' }, pool);
 */
export function definePooledNode<K extends string, F extends FieldSpecMap>(
  kind: K,
  fieldSpecs: F,
  options: PooledDefinitionOptions<PooledNode<K, F>> = {}
): PooledDefinition<K, F> {
  requireLeafKind(kind, 'pooled', fieldSpecs);
  const table = buildFieldTable(kind, fieldSpecs);
  const poolCategory = resolveCategory(kind, table, options.category);
  const valueField = poolCategory === null ? undefined : table[0];
  const info = createKindInfo(kind, 'pooled', fieldSpecs, options, PooledNode);
  const hook = options.validate;

  const definition: PooledDefinition<K, F> = {
    kind,
    visitMethod: info.visitMethod,
    info,
    fieldSpecs,
    poolCategory,
    create(span, fields, pool) {
      assertFieldValues<F>(kind, info.fieldTable, fields);
      const build = (): PooledNode<K, F> =>
        new PooledNode(
          info,
          hook,
          span,
          freezeFields(info.kind, info.fieldTable, fields)
        );

      if (poolCategory === null || valueField === undefined) {
        return build();
      }

      const value = readField(fields, valueField.name);
      if (!isPoolValue(value)) {
        return build();
      }
      return pool.getOrCreateKind(definition, poolCategory, value, build);
    },
    is(node): node is PooledNode<K, F> {
      return hasKindId(node, info);
    },
  };

  return definition;
}
