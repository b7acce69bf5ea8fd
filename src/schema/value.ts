/**
 * Value-Type Representation
 *
 * Leaf kinds stored as frozen plain records instead of node objects.
 * Records are cheap to create and compare; ValueNodeWrapper adapts one to
 * the Node contract when it must sit in a tree beside other nodes.
 */

import type { Diagnostic } from '../diagnostics/types.js';
import { BaseNode, EMPTY_CHILDREN } from '../node/base-node.js';
import type {
  DisplayField,
  HasDisplayField,
  Validatable,
} from '../node/capabilities.js';
import type { Node } from '../node/types.js';
import { spanEquals, type Span } from '../source-location.js';
import { dispatchVisit, type Visitor } from '../visitor/visitor.js';
import {
  assertFieldValues,
  freezeFields,
  primitiveFieldsEqual,
  type FieldSpecMap,
  type FieldValues,
} from './fields.js';
import {
  createKindInfo,
  requireLeafKind,
  type DefinitionOptions,
  type KindInfo,
} from './kind-info.js';
import { displayFieldOf, type ValidateHook } from './schema-node.js';
import { hasKindId } from './standard.js';

// ============================================================
// VALUE RECORDS
// ============================================================

/** A value-type node: kind, span and fields, all frozen */
export interface NodeValue<K extends string, F extends FieldSpecMap> {
  readonly kind: K;
  readonly span: Span;
  readonly fields: FieldValues<F>;
}

// ============================================================
// WRAPPER
// ============================================================

/**
 * Node adapter around a value record.
 * Every kernel operation is answered by the record.
 */
export class ValueNodeWrapper<
    K extends string = string,
    F extends FieldSpecMap = FieldSpecMap,
  >
  extends BaseNode
  implements HasDisplayField, Validatable
{
  readonly kind: K;
  readonly value: NodeValue<K, F>;
  private readonly definition: ValueDefinition<K, F>;

  constructor(definition: ValueDefinition<K, F>, value: NodeValue<K, F>) {
    super(value.span);
    this.kind = value.kind;
    this.value = value;
    this.definition = definition;
  }

  override get kindInfo(): KindInfo<K> {
    return this.definition.info;
  }

  children(): readonly Node[] {
    return EMPTY_CHILDREN;
  }

  accept<T>(visitor: Visitor<T>): T {
    return dispatchVisit(visitor, this.definition.visitMethod, this);
  }

  equals(other: Node): boolean {
    const theirs = this.definition.unwrap(other);
    return theirs !== null && this.definition.equals(this.value, theirs);
  }

  clone(): ValueNodeWrapper<K, F> {
    return this.definition.wrap(this.definition.clone(this.value));
  }

  displayField(): DisplayField | null {
    return displayFieldOf(this.definition.info, this.value.fields);
  }

  validate(): Diagnostic[] {
    return this.definition.validateWrapped(this);
  }
}

// ============================================================
// DEFINITION
// ============================================================

export interface ValueDefinition<K extends string, F extends FieldSpecMap> {
  readonly kind: K;
  readonly visitMethod: `visit${K}`;
  readonly info: KindInfo<K>;
  readonly fieldSpecs: F;

  /** @throws SchemaError ARBOR-S003 if a field does not match its spec */
  create(span: Span, fields: FieldValues<F>): NodeValue<K, F>;
  equals(a: NodeValue<K, F>, b: NodeValue<K, F>): boolean;
  /** Fresh record with the same content */
  clone(value: NodeValue<K, F>): NodeValue<K, F>;

  wrap(value: NodeValue<K, F>): ValueNodeWrapper<K, F>;
  /** The record inside a wrapper of this kind, or null */
  unwrap(node: Node): NodeValue<K, F> | null;
  /** Matches wrappers of this kind */
  is(node: Node): node is ValueNodeWrapper<K, F>;
  validateWrapped(node: ValueNodeWrapper<K, F>): Diagnostic[];
}

/**
 * Declare a value-type leaf kind.
 *
 * @throws SchemaError ARBOR-S004 if a field holds nodes
 *
 * @example
 * const Flag = defineValueNode('Flag', { value: field.bool() });
 * const node = Flag.wrap(Flag.create(span, { value: true }));
 */
export function defineValueNode<K extends string, F extends FieldSpecMap>(
  kind: K,
  fieldSpecs: F,
  options: DefinitionOptions<ValueNodeWrapper<K, F>> = {}
): ValueDefinition<K, F> {
  requireLeafKind(kind, 'value', fieldSpecs);
  const info = createKindInfo(kind, 'value', fieldSpecs, options, ValueNodeWrapper);
  const hook: ValidateHook<ValueNodeWrapper<K, F>> | undefined = options.validate;

  const record = (span: Span, fields: FieldValues<F>): NodeValue<K, F> =>
    Object.freeze({
      kind,
      span,
      fields: freezeFields(info.kind, info.fieldTable, fields),
    });

  const definition: ValueDefinition<K, F> = {
    kind,
    visitMethod: info.visitMethod,
    info,
    fieldSpecs,
    create(span, fields) {
      assertFieldValues<F>(kind, info.fieldTable, fields);
      return record(span, fields);
    },
    equals(a, b) {
      return (
        a === b ||
        (spanEquals(a.span, b.span) &&
          primitiveFieldsEqual(info.fieldTable, a.fields, b.fields))
      );
    },
    clone(value) {
      return record(value.span, value.fields);
    },
    wrap(value) {
      return new ValueNodeWrapper(definition, value);
    },
    unwrap(node) {
      return definition.is(node) ? node.value : null;
    },
    is(node): node is ValueNodeWrapper<K, F> {
      return node instanceof ValueNodeWrapper && hasKindId(node, info);
    },
    validateWrapped(node) {
      return hook?.(node) ?? [];
    },
  };

  return definition;
}
