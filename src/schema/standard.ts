/**
 * Standard Representation
 * One heap object per node with its fields in a frozen record.
 */

import type { Diagnostic } from '../diagnostics/types.js';
import { BaseNode } from '../node/base-node.js';
import type { Node } from '../node/types.js';
import type { Span } from '../source-location.js';
import {
  assertFieldValues,
  freezeFields,
  type FieldSpecMap,
  type FieldValues,
} from './fields.js';
import {
  createKindInfo,
  type DefinitionOptions,
  type KindInfo,
} from './kind-info.js';
import { SchemaNode, type ValidateHook } from './schema-node.js';

export class StandardNode<
  K extends string = string,
  F extends FieldSpecMap = FieldSpecMap,
> extends SchemaNode<K, F> {
  private readonly hook: ValidateHook<StandardNode<K, F>> | undefined;

  constructor(
    info: KindInfo<K>,
    hook: ValidateHook<StandardNode<K, F>> | undefined,
    span: Span,
    fields: FieldValues<F>
  ) {
    super(info, span, fields);
    this.hook = hook;
  }

  validate(): Diagnostic[] {
    return this.hook?.(this) ?? [];
  }

  protected rebuild(fields: FieldValues<F>): StandardNode<K, F> {
    return new StandardNode(
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

/** Runtime handle for a kind: constructor, type guard and metadata */
export interface NodeDefinition<
  K extends string,
  F extends FieldSpecMap,
  N extends Node,
> {
  readonly kind: K;
  readonly visitMethod: `visit${K}`;
  readonly info: KindInfo<K>;
  readonly fieldSpecs: F;
  is(node: Node): node is N;
}

export interface StandardDefinition<K extends string, F extends FieldSpecMap>
  extends NodeDefinition<K, F, StandardNode<K, F>> {
  /** @throws SchemaError ARBOR-S003 if a field does not match its spec */
  create(span: Span, fields: FieldValues<F>): StandardNode<K, F>;
}

/** Type guard shared by every definition: instances carry the kind's id */
export function hasKindId(node: Node, info: KindInfo): boolean {
  return node instanceof BaseNode && node.kindInfo?.id === info.id;
}

/**
 * Declare a kind with the standard representation.
 *
 * @example
 * const Add = defineNode('Add', { left: field.node(), right: field.node() });
 * const sum = Add.create(span, { left: one, right: two });
 */
export function defineNode<K extends string, F extends FieldSpecMap>(
  kind: K,
  fieldSpecs: F,
  options: DefinitionOptions<StandardNode<K, F>> = {}
): StandardDefinition<K, F> {
  const info = createKindInfo(kind, 'standard', fieldSpecs, options, StandardNode);
  const hook = options.validate;

  return {
    kind,
    visitMethod: info.visitMethod,
    info,
    fieldSpecs,
    create(span, fields) {
      assertFieldValues<F>(kind, info.fieldTable, fields);
      return new StandardNode(
        info,
        hook,
        span,
        freezeFields(info.kind, info.fieldTable, fields)
      );
    },
    is(node): node is StandardNode<K, F> {
      return hasKindId(node, info);
    },
  };
}
