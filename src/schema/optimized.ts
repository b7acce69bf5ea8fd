/**
 * Layout-Optimized Representation
 * Same semantics as the standard strategy with leaf fast paths.
 */

import type { Diagnostic } from '../diagnostics/types.js';
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
import { CompactNode, type ValidateHook } from './schema-node.js';
import { hasKindId, type NodeDefinition } from './standard.js';

export class OptimizedNode<
  K extends string = string,
  F extends FieldSpecMap = FieldSpecMap,
> extends CompactNode<K, F> {
  private readonly hook: ValidateHook<OptimizedNode<K, F>> | undefined;

  constructor(
    info: KindInfo<K>,
    hook: ValidateHook<OptimizedNode<K, F>> | undefined,
    span: Span,
    fields: FieldValues<F>
  ) {
    super(info, span, fields);
    this.hook = hook;
  }

  validate(): Diagnostic[] {
    return this.hook?.(this) ?? [];
  }

  protected rebuild(fields: FieldValues<F>): OptimizedNode<K, F> {
    return new OptimizedNode(
      this.kindInfo,
      this.hook,
      this.span,
      freezeFields(this.kindInfo.kind, this.kindInfo.fieldTable, fields)
    );
  }
}

export interface OptimizedDefinition<K extends string, F extends FieldSpecMap>
  extends NodeDefinition<K, F, OptimizedNode<K, F>> {
  create(span: Span, fields: FieldValues<F>): OptimizedNode<K, F>;
}

/**
 * Declare a kind with the layout-optimized representation.
 * Pays off for leaf kinds, whose children, depth, count and searches
 * never walk.
 */
export function defineOptimizedNode<K extends string, F extends FieldSpecMap>(
  kind: K,
  fieldSpecs: F,
  options: DefinitionOptions<OptimizedNode<K, F>> = {}
): OptimizedDefinition<K, F> {
  const info = createKindInfo(kind, 'optimized', fieldSpecs, options, OptimizedNode);
  const hook = options.validate;

  return {
    kind,
    visitMethod: info.visitMethod,
    info,
    fieldSpecs,
    create(span, fields) {
      assertFieldValues<F>(kind, info.fieldTable, fields);
      return new OptimizedNode(
        info,
        hook,
        span,
        freezeFields(info.kind, info.fieldTable, fields)
      );
    },
    is(node): node is OptimizedNode<K, F> {
      return hasKindId(node, info);
    },
  };
}
