/**
 * Schema Nodes
 * Node classes driven by a kind's field table instead of per-kind code.
 */

import type { Diagnostic } from '../diagnostics/types.js';
import { BaseNode, EMPTY_CHILDREN } from '../node/base-node.js';
import type {
  DisplayField,
  HasDisplayField,
  Validatable,
} from '../node/capabilities.js';
import type { KindMatcher, Node } from '../node/types.js';
import { spanEquals, type Span } from '../source-location.js';
import { dispatchVisit, type Visitor } from '../visitor/visitor.js';
import {
  assertFieldValues,
  collectChildren,
  mapFieldValues,
  primitiveFieldsEqual,
  readField,
  type FieldSpecMap,
  type FieldValues,
} from './fields.js';
import type { KindInfo } from './kind-info.js';

/** Per-kind validation hook */
export type ValidateHook<N> = (node: N) => Diagnostic[];

export function childrenEqual(
  a: readonly Node[],
  b: readonly Node[]
): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((child, i) => {
    const other = b[i];
    return other !== undefined && child.equals(other);
  });
}

/** The kind's display field read from a field record, if set */
export function displayFieldOf(
  info: KindInfo,
  fields: object
): DisplayField | null {
  const name = info.displayFieldName;
  if (name === null) {
    return null;
  }

  const value = readField(fields, name);
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return { name, value };
  }
  return null;
}

// ============================================================
// SCHEMA NODE
// ============================================================

/**
 * Node whose fields are described by a KindInfo.
 * Kernel operations walk the field table, so one class serves every kind
 * declared with the same strategy.
 */
export abstract class SchemaNode<K extends string, F extends FieldSpecMap>
  extends BaseNode
  implements HasDisplayField, Validatable
{
  readonly kind: K;
  readonly fields: FieldValues<F>;
  private readonly info: KindInfo<K>;

  protected constructor(info: KindInfo<K>, span: Span, fields: FieldValues<F>) {
    super(span);
    this.kind = info.kind;
    this.info = info;
    this.fields = fields;
  }

  override get kindInfo(): KindInfo<K> {
    return this.info;
  }

  /** Construct a sibling instance of the same kind with new fields */
  protected abstract rebuild(fields: FieldValues<F>): Node;

  abstract validate(): Diagnostic[];

  children(): readonly Node[] {
    return collectChildren(this.info.fieldTable, this.fields);
  }

  accept<T>(visitor: Visitor<T>): T {
    return dispatchVisit(visitor, this.info.visitMethod, this);
  }

  /** Same definition, equal spans, equal primitives, equal children */
  equals(other: Node): boolean {
    if (!(other instanceof SchemaNode) || other.kindInfo.id !== this.info.id) {
      return false;
    }

    return (
      spanEquals(this.span, other.span) &&
      primitiveFieldsEqual(this.info.fieldTable, this.fields, other.fields) &&
      childrenEqual(this.children(), other.children())
    );
  }

  /** Deep copy: every descendant is cloned */
  clone(): Node {
    const copy = mapFieldValues(this.info.fieldTable, this.fields, (child) =>
      child.clone()
    );
    assertFieldValues<F>(this.kind, this.info.fieldTable, copy);
    return this.rebuild(copy);
  }

  /**
   * Copy with each child replaced by fn(child).
   * Returns this node when fn leaves every child as it was.
   */
  mapChildren(fn: (child: Node) => Node): Node {
    const replacements = new Map<Node, Node>();
    for (const child of this.children()) {
      const next = fn(child);
      if (next !== child) {
        replacements.set(child, next);
      }
    }

    if (replacements.size === 0) {
      return this;
    }

    const copy = mapFieldValues(
      this.info.fieldTable,
      this.fields,
      (child) => replacements.get(child) ?? child
    );
    assertFieldValues<F>(this.kind, this.info.fieldTable, copy);
    return this.rebuild(copy);
  }

  displayField(): DisplayField | null {
    return displayFieldOf(this.info, this.fields);
  }
}

// ============================================================
// COMPACT NODE
// ============================================================

/**
 * Schema node with fast paths for leaf kinds.
 * Leaves share one frozen children array and answer the derived
 * operations without walking; equality short-circuits on identity.
 */
export abstract class CompactNode<
  K extends string,
  F extends FieldSpecMap,
> extends SchemaNode<K, F> {
  override children(): readonly Node[] {
    return this.kindInfo.leafKind ? EMPTY_CHILDREN : super.children();
  }

  override isLeaf(): boolean {
    return this.kindInfo.leafKind || super.isLeaf();
  }

  override depth(): number {
    return this.kindInfo.leafKind ? 0 : super.depth();
  }

  override nodeCount(): number {
    return this.kindInfo.leafKind ? 1 : super.nodeCount();
  }

  override findAll<N extends Node>(matcher: KindMatcher<N>): N[] {
    if (!this.kindInfo.leafKind) {
      return super.findAll(matcher);
    }
    return matcher.is(this) ? [this] : [];
  }

  override findFirst<N extends Node>(matcher: KindMatcher<N>): N | undefined {
    if (!this.kindInfo.leafKind) {
      return super.findFirst(matcher);
    }
    return matcher.is(this) ? this : undefined;
  }

  override contains(matcher: KindMatcher<Node>): boolean {
    if (!this.kindInfo.leafKind) {
      return super.contains(matcher);
    }
    return matcher.is(this);
  }

  override equals(other: Node): boolean {
    return other === this || super.equals(other);
  }
}
