/**
 * Kind Metadata
 * What every schema-defined kind knows about itself, plus abstract kinds.
 */

import type { Diagnostic } from '../diagnostics/types.js';
import { createError } from '../error-classes.js';
import { BaseNode } from '../node/base-node.js';
import {
  defaultKindRegistry,
  type KindRegistry,
  type NodeClass,
} from '../node/registry.js';
import type { KindMatcher, Node } from '../node/types.js';
import {
  buildFieldTable,
  isLeafTable,
  type FieldEntry,
  type FieldSpecMap,
} from './fields.js';

// ============================================================
// STRATEGIES AND OPTIONS
// ============================================================

/** How instances of a kind are stored and allocated */
export type RepresentationStrategy =
  | 'standard'
  | 'optimized'
  | 'pooled'
  | 'value';

/** Field names a renderer looks for when a kind names no display field */
export const DISPLAY_FIELD_CANDIDATES: readonly string[] = [
  'value',
  'name',
  'operator',
];

export interface DefinitionOptions<N extends Node> {
  /** Abstract kinds this kind belongs to */
  readonly extends?: readonly AbstractKind[] | undefined;
  /** Primitive field surfaced by HasDisplayField */
  readonly display?: string | undefined;
  /** Per-node checks run by the validators */
  readonly validate?: ((node: N) => Diagnostic[]) | undefined;
  readonly registry?: KindRegistry | undefined;
}

// ============================================================
// KIND INFO
// ============================================================

export interface KindInfo<K extends string = string> {
  /** Identity of the definition; kinds are equal only when ids match */
  readonly id: symbol;
  readonly kind: K;
  readonly strategy: RepresentationStrategy;
  readonly fieldTable: readonly FieldEntry[];
  /** Every field is primitive, so instances never have children */
  readonly leafKind: boolean;
  readonly visitMethod: `visit${K}`;
  readonly abstractKinds: readonly AbstractKind[];
  readonly displayFieldName: string | null;
}

const KIND_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

export function visitMethodName<K extends string>(kind: K): `visit${K}` {
  return `visit${kind}`;
}

function pickDisplayField(
  kind: string,
  table: readonly FieldEntry[],
  requested: string | undefined
): string | null {
  const primitives = table.filter((e) => e.spec.category === 'primitive');

  if (requested !== undefined) {
    if (!primitives.some((e) => e.name === requested)) {
      throw createError('ARBOR-S003', {
        field: requested,
        kind,
        expected: 'a primitive field to display',
        actual: 'no such primitive field',
      });
    }
    return requested;
  }

  const candidate = DISPLAY_FIELD_CANDIDATES.find((name) =>
    primitives.some((e) => e.name === name)
  );
  return candidate ?? null;
}

/**
 * Validate a kind declaration and register it.
 *
 * @throws SchemaError ARBOR-S002 for a malformed kind name
 * @throws SchemaError ARBOR-S001 for a reserved field name
 * @throws NodeContractError ARBOR-K002 if the registry already has the kind
 */
export function createKindInfo<K extends string>(
  kind: K,
  strategy: RepresentationStrategy,
  fields: FieldSpecMap,
  options: DefinitionOptions<never>,
  nodeClass: NodeClass
): KindInfo<K> {
  if (!KIND_NAME_PATTERN.test(kind)) {
    throw createError('ARBOR-S002', { kind });
  }

  const fieldTable = Object.freeze(buildFieldTable(kind, fields));
  const abstractKinds = Object.freeze([...(options.extends ?? [])]);

  const info: KindInfo<K> = Object.freeze({
    id: Symbol(kind),
    kind,
    strategy,
    fieldTable,
    leafKind: isLeafTable(fieldTable),
    visitMethod: visitMethodName(kind),
    abstractKinds,
    displayFieldName: pickDisplayField(kind, fieldTable, options.display),
  });

  (options.registry ?? defaultKindRegistry).register(kind, nodeClass);

  return info;
}

// ============================================================
// ABSTRACT KINDS
// ============================================================

/**
 * A named family of kinds, such as Expr or Stmt.
 * Has no instances; concrete kinds join it through the `extends` option.
 */
export class AbstractKind implements KindMatcher<Node> {
  readonly kind: string;

  constructor(kind: string) {
    if (!KIND_NAME_PATTERN.test(kind)) {
      throw createError('ARBOR-S002', { kind });
    }
    this.kind = kind;
  }

  is(node: Node): node is Node {
    if (!(node instanceof BaseNode)) {
      return false;
    }
    return node.kindInfo?.abstractKinds.includes(this) ?? false;
  }
}

export function defineAbstractKind(kind: string): AbstractKind {
  return new AbstractKind(kind);
}

/**
 * Reject kinds that can hold nodes.
 *
 * @throws SchemaError ARBOR-S004 naming the first node-typed field
 */
export function requireLeafKind(
  kind: string,
  strategy: RepresentationStrategy,
  fields: FieldSpecMap
): void {
  for (const [name, spec] of Object.entries(fields)) {
    if (spec.category !== 'primitive') {
      throw createError('ARBOR-S004', {
        kind,
        strategy,
        reason: `field ${name} holds nodes`,
      });
    }
  }
}
