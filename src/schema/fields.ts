/**
 * Field Specs
 * Declarative field descriptions and the runtime checks that back them.
 */

import { createError } from '../error-classes.js';
import { isNode } from '../node/base-node.js';
import type { Node } from '../node/types.js';

// ============================================================
// FIELD SPECS
// ============================================================

export type PrimitiveType = 'int' | 'float' | 'string' | 'bool';

export interface PrimitiveFieldSpec<
  T extends PrimitiveType = PrimitiveType,
  O extends boolean = boolean,
> {
  readonly category: 'primitive';
  readonly type: T;
  readonly optional: O;
}

export interface NodeFieldSpec<O extends boolean = boolean> {
  readonly category: 'node';
  readonly optional: O;
}

export interface NodeListFieldSpec {
  readonly category: 'node-list';
  readonly optional: false;
}

export type FieldSpec = PrimitiveFieldSpec | NodeFieldSpec | NodeListFieldSpec;

/** Field name to spec, in declaration order */
export type FieldSpecMap = Readonly<Record<string, FieldSpec>>;

type PrimitiveValue<T extends PrimitiveType> = T extends 'string'
  ? string
  : T extends 'bool'
    ? boolean
    : number;

/** Value type stored for a spec */
export type FieldValue<S extends FieldSpec> =
  S extends PrimitiveFieldSpec<infer T extends PrimitiveType, infer O>
    ? O extends true
      ? PrimitiveValue<T> | null
      : PrimitiveValue<T>
    : S extends NodeFieldSpec<infer O>
      ? O extends true
        ? Node | null
        : Node
      : S extends NodeListFieldSpec
        ? readonly Node[]
        : never;

/** Field record of a kind, keyed like its spec map */
export type FieldValues<F extends FieldSpecMap> = {
  readonly [P in keyof F]: FieldValue<F[P]>;
};

function primitive<T extends PrimitiveType>(
  type: T
): PrimitiveFieldSpec<T, false> {
  return { category: 'primitive', type, optional: false };
}

function optionalPrimitive<T extends PrimitiveType>(
  type: T
): PrimitiveFieldSpec<T, true> {
  return { category: 'primitive', type, optional: true };
}

/**
 * Field spec constructors.
 *
 * @example
 * const Add = defineNode('Add', { left: field.node(), right: field.node() });
 */
export const field = {
  int: () => primitive('int'),
  float: () => primitive('float'),
  string: () => primitive('string'),
  bool: () => primitive('bool'),
  optionalInt: () => optionalPrimitive('int'),
  optionalFloat: () => optionalPrimitive('float'),
  optionalString: () => optionalPrimitive('string'),
  optionalBool: () => optionalPrimitive('bool'),
  node: (): NodeFieldSpec<false> => ({ category: 'node', optional: false }),
  optionalNode: (): NodeFieldSpec<true> => ({
    category: 'node',
    optional: true,
  }),
  nodeList: (): NodeListFieldSpec => ({ category: 'node-list', optional: false }),
};

// ============================================================
// FIELD TABLE
// ============================================================

export interface FieldEntry {
  readonly name: string;
  readonly spec: FieldSpec;
}

/** Names that collide with node members */
export const RESERVED_FIELD_NAMES: readonly string[] = [
  'span',
  'children',
  'accept',
  'clone',
  'kind',
  'fields',
  'parent',
];

/**
 * Flatten a spec map into an ordered table.
 *
 * @throws SchemaError ARBOR-S001 for a reserved field name
 */
export function buildFieldTable(kind: string, fields: FieldSpecMap): FieldEntry[] {
  return Object.entries(fields).map(([name, spec]) => {
    if (RESERVED_FIELD_NAMES.includes(name)) {
      throw createError('ARBOR-S001', { field: name, kind });
    }
    return { name, spec };
  });
}

/** True when no field can hold a node, so every instance is a leaf */
export function isLeafTable(table: readonly FieldEntry[]): boolean {
  return table.every((entry) => entry.spec.category === 'primitive');
}

// ============================================================
// FIELD ACCESS
// ============================================================

/** Read a field by name from a typed field record */
export function readField(fields: object, name: string): unknown {
  return Reflect.get(fields, name);
}

/** Node-typed fields in table order; absent optional nodes are skipped */
export function collectChildren(
  table: readonly FieldEntry[],
  fields: object
): Node[] {
  const children: Node[] = [];

  for (const entry of table) {
    if (entry.spec.category === 'primitive') {
      continue;
    }

    const value = readField(fields, entry.name);
    if (entry.spec.category === 'node') {
      if (isNode(value)) {
        children.push(value);
      }
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) {
          children.push(item);
        }
      }
    }
  }

  return children;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isNode(value)) return `node ${value.kind}`;
  return typeof value;
}

function describeSpec(spec: FieldSpec): string {
  const base =
    spec.category === 'primitive'
      ? spec.type
      : spec.category === 'node'
        ? 'node'
        : 'node list';
  return spec.optional ? `${base} or null` : base;
}

function matchesPrimitive(type: PrimitiveType, value: unknown): boolean {
  switch (type) {
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number';
    case 'string':
      return typeof value === 'string';
    case 'bool':
      return typeof value === 'boolean';
  }
}

function matchesSpec(spec: FieldSpec, value: unknown): boolean {
  if (value === null || value === undefined) {
    return spec.optional && value === null;
  }

  switch (spec.category) {
    case 'primitive':
      return matchesPrimitive(spec.type, value);
    case 'node':
      return isNode(value);
    case 'node-list':
      return Array.isArray(value) && value.every(isNode);
  }
}

/**
 * Check a record against a kind's field table.
 * Construction from untyped callers and rebuilt records both pass here.
 *
 * @throws SchemaError ARBOR-S003 on the first mismatching field
 */
export function assertFieldValues<F extends FieldSpecMap>(
  kind: string,
  table: readonly FieldEntry[],
  fields: object
): asserts fields is FieldValues<F> {
  for (const entry of table) {
    const value = readField(fields, entry.name);
    if (!matchesSpec(entry.spec, value)) {
      throw createError('ARBOR-S003', {
        field: entry.name,
        kind,
        expected: describeSpec(entry.spec),
        actual: describeValue(value),
      });
    }
  }
}

/**
 * Copy a field record, passing every node through `mapNode`.
 * Node lists become new frozen arrays; primitives are copied as-is.
 */
export function mapFieldValues(
  table: readonly FieldEntry[],
  fields: object,
  mapNode: (node: Node) => Node
): Record<string, unknown> {
  const copy: Record<string, unknown> = {};

  for (const entry of table) {
    const value = readField(fields, entry.name);
    if (entry.spec.category === 'node' && isNode(value)) {
      copy[entry.name] = mapNode(value);
    } else if (entry.spec.category === 'node-list' && Array.isArray(value)) {
      copy[entry.name] = Object.freeze(value.filter(isNode).map(mapNode));
    } else {
      copy[entry.name] = value;
    }
  }

  return copy;
}

/** Compare the primitive fields of two records sharing a table */
export function primitiveFieldsEqual(
  table: readonly FieldEntry[],
  a: object,
  b: object
): boolean {
  return table.every(
    (entry) =>
      entry.spec.category !== 'primitive' ||
      Object.is(readField(a, entry.name), readField(b, entry.name))
  );
}

/**
 * Freeze a validated record so fields stay fixed for the node's lifetime.
 * Node lists are copied before freezing; the caller's arrays are untouched.
 */
export function freezeFields<F extends FieldSpecMap>(
  kind: string,
  table: readonly FieldEntry[],
  fields: FieldValues<F>
): FieldValues<F> {
  const copy = mapFieldValues(table, fields, (node) => node);
  assertFieldValues<F>(kind, table, copy);
  Object.freeze(copy);
  return copy;
}
