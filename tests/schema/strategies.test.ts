/**
 * Representation Strategy Tests
 * Optimized, pooled and value-type kinds against the shared Node contract
 */

import { describe, expect, it } from 'vitest';
import {
  BaseVisitor,
  defineOptimizedNode,
  definePooledNode,
  defineValueNode,
  EMPTY_CHILDREN,
  field,
  KindRegistry,
  NodePool,
  SchemaError,
  ValueNodeWrapper,
  type NodeOf,
} from '../../src/index.js';
import { Call, Expr, int, IntLit, sampleTree, span } from '../helpers/sample-ast.js';

const registry = new KindRegistry();

const OLit = defineOptimizedNode(
  'OLit',
  { value: field.int() },
  { registry, extends: [Expr] }
);
const OPair = defineOptimizedNode(
  'OPair',
  { left: field.node(), right: field.node() },
  { registry }
);

const PInt = definePooledNode('PInt', { value: field.int() }, { registry });
const PCount = definePooledNode('PCount', { value: field.int() }, { registry });
const PIdent = definePooledNode(
  'PIdent',
  { name: field.string() },
  { registry, category: 'identifier' }
);
const PPoint = definePooledNode(
  'PPoint',
  { x: field.int(), y: field.int() },
  { registry }
);
const PFloat = definePooledNode('PFloat', { value: field.float() }, { registry });
const POn = definePooledNode('POn', { value: field.bool() }, { registry });
const PVisible = definePooledNode('PVisible', { value: field.bool() }, { registry });

const Flag = defineValueNode('Flag', { value: field.bool() }, { registry });

describe('Layout-optimized nodes', () => {
  it('share one empty children array across leaves', () => {
    const a = OLit.create(span(0, 1), { value: 1 });
    const b = OLit.create(span(2, 3), { value: 2 });

    expect(a.children()).toBe(EMPTY_CHILDREN);
    expect(b.children()).toBe(a.children());
  });

  it('answer leaf operations without walking', () => {
    const leaf = OLit.create(span(0, 1), { value: 1 });

    expect(leaf.depth()).toBe(0);
    expect(leaf.nodeCount()).toBe(1);
    expect(leaf.isLeaf()).toBe(true);
    expect(leaf.findAll(OLit)).toEqual([leaf]);
    expect(leaf.findAll(IntLit)).toEqual([]);
    expect(leaf.findFirst(Expr)).toBe(leaf);
    expect(leaf.contains(OPair)).toBe(false);
  });

  it('behave like standard nodes when they have children', () => {
    const pair = OPair.create(span(0, 5), {
      left: OLit.create(span(0, 1), { value: 1 }),
      right: int(2, 3),
    });
    const copy = pair.clone();

    expect(pair.depth()).toBe(1);
    expect(pair.nodeCount()).toBe(3);
    expect(pair.equals(pair)).toBe(true);
    expect(copy.equals(pair)).toBe(true);
    expect(copy).not.toBe(pair);
    expect(copy.children()[0]).not.toBe(pair.children()[0]);
  });

  it('compare fields on equality', () => {
    const a = OLit.create(span(0, 1), { value: 1 });
    const b = OLit.create(span(0, 1), { value: 2 });

    expect(a.equals(b)).toBe(false);
    expect(a.equals(OLit.create(span(0, 1), { value: 1 }))).toBe(true);
  });

  it('mix with standard nodes in one tree', () => {
    const call = Call.create(span(0, 9), {
      callee: 'f',
      receiver: null,
      args: [OLit.create(span(2, 3), { value: 1 }), sampleTree()],
    });

    expect(call.nodeCount()).toBe(7);
    expect(call.depth()).toBe(3);
  });
});

describe('Pooled nodes', () => {
  it('return the same instance for a pooled value', () => {
    const pool = new NodePool();
    const a = PInt.create(span(0, 1), { value: 5 }, pool);
    const b = PInt.create(span(0, 1), { value: 5 }, pool);

    expect(b).toBe(a);
    expect(pool.stats().hits).toBe(1);
    expect(pool.stats().misses).toBe(1);
  });

  it('construct fresh nodes outside the pooled range', () => {
    const pool = new NodePool();
    const a = PInt.create(span(0, 3), { value: 200 }, pool);
    const b = PInt.create(span(0, 3), { value: 200 }, pool);

    expect(b).not.toBe(a);
    expect(b.equals(a)).toBe(true);
    expect(pool.stats().sizes.int).toBe(0);
  });

  it('clone to themselves and ignore parent links', () => {
    const pool = new NodePool();
    const leaf = PInt.create(span(0, 1), { value: 1 }, pool);
    leaf.setParent(sampleTree());

    expect(leaf.clone()).toBe(leaf);
    expect(leaf.parent).toBeNull();
  });

  it('keep kinds sharing a category apart', () => {
    const pool = new NodePool();
    const count = PCount.create(span(0, 1), { value: 5 }, pool);
    const lit = PInt.create(span(0, 1), { value: 5 }, pool);

    expect(count).not.toBe(lit);
    expect(PCount.is(count)).toBe(true);
    expect(PInt.is(count)).toBe(false);
    expect(pool.stats().sizes.int).toBe(2);
  });

  it('pool identifiers when asked to', () => {
    const pool = new NodePool();
    const x = PIdent.create(span(0, 1), { name: 'x' }, pool);

    expect(PIdent.poolCategory).toBe('identifier');
    expect(PIdent.create(span(0, 1), { name: 'x' }, pool)).toBe(x);
    expect(pool.stats().sizes).toEqual({
      int: 0,
      bool: 0,
      string: 0,
      identifier: 1,
    });
  });

  it('never cache multi-field or float kinds', () => {
    const pool = new NodePool();
    const a = PPoint.create(span(0, 1), { x: 1, y: 2 }, pool);
    const b = PPoint.create(span(0, 1), { x: 1, y: 2 }, pool);
    const f = PFloat.create(span(0, 1), { value: 0.5 }, pool);

    expect(PPoint.poolCategory).toBeNull();
    expect(PFloat.poolCategory).toBeNull();
    expect(b).not.toBe(a);
    expect(f.fields.value).toBe(0.5);
    expect(pool.stats()).toEqual({
      hits: 0,
      misses: 0,
      hitRate: 0,
      sizes: { int: 0, bool: 0, string: 0, identifier: 0 },
    });
  });

  it('keep negative zero apart from zero', () => {
    const pool = new NodePool();
    const zero = PInt.create(span(0, 1), { value: 0 }, pool);
    const negative = PInt.create(span(0, 1), { value: -0 }, pool);

    expect(negative).not.toBe(zero);
    expect(Object.is(negative.fields.value, -0)).toBe(true);
    expect(negative.equals(zero)).toBe(false);
    expect(PInt.create(span(0, 1), { value: 0 }, pool)).toBe(zero);
    expect(pool.stats().sizes.int).toBe(1);
  });

  it('cap booleans per kind', () => {
    const pool = new NodePool();
    POn.create(span(0, 1), { value: true }, pool);
    POn.create(span(0, 1), { value: false }, pool);
    const shown = PVisible.create(span(0, 1), { value: true }, pool);
    const hidden = PVisible.create(span(0, 1), { value: false }, pool);

    expect(PVisible.poolCategory).toBe('bool');
    expect(PVisible.create(span(0, 1), { value: true }, pool)).toBe(shown);
    expect(PVisible.create(span(0, 1), { value: false }, pool)).toBe(hidden);
    expect(pool.stats().sizes.bool).toBe(4);
  });

  it('reject a category that does not fit the field', () => {
    expect(() =>
      definePooledNode(
        'PBad',
        { value: field.int() },
        { registry, category: 'bool' }
      )
    ).toThrow(
      'Node kind PBad cannot use the pooled representation: pool category bool does not fit int field value'
    );
    expect(registry.has('PBad')).toBe(false);
  });

  it('reject kinds holding nodes', () => {
    expect(() =>
      definePooledNode('PNode', { child: field.node() }, { registry })
    ).toThrow(SchemaError);
  });
});

describe('Value-type nodes', () => {
  it('create frozen value records', () => {
    const value = Flag.create(span(0, 4), { value: true });

    expect(value.kind).toBe('Flag');
    expect(value.fields.value).toBe(true);
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.fields)).toBe(true);
  });

  it('compare and clone at the value level', () => {
    const value = Flag.create(span(0, 4), { value: true });
    const copy = Flag.clone(value);

    expect(copy).not.toBe(value);
    expect(Flag.equals(copy, value)).toBe(true);
    expect(Flag.equals(value, Flag.create(span(0, 5), { value: false }))).toBe(
      false
    );
  });

  it('wrap into nodes that forward every kernel operation', () => {
    const value = Flag.create(span(0, 4), { value: true });
    const node = Flag.wrap(value);
    const copy = node.clone();

    expect(node).toBeInstanceOf(ValueNodeWrapper);
    expect(node.kind).toBe('Flag');
    expect(node.span).toBe(value.span);
    expect(node.children()).toEqual([]);
    expect(node.isLeaf()).toBe(true);
    expect(copy).not.toBe(node);
    expect(copy.equals(node)).toBe(true);
    expect(node.equals(int(1))).toBe(false);
    expect(node.displayField()).toEqual({ name: 'value', value: true });
  });

  it('unwrap only wrappers of the same kind', () => {
    const value = Flag.create(span(0, 4), { value: false });

    expect(Flag.unwrap(Flag.wrap(value))).toBe(value);
    expect(Flag.unwrap(int(1))).toBeNull();
  });

  it('sit in containers beside reference nodes', () => {
    const flag = Flag.wrap(Flag.create(span(2, 6), { value: true }));
    const call = Call.create(span(0, 9), {
      callee: 'f',
      receiver: null,
      args: [flag, int(1)],
    });

    expect(call.children()[0]).toBe(flag);
    expect(call.findAll(Flag)).toEqual([flag]);
  });

  it('dispatch to visit methods', () => {
    class FlagReader extends BaseVisitor<string> {
      visitFlag(node: NodeOf<typeof Flag>): string {
        return node.value.fields.value ? 'on' : 'off';
      }
    }
    const node = Flag.wrap(Flag.create(span(0, 1), { value: false }));

    expect(new FlagReader().visit(node)).toBe('off');
  });

  it('reject kinds holding nodes', () => {
    expect(() =>
      defineValueNode('VList', { items: field.nodeList() }, { registry })
    ).toThrow('Node kind VList cannot use the value representation: field items holds nodes');
  });
});
