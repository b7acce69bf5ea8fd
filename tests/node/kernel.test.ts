/**
 * Node Kernel Tests
 * Children order, derived operations, equality, cloning and parent links
 */

import { describe, expect, it } from 'vitest';
import {
  attachParents,
  defineNode,
  detachParents,
  EMPTY_SPAN,
  field,
  isNode,
  isValidatable,
  KindRegistry,
  levelOrder,
  NodeContractError,
  probeDisplayField,
  SchemaError,
} from '../../src/index.js';
import {
  Add,
  Call,
  Expr,
  ExprStmt,
  GraphNode,
  int,
  IntLit,
  Mul,
  sampleTree,
  span,
  Stmt,
} from '../helpers/sample-ast.js';

describe('Node kernel', () => {
  describe('children', () => {
    it('lists node fields in declared order', () => {
      const tree = sampleTree();
      const [add, three] = tree.children();

      expect(add?.kind).toBe('Add');
      expect(three?.kind).toBe('IntLit');
    });

    it('skips an absent optional child and expands node lists', () => {
      const a = int(1);
      const b = int(2);
      const call = Call.create(span(0, 9), {
        callee: 'print',
        receiver: null,
        args: [a, b],
      });

      expect(call.children()).toEqual([a, b]);
      expect(call.children()[0]).toBe(a);
    });

    it('puts a present optional child before later fields', () => {
      const receiver = int(7);
      const arg = int(8);
      const call = Call.create(span(0, 9), {
        callee: 'print',
        receiver,
        args: [arg],
      });

      const children = call.children();
      expect(children).toHaveLength(2);
      expect(children[0]).toBe(receiver);
      expect(children[1]).toBe(arg);
    });

    it('never lists primitive fields', () => {
      expect(int(4).children()).toEqual([]);
    });
  });

  describe('derived operations', () => {
    it('computes depth and node count', () => {
      const tree = sampleTree();

      expect(tree.depth()).toBe(2);
      expect(tree.nodeCount()).toBe(5);
      expect(int(1).depth()).toBe(0);
      expect(int(1).nodeCount()).toBe(1);
    });

    it('reports leaves', () => {
      expect(int(1).isLeaf()).toBe(true);
      expect(sampleTree().isLeaf()).toBe(false);
    });

    it('searches by concrete kind in preorder', () => {
      const tree = sampleTree();
      const values = tree.findAll(IntLit).map((n) => n.fields.value);

      expect(values).toEqual([1, 2, 3]);
      expect(tree.findFirst(IntLit)?.fields.value).toBe(1);
      expect(tree.contains(Add)).toBe(true);
      expect(tree.contains(Call)).toBe(false);
    });

    it('searches by abstract kind', () => {
      const tree = sampleTree();

      expect(tree.findAll(Expr)).toHaveLength(5);
      expect(tree.contains(Stmt)).toBe(false);
      expect(Expr.is(tree)).toBe(true);
    });

    it('formats a debug string from kind and span', () => {
      expect(sampleTree().toString()).toBe('Mul[0-12]');
    });
  });

  describe('equals', () => {
    it('holds for structurally identical trees', () => {
      expect(sampleTree().equals(sampleTree())).toBe(true);
    });

    it('compares primitive fields', () => {
      const a = IntLit.create(span(1, 2), { value: 1 });
      const b = IntLit.create(span(1, 2), { value: 9 });

      expect(a.equals(b)).toBe(false);
    });

    it('compares spans', () => {
      const a = IntLit.create(span(1, 2), { value: 1 });
      const b = IntLit.create(span(3, 4), { value: 1 });

      expect(a.equals(b)).toBe(false);
    });

    it('is false across kinds with the same fields', () => {
      const left = int(1);
      const right = int(2);
      const add = Add.create(span(0, 3), { left, right });
      const mul = Mul.create(span(0, 3), { left, right });

      expect(add.equals(mul)).toBe(false);
      expect(mul.equals(add)).toBe(false);
    });

    it('is false when a child differs', () => {
      const a = Add.create(span(0, 3), { left: int(1), right: int(2) });
      const b = Add.create(span(0, 3), { left: int(1), right: int(5) });

      expect(a.equals(b)).toBe(false);
    });
  });

  describe('clone', () => {
    it('produces an equal tree of fresh objects', () => {
      const tree = sampleTree();
      const copy = tree.clone();

      expect(copy.equals(tree)).toBe(true);
      expect(copy).not.toBe(tree);
      expect(copy.children()[0]).not.toBe(tree.children()[0]);
      expect(copy.children()[0]?.children()[0]).not.toBe(
        tree.children()[0]?.children()[0]
      );
    });

    it('keeps node lists frozen in the copy', () => {
      const call = Call.create(span(0, 4), {
        callee: 'f',
        receiver: null,
        args: [int(1)],
      });
      const copy = call.clone();

      expect(Call.is(copy)).toBe(true);
      if (Call.is(copy)) {
        expect(Object.isFrozen(copy.fields.args)).toBe(true);
        expect(copy.fields.args[0]).not.toBe(call.fields.args[0]);
      }
    });
  });

  describe('fields', () => {
    it('freezes the field record', () => {
      const node = int(3);

      expect(IntLit.is(node)).toBe(true);
      if (IntLit.is(node)) {
        expect(Object.isFrozen(node.fields)).toBe(true);
      }
    });

    it('rejects values that do not match the field spec', () => {
      expect(() => IntLit.create(span(0, 1), { value: 1.5 })).toThrow(
        'Field value of node kind IntLit expects int, got number'
      );
    });

    it('rejects reserved field names', () => {
      const registry = new KindRegistry();

      expect(() =>
        defineNode('Bad', { span: field.int() }, { registry })
      ).toThrow(SchemaError);
      expect(() =>
        defineNode('Bad', { parent: field.node() }, { registry })
      ).toThrow('Field name parent is reserved in node kind Bad');
    });

    it('rejects malformed kind names', () => {
      const registry = new KindRegistry();

      expect(() => defineNode('', {}, { registry })).toThrow(
        'Invalid node kind name ""'
      );
      expect(() => defineNode('1st', {}, { registry })).toThrow(
        'Invalid node kind name "1st"'
      );
    });
  });

  describe('parent links', () => {
    it('links a tree assembled with attachParents', () => {
      const tree = sampleTree();
      attachParents(tree);
      const [add, three] = tree.children();
      const one = add?.children()[0];
      const two = add?.children()[1];

      expect(tree.parent).toBeNull();
      expect(three?.parent).toBe(tree);
      expect(one?.ancestors()).toEqual([add, tree]);
      expect(one?.siblings()).toEqual([two]);
      expect(tree.siblings()).toEqual([]);
    });

    it('answers ancestor and descendant queries', () => {
      const root = new GraphNode('root', span(0, 9));
      const child = new GraphNode('child', span(1, 2));
      root.link(child);
      attachParents(root);

      expect(root.isAncestorOf(child)).toBe(true);
      expect(child.isDescendantOf(root)).toBe(true);
      expect(child.isAncestorOf(root)).toBe(false);
    });

    it('clears links with detachParents', () => {
      const tree = sampleTree();
      attachParents(tree);
      detachParents(tree);

      expect(tree.children()[0]?.parent).toBeNull();
    });
  });

  describe('capabilities', () => {
    it('probes the display field', () => {
      expect(probeDisplayField(int(4))).toEqual({ name: 'value', value: 4 });
      expect(
        probeDisplayField(
          Call.create(span(0, 1), { callee: 'print', receiver: null, args: [] })
        )
      ).toEqual({ name: 'callee', value: 'print' });
      expect(probeDisplayField(sampleTree())).toBeNull();
      expect(probeDisplayField(new GraphNode('g', EMPTY_SPAN))).toBeNull();
    });

    it('detects the validation hook', () => {
      expect(isValidatable(int(1))).toBe(true);
      expect(isValidatable(new GraphNode('g', EMPTY_SPAN))).toBe(false);
    });

    it('recognizes nodes', () => {
      expect(isNode(int(1))).toBe(true);
      expect(isNode({ kind: 'IntLit' })).toBe(false);
    });
  });
});

describe('KindRegistry', () => {
  it('records kinds in registration order', () => {
    const registry = new KindRegistry();
    defineNode('First', {}, { registry });
    defineNode('Second', {}, { registry });

    expect(registry.kinds()).toEqual(['First', 'Second']);
    expect(registry.size).toBe(2);
    expect(registry.has('First')).toBe(true);
  });

  it('rejects a duplicate kind', () => {
    const registry = new KindRegistry();
    defineNode('Twice', {}, { registry });

    expect(() => defineNode('Twice', {}, { registry })).toThrow(
      'Node kind Twice is already registered'
    );
  });

  it('rejects a class missing a kernel method', () => {
    class Incomplete {
      children(): [] {
        return [];
      }
      accept(): null {
        return null;
      }
      clone(): this {
        return this;
      }
    }
    const registry = new KindRegistry();

    expect(() => registry.register('Incomplete', Incomplete)).toThrow(
      NodeContractError
    );
    expect(() => registry.register('Incomplete', Incomplete)).toThrow(
      'Node kind Incomplete does not implement equals'
    );
  });

  it('accepts hand-written node classes', () => {
    const registry = new KindRegistry();
    const registration = registry.register('GraphNode', GraphNode);

    expect(registration.nodeClass).toBe(GraphNode);
  });
});

describe('wide node lists', () => {
  const WIDTH = 300_000;

  function wideCall() {
    const args = Array.from({ length: WIDTH }, (_, i) => int(i % 100));
    return Call.create(span(0, 9), { callee: 'f', receiver: null, args });
  }

  it('handle a few hundred thousand children in one list', () => {
    const call = wideCall();
    const stmt = ExprStmt.create(span(0, 10), { expr: call });
    let visited = 0;
    levelOrder(stmt, () => {
      visited++;
    });

    expect(call.children()).toHaveLength(WIDTH);
    expect(call.nodeCount()).toBe(WIDTH + 1);
    expect(stmt.findAll(IntLit)).toHaveLength(WIDTH);
    expect(visited).toBe(WIDTH + 2);
  });

  it('leave the caller array untouched on construction', () => {
    const first = int(1);
    const args = [first];
    const call = Call.create(span(0, 4), { callee: 'f', receiver: null, args });

    args.push(int(2));

    expect(Object.isExtensible(args)).toBe(true);
    expect(args).toHaveLength(2);
    expect(Object.isFrozen(call.fields.args)).toBe(true);
    expect(call.children()).toHaveLength(1);
    expect(call.children()[0]).toBe(first);
  });
});
