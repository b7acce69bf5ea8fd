/**
 * Traversal Tests
 * Orders over Mul(Add(IntLit(1), IntLit(2)), IntLit(3))
 */

import { describe, expect, it } from 'vitest';
import {
  findAll,
  findFirst,
  iteratePreorder,
  levelOrder,
  postorder,
  preorder,
  withDepth,
  type Node,
  type VisitFn,
} from '../../src/index.js';
import { Call, Expr, IntLit, label, sampleTree } from '../helpers/sample-ast.js';

function collect(walk: (node: Node, visit: VisitFn) => void): string[] {
  const seen: string[] = [];
  walk(sampleTree(), (node) => seen.push(label(node)));
  return seen;
}

describe('Traversal', () => {
  it('walks in preorder', () => {
    expect(collect(preorder)).toEqual([
      'Mul',
      'Add',
      'IntLit(1)',
      'IntLit(2)',
      'IntLit(3)',
    ]);
  });

  it('walks in postorder', () => {
    expect(collect(postorder)).toEqual([
      'IntLit(1)',
      'IntLit(2)',
      'Add',
      'IntLit(3)',
      'Mul',
    ]);
  });

  it('walks level by level', () => {
    expect(collect(levelOrder)).toEqual([
      'Mul',
      'Add',
      'IntLit(3)',
      'IntLit(1)',
      'IntLit(2)',
    ]);
  });

  it('tags nodes with their depth', () => {
    const seen: Array<[string, number]> = [];
    withDepth(sampleTree(), (node, depth) => seen.push([label(node), depth]));

    expect(seen).toEqual([
      ['Mul', 0],
      ['Add', 1],
      ['IntLit(1)', 2],
      ['IntLit(2)', 2],
      ['IntLit(3)', 1],
    ]);
  });

  it('iterates lazily', () => {
    const first: string[] = [];
    for (const node of iteratePreorder(sampleTree())) {
      first.push(label(node));
      if (first.length === 2) break;
    }

    expect(first).toEqual(['Mul', 'Add']);
  });

  describe('findAll', () => {
    it('yields matches in preorder', () => {
      const values = [...findAll(sampleTree(), IntLit)].map(
        (node) => node.fields.value
      );

      expect(values).toEqual([1, 2, 3]);
    });

    it('can be iterated again', () => {
      const matches = findAll(sampleTree(), IntLit);

      expect([...matches]).toHaveLength(3);
      expect([...matches]).toHaveLength(3);
    });

    it('matches abstract kinds', () => {
      expect([...findAll(sampleTree(), Expr)]).toHaveLength(5);
    });
  });

  describe('findFirst', () => {
    it('returns the first match in preorder', () => {
      expect(findFirst(sampleTree(), IntLit)?.fields.value).toBe(1);
    });

    it('returns undefined without a match', () => {
      expect(findFirst(sampleTree(), Call)).toBeUndefined();
    });
  });
});
