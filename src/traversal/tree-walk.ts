/**
 * Tree Walks
 * Stateless traversal algorithms built on children() alone.
 * Every function assumes a finite tree; run StructuralValidator first on
 * trees of unknown origin.
 */

import type { KindMatcher, Node } from '../node/types.js';

export type VisitFn = (node: Node) => void;
export type DepthVisitFn = (node: Node, depth: number) => void;

// ============================================================
// DEPTH-FIRST
// ============================================================

/** Node before its children, children left to right */
export function preorder(node: Node, visit: VisitFn): void {
  visit(node);
  for (const child of node.children()) {
    preorder(child, visit);
  }
}

/** Children left to right, then the node */
export function postorder(node: Node, visit: VisitFn): void {
  for (const child of node.children()) {
    postorder(child, visit);
  }
  visit(node);
}

/** Preorder with each node's distance from the starting node */
export function withDepth(node: Node, visit: DepthVisitFn, depth = 0): void {
  visit(node, depth);
  for (const child of node.children()) {
    withDepth(child, visit, depth + 1);
  }
}

/** Lazy preorder sequence */
export function* iteratePreorder(node: Node): Generator<Node, void, undefined> {
  yield node;
  for (const child of node.children()) {
    yield* iteratePreorder(child);
  }
}

// ============================================================
// BREADTH-FIRST
// ============================================================

/** Level by level, left to right, using an explicit queue */
export function levelOrder(node: Node, visit: VisitFn): void {
  const queue: Node[] = [node];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) {
      break;
    }
    visit(current);
    for (const child of current.children()) {
      queue.push(child);
    }
  }
}

// ============================================================
// SEARCH
// ============================================================

/**
 * Matching nodes in preorder.
 * The result is restartable: each iteration walks the tree again, and
 * stopping early leaves nothing pending.
 */
export function findAll<N extends Node>(
  node: Node,
  matcher: KindMatcher<N>
): Iterable<N> {
  return {
    *[Symbol.iterator](): Generator<N, void, undefined> {
      for (const candidate of iteratePreorder(node)) {
        if (matcher.is(candidate)) {
          yield candidate;
        }
      }
    },
  };
}

/** First match in preorder */
export function findFirst<N extends Node>(
  node: Node,
  matcher: KindMatcher<N>
): N | undefined {
  for (const match of findAll(node, matcher)) {
    return match;
  }
  return undefined;
}
