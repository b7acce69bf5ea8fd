/**
 * Base Node
 * Derived node operations implemented once against the kernel primitives.
 */

import { formatSpan, type Span } from '../source-location.js';
import type { Visitor } from '../visitor/visitor.js';
import type { KindInfo } from '../schema/kind-info.js';
import type { KindMatcher, Node } from './types.js';

/** Shared children view for leaves; never mutated */
export const EMPTY_CHILDREN: readonly Node[] = Object.freeze([]);

// ============================================================
// BASE NODE
// ============================================================

/**
 * Abstract base of every node class.
 * Subclasses supply kind, children, accept, equals and clone; everything
 * else is computed from those.
 */
export abstract class BaseNode implements Node {
  abstract readonly kind: string;
  readonly span: Span;

  private parentRef: WeakRef<Node> | null = null;

  constructor(span: Span) {
    this.span = span;
  }

  abstract children(): readonly Node[];
  abstract accept<T>(visitor: Visitor<T>): T;
  abstract equals(other: Node): boolean;
  abstract clone(): Node;

  /** Schema metadata; null for hand-written node classes */
  get kindInfo(): KindInfo | null {
    return null;
  }

  // ============================================================
  // PARENT LINK
  // ============================================================

  get parent(): Node | null {
    return this.parentRef?.deref() ?? null;
  }

  setParent(parent: Node | null): void {
    this.parentRef = parent === null ? null : new WeakRef(parent);
  }

  /** Parent, grandparent, ... up to the root */
  ancestors(): Node[] {
    const nodes: Node[] = [];
    let current = this.parent;

    while (current !== null) {
      nodes.push(current);
      current = current.parent;
    }

    return nodes;
  }

  /** Other children of the parent, in order; empty without a parent */
  siblings(): Node[] {
    const parent = this.parent;
    if (parent === null) {
      return [];
    }

    return parent.children().filter((child) => child !== this);
  }

  isAncestorOf(node: Node): boolean {
    return node.ancestors().includes(this);
  }

  isDescendantOf(node: Node): boolean {
    return this.ancestors().includes(node);
  }

  // ============================================================
  // SHAPE
  // ============================================================

  isLeaf(): boolean {
    return this.children().length === 0;
  }

  /** 0 for leaves, otherwise 1 + the deepest child */
  depth(): number {
    const children = this.children();
    if (children.length === 0) {
      return 0;
    }

    let deepest = 0;
    for (const child of children) {
      deepest = Math.max(deepest, child.depth());
    }
    return deepest + 1;
  }

  nodeCount(): number {
    let count = 1;
    for (const child of this.children()) {
      count += child.nodeCount();
    }
    return count;
  }

  // ============================================================
  // SEARCH
  // ============================================================

  /** Every matching node in the subtree, in preorder */
  findAll<N extends Node>(matcher: KindMatcher<N>): N[] {
    const found: N[] = [];
    if (matcher.is(this)) {
      found.push(this);
    }

    for (const child of this.children()) {
      for (const match of child.findAll(matcher)) {
        found.push(match);
      }
    }

    return found;
  }

  findFirst<N extends Node>(matcher: KindMatcher<N>): N | undefined {
    if (matcher.is(this)) {
      return this;
    }

    for (const child of this.children()) {
      const found = child.findFirst(matcher);
      if (found !== undefined) {
        return found;
      }
    }

    return undefined;
  }

  contains(matcher: KindMatcher<Node>): boolean {
    return this.findFirst(matcher) !== undefined;
  }

  /** Debug form: Kind[start-end] */
  toString(): string {
    return `${this.kind}[${formatSpan(this.span)}]`;
  }
}

export function isNode(value: unknown): value is Node {
  return value instanceof BaseNode;
}
