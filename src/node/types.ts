/**
 * Node Contract
 * The interface every concrete node kind satisfies, whatever its storage.
 */

import type { Span } from '../source-location.js';
import type { Visitor } from '../visitor/visitor.js';

// ============================================================
// KERNEL PRIMITIVES
// ============================================================

/**
 * The four operations a node kind must implement itself.
 * There is no safe default for any of them.
 */
export interface NodeKernel {
  /** Concrete kind name, e.g. "IntLit" */
  readonly kind: string;
  readonly span: Span;

  /**
   * Node-typed fields in declared order.
   * Absent optional children are skipped; primitive fields never appear.
   */
  children(): readonly Node[];

  /** Double dispatch to the visitor method bound to this kind */
  accept<T>(visitor: Visitor<T>): T;

  /** Deep structural equality; always false across kinds */
  equals(other: Node): boolean;

  /** Deep copy; `clone().equals(this)` holds */
  clone(): Node;
}

// ============================================================
// FULL NODE INTERFACE
// ============================================================

/**
 * Kernel primitives plus the derived operations BaseNode implements once.
 * Derived operations assume a finite tree.
 */
export interface Node extends NodeKernel {
  /** Weak, non-owning link to the node that holds this one */
  readonly parent: Node | null;
  setParent(parent: Node | null): void;

  isLeaf(): boolean;
  depth(): number;
  nodeCount(): number;

  findAll<N extends Node>(matcher: KindMatcher<N>): N[];
  findFirst<N extends Node>(matcher: KindMatcher<N>): N | undefined;
  contains(matcher: KindMatcher<Node>): boolean;

  ancestors(): Node[];
  siblings(): Node[];
}

/**
 * Runtime kind test used by searches.
 * Node definitions and abstract kinds both implement it.
 */
export interface KindMatcher<N extends Node> {
  readonly kind: string;
  is(node: Node): node is N;
}
