/**
 * Visitor Protocol
 * Double dispatch from a node to the visit<Kind> method of a visitor.
 */

import { createError } from '../error-classes.js';
import type { KindMatcher, Node } from '../node/types.js';

// ============================================================
// VISITOR CONTRACT
// ============================================================

/**
 * A computation over nodes producing T.
 * Per-kind behavior lives in methods named visit<Kind>; `accept` finds
 * them by name and falls back to `fallback` when a kind has none.
 */
export interface Visitor<T> {
  visit(node: Node): T;
  fallback(node: Node): T;
}

type VisitMethod<T> = (this: Visitor<T>, node: Node) => T;

function isVisitMethod<T>(value: unknown): value is VisitMethod<T> {
  return typeof value === 'function';
}

export function visitMethodFor(node: Node): string {
  return `visit${node.kind}`;
}

/**
 * Call the visitor's method for a node, or its fallback.
 * Used by every accept() implementation.
 */
export function dispatchVisit<T>(
  visitor: Visitor<T>,
  method: string,
  node: Node
): T {
  const handler: unknown = Reflect.get(visitor, method);
  if (isVisitMethod<T>(handler)) {
    return handler.call(visitor, node);
  }
  return visitor.fallback(node);
}

// ============================================================
// BASE VISITOR
// ============================================================

/**
 * Visitor base whose fallback rejects unhandled kinds.
 *
 * @example
 * class Evaluator extends BaseVisitor<number> {
 *   visitIntLit(node: IntLitNode): number {
 *     return node.fields.value;
 *   }
 * }
 */
export abstract class BaseVisitor<T> implements Visitor<T> {
  visit(node: Node): T {
    return node.accept(this);
  }

  /** @throws NodeContractError ARBOR-K003 */
  fallback(node: Node): T {
    throw createError('ARBOR-K003', {
      method: visitMethodFor(node),
      kind: node.kind,
    });
  }
}

// ============================================================
// TYPED VISITORS
// ============================================================

/** Definitions usable as typed visitor keys */
export interface VisitableDefinition<N extends Node = Node>
  extends KindMatcher<N> {
  readonly visitMethod: string;
}

/** Node type produced by a definition */
export type NodeOf<D> = D extends KindMatcher<infer N> ? N : never;

/**
 * Visitor with one required method per definition in the union D.
 *
 * @example
 * const printer: VisitorFor<typeof IntLit | typeof Add, string> = { ... };
 */
export type VisitorFor<D extends VisitableDefinition, T> = Visitor<T> & {
  [Def in D as Def['visitMethod']]: (node: NodeOf<Def>) => T;
};
