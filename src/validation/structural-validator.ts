/**
 * Structural Validator
 * Node validation plus cycle detection over possibly corrupt graphs.
 */

import { error } from '../diagnostics/builder.js';
import type { Diagnostic } from '../diagnostics/types.js';
import type { Node } from '../node/types.js';
import { ASTValidator } from './ast-validator.js';

type WalkState = 'in-progress' | 'done';

export const CYCLE_MESSAGE = 'Circular reference detected in AST';
export const CYCLE_HELP = 'AST nodes should form a tree structure without cycles';

/**
 * Walks from the root tracking each node as in-progress or done.
 *
 * Reaching an in-progress node means a back edge: the cycle path is read
 * off the in-progress stack and reported once, and the walk does not
 * descend from the repeated node. Done nodes (shared subtrees) are not
 * walked again, so every node's hook runs once per validation.
 *
 * Only the back edge actually taken is reported; a node sitting on two
 * different cycles yields one path per edge the walk reaches.
 */
export class StructuralValidator extends ASTValidator {
  private readonly states = new Map<Node, WalkState>();
  private readonly stack: Node[] = [];
  private readonly cyclePaths: Node[][] = [];
  private readonly structural: Diagnostic[] = [];

  override visit(node: Node): void {
    const state = this.states.get(node);
    if (state === 'in-progress') {
      this.reportCycle(node);
      return;
    }
    if (state === 'done') {
      return;
    }

    this.states.set(node, 'in-progress');
    this.stack.push(node);

    this.runHook(node);
    for (const child of node.children()) {
      this.visit(child);
    }

    this.stack.pop();
    this.states.set(node, 'done');
  }

  override clear(): void {
    super.clear();
    this.states.clear();
    this.stack.length = 0;
    this.cyclePaths.length = 0;
    this.structural.length = 0;
  }

  /** Custom diagnostics first, then structural ones */
  protected override findings(): Diagnostic[] {
    return [...this.custom, ...this.structural];
  }

  customDiagnostics(): Diagnostic[] {
    return [...this.custom];
  }

  structuralDiagnostics(): Diagnostic[] {
    return [...this.structural];
  }

  /** Each detected cycle: repeated node, every step, repeated node again */
  cycles(): Node[][] {
    return this.cyclePaths.map((path) => [...path]);
  }

  private reportCycle(repeated: Node): void {
    const start = this.stack.indexOf(repeated);
    const path = [...this.stack.slice(start), repeated];
    this.cyclePaths.push(path);

    let builder = error(CYCLE_MESSAGE).primary(
      repeated.span,
      'cycle starts and ends here'
    );
    path.forEach((node, index) => {
      if (node !== repeated) {
        builder = builder.secondary(
          node.span,
          `part of cycle (step ${index + 1})`
        );
      }
    });

    this.structural.push(builder.help(CYCLE_HELP).build());
    this.callbacks.onCycle?.({ path });
  }
}
