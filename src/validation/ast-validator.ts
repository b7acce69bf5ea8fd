/**
 * AST Validator
 * Collects the diagnostics of every node's own validate hook.
 */

import type { Diagnostic, Severity } from '../diagnostics/types.js';
import { isValidatable } from '../node/capabilities.js';
import type { Node } from '../node/types.js';
import type { ValidationCallbacks } from '../observability.js';

export interface ValidatorOptions {
  readonly callbacks?: ValidationCallbacks | undefined;
}

const SUMMARY_LABELS: ReadonlyArray<[Severity, string]> = [
  ['error', 'errors'],
  ['warning', 'warnings'],
  ['hint', 'hints'],
  ['info', 'info'],
];

// ============================================================
// AST VALIDATOR
// ============================================================

/**
 * Plain recursive walk; assumes the tree is finite.
 * Use StructuralValidator when cycles are possible.
 */
export class ASTValidator {
  protected readonly custom: Diagnostic[] = [];
  protected readonly callbacks: ValidationCallbacks;

  constructor(options: ValidatorOptions = {}) {
    this.callbacks = options.callbacks ?? {};
  }

  /** Clear earlier findings, walk the tree, return what was found */
  validate(root: Node): Diagnostic[] {
    this.clear();
    this.visit(root);
    return [...this.diagnostics];
  }

  /** Walk a subtree, adding to the findings collected so far */
  visit(node: Node): void {
    this.runHook(node);
    for (const child of node.children()) {
      this.visit(child);
    }
  }

  clear(): void {
    this.custom.length = 0;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.findings();
  }

  /** Every collected diagnostic, in reporting order */
  protected findings(): Diagnostic[] {
    return [...this.custom];
  }

  protected runHook(node: Node): void {
    if (!isValidatable(node)) {
      return;
    }

    const found = node.validate();
    for (const diagnostic of found) {
      this.custom.push(diagnostic);
    }
    this.callbacks.onNodeValidated?.({ node, diagnostics: found });
  }

  // ============================================================
  // QUERIES
  // ============================================================

  /** True when nothing at all was reported */
  isValid(): boolean {
    return this.findings().length === 0;
  }

  bySeverity(severity: Severity): Diagnostic[] {
    return this.findings().filter((d) => d.severity === severity);
  }

  errorsOnly(): Diagnostic[] {
    return this.bySeverity('error');
  }

  warningsOnly(): Diagnostic[] {
    return this.bySeverity('warning');
  }

  hintsOnly(): Diagnostic[] {
    return this.bySeverity('hint');
  }

  infoOnly(): Diagnostic[] {
    return this.bySeverity('info');
  }

  count(severity: Severity): number {
    return this.bySeverity(severity).length;
  }

  /**
   * One-line result.
   *
   * @example
   * "Validation failed: 2 errors, 1 warnings"
   */
  summary(): string {
    if (this.isValid()) {
      return 'Validation passed: no errors found';
    }

    const parts: string[] = [];
    for (const [severity, label] of SUMMARY_LABELS) {
      const count = this.count(severity);
      if (count > 0) {
        parts.push(`${count} ${label}`);
      }
    }
    return `Validation failed: ${parts.join(', ')}`;
  }
}
