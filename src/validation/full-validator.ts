import { groupBySeverity } from '../diagnostics/builder.js';
import type { Diagnostic, Severity } from '../diagnostics/types.js';
import type { Node } from '../node/types.js';
import type { ValidatorOptions } from './ast-validator.js';
import { StructuralValidator } from './structural-validator.js';

/**
 * One-call validation: node hooks plus structure.
 *
 * @example
 * const validator = new FullValidator();
 * const diagnostics = validator.validate(root);
 * if (!validator.isValid()) report(validator.errorsBySeverity());
 */
export class FullValidator {
  private readonly structural: StructuralValidator;

  constructor(options: ValidatorOptions = {}) {
    this.structural = new StructuralValidator(options);
  }

  validate(root: Node): Diagnostic[] {
    return this.structural.validate(root);
  }

  isValid(): boolean {
    return this.structural.isValid();
  }

  errorsBySeverity(): Map<Severity, Diagnostic[]> {
    return groupBySeverity(this.structural.diagnostics);
  }

  /** Cycle paths found by the last validate() */
  cycles(): Node[][] {
    return this.structural.cycles();
  }

  clear(): void {
    this.structural.clear();
  }
}
