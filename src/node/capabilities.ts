/**
 * Optional Node Capabilities
 * Interfaces a node kind opts into; consumers probe for them at runtime.
 */

import type { Diagnostic } from '../diagnostics/types.js';
import type { Node } from './types.js';

// ============================================================
// DISPLAY FIELD
// ============================================================

export type DisplayValue = string | number | boolean;

/** The scalar field a generic renderer shows next to the kind name */
export interface DisplayField {
  readonly name: string;
  readonly value: DisplayValue;
}

export interface HasDisplayField {
  displayField(): DisplayField | null;
}

export function hasDisplayField(node: Node): node is Node & HasDisplayField {
  return 'displayField' in node && typeof node.displayField === 'function';
}

/**
 * Best-effort probe for renderers.
 * Returns null when the kind does not opt in or the field is absent.
 */
export function probeDisplayField(node: Node): DisplayField | null {
  return hasDisplayField(node) ? node.displayField() : null;
}

// ============================================================
// VALIDATION HOOK
// ============================================================

/** A kind with its own checks; findings are returned, never thrown */
export interface Validatable {
  validate(): Diagnostic[];
}

export function isValidatable(node: Node): node is Node & Validatable {
  return 'validate' in node && typeof node.validate === 'function';
}
