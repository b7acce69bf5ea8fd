/**
 * Diagnostic Types
 * Severity-tagged validation findings with labeled source spans.
 */

import type { Span } from '../source-location.js';

// ============================================================
// SEVERITY
// ============================================================

/** Diagnostic severity levels, most severe first */
export type Severity = 'error' | 'warning' | 'hint' | 'info';

/** All severities in reporting order */
export const SEVERITIES: readonly Severity[] = [
  'error',
  'warning',
  'hint',
  'info',
];

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/** Whether a label marks the main location or supporting context */
export type LabelStyle = 'primary' | 'secondary';

/** A span annotated with a short message */
export interface Label {
  readonly style: LabelStyle;
  readonly span: Span;
  readonly message: string;
}

/**
 * A single finding produced by validation.
 * Never thrown; callers decide pass/fail policy from severities.
 */
export interface Diagnostic {
  readonly severity: Severity;
  readonly message: string;
  /** Primary label first when present, then secondary labels in order */
  readonly labels: readonly Label[];
  readonly help?: string | undefined;
  readonly note?: string | undefined;
}
