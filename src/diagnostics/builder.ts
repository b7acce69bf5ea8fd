/**
 * Diagnostic Builder
 * Fluent construction of diagnostics plus severity helpers.
 */

import type { Span } from '../source-location.js';
import {
  SEVERITIES,
  type Diagnostic,
  type Label,
  type Severity,
} from './types.js';

// ============================================================
// BUILDER
// ============================================================

/**
 * Accumulates labels and notes for one diagnostic.
 * Each call returns a new builder so partially built diagnostics can be
 * shared as templates.
 */
export class DiagnosticBuilder {
  private readonly severity: Severity;
  private readonly message: string;
  private readonly primaryLabel: Label | null;
  private readonly secondaryLabels: readonly Label[];
  private readonly helpText: string | undefined;
  private readonly noteText: string | undefined;

  constructor(
    severity: Severity,
    message: string,
    primaryLabel: Label | null = null,
    secondaryLabels: readonly Label[] = [],
    helpText?: string,
    noteText?: string
  ) {
    this.severity = severity;
    this.message = message;
    this.primaryLabel = primaryLabel;
    this.secondaryLabels = secondaryLabels;
    this.helpText = helpText;
    this.noteText = noteText;
  }

  /** Set the primary label, replacing any earlier one */
  primary(span: Span, message: string): DiagnosticBuilder {
    return new DiagnosticBuilder(
      this.severity,
      this.message,
      { style: 'primary', span, message },
      this.secondaryLabels,
      this.helpText,
      this.noteText
    );
  }

  secondary(span: Span, message: string): DiagnosticBuilder {
    return new DiagnosticBuilder(
      this.severity,
      this.message,
      this.primaryLabel,
      [...this.secondaryLabels, { style: 'secondary', span, message }],
      this.helpText,
      this.noteText
    );
  }

  help(text: string): DiagnosticBuilder {
    return new DiagnosticBuilder(
      this.severity,
      this.message,
      this.primaryLabel,
      this.secondaryLabels,
      text,
      this.noteText
    );
  }

  note(text: string): DiagnosticBuilder {
    return new DiagnosticBuilder(
      this.severity,
      this.message,
      this.primaryLabel,
      this.secondaryLabels,
      this.helpText,
      text
    );
  }

  build(): Diagnostic {
    const labels =
      this.primaryLabel === null
        ? [...this.secondaryLabels]
        : [this.primaryLabel, ...this.secondaryLabels];

    return Object.freeze({
      severity: this.severity,
      message: this.message,
      labels: Object.freeze(labels),
      help: this.helpText,
      note: this.noteText,
    });
  }
}

// ============================================================
// ENTRY POINTS
// ============================================================

export function error(message: string): DiagnosticBuilder {
  return new DiagnosticBuilder('error', message);
}

export function warning(message: string): DiagnosticBuilder {
  return new DiagnosticBuilder('warning', message);
}

export function hint(message: string): DiagnosticBuilder {
  return new DiagnosticBuilder('hint', message);
}

export function info(message: string): DiagnosticBuilder {
  return new DiagnosticBuilder('info', message);
}

// ============================================================
// HELPERS
// ============================================================

/** Primary label of a diagnostic, if any */
export function primaryLabel(diagnostic: Diagnostic): Label | undefined {
  return diagnostic.labels.find((label) => label.style === 'primary');
}

/**
 * Group diagnostics by severity.
 * Only severities that occur are present; keys follow SEVERITIES order.
 */
export function groupBySeverity(
  diagnostics: readonly Diagnostic[]
): Map<Severity, Diagnostic[]> {
  const groups = new Map<Severity, Diagnostic[]>();

  for (const severity of SEVERITIES) {
    const matching = diagnostics.filter((d) => d.severity === severity);
    if (matching.length > 0) {
      groups.set(severity, matching);
    }
  }

  return groups;
}

/** Only error-severity findings fail a build */
export function failsBuild(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
