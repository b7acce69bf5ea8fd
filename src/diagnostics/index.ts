export {
  SEVERITIES,
  type Diagnostic,
  type Label,
  type LabelStyle,
  type Severity,
} from './types.js';
export {
  DiagnosticBuilder,
  error,
  failsBuild,
  groupBySeverity,
  hint,
  info,
  primaryLabel,
  warning,
} from './builder.js';
