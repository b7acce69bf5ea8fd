/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 * - kernel: a node kind or visitor breaks the Node contract (K)
 * - schema: a node definition is malformed (S)
 * - pool: the node pool is misused (P)
 * - config: a policy file cannot be loaded (C)
 */
export type ErrorCategory = 'kernel' | 'schema' | 'pool' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: ARBOR-{category}{3-digit} (e.g., ARBOR-K001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Kernel contract violations (ARBOR-K0xx)
  {
    errorId: 'ARBOR-K001',
    category: 'kernel',
    description: 'Incomplete node kind',
    messageTemplate: 'Node kind {kind} does not implement {method}',
    resolution:
      'Every node kind must implement children, accept, clone and equals. Extend BaseNode or declare the kind with a define* function.',
  },
  {
    errorId: 'ARBOR-K002',
    category: 'kernel',
    description: 'Duplicate node kind',
    messageTemplate: 'Node kind {kind} is already registered',
    resolution:
      'Give each kind a unique name, or register it in a separate KindRegistry.',
  },
  {
    errorId: 'ARBOR-K003',
    category: 'kernel',
    description: 'Missing visitor method',
    messageTemplate: 'Visitor has no method {method} for node kind {kind}',
    resolution:
      'Add the visit method to the visitor, or extend Transformer to keep unhandled nodes unchanged.',
  },

  // Schema errors (ARBOR-S0xx)
  {
    errorId: 'ARBOR-S001',
    category: 'schema',
    description: 'Reserved field name',
    messageTemplate: 'Field name {field} is reserved in node kind {kind}',
    resolution:
      'Rename the field. Reserved names: span, children, accept, clone, kind, fields, parent.',
  },
  {
    errorId: 'ARBOR-S002',
    category: 'schema',
    description: 'Invalid node kind name',
    messageTemplate: 'Invalid node kind name "{kind}"',
    resolution:
      'Kind names start with a letter and contain only letters, digits and underscores.',
  },
  {
    errorId: 'ARBOR-S003',
    category: 'schema',
    description: 'Field value does not match its spec',
    messageTemplate:
      'Field {field} of node kind {kind} expects {expected}, got {actual}',
  },
  {
    errorId: 'ARBOR-S004',
    category: 'schema',
    description: 'Kind cannot use this representation',
    messageTemplate:
      'Node kind {kind} cannot use the {strategy} representation: {reason}',
    resolution:
      'Pooled and value kinds hold primitive fields only. Declare the kind with defineNode or defineOptimizedNode instead.',
  },

  // Pool errors (ARBOR-P0xx)
  {
    errorId: 'ARBOR-P001',
    category: 'pool',
    description: 'Pool lock re-entered',
    messageTemplate:
      'Pool category {category} is already locked; a factory must not request nodes from its own category',
  },

  // Configuration errors (ARBOR-C0xx)
  {
    errorId: 'ARBOR-C001',
    category: 'config',
    description: 'Unreadable configuration file',
    messageTemplate: 'Invalid configuration: {reason}',
  },
  {
    errorId: 'ARBOR-C002',
    category: 'config',
    description: 'Invalid configuration value',
    messageTemplate: 'Invalid configuration: {field} {reason}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Node kind {kind} is already registered", { kind: "IntLit" })
 * // Returns: "Node kind IntLit is already registered"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      // Unclosed brace
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // Objects without a usable toString
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
