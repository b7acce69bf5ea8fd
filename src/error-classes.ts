/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ArborErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all library errors.
 * Thrown only for contract violations and misconfiguration; validation
 * findings are reported as diagnostics instead.
 */
export class ArborError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ArborErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'ArborError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ArborErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** A node kind or visitor does not satisfy the Node contract */
export class NodeContractError extends ArborError {
  constructor(data: ArborErrorData) {
    super(data);
    this.name = 'NodeContractError';
  }
}

/** A node definition is malformed */
export class SchemaError extends ArborError {
  constructor(data: ArborErrorData) {
    super(data);
    this.name = 'SchemaError';
  }
}

/** The node pool was used against its locking rules */
export class PoolError extends ArborError {
  constructor(data: ArborErrorData) {
    super(data);
    this.name = 'PoolError';
  }
}

/** A pool policy file could not be read or is invalid */
export class ConfigError extends ArborError {
  constructor(data: ArborErrorData) {
    super(data);
    this.name = 'ConfigError';
  }
}

const ERROR_CLASSES: Record<
  ErrorCategory,
  new (data: ArborErrorData) => ArborError
> = {
  kernel: NodeContractError,
  schema: SchemaError,
  pool: PoolError,
  config: ConfigError,
};

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 * Renders the message template with context and picks the error class
 * matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('ARBOR-K002', { kind: 'IntLit' })
 * // NodeContractError: "Node kind IntLit is already registered"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): ArborError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const ErrorClass = ERROR_CLASSES[definition.category];
  return new ErrorClass({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    context,
  });
}
