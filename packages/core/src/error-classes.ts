/**
 * Runtime Error Classes and Factory
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
export interface PyErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all runtime errors.
 * Provides structured data for host applications to format as needed.
 */
export class PyError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: PyErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'PyError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): PyErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: PyErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.name}: ${this.message}`;
  }
}

/** @throws TypeError if errorId is unknown or belongs to another category */
function requireCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Value has the wrong category for the slot it is assigned to */
export class PyTypeError extends PyError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'type');
    super({ errorId, message, context });
    this.name = 'PyTypeError';
  }
}

/** Value has the right category but violates a structural invariant */
export class PyValueError extends PyError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'value');
    super({ errorId, message, context });
    this.name = 'PyValueError';
  }
}

/** Attribute is missing, read-only or cannot be deleted */
export class PyAttributeError extends PyError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'attribute');
    super({ errorId, message, context });
    this.name = 'PyAttributeError';
  }
}

/** Runtime misconfiguration */
export class PyRuntimeError extends PyError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'runtime');
    super({ errorId, message, context });
    this.name = 'PyRuntimeError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the error definition, renders its message template with context,
 * and creates the error class matching the definition's category.
 *
 * @param errorId - Error identifier (format: PY-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('PY-A003', { typeName: 'function', attribute: 'tag' })
 * // Creates PyAttributeError: "'function' object has no attribute 'tag'"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): PyError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'type':
      return new PyTypeError(errorId, message, context);
    case 'value':
      return new PyValueError(errorId, message, context);
    case 'attribute':
      return new PyAttributeError(errorId, message, context);
    case 'runtime':
      return new PyRuntimeError(errorId, message, context);
  }
}
