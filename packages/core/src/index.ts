/**
 * pyfunc Core
 * Exports the function object runtime and error taxonomy
 */

export * from './runtime/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  createError,
  PyAttributeError,
  PyError,
  type PyErrorData,
  PyRuntimeError,
  PyTypeError,
  PyValueError,
} from './error-classes.js';
