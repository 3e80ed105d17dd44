/**
 * Function Object Runtime
 *
 * Public API for creating, calling and inspecting function objects.
 *
 * Module Structure:
 * - core/: Function object model
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, Evaluator, etc.)
 *   - values.ts: PyValue, cells and value utilities
 *   - code.ts: Code artifacts
 *   - function.ts: Function objects (construction and call)
 *   - method.ts: Bound methods and descriptor get
 *   - callable.ts: Call dispatch for any callable value
 *   - descriptors.ts: Property tables (get/set/delete with validation)
 *   - attributes.ts: Generic attribute access
 *   - context.ts: Runtime context factory and call stack
 *   - introspection.ts: Function metadata
 */

export type {
  CallFrame,
  ErrorEvent,
  Evaluator,
  FunctionCallEvent,
  FunctionReturnEvent,
  ObservabilityCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './core/types.js';
export type {
  PyCell,
  PyObjectKind,
  PyObjectMarker,
  PyValue,
  StringDict,
} from './core/values.js';
export {
  formatValue,
  getCellContents,
  isCell,
  isPyObject,
  isSequence,
  isStringDict,
  newCell,
  setCellContents,
  typeName,
} from './core/values.js';
export type { CodeDefinition, PyCode } from './core/code.js';
export { getDocstring, isCode, newCode } from './core/code.js';
export type { MakeFunctionOptions, PyFunction } from './core/function.js';
export {
  callFunction,
  isFunction,
  makeFunction,
  newFunction,
} from './core/function.js';
export type { PyBoundMethod } from './core/method.js';
export {
  bindFunction,
  callMethod,
  isBoundMethod,
  newBoundMethod,
} from './core/method.js';
export type { PyCallable } from './core/callable.js';
export { call, isCallable } from './core/callable.js';
export type { Property, PropertyTable } from './core/descriptors.js';
export { FUNCTION_PROPERTIES, METHOD_PROPERTIES } from './core/descriptors.js';
export {
  deleteAttribute,
  getAttribute,
  hasAttribute,
  listAttributes,
  setAttribute,
} from './core/attributes.js';
export {
  createRuntimeContext,
  getCallStack,
  popCallFrame,
  pushCallFrame,
} from './core/context.js';
export type { FunctionMetadata } from './core/introspection.js';
export { getFunctionMetadata } from './core/introspection.js';
