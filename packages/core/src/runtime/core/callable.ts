/**
 * Callable Dispatch
 *
 * Unified call entry point for every callable runtime value:
 * - PyFunction: user-defined functions, run by the evaluator
 * - PyBoundMethod: function + instance, instance prepended to args
 */

import { createError } from '../../error-classes.js';
import { callFunction, isFunction, type PyFunction } from './function.js';
import { callMethod, isBoundMethod, type PyBoundMethod } from './method.js';
import type { RuntimeContext } from './types.js';
import { typeName, type PyValue, type StringDict } from './values.js';

/** Union of all callable types */
export type PyCallable = PyFunction | PyBoundMethod;

/** Type guard for any callable */
export function isCallable(value: PyValue): value is PyCallable {
  return isFunction(value) || isBoundMethod(value);
}

/**
 * Call any callable value.
 *
 * @param kwargs - Keyword arguments (default: none)
 * @throws PyTypeError (PY-T002) if value is not callable
 */
export function call(
  value: PyValue,
  args: readonly PyValue[],
  ctx: RuntimeContext,
  kwargs: StringDict = new Map()
): PyValue {
  if (isFunction(value)) {
    return callFunction(value, args, kwargs, ctx);
  }
  if (isBoundMethod(value)) {
    return callMethod(value, args, kwargs, ctx);
  }
  throw createError('PY-T002', { typeName: typeName(value) });
}
