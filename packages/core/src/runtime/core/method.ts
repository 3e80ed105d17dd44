/**
 * Bound Methods
 *
 * Reading a function off an instance pairs the two; calling the pair
 * supplies the instance as the first positional argument.
 */

import { callFunction, type PyFunction } from './function.js';
import type { RuntimeContext } from './types.js';
import { isPyObject, type PyValue, type StringDict } from './values.js';

/** Instance + function pair produced by bindFunction() */
export interface PyBoundMethod {
  readonly __type: 'method';
  /** __self__: the instance the function was read through */
  readonly self: PyValue;
  /** __func__: the underlying function */
  readonly func: PyFunction;
}

/** Type guard for bound methods */
export function isBoundMethod(value: PyValue): value is PyBoundMethod {
  return isPyObject(value) && value.__type === 'method';
}

/** Pair an instance with a function */
export function newBoundMethod(self: PyValue, func: PyFunction): PyBoundMethod {
  return { __type: 'method', self, func };
}

/**
 * Descriptor get for functions.
 *
 * Read through the owning type itself (instance is None), the function is
 * returned unchanged. Read through an instance, a bound method is returned.
 *
 * @param _owner - Type the attribute was found on (unused, kept for the
 *   descriptor get signature)
 */
export function bindFunction(
  fn: PyFunction,
  instance: PyValue,
  _owner: PyValue
): PyFunction | PyBoundMethod {
  if (instance === null) {
    return fn;
  }
  return newBoundMethod(instance, fn);
}

/** Call a bound method: the function receives self before args */
export function callMethod(
  method: PyBoundMethod,
  args: readonly PyValue[],
  kwargs: StringDict,
  ctx: RuntimeContext
): PyValue {
  return callFunction(method.func, [method.self, ...args], kwargs, ctx);
}
