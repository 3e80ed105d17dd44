/**
 * Function Objects
 *
 * Function objects and code objects should not be confused with each other.
 * A function object is created each time a definition is evaluated and
 * references a code object, which is nothing more than the compiled body.
 * One code object backs zero or many function objects, each with its own
 * globals, defaults and closure cells.
 *
 * Public API for host applications.
 */

import { getDocstring, type PyCode } from './code.js';
import { popCallFrame, pushCallFrame } from './context.js';
import type { RuntimeContext } from './types.js';
import {
  isPyObject,
  type PyCell,
  type PyValue,
  type StringDict,
} from './values.js';

/**
 * User-defined function.
 *
 * Shared by reference. Mutable fields are written through the property
 * table in descriptors.ts, which validates every assignment.
 */
export interface PyFunction {
  readonly __type: 'function';
  /** __code__: replaced only through the validated setter */
  code: PyCode;
  /** __globals__: the defining module's namespace (read, never written) */
  readonly globals: StringDict;
  /** __defaults__: positional defaults, null when absent */
  defaults: PyValue[] | null;
  /** __kwdefaults__: keyword-only defaults, null when absent */
  kwdefaults: StringDict | null;
  /** __closure__: one cell per code.freevars entry */
  readonly closure: readonly PyCell[];
  /** __doc__ */
  doc: PyValue;
  /** __name__ */
  name: string;
  /** __dict__: custom attributes, null until the first one is set */
  dict: StringDict | null;
  /** __module__ */
  module: PyValue;
  /** __annotations__, null when absent */
  annotations: StringDict | null;
  /** __qualname__ */
  qualname: string;
}

/** Optional fields filled in by makeFunction() */
export interface MakeFunctionOptions {
  readonly qualname?: string | undefined;
  readonly defaults?: PyValue[] | null | undefined;
  readonly kwdefaults?: StringDict | null | undefined;
  readonly closure?: readonly PyCell[] | undefined;
  readonly annotations?: StringDict | null | undefined;
}

/** Type guard for function objects */
export function isFunction(value: PyValue): value is PyFunction {
  return isPyObject(value) && value.__type === 'function';
}

/**
 * Create a function object from a code object and a global namespace.
 *
 * Docstring and name come from the code object; __module__ is read from
 * globals['__name__'] (None when missing). Defaults, kwdefaults, annotations
 * and __dict__ start absent and the closure starts empty.
 *
 * @param qualname - Qualified name; empty or omitted means the code's name
 */
export function newFunction(
  code: PyCode,
  globals: StringDict,
  qualname = ''
): PyFunction {
  return {
    __type: 'function',
    code,
    globals,
    defaults: null,
    kwdefaults: null,
    closure: [],
    doc: getDocstring(code),
    name: code.name,
    dict: null,
    module: globals.get('__name__') ?? null,
    annotations: null,
    qualname: qualname === '' ? code.name : qualname,
  };
}

/**
 * Create a function object with defaults, annotations and closure cells,
 * as an evaluator does when it executes a definition.
 *
 * Throws Error (not PyError): a closure that does not match the code's
 * free variables is a bug in the caller, not in the program being run.
 *
 * @throws Error if closure length differs from code.freevars length
 */
export function makeFunction(
  code: PyCode,
  globals: StringDict,
  options: MakeFunctionOptions = {}
): PyFunction {
  const closure = options.closure ?? [];
  if (closure.length !== code.freevars.length) {
    throw new Error(
      `Closure for ${code.name}() has ${closure.length} cells, code expects ${code.freevars.length}`
    );
  }

  return {
    ...newFunction(code, globals, options.qualname),
    defaults: options.defaults ?? null,
    kwdefaults: options.kwdefaults ?? null,
    closure: [...closure],
    annotations: options.annotations ?? null,
  };
}

/**
 * Call a function.
 *
 * Hands the code, globals, a fresh local scope, the arguments and the
 * function's current defaults, kwdefaults and closure to the evaluator.
 * Argument binding is the evaluator's job. Whatever the evaluator returns
 * or throws reaches the caller unchanged.
 */
export function callFunction(
  fn: PyFunction,
  args: readonly PyValue[],
  kwargs: StringDict,
  ctx: RuntimeContext
): PyValue {
  const name = fn.qualname;

  ctx.observability.onFunctionCall?.({ name, args });
  pushCallFrame(ctx, { functionName: name, code: fn.code });
  const startTime = Date.now();

  try {
    let value: PyValue;
    try {
      value = ctx.evaluator(
        fn.code,
        fn.globals,
        new Map(),
        args,
        kwargs,
        fn.defaults,
        fn.kwdefaults,
        fn.closure
      );
    } catch (error) {
      notifyObserver(() =>
        ctx.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          name,
        })
      );
      throw error;
    }

    notifyObserver(() =>
      ctx.observability.onFunctionReturn?.({
        name,
        value,
        durationMs: Date.now() - startTime,
      })
    );

    return value;
  } finally {
    popCallFrame(ctx);
  }
}

/**
 * Run an observer callback after the evaluator has settled.
 *
 * A callback failure never replaces the evaluator's result or failure.
 */
function notifyObserver(fire: () => void): void {
  try {
    fire();
  } catch {
    // Outcome already decided by the evaluator
  }
}
