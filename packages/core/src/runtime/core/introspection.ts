/**
 * Runtime Introspection API
 *
 * Functions for inspecting function objects at runtime.
 * These enable host tooling (debuggers, help(), REPL completion) to describe
 * a function without going through attribute access.
 */

import type { PyFunction } from './function.js';
import type { PyValue } from './values.js';

/**
 * Metadata describing a function object.
 * Returned by getFunctionMetadata().
 */
export interface FunctionMetadata {
  /** __name__ */
  readonly name: string;
  /** __qualname__ */
  readonly qualname: string;
  /** __module__ (null when the defining globals had no __name__) */
  readonly module: PyValue;
  /** __doc__ */
  readonly doc: PyValue;
  /** Names captured from enclosing scopes, in closure order */
  readonly freevars: readonly string[];
  /** Number of positional defaults (0 when absent) */
  readonly defaultCount: number;
  /** Keyword-only parameters that have defaults */
  readonly kwdefaultNames: readonly string[];
  /** Keys of __dict__ in insertion order */
  readonly attributeNames: readonly string[];
}

/**
 * Describe a function object.
 *
 * Snapshot: later attribute writes do not change the returned metadata.
 */
export function getFunctionMetadata(fn: PyFunction): FunctionMetadata {
  return {
    name: fn.name,
    qualname: fn.qualname,
    module: fn.module,
    doc: fn.doc,
    freevars: [...fn.code.freevars],
    defaultCount: fn.defaults?.length ?? 0,
    kwdefaultNames: [...(fn.kwdefaults?.keys() ?? [])],
    attributeNames: [...(fn.dict?.keys() ?? [])],
  };
}
