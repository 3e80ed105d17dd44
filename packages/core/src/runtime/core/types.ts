/**
 * Runtime Types
 *
 * Public types for runtime configuration and call observability.
 * These types are the primary interface for host applications.
 */

import type { PyCode } from './code.js';
import type { PyCell, PyValue, StringDict } from './values.js';

/**
 * Bytecode evaluator supplied by the host.
 *
 * Binds arguments against the code's signature (using defaults and
 * kwdefaults), runs the body with the given scopes and closure cells, and
 * returns the result. Failures are thrown and reach the caller unchanged.
 */
export type Evaluator = (
  code: PyCode,
  globals: StringDict,
  locals: StringDict,
  args: readonly PyValue[],
  kwargs: StringDict,
  defaults: readonly PyValue[] | null,
  kwdefaults: StringDict | null,
  closure: readonly PyCell[]
) => PyValue;

/**
 * Call stack frame for an active function call.
 * Evaluators read these to build tracebacks.
 */
export interface CallFrame {
  /** Qualified name of the called function */
  readonly functionName: string;
  /** Code object being evaluated */
  readonly code: PyCode;
}

/** Observability callbacks for monitoring calls */
export interface ObservabilityCallbacks {
  /** Called before a function is handed to the evaluator */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called after a function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when the evaluator throws, before the error propagates */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a function call */
export interface FunctionCallEvent {
  /** Qualified function name */
  name: string;
  /** Positional arguments */
  args: readonly PyValue[];
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  /** Qualified function name */
  name: string;
  /** Return value */
  value: PyValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error thrown by the evaluator */
  error: Error;
  /** Qualified name of the function whose call failed */
  name: string;
}

/** Runtime context shared by every call made through it */
export interface RuntimeContext {
  /** Evaluator that executes code objects */
  readonly evaluator: Evaluator;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Active call frames, innermost last */
  readonly callStack: CallFrame[];
  /** Frames retained in callStack. Calls beyond this depth still run. */
  readonly maxCallStackDepth: number;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Evaluator for function calls */
  evaluator?: Evaluator | undefined;
  /** Observability callbacks for monitoring calls */
  observability?: ObservabilityCallbacks | undefined;
  /** Frames retained in callStack (default: 100) */
  maxCallStackDepth?: number | undefined;
}
