/**
 * Runtime Context Factory
 *
 * Creates and configures the context function calls run through.
 * Public API for host applications.
 */

import { createError } from '../../error-classes.js';
import type { CallFrame, Evaluator, RuntimeContext, RuntimeOptions } from './types.js';

const DEFAULT_MAX_CALL_STACK_DEPTH = 100;

const missingEvaluator: Evaluator = (code) => {
  throw createError('PY-R001', { functionName: code.name });
};

/**
 * Create a runtime context for function calls.
 * This is the main entry point for configuring the runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const maxCallStackDepth =
    options.maxCallStackDepth ?? DEFAULT_MAX_CALL_STACK_DEPTH;

  if (!Number.isInteger(maxCallStackDepth) || maxCallStackDepth < 1) {
    throw new Error(
      `Invalid maxCallStackDepth: expected a positive integer, got ${maxCallStackDepth}`
    );
  }

  return {
    evaluator: options.evaluator ?? missingEvaluator,
    observability: options.observability ?? {},
    callStack: [],
    maxCallStackDepth,
  };
}

/**
 * Snapshot of the active call frames, innermost last.
 * Returns a copy; later calls do not change it.
 */
export function getCallStack(ctx: RuntimeContext): readonly CallFrame[] {
  return [...ctx.callStack];
}

/**
 * Push frame onto call stack before a function call.
 *
 * Constraints:
 * - Stack depth limited by maxCallStackDepth option
 * - Older frames dropped when limit exceeded
 */
export function pushCallFrame(ctx: RuntimeContext, frame: CallFrame): void {
  ctx.callStack.push(frame);

  if (ctx.callStack.length > ctx.maxCallStackDepth) {
    ctx.callStack.shift();
  }
}

/**
 * Pop frame from call stack after a function returns.
 * Pop on empty stack is a no-op.
 */
export function popCallFrame(ctx: RuntimeContext): void {
  if (ctx.callStack.length > 0) {
    ctx.callStack.pop();
  }
}
