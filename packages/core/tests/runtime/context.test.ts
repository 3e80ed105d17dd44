/**
 * pyfunc Runtime Tests: Runtime Context
 * Tests for createRuntimeContext options and call stack management
 */

import { describe, expect, it } from 'vitest';
import {
  createRuntimeContext,
  getCallStack,
  newCode,
  popCallFrame,
  pushCallFrame,
  type CallFrame,
} from '@pyfunc/core';

function frame(functionName: string): CallFrame {
  return { functionName, code: newCode({ name: functionName }) };
}

describe('pyfunc Runtime: Runtime Context', () => {
  describe('createRuntimeContext', () => {
    it('initializes an empty call stack and observability', () => {
      const ctx = createRuntimeContext();
      expect(ctx.callStack).toEqual([]);
      expect(ctx.observability).toEqual({});
    });

    it('initializes maxCallStackDepth to 100 by default', () => {
      expect(createRuntimeContext().maxCallStackDepth).toBe(100);
    });

    it('accepts custom maxCallStackDepth option', () => {
      const ctx = createRuntimeContext({ maxCallStackDepth: 5 });
      expect(ctx.maxCallStackDepth).toBe(5);
    });

    it('rejects a non-positive maxCallStackDepth', () => {
      expect(() => createRuntimeContext({ maxCallStackDepth: 0 })).toThrow(
        'Invalid maxCallStackDepth: expected a positive integer, got 0'
      );
    });

    it('uses the given evaluator', () => {
      const evaluator = (): null => null;
      expect(createRuntimeContext({ evaluator }).evaluator).toBe(evaluator);
    });
  });

  describe('call stack', () => {
    it('pushes and pops frames in order', () => {
      const ctx = createRuntimeContext();
      pushCallFrame(ctx, frame('outer'));
      pushCallFrame(ctx, frame('inner'));

      expect(getCallStack(ctx).map((f) => f.functionName)).toEqual([
        'outer',
        'inner',
      ]);

      popCallFrame(ctx);
      expect(getCallStack(ctx).map((f) => f.functionName)).toEqual(['outer']);
    });

    it('treats pop on an empty stack as a no-op', () => {
      const ctx = createRuntimeContext();
      popCallFrame(ctx);
      expect(ctx.callStack).toEqual([]);
    });

    it('drops the oldest frames beyond maxCallStackDepth', () => {
      const ctx = createRuntimeContext({ maxCallStackDepth: 2 });
      pushCallFrame(ctx, frame('a'));
      pushCallFrame(ctx, frame('b'));
      pushCallFrame(ctx, frame('c'));

      expect(getCallStack(ctx).map((f) => f.functionName)).toEqual(['b', 'c']);
    });

    it('returns a copy from getCallStack', () => {
      const ctx = createRuntimeContext();
      pushCallFrame(ctx, frame('a'));

      const snapshot = getCallStack(ctx);
      popCallFrame(ctx);

      expect(snapshot).toHaveLength(1);
      expect(ctx.callStack).toHaveLength(0);
    });
  });
});
