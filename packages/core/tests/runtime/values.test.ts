/**
 * pyfunc Runtime Tests: Values
 * Tests for type guards, typeName, formatValue and cells
 */

import { describe, expect, it } from 'vitest';
import {
  formatValue,
  getCellContents,
  isCell,
  isSequence,
  isStringDict,
  makeFunction,
  newBoundMethod,
  newCell,
  newCode,
  newFunction,
  PyValueError,
  setCellContents,
  typeName,
  type PyValue,
} from '@pyfunc/core';

describe('pyfunc Runtime: Values', () => {
  const code = newCode({ name: 'add' });
  const fn = newFunction(code, new Map(), 'ops.add');

  describe('typeName', () => {
    it.each<[PyValue, string]>([
      [null, 'NoneType'],
      [true, 'bool'],
      [3, 'int'],
      [2.5, 'float'],
      ['s', 'str'],
      [[1], 'tuple'],
      [new Map(), 'dict'],
      [newCell(), 'cell'],
      [code, 'code'],
      [fn, 'function'],
      [newBoundMethod(1, fn), 'method'],
    ])('typeName(%o) is %s', (value, expected) => {
      expect(typeName(value)).toBe(expected);
    });
  });

  describe('type guards', () => {
    it('distinguishes tuples and dicts', () => {
      expect(isSequence([])).toBe(true);
      expect(isSequence(new Map())).toBe(false);
      expect(isStringDict(new Map())).toBe(true);
      expect(isStringDict([])).toBe(false);
      expect(isCell(newCell())).toBe(true);
      expect(isCell(code)).toBe(false);
    });
  });

  describe('formatValue', () => {
    it('formats scalars', () => {
      expect(formatValue(null)).toBe('None');
      expect(formatValue(true)).toBe('True');
      expect(formatValue(false)).toBe('False');
      expect(formatValue(7)).toBe('7');
      expect(formatValue("it's")).toBe("'it\\'s'");
    });

    it('formats tuples, including one-element tuples', () => {
      expect(formatValue([])).toBe('()');
      expect(formatValue([1])).toBe('(1,)');
      expect(formatValue([1, 'a'])).toBe("(1, 'a')");
    });

    it('formats dicts', () => {
      expect(formatValue(new Map<string, PyValue>([['a', 1], ['b', [2]]]))).toBe(
        "{'a': 1, 'b': (2,)}"
      );
    });

    it('formats runtime objects', () => {
      expect(formatValue(code)).toBe('<code object add>');
      expect(formatValue(fn)).toBe('<function ops.add>');
      expect(formatValue(newBoundMethod('r', fn))).toBe(
        "<bound method ops.add of 'r'>"
      );
      expect(formatValue(newCell())).toBe('<cell: empty>');
      expect(formatValue(newCell(5))).toBe('<cell: 5>');
    });
  });

  describe('cells', () => {
    it('reads back the stored value', () => {
      expect(getCellContents(newCell('x'))).toBe('x');
    });

    it('shares writes between every closure holding the cell', () => {
      const cell = newCell(1);
      const inner = newCode({ name: 'inner', freevars: ['n'] });
      const first = makeFunction(inner, new Map(), { closure: [cell] });
      const second = makeFunction(inner, new Map(), { closure: [cell] });

      setCellContents(cell, 2);

      expect(first.closure[0]?.contents).toBe(2);
      expect(second.closure[0]?.contents).toBe(2);
    });

    it('holds None as a value, distinct from empty', () => {
      expect(getCellContents(newCell(null))).toBeNull();
    });

    it('throws PY-V002 when reading an empty cell', () => {
      expect(() => getCellContents(newCell(), 'n')).toThrow(PyValueError);
      expect(() => getCellContents(newCell(), 'n')).toThrow("cell 'n' is empty");
    });
  });
});
