/**
 * pyfunc Runtime Tests: Error Taxonomy
 * Tests for error registry, template rendering, error classes and factory
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  ERROR_REGISTRY,
  PyAttributeError,
  PyError,
  PyRuntimeError,
  PyTypeError,
  PyValueError,
  renderMessage,
} from '@pyfunc/core';

describe('pyfunc Runtime: Error Taxonomy', () => {
  describe('Registry', () => {
    it('looks up definitions by ID', () => {
      const definition = ERROR_REGISTRY.get('PY-V001');
      expect(definition?.category).toBe('value');
      expect(definition?.description).toBe('Free variable count mismatch');
    });

    it('uses the PY-{category}{3-digit} format with matching prefixes', () => {
      const prefixes = { type: 'T', value: 'V', attribute: 'A', runtime: 'R' };
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        expect(errorId).toMatch(/^PY-[TVAR]\d{3}$/);
        expect(errorId.charAt(3)).toBe(prefixes[definition.category]);
      }
    });

    it('holds every error the runtime raises', () => {
      for (const errorId of [
        'PY-T001',
        'PY-T002',
        'PY-V001',
        'PY-V002',
        'PY-A001',
        'PY-A002',
        'PY-A003',
        'PY-R001',
      ]) {
        expect(ERROR_REGISTRY.has(errorId)).toBe(true);
      }
      expect(ERROR_REGISTRY.size).toBe(8);
    });
  });

  describe('renderMessage', () => {
    it('replaces placeholders', () => {
      expect(
        renderMessage('Expected {expected}, got {actual}', {
          expected: 'str',
          actual: 'int',
        })
      ).toBe('Expected str, got int');
    });

    it('renders missing values as empty string', () => {
      expect(renderMessage('Hello {name}!', {})).toBe('Hello !');
    });

    it('coerces numbers', () => {
      expect(renderMessage('{n} free vars', { n: 0 })).toBe('0 free vars');
    });

    it('returns unclosed templates unchanged', () => {
      expect(renderMessage('broken {name', { name: 'x' })).toBe('broken {name');
    });
  });

  describe('createError', () => {
    it.each<[string, new (...args: never[]) => PyError]>([
      ['PY-T002', PyTypeError],
      ['PY-V002', PyValueError],
      ['PY-A003', PyAttributeError],
      ['PY-R001', PyRuntimeError],
    ])('%s creates the category class', (errorId, ErrorClass) => {
      const error = createError(errorId, {});
      expect(error).toBeInstanceOf(ErrorClass);
      expect(error).toBeInstanceOf(PyError);
      expect(error).toBeInstanceOf(Error);
      expect(error.errorId).toBe(errorId);
    });

    it('renders the message and keeps the context', () => {
      const error = createError('PY-A003', {
        typeName: 'function',
        attribute: 'tag',
      });
      expect(error.message).toBe("'function' object has no attribute 'tag'");
      expect(error.name).toBe('PyAttributeError');
      expect(error.toData()).toEqual({
        errorId: 'PY-A003',
        message: "'function' object has no attribute 'tag'",
        context: { typeName: 'function', attribute: 'tag' },
      });
    });

    it('throws TypeError for unknown IDs', () => {
      expect(() => createError('PY-X999', {})).toThrow(
        'Unknown error ID: PY-X999'
      );
    });
  });

  describe('Error classes', () => {
    it('reject IDs from another category', () => {
      expect(() => new PyTypeError('PY-V001', 'msg')).toThrow(
        'Expected type error ID, got: PY-V001'
      );
      expect(() => new PyValueError('PY-T001', 'msg')).toThrow(
        'Expected value error ID, got: PY-T001'
      );
    });

    it('reject unknown IDs', () => {
      expect(() => new PyError({ errorId: 'PY-T999', message: 'm' })).toThrow(
        'Unknown error ID: PY-T999'
      );
    });

    it('format with the class name by default', () => {
      const error = new PyValueError('PY-V002', "cell 'n' is empty");
      expect(error.format()).toBe("PyValueError: cell 'n' is empty");
    });

    it('format with a host formatter', () => {
      const error = new PyValueError('PY-V002', "cell 'n' is empty");
      expect(error.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
        "[PY-V002] cell 'n' is empty"
      );
    });
  });
});
