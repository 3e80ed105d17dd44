/**
 * Attribute Descriptors
 *
 * Static property tables exposing the internal fields of runtime objects as
 * attributes. Each property has a getter and optionally a setter and a
 * deleter. Setters check the category of the value and throw before
 * mutating anything, so a rejected assignment leaves the object as it was.
 *
 * Tables are built once at module load and never change afterwards.
 */

import { createError } from '../../error-classes.js';
import { isCode } from './code.js';
import type { PyFunction } from './function.js';
import type { PyBoundMethod } from './method.js';
import {
  isSequence,
  isStringDict,
  typeName,
  type PyValue,
  type StringDict,
} from './values.js';

/** Accessor for one named attribute */
export interface Property<T> {
  /** Read the attribute */
  readonly fget: (self: T) => PyValue;
  /** Write the attribute (absent = read-only) */
  readonly fset?: ((self: T, value: PyValue) => void) | undefined;
  /** Delete the attribute (absent = not deletable) */
  readonly fdel?: ((self: T) => void) | undefined;
}

/** Property table keyed by attribute name */
export type PropertyTable<T> = ReadonlyMap<string, Property<T>>;

// ============================================================
// VALIDATION HELPERS
// ============================================================

function typeMismatch(
  attribute: string,
  expected: string,
  value: PyValue
): Error {
  return createError('PY-T001', {
    attribute,
    expected,
    actual: typeName(value),
  });
}

function requireDict(attribute: string, value: PyValue): StringDict {
  if (!isStringDict(value)) {
    throw typeMismatch(attribute, 'dict', value);
  }
  return value;
}

function requireString(attribute: string, value: PyValue): string {
  if (typeof value !== 'string') {
    throw typeMismatch(attribute, 'string', value);
  }
  return value;
}

// ============================================================
// FUNCTION PROPERTIES
// ============================================================

/** Properties of function objects */
export const FUNCTION_PROPERTIES: PropertyTable<PyFunction> = new Map<
  string,
  Property<PyFunction>
>([
  [
    '__code__',
    {
      fget: (f) => f.code,
      fset: (f, value) => {
        // Not legal to set __code__ to anything other than a code object
        if (!isCode(value)) {
          throw typeMismatch('__code__', 'code', value);
        }
        const nfree = value.freevars.length;
        const nclosure = f.closure.length;
        if (nfree !== nclosure) {
          throw createError('PY-V001', {
            functionName: f.name,
            expected: nclosure,
            actual: nfree,
          });
        }
        f.code = value;
      },
    },
  ],
  [
    '__defaults__',
    {
      fget: (f) => f.defaults,
      fset: (f, value) => {
        if (!isSequence(value)) {
          throw typeMismatch('__defaults__', 'tuple', value);
        }
        f.defaults = value;
      },
      fdel: (f) => {
        f.defaults = null;
      },
    },
  ],
  [
    '__kwdefaults__',
    {
      fget: (f) => f.kwdefaults,
      fset: (f, value) => {
        f.kwdefaults = requireDict('__kwdefaults__', value);
      },
      fdel: (f) => {
        f.kwdefaults = null;
      },
    },
  ],
  [
    '__annotations__',
    {
      fget: (f) => f.annotations,
      fset: (f, value) => {
        f.annotations = requireDict('__annotations__', value);
      },
      fdel: (f) => {
        f.annotations = null;
      },
    },
  ],
  [
    '__dict__',
    {
      fget: (f) => f.dict,
      fset: (f, value) => {
        f.dict = requireDict('__dict__', value);
      },
      fdel: (f) => {
        f.dict = null;
      },
    },
  ],
  [
    '__name__',
    {
      fget: (f) => f.name,
      fset: (f, value) => {
        f.name = requireString('__name__', value);
      },
    },
  ],
  [
    '__qualname__',
    {
      fget: (f) => f.qualname,
      fset: (f, value) => {
        f.qualname = requireString('__qualname__', value);
      },
    },
  ],
  [
    '__doc__',
    {
      fget: (f) => f.doc,
      fset: (f, value) => {
        f.doc = value;
      },
      fdel: (f) => {
        f.doc = null;
      },
    },
  ],
  [
    '__module__',
    {
      fget: (f) => f.module,
      fset: (f, value) => {
        f.module = value;
      },
    },
  ],
  ['__globals__', { fget: (f) => f.globals }],
  [
    '__closure__',
    {
      // Copy so the cell sequence cannot be resized from outside
      fget: (f) => (f.closure.length === 0 ? null : [...f.closure]),
    },
  ],
]);

// ============================================================
// BOUND METHOD PROPERTIES
// ============================================================

/** Properties of bound methods. Other names are read off __func__. */
export const METHOD_PROPERTIES: PropertyTable<PyBoundMethod> = new Map<
  string,
  Property<PyBoundMethod>
>([
  ['__self__', { fget: (m) => m.self }],
  ['__func__', { fget: (m) => m.func }],
]);
