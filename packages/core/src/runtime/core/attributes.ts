/**
 * Attribute Access
 *
 * Generic get/set/delete for runtime objects. The static property tables
 * are the only dispatch point for named fields; any other name goes to the
 * object's open __dict__.
 *
 * Public API for host applications.
 */

import { createError } from '../../error-classes.js';
import {
  FUNCTION_PROPERTIES,
  METHOD_PROPERTIES,
  type Property,
} from './descriptors.js';
import { isFunction, type PyFunction } from './function.js';
import { isBoundMethod } from './method.js';
import { typeName, type PyValue } from './values.js';

function missingAttribute(obj: PyValue, attribute: string): Error {
  return createError('PY-A003', { typeName: typeName(obj), attribute });
}

function readonlyAttribute(obj: PyValue, attribute: string): Error {
  return createError('PY-A001', { typeName: typeName(obj), attribute });
}

function undeletableAttribute(obj: PyValue, attribute: string): Error {
  return createError('PY-A002', { typeName: typeName(obj), attribute });
}

/**
 * Read an attribute.
 *
 * Bound methods answer __self__ and __func__ themselves and read every other
 * name off the underlying function.
 *
 * @throws PyAttributeError (PY-A003) if the attribute does not exist
 */
export function getAttribute(obj: PyValue, name: string): PyValue {
  if (isFunction(obj)) {
    const property = FUNCTION_PROPERTIES.get(name);
    if (property) {
      return property.fget(obj);
    }
    const value = obj.dict?.get(name);
    if (value === undefined) {
      throw missingAttribute(obj, name);
    }
    return value;
  }

  if (isBoundMethod(obj)) {
    const property = METHOD_PROPERTIES.get(name);
    if (property) {
      return property.fget(obj);
    }
    return getAttribute(obj.func, name);
  }

  throw missingAttribute(obj, name);
}

/**
 * Write an attribute.
 *
 * Names without a property land in __dict__, which is created on first use.
 *
 * @throws PyTypeError / PyValueError from the property's setter
 * @throws PyAttributeError (PY-A001) if the property is read-only
 * @throws PyAttributeError (PY-A003) if the object has no such attribute
 */
export function setAttribute(obj: PyValue, name: string, value: PyValue): void {
  if (isFunction(obj)) {
    const property = FUNCTION_PROPERTIES.get(name);
    if (property) {
      writeProperty(property, obj, name, value);
      return;
    }
    ensureDict(obj).set(name, value);
    return;
  }

  if (isBoundMethod(obj) && METHOD_PROPERTIES.has(name)) {
    throw readonlyAttribute(obj, name);
  }
  throw missingAttribute(obj, name);
}

/**
 * Delete an attribute.
 *
 * Deleting an optional field that is already absent is a no-op.
 *
 * @throws PyAttributeError (PY-A002) if the property has no deleter
 * @throws PyAttributeError (PY-A003) if a __dict__ entry does not exist
 */
export function deleteAttribute(obj: PyValue, name: string): void {
  if (isFunction(obj)) {
    const property = FUNCTION_PROPERTIES.get(name);
    if (property) {
      if (!property.fdel) {
        throw undeletableAttribute(obj, name);
      }
      property.fdel(obj);
      return;
    }
    if (!obj.dict?.delete(name)) {
      throw missingAttribute(obj, name);
    }
    return;
  }

  if (isBoundMethod(obj) && METHOD_PROPERTIES.has(name)) {
    throw undeletableAttribute(obj, name);
  }
  throw missingAttribute(obj, name);
}

/** Check whether getAttribute() would succeed */
export function hasAttribute(obj: PyValue, name: string): boolean {
  if (isFunction(obj)) {
    return FUNCTION_PROPERTIES.has(name) || (obj.dict?.has(name) ?? false);
  }
  if (isBoundMethod(obj)) {
    return METHOD_PROPERTIES.has(name) || hasAttribute(obj.func, name);
  }
  return false;
}

/** Sorted attribute names of a function: properties plus __dict__ keys */
export function listAttributes(fn: PyFunction): string[] {
  const names = new Set<string>(FUNCTION_PROPERTIES.keys());
  for (const key of fn.dict?.keys() ?? []) {
    names.add(key);
  }
  return [...names].sort();
}

function writeProperty<T extends PyValue>(
  property: Property<T>,
  obj: T,
  name: string,
  value: PyValue
): void {
  if (!property.fset) {
    throw readonlyAttribute(obj, name);
  }
  property.fset(obj, value);
}

function ensureDict(fn: PyFunction): Map<string, PyValue> {
  if (fn.dict === null) {
    fn.dict = new Map();
  }
  return fn.dict;
}
