/**
 * Runtime Value Types and Utilities
 *
 * Core value types that flow through the runtime.
 * Public API for host applications.
 */

import { createError } from '../../error-classes.js';
import { isCode } from './code.js';
import { isFunction } from './function.js';
import { isBoundMethod } from './method.js';

/** Discriminant carried by every runtime object */
export type PyObjectKind = 'code' | 'cell' | 'function' | 'method';

// Structural marker only - concrete object types live in code.ts,
// function.ts and method.ts, which import PyValue from here.
export interface PyObjectMarker {
  readonly __type: PyObjectKind;
}

/** String-keyed mapping (dict). Used for globals, kwdefaults, annotations and __dict__. */
export type StringDict = Map<string, PyValue>;

/**
 * Any value that can flow through the runtime.
 *
 * - null: None (also the "absent" marker for optional slots)
 * - arrays: tuples (ordered sequences)
 * - Map: dicts
 */
export type PyValue =
  | null
  | boolean
  | number
  | string
  | PyValue[]
  | StringDict
  | PyObjectMarker;

/**
 * Single-slot shared storage for a captured variable.
 * Every function holding the cell sees writes made through any holder.
 */
export interface PyCell {
  readonly __type: 'cell';
  /** Current contents (undefined = empty) */
  contents: PyValue | undefined;
}

/** Type guard for runtime objects (code, cell, function, method) */
export function isPyObject(value: PyValue): value is PyObjectMarker {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map)
  );
}

/** Type guard for dicts */
export function isStringDict(value: PyValue): value is StringDict {
  return value instanceof Map;
}

/** Type guard for tuples */
export function isSequence(value: PyValue): value is PyValue[] {
  return Array.isArray(value);
}

/** Type guard for cells */
export function isCell(value: PyValue): value is PyCell {
  return isPyObject(value) && value.__type === 'cell';
}

/** Create a cell, empty unless an initial value is given */
export function newCell(contents?: PyValue): PyCell {
  return { __type: 'cell', contents };
}

/**
 * Read a cell.
 * @param cellName - Variable name used in the error message
 * @throws PyValueError (PY-V002) when the cell is empty
 */
export function getCellContents(cell: PyCell, cellName = '?'): PyValue {
  if (cell.contents === undefined) {
    throw createError('PY-V002', { cellName });
  }
  return cell.contents;
}

/** Write a cell. Visible to every closure holding it. */
export function setCellContents(cell: PyCell, value: PyValue): void {
  cell.contents = value;
}

/** Type name of a runtime value as the language reports it */
export function typeName(value: PyValue): string {
  if (value === null) return 'NoneType';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'string') return 'str';
  if (isSequence(value)) return 'tuple';
  if (isStringDict(value)) return 'dict';
  return value.__type;
}

/** Quote a string the way repr() does */
function quoteString(value: string): string {
  const escaped = value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  return `'${escaped}'`;
}

/** Format a value for display (repr-style) */
export function formatValue(value: PyValue): string {
  if (value === null) return 'None';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return quoteString(value);
  if (isSequence(value)) {
    if (value.length === 1) return `(${formatValue(value[0] ?? null)},)`;
    return `(${value.map(formatValue).join(', ')})`;
  }
  if (isStringDict(value)) {
    const entries = [...value].map(
      ([key, v]) => `${quoteString(key)}: ${formatValue(v)}`
    );
    return `{${entries.join(', ')}}`;
  }
  return formatObject(value);
}

function formatObject(value: PyObjectMarker): string {
  if (isCell(value)) {
    return value.contents === undefined
      ? '<cell: empty>'
      : `<cell: ${formatValue(value.contents)}>`;
  }
  if (isCode(value)) return `<code object ${value.name}>`;
  if (isFunction(value)) return `<function ${value.qualname}>`;
  if (isBoundMethod(value)) {
    return `<bound method ${value.func.qualname} of ${formatValue(value.self)}>`;
  }
  return `<${value.__type} object>`;
}
