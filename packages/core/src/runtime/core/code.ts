/**
 * Code Artifacts
 *
 * Immutable compiled representation of a function body. One code object
 * may back any number of function objects, one per evaluation of the
 * definition that produced it.
 */

import { isPyObject, type PyValue } from './values.js';

/** Compiled function body */
export interface PyCode {
  readonly __type: 'code';
  /** Name given at definition site */
  readonly name: string;
  /** Constant pool. A leading string is taken as the docstring. */
  readonly consts: readonly PyValue[];
  /** Names of variables captured from enclosing scopes, in closure order */
  readonly freevars: readonly string[];
}

/** Fields accepted by newCode() */
export interface CodeDefinition {
  readonly name: string;
  readonly consts?: readonly PyValue[] | undefined;
  readonly freevars?: readonly string[] | undefined;
}

/** Type guard for code objects */
export function isCode(value: PyValue): value is PyCode {
  return isPyObject(value) && value.__type === 'code';
}

/** Create a frozen code object */
export function newCode(definition: CodeDefinition): PyCode {
  return Object.freeze({
    __type: 'code',
    name: definition.name,
    consts: Object.freeze([...(definition.consts ?? [])]),
    freevars: Object.freeze([...(definition.freevars ?? [])]),
  });
}

/**
 * Docstring of a code object: the first constant when it is a string.
 *
 * Any leading string constant qualifies, whether or not the source wrote it
 * as a docstring expression.
 */
export function getDocstring(code: PyCode): PyValue {
  const first = code.consts[0];
  return typeof first === 'string' ? first : null;
}
