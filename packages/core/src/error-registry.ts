/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 *
 * - type: value has the wrong category for the slot (T)
 * - value: right category, structural invariant violated (V)
 * - attribute: attribute missing, read-only or undeletable (A)
 * - runtime: runtime misconfiguration (R)
 */
export type ErrorCategory = 'type' | 'value' | 'attribute' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: PY-{category}{3-digit} (e.g., PY-T001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error (max 200 characters) */
  readonly cause?: string | undefined;
  /** How to resolve this error (max 300 characters) */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Type Errors (PY-T0xx)
  {
    errorId: 'PY-T001',
    category: 'type',
    description: 'Attribute type mismatch',
    messageTemplate:
      "{attribute} must be set to a {expected} object, not '{actual}'",
    cause:
      'A function attribute was assigned a value of the wrong category, such as an int for __defaults__.',
    resolution:
      'Assign a value of the expected category: a tuple for __defaults__, a dict for __kwdefaults__, __annotations__ and __dict__, a str for __name__ and __qualname__.',
  },
  {
    errorId: 'PY-T002',
    category: 'type',
    description: 'Object not callable',
    messageTemplate: "'{typeName}' object is not callable",
    cause: 'A call was dispatched to a value that is neither a function nor a bound method.',
    resolution: 'Check the value before calling it with isCallable().',
  },

  // Value Errors (PY-V0xx)
  {
    errorId: 'PY-V001',
    category: 'value',
    description: 'Free variable count mismatch',
    messageTemplate:
      '{functionName}() requires a code object with {expected} free vars, not {actual}',
    cause:
      "The code object assigned to __code__ captures a different number of free variables than the function's closure holds.",
    resolution:
      'Assign a code object compiled from a body that captures the same free variables.',
  },
  {
    errorId: 'PY-V002',
    category: 'value',
    description: 'Empty cell',
    messageTemplate: "cell '{cellName}' is empty",
    cause: 'A cell was read before the enclosing scope assigned its variable.',
    resolution: 'Assign the captured variable before the inner function reads it.',
  },

  // Attribute Errors (PY-A0xx)
  {
    errorId: 'PY-A001',
    category: 'attribute',
    description: 'Read-only attribute',
    messageTemplate: "readonly attribute '{attribute}' of '{typeName}' object",
    cause: 'Assignment to an attribute that only has a getter.',
    resolution: 'Read the attribute instead, or create a new object.',
  },
  {
    errorId: 'PY-A002',
    category: 'attribute',
    description: 'Undeletable attribute',
    messageTemplate:
      "cannot delete attribute '{attribute}' of '{typeName}' object",
    cause: 'Deletion of an attribute that has no deleter, such as __name__ or __code__.',
    resolution: 'Assign a new value instead of deleting.',
  },
  {
    errorId: 'PY-A003',
    category: 'attribute',
    description: 'Missing attribute',
    messageTemplate: "'{typeName}' object has no attribute '{attribute}'",
    cause: "The name is neither a built-in attribute nor a key of the object's __dict__.",
    resolution: 'Set the attribute before reading or deleting it.',
  },

  // Runtime Errors (PY-R0xx)
  {
    errorId: 'PY-R001',
    category: 'runtime',
    description: 'No evaluator configured',
    messageTemplate: 'cannot call {functionName}(): no evaluator configured',
    cause: 'A function was called through a runtime context created without an evaluator.',
    resolution: 'Pass an evaluator to createRuntimeContext({ evaluator }).',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "str", actual: "int"})
 * // Returns: "Expected str, got int"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        // Unclosed brace
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
