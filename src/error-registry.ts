/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'type' | 'arithmetic' | 'internal' | 'config';

/**
 * Example demonstrating an error condition.
 * Used by `strict-ops explain` to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Operator application demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: OPS-{category letter}{3-digit} (e.g., OPS-T001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  /** Example scenarios demonstrating this error (max 3 entries) */
  readonly examples?: readonly ErrorExample[] | undefined;
}

/** Error ID format: OPS-{T|A|I|C}{3-digit} */
export const ERROR_ID_PATTERN = /^OPS-[TAIC]\d{3}$/;

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

  constructor(definitions: readonly ErrorDefinition[]) {
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

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Type Errors (OPS-T0xx)
  {
    errorId: 'OPS-T001',
    category: 'type',
    description: 'Unsupported operand type',
    messageTemplate: 'Unsupported operand type {type} for {operator}',
    cause:
      'The operator does not accept a value of this type at all, whatever the other operand is.',
    resolution:
      'Convert the operand explicitly with a typecast, or use an operator or function made for this type (e.g. strcmp for string ordering).',
    examples: [
      {
        description: 'Ordering strings',
        code: '"foo" > "bar"',
      },
      {
        description: 'Comparing arrays with ==',
        code: '[10] == []',
      },
      {
        description: 'Incrementing a string',
        code: '$s = "a"; $s++',
      },
    ],
  },
  {
    errorId: 'OPS-T002',
    category: 'type',
    description: 'Operand type mismatch',
    messageTemplate: 'Operand type mismatch {left} and {right} for {operator}',
    cause:
      'Both operand types are accepted by the operator, but not in combination with each other.',
    resolution:
      'Cast one operand so both sides share a type. Integer and float operands are the only pair widened implicitly.',
    examples: [
      {
        description: 'Numeric string against integer',
        code: '"42" > 10',
      },
      {
        description: 'Objects of different classes',
        code: 'new A() == new B()',
      },
    ],
  },

  // Arithmetic Errors (OPS-A0xx)
  {
    errorId: 'OPS-A001',
    category: 'arithmetic',
    description: 'Division by zero',
    messageTemplate: 'Division by zero',
    cause: 'The right operand of / is integer 0 or float 0.0.',
    resolution: 'Check the divisor before dividing.',
    examples: [{ description: 'Dividing by zero', code: '1 / 0' }],
  },
  {
    errorId: 'OPS-A002',
    category: 'arithmetic',
    description: 'Modulo by zero',
    messageTemplate: 'Modulo by zero',
    cause: 'The right operand of % is integer 0 or float 0.0.',
    resolution: 'Check the divisor before taking the remainder.',
    examples: [{ description: 'Remainder by zero', code: '7 % 0' }],
  },
  {
    errorId: 'OPS-A003',
    category: 'arithmetic',
    description: 'Bit shift by negative number',
    messageTemplate: 'Bit shift by negative number',
    cause: 'The right operand of << or >> is negative.',
    resolution: 'Shift in the opposite direction with a positive count.',
    examples: [{ description: 'Negative shift count', code: '1 << -1' }],
  },

  // Internal Errors (OPS-I0xx)
  {
    errorId: 'OPS-I001',
    category: 'internal',
    description: 'Widening not sanctioned',
    messageTemplate: 'Cannot widen {from} to {to}',
    cause:
      'A caller requested an implicit conversion other than integer to float.',
    resolution:
      'Only request widening when the rule tables return a widen outcome.',
  },
  {
    errorId: 'OPS-I002',
    category: 'internal',
    description: 'Legacy evaluator missing',
    messageTemplate:
      'Weak mode evaluation of {operator} requires a legacy operator evaluator',
    cause:
      'An operator was evaluated in weak mode but the engine context has no legacy evaluator.',
    resolution:
      'Pass a legacy evaluator to createEngineContext({ legacy }) or evaluate in strict mode.',
  },
  {
    errorId: 'OPS-I003',
    category: 'internal',
    description: 'Unknown operator',
    messageTemplate: 'Unknown operator {operator}',
    cause: 'The operator symbol is not one the engine evaluates.',
    resolution:
      'Use one of the comparison, arithmetic, bitwise, concatenation, logical or increment operators.',
  },
  {
    errorId: 'OPS-I004',
    category: 'internal',
    description: 'Wrong operand count',
    messageTemplate:
      'Operator {operator} takes {expected} operand(s), got {actual}',
    cause:
      'The dispatcher received a different number of operands than the operator takes.',
    resolution:
      'Pass one operand for ~, !, ++ and --, and two for every other operator.',
  },

  // Configuration Errors (OPS-C0xx)
  {
    errorId: 'OPS-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'The .strict-ops.yaml file is malformed or holds unknown keys.',
    resolution:
      'Keep to the keys trace and explain, each set to true or false.',
    examples: [
      {
        description: 'Unknown key',
        code: 'mode: strict',
      },
    ],
  },
  {
    errorId: 'OPS-C002',
    category: 'config',
    description: 'Invalid operand literal',
    messageTemplate: 'Cannot read operand {text}: {reason}',
    cause: 'A CLI operand is not a YAML flow literal the engine can convert.',
    resolution:
      'Write operands as YAML flow values: 1, 1.5, "text", true, null, [1, 2], {a: 1} or {$class: Point, x: 1}.',
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
 * renderMessage("Cannot widen {from} to {to}", {from: "bool", to: "float"})
 * // Returns: "Cannot widen bool to float"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
