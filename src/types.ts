/**
 * Engine Types
 * Operator symbols, type tags and evaluation modes
 */

// ============================================================
// ERROR HIERARCHY
// ============================================================

export {
  ArithmeticError,
  ConfigError,
  createError,
  DivisionByZeroError,
  EngineError,
  type EngineErrorData,
  InternalError,
  OperandMismatchError,
  OperandTypeError,
  type OperandTypeErrorVariant,
  UnsupportedOperandError,
} from './error-classes.js';
export {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  renderMessage,
} from './error-registry.js';

// ============================================================
// TYPE TAGS AND MODES
// ============================================================

/** Closed set of semantic type categories a runtime value maps to */
export type TypeTag =
  | 'int'
  | 'float'
  | 'bool'
  | 'string'
  | 'null'
  | 'array'
  | 'object'
  | 'resource';

export const TYPE_TAGS: readonly TypeTag[] = [
  'int',
  'float',
  'bool',
  'string',
  'null',
  'array',
  'object',
  'resource',
];

/**
 * Evaluation mode of the compilation unit an operator sits in.
 * Resolved once per unit by the host and passed to every call.
 */
export type EvaluationMode = 'strict' | 'weak';

// ============================================================
// OPERATORS
// ============================================================

export type EqualityOperator = '==' | '!=';
export type RelationalOperator = '<' | '<=' | '>' | '>=' | '<=>';
export type IdentityOperator = '===' | '!==';
export type ComparisonOperator =
  | EqualityOperator
  | RelationalOperator
  | IdentityOperator;

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%' | '**';

export type BitwiseLogicOperator = '&' | '|' | '^';
export type ShiftOperator = '<<' | '>>';
export type BitwiseOperator = BitwiseLogicOperator | ShiftOperator;

export type ConcatOperator = '.';

export type LogicalOperator = '&&' | '||' | 'xor' | 'and' | 'or';

export type IncDecOperator = '++' | '--';

/** Operators taking two operands */
export type BinaryOperator =
  | ComparisonOperator
  | ArithmeticOperator
  | BitwiseOperator
  | ConcatOperator
  | LogicalOperator;

/** Operators taking one operand */
export type UnaryOperator = '~' | '!' | IncDecOperator;

export type Operator = BinaryOperator | UnaryOperator;

/** Operator category: selects the rule table and the evaluator */
export type OperatorCategory =
  | 'comparison'
  | 'arithmetic'
  | 'bitwise'
  | 'concat'
  | 'logical'
  | 'incdec';

const OPERATOR_CATEGORIES: Readonly<Record<Operator, OperatorCategory>> = {
  '==': 'comparison',
  '!=': 'comparison',
  '<': 'comparison',
  '<=': 'comparison',
  '>': 'comparison',
  '>=': 'comparison',
  '<=>': 'comparison',
  '===': 'comparison',
  '!==': 'comparison',
  '+': 'arithmetic',
  '-': 'arithmetic',
  '*': 'arithmetic',
  '/': 'arithmetic',
  '%': 'arithmetic',
  '**': 'arithmetic',
  '&': 'bitwise',
  '|': 'bitwise',
  '^': 'bitwise',
  '<<': 'bitwise',
  '>>': 'bitwise',
  '~': 'bitwise',
  '.': 'concat',
  '&&': 'logical',
  '||': 'logical',
  xor: 'logical',
  and: 'logical',
  or: 'logical',
  '!': 'logical',
  '++': 'incdec',
  '--': 'incdec',
};

/** Check if a string is an operator symbol the engine evaluates */
export function isOperator(symbol: string): symbol is Operator {
  return Object.prototype.hasOwnProperty.call(OPERATOR_CATEGORIES, symbol);
}

/** Check if an operator takes a single operand */
export function isUnaryOperator(op: Operator): op is UnaryOperator {
  return op === '~' || op === '!' || op === '++' || op === '--';
}

/** Category of an operator symbol */
export function operatorCategory(op: Operator): OperatorCategory {
  return OPERATOR_CATEGORIES[op];
}

export function isEqualityOperator(op: string): op is EqualityOperator {
  return op === '==' || op === '!=';
}

export function isIdentityOperator(op: string): op is IdentityOperator {
  return op === '===' || op === '!==';
}

export function isShiftOperator(op: string): op is ShiftOperator {
  return op === '<<' || op === '>>';
}
