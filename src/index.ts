/**
 * Strict Operators Module
 * Exports the operator engine, its types and its errors
 */

export * from './runtime/index.js';
export {
  ArithmeticError,
  type ArithmeticOperator,
  type BinaryOperator,
  type BitwiseLogicOperator,
  type BitwiseOperator,
  type ComparisonOperator,
  type ConcatOperator,
  ConfigError,
  createError,
  DivisionByZeroError,
  EngineError,
  type EngineErrorData,
  type EqualityOperator,
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type EvaluationMode,
  type IdentityOperator,
  type IncDecOperator,
  InternalError,
  isOperator,
  isUnaryOperator,
  type LogicalOperator,
  OperandMismatchError,
  OperandTypeError,
  type OperandTypeErrorVariant,
  type Operator,
  type OperatorCategory,
  operatorCategory,
  type RelationalOperator,
  renderMessage,
  type ShiftOperator,
  TYPE_TAGS,
  type TypeTag,
  type UnaryOperator,
  UnsupportedOperandError,
} from './types.js';
