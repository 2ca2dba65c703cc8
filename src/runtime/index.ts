/**
 * Operator Runtime
 *
 * Public API for evaluating operator applications.
 *
 * Module Structure:
 * - core/: Evaluation engine
 *   - types.ts: Public types (EngineContext, EngineOptions, callbacks)
 *   - values.ts: Value union, constructors and truthiness
 *   - classify.ts: Type classifier
 *   - coerce.ts: Widening and string casts
 *   - format.ts: Float and value formatting
 *   - rules.ts: Operator rule tables
 *   - compare.ts: Identity, ordering and structural equality
 *   - context.ts: Engine context factory
 *   - evaluate.ts: Dispatch by operator symbol
 *   - eval/: One evaluator per operator category, plus the switch matcher
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  EngineContext,
  EngineOptions,
  ErrorEvent,
  LegacyOperators,
  ObservabilityCallbacks,
  RuleEvent,
  StringConversionLookup,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export {
  type ArrayKey,
  type ArrayValue,
  arrayValue,
  type BoolValue,
  boolValue,
  FALSE_VALUE,
  fitsInt,
  type FloatValue,
  floatValue,
  INT_MAX,
  INT_MIN,
  type IntValue,
  intOrFloat,
  intValue,
  isArray,
  isFloat,
  isInt,
  isObject,
  isScalar,
  isTruthy,
  listValue,
  normalizeArrayKey,
  NULL_VALUE,
  type NullValue,
  type ObjectOptions,
  type ObjectValue,
  objectValue,
  type ResourceValue,
  resourceValue,
  type StringConverter,
  type StringValue,
  stringValue,
  TRUE_VALUE,
  type Value,
} from './core/values.js';

// ============================================================
// CLASSIFICATION AND COERCION
// ============================================================

export { classify, describeType, isNumericTag } from './core/classify.js';
export { castToString, widen } from './core/coerce.js';
export { CAST_PRECISION, formatFloat, formatValue } from './core/format.js';

// ============================================================
// RULE TABLES AND COMPARATORS
// ============================================================

export {
  describeOutcome,
  type Outcome,
  type RejectReason,
  resolveRule,
  resolveUnaryRule,
} from './core/rules.js';
export {
  compareOrdered,
  isIdentical,
  structurallyEqual,
} from './core/compare.js';

// ============================================================
// EVALUATION
// ============================================================

export { createEngineContext, DEFAULT_CONTEXT } from './core/context.js';
export { evaluateOperator } from './core/evaluate.js';
export { evaluateArithmetic } from './core/eval/arithmetic.js';
export {
  evaluateBitwise,
  evaluateBitwiseNot,
} from './core/eval/bitwise.js';
export { evaluateComparison } from './core/eval/comparison.js';
export { evaluateConcat } from './core/eval/concat.js';
export { evaluateIncDec } from './core/eval/incdec.js';
export {
  evaluateLogical,
  evaluateLogicalNot,
} from './core/eval/logical.js';
export {
  type CaseLabel,
  type DefaultCase,
  matchCase,
  selectCase,
} from './core/eval/switch.js';
