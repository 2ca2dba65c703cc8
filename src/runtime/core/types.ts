/**
 * Runtime Types
 *
 * Public types for engine configuration: host collaborators and
 * observability callbacks. These types are the primary interface for
 * host applications.
 */

import type {
  ArithmeticOperator,
  BitwiseOperator,
  EngineError,
  EqualityOperator,
  EvaluationMode,
  IncDecOperator,
  Operator,
  RelationalOperator,
  TypeTag,
} from '../../types.js';
import type { Outcome } from './rules.js';
import type { ObjectValue, StringConverter, Value } from './values.js';

/**
 * Legacy (weak mode) operator semantics supplied by the host.
 * The engine forwards weak-mode applications here unchanged and never
 * interprets the results.
 */
export interface LegacyOperators {
  compare(
    op: EqualityOperator | RelationalOperator,
    left: Value,
    right: Value
  ): Value;
  arithmetic(op: ArithmeticOperator, left: Value, right: Value): Value;
  bitwise(op: BitwiseOperator, left: Value, right: Value): Value;
  bitwiseNot(operand: Value): Value;
  concat(left: Value, right: Value): Value;
  incDec(op: IncDecOperator, operand: Value): Value;
}

/** Looks up an object's string conversion capability */
export type StringConversionLookup = (
  object: ObjectValue
) => StringConverter | undefined;

/** Observability callbacks for monitoring evaluation */
export interface ObservabilityCallbacks {
  /** Called after the rule tables decide an operator application */
  onRule?: (event: RuleEvent) => void;
  /** Called before an engine error is thrown */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted when a rule is resolved */
export interface RuleEvent {
  operator: Operator;
  mode: EvaluationMode;
  leftType: TypeTag;
  /** Absent for unary operators */
  rightType?: TypeTag | undefined;
  outcome: Outcome;
}

/** Event emitted on error */
export interface ErrorEvent {
  operator: Operator;
  mode: EvaluationMode;
  error: EngineError;
}

/**
 * Engine context with host collaborators and callbacks.
 * Frozen at creation; the engine holds no state between calls.
 */
export interface EngineContext {
  /** Weak mode semantics (undefined = weak mode unavailable) */
  readonly legacy: LegacyOperators | undefined;
  /** Truthiness rule used by logical operators */
  readonly truthiness: (value: Value) => boolean;
  /** String conversion capability lookup used by casts and concatenation */
  readonly stringConversion: StringConversionLookup;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
}

/** Options for creating an engine context */
export interface EngineOptions {
  legacy?: LegacyOperators | undefined;
  truthiness?: ((value: Value) => boolean) | undefined;
  stringConversion?: StringConversionLookup | undefined;
  observability?: ObservabilityCallbacks | undefined;
}
