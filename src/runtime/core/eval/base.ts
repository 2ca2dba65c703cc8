/**
 * Evaluator Base
 *
 * Shared steps of every operator evaluator: resolve the rule for the
 * operand tags, report it, turn rejections into errors, widen operands,
 * and reach the legacy evaluator in weak mode.
 *
 * @internal
 */

import {
  EngineError,
  InternalError,
  OperandMismatchError,
  UnsupportedOperandError,
} from '../../../types.js';
import type {
  BinaryOperator,
  EvaluationMode,
  Operator,
  OperandTypeError,
  UnaryOperator,
} from '../../../types.js';
import { classify } from '../classify.js';
import { widen } from '../coerce.js';
import { resolveRule, resolveUnaryRule } from '../rules.js';
import type { Outcome, RejectReason } from '../rules.js';
import type { EngineContext, LegacyOperators } from '../types.js';
import type { Value } from '../values.js';

/** Outcome left once rejections have been thrown */
export type AcceptedOutcome = Exclude<Outcome, { kind: 'reject' }>;

function rejectionError(op: Operator, reason: RejectReason): OperandTypeError {
  return reason.variant === 'unsupported'
    ? new UnsupportedOperandError(op, reason.type)
    : new OperandMismatchError(op, reason.left, reason.right);
}

/**
 * Run one operator evaluation.
 * Engine errors raised inside are reported to onError, then rethrown
 * unchanged. Host errors from collaborators pass through unreported.
 */
export function runOperator<T>(
  ctx: EngineContext,
  op: Operator,
  mode: EvaluationMode,
  evaluate: () => T
): T {
  try {
    return evaluate();
  } catch (error) {
    if (error instanceof EngineError) {
      ctx.observability.onError?.({ operator: op, mode, error });
    }
    throw error;
  }
}

/** Value-level check an operand must pass on top of its tag's rule */
export type OperandCheck = (value: Value) => boolean;

/**
 * Narrow an accepted tag outcome by a value-level check, left operand
 * first. Legacy outcomes are left to the host.
 */
function checkOperands(
  outcome: Outcome,
  left: Value,
  right: Value,
  accepts: OperandCheck
): Outcome {
  if (outcome.kind === 'legacy') return outcome;
  if (!accepts(left)) {
    return {
      kind: 'reject',
      reason: { variant: 'unsupported', type: classify(left) },
    };
  }
  if (outcome.kind === 'reject' || accepts(right)) return outcome;
  return {
    kind: 'reject',
    reason: { variant: 'unsupported', type: classify(right) },
  };
}

/**
 * Resolve and report the rule for a binary application.
 *
 * @param accepts - Value-level check applied after the tag rule, for
 *   operators whose acceptance depends on more than the type tag
 * @throws OperandTypeError when the rule rejects the operand types
 */
export function applyRule(
  ctx: EngineContext,
  op: BinaryOperator,
  mode: EvaluationMode,
  left: Value,
  right: Value,
  accepts?: OperandCheck
): AcceptedOutcome {
  const leftType = classify(left);
  const rightType = classify(right);
  const resolved = resolveRule(op, mode, leftType, rightType);
  const outcome =
    accepts === undefined
      ? resolved
      : checkOperands(resolved, left, right, accepts);
  ctx.observability.onRule?.({
    operator: op,
    mode,
    leftType,
    rightType,
    outcome,
  });
  if (outcome.kind === 'reject') throw rejectionError(op, outcome.reason);
  return outcome;
}

/**
 * Resolve and report the rule for a unary application.
 * @throws UnsupportedOperandError when the operand type is rejected
 */
export function applyUnaryRule(
  ctx: EngineContext,
  op: UnaryOperator,
  mode: EvaluationMode,
  operand: Value
): AcceptedOutcome {
  const leftType = classify(operand);
  const outcome = resolveUnaryRule(op, mode, leftType);
  ctx.observability.onRule?.({ operator: op, mode, leftType, outcome });
  if (outcome.kind === 'reject') throw rejectionError(op, outcome.reason);
  return outcome;
}

/** Apply a widen outcome to the operand pair; other outcomes keep it as is */
export function widenOperands(
  left: Value,
  right: Value,
  outcome: AcceptedOutcome
): [Value, Value] {
  if (outcome.kind !== 'widen') return [left, right];
  return outcome.operand === 'left'
    ? [widen(left, outcome.target), right]
    : [left, widen(right, outcome.target)];
}

/**
 * Legacy evaluator for a weak mode application.
 * @throws InternalError (OPS-I002) when the host supplied none
 */
export function requireLegacy(
  ctx: EngineContext,
  op: Operator
): LegacyOperators {
  if (ctx.legacy === undefined) {
    throw new InternalError('OPS-I002', { operator: op });
  }
  return ctx.legacy;
}
