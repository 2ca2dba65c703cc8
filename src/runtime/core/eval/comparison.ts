/**
 * Comparison Evaluator
 *
 * ==, !=, <, <=, >, >=, <=> under the rule tables, and the mode-independent
 * identity operators === and !==.
 *
 * Error Handling:
 * - Rejected operand types throw OperandTypeError
 * - Objects of different classes under == / != throw OperandMismatchError
 *   with the class names
 */

import { OperandMismatchError } from '../../../types.js';
import type { ComparisonOperator, EvaluationMode } from '../../../types.js';
import { compareOrdered, isIdentical, structurallyEqual } from '../compare.js';
import { DEFAULT_CONTEXT } from '../context.js';
import type { EngineContext } from '../types.js';
import { boolValue, intValue } from '../values.js';
import type { Value } from '../values.js';
import { applyRule, requireLegacy, runOperator, widenOperands } from './base.js';

/**
 * Strict equality of two operands with equal tags.
 * Objects must share a class and are then compared structurally.
 */
function equalOperands(op: '==' | '!=', left: Value, right: Value): boolean {
  if (left.type === 'object' && right.type === 'object') {
    if (left.className !== right.className) {
      throw new OperandMismatchError(op, left.className, right.className);
    }
    return structurallyEqual(left, right);
  }
  return isIdentical(left, right);
}

/** Less or equal; unordered pairs (NaN) are neither */
function isNotGreater(order: -1 | 0 | 1 | null): boolean {
  return order === -1 || order === 0;
}

/**
 * Evaluate a comparison.
 *
 * @example
 * evaluateComparison('<', intValue(1), floatValue(1.5), 'strict') // bool(true)
 * evaluateComparison('>', stringValue('42'), intValue(10), 'strict')
 * // throws OperandMismatchError: Operand type mismatch string and int for >
 */
export function evaluateComparison(
  op: ComparisonOperator,
  left: Value,
  right: Value,
  mode: EvaluationMode,
  ctx: EngineContext = DEFAULT_CONTEXT
): Value {
  return runOperator(ctx, op, mode, () => {
    const outcome = applyRule(ctx, op, mode, left, right);

    if (op === '===' || op === '!==') {
      const identical = isIdentical(left, right);
      return boolValue(op === '===' ? identical : !identical);
    }

    if (outcome.kind === 'legacy') {
      return requireLegacy(ctx, op).compare(op, left, right);
    }

    const [l, r] = widenOperands(left, right, outcome);
    switch (op) {
      case '==':
        return boolValue(equalOperands(op, l, r));
      case '!=':
        return boolValue(!equalOperands(op, l, r));
      case '<=>':
        return intValue(compareOrdered(l, r) ?? 1);
      case '<':
        return boolValue(compareOrdered(l, r) === -1);
      case '>':
        return boolValue(compareOrdered(l, r) === 1);
      case '<=':
        return boolValue(isNotGreater(compareOrdered(l, r)));
      case '>=':
        return boolValue(isNotGreater(compareOrdered(r, l)));
    }
  });
}
