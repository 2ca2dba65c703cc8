/**
 * Increment/Decrement Evaluator
 *
 * ++ and -- on ints and floats only. Returns the new value; whether the
 * old or new value is the expression result (prefix or postfix) is the
 * host's concern.
 */

import { UnsupportedOperandError } from '../../../types.js';
import type { EvaluationMode, IncDecOperator } from '../../../types.js';
import { DEFAULT_CONTEXT } from '../context.js';
import type { EngineContext } from '../types.js';
import { floatValue, intOrFloat } from '../values.js';
import type { Value } from '../values.js';
import { applyUnaryRule, requireLegacy, runOperator } from './base.js';

/**
 * Evaluate ++ or --.
 * An int stepping past the 64-bit range becomes a float.
 *
 * @example
 * evaluateIncDec('++', intValue(INT_MAX), 'strict') // float(9.223372036854776E+18)
 * evaluateIncDec('++', stringValue('a'), 'strict')  // throws UnsupportedOperandError
 */
export function evaluateIncDec(
  op: IncDecOperator,
  operand: Value,
  mode: EvaluationMode,
  ctx: EngineContext = DEFAULT_CONTEXT
): Value {
  return runOperator(ctx, op, mode, () => {
    const outcome = applyUnaryRule(ctx, op, mode, operand);
    if (outcome.kind === 'legacy') {
      return requireLegacy(ctx, op).incDec(op, operand);
    }

    const step = op === '++' ? 1 : -1;
    if (operand.type === 'int') {
      return intOrFloat(operand.value + BigInt(step));
    }
    if (operand.type === 'float') return floatValue(operand.value + step);
    throw new UnsupportedOperandError(op, operand.type);
  });
}
