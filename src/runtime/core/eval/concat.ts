/**
 * Concatenation Evaluator
 *
 * Both operands pass through the string cast: ints, floats, strings, null
 * and objects with a string conversion capability are accepted.
 */

import type { EvaluationMode } from '../../../types.js';
import { castToString } from '../coerce.js';
import { DEFAULT_CONTEXT } from '../context.js';
import type { EngineContext } from '../types.js';
import { stringValue } from '../values.js';
import type { Value } from '../values.js';
import { applyRule, requireLegacy, runOperator } from './base.js';

/** Objects reach the cast only with a string conversion capability */
function canCastToString(value: Value, ctx: EngineContext): boolean {
  return value.type !== 'object' || ctx.stringConversion(value) !== undefined;
}

/**
 * Evaluate string concatenation (.).
 *
 * @example
 * evaluateConcat(stringValue('n='), floatValue(0.5), 'strict')
 * // string(5) "n=0.5"
 */
export function evaluateConcat(
  left: Value,
  right: Value,
  mode: EvaluationMode,
  ctx: EngineContext = DEFAULT_CONTEXT
): Value {
  return runOperator(ctx, '.', mode, () => {
    const outcome = applyRule(ctx, '.', mode, left, right, (value) =>
      canCastToString(value, ctx)
    );
    if (outcome.kind === 'legacy') {
      return requireLegacy(ctx, '.').concat(left, right);
    }

    const head = castToString(left, ctx, '.');
    const tail = castToString(right, ctx, '.');
    return stringValue(head.value + tail.value);
  });
}
