/**
 * Logical Evaluator
 *
 * &&, ||, xor (plus the keyword forms and, or) and !. Independent of the
 * evaluation mode: operands go through the host truthiness rule and the
 * result is always a bool. Short-circuiting belongs to the host, which
 * decides whether to evaluate the right operand at all.
 */

import type { LogicalOperator } from '../../../types.js';
import { DEFAULT_CONTEXT } from '../context.js';
import type { EngineContext } from '../types.js';
import { boolValue } from '../values.js';
import type { BoolValue, Value } from '../values.js';

export function evaluateLogical(
  op: LogicalOperator,
  left: Value,
  right: Value,
  ctx: EngineContext = DEFAULT_CONTEXT
): BoolValue {
  const a = ctx.truthiness(left);
  const b = ctx.truthiness(right);
  switch (op) {
    case '&&':
    case 'and':
      return boolValue(a && b);
    case '||':
    case 'or':
      return boolValue(a || b);
    case 'xor':
      return boolValue(a !== b);
  }
}

export function evaluateLogicalNot(
  operand: Value,
  ctx: EngineContext = DEFAULT_CONTEXT
): BoolValue {
  return boolValue(!ctx.truthiness(operand));
}
