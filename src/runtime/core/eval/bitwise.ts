/**
 * Bitwise Evaluator
 *
 * &, |, ^ and ~ on integers or byte strings; << and >> on integers only.
 *
 * Error Handling:
 * - Rejected operand types throw OperandTypeError
 * - Negative shift counts throw ArithmeticError (OPS-A003)
 */

import {
  ArithmeticError,
  isShiftOperator,
  OperandMismatchError,
  UnsupportedOperandError,
} from '../../../types.js';
import type {
  BitwiseLogicOperator,
  BitwiseOperator,
  EvaluationMode,
} from '../../../types.js';
import { DEFAULT_CONTEXT } from '../context.js';
import type { EngineContext } from '../types.js';
import { intValue, stringValue } from '../values.js';
import type { Value } from '../values.js';
import {
  applyRule,
  applyUnaryRule,
  requireLegacy,
  runOperator,
} from './base.js';

const INT_BITS = 64n;

function byteAt(text: string, index: number): number {
  return index < text.length ? text.charCodeAt(index) & 0xff : 0;
}

/**
 * Byte-wise logic on two byte strings.
 * & and ^ stop at the shorter operand; | runs to the longer one, so the
 * longer operand's tail is copied through.
 */
function bytewise(op: BitwiseLogicOperator, a: string, b: string): string {
  const length =
    op === '|' ? Math.max(a.length, b.length) : Math.min(a.length, b.length);
  let result = '';
  for (let i = 0; i < length; i++) {
    const x = byteAt(a, i);
    const y = byteAt(b, i);
    const byte = op === '&' ? x & y : op === '|' ? x | y : x ^ y;
    result += String.fromCharCode(byte);
  }
  return result;
}

function integerBitwise(op: BitwiseOperator, a: bigint, b: bigint): Value {
  switch (op) {
    case '&':
      return intValue(a & b);
    case '|':
      return intValue(a | b);
    case '^':
      return intValue(a ^ b);
    case '<<':
      if (b < 0n) throw new ArithmeticError('OPS-A003', op);
      return intValue(b >= INT_BITS ? 0n : BigInt.asIntN(64, a << b));
    case '>>':
      if (b < 0n) throw new ArithmeticError('OPS-A003', op);
      if (b >= INT_BITS) return intValue(a < 0n ? -1n : 0n);
      return intValue(a >> b);
  }
}

/**
 * Evaluate a binary bitwise operator.
 *
 * @example
 * evaluateBitwise('|', stringValue('a'), stringValue('  '), 'strict')
 * // string(2) "a "
 */
export function evaluateBitwise(
  op: BitwiseOperator,
  left: Value,
  right: Value,
  mode: EvaluationMode,
  ctx: EngineContext = DEFAULT_CONTEXT
): Value {
  return runOperator(ctx, op, mode, () => {
    const outcome = applyRule(ctx, op, mode, left, right);
    if (outcome.kind === 'legacy') {
      return requireLegacy(ctx, op).bitwise(op, left, right);
    }

    if (left.type === 'int' && right.type === 'int') {
      return integerBitwise(op, left.value, right.value);
    }
    if (
      left.type === 'string' &&
      right.type === 'string' &&
      !isShiftOperator(op)
    ) {
      return stringValue(bytewise(op, left.value, right.value));
    }
    throw new OperandMismatchError(op, left.type, right.type);
  });
}

/** Evaluate unary bitwise complement (~) */
export function evaluateBitwiseNot(
  operand: Value,
  mode: EvaluationMode,
  ctx: EngineContext = DEFAULT_CONTEXT
): Value {
  return runOperator(ctx, '~', mode, () => {
    const outcome = applyUnaryRule(ctx, '~', mode, operand);
    if (outcome.kind === 'legacy') {
      return requireLegacy(ctx, '~').bitwiseNot(operand);
    }

    if (operand.type === 'int') return intValue(~operand.value);
    if (operand.type === 'string') {
      let result = '';
      for (let i = 0; i < operand.value.length; i++) {
        result += String.fromCharCode(~byteAt(operand.value, i) & 0xff);
      }
      return stringValue(result);
    }
    throw new UnsupportedOperandError('~', operand.type);
  });
}
