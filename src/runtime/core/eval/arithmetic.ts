/**
 * Arithmetic Evaluator
 *
 * +, -, *, /, %, ** on integers and floats, and array union for +.
 * Integer results that leave the 64-bit range become floats.
 *
 * Error Handling:
 * - Rejected operand types throw OperandTypeError
 * - Zero divisors for / and % throw DivisionByZeroError
 */

import { DivisionByZeroError, OperandMismatchError } from '../../../types.js';
import type { ArithmeticOperator, EvaluationMode } from '../../../types.js';
import { DEFAULT_CONTEXT } from '../context.js';
import type { EngineContext } from '../types.js';
import { floatValue, intOrFloat, intValue } from '../values.js';
import type { ArrayKey, ArrayValue, Value } from '../values.js';
import { applyRule, requireLegacy, runOperator, widenOperands } from './base.js';

/** Results beyond this magnitude cannot be an int64 */
const INT_RESULT_BOUND = 2 ** 64;

/** Key-wise union; keys already on the left win */
function arrayUnion(left: ArrayValue, right: ArrayValue): ArrayValue {
  const entries = new Map<ArrayKey, Value>(left.entries);
  for (const [key, value] of right.entries) {
    if (!entries.has(key)) entries.set(key, value);
  }
  return { type: 'array', entries };
}

/**
 * Integer power. Exact while the result fits int64, float otherwise;
 * negative exponents always give a float.
 */
function integerPower(base: bigint, exponent: bigint): Value {
  if (exponent < 0n) return floatValue(Number(base) ** Number(exponent));
  if (base === 0n || base === 1n) {
    return intValue(base === 0n && exponent === 0n ? 1n : base);
  }
  if (base === -1n) return intValue(exponent % 2n === 0n ? 1n : -1n);

  const approximate = Number(base) ** Number(exponent);
  if (Math.abs(approximate) > INT_RESULT_BOUND) {
    return floatValue(approximate);
  }
  return intOrFloat(base ** exponent);
}

function integerArithmetic(
  op: ArithmeticOperator,
  a: bigint,
  b: bigint
): Value {
  switch (op) {
    case '+':
      return intOrFloat(a + b);
    case '-':
      return intOrFloat(a - b);
    case '*':
      return intOrFloat(a * b);
    case '/':
      if (b === 0n) throw new DivisionByZeroError('/');
      return a % b === 0n
        ? intOrFloat(a / b)
        : floatValue(Number(a) / Number(b));
    case '%':
      if (b === 0n) throw new DivisionByZeroError('%');
      return intValue(a % b);
    case '**':
      return integerPower(a, b);
  }
}

/**
 * Float arithmetic on already widened operands.
 * `%` keeps the fractional remainder (fmod) rather than truncating both
 * operands to integers first, so 7.5 % 0.5 is 0.0, not a modulo by zero.
 */
function floatArithmetic(
  op: ArithmeticOperator,
  a: number,
  b: number
): Value {
  switch (op) {
    case '+':
      return floatValue(a + b);
    case '-':
      return floatValue(a - b);
    case '*':
      return floatValue(a * b);
    case '/':
      if (b === 0) throw new DivisionByZeroError('/');
      return floatValue(a / b);
    case '%':
      if (b === 0) throw new DivisionByZeroError('%');
      return floatValue(a % b);
    case '**':
      return floatValue(a ** b);
  }
}

/**
 * Evaluate an arithmetic operator.
 *
 * @example
 * evaluateArithmetic('+', floatValue(1.2), intValue(2), 'strict') // float(3.2)
 */
export function evaluateArithmetic(
  op: ArithmeticOperator,
  left: Value,
  right: Value,
  mode: EvaluationMode,
  ctx: EngineContext = DEFAULT_CONTEXT
): Value {
  return runOperator(ctx, op, mode, () => {
    const outcome = applyRule(ctx, op, mode, left, right);
    if (outcome.kind === 'legacy') {
      return requireLegacy(ctx, op).arithmetic(op, left, right);
    }

    const [l, r] = widenOperands(left, right, outcome);
    if (l.type === 'int' && r.type === 'int') {
      return integerArithmetic(op, l.value, r.value);
    }
    if (l.type === 'float' && r.type === 'float') {
      return floatArithmetic(op, l.value, r.value);
    }
    if (l.type === 'array' && r.type === 'array') {
      return arrayUnion(l, r);
    }
    throw new OperandMismatchError(op, l.type, r.type);
  });
}
