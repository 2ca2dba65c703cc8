/**
 * Operator Dispatch
 *
 * Single entry point that routes an operator symbol and its operands to
 * the evaluator for its category. Used by hosts that keep operators as
 * symbols, and by the CLI.
 */

import { InternalError, isUnaryOperator } from '../../types.js';
import type {
  BinaryOperator,
  EvaluationMode,
  Operator,
  UnaryOperator,
} from '../../types.js';
import { DEFAULT_CONTEXT } from './context.js';
import { evaluateArithmetic } from './eval/arithmetic.js';
import { evaluateBitwise, evaluateBitwiseNot } from './eval/bitwise.js';
import { evaluateComparison } from './eval/comparison.js';
import { evaluateConcat } from './eval/concat.js';
import { evaluateIncDec } from './eval/incdec.js';
import { evaluateLogical, evaluateLogicalNot } from './eval/logical.js';
import type { EngineContext } from './types.js';
import type { Value } from './values.js';

function evaluateUnary(
  op: UnaryOperator,
  operand: Value,
  mode: EvaluationMode,
  ctx: EngineContext
): Value {
  switch (op) {
    case '~':
      return evaluateBitwiseNot(operand, mode, ctx);
    case '!':
      return evaluateLogicalNot(operand, ctx);
    case '++':
    case '--':
      return evaluateIncDec(op, operand, mode, ctx);
  }
}

function evaluateBinary(
  op: BinaryOperator,
  left: Value,
  right: Value,
  mode: EvaluationMode,
  ctx: EngineContext
): Value {
  switch (op) {
    case '==':
    case '!=':
    case '<':
    case '<=':
    case '>':
    case '>=':
    case '<=>':
    case '===':
    case '!==':
      return evaluateComparison(op, left, right, mode, ctx);
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
    case '**':
      return evaluateArithmetic(op, left, right, mode, ctx);
    case '&':
    case '|':
    case '^':
    case '<<':
    case '>>':
      return evaluateBitwise(op, left, right, mode, ctx);
    case '.':
      return evaluateConcat(left, right, mode, ctx);
    case '&&':
    case '||':
    case 'xor':
    case 'and':
    case 'or':
      return evaluateLogical(op, left, right, ctx);
  }
}

/**
 * Evaluate any operator by symbol.
 *
 * @throws InternalError (OPS-I004) when the operand count does not fit the operator
 *
 * @example
 * evaluateOperator('**', [intValue(2), intValue(10)], 'strict') // int(1024)
 */
export function evaluateOperator(
  op: Operator,
  operands: readonly Value[],
  mode: EvaluationMode,
  ctx: EngineContext = DEFAULT_CONTEXT
): Value {
  const expected = isUnaryOperator(op) ? 1 : 2;
  const [first, second] = operands;
  const arityError = (): InternalError =>
    new InternalError('OPS-I004', {
      operator: op,
      expected,
      actual: operands.length,
    });

  if (operands.length !== expected || first === undefined) throw arityError();
  if (isUnaryOperator(op)) return evaluateUnary(op, first, mode, ctx);
  if (second === undefined) throw arityError();
  return evaluateBinary(op, first, second, mode, ctx);
}
