/**
 * Operator Rule Tables
 *
 * Maps (operator, mode, left tag, right tag) to an outcome. Under strict
 * mode the outcome depends on the tags alone, never on operand values.
 *
 * Precedence inside every table: an operand whose type the operator does
 * not accept at all is reported as unsupported (left operand first) before
 * any mismatch between two accepted types. Ordering comparisons between
 * two different scalar types are the one place a mismatch is reported
 * first.
 */

import type {
  BinaryOperator,
  EvaluationMode,
  TypeTag,
  UnaryOperator,
} from '../../types.js';

// ============================================================
// OUTCOMES
// ============================================================

export type RejectReason =
  | { readonly variant: 'unsupported'; readonly type: TypeTag }
  | {
      readonly variant: 'mismatch';
      readonly left: TypeTag;
      readonly right: TypeTag;
    };

/**
 * Decision for one operator application.
 * - compute: operate on the operands as they are
 * - widen: convert the integer operand on `operand` side to float, then compute
 * - reject: raise the operand type error described by `reason`
 * - legacy: weak mode, hand the application to the host's legacy evaluator
 */
export type Outcome =
  | { readonly kind: 'compute' }
  | {
      readonly kind: 'widen';
      readonly operand: 'left' | 'right';
      readonly target: 'float';
    }
  | { readonly kind: 'reject'; readonly reason: RejectReason }
  | { readonly kind: 'legacy' };

const COMPUTE: Outcome = Object.freeze({ kind: 'compute' });
const LEGACY: Outcome = Object.freeze({ kind: 'legacy' });
const WIDEN_LEFT: Outcome = Object.freeze({
  kind: 'widen',
  operand: 'left',
  target: 'float',
});
const WIDEN_RIGHT: Outcome = Object.freeze({
  kind: 'widen',
  operand: 'right',
  target: 'float',
});

function unsupported(type: TypeTag): Outcome {
  return { kind: 'reject', reason: { variant: 'unsupported', type } };
}

function mismatch(left: TypeTag, right: TypeTag): Outcome {
  return { kind: 'reject', reason: { variant: 'mismatch', left, right } };
}

// ============================================================
// ACCEPTED TAGS
// ============================================================

const ORDERED_TAGS: ReadonlySet<TypeTag> = new Set(['int', 'float', 'bool']);

/** Scalars whose pairing with another scalar type is a mismatch, not a rejection */
const RELATABLE_TAGS: ReadonlySet<TypeTag> = new Set([
  'int',
  'float',
  'bool',
  'string',
]);
const NUMERIC_TAGS: ReadonlySet<TypeTag> = new Set(['int', 'float']);
const ADDITION_TAGS: ReadonlySet<TypeTag> = new Set(['int', 'float', 'array']);
const BITWISE_TAGS: ReadonlySet<TypeTag> = new Set(['int', 'string']);
const SHIFT_TAGS: ReadonlySet<TypeTag> = new Set(['int']);
const CONCAT_TAGS: ReadonlySet<TypeTag> = new Set([
  'int',
  'float',
  'string',
  'null',
  'object',
]);

// ============================================================
// TABLE BUILDING BLOCKS
// ============================================================

/** Reject the first operand whose tag is outside the accepted set */
function acceptOnly(
  accepted: ReadonlySet<TypeTag>,
  left: TypeTag,
  right: TypeTag
): Outcome | undefined {
  if (!accepted.has(left)) return unsupported(left);
  if (!accepted.has(right)) return unsupported(right);
  return undefined;
}

/** Equal tags compute, int/float widens the int, anything else mismatches */
function sameTag(left: TypeTag, right: TypeTag): Outcome {
  if (left === 'int' && right === 'float') return WIDEN_LEFT;
  if (left === 'float' && right === 'int') return WIDEN_RIGHT;
  return left === right ? COMPUTE : mismatch(left, right);
}

/** == and != reject arrays outright; other tags must agree */
function equalityRule(left: TypeTag, right: TypeTag): Outcome {
  if (left === 'array' || right === 'array') return unsupported('array');
  return sameTag(left, right);
}

/**
 * Ordering operators accept int, float and bool. Two different scalar
 * types (strings included) are a mismatch: "42" > 10. Strings on their
 * own, and null, arrays, objects and resources, are unsupported.
 */
function orderingRule(left: TypeTag, right: TypeTag): Outcome {
  if (
    left !== right &&
    RELATABLE_TAGS.has(left) &&
    RELATABLE_TAGS.has(right)
  ) {
    return sameTag(left, right);
  }
  return acceptOnly(ORDERED_TAGS, left, right) ?? sameTag(left, right);
}

// ============================================================
// RESOLUTION
// ============================================================

/**
 * Resolve the rule for a binary operator application.
 *
 * Identity (===, !==) and logical operators compute in both modes.
 * Every other operator in weak mode resolves to the legacy evaluator.
 *
 * @example
 * resolveRule('>', 'strict', 'string', 'string')
 * // { kind: 'reject', reason: { variant: 'unsupported', type: 'string' } }
 */
export function resolveRule(
  op: BinaryOperator,
  mode: EvaluationMode,
  left: TypeTag,
  right: TypeTag
): Outcome {
  switch (op) {
    case '===':
    case '!==':
    case '&&':
    case '||':
    case 'xor':
    case 'and':
    case 'or':
      return COMPUTE;
    case '==':
    case '!=':
      return mode === 'weak' ? LEGACY : equalityRule(left, right);
    case '<':
    case '<=':
    case '>':
    case '>=':
    case '<=>':
      return mode === 'weak' ? LEGACY : orderingRule(left, right);
    case '+':
      return mode === 'weak'
        ? LEGACY
        : (acceptOnly(ADDITION_TAGS, left, right) ?? sameTag(left, right));
    case '-':
    case '*':
    case '/':
    case '%':
    case '**':
      return mode === 'weak'
        ? LEGACY
        : (acceptOnly(NUMERIC_TAGS, left, right) ?? sameTag(left, right));
    case '&':
    case '|':
    case '^':
      return mode === 'weak'
        ? LEGACY
        : (acceptOnly(BITWISE_TAGS, left, right) ?? sameTag(left, right));
    case '<<':
    case '>>':
      return mode === 'weak'
        ? LEGACY
        : (acceptOnly(SHIFT_TAGS, left, right) ?? COMPUTE);
    case '.':
      return mode === 'weak'
        ? LEGACY
        : (acceptOnly(CONCAT_TAGS, left, right) ?? COMPUTE);
  }
}

/** Resolve the rule for a unary operator application */
export function resolveUnaryRule(
  op: UnaryOperator,
  mode: EvaluationMode,
  operand: TypeTag
): Outcome {
  switch (op) {
    case '!':
      return COMPUTE;
    case '~':
      if (mode === 'weak') return LEGACY;
      return BITWISE_TAGS.has(operand) ? COMPUTE : unsupported(operand);
    case '++':
    case '--':
      if (mode === 'weak') return LEGACY;
      return NUMERIC_TAGS.has(operand) ? COMPUTE : unsupported(operand);
  }
}

/**
 * Short human-readable form of an outcome.
 *
 * @example
 * describeOutcome({ kind: 'widen', operand: 'left', target: 'float' })
 * // "widen left to float"
 */
export function describeOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'compute':
      return 'compute';
    case 'legacy':
      return 'legacy';
    case 'widen':
      return `widen ${outcome.operand} to ${outcome.target}`;
    case 'reject':
      return outcome.reason.variant === 'unsupported'
        ? `unsupported ${outcome.reason.type}`
        : `mismatch ${outcome.reason.left}/${outcome.reason.right}`;
  }
}
