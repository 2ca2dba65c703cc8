/**
 * Value Comparators
 *
 * Identity, ordering and structural equality shared by the comparison
 * evaluator and the switch-case matcher. None of these functions throw;
 * type rejections happen in the rule tables before they are called.
 */

import type { ArrayValue, ObjectValue, Value } from './values.js';

// ============================================================
// IDENTITY
// ============================================================

/**
 * Identity (===): same tag and same value, no coercion.
 * - floats by IEEE equality (NaN is never identical, 0.0 === -0.0)
 * - arrays: same keys in the same order with identical values
 * - objects: same instance
 * - resources: same id
 */
export function isIdentical(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'int':
      return b.type === 'int' && a.value === b.value;
    case 'float':
      return b.type === 'float' && a.value === b.value;
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'null':
      return b.type === 'null';
    case 'resource':
      return b.type === 'resource' && a.id === b.id;
    case 'object':
      return a === b;
    case 'array': {
      if (b.type !== 'array') return false;
      const pairs = zipOrdered(a, b);
      return pairs !== null && pairs.every(([x, y]) => isIdentical(x, y));
    }
  }
}

/**
 * Pair up the values of two arrays position by position.
 * Returns null when sizes differ or a key differs at some position.
 */
function zipOrdered(a: ArrayValue, b: ArrayValue): [Value, Value][] | null {
  if (a.entries.size !== b.entries.size) return null;
  const pairs: [Value, Value][] = [];
  const other = b.entries.entries();
  for (const [key, value] of a.entries) {
    const next = other.next();
    if (next.done === true) return null;
    const [otherKey, otherValue] = next.value;
    if (key !== otherKey) return null;
    pairs.push([value, otherValue]);
  }
  return pairs;
}

// ============================================================
// ORDERING
// ============================================================

/**
 * Three-way comparison of two operands of the same orderable tag
 * (int/int, float/float, bool/bool, false < true).
 * Returns null when the pair is unordered: a NaN operand, or tags that
 * differ or cannot be ordered.
 */
export function compareOrdered(left: Value, right: Value): -1 | 0 | 1 | null {
  if (left.type === 'int' && right.type === 'int') {
    return sign(left.value < right.value, left.value > right.value);
  }
  if (left.type === 'float' && right.type === 'float') {
    if (Number.isNaN(left.value) || Number.isNaN(right.value)) return null;
    return sign(left.value < right.value, left.value > right.value);
  }
  if (left.type === 'bool' && right.type === 'bool') {
    return sign(!left.value && right.value, left.value && !right.value);
  }
  return null;
}

function sign(less: boolean, greater: boolean): -1 | 0 | 1 {
  if (less) return -1;
  return greater ? 1 : 0;
}

// ============================================================
// STRUCTURAL EQUALITY
// ============================================================

/** Object pairs already expanded during one structural comparison */
type VisitedPairs = Map<ObjectValue, Set<ObjectValue>>;

/** Record a pair; returns true when it was already recorded */
function markVisited(
  visited: VisitedPairs,
  left: ObjectValue,
  right: ObjectValue
): boolean {
  let partners = visited.get(left);
  if (partners === undefined) {
    partners = new Set();
    visited.set(left, partners);
  }
  if (partners.has(right)) return true;
  partners.add(right);
  return false;
}

/**
 * Compare one property pair, queueing nested pairs on the worklist.
 * Returns false as soon as the pair can be decided unequal.
 */
function expandPair(
  left: Value,
  right: Value,
  pending: [Value, Value][],
  visited: VisitedPairs
): boolean {
  if (left.type === 'object') {
    if (right.type !== 'object' || left.className !== right.className) {
      return false;
    }
    if (left === right || markVisited(visited, left, right)) return true;
    if (left.properties.size !== right.properties.size) return false;
    for (const [name, value] of left.properties) {
      const other = right.properties.get(name);
      if (other === undefined) return false;
      pending.push([value, other]);
    }
    return true;
  }

  if (left.type === 'array') {
    if (right.type !== 'array') return false;
    const pairs = zipOrdered(left, right);
    if (pairs === null) return false;
    pending.push(...pairs);
    return true;
  }

  return isIdentical(left, right);
}

/**
 * Structural equality of two objects of the same class.
 *
 * Property name sets must match, and every same-named pair must match:
 * scalars by tag and value, nested objects of one class structurally,
 * arrays key by key in order. Any type difference inside makes the
 * result false; nothing is thrown.
 *
 * Runs on an explicit worklist. A pair of objects met a second time is
 * taken as equal on that branch, so cyclic graphs terminate.
 */
export function structurallyEqual(a: ObjectValue, b: ObjectValue): boolean {
  const visited: VisitedPairs = new Map();
  const pending: [Value, Value][] = [[a, b]];

  let next = pending.pop();
  while (next !== undefined) {
    if (!expandPair(next[0], next[1], pending, visited)) return false;
    next = pending.pop();
  }
  return true;
}
