/**
 * Switch-Case Matcher
 *
 * Equality used to pick a case label for a switch subject. Separate from
 * the == operator and independent of the evaluation mode: it never throws,
 * so a label of an unrelated type simply does not match.
 */

import { isIdentical, structurallyEqual } from '../compare.js';
import type { ArrayValue, Value } from '../values.js';

/** Marker for the default branch in a list of case labels */
export type DefaultCase = 'default';

/** A case label value, or the default branch */
export type CaseLabel = Value | DefaultCase;

/** Same key set in any order, values matched recursively */
function arraysMatch(subject: ArrayValue, label: ArrayValue): boolean {
  if (subject.entries.size !== label.entries.size) return false;
  for (const [key, value] of subject.entries) {
    const other = label.entries.get(key);
    if (other === undefined || !matchCase(value, other)) return false;
  }
  return true;
}

/**
 * Check whether a case label matches the switch subject.
 *
 * - scalars: same tag and same value (0 does not match "0", 1 not 1.0)
 * - arrays: same keys regardless of order, each value matching
 * - objects: same class and structurally equal
 *
 * @example
 * matchCase(intValue(0), stringValue('0')) // false
 */
export function matchCase(subject: Value, label: Value): boolean {
  if (subject.type === 'array') {
    return label.type === 'array' && arraysMatch(subject, label);
  }
  if (subject.type === 'object') {
    return (
      label.type === 'object' &&
      subject.className === label.className &&
      structurallyEqual(subject, label)
    );
  }
  return isIdentical(subject, label);
}

/**
 * Pick the branch a switch dispatches to.
 * Returns the index of the first matching label, else the index of the
 * default branch, else -1 when nothing applies.
 */
export function selectCase(
  subject: Value,
  labels: readonly CaseLabel[]
): number {
  let defaultIndex = -1;
  for (const [index, label] of labels.entries()) {
    if (label === 'default') {
      if (defaultIndex === -1) defaultIndex = index;
    } else if (matchCase(subject, label)) {
      return index;
    }
  }
  return defaultIndex;
}
