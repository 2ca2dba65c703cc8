/**
 * Type Classifier
 *
 * Maps runtime values to their semantic type tag. Total and pure:
 * every value has exactly one tag, and the same value always gets the same one.
 */

import type { TypeTag } from '../../types.js';
import type { Value } from './values.js';

export function classify(value: Value): TypeTag {
  return value.type;
}

/** Integer and float are the only tags joined by widening */
export function isNumericTag(tag: TypeTag): tag is 'int' | 'float' {
  return tag === 'int' || tag === 'float';
}

/**
 * Type name for error messages.
 * Objects report their class name; every other value reports its tag.
 */
export function describeType(value: Value): string {
  return value.type === 'object' ? value.className : value.type;
}
