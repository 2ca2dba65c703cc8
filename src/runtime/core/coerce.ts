/**
 * Coercion Engine
 *
 * The only implicit conversions the engine performs: integer to float
 * widening, and scalar to string casting for concatenation. Every other
 * path through the engine either computes on the operands as they are or
 * rejects them.
 */

import { InternalError, UnsupportedOperandError } from '../../types.js';
import type { TypeTag } from '../../types.js';
import { DEFAULT_CONTEXT } from './context.js';
import { CAST_PRECISION, formatFloat } from './format.js';
import type { EngineContext } from './types.js';
import { floatValue, stringValue } from './values.js';
import type { FloatValue, StringValue, Value } from './values.js';

/**
 * Widen an integer to a float.
 * Callers request widening only where the rule tables returned a widen
 * outcome; any other pair is an engine bug.
 *
 * @throws InternalError (OPS-I001) for anything but int -> float
 */
export function widen(value: Value, target: TypeTag): FloatValue {
  if (value.type !== 'int' || target !== 'float') {
    throw new InternalError('OPS-I001', { from: value.type, to: target });
  }
  return floatValue(Number(value.value));
}

/**
 * Cast a value to string.
 *
 * Integers and floats render as decimal text (floats with 14 significant
 * digits), null as the empty string, objects through their string
 * conversion capability.
 *
 * @param operator - Operator reported in the error (defaults to a cast)
 * @throws UnsupportedOperandError for bool, array, resource, and objects
 *   without a string conversion capability
 */
export function castToString(
  value: Value,
  ctx: EngineContext = DEFAULT_CONTEXT,
  operator = '(string)'
): StringValue {
  switch (value.type) {
    case 'string':
      return value;
    case 'int':
      return stringValue(value.value.toString());
    case 'float':
      return stringValue(formatFloat(value.value, CAST_PRECISION));
    case 'null':
      return stringValue('');
    case 'object': {
      const converter = ctx.stringConversion(value);
      if (converter === undefined) {
        throw new UnsupportedOperandError(operator, value.type);
      }
      return stringValue(converter(value));
    }
    case 'bool':
    case 'array':
    case 'resource':
      throw new UnsupportedOperandError(operator, value.type);
  }
}
