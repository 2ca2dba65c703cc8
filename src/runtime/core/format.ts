/**
 * Value Formatting
 *
 * Float text rendering shared by string casts and display, plus a
 * dump-style formatter used by the CLI and in test failure output.
 */

import type { ArrayKey, ObjectValue, Value } from './values.js';

/** Significant digits used when a float is cast to string */
export const CAST_PRECISION = 14;

/** Upper bound on digits for the shortest round-trip display form */
const DISPLAY_PRECISION = 17;

/**
 * Render a float as text.
 *
 * With a precision, the value is rounded to that many significant digits
 * (string casts use 14). Without one, the shortest text that reads back to
 * the same double is used. Exponent form ("1.0E+25", "1.0E-5") applies when
 * the decimal exponent is below -4 or at least the precision.
 *
 * @example
 * formatFloat(0.1 + 0.2, 14) // "0.3"
 * formatFloat(1e25, 14)      // "1.0E+25"
 * formatFloat(-0)            // "-0"
 */
export function formatFloat(value: number, precision?: number): string {
  if (Number.isNaN(value)) return 'NAN';
  if (value === Infinity) return 'INF';
  if (value === -Infinity) return '-INF';
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';

  const sign = value < 0 ? '-' : '';
  const magnitude = Math.abs(value);
  const exponential =
    precision === undefined
      ? magnitude.toExponential()
      : magnitude.toExponential(precision - 1);

  const [mantissa = '0', exponentText = '0'] = exponential.split('e');
  const exponent = Number(exponentText);
  const digits = mantissa.replace('.', '').replace(/0+$/, '') || '0';
  const limit = precision ?? DISPLAY_PRECISION;

  if (exponent < -4 || exponent >= limit) {
    const rest = digits.slice(1);
    const expSign = exponent < 0 ? '-' : '+';
    return `${sign}${digits.charAt(0)}.${rest === '' ? '0' : rest}E${expSign}${Math.abs(exponent)}`;
  }

  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }

  const integerPart = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0');
  const fraction = digits.slice(exponent + 1);
  return fraction === ''
    ? `${sign}${integerPart}`
    : `${sign}${integerPart}.${fraction}`;
}

function formatKey(key: ArrayKey): string {
  return typeof key === 'bigint' ? `[${key}]` : `[${JSON.stringify(key)}]`;
}

/**
 * Format a value for display, dump style.
 * Objects already being printed render as *RECURSION*.
 *
 * @example
 * formatValue(listValue([intValue(1), stringValue("a")]))
 * // 'array(2) {[0] => int(1), [1] => string(1) "a"}'
 */
export function formatValue(value: Value): string {
  return formatWithin(value, new Set<ObjectValue>());
}

function formatWithin(value: Value, open: Set<ObjectValue>): string {
  switch (value.type) {
    case 'int':
      return `int(${value.value})`;
    case 'float':
      return `float(${formatFloat(value.value)})`;
    case 'bool':
      return `bool(${value.value ? 'true' : 'false'})`;
    case 'string':
      return `string(${value.value.length}) ${JSON.stringify(value.value)}`;
    case 'null':
      return 'NULL';
    case 'resource':
      return `resource(${value.id}) of type (${value.kind})`;
    case 'array': {
      const parts: string[] = [];
      for (const [key, item] of value.entries) {
        parts.push(`${formatKey(key)} => ${formatWithin(item, open)}`);
      }
      return `array(${value.entries.size}) {${parts.join(', ')}}`;
    }
    case 'object': {
      if (open.has(value)) return '*RECURSION*';
      open.add(value);
      const parts: string[] = [];
      for (const [name, item] of value.properties) {
        parts.push(`${formatKey(name)} => ${formatWithin(item, open)}`);
      }
      open.delete(value);
      return `object(${value.className}) {${parts.join(', ')}}`;
    }
  }
}
