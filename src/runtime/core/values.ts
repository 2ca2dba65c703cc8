/**
 * Runtime Value Types and Utilities
 *
 * Values handed to the engine by the host runtime.
 * Public API for host applications.
 */

// ============================================================
// VALUE TYPES
// ============================================================

/** Signed 64-bit integer */
export interface IntValue {
  readonly type: 'int';
  readonly value: bigint;
}

/** IEEE-754 double */
export interface FloatValue {
  readonly type: 'float';
  readonly value: number;
}

export interface BoolValue {
  readonly type: 'bool';
  readonly value: boolean;
}

/**
 * Byte string. Each UTF-16 code unit holds one byte (0x00-0xFF);
 * byte-wise operators read and write the text as latin1.
 */
export interface StringValue {
  readonly type: 'string';
  readonly value: string;
}

export interface NullValue {
  readonly type: 'null';
}

/** Array keys are integers or strings, never both for the same key */
export type ArrayKey = bigint | string;

/** Ordered mapping from key to value; insertion order is kept */
export interface ArrayValue {
  readonly type: 'array';
  readonly entries: ReadonlyMap<ArrayKey, Value>;
}

/** Turns an object into its string form (the __toString capability) */
export type StringConverter = (self: ObjectValue) => string;

/**
 * Class instance. Identity is reference identity.
 * Properties stay mutable so hosts can wire reference cycles after creation.
 */
export interface ObjectValue {
  readonly type: 'object';
  readonly className: string;
  readonly properties: Map<string, Value>;
  readonly toStringMethod?: StringConverter | undefined;
}

/** Opaque host handle (stream, socket, process) */
export interface ResourceValue {
  readonly type: 'resource';
  readonly id: number;
  readonly kind: string;
}

/** Any value that can flow through an operator */
export type Value =
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | NullValue
  | ArrayValue
  | ObjectValue
  | ResourceValue;

// ============================================================
// INTEGER RANGE
// ============================================================

export const INT_MAX = 2n ** 63n - 1n;
export const INT_MIN = -(2n ** 63n);

/** Check if a bigint fits the signed 64-bit range */
export function fitsInt(value: bigint): boolean {
  return value >= INT_MIN && value <= INT_MAX;
}

/**
 * Integer result of an operation, or a float when it left the int64
 * range. The fallback float is computed from the exact result.
 */
export function intOrFloat(value: bigint): IntValue | FloatValue {
  return fitsInt(value) ? intValue(value) : floatValue(Number(value));
}

// ============================================================
// CONSTRUCTORS
// ============================================================

export const NULL_VALUE: NullValue = Object.freeze({ type: 'null' });
export const TRUE_VALUE: BoolValue = Object.freeze({
  type: 'bool',
  value: true,
});
export const FALSE_VALUE: BoolValue = Object.freeze({
  type: 'bool',
  value: false,
});

/**
 * Create an integer value.
 * @throws TypeError for non-integral numbers
 * @throws RangeError outside the int64 range
 */
export function intValue(value: bigint | number): IntValue {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new TypeError(`Integer value must be integral, got ${value}`);
  }
  const big = typeof value === 'number' ? BigInt(value) : value;
  if (!fitsInt(big)) {
    throw new RangeError(`Integer value out of 64-bit range: ${big}`);
  }
  return { type: 'int', value: big };
}

export function floatValue(value: number): FloatValue {
  return { type: 'float', value };
}

export function boolValue(value: boolean): BoolValue {
  return value ? TRUE_VALUE : FALSE_VALUE;
}

export function stringValue(value: string): StringValue {
  return { type: 'string', value };
}

/** Canonical decimal integer spelling: no sign on zero, no leading zeros */
const INTEGER_KEY_PATTERN = /^(0|-?[1-9]\d*)$/;

/**
 * Normalize an array key.
 * Numbers are truncated to integers; strings spelling a canonical
 * in-range decimal integer become integer keys.
 */
export function normalizeArrayKey(key: ArrayKey | number): ArrayKey {
  if (typeof key === 'number') {
    if (!Number.isFinite(key)) {
      throw new TypeError(`Array key must be finite, got ${key}`);
    }
    return BigInt(Math.trunc(key));
  }
  if (typeof key === 'string' && INTEGER_KEY_PATTERN.test(key)) {
    const asInt = BigInt(key);
    if (fitsInt(asInt)) return asInt;
  }
  return key;
}

/**
 * Create an array from key/value pairs.
 * A repeated key overwrites the earlier value in its original position.
 */
export function arrayValue(
  entries: Iterable<readonly [ArrayKey | number, Value]>
): ArrayValue {
  const map = new Map<ArrayKey, Value>();
  for (const [key, value] of entries) {
    map.set(normalizeArrayKey(key), value);
  }
  return { type: 'array', entries: map };
}

/** Create a list-shaped array keyed 0..n-1 */
export function listValue(values: Iterable<Value>): ArrayValue {
  const map = new Map<ArrayKey, Value>();
  let index = 0n;
  for (const value of values) {
    map.set(index, value);
    index++;
  }
  return { type: 'array', entries: map };
}

/** Options for creating an object value */
export interface ObjectOptions {
  /** String conversion capability (__toString) */
  toStringMethod?: StringConverter | undefined;
}

export function objectValue(
  className: string,
  properties: Iterable<readonly [string, Value]> = [],
  options: ObjectOptions = {}
): ObjectValue {
  return {
    type: 'object',
    className,
    properties: new Map(properties),
    toStringMethod: options.toStringMethod,
  };
}

export function resourceValue(id: number, kind: string): ResourceValue {
  return { type: 'resource', id, kind };
}

// ============================================================
// TYPE GUARDS
// ============================================================

export function isInt(value: Value): value is IntValue {
  return value.type === 'int';
}

export function isFloat(value: Value): value is FloatValue {
  return value.type === 'float';
}

export function isArray(value: Value): value is ArrayValue {
  return value.type === 'array';
}

export function isObject(value: Value): value is ObjectValue {
  return value.type === 'object';
}

/** Scalars compare by tag and value; composites need structural rules */
export function isScalar(
  value: Value
): value is
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | NullValue
  | ResourceValue {
  return value.type !== 'array' && value.type !== 'object';
}

// ============================================================
// TRUTHINESS
// ============================================================

/**
 * Default truthiness rule.
 * Falsy: false, 0, 0.0, -0.0, "", "0", null and the empty array.
 * NaN, objects and resources are truthy.
 */
export function isTruthy(value: Value): boolean {
  switch (value.type) {
    case 'bool':
      return value.value;
    case 'int':
      return value.value !== 0n;
    case 'float':
      return value.value !== 0;
    case 'string':
      return value.value !== '' && value.value !== '0';
    case 'null':
      return false;
    case 'array':
      return value.entries.size > 0;
    case 'object':
    case 'resource':
      return true;
  }
}
