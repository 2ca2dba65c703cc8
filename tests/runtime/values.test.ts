/**
 * Operator Engine Tests: Values and Classification
 * Tests for value constructors, array keys, type tags and truthiness
 */

import { describe, expect, it } from 'vitest';

import {
  arrayValue,
  boolValue,
  classify,
  describeType,
  FALSE_VALUE,
  fitsInt,
  floatValue,
  INT_MAX,
  INT_MIN,
  intOrFloat,
  intValue,
  isArray,
  isFloat,
  isInt,
  isNumericTag,
  isObject,
  isScalar,
  isTruthy,
  listValue,
  normalizeArrayKey,
  NULL_VALUE,
  objectValue,
  resourceValue,
  stringValue,
  TRUE_VALUE,
  TYPE_TAGS,
  type Value,
} from '../../src/index.js';

describe('Operator Engine: Values', () => {
  describe('intValue', () => {
    it('accepts bigint and integral numbers', () => {
      expect(intValue(5n)).toEqual({ type: 'int', value: 5n });
      expect(intValue(-7)).toEqual({ type: 'int', value: -7n });
    });

    it('rejects fractional numbers', () => {
      expect(() => intValue(1.5)).toThrow(TypeError);
    });

    it('rejects values outside the 64-bit range', () => {
      expect(() => intValue(INT_MAX + 1n)).toThrow(RangeError);
      expect(() => intValue(INT_MIN - 1n)).toThrow(RangeError);
      expect(intValue(INT_MIN).value).toBe(-(2n ** 63n));
    });
  });

  describe('intOrFloat', () => {
    it('keeps in-range results as integers', () => {
      expect(intOrFloat(INT_MAX)).toEqual({ type: 'int', value: INT_MAX });
    });

    it('falls back to float outside the range', () => {
      expect(intOrFloat(INT_MAX + 1n)).toEqual({
        type: 'float',
        value: 9223372036854775808,
      });
      expect(fitsInt(INT_MAX + 1n)).toBe(false);
    });
  });

  describe('booleans and null', () => {
    it('shares the boolean singletons', () => {
      expect(boolValue(true)).toBe(TRUE_VALUE);
      expect(boolValue(false)).toBe(FALSE_VALUE);
    });

    it('freezes the shared constants', () => {
      expect(Object.isFrozen(NULL_VALUE)).toBe(true);
      expect(Object.isFrozen(TRUE_VALUE)).toBe(true);
    });
  });

  describe('array keys', () => {
    it('turns canonical integer strings into integer keys', () => {
      expect(normalizeArrayKey('8')).toBe(8n);
      expect(normalizeArrayKey('-3')).toBe(-3n);
      expect(normalizeArrayKey('0')).toBe(0n);
    });

    it('keeps non-canonical strings as string keys', () => {
      expect(normalizeArrayKey('08')).toBe('08');
      expect(normalizeArrayKey('-0')).toBe('-0');
      expect(normalizeArrayKey('1.5')).toBe('1.5');
      expect(normalizeArrayKey('9223372036854775808')).toBe(
        '9223372036854775808'
      );
    });

    it('truncates number keys', () => {
      expect(normalizeArrayKey(2.9)).toBe(2n);
      expect(normalizeArrayKey(-2.9)).toBe(-2n);
      expect(() => normalizeArrayKey(Number.NaN)).toThrow(TypeError);
    });

    it('overwrites repeated keys in their first position', () => {
      const array = arrayValue([
        ['a', intValue(1)],
        ['b', intValue(2)],
        ['a', intValue(3)],
      ]);
      expect([...array.entries.keys()]).toEqual(['a', 'b']);
      expect(array.entries.get('a')).toEqual(intValue(3));
    });

    it('merges "1" and 1 into one key', () => {
      const array = arrayValue([
        ['1', intValue(1)],
        [1, intValue(2)],
      ]);
      expect(array.entries.size).toBe(1);
      expect(array.entries.get(1n)).toEqual(intValue(2));
    });

    it('numbers list entries from zero', () => {
      const list = listValue([stringValue('x'), stringValue('y')]);
      expect([...list.entries.keys()]).toEqual([0n, 1n]);
    });
  });

  describe('objects', () => {
    it('keeps property order and class name', () => {
      const point = objectValue('Point', [
        ['x', intValue(1)],
        ['y', intValue(2)],
      ]);
      expect(point.className).toBe('Point');
      expect([...point.properties.keys()]).toEqual(['x', 'y']);
      expect(point.toStringMethod).toBeUndefined();
    });

    it('stores the string conversion capability', () => {
      const named = objectValue('Named', [], {
        toStringMethod: () => 'named',
      });
      expect(named.toStringMethod?.(named)).toBe('named');
    });
  });
});

describe('Operator Engine: Type Classifier', () => {
  const samples: [Value, string][] = [
    [intValue(1), 'int'],
    [floatValue(1), 'float'],
    [TRUE_VALUE, 'bool'],
    [stringValue('1'), 'string'],
    [NULL_VALUE, 'null'],
    [listValue([]), 'array'],
    [objectValue('Point'), 'object'],
    [resourceValue(3, 'stream'), 'resource'],
  ];

  it.each(samples)('classifies %o', (value, tag) => {
    expect(classify(value)).toBe(tag);
  });

  it('covers every tag', () => {
    expect(samples.map(([value]) => classify(value))).toEqual(TYPE_TAGS);
  });

  it('returns the same tag on repeated calls', () => {
    const value = stringValue('42');
    const first = classify(value);
    for (let i = 0; i < 5; i++) {
      expect(classify(value)).toBe(first);
    }
  });

  it('does not look at string contents', () => {
    expect(classify(stringValue('1e2'))).toBe('string');
  });

  it('names objects by class in messages', () => {
    expect(describeType(objectValue('Point'))).toBe('Point');
    expect(describeType(floatValue(2))).toBe('float');
  });

  it('marks int and float as numeric', () => {
    expect(TYPE_TAGS.filter(isNumericTag)).toEqual(['int', 'float']);
  });

  it('provides type guards', () => {
    expect(isInt(intValue(1))).toBe(true);
    expect(isFloat(intValue(1))).toBe(false);
    expect(isArray(listValue([]))).toBe(true);
    expect(isObject(objectValue('A'))).toBe(true);
    expect(isScalar(resourceValue(1, 'stream'))).toBe(true);
    expect(isScalar(listValue([]))).toBe(false);
  });
});

describe('Operator Engine: Truthiness', () => {
  it('treats the empty and zero-like values as falsy', () => {
    const falsy: Value[] = [
      FALSE_VALUE,
      intValue(0),
      floatValue(0),
      floatValue(-0),
      stringValue(''),
      stringValue('0'),
      NULL_VALUE,
      listValue([]),
    ];
    expect(falsy.map(isTruthy)).toEqual(falsy.map(() => false));
  });

  it('treats everything else as truthy', () => {
    const truthy: Value[] = [
      TRUE_VALUE,
      intValue(-1),
      floatValue(Number.NaN),
      stringValue('0.0'),
      stringValue(' '),
      listValue([NULL_VALUE]),
      objectValue('Empty'),
      resourceValue(1, 'stream'),
    ];
    expect(truthy.map(isTruthy)).toEqual(truthy.map(() => true));
  });
});
