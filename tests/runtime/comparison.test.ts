/**
 * Operator Engine Tests: Comparison
 * Tests for equality, ordering, identity and structural object equality
 */

import { describe, expect, it } from 'vitest';

import {
  evaluateComparison,
  FALSE_VALUE,
  floatValue,
  InternalError,
  INT_MAX,
  intValue,
  listValue,
  NULL_VALUE,
  objectValue,
  OperandMismatchError,
  resourceValue,
  stringValue,
  TRUE_VALUE,
  UnsupportedOperandError,
  type Value,
} from '../../src/index.js';

import { createWeakContext, strict } from '../helpers/runtime.js';

function isTrue(value: Value): boolean {
  return value.type === 'bool' && value.value;
}

describe('Operator Engine: Comparison', () => {
  describe('numeric ordering', () => {
    it('widens integers against floats', () => {
      expect(strict('<', [intValue(1), floatValue(1.5)])).toBe('bool(true)');
      expect(strict('>=', [floatValue(2), intValue(2)])).toBe('bool(true)');
      expect(strict('==', [intValue(2), floatValue(2)])).toBe('bool(true)');
    });

    it('orders by value with no string conversion', () => {
      expect(strict('<', [intValue(9), intValue(10)])).toBe('bool(true)');
      expect(strict('<=', [intValue(10), intValue(10)])).toBe('bool(true)');
      expect(strict('>', [floatValue(-0.5), floatValue(0)])).toBe(
        'bool(false)'
      );
    });

    it('is transitive across mixed int and float operands', () => {
      const samples: Value[] = [
        intValue(-3),
        floatValue(-2.5),
        intValue(0),
        floatValue(0.5),
        intValue(7),
        floatValue(7),
        floatValue(1e10),
        intValue(INT_MAX),
      ];
      const greater = (a: Value, b: Value): boolean =>
        isTrue(evaluateComparison('>', a, b, 'strict'));

      for (const a of samples) {
        for (const b of samples) {
          for (const c of samples) {
            if (greater(a, b) && greater(b, c)) {
              expect(greater(a, c)).toBe(true);
            }
          }
        }
      }
    });

    it('orders booleans with false below true', () => {
      expect(strict('<', [FALSE_VALUE, TRUE_VALUE])).toBe('bool(true)');
      expect(strict('<=>', [TRUE_VALUE, FALSE_VALUE])).toBe('int(1)');
    });

    it('returns -1, 0 or 1 for <=>', () => {
      expect(strict('<=>', [intValue(1), intValue(2)])).toBe('int(-1)');
      expect(strict('<=>', [intValue(2), floatValue(2)])).toBe('int(0)');
      expect(strict('<=>', [floatValue(2.5), intValue(2)])).toBe('int(1)');
    });

    it('treats NaN as unordered', () => {
      const nan = floatValue(Number.NaN);
      expect(strict('<', [nan, floatValue(1)])).toBe('bool(false)');
      expect(strict('>=', [nan, floatValue(1)])).toBe('bool(false)');
      expect(strict('<=', [floatValue(1), nan])).toBe('bool(false)');
      expect(strict('==', [nan, nan])).toBe('bool(false)');
      expect(strict('<=>', [nan, floatValue(1)])).toBe('int(1)');
    });
  });

  describe('type rejections', () => {
    it('reports a numeric string against an integer as a mismatch', () => {
      try {
        evaluateComparison('>', stringValue('42'), intValue(10), 'strict');
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(OperandMismatchError);
        expect(err).toMatchObject({
          errorId: 'OPS-T002',
          left: 'string',
          right: 'int',
          message: 'Operand type mismatch string and int for >',
        });
      }
    });

    it('rejects ordering two strings', () => {
      expect(() =>
        evaluateComparison('>', stringValue('foo'), stringValue('bar'), 'strict')
      ).toThrow(new UnsupportedOperandError('>', 'string'));
    });

    it('rejects arrays under ==', () => {
      expect(() =>
        evaluateComparison(
          '==',
          listValue([intValue(10)]),
          listValue([]),
          'strict'
        )
      ).toThrow(new UnsupportedOperandError('==', 'array'));
    });

    it('rejects bool against int', () => {
      expect(() =>
        evaluateComparison('==', TRUE_VALUE, intValue(1), 'strict')
      ).toThrow(new OperandMismatchError('==', 'bool', 'int'));
    });

    it('rejects null under ordering', () => {
      expect(() =>
        evaluateComparison('<', NULL_VALUE, intValue(1), 'strict')
      ).toThrow(UnsupportedOperandError);
    });
  });

  describe('equality of equal tags', () => {
    it('compares strings as bytes, never as numbers', () => {
      expect(strict('==', [stringValue('100'), stringValue('1e2')])).toBe(
        'bool(false)'
      );
      expect(strict('!=', [stringValue('abc'), stringValue('abc')])).toBe(
        'bool(false)'
      );
    });

    it('treats null as equal to null', () => {
      expect(strict('==', [NULL_VALUE, NULL_VALUE])).toBe('bool(true)');
    });

    it('compares resources by id', () => {
      expect(
        strict('==', [resourceValue(4, 'stream'), resourceValue(4, 'stream')])
      ).toBe('bool(true)');
      expect(
        strict('!=', [resourceValue(4, 'stream'), resourceValue(5, 'stream')])
      ).toBe('bool(true)');
    });
  });

  describe('object equality', () => {
    it('is true for instances of one class with equal properties', () => {
      const a = objectValue('Point', [
        ['x', intValue(1)],
        ['y', stringValue('up')],
      ]);
      const b = objectValue('Point', [
        ['x', intValue(1)],
        ['y', stringValue('up')],
      ]);
      expect(strict('==', [a, b])).toBe('bool(true)');
      expect(strict('!=', [a, b])).toBe('bool(false)');
    });

    it('throws a mismatch naming both classes', () => {
      const a = objectValue('A', [['v', intValue(1)]]);
      const b = objectValue('B', [['v', intValue(1)]]);
      expect(() => evaluateComparison('==', a, b, 'strict')).toThrow(
        'Operand type mismatch A and B for =='
      );
    });

    it('is false when a property differs in type, without throwing', () => {
      const a = objectValue('Point', [['x', intValue(1)]]);
      const b = objectValue('Point', [['x', floatValue(1)]]);
      expect(strict('==', [a, b])).toBe('bool(false)');
    });

    it('is false when property names differ', () => {
      const a = objectValue('Point', [['x', intValue(1)]]);
      const b = objectValue('Point', [['y', intValue(1)]]);
      expect(strict('==', [a, b])).toBe('bool(false)');
    });

    it('is false for nested objects of different classes', () => {
      const a = objectValue('Box', [['item', objectValue('A')]]);
      const b = objectValue('Box', [['item', objectValue('B')]]);
      expect(strict('==', [a, b])).toBe('bool(false)');
    });

    it('compares nested objects and arrays structurally', () => {
      const make = (): Value =>
        objectValue('Box', [
          ['inner', objectValue('Point', [['x', floatValue(0.5)]])],
          ['items', listValue([intValue(1), stringValue('two')])],
        ]);
      expect(strict('==', [make(), make()])).toBe('bool(true)');
    });

    it('terminates on self-referencing objects', () => {
      const a = objectValue('Node', [['id', intValue(1)]]);
      a.properties.set('next', a);
      const b = objectValue('Node', [['id', intValue(1)]]);
      b.properties.set('next', b);
      expect(strict('==', [a, b])).toBe('bool(true)');
    });

    it('finds differences inside a two-node cycle', () => {
      const a1 = objectValue('Node', [['id', intValue(1)]]);
      const a2 = objectValue('Node', [['id', intValue(2)]]);
      a1.properties.set('next', a2);
      a2.properties.set('next', a1);
      const b1 = objectValue('Node', [['id', intValue(1)]]);
      const b2 = objectValue('Node', [['id', intValue(3)]]);
      b1.properties.set('next', b2);
      b2.properties.set('next', b1);
      expect(strict('==', [a1, b1])).toBe('bool(false)');
    });

    it('treats the same instance as equal', () => {
      const a = objectValue('Point', [['x', floatValue(Number.NaN)]]);
      expect(strict('==', [a, a])).toBe('bool(true)');
    });
  });

  describe('identity', () => {
    it('requires the same tag and value', () => {
      expect(strict('===', [intValue(1), intValue(1)])).toBe('bool(true)');
      expect(strict('===', [intValue(1), floatValue(1)])).toBe('bool(false)');
      expect(strict('!==', [stringValue('1'), intValue(1)])).toBe(
        'bool(true)'
      );
    });

    it('compares arrays in key order', () => {
      const a = listValue([intValue(1), intValue(2)]);
      const b = listValue([intValue(1), intValue(2)]);
      expect(strict('===', [a, b])).toBe('bool(true)');
    });

    it('compares objects by instance', () => {
      const a = objectValue('Point');
      expect(strict('===', [a, a])).toBe('bool(true)');
      expect(strict('===', [a, objectValue('Point')])).toBe('bool(false)');
    });

    it('ignores the mode', () => {
      expect(
        evaluateComparison('===', stringValue('a'), stringValue('a'), 'weak')
      ).toEqual(TRUE_VALUE);
    });
  });

  describe('weak mode', () => {
    it('hands the application to the legacy evaluator', () => {
      const { ctx, legacy } = createWeakContext(FALSE_VALUE);
      const left = listValue([intValue(10)]);
      const right = listValue([]);

      expect(evaluateComparison('==', left, right, 'weak', ctx)).toBe(
        FALSE_VALUE
      );
      expect(legacy.compare).toHaveBeenCalledWith('==', left, right);
    });

    it('throws OPS-I002 without a legacy evaluator', () => {
      expect(() =>
        evaluateComparison('<', intValue(1), intValue(2), 'weak')
      ).toThrow(InternalError);
      expect(() =>
        evaluateComparison('<', intValue(1), intValue(2), 'weak')
      ).toThrow(
        'Weak mode evaluation of < requires a legacy operator evaluator'
      );
    });
  });
});
