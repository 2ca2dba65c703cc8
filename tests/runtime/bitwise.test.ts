/**
 * Operator Engine Tests: Bitwise
 * Tests for integer and byte string bitwise operators and shifts
 */

import { describe, expect, it } from 'vitest';

import {
  ArithmeticError,
  evaluateBitwise,
  evaluateBitwiseNot,
  floatValue,
  intValue,
  NULL_VALUE,
  OperandMismatchError,
  stringValue,
  UnsupportedOperandError,
} from '../../src/index.js';

import { createWeakContext, strict } from '../helpers/runtime.js';

describe('Operator Engine: Bitwise', () => {
  describe('integers', () => {
    it('computes and, or and xor', () => {
      expect(strict('&', [intValue(6), intValue(3)])).toBe('int(2)');
      expect(strict('|', [intValue(6), intValue(3)])).toBe('int(7)');
      expect(strict('^', [intValue(6), intValue(3)])).toBe('int(5)');
    });

    it('complements with ~', () => {
      expect(strict('~', [intValue(5)])).toBe('int(-6)');
      expect(strict('~', [intValue(-1)])).toBe('int(0)');
    });
  });

  describe('shifts', () => {
    it('wraps left shifts to 64 bits', () => {
      expect(strict('<<', [intValue(1), intValue(3)])).toBe('int(8)');
      expect(strict('<<', [intValue(1), intValue(63)])).toBe(
        'int(-9223372036854775808)'
      );
      expect(strict('<<', [intValue(1), intValue(64)])).toBe('int(0)');
    });

    it('keeps the sign on right shifts', () => {
      expect(strict('>>', [intValue(-16), intValue(2)])).toBe('int(-4)');
      expect(strict('>>', [intValue(-1), intValue(100)])).toBe('int(-1)');
      expect(strict('>>', [intValue(5), intValue(64)])).toBe('int(0)');
    });

    it('throws OPS-A003 for negative counts', () => {
      try {
        evaluateBitwise('<<', intValue(1), intValue(-1), 'strict');
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ArithmeticError);
        expect(err).toMatchObject({
          errorId: 'OPS-A003',
          message: 'Bit shift by negative number',
        });
      }
    });

    it('rejects strings', () => {
      expect(() =>
        evaluateBitwise('<<', stringValue('a'), stringValue('b'), 'strict')
      ).toThrow(new UnsupportedOperandError('<<', 'string'));
    });
  });

  describe('byte strings', () => {
    it('runs | to the longer operand', () => {
      expect(strict('|', [stringValue('a'), stringValue('  ')])).toBe(
        'string(2) "a "'
      );
    });

    it('stops & and ^ at the shorter operand', () => {
      expect(strict('&', [stringValue('abc'), stringValue('ab')])).toBe(
        'string(2) "ab"'
      );
      expect(strict('^', [stringValue('12'), stringValue('AB')])).toBe(
        'string(2) "pp"'
      );
    });

    it('complements each byte with ~', () => {
      expect(evaluateBitwiseNot(stringValue('A'), 'strict')).toEqual(
        stringValue('¾')
      );
    });
  });

  describe('rejected operands', () => {
    it('reports int against string as a mismatch', () => {
      expect(() =>
        evaluateBitwise('&', intValue(1), stringValue('1'), 'strict')
      ).toThrow(new OperandMismatchError('&', 'int', 'string'));
    });

    it('never truncates floats', () => {
      expect(() =>
        evaluateBitwise('|', floatValue(1.5), intValue(1), 'strict')
      ).toThrow(new UnsupportedOperandError('|', 'float'));
      expect(() => evaluateBitwiseNot(floatValue(1.5), 'strict')).toThrow(
        new UnsupportedOperandError('~', 'float')
      );
    });

    it('rejects null under ~', () => {
      expect(() => evaluateBitwiseNot(NULL_VALUE, 'strict')).toThrow(
        UnsupportedOperandError
      );
    });
  });

  describe('weak mode', () => {
    it('delegates binary and unary operators', () => {
      const marker = intValue(0);
      const { ctx, legacy } = createWeakContext(marker);

      expect(
        evaluateBitwise('>>', floatValue(8), intValue(1), 'weak', ctx)
      ).toBe(marker);
      expect(evaluateBitwiseNot(floatValue(1.5), 'weak', ctx)).toBe(marker);
      expect(legacy.bitwise).toHaveBeenCalledWith(
        '>>',
        floatValue(8),
        intValue(1)
      );
      expect(legacy.bitwiseNot).toHaveBeenCalledWith(floatValue(1.5));
    });
  });
});
