/**
 * Property-Based Tests for Fixed-Width Integer Semantics
 *
 * Arithmetic results are checked against an independent reduction using
 * BigInt.asUintN / BigInt.asIntN at the operand width.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { add, arraySum, cast, compare, mul, mulWide, neg, sub } from '../values/arithmetic';
import { wrapInteger } from '../values/construct';
import { bitWidthOf, integerType, isSigned, type IntegerType } from '../values/types';
import {
  arbitraryIntegerArray,
  arbitraryIntegerPair,
  arbitraryIntegerType,
  arbitraryIntegerValue,
  arbitraryRawInteger,
  PROPERTY_TEST_CONFIG,
} from './property-test-config';

function reduce(type: IntegerType, value: bigint): bigint {
  const bits = bitWidthOf(type);
  return isSigned(type) ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value);
}

describe('Property: Fixed-Width Integer Semantics', () => {
  describe('Wraparound arithmetic', () => {
    it('should match modular reduction for add, sub and mul', () => {
      fc.assert(
        fc.property(arbitraryIntegerPair(), ([a, b]) => {
          expect(add(a, b).value).toBe(reduce(a.type, a.value + b.value));
          expect(sub(a, b).value).toBe(reduce(a.type, a.value - b.value));
          expect(mul(a, b).value).toBe(reduce(a.type, a.value * b.value));
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should keep every result inside its type and preserve the type', () => {
      fc.assert(
        fc.property(arbitraryIntegerPair(), ([a, b]) => {
          const sum = add(a, b);
          expect(sum.type).toBe(a.type);
          expect(wrapInteger(a.type, sum.value).value).toBe(sum.value);
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should make a + (-a) wrap to zero', () => {
      fc.assert(
        fc.property(
          arbitraryIntegerType().chain((type) => arbitraryIntegerValue(type)),
          (a) => {
            expect(add(a, neg(a)).value).toBe(0n);
          }
        ),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should reduce any bigint into range with wrapInteger', () => {
      fc.assert(
        fc.property(arbitraryIntegerType(), fc.bigInt({ min: -(1n << 80n), max: 1n << 80n }), (type, raw) => {
          expect(wrapInteger(type, raw).value).toBe(reduce(type, raw));
        }),
        PROPERTY_TEST_CONFIG
      );
    });
  });

  describe('Comparison', () => {
    it('should agree with numeric ordering for signed and unsigned types', () => {
      fc.assert(
        fc.property(arbitraryIntegerPair(), ([a, b]) => {
          expect(compare('gt', a, b).value).toBe(a.value > b.value);
          expect(compare('ge', a, b).value).toBe(a.value >= b.value);
          expect(compare('lt', a, b).value).toBe(a.value < b.value);
          expect(compare('le', a, b).value).toBe(a.value <= b.value);
          expect(compare('eq', a, b).value).toBe(a.value === b.value);
          expect(compare('ne', a, b).value).toBe(a.value !== b.value);
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should differ between signed and unsigned views of the same bits', () => {
      fc.assert(
        fc.property(arbitraryRawInteger('u8'), arbitraryRawInteger('u8'), (x, y) => {
          const ux = wrapInteger('u8', x);
          const uy = wrapInteger('u8', y);
          const sx = cast(ux, 'i8');
          const sy = cast(uy, 'i8');
          // ordering flips exactly when the high bits differ
          const highX = x >= 128n;
          const highY = y >= 128n;
          const unsignedGt = compare('gt', ux, uy).value;
          const signedGt = compare('gt', sx, sy).value;
          if (highX === highY) {
            expect(signedGt).toBe(unsignedGt);
          } else {
            expect(signedGt).toBe(highY);
          }
        }),
        PROPERTY_TEST_CONFIG
      );
    });
  });

  describe('Widening', () => {
    it('should never wrap a widening multiply', () => {
      fc.assert(
        fc.property(
          fc.constantFrom<IntegerType>('u8', 'u16', 'u32', 'i8', 'i16', 'i32').chain((type) =>
            fc.tuple(arbitraryIntegerValue(type), arbitraryIntegerValue(type))
          ),
          ([a, b]) => {
            const wide = integerType(bitWidthOf(a.type) === 32 ? 64 : bitWidthOf(a.type) === 16 ? 32 : 16, isSigned(a.type));
            expect(mulWide(a, b, wide).value).toBe(a.value * b.value);
          }
        ),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should sum four u8 values into u16 without wrapping', () => {
      fc.assert(
        fc.property(arbitraryIntegerArray('u8', 4), (arr) => {
          const expected = arr.elements.reduce((acc, e) => acc + (e.kind === 'integer' ? e.value : 0n), 0n);
          expect(arraySum(arr, 'u16').value).toBe(expected);
        }),
        PROPERTY_TEST_CONFIG
      );
    });
  });
});
