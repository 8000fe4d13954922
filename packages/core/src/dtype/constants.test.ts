/**
 * Runtime tests for dtype/constants.ts
 */

import { describe, it, expect } from 'vitest';
import {
  float64,
  float32,
  int32,
  int64,
  complex128,
  complex,
  defineDType,
  formatFloat,
  DTYPE_CONSTANTS_MAP,
  getDTypeConstant,
  isBuiltinDTypeName,
} from './constants';
import type { DType } from './types';

describe('DType Constants', () => {
  describe('Individual Constants', () => {
    it('should define float64 correctly', () => {
      expect(float64.__dtype).toBe('float64');
      expect(float64.zero).toBe(0);
      expect(float64.__commutative).toBe(true);
      expect(float64.__buffer(3)).toBeInstanceOf(Float64Array);
      expect(float64.__buffer(3).length).toBe(3);
    });

    it('should define float32 correctly', () => {
      expect(float32.__dtype).toBe('float32');
      expect(float32.__buffer(2)).toBeInstanceOf(Float32Array);
    });

    it('should define int32 correctly', () => {
      expect(int32.__dtype).toBe('int32');
      expect(int32.__buffer(2)).toBeInstanceOf(Int32Array);
    });

    it('should define int64 correctly', () => {
      expect(int64.__dtype).toBe('int64');
      expect(int64.zero).toBe(0n);
      expect(int64.__buffer(2)).toBeInstanceOf(BigInt64Array);
    });

    it('should define complex128 correctly', () => {
      expect(complex128.__dtype).toBe('complex128');
      expect(complex128.zero).toEqual({ re: 0, im: 0 });
      expect(Array.isArray(complex128.__buffer(2))).toBe(true);
    });

    it('should freeze every constant', () => {
      for (const dtype of Object.values(DTYPE_CONSTANTS_MAP)) {
        expect(Object.isFrozen(dtype)).toBe(true);
      }
    });
  });

  describe('Element Arithmetic', () => {
    it('should do plain float64 arithmetic', () => {
      expect(float64.add(1.5, 2.25)).toBe(3.75);
      expect(float64.sub(1, 3)).toBe(-2);
      expect(float64.neg(4)).toBe(-4);
      expect(float64.mul(3, 0.5)).toBe(1.5);
    });

    it('should round float32 results to single precision', () => {
      expect(float32.add(0.1, 0.2)).toBe(Math.fround(0.1 + 0.2));
      expect(float32.mul(1 / 3, 3)).toBe(Math.fround((1 / 3) * 3));
    });

    it('should wrap int32 arithmetic at 32 bits', () => {
      expect(int32.add(2147483647, 1)).toBe(-2147483648);
      expect(int32.sub(-2147483648, 1)).toBe(2147483647);
      expect(int32.mul(65536, 65536)).toBe(0);
      expect(int32.neg(-2147483648)).toBe(-2147483648);
      expect(int32.mul(-7, 6)).toBe(-42);
    });

    it('should wrap int64 arithmetic at 64 bits', () => {
      expect(int64.add(9223372036854775807n, 1n)).toBe(-9223372036854775808n);
      expect(int64.mul(6n, -7n)).toBe(-42n);
      expect(int64.neg(5n)).toBe(-5n);
      expect(int64.sub(0n, 1n)).toBe(-1n);
    });

    it('should multiply complex numbers', () => {
      // (1 + 2i)(3 + 4i) = 3 + 4i + 6i + 8i² = -5 + 10i
      expect(complex128.mul(complex(1, 2), complex(3, 4))).toEqual({ re: -5, im: 10 });
      expect(complex128.add(complex(1, 2), complex(3, 4))).toEqual({ re: 4, im: 6 });
      expect(complex128.neg(complex(1, -2))).toEqual({ re: -1, im: 2 });
    });

    it('should compare elements', () => {
      expect(float64.equals(1, 1)).toBe(true);
      expect(float64.equals(Number.NaN, Number.NaN)).toBe(false);
      expect(complex128.equals(complex(1, 2), complex(1, 2))).toBe(true);
      expect(complex128.equals(complex(1, 2), complex(2, 1))).toBe(false);
    });
  });

  describe('Element Formatting', () => {
    it('should format floats with six significant digits', () => {
      expect(formatFloat(1)).toBe('1');
      expect(formatFloat(0.5)).toBe('0.5');
      expect(formatFloat(1 / 3)).toBe('0.333333');
      expect(formatFloat(-2.75)).toBe('-2.75');
      expect(formatFloat(123456)).toBe('123456');
      expect(formatFloat(0.0001)).toBe('0.0001');
      expect(formatFloat(Number.POSITIVE_INFINITY)).toBe('Infinity');
    });

    it('should switch to scientific notation for large and small magnitudes', () => {
      expect(formatFloat(1234567)).toBe('1.23457e+06');
      expect(formatFloat(123456789)).toBe('1.23457e+08');
      expect(formatFloat(1e6)).toBe('1e+06');
      expect(formatFloat(999999.5)).toBe('1e+06');
      expect(formatFloat(0.00001)).toBe('1e-05');
      expect(formatFloat(-2.5e-7)).toBe('-2.5e-07');
      expect(formatFloat(1.5e120)).toBe('1.5e+120');
    });

    it('should format integers and complex values', () => {
      expect(int32.format(-12)).toBe('-12');
      expect(int64.format(42n)).toBe('42');
      expect(complex128.format(complex(1.5, -2))).toBe('(1.5,-2)');
    });
  });

  describe('defineDType', () => {
    const mod7 = defineDType({
      __dtype: 'mod7',
      __jsType: 0,
      __buffer: (length: number) => new Uint8Array(length),
      __commutative: true,
      zero: 0,
      add: (a: number, b: number) => (a + b) % 7,
      sub: (a: number, b: number) => (a - b + 7) % 7,
      neg: (a: number) => (7 - a) % 7,
      mul: (a: number, b: number) => (a * b) % 7,
      equals: (a: number, b: number) => a === b,
      format: (value: number) => value.toString(),
    });

    it('should freeze a user dtype', () => {
      expect(Object.isFrozen(mod7)).toBe(true);
      expect(mod7.__dtype).toBe('mod7');
      expect(mod7.add(5, 4)).toBe(2);
      expect(mod7.neg(0)).toBe(0);
    });

    it('should keep prototype methods of a class-based dtype', () => {
      class Mod5 implements DType<'mod5', number> {
        readonly __dtype = 'mod5';
        readonly __jsType: number = 0;
        readonly __commutative = true;
        readonly zero: number = 0;
        __buffer(length: number): Uint8Array {
          return new Uint8Array(length);
        }
        add(a: number, b: number): number {
          return (a + b) % 5;
        }
        sub(a: number, b: number): number {
          return (a - b + 5) % 5;
        }
        neg(a: number): number {
          return (5 - a) % 5;
        }
        mul(a: number, b: number): number {
          return (a * b) % 5;
        }
        equals(a: number, b: number): boolean {
          return a === b;
        }
        format(value: number): string {
          return value.toString();
        }
      }

      const instance = new Mod5();
      const mod5 = defineDType(instance);
      expect(mod5).toBe(instance);
      expect(Object.isFrozen(mod5)).toBe(true);
      expect(mod5.add(3, 4)).toBe(2);
      expect(mod5.mul(3, 4)).toBe(2);
      expect(mod5.__buffer(2).length).toBe(2);
    });

    it('should reject an empty name', () => {
      expect(() => defineDType({ ...mod7, __dtype: '' })).toThrow('DType name must not be empty');
    });
  });

  describe('Lookup', () => {
    it('should look up constants by name', () => {
      expect(getDTypeConstant('float64')).toBe(float64);
      expect(getDTypeConstant('int64')).toBe(int64);
    });

    it('should recognise built-in names', () => {
      expect(isBuiltinDTypeName('complex128')).toBe(true);
      expect(isBuiltinDTypeName('bool')).toBe(false);
      expect(isBuiltinDTypeName('toString')).toBe(false);
    });
  });
});
