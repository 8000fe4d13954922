/**
 * Built-in dtype constants
 *
 * Each constant is a frozen descriptor that satisfies its DType interface and
 * is passed to the matrix factories as `{ dtype }`.
 */

import type {
  BuiltinDTypeName,
  Complex,
  Complex128,
  DType,
  Float32,
  Float64,
  Int32,
  Int64,
} from './types';

/**
 * Render a floating-point value with six significant digits, dropping
 * trailing zeros
 *
 * Exponents below -4 or at least 6 switch to scientific notation with a
 * two-digit exponent: `1234567` renders as `1.23457e+06`.
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  const [mantissa, exponentText] = value.toExponential(5).split('e');
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= 6) {
    const digits = mantissa.includes('.') ? mantissa.replace(/\.?0+$/, '') : mantissa;
    const sign = exponent < 0 ? '-' : '+';
    return `${digits}e${sign}${Math.abs(exponent).toString().padStart(2, '0')}`;
  }
  return Number(value.toPrecision(6)).toString();
}

/**
 * 64-bit IEEE 754 floating point, stored in a Float64Array
 */
export const float64 = Object.freeze({
  __dtype: 'float64',
  __jsType: 0 as number,
  __buffer: (length: number) => new Float64Array(length),
  __commutative: true,
  zero: 0 as number,
  add: (a: number, b: number) => a + b,
  sub: (a: number, b: number) => a - b,
  neg: (a: number) => -a,
  mul: (a: number, b: number) => a * b,
  equals: (a: number, b: number) => a === b,
  format: formatFloat,
} as const) satisfies Float64;

/**
 * 32-bit IEEE 754 floating point, stored in a Float32Array
 *
 * Every result is rounded to single precision so that intermediate values
 * (the matmul accumulator in particular) match what the buffer would hold.
 */
export const float32 = Object.freeze({
  __dtype: 'float32',
  __jsType: 0 as number,
  __buffer: (length: number) => new Float32Array(length),
  __commutative: true,
  zero: 0 as number,
  add: (a: number, b: number) => Math.fround(a + b),
  sub: (a: number, b: number) => Math.fround(a - b),
  neg: (a: number) => -a,
  mul: (a: number, b: number) => Math.fround(a * b),
  equals: (a: number, b: number) => a === b,
  format: formatFloat,
} as const) satisfies Float32;

/**
 * 32-bit signed integer with two's complement wrap-around, stored in an
 * Int32Array
 */
export const int32 = Object.freeze({
  __dtype: 'int32',
  __jsType: 0 as number,
  __buffer: (length: number) => new Int32Array(length),
  __commutative: true,
  zero: 0 as number,
  add: (a: number, b: number) => (a + b) | 0,
  sub: (a: number, b: number) => (a - b) | 0,
  neg: (a: number) => -a | 0,
  mul: (a: number, b: number) => Math.imul(a, b),
  equals: (a: number, b: number) => a === b,
  format: (value: number) => value.toString(),
} as const) satisfies Int32;

/**
 * 64-bit signed integer with two's complement wrap-around, stored in a
 * BigInt64Array
 */
export const int64 = Object.freeze({
  __dtype: 'int64',
  __jsType: 0n as bigint,
  __buffer: (length: number) => new BigInt64Array(length),
  __commutative: true,
  zero: 0n as bigint,
  add: (a: bigint, b: bigint) => BigInt.asIntN(64, a + b),
  sub: (a: bigint, b: bigint) => BigInt.asIntN(64, a - b),
  neg: (a: bigint) => BigInt.asIntN(64, -a),
  mul: (a: bigint, b: bigint) => BigInt.asIntN(64, a * b),
  equals: (a: bigint, b: bigint) => a === b,
  format: (value: bigint) => value.toString(),
} as const) satisfies Int64;

/**
 * Build a complex value
 */
export function complex(re: number, im = 0): Complex {
  return Object.freeze({ re, im });
}

const COMPLEX_ZERO = complex(0, 0);

/**
 * Complex numbers with float64 parts, stored in a plain array
 */
export const complex128 = Object.freeze({
  __dtype: 'complex128',
  __jsType: COMPLEX_ZERO,
  __buffer: (length: number) => new Array<Complex>(length),
  __commutative: true,
  zero: COMPLEX_ZERO,
  add: (a: Complex, b: Complex) => complex(a.re + b.re, a.im + b.im),
  sub: (a: Complex, b: Complex) => complex(a.re - b.re, a.im - b.im),
  neg: (a: Complex) => complex(-a.re, -a.im),
  mul: (a: Complex, b: Complex) =>
    complex(a.re * b.re - a.im * b.im, a.re * b.im + a.im * b.re),
  equals: (a: Complex, b: Complex) => a.re === b.re && a.im === b.im,
  format: (value: Complex) => `(${formatFloat(value.re)},${formatFloat(value.im)})`,
} as const) satisfies Complex128;

/**
 * Freeze a user-defined element type
 *
 * The argument itself is frozen and returned, so a class instance keeps its
 * prototype methods.
 *
 * @example
 * const mod7 = defineDType({
 *   __dtype: 'mod7',
 *   __jsType: 0,
 *   __buffer: (n) => new Uint8Array(n),
 *   __commutative: true,
 *   zero: 0,
 *   add: (a, b) => (a + b) % 7,
 *   sub: (a, b) => (a - b + 7) % 7,
 *   neg: (a) => (7 - a) % 7,
 *   mul: (a, b) => (a * b) % 7,
 *   equals: (a, b) => a === b,
 *   format: (v) => v.toString(),
 * });
 */
export function defineDType<const Name extends string, T>(
  dtype: DType<Name, T>,
): Readonly<DType<Name, T>> {
  if (dtype.__dtype.length === 0) {
    throw new Error('DType name must not be empty');
  }
  return Object.freeze(dtype);
}

/**
 * Map of dtype names to their constants
 */
export const DTYPE_CONSTANTS_MAP = {
  float64,
  float32,
  int32,
  int64,
  complex128,
} as const satisfies Record<BuiltinDTypeName, unknown>;

/**
 * Look up a built-in dtype constant by name
 */
export function getDTypeConstant<N extends BuiltinDTypeName>(
  name: N,
): (typeof DTYPE_CONSTANTS_MAP)[N] {
  return DTYPE_CONSTANTS_MAP[name];
}

/**
 * Check whether a string names a built-in dtype
 */
export function isBuiltinDTypeName(name: string): name is BuiltinDTypeName {
  return Object.prototype.hasOwnProperty.call(DTYPE_CONSTANTS_MAP, name);
}
