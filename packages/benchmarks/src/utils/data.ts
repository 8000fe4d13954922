/**
 * Data generation utilities for benchmarks
 */

import { Matrix, complex, int32, type Complex, type DType } from '@densematrix/core';

// Integer dtypes truncate values in [0, 1) to zero
const INTEGER_DTYPES: ReadonlySet<DType<string, number>> = new Set<DType<string, number>>([
  int32,
]);

/**
 * Generate `count` random values in [0, 1)
 */
export function generateRandomElements(count: number): number[] {
  const data = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    data[i] = Math.random();
  }
  return data;
}

/**
 * Generate `count` random integers in [min, max)
 */
export function generateRandomIntegers(count: number, min = -100, max = 100): number[] {
  return Array.from({ length: count }, () => min + Math.floor(Math.random() * (max - min)));
}

/**
 * Generate `count` values counting up from `start`
 */
export function generateSequentialElements(count: number, start = 0): number[] {
  return Array.from({ length: count }, (_, i) => start + i);
}

/**
 * Generate `count` random complex values with parts in [0, 1)
 */
export function generateRandomComplexElements(count: number): Complex[] {
  return Array.from({ length: count }, () => complex(Math.random(), Math.random()));
}

/**
 * Random matrix of a numeric dtype
 *
 * Integer dtypes get entries in [-100, 100), floating-point dtypes in [0, 1).
 */
export function randomMatrix(
  rows: number,
  cols: number,
  dtype: DType<string, number>,
): Matrix<number> {
  const count = rows * cols;
  const data = INTEGER_DTYPES.has(dtype)
    ? generateRandomIntegers(count)
    : generateRandomElements(count);
  return Matrix.fromElements(rows, cols, data, { dtype });
}

/**
 * Random matrix of a bigint dtype, with entries in [-100, 100)
 */
export function randomBigIntMatrix(
  rows: number,
  cols: number,
  dtype: DType<string, bigint>,
): Matrix<bigint> {
  const data = Array.from({ length: rows * cols }, () =>
    BigInt(Math.floor(Math.random() * 200) - 100),
  );
  return Matrix.fromElements(rows, cols, data, { dtype });
}
