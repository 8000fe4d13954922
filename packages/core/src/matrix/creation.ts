/**
 * Matrix creation entry point
 *
 * `matrix()` picks a construction form from the shape of its arguments, the
 * way an overloaded constructor would:
 *
 * | Call                                   | Form            |
 * |----------------------------------------|-----------------|
 * | `matrix(rows, cols, options)`          | uninitialized   |
 * | `matrix(rows, cols, value, options)`   | filled          |
 * | `matrix(rows, cols, elements, options)`| flattened       |
 * | `matrix(diagonal, options)`            | diagonal        |
 *
 * An array or TypedArray in third position always selects the flattened
 * form.
 */

import type { ConstructionError, SizeMismatchError, ZeroSizeError } from '../errors';
import { unwrap, type Result } from '../result';
import { Matrix } from './matrix';
import type { MatrixOptions } from './types';

type MatrixArgs<T> =
  | readonly [rows: number, cols: number, options: MatrixOptions<T>]
  | readonly [rows: number, cols: number, source: T | ArrayLike<T>, options: MatrixOptions<T>]
  | readonly [diagonal: ArrayLike<T>, options: MatrixOptions<T>];

function isElementSequence<T>(value: T | ArrayLike<T>): value is ArrayLike<T> {
  return Array.isArray(value) || (ArrayBuffer.isView(value) && !(value instanceof DataView));
}

function construct<T>(args: MatrixArgs<T>): Result<Matrix<T>, ConstructionError> {
  if (args.length === 2) {
    const [diagonal, options] = args;
    return Matrix.tryDiagonal(diagonal, options);
  }
  if (args.length === 3) {
    const [rows, cols, options] = args;
    return Matrix.tryUninitialized(rows, cols, options);
  }
  const [rows, cols, source, options] = args;
  if (isElementSequence(source)) {
    return Matrix.tryFromElements(rows, cols, source, options);
  }
  return Matrix.tryFilled(rows, cols, source, options);
}

/**
 * Create a matrix, reporting construction failures as a Result
 *
 * @example
 * const result = tryMatrix(0, 3, { dtype: float64 });
 * if (!result.ok) {
 *   result.error.code; // 'ZERO_SIZE'
 * }
 */
export function tryMatrix<T>(
  rows: number,
  cols: number,
  elements: ArrayLike<T>,
  options: MatrixOptions<T>,
): Result<Matrix<T>, ZeroSizeError | SizeMismatchError>;
export function tryMatrix<T>(
  rows: number,
  cols: number,
  value: T,
  options: MatrixOptions<T>,
): Result<Matrix<T>, ZeroSizeError>;
export function tryMatrix<T>(
  rows: number,
  cols: number,
  options: MatrixOptions<T>,
): Result<Matrix<T>, ZeroSizeError>;
export function tryMatrix<T>(
  diagonal: ArrayLike<T>,
  options: MatrixOptions<T>,
): Result<Matrix<T>, ZeroSizeError>;
export function tryMatrix<T>(...args: MatrixArgs<T>): Result<Matrix<T>, ConstructionError> {
  return construct(args);
}

/**
 * Create a matrix
 *
 * @throws {ZeroSizeError} if a dimension (or the diagonal) is empty
 * @throws {SizeMismatchError} if a flattened element list has the wrong length
 *
 * @example
 * const a = matrix(3, 4, { dtype: float64 });              // uninitialized 3x4
 * const b = matrix(4, 5, 0, { dtype: float64 });           // 4x5 of zeros
 * const c = matrix([1, 2, 3], { dtype: float64 });         // 3x3 diagonal
 * const d = matrix(2, 2, [1, 2, 3, 4], { dtype: float64 }); // 2x2 row-major
 */
export function matrix<T>(
  rows: number,
  cols: number,
  elements: ArrayLike<T>,
  options: MatrixOptions<T>,
): Matrix<T>;
export function matrix<T>(rows: number, cols: number, value: T, options: MatrixOptions<T>): Matrix<T>;
export function matrix<T>(rows: number, cols: number, options: MatrixOptions<T>): Matrix<T>;
export function matrix<T>(diagonal: ArrayLike<T>, options: MatrixOptions<T>): Matrix<T>;
export function matrix<T>(...args: MatrixArgs<T>): Matrix<T> {
  return unwrap(construct(args));
}
