/**
 * Free-function forms of the matrix operators
 *
 * Each function mirrors an arithmetic operator: pure forms return a new
 * matrix and leave their operands alone, the `*Assign` forms overwrite the
 * left operand with the pure result and return it.
 */

import { Matrix } from './matrix';
import type { ReadonlyMatrix } from './types';

/** `a + b` */
export function add<T>(a: ReadonlyMatrix<T>, b: ReadonlyMatrix<T>): Matrix<T> {
  return a.add(b);
}

/** `a += b` */
export function addAssign<T>(a: Matrix<T>, b: ReadonlyMatrix<T>): Matrix<T> {
  return a.addAssign(b);
}

/** `-m` */
export function neg<T>(m: ReadonlyMatrix<T>): Matrix<T> {
  return m.neg();
}

/** `a - b` */
export function sub<T>(a: ReadonlyMatrix<T>, b: ReadonlyMatrix<T>): Matrix<T> {
  return a.sub(b);
}

/** `a -= b` */
export function subAssign<T>(a: Matrix<T>, b: ReadonlyMatrix<T>): Matrix<T> {
  return a.subAssign(b);
}

/** `a * b` (matrix product) */
export function matmul<T>(a: ReadonlyMatrix<T>, b: ReadonlyMatrix<T>): Matrix<T> {
  return a.matmul(b);
}

/** `s * m` */
export function scalarMul<T>(scalar: T, m: ReadonlyMatrix<T>): Matrix<T> {
  return Matrix.scalarMul(scalar, m);
}

/**
 * `m * s`, computed as `s * m`
 *
 * @throws {RangeError} if the dtype's multiplication is not commutative
 */
export function mulScalar<T>(m: ReadonlyMatrix<T>, scalar: T): Matrix<T> {
  return m.scale(scalar);
}

/** Same shape and equal elements */
export function equals<T>(a: ReadonlyMatrix<T>, b: ReadonlyMatrix<T>): boolean {
  return a.equals(b);
}
