/**
 * Public types for the matrix module
 */

import type { DType } from '../dtype/types';
import type { Result } from '../result';
import type { IndexOutOfRangeError } from '../errors';
import type { Matrix } from './matrix';

/**
 * Options accepted by every construction form that needs an element type
 */
export interface MatrixOptions<T> {
  readonly dtype: DType<string, T>;
}

/**
 * Options for rendering a matrix as text
 */
export interface FormatOptions {
  /**
   * Minimum width of every element column. Defaults to the shared output
   * width of the matrix's dtype.
   */
  readonly width?: number;
}

/**
 * Anything that accepts text, such as `process.stdout`
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Read-only view of a matrix
 *
 * Exposes the queries, reading accessors and pure operations. A function
 * that takes a ReadonlyMatrix cannot write elements or reassign the matrix.
 */
export interface ReadonlyMatrix<T> {
  readonly rows: number;
  readonly cols: number;
  readonly size: number;
  readonly dtype: DType<string, T>;

  isEmpty(): boolean;

  /**
   * Read an element WITHOUT range checking
   *
   * Indices outside `[0, rows) x [0, cols)` are undefined behavior: the
   * result may be `undefined` or a different element.
   */
  element(row: number, col: number): T;
  /** Read an element, throwing IndexOutOfRangeError when out of bounds */
  at(row: number, col: number): T;
  /** Read an element, reporting out-of-bounds indices as a failed Result */
  tryAt(row: number, col: number): Result<T, IndexOutOfRangeError>;

  toArray(): T[][];
  toFlatArray(): T[];

  add(other: ReadonlyMatrix<T>): Matrix<T>;
  sub(other: ReadonlyMatrix<T>): Matrix<T>;
  neg(): Matrix<T>;
  matmul(other: ReadonlyMatrix<T>): Matrix<T>;
  scale(scalar: T): Matrix<T>;
  equals(other: ReadonlyMatrix<T>): boolean;
  clone(): Matrix<T>;

  format(options?: FormatOptions): string;
  toString(): string;
}
