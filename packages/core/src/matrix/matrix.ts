/**
 * Core Matrix class implementation
 *
 * A Matrix owns a single fixed-length buffer of `rows * cols` elements in
 * row-major order: element `(r, c)` lives at offset `r * cols + c`. No two
 * matrices ever share a buffer. Copying allocates a new buffer, moving hands
 * the buffer over and leaves the source empty.
 */

import type { DType, ElementBuffer } from '../dtype/types';
import {
  IncompatibleSizesAddError,
  IncompatibleSizesMultiplyError,
  IndexOutOfRangeError,
  SizeMismatchError,
  ZeroSizeError,
} from '../errors';
import { fail, ok, unwrap, type Result } from '../result';
import { formatMatrix } from './format';
import type { FormatOptions, MatrixOptions, ReadonlyMatrix } from './types';

/**
 * Reject dimensions the container cannot represent at all
 *
 * Zero is representable (it is the ZeroSize failure); negative, fractional
 * and unsafe values are caller bugs.
 */
function assertDimension(name: 'rows' | 'cols', value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(
      `Invalid ${name}: ${String(value)}. Dimensions must be non-negative integers`,
    );
  }
}

function checkShape(rows: number, cols: number): Result<number, ZeroSizeError> {
  assertDimension('rows', rows);
  assertDimension('cols', cols);
  if (rows === 0 || cols === 0) {
    return fail(new ZeroSizeError(rows, cols));
  }
  return ok(rows * cols);
}

function isValidIndex(index: number, bound: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < bound;
}

/**
 * Dense, dynamically-sized matrix with value semantics
 *
 * @template T - Element type, described at runtime by the matrix's dtype
 *
 * @example
 * const a = Matrix.fromElements(2, 2, [1, 2, 3, 4], { dtype: float64 });
 * const b = Matrix.fromElements(2, 2, [5, 6, 7, 8], { dtype: float64 });
 * a.add(b).toArray();    // [[6, 8], [10, 12]]
 * a.matmul(b).toArray(); // [[19, 22], [43, 50]]
 */
export class Matrix<T> implements ReadonlyMatrix<T> {
  private constructor(
    private _rows: number,
    private _cols: number,
    private data: ElementBuffer<T>,
    private _dtype: DType<string, T>,
  ) {}

  // =============================================================================
  // Construction
  // =============================================================================

  /**
   * Create a matrix whose elements are NOT initialized
   *
   * WARNING: the element values are whatever the dtype's buffer holds after
   * allocation (zeros for TypedArray dtypes, `undefined` for array-backed
   * ones). Write every element before reading it.
   */
  static tryUninitialized<T>(
    rows: number,
    cols: number,
    options: MatrixOptions<T>,
  ): Result<Matrix<T>, ZeroSizeError> {
    const shape = checkShape(rows, cols);
    if (!shape.ok) {
      return shape;
    }
    const { dtype } = options;
    return ok(new Matrix(rows, cols, dtype.__buffer(shape.value), dtype));
  }

  /**
   * Create a matrix whose elements are NOT initialized
   *
   * @throws {ZeroSizeError} if rows or cols is zero
   * @see Matrix.tryUninitialized
   */
  static uninitialized<T>(rows: number, cols: number, options: MatrixOptions<T>): Matrix<T> {
    return unwrap(Matrix.tryUninitialized(rows, cols, options));
  }

  /**
   * Create a matrix with every element set to `value`
   */
  static tryFilled<T>(
    rows: number,
    cols: number,
    value: T,
    options: MatrixOptions<T>,
  ): Result<Matrix<T>, ZeroSizeError> {
    const result = Matrix.tryUninitialized(rows, cols, options);
    if (result.ok) {
      const { data } = result.value;
      for (let i = 0; i < data.length; i++) {
        data[i] = value;
      }
    }
    return result;
  }

  /**
   * Create a matrix with every element set to `value`
   *
   * @throws {ZeroSizeError} if rows or cols is zero
   */
  static filled<T>(rows: number, cols: number, value: T, options: MatrixOptions<T>): Matrix<T> {
    return unwrap(Matrix.tryFilled(rows, cols, value, options));
  }

  /**
   * Create an n x n diagonal matrix from n values; every off-diagonal
   * element is the dtype's zero
   */
  static tryDiagonal<T>(
    values: ArrayLike<T>,
    options: MatrixOptions<T>,
  ): Result<Matrix<T>, ZeroSizeError> {
    const n = values.length;
    const result = Matrix.tryUninitialized(n, n, options);
    if (result.ok) {
      const { data } = result.value;
      const { zero } = options.dtype;
      for (let i = 0; i < n; i++) {
        for (let j = 0; j < n; j++) {
          data[i * n + j] = i === j ? values[i] : zero;
        }
      }
    }
    return result;
  }

  /**
   * Create an n x n diagonal matrix from n values
   *
   * @throws {ZeroSizeError} if `values` is empty
   */
  static diagonal<T>(values: ArrayLike<T>, options: MatrixOptions<T>): Matrix<T> {
    return unwrap(Matrix.tryDiagonal(values, options));
  }

  /**
   * Create a matrix from elements given in flattened row-major order
   *
   * Element `(i, j)` is taken from `elements[i * cols + j]`, so a 2x2 matrix
   * A is given as `[A(0,0), A(0,1), A(1,0), A(1,1)]`.
   */
  static tryFromElements<T>(
    rows: number,
    cols: number,
    elements: ArrayLike<T>,
    options: MatrixOptions<T>,
  ): Result<Matrix<T>, ZeroSizeError | SizeMismatchError> {
    const shape = checkShape(rows, cols);
    if (!shape.ok) {
      return shape;
    }
    if (elements.length !== shape.value) {
      return fail(new SizeMismatchError(rows, cols, elements.length));
    }
    const { dtype } = options;
    const data = dtype.__buffer(shape.value);
    for (let i = 0; i < shape.value; i++) {
      data[i] = elements[i];
    }
    return ok(new Matrix(rows, cols, data, dtype));
  }

  /**
   * Create a matrix from elements given in flattened row-major order
   *
   * @throws {ZeroSizeError} if rows or cols is zero
   * @throws {SizeMismatchError} if `elements.length !== rows * cols`
   */
  static fromElements<T>(
    rows: number,
    cols: number,
    elements: ArrayLike<T>,
    options: MatrixOptions<T>,
  ): Matrix<T> {
    return unwrap(Matrix.tryFromElements(rows, cols, elements, options));
  }

  /**
   * Deep copy: a new matrix with the same shape, dtype and elements and a
   * buffer of its own
   */
  static copy<T>(source: ReadonlyMatrix<T>): Matrix<T> {
    const { rows, cols, dtype } = source;
    const data = dtype.__buffer(rows * cols);
    for (let i = 0; i < rows; i++) {
      for (let j = 0; j < cols; j++) {
        data[i * cols + j] = source.element(i, j);
      }
    }
    return new Matrix(rows, cols, data, dtype);
  }

  /**
   * Transfer the buffer of `source` into a new matrix
   *
   * `source` is left empty (0 x 0, zero-length buffer). Do not read its
   * elements until it has been reassigned.
   */
  static move<T>(source: Matrix<T>): Matrix<T> {
    const moved = new Matrix(source._rows, source._cols, source.data, source._dtype);
    source.release();
    return moved;
  }

  // =============================================================================
  // Property Accessors
  // =============================================================================

  /** Number of rows */
  get rows(): number {
    return this._rows;
  }

  /** Number of columns */
  get cols(): number {
    return this._cols;
  }

  /** Total number of elements */
  get size(): number {
    return this._rows * this._cols;
  }

  /** Element type descriptor */
  get dtype(): DType<string, T> {
    return this._dtype;
  }

  /**
   * Whether this matrix has been moved from
   */
  isEmpty(): boolean {
    return this._rows === 0 && this._cols === 0;
  }

  // =============================================================================
  // Element Access
  // =============================================================================

  /**
   * Read an element WITHOUT range checking
   *
   * Out-of-range indices are undefined behavior. Use `at` unless the indices
   * are known to be valid, as in the arithmetic loops.
   */
  element(row: number, col: number): T {
    return this.data[row * this._cols + col];
  }

  /**
   * Write an element WITHOUT range checking
   *
   * Out-of-range indices are undefined behavior: the write may be dropped
   * or land on a different element.
   */
  setElement(row: number, col: number, value: T): void {
    this.data[row * this._cols + col] = value;
  }

  /**
   * Read an element with range checking
   */
  tryAt(row: number, col: number): Result<T, IndexOutOfRangeError> {
    if (!isValidIndex(row, this._rows) || !isValidIndex(col, this._cols)) {
      return fail(new IndexOutOfRangeError(row, col, this._rows, this._cols));
    }
    return ok(this.data[row * this._cols + col]);
  }

  /**
   * Read an element with range checking
   *
   * @throws {IndexOutOfRangeError} if the element is out of range
   */
  at(row: number, col: number): T {
    return unwrap(this.tryAt(row, col));
  }

  /**
   * Write an element with range checking
   */
  trySetAt(row: number, col: number, value: T): Result<void, IndexOutOfRangeError> {
    if (!isValidIndex(row, this._rows) || !isValidIndex(col, this._cols)) {
      return fail(new IndexOutOfRangeError(row, col, this._rows, this._cols));
    }
    this.data[row * this._cols + col] = value;
    return ok(undefined);
  }

  /**
   * Write an element with range checking
   *
   * @throws {IndexOutOfRangeError} if the element is out of range
   */
  setAt(row: number, col: number, value: T): void {
    unwrap(this.trySetAt(row, col, value));
  }

  /**
   * Elements as nested row arrays
   */
  toArray(): T[][] {
    const result: T[][] = [];
    for (let i = 0; i < this._rows; i++) {
      const row: T[] = [];
      for (let j = 0; j < this._cols; j++) {
        row.push(this.data[i * this._cols + j]);
      }
      result.push(row);
    }
    return result;
  }

  /**
   * Elements in row-major order, copied into a plain array
   */
  toFlatArray(): T[] {
    return Array.from({ length: this.size }, (_, i) => this.data[i]);
  }

  // =============================================================================
  // Assignment
  // =============================================================================

  /**
   * Copy assignment: discard this matrix's buffer and replace it with a deep
   * copy of `source`
   *
   * @returns this matrix
   */
  assign(source: ReadonlyMatrix<T>): this {
    const copy = Matrix.copy(source);
    this.adopt(copy);
    return this;
  }

  /**
   * Move assignment: discard this matrix's buffer and take over the buffer
   * of `source`, which is left empty
   *
   * Moving a matrix into itself does nothing.
   *
   * @returns this matrix
   */
  moveAssign(source: Matrix<T>): this {
    if (source !== this) {
      this.adopt(source);
      source.release();
    }
    return this;
  }

  private adopt(source: Matrix<T>): void {
    this._rows = source._rows;
    this._cols = source._cols;
    this.data = source.data;
    this._dtype = source._dtype;
  }

  private release(): void {
    this._rows = 0;
    this._cols = 0;
    this.data = this._dtype.__buffer(0);
  }

  // =============================================================================
  // Arithmetic
  // =============================================================================

  /**
   * Element-wise sum
   *
   * @throws {IncompatibleSizesAddError} if the shapes differ
   */
  add(other: ReadonlyMatrix<T>): Matrix<T> {
    this.assertSameShape('add', other);
    const { dtype } = this;
    const c = Matrix.uninitialized(this._rows, this._cols, { dtype });
    for (let i = 0; i < this._rows; i++) {
      for (let j = 0; j < this._cols; j++) {
        c.setElement(i, j, dtype.add(this.element(i, j), other.element(i, j)));
      }
    }
    return c;
  }

  /**
   * In-place sum: `this` becomes `this.add(other)`
   *
   * @throws {IncompatibleSizesAddError} if the shapes differ
   */
  addAssign(other: ReadonlyMatrix<T>): this {
    return this.moveAssign(this.add(other));
  }

  /**
   * Element-wise negation
   */
  neg(): Matrix<T> {
    const { dtype } = this;
    const c = Matrix.uninitialized(this._rows, this._cols, { dtype });
    for (let i = 0; i < this._rows; i++) {
      for (let j = 0; j < this._cols; j++) {
        c.setElement(i, j, dtype.neg(this.element(i, j)));
      }
    }
    return c;
  }

  /**
   * Element-wise difference
   *
   * @throws {IncompatibleSizesAddError} if the shapes differ
   */
  sub(other: ReadonlyMatrix<T>): Matrix<T> {
    this.assertSameShape('sub', other);
    const { dtype } = this;
    const c = Matrix.uninitialized(this._rows, this._cols, { dtype });
    for (let i = 0; i < this._rows; i++) {
      for (let j = 0; j < this._cols; j++) {
        c.setElement(i, j, dtype.sub(this.element(i, j), other.element(i, j)));
      }
    }
    return c;
  }

  /**
   * In-place difference: `this` becomes `this.sub(other)`
   *
   * @throws {IncompatibleSizesAddError} if the shapes differ
   */
  subAssign(other: ReadonlyMatrix<T>): this {
    return this.moveAssign(this.sub(other));
  }

  /**
   * Matrix product, `c(i, j) = sum over k of this(i, k) * other(k, j)`
   *
   * @returns a new `this.rows x other.cols` matrix
   * @throws {IncompatibleSizesMultiplyError} if `this.cols !== other.rows`
   */
  matmul(other: ReadonlyMatrix<T>): Matrix<T> {
    if (this._cols !== other.rows) {
      throw new IncompatibleSizesMultiplyError([this._rows, this._cols], [other.rows, other.cols]);
    }
    const { dtype } = this;
    const c = Matrix.uninitialized(this._rows, other.cols, { dtype });
    for (let i = 0; i < this._rows; i++) {
      for (let j = 0; j < other.cols; j++) {
        let sum = dtype.zero;
        for (let k = 0; k < this._cols; k++) {
          sum = dtype.add(sum, dtype.mul(this.element(i, k), other.element(k, j)));
        }
        c.setElement(i, j, sum);
      }
    }
    return c;
  }

  /**
   * Scalar on the left: every element becomes `scalar * m(i, j)`
   */
  static scalarMul<T>(scalar: T, m: ReadonlyMatrix<T>): Matrix<T> {
    const { dtype } = m;
    const c = Matrix.uninitialized(m.rows, m.cols, { dtype });
    for (let i = 0; i < m.rows; i++) {
      for (let j = 0; j < m.cols; j++) {
        c.setElement(i, j, dtype.mul(scalar, m.element(i, j)));
      }
    }
    return c;
  }

  /**
   * Scalar on the right
   *
   * Computed as `Matrix.scalarMul(scalar, this)`, which equals
   * `this(i, j) * scalar` only when the dtype's multiplication commutes.
   *
   * @throws {RangeError} if the dtype's `__commutative` is false
   */
  scale(scalar: T): Matrix<T> {
    if (!this._dtype.__commutative) {
      throw new RangeError(
        `Cannot multiply a ${this._dtype.__dtype} matrix by a scalar on the right: ` +
          'its multiplication is not commutative, use Matrix.scalarMul(scalar, m)',
      );
    }
    return Matrix.scalarMul(scalar, this);
  }

  /**
   * Same shape and every element equal under the dtype's `equals`
   */
  equals(other: ReadonlyMatrix<T>): boolean {
    if (this._rows !== other.rows || this._cols !== other.cols) {
      return false;
    }
    for (let i = 0; i < this._rows; i++) {
      for (let j = 0; j < this._cols; j++) {
        if (!this._dtype.equals(this.element(i, j), other.element(i, j))) {
          return false;
        }
      }
    }
    return true;
  }

  private assertSameShape(operation: 'add' | 'sub', other: ReadonlyMatrix<T>): void {
    if (this._rows !== other.rows || this._cols !== other.cols) {
      throw new IncompatibleSizesAddError(
        operation,
        [this._rows, this._cols],
        [other.rows, other.cols],
      );
    }
  }

  // =============================================================================
  // Utilities
  // =============================================================================

  /**
   * Deep copy of this matrix
   */
  clone(): Matrix<T> {
    return Matrix.copy(this);
  }

  /**
   * Render the elements for display
   *
   * @example
   * console.log(Matrix.diagonal([1, 2], { dtype: float64 }).format({ width: 3 }));
   * // (   1   0 )
   * // (   0   2 )
   */
  format(options?: FormatOptions): string {
    return formatMatrix(this, options);
  }

  /**
   * One-line summary of the matrix metadata
   */
  toString(): string {
    return `Matrix(rows=${this._rows}, cols=${this._cols}, dtype=${this._dtype.__dtype})`;
  }
}
