/**
 * Error classes for matrix construction, access and arithmetic
 *
 * There is one class per failure kind. Callers tell kinds apart with
 * `instanceof` or by the `code` discriminant.
 */

export type MatrixErrorCode =
  | 'ZERO_SIZE'
  | 'SIZE_MISMATCH'
  | 'INCOMPATIBLE_SIZES_ADD'
  | 'INCOMPATIBLE_SIZES_MULTIPLY'
  | 'INDEX_OUT_OF_RANGE';

export type MatrixErrorCategory = 'construction' | 'arithmetic' | 'bounds';

/**
 * Base matrix error class with error categories and context
 */
export class MatrixError extends Error {
  public readonly code: MatrixErrorCode;
  public readonly category: MatrixErrorCategory;

  constructor(
    message: string,
    code: MatrixErrorCode,
    category: MatrixErrorCategory,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'MatrixError';
    this.code = code;
    this.category = category;
  }

  getFormattedMessage(): string {
    let formatted = `${this.name}: ${this.message}`;
    if (this.context && Object.keys(this.context).length > 0) {
      formatted += '\nContext:\n';
      for (const [key, value] of Object.entries(this.context)) {
        formatted += `  ${key}: ${String(value)}\n`;
      }
    }
    return formatted;
  }
}

/**
 * A requested row or column count is zero
 */
export class ZeroSizeError extends MatrixError {
  constructor(rows: number, cols: number) {
    super(
      `Cannot create a matrix with zero rows or columns (requested ${rows}x${cols})`,
      'ZERO_SIZE',
      'construction',
      { rows, cols },
    );
    this.name = 'ZeroSizeError';
  }
}

/**
 * The element sequence does not hold exactly rows*cols values
 */
export class SizeMismatchError extends MatrixError {
  constructor(rows: number, cols: number, received: number) {
    super(
      `Expected ${rows * cols} elements for a ${rows}x${cols} matrix, got ${received}`,
      'SIZE_MISMATCH',
      'construction',
      { rows, cols, expected: rows * cols, received },
    );
    this.name = 'SizeMismatchError';
  }
}

/**
 * Operands of an addition or subtraction differ in shape
 */
export class IncompatibleSizesAddError extends MatrixError {
  constructor(operation: 'add' | 'sub', left: readonly [number, number], right: readonly [number, number]) {
    super(
      `Cannot ${operation} matrices of shapes ${left[0]}x${left[1]} and ${right[0]}x${right[1]}: ` +
        'both must have the same number of rows and columns',
      'INCOMPATIBLE_SIZES_ADD',
      'arithmetic',
      { operation, left: `${left[0]}x${left[1]}`, right: `${right[0]}x${right[1]}` },
    );
    this.name = 'IncompatibleSizesAddError';
  }
}

/**
 * The left operand's column count differs from the right operand's row count
 */
export class IncompatibleSizesMultiplyError extends MatrixError {
  constructor(left: readonly [number, number], right: readonly [number, number]) {
    super(
      `Cannot multiply matrices of shapes ${left[0]}x${left[1]} and ${right[0]}x${right[1]}: ` +
        `the first has ${left[1]} columns but the second has ${right[0]} rows`,
      'INCOMPATIBLE_SIZES_MULTIPLY',
      'arithmetic',
      { left: `${left[0]}x${left[1]}`, right: `${right[0]}x${right[1]}` },
    );
    this.name = 'IncompatibleSizesMultiplyError';
  }
}

/**
 * Checked access outside the matrix
 */
export class IndexOutOfRangeError extends MatrixError {
  constructor(row: number, col: number, rows: number, cols: number) {
    super(
      `Index (${row}, ${col}) out of range for a ${rows}x${cols} matrix`,
      'INDEX_OUT_OF_RANGE',
      'bounds',
      { row, col, rows, cols },
    );
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Errors a construction form can produce
 */
export type ConstructionError = ZeroSizeError | SizeMismatchError;

/**
 * Type guard for any matrix error
 */
export function isMatrixError(error: unknown): error is MatrixError {
  return error instanceof MatrixError;
}
