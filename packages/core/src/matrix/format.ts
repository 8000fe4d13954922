/**
 * Text rendering for matrices
 *
 * Each row is printed in parentheses with every element right-justified to
 * the output width, and a blank line follows the matrix:
 *
 * ```text
 * (     1     2 )
 * (     3     4 )
 *
 * ```
 *
 * The output is meant for people, not for parsing back.
 */

import type { AnyDType } from '../dtype/types';
import type { FormatOptions, OutputSink, ReadonlyMatrix } from './types';

export const DEFAULT_OUTPUT_WIDTH = 5;

// Shared per-dtype widths. Set once during setup; not synchronized.
const outputWidths = new Map<AnyDType, number>();

function assertValidWidth(width: number): void {
  if (!Number.isSafeInteger(width) || width < 0) {
    throw new RangeError(`Output width must be a non-negative integer, got ${String(width)}`);
  }
}

/**
 * Set the element column width used for every matrix of `dtype`
 *
 * @example
 * setOutputWidth(float64, 3);
 */
export function setOutputWidth(dtype: AnyDType, width: number): void {
  assertValidWidth(width);
  outputWidths.set(dtype, width);
}

/**
 * Current element column width for `dtype`
 */
export function getOutputWidth(dtype: AnyDType): number {
  return outputWidths.get(dtype) ?? DEFAULT_OUTPUT_WIDTH;
}

/**
 * Restore the default width for one dtype, or for all of them
 */
export function resetOutputWidth(dtype?: AnyDType): void {
  if (dtype === undefined) {
    outputWidths.clear();
  } else {
    outputWidths.delete(dtype);
  }
}

/**
 * Render a matrix as text
 *
 * An empty (moved-from) matrix renders as `"()\n"`.
 */
export function formatMatrix<T>(matrix: ReadonlyMatrix<T>, options: FormatOptions = {}): string {
  if (matrix.rows === 0 && matrix.cols === 0) {
    return '()\n';
  }

  let width: number;
  if (options.width === undefined) {
    width = getOutputWidth(matrix.dtype);
  } else {
    assertValidWidth(options.width);
    width = options.width;
  }

  const { dtype } = matrix;
  let out = '';
  for (let i = 0; i < matrix.rows; i++) {
    out += '( ';
    for (let j = 0; j < matrix.cols; j++) {
      out += `${dtype.format(matrix.element(i, j)).padStart(width)} `;
    }
    out += ')\n';
  }
  return `${out}\n`;
}

/**
 * Write the rendered matrix to a sink such as `process.stdout`
 */
export function writeMatrix<T>(
  sink: OutputSink,
  matrix: ReadonlyMatrix<T>,
  options?: FormatOptions,
): void {
  sink.write(formatMatrix(matrix, options));
}
