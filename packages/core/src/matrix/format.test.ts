/**
 * Tests for matrix text rendering and the shared output width
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Matrix } from './matrix';
import {
  DEFAULT_OUTPUT_WIDTH,
  formatMatrix,
  getOutputWidth,
  resetOutputWidth,
  setOutputWidth,
  writeMatrix,
} from './format';
import { float64, int32, int64, complex128, complex } from '../dtype/constants';
import type { OutputSink } from './types';

afterEach(() => {
  resetOutputWidth();
});

describe('formatMatrix', () => {
  it('should right-justify elements to the default width', () => {
    const m = Matrix.fromElements(2, 2, [1, 2, 3, 4], { dtype: float64 });
    expect(formatMatrix(m)).toBe('(     1     2 )\n(     3     4 )\n\n');
  });

  it('should print one line per row', () => {
    const m = Matrix.fromElements(3, 1, [7, 8, 9], { dtype: int32 });
    expect(formatMatrix(m)).toBe('(     7 )\n(     8 )\n(     9 )\n\n');
  });

  it('should render an empty matrix as a pair of parentheses', () => {
    const m = Matrix.filled(2, 2, 1, { dtype: float64 });
    Matrix.move(m);
    expect(formatMatrix(m)).toBe('()\n');
    expect(m.format()).toBe('()\n');
  });

  it('should not truncate elements wider than the width', () => {
    const m = Matrix.fromElements(1, 2, [123456, -7], { dtype: int32 });
    expect(formatMatrix(m, { width: 2 })).toBe('( 123456 -7 )\n\n');
  });

  it('should separate elements by a single space at width zero', () => {
    const m = Matrix.fromElements(2, 2, [1, 2, 3, 4], { dtype: float64 });
    expect(formatMatrix(m, { width: 0 })).toBe('( 1 2 )\n( 3 4 )\n\n');
  });

  it('should format floats with six significant digits', () => {
    const m = Matrix.fromElements(1, 3, [2.5, 1 / 3, 0.1 + 0.2], { dtype: float64 });
    expect(formatMatrix(m, { width: 0 })).toBe('( 2.5 0.333333 0.3 )\n\n');
  });

  it('should format bigint and complex elements through their dtype', () => {
    const big = Matrix.fromElements(1, 2, [-3n, 40n], { dtype: int64 });
    expect(formatMatrix(big, { width: 3 })).toBe('(  -3  40 )\n\n');

    const z = Matrix.filled(1, 1, complex(1, -0.5), { dtype: complex128 });
    expect(formatMatrix(z, { width: 10 })).toBe('(   (1,-0.5) )\n\n');
  });

  it('should render the diagonal form', () => {
    const m = Matrix.diagonal([1, 2], { dtype: int32 });
    expect(m.format({ width: 1 })).toBe('( 1 0 )\n( 0 2 )\n\n');
  });

  it('should reject an invalid width override', () => {
    const m = Matrix.filled(1, 1, 0, { dtype: float64 });
    expect(() => formatMatrix(m, { width: -1 })).toThrow(RangeError);
    expect(() => formatMatrix(m, { width: 1.5 })).toThrow(
      'Output width must be a non-negative integer, got 1.5',
    );
  });
});

describe('output width', () => {
  it('should default to five', () => {
    expect(DEFAULT_OUTPUT_WIDTH).toBe(5);
    expect(getOutputWidth(float64)).toBe(5);
    expect(getOutputWidth(complex128)).toBe(5);
  });

  it('should apply a shared width to every matrix of the dtype', () => {
    setOutputWidth(float64, 3);
    const a = Matrix.fromElements(1, 2, [1, 2], { dtype: float64 });
    const b = Matrix.filled(1, 1, 9, { dtype: float64 });
    expect(getOutputWidth(float64)).toBe(3);
    expect(formatMatrix(a)).toBe('(   1   2 )\n\n');
    expect(b.format()).toBe('(   9 )\n\n');
  });

  it('should keep widths separate per dtype', () => {
    setOutputWidth(int32, 1);
    expect(getOutputWidth(int32)).toBe(1);
    expect(getOutputWidth(float64)).toBe(5);
    expect(formatMatrix(Matrix.filled(1, 1, 4, { dtype: float64 }))).toBe('(     4 )\n\n');
  });

  it('should let a per-call width override the shared width', () => {
    setOutputWidth(float64, 8);
    const m = Matrix.filled(1, 1, 4, { dtype: float64 });
    expect(formatMatrix(m, { width: 2 })).toBe('(  4 )\n\n');
  });

  it('should reset one dtype or all of them', () => {
    setOutputWidth(float64, 1);
    setOutputWidth(int32, 2);
    resetOutputWidth(float64);
    expect(getOutputWidth(float64)).toBe(5);
    expect(getOutputWidth(int32)).toBe(2);
    resetOutputWidth();
    expect(getOutputWidth(int32)).toBe(5);
  });

  it('should reject widths that are not non-negative integers', () => {
    expect(() => setOutputWidth(float64, -2)).toThrow(
      'Output width must be a non-negative integer, got -2',
    );
    expect(() => setOutputWidth(float64, Number.POSITIVE_INFINITY)).toThrow(RangeError);
    expect(getOutputWidth(float64)).toBe(5);
  });
});

describe('writeMatrix', () => {
  it('should write the rendered text to the sink in one chunk', () => {
    const chunks: string[] = [];
    const sink: OutputSink = {
      write(chunk: string) {
        chunks.push(chunk);
        return true;
      },
    };
    const m = Matrix.fromElements(1, 2, [5, 6], { dtype: int32 });

    writeMatrix(sink, m);
    writeMatrix(sink, m, { width: 0 });

    expect(chunks).toEqual(['(     5     6 )\n\n', '( 5 6 )\n\n']);
  });
});
