/**
 * Tests for the matrix() / tryMatrix() creation entry points
 */

import { describe, it, expect } from 'vitest';
import { matrix, tryMatrix } from './creation';
import { float64, float32, int64, complex128, complex } from '../dtype/constants';
import { SizeMismatchError, ZeroSizeError } from '../errors';

describe('matrix', () => {
  it('should create an uninitialized matrix from rows and cols', () => {
    const m = matrix(3, 4, { dtype: float64 });
    expect(m.rows).toBe(3);
    expect(m.cols).toBe(4);
    expect(m.dtype).toBe(float64);
  });

  it('should create a filled matrix from a scalar', () => {
    const m = matrix(2, 3, 1.5, { dtype: float64 });
    expect(m.toFlatArray()).toEqual([1.5, 1.5, 1.5, 1.5, 1.5, 1.5]);
  });

  it('should create a matrix from row-major elements', () => {
    const m = matrix(2, 2, [1, 2, 3, 4], { dtype: float64 });
    expect(m.toArray()).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('should treat a typed array in third position as elements', () => {
    const m = matrix(1, 3, new Float32Array([0.5, 1, 2]), { dtype: float32 });
    expect(m.toFlatArray()).toEqual([0.5, 1, 2]);
  });

  it('should create a diagonal matrix from a sequence', () => {
    const m = matrix([1n, 2n], { dtype: int64 });
    expect(m.toArray()).toEqual([
      [1n, 0n],
      [0n, 2n],
    ]);
  });

  it('should fill with a complex scalar', () => {
    const m = matrix(1, 2, complex(0, 1), { dtype: complex128 });
    expect(m.toFlatArray()).toEqual([
      { re: 0, im: 1 },
      { re: 0, im: 1 },
    ]);
  });

  it('should throw construction errors', () => {
    expect(() => matrix(0, 2, { dtype: float64 })).toThrow(ZeroSizeError);
    expect(() => matrix(2, 0, 3, { dtype: float64 })).toThrow(ZeroSizeError);
    expect(() => matrix([], { dtype: float64 })).toThrow(ZeroSizeError);
    expect(() => matrix(2, 2, [1, 2, 3], { dtype: float64 })).toThrow(SizeMismatchError);
  });
});

describe('tryMatrix', () => {
  it('should wrap the created matrix in a successful result', () => {
    const result = tryMatrix(2, 2, [1, 2, 3, 4], { dtype: float64 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.at(1, 0)).toBe(3);
    }
  });

  it('should report each construction failure', () => {
    const zero = tryMatrix(0, 3, { dtype: float64 });
    expect(zero.ok).toBe(false);
    if (!zero.ok) {
      expect(zero.error.code).toBe('ZERO_SIZE');
      expect(zero.error.message).toBe(
        'Cannot create a matrix with zero rows or columns (requested 0x3)',
      );
    }

    const mismatch = tryMatrix(3, 1, [1, 2], { dtype: float64 });
    expect(mismatch.ok).toBe(false);
    if (!mismatch.ok) {
      expect(mismatch.error).toBeInstanceOf(SizeMismatchError);
      expect(mismatch.error.context).toEqual({ rows: 3, cols: 1, expected: 3, received: 2 });
    }

    expect(tryMatrix([], { dtype: float64 }).ok).toBe(false);
    expect(tryMatrix(1, 0, 7, { dtype: float64 }).ok).toBe(false);
  });
});
