/**
 * Matrix creation benchmarks
 *
 * Covers every construction form plus copy and move.
 */

import { bench, describe } from 'vitest';
import { Matrix, float64, int32, int64 } from '@densematrix/core';
import { SQUARE_SIZES } from '../utils/sizes';
import { generateRandomElements, generateSequentialElements } from '../utils/data';

describe('matrix creation from elements', () => {
  for (const size of SQUARE_SIZES) {
    const data = generateRandomElements(size.elements);

    bench(`fromElements ${size.name} ${size.rows}x${size.cols} - float64`, () => {
      Matrix.fromElements(size.rows, size.cols, data, { dtype: float64 });
    });

    bench(`fromElements ${size.name} ${size.rows}x${size.cols} - int32`, () => {
      Matrix.fromElements(size.rows, size.cols, data, { dtype: int32 });
    });
  }
});

describe('matrix creation by fill', () => {
  for (const size of SQUARE_SIZES) {
    bench(`uninitialized ${size.name} ${size.rows}x${size.cols} - float64`, () => {
      Matrix.uninitialized(size.rows, size.cols, { dtype: float64 });
    });

    bench(`filled ${size.name} ${size.rows}x${size.cols} - float64`, () => {
      Matrix.filled(size.rows, size.cols, 1, { dtype: float64 });
    });

    bench(`filled ${size.name} ${size.rows}x${size.cols} - int64`, () => {
      Matrix.filled(size.rows, size.cols, 1n, { dtype: int64 });
    });

    const diagonal = generateSequentialElements(size.rows, 1);
    bench(`diagonal ${size.name} ${size.rows}x${size.cols} - float64`, () => {
      Matrix.diagonal(diagonal, { dtype: float64 });
    });
  }
});

describe('matrix copy and move', () => {
  for (const size of SQUARE_SIZES) {
    const source = Matrix.fromElements(size.rows, size.cols, generateRandomElements(size.elements), {
      dtype: float64,
    });

    bench(`copy ${size.name} ${size.rows}x${size.cols}`, () => {
      Matrix.copy(source);
    });

    bench(`copy then move ${size.name} ${size.rows}x${size.cols}`, () => {
      Matrix.move(Matrix.copy(source));
    });
  }
});
