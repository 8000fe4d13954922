/**
 * Matrix arithmetic benchmarks
 */

import { bench, describe } from 'vitest';
import { float32, float64, int32 } from '@densematrix/core';
import { MATMUL_SIZES, SQUARE_SIZES } from '../utils/sizes';
import { randomMatrix } from '../utils/data';

describe('element-wise arithmetic', () => {
  for (const size of SQUARE_SIZES) {
    const a = randomMatrix(size.rows, size.cols, float64);
    const b = randomMatrix(size.rows, size.cols, float64);

    bench(`add ${size.name} ${size.rows}x${size.cols}`, () => {
      a.add(b);
    });

    bench(`neg ${size.name} ${size.rows}x${size.cols}`, () => {
      a.neg();
    });

    bench(`scale ${size.name} ${size.rows}x${size.cols}`, () => {
      a.scale(0.5);
    });
  }
});

describe('matrix multiplication', () => {
  for (const size of MATMUL_SIZES) {
    for (const dtype of [float64, float32, int32]) {
      const a = randomMatrix(size.rows, size.cols, dtype);
      const b = randomMatrix(size.cols, size.rows, dtype);

      bench(`matmul ${size.name} ${size.rows}x${size.cols} - ${dtype.__dtype}`, () => {
        a.matmul(b);
      });
    }
  }
});

describe('formatting', () => {
  const m = randomMatrix(32, 32, float64);

  bench('format 32x32 float64', () => {
    m.format();
  });
});
