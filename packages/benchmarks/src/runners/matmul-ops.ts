/**
 * Matrix Multiplication Benchmark Runner
 *
 * Benchmarks the generic matmul loop across element types and shapes
 */

import { Bench } from 'tinybench';
import { complex128, float32, float64, int32, int64, Matrix } from '@densematrix/core';
import { getBenchmarkConfig } from '../utils/config';
import { MATMUL_SIZES, formatSize } from '../utils/sizes';
import {
  generateRandomComplexElements,
  randomBigIntMatrix,
  randomMatrix,
} from '../utils/data';
import { printHeader, runAndReport } from './report';

printHeader('Matrix Multiplication Benchmarks');

const bench = new Bench(getBenchmarkConfig());

console.log('Setting up matrix pairs...');

for (const size of MATMUL_SIZES) {
  for (const dtype of [float64, float32, int32]) {
    const a = randomMatrix(size.rows, size.cols, dtype);
    const b = randomMatrix(size.cols, size.rows, dtype);
    bench.add(`matmul ${formatSize(size)} - ${dtype.__dtype}`, () => {
      a.matmul(b);
    });
  }

  const a = randomBigIntMatrix(size.rows, size.cols, int64);
  const b = randomBigIntMatrix(size.cols, size.rows, int64);
  bench.add(`matmul ${formatSize(size)} - int64`, () => {
    a.matmul(b);
  });

  console.log(`✓ Created ${formatSize(size)}`);
}

// Complex products allocate an object per multiply-add, so only the small case
const small = MATMUL_SIZES.find((size) => size.name === 'small');
if (small) {
  const count = small.rows * small.cols;
  const a = Matrix.fromElements(small.rows, small.cols, generateRandomComplexElements(count), {
    dtype: complex128,
  });
  const b = Matrix.fromElements(small.cols, small.rows, generateRandomComplexElements(count), {
    dtype: complex128,
  });
  bench.add(`matmul ${formatSize(small)} - complex128`, () => {
    a.matmul(b);
  });
}

await runAndReport(bench);
