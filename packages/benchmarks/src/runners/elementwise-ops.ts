/**
 * Element-wise Operations Benchmark Runner
 *
 * Benchmarks add, sub, neg, scalar multiply and their in-place forms
 */

import { Bench } from 'tinybench';
import { float64, Matrix, scalarMul } from '@densematrix/core';
import { getBenchmarkConfig } from '../utils/config';
import { SQUARE_SIZES, RECTANGULAR_SIZES, formatSize } from '../utils/sizes';
import { randomMatrix } from '../utils/data';
import { printHeader, runAndReport } from './report';

printHeader('Element-wise Operation Benchmarks');

const bench = new Bench(getBenchmarkConfig());

for (const size of [...SQUARE_SIZES, ...RECTANGULAR_SIZES]) {
  const a = randomMatrix(size.rows, size.cols, float64);
  const b = randomMatrix(size.rows, size.cols, float64);
  const target = Matrix.copy(a);

  bench
    .add(`add ${formatSize(size)}`, () => {
      a.add(b);
    })
    .add(`sub ${formatSize(size)}`, () => {
      a.sub(b);
    })
    .add(`neg ${formatSize(size)}`, () => {
      a.neg();
    })
    .add(`scalarMul ${formatSize(size)}`, () => {
      scalarMul(2, a);
    })
    .add(`addAssign ${formatSize(size)}`, () => {
      target.addAssign(b);
    });
}

await runAndReport(bench);
