/**
 * Type tests for the matrix module
 */

import { expectTypeOf } from 'expect-type';
import { Matrix } from './matrix';
import { matrix, tryMatrix } from './creation';
import { scalarMul, mulScalar, matmul } from './operations';
import type { ReadonlyMatrix } from './types';
import type { Result } from '../result';
import type { IndexOutOfRangeError, SizeMismatchError, ZeroSizeError } from '../errors';
import { float64, int64, complex128, complex } from '../dtype/constants';
import type { Complex } from '../dtype/types';

// =============================================================================
// Element type inference
// =============================================================================

{
  expectTypeOf(Matrix.filled(2, 2, 0, { dtype: float64 })).toEqualTypeOf<Matrix<number>>();
  expectTypeOf(Matrix.diagonal([1n, 2n], { dtype: int64 })).toEqualTypeOf<Matrix<bigint>>();
  expectTypeOf(matrix(1, 1, complex(1), { dtype: complex128 })).toEqualTypeOf<Matrix<Complex>>();
  expectTypeOf(matrix(2, 2, { dtype: int64 })).toEqualTypeOf<Matrix<bigint>>();

  const m = Matrix.filled(2, 2, 0n, { dtype: int64 });
  expectTypeOf(m.at(0, 0)).toEqualTypeOf<bigint>();
  expectTypeOf(m.element(1, 1)).toEqualTypeOf<bigint>();
  expectTypeOf(m.toArray()).toEqualTypeOf<bigint[][]>();
}

// =============================================================================
// Results
// =============================================================================

{
  const m = Matrix.filled(2, 2, 0, { dtype: float64 });
  expectTypeOf(m.tryAt(0, 0)).toEqualTypeOf<Result<number, IndexOutOfRangeError>>();
  expectTypeOf(Matrix.tryUninitialized(1, 1, { dtype: float64 })).toEqualTypeOf<
    Result<Matrix<number>, ZeroSizeError>
  >();
  expectTypeOf(tryMatrix(2, 2, [1, 2, 3, 4], { dtype: float64 })).toEqualTypeOf<
    Result<Matrix<number>, ZeroSizeError | SizeMismatchError>
  >();

  const result = tryMatrix([1, 2], { dtype: float64 });
  if (result.ok) {
    expectTypeOf(result.value).toEqualTypeOf<Matrix<number>>();
  } else {
    expectTypeOf(result.error).toEqualTypeOf<ZeroSizeError>();
  }
}

// =============================================================================
// Operations
// =============================================================================

{
  const a = Matrix.filled(2, 2, 1, { dtype: float64 });
  const b = Matrix.filled(2, 2, 2, { dtype: float64 });

  expectTypeOf(a.add(b)).toEqualTypeOf<Matrix<number>>();
  expectTypeOf(matmul(a, b)).toEqualTypeOf<Matrix<number>>();
  expectTypeOf(scalarMul(2, a)).toEqualTypeOf<Matrix<number>>();
  expectTypeOf(mulScalar(a, 2)).toEqualTypeOf<Matrix<number>>();
  expectTypeOf(a.addAssign(b)).toEqualTypeOf<Matrix<number>>();

  const big = Matrix.filled(2, 2, 1n, { dtype: int64 });
  // @ts-expect-error - Element types must match
  a.add(big);
  // @ts-expect-error - Scalar must have the element type
  a.scale(2n);
}

// =============================================================================
// Read-only view
// =============================================================================

{
  expectTypeOf<Matrix<number>>().toMatchTypeOf<ReadonlyMatrix<number>>();
  expectTypeOf<ReadonlyMatrix<number>>().not.toHaveProperty('setAt');
  expectTypeOf<ReadonlyMatrix<number>>().not.toHaveProperty('assign');
  expectTypeOf<ReadonlyMatrix<number>>().toHaveProperty('at');

  const view: ReadonlyMatrix<number> = Matrix.filled(1, 1, 0, { dtype: float64 });
  expectTypeOf(view.neg()).toEqualTypeOf<Matrix<number>>();
}

// =============================================================================
// Construction mismatches
// =============================================================================

{
  // @ts-expect-error - Fill value must match the dtype
  Matrix.filled(2, 2, 'x', { dtype: float64 });
  // @ts-expect-error - A bigint dtype takes bigint elements
  Matrix.fromElements(1, 2, [1, 2], { dtype: int64 });
}
