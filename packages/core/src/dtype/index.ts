/**
 * DType system - element type descriptors for matrices
 *
 * A dtype bundles a buffer allocator with the element arithmetic a matrix
 * needs. Pick a built-in constant or freeze your own with `defineDType`.
 *
 * @example
 * ```typescript
 * import { Matrix, float64, int64 } from '@densematrix/core';
 *
 * const a = Matrix.filled(2, 2, 1.5, { dtype: float64 });
 * const b = Matrix.filled(2, 2, 7n, { dtype: int64 });
 * ```
 */

export type {
  DType,
  AnyDType,
  ElementBuffer,
  BufferFactory,
  JSTypeOf,
  DTypeNameOf,
  Complex,
  Float64,
  Float32,
  Int32,
  Int64,
  Complex128,
  BuiltinDTypeName,
} from './types';

export {
  float64,
  float32,
  int32,
  int64,
  complex128,
  complex,
  defineDType,
  formatFloat,
  DTYPE_CONSTANTS_MAP,
  getDTypeConstant,
  isBuiltinDTypeName,
} from './constants';
