/**
 * Type tests for dtype/types.ts
 */

import { expectTypeOf } from 'expect-type';
import type {
  DType,
  AnyDType,
  ElementBuffer,
  JSTypeOf,
  DTypeNameOf,
  Complex,
  Float64,
  Int64,
  Complex128,
} from './types';
import { float64, float32, int32, int64, complex128, defineDType } from './constants';

// =============================================================================
// Built-in constants satisfy their interfaces
// =============================================================================

{
  expectTypeOf(float64).toMatchTypeOf<Float64>();
  expectTypeOf(int64).toMatchTypeOf<Int64>();
  expectTypeOf(complex128).toMatchTypeOf<Complex128>();
  expectTypeOf(float32).toMatchTypeOf<AnyDType>();
  expectTypeOf(int32).toMatchTypeOf<AnyDType>();
}

// =============================================================================
// Extractors
// =============================================================================

{
  expectTypeOf<JSTypeOf<typeof float64>>().toEqualTypeOf<number>();
  expectTypeOf<JSTypeOf<typeof int64>>().toEqualTypeOf<bigint>();
  expectTypeOf<JSTypeOf<typeof complex128>>().toEqualTypeOf<Complex>();
  expectTypeOf<DTypeNameOf<typeof int32>>().toEqualTypeOf<'int32'>();
  expectTypeOf<DTypeNameOf<Float64>>().toEqualTypeOf<'float64'>();
}

// =============================================================================
// Buffers
// =============================================================================

{
  expectTypeOf<Float64Array>().toMatchTypeOf<ElementBuffer<number>>();
  expectTypeOf<BigInt64Array>().toMatchTypeOf<ElementBuffer<bigint>>();
  expectTypeOf<Complex[]>().toMatchTypeOf<ElementBuffer<Complex>>();
  expectTypeOf<BigInt64Array>().not.toMatchTypeOf<ElementBuffer<number>>();
}

// =============================================================================
// User dtypes
// =============================================================================

{
  const bool = defineDType({
    __dtype: 'xor',
    __jsType: false as boolean,
    __buffer: (length: number) => new Array<boolean>(length),
    __commutative: true,
    zero: false as boolean,
    add: (a: boolean, b: boolean) => a !== b,
    sub: (a: boolean, b: boolean) => a !== b,
    neg: (a: boolean) => a,
    mul: (a: boolean, b: boolean) => a && b,
    equals: (a: boolean, b: boolean) => a === b,
    format: (value: boolean) => (value ? '1' : '0'),
  });

  expectTypeOf(bool).toMatchTypeOf<DType<'xor', boolean>>();
  expectTypeOf<DTypeNameOf<typeof bool>>().toEqualTypeOf<'xor'>();
  expectTypeOf<JSTypeOf<typeof bool>>().toEqualTypeOf<boolean>();
}
