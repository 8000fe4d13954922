/**
 * Element type descriptors for matrix storage
 *
 * A DType describes everything a Matrix needs to know about its element
 * type: how to allocate a buffer, the additive identity, and the element
 * arithmetic used by the matrix operations. Matrix<T> is generic over any T
 * that has a DType.
 */

// =============================================================================
// Element Buffers
// =============================================================================

/**
 * Fixed-length, index-addressable element storage
 *
 * Every TypedArray satisfies this for its element type, and so does a plain
 * array. Buffers never grow or shrink once allocated.
 */
export interface ElementBuffer<T> {
  readonly length: number;
  [index: number]: T;
}

/**
 * Allocates a buffer of `length` elements
 *
 * TypedArray-backed buffers come back zero-filled, array-backed buffers come
 * back with holes. Callers treat both as uninitialized.
 */
export type BufferFactory<T> = (length: number) => ElementBuffer<T>;

// =============================================================================
// Core DType Interface
// =============================================================================

/**
 * Capability bound on a matrix element type
 *
 * Element values are treated as immutable: operations always return new
 * values and never mutate their arguments.
 *
 * @template Name - dtype name used in display and error context
 * @template T - JavaScript type of a single element
 */
export interface DType<Name extends string, T> {
  readonly __dtype: Name;
  /** Sample value of the element type, for type inference only */
  readonly __jsType: T;
  readonly __buffer: BufferFactory<T>;
  /**
   * Whether `mul(a, b)` equals `mul(b, a)` for all values. Right scalar
   * multiplication delegates to left scalar multiplication, so matrices of a
   * dtype that sets this to `false` only support the left form.
   */
  readonly __commutative: boolean;
  /** Additive identity */
  readonly zero: T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  neg(a: T): T;
  mul(a: T, b: T): T;
  equals(a: T, b: T): boolean;
  format(value: T): string;
}

/**
 * Any dtype, regardless of name or element type
 */
export type AnyDType = DType<string, unknown>;

/**
 * Extract the element type from a dtype
 *
 * @example
 * type E = JSTypeOf<typeof float64>; // number
 */
export type JSTypeOf<D extends AnyDType> = D['__jsType'];

/**
 * Extract the dtype name
 *
 * @example
 * type N = DTypeNameOf<typeof int64>; // 'int64'
 */
export type DTypeNameOf<D extends AnyDType> = D['__dtype'];

// =============================================================================
// Built-in Element Types
// =============================================================================

/**
 * Complex number with double-precision parts
 */
export interface Complex {
  readonly re: number;
  readonly im: number;
}

export type Float64 = DType<'float64', number>;
export type Float32 = DType<'float32', number>;
export type Int32 = DType<'int32', number>;
export type Int64 = DType<'int64', bigint>;
export type Complex128 = DType<'complex128', Complex>;

/**
 * Names of the dtypes shipped with the library
 */
export type BuiltinDTypeName = 'float64' | 'float32' | 'int32' | 'int64' | 'complex128';
