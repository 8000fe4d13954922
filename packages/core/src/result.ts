/**
 * Explicit success/failure outcomes
 *
 * Construction and checked access report failures as values through the
 * `try*` entry points; the plain entry points unwrap and throw.
 */

export type Result<T, E extends Error = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Wrap a successful result.
 */
export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

/**
 * Wrap a failed result.
 */
export function fail<E extends Error>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

/**
 * Narrow a result to its success branch.
 */
export function isOk<T, E extends Error>(
  result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
  return result.ok;
}

/**
 * Return the value of a successful result, or throw its error.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
