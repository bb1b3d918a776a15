/**
 * Outcome of an operation that fails with a typed error value instead of throwing.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Unwraps a result, throwing its error.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Outcome of decoding untrusted text into a value.
 */
export type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

export function parsed<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function parseFailure<T>(message: string): ParseResult<T> {
  return { ok: false, message };
}
