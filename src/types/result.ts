/**
 * Outcome of an operation that may fail without throwing.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly data: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({ ok: true, data });

export const err = <E, T = never>(error: E): Result<T, E> => ({
  ok: false,
  error,
});
