/**
 * Outcome of an operation that can fail in an expected way.
 *
 * Session operations never throw for connectivity or transport problems; callers branch on `ok`.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
