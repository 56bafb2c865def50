/**
 * Explicit success/failure union returned by every upstream call and
 * pipeline step, so callers branch on a tag instead of exception identity.
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
