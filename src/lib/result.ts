/**
 * Explicit success/failure value for operations whose failure is an
 * expected outcome (missing credentials, absent records) rather than a bug.
 */
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Unwrap a result, throwing the carried error on failure.
 * For call sites where the failure is fatal to the requested operation.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
