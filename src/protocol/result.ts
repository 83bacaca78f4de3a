/**
 * Tagged success/failure value for steps whose failure is expected and
 * handled by the caller instead of being thrown.
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Settle a possibly-throwing, possibly-async function into a Result.
 */
export async function attempt<T>(fn: () => T | Promise<T>): Promise<Result<T, unknown>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(error);
  }
}
