/**
 * Result type for explicit error handling.
 * Services return these instead of throwing; tools turn them into responses.
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Transform the value inside a success Result.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result;
}

/**
 * Chain operations that return Results.
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Message text of anything that was thrown.
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Run an async function and capture a throw as an Err carrying its message.
 */
export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, string>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(errorMessage(e));
  }
}
