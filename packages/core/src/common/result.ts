/**
 * Result type for fallible operations.
 * Expected failures travel as values; only programming errors throw.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error instanceof Error
    ? result.error
    : new Error(String(result.error))
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

/** Run a synchronous call and capture anything it throws as an Err. */
export function attempt<T, E>(fn: () => T, toError: (err: unknown) => E): Result<T, E> {
  try {
    return Ok(fn())
  } catch (err) {
    return Err(toError(err))
  }
}
