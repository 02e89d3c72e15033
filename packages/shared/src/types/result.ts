/**
 * Result Type
 *
 * Explicit success/failure values for operations whose failure is expected
 * (missing files, rejected input) rather than exceptional.
 *
 * @module @tern/shared/result
 */

/**
 * Successful result carrying a value
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed result carrying an error
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function Ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Unwrap the value, or return the fallback for a failed result.
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/**
 * Run an async function and capture a rejection as an Err.
 *
 * @example
 * ```typescript
 * const result = await tryCatchAsync(
 *   () => readFile(path, "utf-8"),
 *   (error) => ({ code: "IO_ERROR", cause: error })
 * );
 * ```
 */
export async function tryCatchAsync<T, E>(
  fn: () => Promise<T>,
  onError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(onError(error));
  }
}
