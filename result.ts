/**
 * Result type for stage-by-stage error handling.
 *
 * Every stage of the pipeline returns a Result instead of throwing, so the
 * CLI is the only place where a failure becomes text and an exit code.
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

/** Chain a stage that itself returns a Result. */
export const flatMap = <T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> =>
  isOk(result) ? fn(result.value) : result;
