/**
 * @module result
 *
 * Every fallible core operation returns a `Result` instead of throwing.
 * Callers branch on `ok`; the failure side carries a `_type`-tagged error.
 *
 * @example
 * ```ts
 * import { andThen, err, ok, type Result } from "@civicpulse/core/result";
 *
 * function parsePoints(raw: string): Result<number, string> {
 *   const n = Number(raw);
 *   return Number.isInteger(n) ? ok(n) : err(`not an integer: ${raw}`);
 * }
 *
 * const doubled = andThen(parsePoints("21"), (n) => ok(n * 2));
 * ```
 */

export type Ok<T> = Readonly<{ ok: true; value: T }>;
export type Err<E> = Readonly<{ ok: false; error: E }>;
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

/** @throws Error carrying the JSON of the error when `r` is an Err */
export function unwrap<T, E>(r: Result<T, E>): T {
  if (r.ok) return r.value;
  throw new Error(`Unwrap called on Err: ${JSON.stringify(r.error)}`);
}

export function unwrapOr<T, E>(r: Result<T, E>, fallback: T): T {
  return r.ok ? r.value : fallback;
}

export function map<T, U, E>(
  r: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> {
  return r.ok ? ok(fn(r.value)) : r;
}

export function mapErr<T, E, F>(
  r: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> {
  return r.ok ? r : err(fn(r.error));
}

/** Feeds the success value into the next fallible step. */
export function andThen<T, U, E>(
  r: Result<T, E>,
  fn: (value: T) => Result<U, E>,
): Result<U, E> {
  return r.ok ? fn(r.value) : r;
}

/** Folds both sides into one value. */
export function match<T, E, R>(
  r: Result<T, E>,
  onOk: (value: T) => R,
  onErr: (error: E) => R,
): R {
  return r.ok ? onOk(r.value) : onErr(r.error);
}
