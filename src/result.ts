/**
 * Success-or-failure value returned by the pre-write validators.
 *
 * @example
 * const result = validateFeatureInput({ key: 'dark_mode' })
 * if (!result.ok) return render(result.error.messages)
 */
export type Result<T, E> = Ok<T> | Err<E>

export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

export interface Err<E> {
  readonly ok: false
  readonly error: E
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

/** Return the value, or throw the error of a failed result. */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) throw result.error
  return result.value
}
