/**
 * Result values for routine failures.
 *
 * Graph operations report missing handles and rejected diffs by returning
 * an `Err` rather than throwing.
 */

import type { GraphError } from "./errors"

export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

export interface Err<E> {
  readonly ok: false
  readonly error: E
}

export type GraphResult<T, E extends GraphError = GraphError> = Ok<T> | Err<E>

export function ok(): Ok<void>
export function ok<T>(value: T): Ok<T>
export function ok<T>(value?: T): Ok<T | undefined> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

export function isOk<T, E>(result: Ok<T> | Err<E>): result is Ok<T> {
  return result.ok
}

export function isErr<T, E>(result: Ok<T> | Err<E>): result is Err<E> {
  return !result.ok
}

/**
 * Value of a successful result.
 * @throws the carried error otherwise
 */
export function unwrap<T, E>(result: Ok<T> | Err<E>): T {
  if (result.ok) return result.value
  throw result.error
}

/**
 * Error of a failed result.
 * @throws Error when the result succeeded
 */
export function unwrapErr<T, E>(result: Ok<T> | Err<E>): E {
  if (!result.ok) return result.error
  throw new Error("Called unwrapErr on a successful result")
}

export function mapResult<T, U, E>(result: Ok<T> | Err<E>, fn: (value: T) => U): Ok<U> | Err<E> {
  return result.ok ? ok(fn(result.value)) : result
}
