/**
 * Result type for explicit error handling
 * Inspired by Rust's Result and neverthrow
 *
 * Invocations can be consumed either by awaiting and catching, or as
 * values via `settle`, which narrows failures to the closed
 * `InvocationFailure` union so callers can match on every case.
 */

import { isInvocationFailure, type InvocationFailure } from './errors.js';

/**
 * Represents a successful result
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Represents a failed result
 */
export interface Err<E> {
  readonly ok: false;
  readonly value?: never;
  readonly error: E;
}

/**
 * Result type - either Ok<T> or Err<E>
 */
export type Result<T, E = InvocationFailure> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Unwrap a result, throwing if it's an error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Unwrap a result with a default value
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}

/**
 * Map over a successful result
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Map over a failed result
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : err(fn(result.error));
}

/**
 * Chain results (flatMap)
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Pattern match on a result
 */
export function match<T, E, U>(
  result: Result<T, E>,
  handlers: {
    ok: (value: T) => U;
    err: (error: E) => U;
  }
): U {
  return result.ok ? handlers.ok(result.value) : handlers.err(result.error);
}

/**
 * Settle a promise into a Result
 * Failures outside the invocation taxonomy are programming errors and are rethrown
 */
export async function settle<T>(promise: Promise<T>): Promise<Result<T, InvocationFailure>> {
  try {
    return ok(await promise);
  } catch (error) {
    if (isInvocationFailure(error)) {
      return err(error);
    }
    throw error;
  }
}

/**
 * ResultAsync - Result type for async operations
 * Wraps Promise<Result<T, E>> with chainable methods
 */
export class ResultAsync<T, E = InvocationFailure> implements PromiseLike<Result<T, E>> {
  private readonly promise: Promise<Result<T, E>>;

  constructor(promise: Promise<Result<T, E>>) {
    this.promise = promise;
  }

  /**
   * Create from a promise whose rejections belong to the invocation taxonomy
   */
  static fromInvocation<T>(promise: Promise<T>): ResultAsync<T, InvocationFailure> {
    return new ResultAsync(settle(promise));
  }

  then<TResult1 = Result<T, E>, TResult2 = never>(
    onfulfilled?: ((value: Result<T, E>) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  map<U>(fn: (value: T) => U): ResultAsync<U, E> {
    return new ResultAsync(this.promise.then((result) => map(result, fn)));
  }

  mapErr<F>(fn: (error: E) => F): ResultAsync<T, F> {
    return new ResultAsync(this.promise.then((result) => mapErr(result, fn)));
  }

  andThen<U>(fn: (value: T) => ResultAsync<U, E>): ResultAsync<U, E> {
    return new ResultAsync(
      this.promise.then(async (result) => {
        if (result.ok) {
          return fn(result.value);
        }
        return result;
      })
    );
  }

  async match<U>(handlers: { ok: (value: T) => U; err: (error: E) => U }): Promise<U> {
    return match(await this.promise, handlers);
  }

  async unwrap(): Promise<T> {
    return unwrap(await this.promise);
  }

  async unwrapOr(defaultValue: T): Promise<T> {
    return unwrapOr(await this.promise, defaultValue);
  }
}
