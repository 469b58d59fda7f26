/**
 * Result<T, E> type for functional error handling
 * Compilers and validators return these instead of throwing.
 *
 * Both variants carry both type parameters so that `map`, `mapErr` and
 * `flatMap` can be called on a `Result` without narrowing it first.
 */

export type Result<T, E> = Ok<T, E> | Err<E, T>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T, E = never> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<E, T> {
    return false;
  }

  /**
   * Transform the success value using the provided function
   */
  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok<U, E>(fn(this.value));
  }

  /**
   * Map over the error value (no-op for Ok)
   */
  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new Ok<T, F>(this.value);
  }

  /**
   * Chain operations that may fail
   */
  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, E | F> {
    return fn(this.value);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E, T = never> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<E, T> {
    return true;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<E, U>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new Err<F, T>(fn(this.error));
  }

  flatMap<U, F>(_fn: (value: T) => Result<U, F>): Result<U, E | F> {
    return new Err<E | F, U>(this.error);
  }

  /**
   * Use sparingly - prefer narrowing with isOk/isErr
   */
  unwrap(): never {
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }
}

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok<T>(value?: T): Ok<T | undefined> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T, E> {
  return result.isOk();
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E, T> {
  return result.isErr();
}

/**
 * Split a batch of results into successes and failures, keeping order.
 */
export function partitionResults<T, E>(
  results: Iterable<Result<T, E>>
): { values: T[]; errors: E[] } {
  const values: T[] = [];
  const errors: E[] = [];
  for (const result of results) {
    if (result.isOk()) {
      values.push(result.value);
    } else {
      errors.push(result.error);
    }
  }
  return { values, errors };
}
