/**
 * Result<T, E> for decode paths that report failure as a value instead of
 * throwing. Decoders return `Err` for malformed input; callers that prefer
 * exceptions call `unwrap()`.
 */

export type Result<T, E> = Ok<T> | Err<E>;

export interface ResultMatcher<T, E, R> {
  ok: (value: T) => R;
  err: (error: E) => R;
}

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  map<U>(fn: (value: T) => U): Ok<U> {
    return new Ok(fn(this.value));
  }

  mapErr(_fn: (error: never) => unknown): Ok<T> {
    return this;
  }

  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, F> {
    return fn(this.value);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }

  /** The value, or undefined for an Err */
  toOptional(): T | undefined {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  map(_fn: (value: never) => unknown): Err<E> {
    return this;
  }

  mapErr<F>(fn: (error: E) => F): Err<F> {
    return new Err(fn(this.error));
  }

  flatMap(_fn: (value: never) => unknown): Err<E> {
    return this;
  }

  /**
   * Throws the carried error. Error instances are rethrown as-is so that
   * `instanceof DecodeError` keeps working at the call site.
   */
  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }

  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }

  toOptional(): undefined {
    return undefined;
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.isOk();
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.isErr();
}

/**
 * Fold a result into a single value
 */
export function matchResult<T, E, R>(
  result: Result<T, E>,
  matcher: ResultMatcher<T, E, R>
): R {
  return result.isOk() ? matcher.ok(result.value) : matcher.err(result.error);
}
