/**
 * Result<T, E> for operations that report failure as a value
 */

export type Result<T, E> = Ok<T> | Err<E>;

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

  /** Value of an Ok; an Err throws its error */
  unwrap(): T {
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

  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}
