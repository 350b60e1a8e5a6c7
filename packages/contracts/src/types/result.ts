/**
 * A Result type for explicit, type-safe error handling.
 *
 * Chainable operations compose fallible steps without try/catch at
 * every call site.
 *
 * @example
 * ```typescript
 * const path = buildMazeConfig({ width: 4, height: 4, depth: 2 })
 *   .flatMap((config) => createMaze(config))
 *   .map((maze) => maze.path)
 *   .getOrThrow();
 * ```
 */

type Outcome<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E> {
  private constructor(private readonly outcome: Outcome<T, E>) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Run a function that might throw, mapping the thrown value to `E`.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    onError: (e: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  isOk(): boolean {
    return this.outcome.ok;
  }

  isErr(): boolean {
    return !this.outcome.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    const o = this.outcome;
    return o.ok ? Result.ok(fn(o.value)) : Result.err(o.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    const o = this.outcome;
    return o.ok ? Result.ok(o.value) : Result.err(fn(o.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    const o = this.outcome;
    return o.ok ? fn(o.value) : Result.err(o.error);
  }

  getOrElse(defaultValue: T): T {
    const o = this.outcome;
    return o.ok ? o.value : defaultValue;
  }

  getOrThrow(): T {
    const o = this.outcome;
    if (o.ok) {
      return o.value;
    }
    throw o.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    const o = this.outcome;
    return o.ok ? onOk(o.value) : onErr(o.error);
  }

  tapErr(fn: (error: E) => void): Result<T, E> {
    const o = this.outcome;
    if (!o.ok) {
      fn(o.error);
    }
    return this;
  }

  toJSON(): { success: true; value: T } | { success: false; error: E } {
    const o = this.outcome;
    return o.ok
      ? { success: true, value: o.value }
      : { success: false, error: o.error };
  }

  get success(): boolean {
    return this.outcome.ok;
  }

  get value(): T {
    const o = this.outcome;
    if (!o.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return o.value;
  }

  get error(): E {
    const o = this.outcome;
    if (o.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return o.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
