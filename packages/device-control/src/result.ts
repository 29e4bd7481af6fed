/**
 * Result carrier
 *
 * Every core operation returns a Result holding exactly one of a value or an
 * ErrorInfo. Accessing the wrong side is a programming error and throws
 * ResultAccessError, which sits outside the ErrorKind taxonomy.
 */

import { ErrorInfo, ErrorKind } from "./errors";

export class ResultAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResultAccessError";
    Object.setPrototypeOf(this, ResultAccessError.prototype);
  }
}

type ResultState<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ErrorInfo };

export class Result<T> {
  private constructor(private readonly state: ResultState<T>) {}

  static ok<T>(value: T): Result<T> {
    return new Result<T>({ ok: true, value });
  }

  static err<T = never>(error: ErrorInfo): Result<T> {
    return new Result<T>({ ok: false, error });
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  value(): T {
    if (!this.state.ok) {
      throw new ResultAccessError(
        `value() called on an error result: ${this.state.error.description()}`,
      );
    }
    return this.state.value;
  }

  error(): ErrorInfo {
    if (this.state.ok) {
      throw new ResultAccessError("error() called on a successful result");
    }
    return this.state.error;
  }

  valueOr(fallback: T): T {
    return this.state.ok ? this.state.value : fallback;
  }

  map<U>(fn: (value: T) => U): Result<U> {
    return this.state.ok ? Result.ok(fn(this.state.value)) : Result.err<U>(this.state.error);
  }

  andThen<U>(fn: (value: T) => Result<U>): Result<U> {
    return this.state.ok ? fn(this.state.value) : Result.err<U>(this.state.error);
  }

  /**
   * Exhaustive branch over both sides
   */
  match<U>(handlers: { ok: (value: T) => U; err: (error: ErrorInfo) => U }): U {
    return this.state.ok ? handlers.ok(this.state.value) : handlers.err(this.state.error);
  }
}

export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok<T>(...args: [] | [T]): Result<T> | Result<void> {
  if (args.length === 0) {
    return Result.ok<void>(undefined);
  }
  return Result.ok(args[0]);
}

export function err<T = never>(error: ErrorInfo): Result<T>;
export function err<T = never>(code: ErrorKind, message?: string): Result<T>;
export function err<T = never>(codeOrError: ErrorKind | ErrorInfo, message = ""): Result<T> {
  const info = codeOrError instanceof ErrorInfo ? codeOrError : new ErrorInfo(codeOrError, message);
  return Result.err<T>(info);
}
