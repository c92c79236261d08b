////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// error handling / assert / result stuff
export type Ok<T> = {
  ok: true;
  value: T;
};
export type Err<E = string> = {
  ok: false;
  error: E;
};
export type Result<T, E = string> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E = string>(error: E): Err<E> {
  return { ok: false, error };
}

// unwraps a result, throwing the carried error. for call sites (cli, tests) that would rethrow anyway.
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error instanceof Error ? result.error : new Error(String(result.error));
  }
  return result.value;
}

export function assert(condition: boolean = true, message: string = "Assertion failed"): asserts condition {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// exhaustiveness guard for switches over tagged unions
export function assertUnreachable(value: never, message: string = "Unreachable case"): never {
  throw new Error(`Assertion failed: ${message} (${JSON.stringify(value)})`);
}
