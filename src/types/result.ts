/**
 * Result Type
 *
 * Per-file operations (reading class files, opening archives, parsing
 * bytecode) report failure as a value. The dispatcher treats an `Err` as
 * "log and move on to the next file".
 */

// ============================================================================
// Core Types
// ============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Either a value or an error.
 *
 * @example
 * ```ts
 * const bytes = readBytes("/project/bin/classes/Foo.class");
 * if (bytes.ok) {
 *   analyze(bytes.value);
 * } else {
 *   client.log(null, bytes.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Run a function that might throw and capture the outcome as a Result.
 * Non-Error throwables are wrapped so callers always get an `Error`.
 */
export function tryCatchSync<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
