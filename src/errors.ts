/**
 * Typed failures and the outcome union returned by core operations.
 *
 * Core operations never throw for malformed input; they return an
 * {@link Outcome} so the line driver can decide to pass the line through.
 *
 * @module
 */

/** Failure categories reported by core operations. */
export type TimestampErrorKind =
  | "invalid-argument"
  | "buffer-overflow"
  | "regex-compile"
  | "regex-exec"
  | "time-parse"
  | "system";

/** A failure with a machine-readable {@link TimestampErrorKind}. */
export class TimestampError extends Error {
  readonly kind: TimestampErrorKind;

  constructor(kind: TimestampErrorKind, message: string) {
    super(message);
    this.name = "TimestampError";
    this.kind = kind;
  }
}

/** Either a success value or a {@link TimestampError}. */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: TimestampError };

/** Wrap a success value. */
export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

/** Build a failed outcome of the given kind. */
export function fail<T = never>(
  kind: TimestampErrorKind,
  message: string,
): Outcome<T> {
  return { ok: false, error: new TimestampError(kind, message) };
}
