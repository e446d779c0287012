/**
 * High-resolution time values and their arithmetic.
 *
 * @module
 */

/** Nanoseconds in one second. */
export const NANOS_PER_SECOND = 1_000_000_000;

/**
 * A point in time (or a duration) split into whole seconds and a
 * nanosecond remainder in `[0, 999_999_999]`.
 */
export interface HighResTime {
  readonly seconds: number;
  readonly nanoseconds: number;
}

/** The zero instant, used when no clock reading is available. */
export const ZERO_TIME: HighResTime = Object.freeze({
  seconds: 0,
  nanoseconds: 0,
});

/**
 * Build a {@link HighResTime}, carrying or borrowing whole seconds so that
 * the nanosecond field ends up in range.
 *
 * @param seconds - Whole seconds (may be negative)
 * @param nanoseconds - Nanoseconds, any integer
 */
export function normalizeTime(
  seconds: number,
  nanoseconds: number,
): HighResTime {
  const carry = Math.floor(nanoseconds / NANOS_PER_SECOND);
  return {
    seconds: seconds + carry,
    nanoseconds: nanoseconds - carry * NANOS_PER_SECOND,
  };
}

/**
 * Elapsed time from `earlier` to `later`, borrowing a second when the
 * nanosecond difference goes negative.
 */
export function elapsedBetween(
  later: HighResTime,
  earlier: HighResTime,
): HighResTime {
  return normalizeTime(
    later.seconds - earlier.seconds,
    later.nanoseconds - earlier.nanoseconds,
  );
}

/**
 * Convert a millisecond timestamp with an optional fractional part
 * (as returned by `performance.timeOrigin + performance.now()`).
 */
export function fromEpochMillis(ms: number): HighResTime {
  const seconds = Math.floor(ms / 1000);
  const nanoseconds = Math.min(
    NANOS_PER_SECOND - 1,
    Math.round((ms - seconds * 1000) * 1_000_000),
  );
  return { seconds, nanoseconds };
}

/** Convert a nanosecond count from `process.hrtime.bigint()`. */
export function fromNanos(ns: bigint): HighResTime {
  const billion = BigInt(NANOS_PER_SECOND);
  return {
    seconds: Number(ns / billion),
    nanoseconds: Number(ns % billion),
  };
}

/** Whole microseconds of the sub-second part, zero-padded to 6 digits. */
export function micros6(time: HighResTime): string {
  return String(Math.floor(time.nanoseconds / 1000)).padStart(6, "0");
}

/** The sub-second part in nanoseconds, zero-padded to 9 digits. */
export function nanos9(time: HighResTime): string {
  return String(time.nanoseconds).padStart(9, "0");
}
