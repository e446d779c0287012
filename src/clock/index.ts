/**
 * Clock source: wall-clock and monotonic readings as {@link HighResTime}.
 *
 * @module
 */

import { type Outcome, fail, ok } from "../errors.ts";
import {
  type HighResTime,
  ZERO_TIME,
  fromEpochMillis,
  fromNanos,
} from "../util/time.ts";

/** Where time readings come from. Swapped for a fake in tests. */
export interface ClockSource {
  /** Wall-clock time since the Unix epoch. */
  wall(): HighResTime;
  /**
   * Monotonic time from an arbitrary origin, or `null` when the platform
   * has no monotonic source.
   */
  monotonic(): HighResTime | null;
}

/** The process clock: `performance` for the wall, `process.hrtime` for monotonic. */
export const systemClock: ClockSource = {
  wall: () => fromEpochMillis(performance.timeOrigin + performance.now()),
  monotonic: () =>
    typeof process.hrtime?.bigint === "function"
      ? fromNanos(process.hrtime.bigint())
      : null,
};

/**
 * Reads one clock, degrading from monotonic to wall-clock when needed.
 *
 * The degradation is reported once per instance through `warn`.
 */
export class Clock {
  private readonly source: ClockSource;
  private readonly warn: (message: string) => void;
  private warnedFallback = false;

  /**
   * @param source - Reading source (defaults to {@link systemClock})
   * @param warn - Receives degradation and failure notices
   */
  constructor(
    source: ClockSource = systemClock,
    warn: (message: string) => void = (message) =>
      console.error(`[linestamp] warning: ${message}`),
  ) {
    this.source = source;
    this.warn = warn;
  }

  /**
   * Take a reading.
   *
   * @param monotonic - Use the monotonic source instead of the wall clock
   * @returns The reading, or a `system` failure when the source throws
   */
  read(monotonic: boolean): Outcome<HighResTime> {
    try {
      if (monotonic) {
        const reading = this.source.monotonic();
        if (reading) return ok(reading);
        if (!this.warnedFallback) {
          this.warnedFallback = true;
          this.warn("monotonic clock unavailable, using wall clock");
        }
      }
      return ok(this.source.wall());
    } catch (e) {
      return fail(
        "system",
        `clock read failed: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
  }

  /** Take a reading, substituting {@link ZERO_TIME} on failure. */
  now(monotonic: boolean): HighResTime {
    const reading = this.read(monotonic);
    if (reading.ok) return reading.value;
    this.warn(reading.error.message);
    return ZERO_TIME;
  }
}
