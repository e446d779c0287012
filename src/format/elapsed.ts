/**
 * Rendering elapsed durations for the incremental and since-start modes.
 *
 * @module
 */

import { type Outcome, ok } from "../errors.ts";
import { type HighResTime, micros6 } from "../util/time.ts";
import { DEFAULT_TIMESTAMP_CAPACITY, formatAbsolute } from "./absolute.ts";

const pad2 = (n: number): string => String(n).padStart(2, "0");

/**
 * Render an elapsed duration.
 *
 * When the format contains a subsecond token the whole output is that
 * token's rendering of the duration, checked in the order `%.s`, `%.S`,
 * `%.T`:
 *
 * - `%.s`: total seconds + `.` + microseconds (`"75.000250"`)
 * - `%.S`: seconds within the minute (`"15.000250"`)
 * - `%.T`: `HH:MM:SS` with unbounded hours (`"00:01:15.000250"`)
 *
 * Otherwise the duration is rendered like a UTC time that many seconds
 * after the epoch, so `%H:%M:%S` reads as hours, minutes and seconds.
 *
 * @param format - The configured format string
 * @param elapsed - A non-negative duration
 * @param capacity - Maximum output size in bytes
 */
export function formatElapsed(
  format: string,
  elapsed: HighResTime,
  capacity: number = DEFAULT_TIMESTAMP_CAPACITY,
): Outcome<string> {
  const { seconds } = elapsed;
  const micros = micros6(elapsed);

  if (format.includes("%.s")) return ok(`${seconds}.${micros}`);
  if (format.includes("%.S")) return ok(`${pad2(seconds % 60)}.${micros}`);
  if (format.includes("%.T")) {
    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    return ok(`${pad2(hours)}:${pad2(minutes)}:${pad2(seconds % 60)}.${micros}`);
  }
  return formatAbsolute(format, elapsed, { utc: true, capacity });
}
