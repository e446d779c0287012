/**
 * Rendering a point in time with the subsecond-extended format language.
 *
 * On top of the `strftime` directives, four tokens are recognized:
 *
 * | Token | Output                                   |
 * | ----- | ---------------------------------------- |
 * | `%.S` | seconds + `.` + 6-digit microseconds     |
 * | `%.s` | epoch seconds + `.` + 6-digit microseconds |
 * | `%.T` | `HH:MM:SS` + `.` + 6-digit microseconds  |
 * | `%N`  | 9-digit nanoseconds                      |
 *
 * @module
 */

import { type CalendarFields, toCalendarFields } from "../calendar/fields.ts";
import { strftime } from "../calendar/strftime.ts";
import { type Outcome, fail, ok } from "../errors.ts";
import { BoundedText } from "../util/bounded.ts";
import { type HighResTime, micros6, nanos9 } from "../util/time.ts";

/** Default bound on a rendered timestamp, in bytes. */
export const DEFAULT_TIMESTAMP_CAPACITY = 256;

/** Options for {@link formatAbsolute}. */
export interface FormatOptions {
  /** Break the time down in UTC instead of the local zone. */
  utc?: boolean;
  /** Maximum output size in bytes. */
  capacity?: number;
}

/**
 * Render `time` according to `format`.
 *
 * The first pass replaces the subsecond tokens and `%s`, copying every
 * other directive through intact (so `%%s` stays a literal `%s`). If the
 * result still contains `%`, a second pass hands it to {@link strftime}.
 *
 * @returns The rendered text; `invalid-argument` for a missing format or
 *   an unrepresentable time, `buffer-overflow` when the output exceeds
 *   the capacity
 */
export function formatAbsolute(
  format: string | null | undefined,
  time: HighResTime,
  options: FormatOptions = {},
): Outcome<string> {
  if (format == null) return fail("invalid-argument", "format is missing");

  const fields = toCalendarFields(time.seconds, options.utc ?? false);
  if (!fields) {
    return fail("invalid-argument", `time ${time.seconds} is out of range`);
  }

  const capacity = options.capacity ?? DEFAULT_TIMESTAMP_CAPACITY;
  const firstPass = expandSubsecondTokens(format, time, fields, capacity);
  if (!firstPass.ok) return firstPass;
  if (!firstPass.value.includes("%")) return firstPass;

  const out = new BoundedText(capacity);
  const appended = out.append(strftime(firstPass.value, fields));
  return appended.ok ? ok(out.toString()) : appended;
}

function expandSubsecondTokens(
  format: string,
  time: HighResTime,
  fields: CalendarFields,
  capacity: number,
): Outcome<string> {
  const out = new BoundedText(capacity);
  let i = 0;
  while (i < format.length) {
    let piece: string;
    let width: number;
    if (format.startsWith("%.S", i)) {
      piece = `${String(fields.second).padStart(2, "0")}.${micros6(time)}`;
      width = 3;
    } else if (format.startsWith("%.s", i)) {
      piece = `${time.seconds}.${micros6(time)}`;
      width = 3;
    } else if (format.startsWith("%.T", i)) {
      piece = `${strftime("%H:%M:%S", fields)}.${micros6(time)}`;
      width = 3;
    } else if (format.startsWith("%N", i)) {
      piece = nanos9(time);
      width = 2;
    } else if (format.startsWith("%s", i)) {
      piece = String(time.seconds);
      width = 2;
    } else if (format.charAt(i) === "%" && i + 1 < format.length) {
      // Any other directive is left for the second pass
      piece = format.slice(i, i + 2);
      width = 2;
    } else {
      piece = format.charAt(i);
      width = 1;
    }

    const appended = out.append(piece);
    if (!appended.ok) return appended;
    i += width;
  }
  return ok(out.toString());
}
