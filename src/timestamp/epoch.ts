/**
 * Parsers for Unix epoch timestamps: plain (`1755921813`) and fractional
 * (`1755921813.123456`).
 *
 * @module
 */

import { type Outcome, fail, ok } from "../errors.ts";
import type { HighResTime } from "../util/time.ts";

/**
 * Parse a run of ASCII digits as epoch seconds.
 *
 * Zero is rejected: a lone `0` in a log line is far more likely to be a
 * counter than the epoch itself.
 *
 * @returns `invalid-argument` for a missing input; `time-parse` for empty
 *   or non-digit input, values beyond `Number.MAX_SAFE_INTEGER`, and zero
 */
export function parsePlainEpoch(text: string | null | undefined): Outcome<number> {
  if (text == null) return fail("invalid-argument", "epoch text is missing");
  if (!/^[0-9]+$/.test(text)) {
    return fail("time-parse", `not an epoch timestamp: "${text}"`);
  }

  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    return fail("time-parse", `epoch timestamp out of range: ${text}`);
  }
  if (value === 0) return fail("time-parse", "epoch timestamp is zero");
  return ok(value);
}

/**
 * Parse `seconds.fraction` epoch text.
 *
 * The integer part follows {@link parsePlainEpoch}. The fraction (1 to 9
 * digits) does not adjust the seconds; it is returned separately, scaled
 * to nanoseconds.
 *
 * @returns `invalid-argument` for a missing input; `time-parse` when there
 *   is no `.`, or either side is malformed
 */
export function parseFractionalEpoch(
  text: string | null | undefined,
): Outcome<HighResTime> {
  if (text == null) return fail("invalid-argument", "epoch text is missing");

  const dot = text.indexOf(".");
  if (dot < 0) {
    return fail("time-parse", `no fractional part in "${text}"`);
  }

  const seconds = parsePlainEpoch(text.slice(0, dot));
  if (!seconds.ok) return seconds;

  const fraction = text.slice(dot + 1);
  if (!/^[0-9]{1,9}$/.test(fraction)) {
    return fail("time-parse", `malformed fractional part in "${text}"`);
  }

  return ok({
    seconds: seconds.value,
    nanoseconds: Number(fraction.padEnd(9, "0")),
  });
}
