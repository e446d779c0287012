/**
 * Calendar timestamp parsing with defaults for missing fields and a
 * one-shot correction for year-less timestamps that land in the future.
 *
 * @module
 */

import {
  type CivilTime,
  fromCivilTime,
  toCalendarFields,
} from "../calendar/fields.ts";
import { strptime } from "../calendar/strptime.ts";
import { type Outcome, fail, ok } from "../errors.ts";

/** How far past "now" a parsed time may lie before its year is pulled back. */
export const FUTURE_TOLERANCE_SECONDS = 30 * 86_400;

/** Inputs to {@link parseCalendarTimestamp} besides the text itself. */
export interface CalendarParseOptions {
  /** Reference instant in epoch seconds. */
  now: number;
  /** Interpret the fields as UTC instead of local time. */
  utc?: boolean;
}

/**
 * Parse `text` against a calendar `format` into epoch seconds.
 *
 * A missing year becomes the current year, a missing month January, a
 * missing day the 1st, and missing clock fields zero. If the result lies
 * more than {@link FUTURE_TOLERANCE_SECONDS} after `now`, the year is
 * decremented and the time recomputed, once.
 *
 * @param text - The matched timestamp text
 * @param format - A `strptime` format from the pattern table
 * @returns Epoch seconds, or a `time-parse` failure
 */
export function parseCalendarTimestamp(
  text: string,
  format: string,
  options: CalendarParseOptions,
): Outcome<number> {
  const parsed = strptime(text, format);
  if (!parsed) {
    return fail("time-parse", `"${text}" does not match format "${format}"`);
  }

  const utc = options.utc ?? false;
  const { fields } = parsed;
  let year = fields.year;
  if (year === undefined) {
    const current = toCalendarFields(options.now, utc);
    if (!current) {
      return fail("time-parse", `reference time ${options.now} is out of range`);
    }
    year = current.year;
  }

  const civil: CivilTime = {
    year,
    month: fields.month ?? 0,
    day: fields.day ?? 1,
    hour: fields.hour ?? 0,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
  };

  let epoch = fromCivilTime(civil, utc);
  if (epoch !== null && epoch > options.now + FUTURE_TOLERANCE_SECONDS) {
    epoch = fromCivilTime({ ...civil, year: civil.year - 1 }, utc);
  }
  if (epoch === null) {
    return fail("time-parse", `"${text}" is not a representable time`);
  }
  return ok(epoch);
}
