/**
 * Civil calendar fields and their conversion to and from epoch seconds.
 *
 * @module
 */

/** Full English month names, January first. */
export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

/** Full English weekday names, Sunday first. */
export const WEEKDAY_NAMES = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

/** A broken-down point in time, either local or UTC. */
export interface CalendarFields {
  /** Epoch seconds this breakdown was made from. */
  epochSeconds: number;
  year: number;
  /** Month index, 0 = January. */
  month: number;
  /** Day of month, 1-based. */
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Day of week, 0 = Sunday. */
  weekday: number;
  /** Day of year, 0 = January 1st. */
  yearDay: number;
  /** Offset from UTC in minutes, positive east of Greenwich. */
  offsetMinutes: number;
  /** Short zone name (`"UTC"`, `"CET"`, `"GMT+9"`, ...). */
  zone: string;
}

/** Calendar fields that identify an instant (no derived fields). */
export interface CivilTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Break epoch seconds down into calendar fields.
 *
 * @param epochSeconds - Seconds since the Unix epoch
 * @param utc - Break down in UTC instead of the local zone
 * @returns The fields, or `null` when the instant is outside the range
 *   a `Date` can represent
 */
export function toCalendarFields(
  epochSeconds: number,
  utc: boolean,
): CalendarFields | null {
  const d = new Date(epochSeconds * 1000);
  if (Number.isNaN(d.getTime())) return null;

  const year = utc ? d.getUTCFullYear() : d.getFullYear();
  const month = utc ? d.getUTCMonth() : d.getMonth();
  const day = utc ? d.getUTCDate() : d.getDate();
  return {
    epochSeconds,
    year,
    month,
    day,
    hour: utc ? d.getUTCHours() : d.getHours(),
    minute: utc ? d.getUTCMinutes() : d.getMinutes(),
    second: utc ? d.getUTCSeconds() : d.getSeconds(),
    weekday: utc ? d.getUTCDay() : d.getDay(),
    yearDay: dayOfYear(year, month, day),
    offsetMinutes: utc ? 0 : -d.getTimezoneOffset(),
    zone: utc ? "UTC" : localZoneName(d),
  };
}

/**
 * Convert civil fields to epoch seconds. Out-of-range fields roll over
 * the way `Date` normalizes them (e.g. February 30th becomes March 2nd).
 *
 * @param civil - The civil date and time
 * @param utc - Interpret the fields as UTC instead of local time
 * @returns Epoch seconds, or `null` when the result is not representable
 */
export function fromCivilTime(civil: CivilTime, utc: boolean): number | null {
  // setFullYear keeps years 0-99 literal, unlike the Date constructor.
  const d = new Date(0);
  if (utc) {
    d.setUTCFullYear(civil.year, civil.month, civil.day);
    d.setUTCHours(civil.hour, civil.minute, civil.second, 0);
  } else {
    d.setFullYear(civil.year, civil.month, civil.day);
    d.setHours(civil.hour, civil.minute, civil.second, 0);
  }
  const ms = d.getTime();
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

/** Number of days in `year`. */
export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function dayOfYear(year: number, month: number, day: number): number {
  const start = new Date(0);
  start.setUTCFullYear(year, 0, 1);
  const current = new Date(0);
  current.setUTCFullYear(year, month, day);
  return Math.round((current.getTime() - start.getTime()) / 86_400_000);
}

const zoneFormatter = new Intl.DateTimeFormat("en-US", {
  timeZoneName: "short",
});

function localZoneName(d: Date): string {
  const part = zoneFormatter
    .formatToParts(d)
    .find((p) => p.type === "timeZoneName");
  return part?.value ?? "";
}
