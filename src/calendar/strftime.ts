/**
 * `strftime`-style rendering of {@link CalendarFields}.
 *
 * Supports the POSIX directive set in the C locale plus `%s`, `%P`, `%k`,
 * `%l` and the GNU padding flags `-` (no padding), `_` (space padding) and
 * `0` (zero padding). Unknown directives are copied through literally.
 *
 * @module
 */

import {
  type CalendarFields,
  MONTH_NAMES,
  WEEKDAY_NAMES,
  daysInYear,
} from "./fields.ts";

type PadFlag = "-" | "_" | "0" | null;

/**
 * Render `format` against `fields`.
 *
 * @param format - Format string with `%` directives
 * @param fields - Broken-down time to render
 */
export function strftime(format: string, fields: CalendarFields): string {
  let out = "";
  let i = 0;
  while (i < format.length) {
    const ch = format.charAt(i);
    if (ch !== "%") {
      out += ch;
      i++;
      continue;
    }

    let j = i + 1;
    let flag: PadFlag = null;
    const maybeFlag = format[j];
    if (maybeFlag === "-" || maybeFlag === "_" || maybeFlag === "0") {
      flag = maybeFlag;
      j++;
    }

    const directive = format[j];
    if (directive === undefined) {
      // Trailing '%' (or '%' + flag): emit as-is
      out += format.slice(i);
      break;
    }

    const rendered = renderDirective(directive, fields, flag);
    out += rendered ?? format.slice(i, j + 1);
    i = j + 1;
  }
  return out;
}

/** Render one directive, or `null` when it is not recognized. */
function renderDirective(
  directive: string,
  f: CalendarFields,
  flag: PadFlag,
): string | null {
  const num = (value: number, width: number, pad: "0" | " " = "0"): string =>
    padNumber(value, width, flag ?? pad);

  switch (directive) {
    case "a":
      return weekdayName(f.weekday).slice(0, 3);
    case "A":
      return weekdayName(f.weekday);
    case "b":
    case "h":
      return monthName(f.month).slice(0, 3);
    case "B":
      return monthName(f.month);
    case "c":
      return strftime("%a %b %e %H:%M:%S %Y", f);
    case "C":
      return num(Math.floor(f.year / 100), 2);
    case "d":
      return num(f.day, 2);
    case "D":
    case "x":
      return strftime("%m/%d/%y", f);
    case "e":
      return num(f.day, 2, " ");
    case "F":
      return strftime("%Y-%m-%d", f);
    case "g":
      return num(isoWeek(f).year % 100, 2);
    case "G":
      return String(isoWeek(f).year);
    case "H":
      return num(f.hour, 2);
    case "I":
      return num(f.hour % 12 || 12, 2);
    case "j":
      return num(f.yearDay + 1, 3);
    case "k":
      return num(f.hour, 2, " ");
    case "l":
      return num(f.hour % 12 || 12, 2, " ");
    case "m":
      return num(f.month + 1, 2);
    case "M":
      return num(f.minute, 2);
    case "n":
      return "\n";
    case "p":
      return f.hour < 12 ? "AM" : "PM";
    case "P":
      return f.hour < 12 ? "am" : "pm";
    case "r":
      return strftime("%I:%M:%S %p", f);
    case "R":
      return strftime("%H:%M", f);
    case "s":
      return String(f.epochSeconds);
    case "S":
      return num(f.second, 2);
    case "t":
      return "\t";
    case "T":
    case "X":
      return strftime("%H:%M:%S", f);
    case "u":
      return String(f.weekday || 7);
    case "U":
      return num(Math.floor((f.yearDay + 7 - f.weekday) / 7), 2);
    case "V":
      return num(isoWeek(f).week, 2);
    case "w":
      return String(f.weekday);
    case "W":
      return num(Math.floor((f.yearDay + 7 - ((f.weekday + 6) % 7)) / 7), 2);
    case "y":
      return num(((f.year % 100) + 100) % 100, 2);
    case "Y":
      return String(f.year);
    case "z":
      return formatOffset(f.offsetMinutes);
    case "Z":
      return f.zone;
    case "%":
      return "%";
    default:
      return null;
  }
}

function padNumber(
  value: number,
  width: number,
  flag: "-" | "_" | "0" | " ",
): string {
  const text = String(value);
  switch (flag) {
    case "-":
      return text;
    case "_":
    case " ":
      return text.padStart(width, " ");
    case "0":
      return text.padStart(width, "0");
  }
}

function monthName(month: number): string {
  return MONTH_NAMES[month] ?? "?";
}

function weekdayName(weekday: number): string {
  return WEEKDAY_NAMES[weekday] ?? "?";
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, "0");
  const minutes = String(abs % 60).padStart(2, "0");
  return `${sign}${hours}${minutes}`;
}

/** ISO 8601 week-numbering year and week (weeks start Monday). */
function isoWeek(f: CalendarFields): { year: number; week: number } {
  const mondayBased = (f.weekday + 6) % 7;
  let year = f.year;
  // Day of year of the Thursday in the same ISO week
  let thursday = f.yearDay - mondayBased + 3;
  if (thursday < 0) {
    year -= 1;
    thursday += daysInYear(year);
  } else if (thursday >= daysInYear(year)) {
    thursday -= daysInYear(year);
    year += 1;
  }
  return { year, week: Math.floor(thursday / 7) + 1 };
}
