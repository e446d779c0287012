/**
 * `strptime`-style parsing of text into partial calendar fields.
 *
 * Fields the format never mentions stay `undefined`; filling them in is
 * up to the caller.
 *
 * @module
 */

import { MONTH_NAMES, WEEKDAY_NAMES } from "./fields.ts";

/** Calendar fields recovered from text. Absent fields were not in the format. */
export interface ParsedCalendar {
  year?: number;
  /** Month index, 0 = January. */
  month?: number;
  day?: number;
  hour?: number;
  minute?: number;
  second?: number;
  /** Day of week, 0 = Sunday. Informational only. */
  weekday?: number;
}

/** Result of a successful {@link strptime}. */
export interface StrptimeResult {
  fields: ParsedCalendar;
  /** Index in the input just past the last consumed character. */
  end: number;
}

/** Composite directives and their expansions. */
const COMPOSITES: Readonly<Record<string, string>> = {
  D: "%m/%d/%y",
  F: "%Y-%m-%d",
  R: "%H:%M",
  T: "%H:%M:%S",
};

/**
 * Parse `text` according to `format`.
 *
 * Whitespace in the format matches any run of whitespace (including none).
 * Month and weekday names match case-insensitively, in full or
 * abbreviated form. Numeric fields skip leading blanks. `%y` maps 69-99
 * to 1969-1999 and 00-68 to 2000-2068.
 *
 * @param text - The text to parse
 * @param format - A format built from the supported directives
 * @returns The parsed fields, or `null` when the text does not fit
 */
export function strptime(text: string, format: string): StrptimeResult | null {
  const fields: ParsedCalendar = {};
  const end = scan(text, 0, format, fields);
  return end === null ? null : { fields, end };
}

function scan(
  text: string,
  start: number,
  format: string,
  fields: ParsedCalendar,
): number | null {
  let pos = start;
  for (let i = 0; i < format.length; i++) {
    const ch = format.charAt(i);

    if (isSpace(ch)) {
      pos = skipSpaces(text, pos);
      continue;
    }

    if (ch !== "%") {
      if (text.charAt(pos) !== ch) return null;
      pos++;
      continue;
    }

    i++;
    const directive = format.charAt(i);
    const composite = COMPOSITES[directive];
    if (composite !== undefined) {
      const next = scan(text, pos, composite, fields);
      if (next === null) return null;
      pos = next;
      continue;
    }

    const next = scanDirective(text, pos, directive, fields);
    if (next === null) return null;
    pos = next;
  }
  return pos;
}

function scanDirective(
  text: string,
  pos: number,
  directive: string,
  fields: ParsedCalendar,
): number | null {
  switch (directive) {
    case "a":
    case "A": {
      const m = matchName(text, pos, WEEKDAY_NAMES);
      if (!m) return null;
      fields.weekday = m.index;
      return m.end;
    }
    case "b":
    case "B":
    case "h": {
      const m = matchName(text, pos, MONTH_NAMES);
      if (!m) return null;
      fields.month = m.index;
      return m.end;
    }
    case "d":
    case "e":
      return scanNumber(text, pos, 2, 1, 31, (v) => {
        fields.day = v;
      });
    case "H":
      return scanNumber(text, pos, 2, 0, 23, (v) => {
        fields.hour = v;
      });
    case "M":
      return scanNumber(text, pos, 2, 0, 59, (v) => {
        fields.minute = v;
      });
    case "S":
      return scanNumber(text, pos, 2, 0, 60, (v) => {
        fields.second = v;
      });
    case "m":
      return scanNumber(text, pos, 2, 1, 12, (v) => {
        fields.month = v - 1;
      });
    case "y":
      return scanNumber(text, pos, 2, 0, 99, (v) => {
        fields.year = v < 69 ? 2000 + v : 1900 + v;
      });
    case "Y":
      return scanNumber(text, pos, 4, 0, 9999, (v) => {
        fields.year = v;
      });
    case "n":
    case "t":
      return skipSpaces(text, pos);
    case "%":
      return text.charAt(pos) === "%" ? pos + 1 : null;
    default:
      return null;
  }
}

function scanNumber(
  text: string,
  pos: number,
  maxDigits: number,
  min: number,
  max: number,
  assign: (value: number) => void,
): number | null {
  let p = skipBlanks(text, pos);
  const digitsStart = p;
  while (p - digitsStart < maxDigits && isDigit(text.charAt(p))) p++;
  if (p === digitsStart) return null;

  const value = Number.parseInt(text.slice(digitsStart, p), 10);
  if (value < min || value > max) return null;
  assign(value);
  return p;
}

function matchName(
  text: string,
  pos: number,
  names: readonly string[],
): { index: number; end: number } | null {
  const rest = text.slice(pos).toLowerCase();
  for (const [index, name] of names.entries()) {
    const full = name.toLowerCase();
    if (rest.startsWith(full)) return { index, end: pos + full.length };
  }
  for (const [index, name] of names.entries()) {
    const abbr = name.slice(0, 3).toLowerCase();
    if (rest.startsWith(abbr)) return { index, end: pos + abbr.length };
  }
  return null;
}

function isSpace(ch: string): boolean {
  return /^\s$/.test(ch);
}

function isDigit(ch: string): boolean {
  return /^[0-9]$/.test(ch);
}

function skipSpaces(text: string, pos: number): number {
  let p = pos;
  while (p < text.length && isSpace(text.charAt(p))) p++;
  return p;
}

function skipBlanks(text: string, pos: number): number {
  let p = pos;
  while (text.charAt(p) === " ") p++;
  return p;
}
