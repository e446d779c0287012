/**
 * The table of recognized timestamp shapes.
 *
 * Order matters: {@link detectAndParse} returns the first entry that both
 * matches and parses, and {@link locateLeftmost} breaks start-offset ties
 * in favour of the earlier entry.
 *
 * @module
 */

import { TimestampError } from "../errors.ts";

/** How a matched substring is turned into a point in time. */
export type PatternParser =
  | { kind: "calendar"; format: string }
  | { kind: "epoch-fractional" }
  | { kind: "epoch-plain" };

/** One recognized timestamp shape. */
export interface TimestampPattern {
  /** Identifier, e.g. `"syslog"`. */
  readonly name: string;
  /** Regular expression source locating the shape anywhere in a line. */
  readonly pattern: string;
  readonly parser: PatternParser;
}

/** A table entry with its expression compiled. */
export interface CompiledPattern extends TimestampPattern {
  readonly regex: RegExp;
}

/** Recognized timestamp shapes in priority order. */
export const TIMESTAMP_PATTERNS: readonly TimestampPattern[] = [
  {
    // Dec 22 22:25:23
    name: "syslog",
    pattern: "[A-Za-z]{3} [0-9]{1,2} [0-9]{2}:[0-9]{2}:[0-9]{2}",
    parser: { kind: "calendar", format: "%b %d %H:%M:%S" },
  },
  {
    // 2025-12-22T22:25:23 (any fraction or zone suffix stays outside the span)
    name: "iso-8601",
    pattern: "[0-9]{4}-[0-9]{2}-[0-9]{2}T[0-9]{2}:[0-9]{2}:[0-9]{2}",
    parser: { kind: "calendar", format: "%Y-%m-%dT%H:%M:%S" },
  },
  {
    // 16 Jun 94 07:29:35
    name: "rfc-822",
    pattern: "[0-9]{1,2} [A-Za-z]{3} [0-9]{2} [0-9]{2}:[0-9]{2}:[0-9]{2}",
    parser: { kind: "calendar", format: "%d %b %y %H:%M:%S" },
  },
  {
    // Mon Dec 22 22:25
    name: "lastlog",
    pattern: "[A-Za-z]{3} [A-Za-z]{3} [0-9]{2} [0-9]{2}:[0-9]{2}",
    parser: { kind: "calendar", format: "%a %b %d %H:%M" },
  },
  {
    // 21 dec 17:05
    name: "short",
    pattern: "[0-9]{2} [a-z]{3} [0-9]{2}:[0-9]{2}",
    parser: { kind: "calendar", format: "%d %b %H:%M" },
  },
  {
    // 22 dec/93 17:05:30
    name: "short-with-year",
    pattern: "[0-9]{2} [a-z]{3}/[0-9]{2} [0-9]{2}:[0-9]{2}:[0-9]{2}",
    parser: { kind: "calendar", format: "%d %b/%y %H:%M:%S" },
  },
  {
    // 1755921813.123456 (must precede the plain form, which matches its prefix)
    name: "unix-fractional",
    pattern: "[0-9]{10,}\\.[0-9]{1,9}",
    parser: { kind: "epoch-fractional" },
  },
  {
    // 1755921813
    name: "unix",
    pattern: "[0-9]{10,}",
    parser: { kind: "epoch-plain" },
  },
];

/**
 * Compile a table, skipping entries whose expression does not compile.
 *
 * @param patterns - Entries to compile, in priority order
 * @param onSkip - Receives a `regex-compile` error for each skipped entry
 */
export function compilePatterns(
  patterns: readonly TimestampPattern[],
  onSkip: (error: TimestampError) => void = () => {},
): readonly CompiledPattern[] {
  const compiled: CompiledPattern[] = [];
  for (const entry of patterns) {
    try {
      compiled.push({ ...entry, regex: new RegExp(entry.pattern) });
    } catch (e) {
      onSkip(
        new TimestampError(
          "regex-compile",
          `timestamp pattern "${entry.name}": ${e instanceof Error ? e.message : String(e)}`,
        ),
      );
    }
  }
  return Object.freeze(compiled);
}

/** {@link TIMESTAMP_PATTERNS}, compiled once at load time. */
export const COMPILED_PATTERNS: readonly CompiledPattern[] = compilePatterns(
  TIMESTAMP_PATTERNS,
  (error) => console.error(`[linestamp] skipping ${error.message}`),
);
