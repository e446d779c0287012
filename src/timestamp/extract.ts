/**
 * Finding timestamps in a line.
 *
 * Two selection rules exist for the same pattern table and are kept as
 * separate operations:
 *
 * - {@link detectAndParse}: the first entry, in table order, whose match
 *   also parses supplies the time value.
 * - {@link locateLeftmost}: the match starting earliest in the line
 *   (ties go to the earlier entry) marks the span to replace.
 *
 * On a line holding two different timestamp shapes these can disagree;
 * the rewritten line then carries the first-parsed value at the leftmost
 * span.
 *
 * @module
 */

import { systemClock } from "../clock/index.ts";
import { type Outcome, fail, ok } from "../errors.ts";
import type { HighResTime } from "../util/time.ts";
import { parseCalendarTimestamp } from "./calendar.ts";
import { parseFractionalEpoch, parsePlainEpoch } from "./epoch.ts";
import { COMPILED_PATTERNS, type CompiledPattern } from "./patterns.ts";

/**
 * A half-open `[start, end)` range of code-unit offsets within a line;
 * byte offsets when the line is byte text.
 */
export interface MatchSpan {
  start: number;
  end: number;
  /** Name of the table entry that matched. */
  pattern: string;
}

/** A timestamp found and parsed by {@link detectAndParse}. */
export interface DetectedTimestamp {
  /**
   * The parsed instant. `nanoseconds` holds the fractional remainder of a
   * fractional epoch and is zero for every other shape.
   */
  time: HighResTime;
  /** Where the parsed text sits in the line. */
  span: MatchSpan;
}

/** Options shared by the extraction operations. */
export interface ExtractOptions {
  /** Reference instant (epoch seconds) for year defaulting. Defaults to the wall clock. */
  now?: number;
  /** Interpret calendar timestamps as UTC instead of local time. */
  utc?: boolean;
  /** Pattern table to search. Defaults to {@link COMPILED_PATTERNS}. */
  patterns?: readonly CompiledPattern[];
}

/**
 * Find the first table entry that both matches somewhere in `line` and
 * parses, and return its time.
 *
 * Success of parsing, not position, picks the winner: an earlier entry
 * wins even when a later entry's match starts further left.
 *
 * @returns `invalid-argument` for a missing line, `time-parse` when no
 *   entry matches and parses
 */
export function detectAndParse(
  line: string | null | undefined,
  options: ExtractOptions = {},
): Outcome<DetectedTimestamp> {
  if (line == null) return fail("invalid-argument", "line is missing");

  const patterns = options.patterns ?? COMPILED_PATTERNS;
  const now = options.now ?? systemClock.wall().seconds;

  for (const entry of patterns) {
    const executed = execEntry(entry, line);
    if (!executed.ok || !executed.value) continue;

    const match = executed.value;
    const text = match[0];
    const time = parseMatch(entry, text, now, options.utc ?? false);
    if (!time.ok) continue;

    return ok({
      time: time.value,
      span: { start: match.index, end: match.index + text.length, pattern: entry.name },
    });
  }

  return fail("time-parse", "no timestamp found");
}

/**
 * Find the match with the smallest start offset across the whole table,
 * checking shape only (no parsing). Ties go to the earlier entry.
 *
 * @returns `invalid-argument` for a missing line, `time-parse` when
 *   nothing matches
 */
export function locateLeftmost(
  line: string | null | undefined,
  patterns: readonly CompiledPattern[] = COMPILED_PATTERNS,
): Outcome<MatchSpan> {
  if (line == null) return fail("invalid-argument", "line is missing");

  let best: MatchSpan | null = null;
  for (const entry of patterns) {
    const executed = execEntry(entry, line);
    if (!executed.ok || !executed.value) continue;

    const match = executed.value;
    if (best === null || match.index < best.start) {
      best = {
        start: match.index,
        end: match.index + match[0].length,
        pattern: entry.name,
      };
    }
  }

  return best ? ok(best) : fail("time-parse", "no timestamp found");
}

/**
 * Run one entry's expression. Callers treat a `regex-exec` failure like
 * no match and move on to the next entry.
 */
function execEntry(
  entry: CompiledPattern,
  line: string,
): Outcome<RegExpExecArray | null> {
  try {
    // Table expressions are not global, so exec always starts at index 0.
    return ok(entry.regex.exec(line));
  } catch (e) {
    return fail(
      "regex-exec",
      `timestamp pattern "${entry.name}": ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}

function parseMatch(
  entry: CompiledPattern,
  text: string,
  now: number,
  utc: boolean,
): Outcome<HighResTime> {
  switch (entry.parser.kind) {
    case "epoch-plain": {
      const seconds = parsePlainEpoch(text);
      return seconds.ok ? ok({ seconds: seconds.value, nanoseconds: 0 }) : seconds;
    }
    case "epoch-fractional":
      return parseFractionalEpoch(text);
    case "calendar": {
      const seconds = parseCalendarTimestamp(text, entry.parser.format, { now, utc });
      return seconds.ok ? ok({ seconds: seconds.value, nanoseconds: 0 }) : seconds;
    }
  }
}
