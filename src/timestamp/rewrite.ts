/**
 * Substituting replacement text for the timestamp in a line.
 *
 * @module
 */

import { type Outcome, fail, ok } from "../errors.ts";
import { BoundedText } from "../util/bounded.ts";
import { type MatchSpan, locateLeftmost } from "./extract.ts";
import { COMPILED_PATTERNS, type CompiledPattern } from "./patterns.ts";

/** Options for {@link replaceSpan}. */
export interface ReplaceOptions {
  /** Maximum size of the rewritten line in bytes. Unbounded by default. */
  capacity?: number;
  /** Pattern table to search. Defaults to {@link COMPILED_PATTERNS}. */
  patterns?: readonly CompiledPattern[];
}

/**
 * Replace the leftmost timestamp in `line` with `replacement`.
 *
 * Everything outside the span, including the line terminator, is kept as
 * is. A line without a timestamp is returned unchanged.
 *
 * @returns The rewritten line; `invalid-argument` for a missing argument,
 *   `buffer-overflow` when the result exceeds `capacity`
 */
export function replaceSpan(
  line: string | null | undefined,
  replacement: string | null | undefined,
  options: ReplaceOptions = {},
): Outcome<string> {
  if (line == null) return fail("invalid-argument", "line is missing");
  if (replacement == null) {
    return fail("invalid-argument", "replacement is missing");
  }

  const span = locateLeftmost(line, options.patterns ?? COMPILED_PATTERNS);
  if (!span.ok) return ok(line);
  return spliceSpan(line, span.value, replacement, options.capacity);
}

/**
 * Compose `line[:start] + replacement + line[end:]` into a bounded buffer.
 *
 * @param capacity - Maximum result size in bytes
 */
export function spliceSpan(
  line: string,
  span: Pick<MatchSpan, "start" | "end">,
  replacement: string,
  capacity: number = Number.POSITIVE_INFINITY,
): Outcome<string> {
  const out = new BoundedText(capacity);
  for (const part of [
    line.slice(0, span.start),
    replacement,
    line.slice(span.end),
  ]) {
    const appended = out.append(part);
    if (!appended.ok) return appended;
  }
  return ok(out.toString());
}
