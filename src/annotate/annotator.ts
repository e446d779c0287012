/**
 * Per-line annotation: the state carried between lines and the dispatch
 * to the core operations for each mode.
 *
 * @module
 */

import { Clock } from "../clock/index.ts";
import { type Outcome, type TimestampError, ok } from "../errors.ts";
import { formatAbsolute } from "../format/absolute.ts";
import { formatElapsed } from "../format/elapsed.ts";
import { formatRelative } from "../format/relative.ts";
import { detectAndParse } from "../timestamp/extract.ts";
import { replaceSpan } from "../timestamp/rewrite.ts";
import { type HighResTime, elapsedBetween } from "../util/time.ts";

/**
 * What each line is annotated with.
 *
 * - `absolute`: prefix the current wall-clock time
 * - `relative`: rewrite the timestamp already in the line
 * - `incremental`: prefix the time since the previous line
 * - `since-start`: prefix the time since the annotator was created
 */
export type AnnotateMode = "absolute" | "relative" | "incremental" | "since-start";

/** Settings for a {@link LineAnnotator}. */
export interface AnnotatorOptions {
  mode: AnnotateMode;
  /** Format for the rendered timestamp. */
  format: string;
  /**
   * Whether `format` was chosen by the user. In relative mode an explicit
   * format reformats the detected timestamp instead of printing
   * `"... ago"`.
   */
  explicitFormat: boolean;
  /** Measure the delta modes with the monotonic clock. */
  monotonic: boolean;
  /** Drop lines identical to the previously emitted one. */
  unique: boolean;
  /** Bound on a rendered timestamp in bytes. */
  maxTimestampBytes: number;
  /** Bound on a rewritten line in bytes. */
  maxLineBytes: number;
  /** Clock to read. Defaults to the system clock. */
  clock?: Clock;
  /** Called when a line is passed through because annotation failed. */
  onPassThrough?: (line: string, error: TimestampError) => void;
}

/**
 * Maps input lines to output lines, one at a time.
 *
 * Lines are expected to carry their terminator; output keeps it. A line
 * that cannot be annotated is emitted unchanged.
 */
export class LineAnnotator {
  private readonly options: AnnotatorOptions;
  private readonly clock: Clock;
  private readonly start: HighResTime;
  private lastTick: HighResTime;
  private previousLine: string | null = null;

  constructor(options: AnnotatorOptions) {
    this.options = options;
    this.clock = options.clock ?? new Clock();
    this.start = this.clock.now(this.usesMonotonic());
    this.lastTick = this.start;
  }

  /**
   * Annotate one line.
   *
   * @param line - The input line, including its terminator if it had one
   * @returns The output line, or `null` when the unique filter drops it
   */
  process(line: string): string | null {
    if (this.options.unique && line === this.previousLine) return null;
    this.previousLine = line;

    const annotated = this.annotate(line);
    if (annotated.ok) return annotated.value;
    this.options.onPassThrough?.(line, annotated.error);
    return line;
  }

  private annotate(line: string): Outcome<string> {
    const { mode } = this.options;
    switch (mode) {
      case "absolute":
        return this.prefix(
          formatAbsolute(this.options.format, this.clock.now(false), {
            capacity: this.options.maxTimestampBytes,
          }),
          line,
        );
      case "relative":
        return this.rewrite(line);
      case "incremental": {
        const now = this.clock.now(this.usesMonotonic());
        const elapsed = elapsedBetween(now, this.lastTick);
        this.lastTick = now;
        return this.prefix(this.renderElapsed(elapsed), line);
      }
      case "since-start": {
        const now = this.clock.now(this.usesMonotonic());
        return this.prefix(this.renderElapsed(elapsedBetween(now, this.start)), line);
      }
    }
  }

  private rewrite(line: string): Outcome<string> {
    const now = this.clock.now(false);
    const detected = detectAndParse(line, { now: now.seconds });
    // A line without a timestamp is passed through, not reported.
    if (!detected.ok) return ok(line);

    let replacement: string;
    if (this.options.explicitFormat) {
      const rendered = formatAbsolute(this.options.format, detected.value.time, {
        capacity: this.options.maxTimestampBytes,
      });
      if (!rendered.ok) return rendered;
      replacement = rendered.value;
    } else {
      replacement = formatRelative(now.seconds, detected.value.time.seconds);
    }

    return replaceSpan(line, replacement, { capacity: this.options.maxLineBytes });
  }

  private renderElapsed(elapsed: HighResTime): Outcome<string> {
    return formatElapsed(this.options.format, elapsed, this.options.maxTimestampBytes);
  }

  private prefix(stamp: Outcome<string>, line: string): Outcome<string> {
    return stamp.ok ? ok(`${stamp.value} ${line}`) : stamp;
  }

  private usesMonotonic(): boolean {
    const { mode, monotonic } = this.options;
    return monotonic && (mode === "incremental" || mode === "since-start");
  }
}
