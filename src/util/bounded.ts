/**
 * Capacity-bounded text building.
 *
 * A {@link BoundedText} refuses any write that would push its content past
 * a fixed number of bytes. Refused writes leave the existing content
 * untouched and report `buffer-overflow`.
 *
 * Content is byte text, one code unit per byte (see `readLines`), so a
 * string's length is its size in bytes.
 *
 * @module
 */

import { format } from "node:util";
import { type Outcome, fail, ok } from "../errors.ts";

/** A growable string with a hard byte capacity. */
export class BoundedText {
  /** Maximum content size in bytes. */
  readonly capacity: number;
  private parts: string[] = [];
  private bytes = 0;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  /** Current content size in bytes. */
  get byteLength(): number {
    return this.bytes;
  }

  /** Remaining room in bytes. */
  get remaining(): number {
    return this.capacity - this.bytes;
  }

  /**
   * Append `source` to the end of the content.
   *
   * @returns `buffer-overflow` when the result would exceed the capacity
   */
  append(source: string): Outcome<void> {
    const size = source.length;
    if (size > this.remaining) {
      return fail(
        "buffer-overflow",
        `appending ${size} bytes exceeds remaining capacity ${this.remaining}`,
      );
    }
    this.parts.push(source);
    this.bytes += size;
    return ok(undefined);
  }

  /** Drop all content. */
  clear(): void {
    this.parts = [];
    this.bytes = 0;
  }

  toString(): string {
    return this.parts.join("");
  }
}

/**
 * Append `source` to `dest`.
 *
 * @returns `invalid-argument` when either argument is missing,
 *   `buffer-overflow` when the result would not fit
 */
export function appendBounded(
  dest: BoundedText | null | undefined,
  source: string | null | undefined,
): Outcome<void> {
  if (!dest) return fail("invalid-argument", "destination is missing");
  if (source == null) return fail("invalid-argument", "source is missing");
  return dest.append(source);
}

/**
 * Replace the content of `dest` with `template` expanded by
 * {@link format} (`%s`, `%d`, `%i`, `%j`, ...).
 *
 * On overflow the previous content is kept.
 *
 * @returns `invalid-argument` when either argument is missing,
 *   `buffer-overflow` when the expansion would not fit
 */
export function writeFormatted(
  dest: BoundedText | null | undefined,
  template: string | null | undefined,
  ...args: unknown[]
): Outcome<void> {
  if (!dest) return fail("invalid-argument", "destination is missing");
  if (template == null) return fail("invalid-argument", "template is missing");

  const text = format(template, ...args);
  const size = text.length;
  if (size > dest.capacity) {
    return fail(
      "buffer-overflow",
      `formatted output of ${size} bytes exceeds capacity ${dest.capacity}`,
    );
  }
  dest.clear();
  return dest.append(text);
}
