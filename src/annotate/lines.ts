/**
 * Splitting a byte or text stream into lines that keep their terminator.
 *
 * Lines are byte text: every input byte becomes one UTF-16 code unit of
 * the same value (`latin1`), so bytes that are not valid UTF-8 survive a
 * round trip through {@link BYTE_ENCODING} untouched.
 *
 * @module
 */

/** Encoding that maps each byte to one code unit and back. */
export const BYTE_ENCODING = "latin1" satisfies BufferEncoding;

/** Re-express decoded text as byte text (its UTF-8 bytes, one per code unit). */
export function toByteText(text: string): string {
  return Buffer.from(text, "utf8").toString(BYTE_ENCODING);
}

/**
 * Yield the lines of `input` as byte text, each ending in the `\n` it had
 * (a preceding `\r` stays in the line too). A final line without
 * terminator is yielded without one; an empty input yields nothing.
 *
 * @param input - Chunks of raw bytes, or decoded text taken as UTF-8
 */
export async function* readLines(
  input: AsyncIterable<string | Uint8Array>,
): AsyncGenerator<string> {
  let pending = "";

  for await (const chunk of input) {
    // Earlier content holds no newline, so only the new chunk is searched.
    const searchFrom = pending.length;
    pending +=
      typeof chunk === "string"
        ? toByteText(chunk)
        : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength).toString(
            BYTE_ENCODING,
          );

    let start = 0;
    let newline = pending.indexOf("\n", searchFrom);
    while (newline !== -1) {
      yield pending.slice(start, newline + 1);
      start = newline + 1;
      newline = pending.indexOf("\n", start);
    }
    pending = pending.slice(start);
  }

  if (pending.length > 0) yield pending;
}
