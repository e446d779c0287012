/**
 * Annotate command. Reads lines, annotates them and writes them out.
 *
 * @module
 */

import { once } from "node:events";
import type { Writable } from "node:stream";
import { LineAnnotator } from "../annotate/annotator.ts";
import { BYTE_ENCODING, readLines, toByteText } from "../annotate/lines.ts";
import type { Clock } from "../clock/index.ts";
import { type CommandLineFlags, Config } from "../config.ts";

/** Parsed command-line options. */
export interface AnnotateArgs extends CommandLineFlags {
  /** Explicit config file path. */
  config?: string;
  /** Report lines passed through because annotation failed. */
  verbose?: boolean;
}

/** Streams and environment the command runs against. */
export interface AnnotateIO {
  input: AsyncIterable<string | Uint8Array>;
  output: Writable;
  /** Directory to search for a config file. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Clock override, for tests. */
  clock?: Clock;
}

/**
 * Run the annotate command.
 *
 * @param args - Parsed command-line options
 * @param io - Input and output streams
 * @returns The exit code (0 on success, 1 when the config cannot be loaded)
 */
export async function runAnnotate(
  args: AnnotateArgs,
  io: AnnotateIO,
): Promise<number> {
  let config: Config;
  try {
    config = args.config
      ? await Config.loadFromFile(args.config)
      : await Config.load(io.cwd ?? process.cwd());
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`[linestamp] Failed to load config: ${message}`);
    return 1;
  }

  const settings = config.resolve(args);
  const annotator = new LineAnnotator({
    ...settings,
    // Lines arrive as byte text; the format has to match them.
    format: toByteText(settings.format),
    clock: io.clock,
    onPassThrough: args.verbose
      ? (line, error) =>
          console.error(
            `[linestamp] ${error.kind}: ${error.message} (line: ${JSON.stringify(line)})`,
          )
      : undefined,
  });

  for await (const line of readLines(io.input)) {
    const out = annotator.process(line);
    if (out === null) continue;
    if (!io.output.write(out, BYTE_ENCODING)) await once(io.output, "drain");
  }
  return 0;
}
