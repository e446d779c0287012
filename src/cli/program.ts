/**
 * Command-line definition, option parsing and dispatch.
 *
 * @module
 */

import { Command, Option } from "commander";
import { type AnnotateArgs, runAnnotate } from "./annotate.ts";

/** Receives the parsed options and returns an exit code. */
export type AnnotateRunner = (args: AnnotateArgs) => Promise<number>;

const runOnStdio: AnnotateRunner = (args) =>
  runAnnotate(args, { input: process.stdin, output: process.stdout });

/**
 * Build the `linestamp` command.
 *
 * @param run - Invoked with the parsed options (defaults to stdin/stdout)
 */
export function createProgram(run: AnnotateRunner = runOnStdio): Command {
  return new Command()
    .name("linestamp")
    .description("Add timestamps to the beginning of each line of input.")
    .argument(
      "[format]",
      'strftime format (default "%b %d %H:%M:%S"); extensions: %.S, %.s, %.T, %N',
    )
    .option("-r, --relative", "convert existing timestamps to relative times")
    .addOption(
      new Option(
        "-i, --incremental",
        "report time since the previous line",
      ).conflicts("sinceStart"),
    )
    .addOption(
      new Option("-s, --since-start", "report time since start").conflicts(
        "incremental",
      ),
    )
    .option("-m, --monotonic", "use the monotonic clock for -i and -s")
    .option("-u, --unique", "only output lines that differ from the previous one")
    .option("-c, --config <path>", "path to config file")
    .option("--verbose", "report lines left unchanged because of an error")
    .action(
      async (
        format: string | undefined,
        opts: Omit<AnnotateArgs, "format">,
      ) => {
        process.exitCode = await run({ ...opts, format });
      },
    );
}
