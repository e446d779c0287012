/**
 * Configuration file loading, schema validation, file discovery, and
 * resolution of command-line flags into annotator settings.
 *
 * @module
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import * as v from "valibot";
import { parse as parseYaml } from "yaml";
import type { AnnotateMode, AnnotatorOptions } from "./annotate/annotator.ts";
import { DEFAULT_TIMESTAMP_CAPACITY } from "./format/absolute.ts";

/** Format used when none is given. */
export const DEFAULT_FORMAT = "%b %d %H:%M:%S";

/** Format used by the delta modes when none is given. */
export const DELTA_FORMAT = "%H:%M:%S";

const ConfigSchema = v.object({
  format: v.optional(v.pipe(v.string(), v.minLength(1))),
  monotonic: v.optional(v.boolean(), false),
  unique: v.optional(v.boolean(), false),
  maxTimestampBytes: v.optional(
    v.pipe(v.number(), v.integer(), v.minValue(1)),
    DEFAULT_TIMESTAMP_CAPACITY,
  ),
  maxLineBytes: v.optional(
    v.pipe(v.number(), v.integer(), v.minValue(1)),
    65_536,
  ),
});

/** Raw validated configuration from the schema. */
type ConfigSource = v.InferOutput<typeof ConfigSchema>;

/** Flags given on the command line. Absent booleans mean "not set". */
export interface CommandLineFlags {
  relative?: boolean;
  incremental?: boolean;
  sinceStart?: boolean;
  monotonic?: boolean;
  unique?: boolean;
  /** Positional format argument. */
  format?: string;
}

/**
 * Immutable configuration loaded from an optional `.linestamp.yml`.
 */
export class Config {
  /** Absolute path to the config file, or `null` when using defaults. */
  readonly path: string | null;
  /** Format from the file, or `null` when the file sets none. */
  readonly format: string | null;
  readonly monotonic: boolean;
  readonly unique: boolean;
  /** Bound on a rendered timestamp in bytes. */
  readonly maxTimestampBytes: number;
  /** Bound on a rewritten line in bytes. */
  readonly maxLineBytes: number;

  constructor(source: ConfigSource, path: string | null) {
    this.path = path;
    this.format = source.format ?? null;
    this.monotonic = source.monotonic;
    this.unique = source.unique;
    this.maxTimestampBytes = source.maxTimestampBytes;
    this.maxLineBytes = source.maxLineBytes;
  }

  /**
   * Find and load a config file by walking up from `cwd`.
   *
   * When no config file is found, returns a Config with default values.
   *
   * @param cwd - The directory to start searching from
   * @returns A new Config instance
   */
  static async load(cwd: string): Promise<Config> {
    const path = findConfigFile(cwd);
    if (!path) return new Config(parseConfig(null), null);
    return Config.loadFromFile(path);
  }

  /**
   * Load a specific config file.
   *
   * @param path - Path to a YAML config file
   * @throws {v.ValiError} If the file content fails validation
   */
  static async loadFromFile(path: string): Promise<Config> {
    const absolute = resolve(path);
    const content = interpolateEnvVars(await readFile(absolute, "utf8"));
    return new Config(parseConfig(parseYaml(content)), absolute);
  }

  /**
   * Combine this configuration with command-line flags.
   *
   * Command-line values win over the file. A format from either source
   * counts as explicit; without one, the delta modes use
   * {@link DELTA_FORMAT} and the others {@link DEFAULT_FORMAT}.
   *
   * @param flags - Parsed command-line flags
   */
  resolve(
    flags: CommandLineFlags,
  ): Omit<AnnotatorOptions, "clock" | "onPassThrough"> {
    const mode = resolveMode(flags);
    const explicit = flags.format ?? this.format;
    const isDelta = mode === "incremental" || mode === "since-start";
    return {
      mode,
      format: explicit ?? (isDelta ? DELTA_FORMAT : DEFAULT_FORMAT),
      explicitFormat: explicit !== null,
      monotonic: flags.monotonic || this.monotonic,
      unique: flags.unique || this.unique,
      maxTimestampBytes: this.maxTimestampBytes,
      maxLineBytes: this.maxLineBytes,
    };
  }
}

function resolveMode(flags: CommandLineFlags): AnnotateMode {
  if (flags.relative) return "relative";
  if (flags.incremental) return "incremental";
  if (flags.sinceStart) return "since-start";
  return "absolute";
}

const CONFIG_FILENAMES = [".linestamp.yml", ".linestamp.yaml"];

/**
 * Search for a config file by walking up from `cwd` toward the filesystem root.
 *
 * @param cwd - The directory to start searching from
 * @returns The absolute path to the config file, or `null` if not found
 */
function findConfigFile(cwd: string): string | null {
  let dir = resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILENAMES) {
      const candidate = join(dir, name);
      if (existsSync(candidate)) return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Validate and parse a raw value into a {@link ConfigSource}.
 *
 * Useful in tests for constructing Config instances from inline data.
 *
 * @param raw - The raw value (typically from YAML parsing)
 * @returns A validated ConfigSource with defaults applied
 * @throws {v.ValiError} If validation fails
 */
export function parseConfig(raw: unknown): ConfigSource {
  return v.parse(ConfigSchema, raw ?? {});
}

/**
 * Replace `${VAR}` and `${VAR:default}` placeholders with environment
 * variable values.
 *
 * @param content - Raw config file text
 * @param env - Variable lookup (defaults to `process.env`)
 * @returns The text with all placeholders expanded
 */
export function interpolateEnvVars(
  content: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return content.replace(
    /\$\{([^}:]+)(?::([^}]*))?\}/g,
    (_match, name: string, fallback: string | undefined) =>
      env[name] ?? fallback ?? "",
  );
}
