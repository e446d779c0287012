/**
 * Project-wide test utilities.
 *
 * @module
 */

import { mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { afterEach, beforeEach } from "vitest";
import { Clock, type ClockSource } from "./clock/index.ts";
import type { HighResTime } from "./util/time.ts";

/**
 * Result of {@link useTempDir}. Provides access to the temporary directory
 * path.
 */
export interface TempDir {
  /** Absolute path to the temporary directory. */
  readonly dir: string;
}

/**
 * Create a temporary directory scoped to the current `describe` block.
 * The directory is created fresh before each test (`beforeEach`) and
 * removed after each test (`afterEach`).
 *
 * @param prefix - Identifier included in the directory name
 */
export function useTempDir(prefix: string): TempDir {
  const dir = join(
    tmpdir(),
    `linestamp-${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`,
  );

  beforeEach(() => {
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  return { dir };
}

/**
 * A {@link ClockSource} that replays scripted readings.
 *
 * Each call returns the next reading in its list; the last one repeats.
 */
export class ScriptedClockSource implements ClockSource {
  private wallIndex = 0;
  private monoIndex = 0;
  private readonly wallReadings: HighResTime[];
  private readonly monoReadings: HighResTime[] | null;

  /**
   * @param wall - Wall-clock readings in order
   * @param monotonic - Monotonic readings in order, or `null` for a
   *   platform without a monotonic source
   */
  constructor(wall: HighResTime[], monotonic: HighResTime[] | null = wall) {
    this.wallReadings = wall;
    this.monoReadings = monotonic;
  }

  wall(): HighResTime {
    return pick(this.wallReadings, this.wallIndex++);
  }

  monotonic(): HighResTime | null {
    if (!this.monoReadings) return null;
    return pick(this.monoReadings, this.monoIndex++);
  }
}

function pick(readings: HighResTime[], index: number): HighResTime {
  const reading = readings[Math.min(index, readings.length - 1)];
  if (!reading) throw new Error("ScriptedClockSource needs at least one reading");
  return reading;
}

/** A {@link Clock} over scripted readings that discards warnings. */
export function scriptedClock(
  wall: HighResTime[],
  monotonic: HighResTime[] | null = wall,
): Clock {
  return new Clock(new ScriptedClockSource(wall, monotonic), () => {});
}

/** Local-time epoch seconds for a civil date (month is 1-based). */
export function localEpoch(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): number {
  return new Date(year, month - 1, day, hour, minute, second).getTime() / 1000;
}

/** A writable stream that collects everything written to it. */
export class CollectingWritable extends Writable {
  private chunks: Buffer[] = [];

  override _write(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk, encoding) : chunk);
    callback();
  }

  /** Everything written so far, as raw bytes. */
  get bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  /** Everything written so far, decoded as UTF-8. */
  get text(): string {
    return this.bytes.toString("utf8");
  }

  /** Everything written so far, split after each newline. */
  get lines(): string[] {
    return this.text.split(/(?<=\n)/).filter((line) => line.length > 0);
  }
}
