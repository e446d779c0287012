import { describe, expect, test, vi } from "vitest";
import { scriptedClock } from "../__testing.ts";
import { type AnnotatorOptions, LineAnnotator } from "./annotator.ts";

const T = 1_755_921_813;

function annotator(overrides: Partial<AnnotatorOptions>): LineAnnotator {
  return new LineAnnotator({
    mode: "absolute",
    format: "%s",
    explicitFormat: false,
    monotonic: false,
    unique: false,
    maxTimestampBytes: 256,
    maxLineBytes: 65_536,
    ...overrides,
  });
}

function at(seconds: number, nanoseconds = 0) {
  return { seconds, nanoseconds };
}

describe("LineAnnotator", () => {
  describe("absolute", () => {
    test("prefixes the wall-clock time", () => {
      const a = annotator({
        format: "%s.%N",
        clock: scriptedClock([at(T, 42_000)]),
      });
      expect(a.process("hello\n")).toBe("1755921813.000042000 hello\n");
    });

    test("passes the line through when the stamp overflows", () => {
      const onPassThrough = vi.fn();
      const a = annotator({
        maxTimestampBytes: 5,
        clock: scriptedClock([at(T)]),
        onPassThrough,
      });
      expect(a.process("hello\n")).toBe("hello\n");
      expect(onPassThrough).toHaveBeenCalledTimes(1);
      expect(onPassThrough.mock.calls[0]?.[1].kind).toBe("buffer-overflow");
    });
  });

  describe("relative", () => {
    test("rewrites a timestamp as a distance from now", () => {
      const a = annotator({ mode: "relative", clock: scriptedClock([at(T + 3600)]) });
      expect(a.process("1755921813 test line\n")).toBe("1h ago test line\n");
    });

    test("describes future timestamps", () => {
      const a = annotator({ mode: "relative", clock: scriptedClock([at(T - 90)]) });
      expect(a.process("at 1755921813 go\n")).toBe("at in 1m30s go\n");
    });

    test("reformats the timestamp with an explicit format", () => {
      const a = annotator({
        mode: "relative",
        format: "%.s",
        explicitFormat: true,
        clock: scriptedClock([at(T + 3600)]),
      });
      expect(a.process("t=1755921813.5 x\n")).toBe("t=1755921813.500000 x\n");
    });

    test("leaves lines without a timestamp alone", () => {
      const onPassThrough = vi.fn();
      const a = annotator({
        mode: "relative",
        clock: scriptedClock([at(T)]),
        onPassThrough,
      });
      expect(a.process("no timestamp\n")).toBe("no timestamp\n");
      expect(onPassThrough).not.toHaveBeenCalled();
    });

    test("passes the line through when the rewrite overflows", () => {
      const onPassThrough = vi.fn();
      const a = annotator({
        mode: "relative",
        maxLineBytes: 10,
        clock: scriptedClock([at(T + 3600)]),
        onPassThrough,
      });
      expect(a.process("1755921813 test line\n")).toBe("1755921813 test line\n");
      expect(onPassThrough.mock.calls[0]?.[1].kind).toBe("buffer-overflow");
    });
  });

  describe("incremental", () => {
    test("measures from the previous line", () => {
      const a = annotator({
        mode: "incremental",
        format: "%.s",
        monotonic: true,
        clock: scriptedClock([at(0)], [at(100), at(101, 500_000), at(103, 500_000)]),
      });
      expect(a.process("a\n")).toBe("1.000500 a\n");
      expect(a.process("b\n")).toBe("2.000000 b\n");
    });

    test("reads the wall clock unless monotonic is set", () => {
      const a = annotator({
        mode: "incremental",
        format: "%.s",
        clock: scriptedClock([at(10), at(12)], [at(0), at(99)]),
      });
      expect(a.process("x\n")).toBe("2.000000 x\n");
    });

    test("renders plain formats as a clock duration", () => {
      const a = annotator({
        mode: "incremental",
        format: "%H:%M:%S",
        clock: scriptedClock([at(T), at(T + 3725)]),
      });
      expect(a.process("x\n")).toBe("01:02:05 x\n");
    });
  });

  describe("since-start", () => {
    test("measures from construction", () => {
      const a = annotator({
        mode: "since-start",
        format: "%.T",
        monotonic: true,
        clock: scriptedClock([at(0)], [at(100), at(101), at(105, 250_000)]),
      });
      expect(a.process("a\n")).toBe("00:00:01.000000 a\n");
      expect(a.process("b\n")).toBe("00:00:05.000250 b\n");
    });
  });

  describe("unique", () => {
    test("drops lines equal to the previous one", () => {
      const a = annotator({ unique: true, clock: scriptedClock([at(T)]) });
      const out = ["a\n", "a\n", "b\n", "a\n"].map((line) => a.process(line));
      expect(out).toEqual([
        "1755921813 a\n",
        null,
        "1755921813 b\n",
        "1755921813 a\n",
      ]);
    });

    test("keeps duplicates when disabled", () => {
      const a = annotator({ clock: scriptedClock([at(T)]) });
      expect(a.process("a\n")).toBe("1755921813 a\n");
      expect(a.process("a\n")).toBe("1755921813 a\n");
    });
  });
});
