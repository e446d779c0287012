import { describe, expect, test } from "vitest";
import { detectAndParse, locateLeftmost } from "./extract.ts";
import { compilePatterns } from "./patterns.ts";

const NOW = 1_755_921_913;

describe("detectAndParse", () => {
  test("parses a plain epoch", () => {
    expect(detectAndParse("1755921813 test line", { now: NOW })).toEqual({
      ok: true,
      value: {
        time: { seconds: 1_755_921_813, nanoseconds: 0 },
        span: { start: 0, end: 10, pattern: "unix" },
      },
    });
  });

  test("prefers the fractional epoch over its integer prefix", () => {
    expect(detectAndParse("t=1755921813.123456 x", { now: NOW })).toEqual({
      ok: true,
      value: {
        time: { seconds: 1_755_921_813, nanoseconds: 123_456_000 },
        span: { start: 2, end: 19, pattern: "unix-fractional" },
      },
    });
  });

  test("parses a syslog timestamp", () => {
    expect(
      detectAndParse("Aug 23 04:03:33 host sshd[1]: ok", { now: NOW, utc: true }),
    ).toEqual({
      ok: true,
      value: {
        time: { seconds: 1_755_921_813, nanoseconds: 0 },
        span: { start: 0, end: 15, pattern: "syslog" },
      },
    });
  });

  describe("every calendar shape", () => {
    // 2026-01-10T12:00:00Z
    const options = { now: Date.UTC(2026, 0, 10, 12) / 1000, utc: true };

    test.each([
      { line: "2025-12-22T22:25:23Z", seconds: 1_766_442_323, start: 0, end: 19, pattern: "iso-8601" },
      { line: "16 Jun 94 07:29:35", seconds: 771_751_775, start: 0, end: 18, pattern: "rfc-822" },
      { line: "Mon Dec 22 22:25 boot", seconds: 1_766_442_300, start: 0, end: 16, pattern: "lastlog" },
      { line: "at 21 dec 17:05", seconds: 1_766_336_700, start: 3, end: 15, pattern: "short" },
      { line: "22 dec/93 17:05:30", seconds: 756_579_930, start: 0, end: 18, pattern: "short-with-year" },
    ])("$pattern: $line", ({ line, seconds, start, end, pattern }) => {
      expect(detectAndParse(line, options)).toEqual({
        ok: true,
        value: { time: { seconds, nanoseconds: 0 }, span: { start, end, pattern } },
      });
    });
  });

  test("earlier table entries win over earlier positions", () => {
    const result = detectAndParse("1755921813 then Aug 23 04:03:33", {
      now: NOW,
      utc: true,
    });
    expect(result.ok && result.value.span).toEqual({
      start: 16,
      end: 31,
      pattern: "syslog",
    });
  });

  test("moves on when a match does not parse", () => {
    const result = detectAndParse("Foo 12 10:00:00 at 1755921813", { now: NOW });
    expect(result.ok && result.value.span).toEqual({
      start: 19,
      end: 29,
      pattern: "unix",
    });
  });

  test("fails when nothing parses", () => {
    for (const line of ["plain text\n", "counter 0000000000"]) {
      const result = detectAndParse(line, { now: NOW });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("time-parse");
    }
  });

  test("rejects a missing line", () => {
    const result = detectAndParse(null);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("invalid-argument");
  });
});

describe("locateLeftmost", () => {
  test("locates an epoch at the start of the line", () => {
    expect(locateLeftmost("1755921813 test line")).toEqual({
      ok: true,
      value: { start: 0, end: 10, pattern: "unix" },
    });
  });

  test("picks the smallest start regardless of table order", () => {
    expect(locateLeftmost("1755921813 then Aug 23 04:03:33")).toEqual({
      ok: true,
      value: { start: 0, end: 10, pattern: "unix" },
    });
    expect(locateLeftmost("Mon Dec 22 22:25:23 boot")).toEqual({
      ok: true,
      value: { start: 0, end: 16, pattern: "lastlog" },
    });
  });

  test("breaks ties by table order", () => {
    const patterns = compilePatterns([
      { name: "any-digits", pattern: "[0-9]+", parser: { kind: "epoch-plain" } },
      { name: "ten-digits", pattern: "[0-9]{10}", parser: { kind: "epoch-plain" } },
    ]);
    expect(locateLeftmost("1755921813", patterns)).toEqual({
      ok: true,
      value: { start: 0, end: 10, pattern: "any-digits" },
    });
  });

  test("matches shape without parsing", () => {
    expect(locateLeftmost("Foo 12 10:00:00")).toEqual({
      ok: true,
      value: { start: 0, end: 15, pattern: "syslog" },
    });
  });

  test("fails when nothing matches", () => {
    const result = locateLeftmost("no timestamp here");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("time-parse");
  });

  test("rejects a missing line", () => {
    const result = locateLeftmost(undefined);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("invalid-argument");
  });
});
