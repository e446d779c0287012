import { describe, expect, test } from "vitest";
import { parseFractionalEpoch, parsePlainEpoch } from "./epoch.ts";

describe("parsePlainEpoch", () => {
  test("parses digits", () => {
    expect(parsePlainEpoch("1755921813")).toEqual({ ok: true, value: 1_755_921_813 });
  });

  test("rejects non-digit text", () => {
    const result = parsePlainEpoch("invalid");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("time-parse");
  });

  test("rejects empty text and zero", () => {
    for (const text of ["", "0", "0000000000"]) {
      const result = parsePlainEpoch(text);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("time-parse");
    }
  });

  test("rejects values beyond the safe integer range", () => {
    const result = parsePlainEpoch("99999999999999999999");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("time-parse");
  });

  test("rejects a missing input as an invalid argument", () => {
    const result = parsePlainEpoch(null);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("invalid-argument");
  });
});

describe("parseFractionalEpoch", () => {
  test("scales the fraction to nanoseconds", () => {
    expect(parseFractionalEpoch("1755921813.123456")).toEqual({
      ok: true,
      value: { seconds: 1_755_921_813, nanoseconds: 123_456_000 },
    });
  });

  test("accepts one to nine fraction digits", () => {
    expect(parseFractionalEpoch("1755921813.5")).toEqual({
      ok: true,
      value: { seconds: 1_755_921_813, nanoseconds: 500_000_000 },
    });
    expect(parseFractionalEpoch("1755921813.000000001")).toEqual({
      ok: true,
      value: { seconds: 1_755_921_813, nanoseconds: 1 },
    });
  });

  test("requires a fractional part", () => {
    const result = parseFractionalEpoch("1755921813");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("time-parse");
  });

  test("rejects malformed fractions", () => {
    for (const text of ["1755921813.", "1755921813.1234567890", "1755921813.12a"]) {
      const result = parseFractionalEpoch(text);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("time-parse");
    }
  });

  test("applies the plain rules to the integer part", () => {
    const result = parseFractionalEpoch("0.5");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("time-parse");
  });

  test("rejects a missing input as an invalid argument", () => {
    const result = parseFractionalEpoch(undefined);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("invalid-argument");
  });
});
