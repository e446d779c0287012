import { describe, expect, test } from "vitest";
import { formatElapsed } from "./elapsed.ts";

// 1m15s and 250 microseconds
const ELAPSED = { seconds: 75, nanoseconds: 250_000 };

describe("formatElapsed", () => {
  test("renders total seconds for %.s", () => {
    expect(formatElapsed("%.s", ELAPSED)).toEqual({ ok: true, value: "75.000250" });
  });

  test("renders seconds within the minute for %.S", () => {
    expect(formatElapsed("%.S", ELAPSED)).toEqual({ ok: true, value: "15.000250" });
  });

  test("renders a clock duration for %.T", () => {
    expect(formatElapsed("%.T", ELAPSED)).toEqual({ ok: true, value: "00:01:15.000250" });
    expect(formatElapsed("%.T", { seconds: 90_000, nanoseconds: 0 })).toEqual({
      ok: true,
      value: "25:00:00.000000",
    });
  });

  test("the token replaces the whole format", () => {
    expect(formatElapsed("+%.s elapsed", ELAPSED)).toEqual({ ok: true, value: "75.000250" });
  });

  test("renders other formats as a UTC time after the epoch", () => {
    expect(formatElapsed("%H:%M:%S", ELAPSED)).toEqual({ ok: true, value: "00:01:15" });
    expect(formatElapsed("%H:%M:%S", { seconds: 90_000, nanoseconds: 0 })).toEqual({
      ok: true,
      value: "01:00:00",
    });
  });

  test("honours the capacity", () => {
    const result = formatElapsed("%H:%M:%S", ELAPSED, 4);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("buffer-overflow");
  });
});
