import { describe, expect, test } from "vitest";
import { localEpoch } from "../__testing.ts";
import { parseCalendarTimestamp } from "./calendar.ts";

const NOW = localEpoch(2026, 1, 10, 12);

describe("parseCalendarTimestamp", () => {
  test("fills in the current year", () => {
    expect(parseCalendarTimestamp("Jan 05 08:00:00", "%b %d %H:%M:%S", { now: NOW })).toEqual({
      ok: true,
      value: localEpoch(2026, 1, 5, 8),
    });
  });

  test("keeps a time within the future tolerance", () => {
    expect(parseCalendarTimestamp("Jan 20 00:00:00", "%b %d %H:%M:%S", { now: NOW })).toEqual({
      ok: true,
      value: localEpoch(2026, 1, 20),
    });
  });

  test("moves a far-future year-less time to the previous year", () => {
    expect(parseCalendarTimestamp("Dec 22 22:25:23", "%b %d %H:%M:%S", { now: NOW })).toEqual({
      ok: true,
      value: localEpoch(2025, 12, 22, 22, 25, 23),
    });
  });

  test("corrects an explicit future year only once", () => {
    expect(
      parseCalendarTimestamp("2028-06-01T00:00:00", "%Y-%m-%dT%H:%M:%S", { now: NOW }),
    ).toEqual({ ok: true, value: localEpoch(2027, 6, 1) });
  });

  test("defaults missing seconds to zero", () => {
    expect(parseCalendarTimestamp("Sat Jan 03 10:15", "%a %b %d %H:%M", { now: NOW })).toEqual({
      ok: true,
      value: localEpoch(2026, 1, 3, 10, 15),
    });
  });

  test("interprets fields as UTC on request", () => {
    expect(
      parseCalendarTimestamp("Aug 23 04:03:33", "%b %d %H:%M:%S", {
        now: 1_755_921_913,
        utc: true,
      }),
    ).toEqual({ ok: true, value: 1_755_921_813 });
  });

  test("fails on text that does not fit the format", () => {
    const result = parseCalendarTimestamp("Foo 22 22:25:23", "%b %d %H:%M:%S", { now: NOW });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("time-parse");
  });
});
