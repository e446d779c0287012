/**
 * Compact relative-time rendering (`"5m12s ago"`, `"in 2h"`).
 *
 * @module
 */

const MINUTE = 60;
const HOUR = 3600;
const DAY = 86_400;

/**
 * Render the distance from `timestamp` to `now` in at most two units.
 *
 * Past times end in `" ago"`, future times start with `"in "`.
 *
 * @param now - Reference instant in epoch seconds
 * @param timestamp - The instant being described, in epoch seconds
 */
export function formatRelative(now: number, timestamp: number): string {
  const diff = now - timestamp;
  const magnitude = formatMagnitude(Math.abs(diff));
  return diff < 0 ? `in ${magnitude}` : `${magnitude} ago`;
}

/** Render a non-negative number of seconds with the largest fitting unit. */
export function formatMagnitude(seconds: number): string {
  if (seconds < MINUTE) return `${seconds}s`;
  if (seconds < HOUR) {
    return twoUnits(Math.floor(seconds / MINUTE), "m", seconds % MINUTE, "s");
  }
  if (seconds < DAY) {
    return twoUnits(
      Math.floor(seconds / HOUR),
      "h",
      Math.floor((seconds % HOUR) / MINUTE),
      "m",
    );
  }
  return twoUnits(
    Math.floor(seconds / DAY),
    "d",
    Math.floor((seconds % DAY) / HOUR),
    "h",
  );
}

function twoUnits(
  major: number,
  majorUnit: string,
  minor: number,
  minorUnit: string,
): string {
  return minor > 0
    ? `${major}${majorUnit}${minor}${minorUnit}`
    : `${major}${majorUnit}`;
}
