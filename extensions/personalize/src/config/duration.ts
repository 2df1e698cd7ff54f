/**
 * Human-readable durations ("365 days", "1 day 2 hours") in seconds, read by
 * parse-duration. A bare number is a count of seconds. Months and years are
 * averaged (30.4375 and 365.25 days).
 */

import parse from "parse-duration";

export class DurationParseError extends Error {
  constructor(readonly input: string) {
    super(`invalid duration "${input}"`);
    this.name = "DurationParseError";
  }
}

export function parseDuration(input: string | number): number {
  if (typeof input === "number") {
    if (!Number.isFinite(input) || input < 0) throw new DurationParseError(String(input));
    return Math.trunc(input);
  }

  const seconds = parse(input.trim(), "s");
  if (typeof seconds !== "number" || !Number.isFinite(seconds) || seconds < 0) {
    throw new DurationParseError(input);
  }
  return Math.trunc(seconds);
}
