import { ValidationError } from "@/clinic/errors";

const WALL_CLOCK = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2})(:\d{2})?$/;

/** Half-open time range `[start, end)` in milliseconds. */
export interface Interval {
  readonly start: number;
  readonly end: number;
}

/**
 * Normalise a clinic-local timestamp to `YYYY-MM-DDTHH:mm:ss`.
 * Stored timestamps share this shape, so they also sort lexicographically.
 */
export function normalizeWallClock(value: string): string {
  const match = WALL_CLOCK.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid timestamp "${value}", expected YYYY-MM-DDTHH:mm[:ss]`);
  }
  const normalized = `${match[1]}T${match[2]}${match[3] ?? ":00"}`;
  if (!isCalendarExact(normalized)) {
    throw new ValidationError(`Invalid timestamp "${value}"`);
  }
  return normalized;
}

// Wall-clock times are compared as if they were UTC so the result does not
// depend on the host time zone.
export function toInstant(wallClock: string): number {
  return Date.parse(`${normalizeWallClock(wallClock)}Z`);
}

export function createInterval(start: string, end: string): Interval {
  const interval = { start: toInstant(start), end: toInstant(end) };
  if (interval.end <= interval.start) {
    throw new ValidationError(`End time ${end} must be after start time ${start}`);
  }
  return interval;
}

export function dayOf(wallClock: string): string {
  return normalizeWallClock(wallClock).slice(0, 10);
}

export function normalizeDate(date: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || !isCalendarExact(`${date}T00:00:00`)) {
    throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  return date;
}

// Date.parse rolls impossible dates over (Feb 30 becomes Mar 2); only accept
// values that come back unchanged.
function isCalendarExact(wallClock: string): boolean {
  const ms = Date.parse(`${wallClock}Z`);
  return !Number.isNaN(ms) && new Date(ms).toISOString().slice(0, 19) === wallClock;
}
