import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { findConflicts, overlaps } from "@/clinic/scheduling/conflict-detector";
import { createInterval, dayOf, normalizeDate, normalizeWallClock } from "@/clinic/scheduling/interval";
import { ValidationError } from "@/clinic/errors";
import { DAY, storedAppointment } from "./helpers";

const intervalArb = fc
  .tuple(fc.integer({ min: 0, max: 100_000 }), fc.integer({ min: 1, max: 5_000 }))
  .map(([start, length]) => ({ start, end: start + length }));

describe("interval", () => {
  it("normalises timestamps without seconds", () => {
    expect(normalizeWallClock("2026-03-02T09:00")).toBe("2026-03-02T09:00:00");
    expect(normalizeWallClock("2026-03-02T09:00:15")).toBe("2026-03-02T09:00:15");
  });

  it("rejects timestamps in other shapes", () => {
    expect(() => normalizeWallClock("2026-03-02 09:00")).toThrow(ValidationError);
    expect(() => normalizeWallClock("2026-03-02T09:00:00Z")).toThrow(ValidationError);
    expect(() => normalizeWallClock("2026-13-02T09:00")).toThrow(ValidationError);
  });

  it("rejects calendar dates that do not exist instead of rolling them over", () => {
    expect(() => normalizeWallClock("2026-02-30T09:00")).toThrow('Invalid timestamp "2026-02-30T09:00"');
    expect(() => normalizeWallClock("2026-04-31T09:00")).toThrow(ValidationError);
    expect(() => normalizeWallClock("2026-03-02T24:00")).toThrow(ValidationError);
    expect(() => normalizeWallClock("2026-03-02T09:60")).toThrow(ValidationError);
    expect(normalizeWallClock("2028-02-29T09:00")).toBe("2028-02-29T09:00:00");
    expect(() => normalizeDate("2026-02-30")).toThrow(ValidationError);
    expect(() => normalizeDate("2026-04-31")).toThrow(ValidationError);
  });

  it("builds a half-open interval in milliseconds", () => {
    const interval = createInterval("2026-03-02T09:00", "2026-03-02T09:30");
    expect(interval.end - interval.start).toBe(30 * 60_000);
  });

  it("requires end after start", () => {
    expect(() => createInterval("2026-03-02T09:30", "2026-03-02T09:00")).toThrow(ValidationError);
    expect(() => createInterval("2026-03-02T09:00", "2026-03-02T09:00")).toThrow(ValidationError);
  });

  it("extracts and validates days", () => {
    expect(dayOf("2026-03-02T23:59")).toBe("2026-03-02");
    expect(normalizeDate("2026-03-02")).toBe("2026-03-02");
    expect(() => normalizeDate("2026-3-2")).toThrow(ValidationError);
    expect(() => normalizeDate("2026-13-01")).toThrow(ValidationError);
  });
});

describe("overlaps", () => {
  it("is symmetric", () => {
    fc.assert(
      fc.property(intervalArb, intervalArb, (a, b) => overlaps(a, b) === overlaps(b, a))
    );
  });

  it("never flags back-to-back intervals", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 100_000 }),
        fc.integer({ min: 1, max: 5_000 }),
        fc.integer({ min: 1, max: 5_000 }),
        (t0, first, second) => {
          const a = { start: t0, end: t0 + first };
          const b = { start: t0 + first, end: t0 + first + second };
          return !overlaps(a, b) && !overlaps(b, a);
        }
      )
    );
  });

  it("always flags an interval against itself", () => {
    fc.assert(fc.property(intervalArb, (a) => overlaps(a, a)));
  });

  it("detects partial overlap", () => {
    const a = createInterval("2026-03-02T09:00", "2026-03-02T09:30");
    const b = createInterval("2026-03-02T09:15", "2026-03-02T09:45");
    expect(overlaps(a, b)).toBe(true);
  });
});

describe("findConflicts", () => {
  const booked = [
    storedAppointment("a-1", "09:00", "09:30"),
    storedAppointment("a-2", "10:00", "10:30"),
    storedAppointment("a-3", "09:00", "09:30", { location: "Room2" }),
    storedAppointment("a-4", "09:00", "09:30", { clinic: "ClinicB" }),
    storedAppointment("a-5", "09:00", "09:30", { status: "CANCELLED" }),
    storedAppointment("a-6", "09:00", "09:30", { status: "COMPLETED" }),
  ];

  it("returns only BOOKED overlaps at the same clinic and location", () => {
    const candidate = createInterval(`${DAY}T09:15`, `${DAY}T10:15`);
    expect(findConflicts(candidate, booked, "ClinicA", "Room1")).toEqual(["a-1", "a-2"]);
  });

  it("allows a slot that starts when another ends", () => {
    const candidate = createInterval(`${DAY}T09:30`, `${DAY}T10:00`);
    expect(findConflicts(candidate, booked, "ClinicA", "Room1")).toEqual([]);
  });

  it("never reports a record as conflicting with itself", () => {
    const candidate = createInterval(`${DAY}T09:00`, `${DAY}T09:30`);
    expect(findConflicts(candidate, booked, "ClinicA", "Room1", "a-1")).toEqual([]);
  });

  it("still reports other records when excluding one", () => {
    const candidate = createInterval(`${DAY}T09:00`, `${DAY}T10:10`);
    expect(findConflicts(candidate, booked, "ClinicA", "Room1", "a-1")).toEqual(["a-2"]);
  });
});
