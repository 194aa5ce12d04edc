import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { VitalsRecorder } from "@/clinic/vitals/recorder";
import { LocalStore, openLocalStore } from "@/clinic/store/local-store";
import { ValidationError } from "@/clinic/errors";
import type { VitalReadingInput } from "@/clinic/types/api";

function input(capturedAt: string, overrides: Partial<VitalReadingInput> = {}): VitalReadingInput {
  return {
    subjectId: "p-1",
    capturedAt,
    heartRateBpm: 64,
    bodyTemperatureC: 37.1,
    bloodGlucoseMmolL: 6.2,
    ...overrides,
  };
}

describe("VitalsRecorder", () => {
  let store: LocalStore;
  let recorder: VitalsRecorder;

  beforeEach(() => {
    store = openLocalStore(":memory:");
    recorder = new VitalsRecorder(store);
  });

  afterEach(() => {
    store.close();
  });

  it("stores a reading as pending upload", () => {
    const recorded = recorder.record(input("2026-03-02T08:15"));

    expect(recorded).toMatchObject({
      subjectId: "p-1",
      capturedAt: "2026-03-02T08:15:00",
      heartRateBpm: 64,
      synced: false,
    });
    expect(store.unsyncedReadings()).toEqual([recorded]);
  });

  it("rejects readings outside plausible ranges", () => {
    expect(() => recorder.record(input("2026-03-02T08:15", { heartRateBpm: 400 }))).toThrow(ValidationError);
    expect(() => recorder.record(input("2026-03-02T08:15", { heartRateBpm: 72.5 }))).toThrow(
      /^Invalid vital reading: heartRateBpm:/
    );
    expect(() => recorder.record(input("yesterday"))).toThrow(ValidationError);
    expect(() => recorder.record(input("2026-02-30T08:15"))).toThrow('Invalid timestamp "2026-02-30T08:15"');
    expect(store.unsyncedReadings()).toEqual([]);
  });

  it("pages a subject's history newest first", () => {
    recorder.record(input("2026-03-02T08:00"));
    recorder.record(input("2026-03-02T09:00"));
    recorder.record(input("2026-03-02T10:00"));
    recorder.record(input("2026-03-02T11:00", { subjectId: "p-2" }));

    expect(recorder.history("p-1", 0, 2).map((r) => r.capturedAt)).toEqual([
      "2026-03-02T10:00:00",
      "2026-03-02T09:00:00",
    ]);
    expect(recorder.history("p-1", 1, 2).map((r) => r.capturedAt)).toEqual(["2026-03-02T08:00:00"]);
    expect(recorder.history("p-1", 2, 2)).toEqual([]);
    expect(recorder.latest("p-2")?.capturedAt).toBe("2026-03-02T11:00:00");
    expect(recorder.latest("p-3")).toBeUndefined();
  });

  it("validates paging arguments", () => {
    expect(() => recorder.history("p-1", -1)).toThrow(ValidationError);
    expect(() => recorder.history("p-1", 0, 0)).toThrow("Page size must be between 1 and 100");
    expect(() => recorder.history("p-1", 0, 101)).toThrow(ValidationError);
  });
});
