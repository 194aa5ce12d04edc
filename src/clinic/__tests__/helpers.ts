import { vi } from "vitest";
import type { AppointmentInput } from "@/clinic/types/api";
import type { StoredAppointment, SyncOutcome, VitalReading } from "@/clinic/types";
import type { RemoteApi } from "@/clinic/remote/client";

export const DAY = "2026-03-02";

export function success<T>(data: T): SyncOutcome<T> {
  return { kind: "success", data };
}

export function rejected(code: number, message: string): SyncOutcome<never> {
  return { kind: "application-error", code, message };
}

export function unreachable(): SyncOutcome<never> {
  return { kind: "transport-error", cause: new TypeError("fetch failed") };
}

export function createFakeRemote() {
  return {
    fetchDay: vi.fn<RemoteApi["fetchDay"]>().mockResolvedValue(success([])),
    book: vi.fn<RemoteApi["book"]>().mockResolvedValue(success({})),
    update: vi.fn<RemoteApi["update"]>().mockResolvedValue(success(undefined)),
    cancel: vi.fn<RemoteApi["cancel"]>().mockResolvedValue(success(undefined)),
    uploadReadings: vi.fn<RemoteApi["uploadReadings"]>().mockResolvedValue(success(undefined)),
  } satisfies RemoteApi;
}

/** Booking input at ClinicA/Room1 on DAY; times are HH:mm. */
export function slot(start: string, end: string, overrides: Partial<AppointmentInput> = {}): AppointmentInput {
  return {
    subjectId: "p-1",
    subjectName: "Test Patient",
    clinic: "ClinicA",
    location: "Room1",
    startTime: `${DAY}T${start}`,
    endTime: `${DAY}T${end}`,
    ...overrides,
  };
}

export function storedAppointment(
  id: string,
  start: string,
  end: string,
  overrides: Partial<StoredAppointment> = {},
): StoredAppointment {
  return {
    id,
    subjectId: "p-1",
    subjectName: "Test Patient",
    clinic: "ClinicA",
    location: "Room1",
    startTime: `${DAY}T${start}:00`,
    endTime: `${DAY}T${end}:00`,
    status: "BOOKED",
    ...overrides,
  };
}

export function reading(id: string, capturedAt: string, overrides: Partial<VitalReading> = {}): VitalReading {
  return {
    id,
    subjectId: "p-1",
    capturedAt,
    heartRateBpm: 72,
    bodyTemperatureC: 36.8,
    bloodGlucoseMmolL: 5.4,
    synced: false,
    ...overrides,
  };
}
