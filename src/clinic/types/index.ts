export type AppointmentStatus = "BOOKED" | "CANCELLED" | "COMPLETED";

export type UserRole = "PATIENT" | "CLINICIAN" | "RECEPTIONIST" | "ADMIN";

export interface Appointment {
  id?: string;
  subjectId: string;
  subjectName: string;
  clinic: string;
  location: string;
  /** Clinic-local wall-clock time, `YYYY-MM-DDTHH:mm:ss`. */
  startTime: string;
  endTime: string;
  status: AppointmentStatus;
  note?: string;
}

/** An appointment that has been written to the local store. */
export type StoredAppointment = Appointment & { id: string };

export interface VitalReading {
  id: string;
  subjectId: string;
  capturedAt: string;
  heartRateBpm: number;
  bodyTemperatureC: number;
  bloodGlucoseMmolL: number;
  synced: boolean;
}

/** Long-lived clinical facts about a subject, kept beside their readings. */
export interface PatientRecord {
  subjectId: string;
  conditions: string[];
  allergies: string[];
  medications: string[];
  updatedAt: string;
}

export interface PatientSummary {
  subjectId: string;
  conditions: string[];
  allergies: string[];
  medications: string[];
  /** Absent when nothing has been captured yet. */
  latestReading?: VitalReading;
}

export type SyncOutcome<T> =
  | { kind: "success"; data: T }
  | { kind: "application-error"; code: number; message: string }
  | { kind: "transport-error"; cause: unknown };

export type SyncRunStatus = "running" | "noop" | "synced" | "retry";

export interface SyncRunSummary {
  runId: string;
  startedAt: string;
  completedAt: string;
  status: Exclude<SyncRunStatus, "running">;
  uploaded: number;
  error?: string;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
