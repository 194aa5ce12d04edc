import type Database from "better-sqlite3";
import { z } from "zod";
import type {
  AppointmentStatus,
  PatientRecord,
  StoredAppointment,
  SyncRunStatus,
  VitalReading,
} from "@/clinic/types";
import { StorageError } from "@/clinic/errors";
import { openDatabase } from "./db";
import type {
  RawAppointmentRow,
  RawPatientRecordRow,
  RawReadingRow,
  RawSyncRunRow,
  SyncRunRecord,
} from "./types";

const APPOINTMENT_STATUSES: readonly AppointmentStatus[] = ["BOOKED", "CANCELLED", "COMPLETED"];
const RUN_STATUSES: readonly SyncRunStatus[] = ["running", "noop", "synced", "retry"];

interface DayFilter {
  date: string;
  clinic: string | null;
  location: string | null;
}

/**
 * Durable home of appointments, vital readings and the sync run ledger.
 * Each method is one synchronous better-sqlite3 call or one transaction, so a
 * reader never observes a half-written record.
 */
export class LocalStore {
  constructor(private readonly db: Database.Database) {}

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // --- Appointments ---

  getAppointment(id: string): StoredAppointment | undefined {
    return this.guard("getAppointment", () => {
      const row = this.db
        .prepare<[string], RawAppointmentRow>("SELECT * FROM appointments WHERE id = ?")
        .get(id);
      return row ? toAppointment(row) : undefined;
    });
  }

  /** Appointments starting on `date` (YYYY-MM-DD), ordered by start time. */
  appointmentsForDay(date: string, clinic?: string, location?: string): StoredAppointment[] {
    return this.guard("appointmentsForDay", () => {
      const rows = this.db
        .prepare<DayFilter, RawAppointmentRow>(`
          SELECT * FROM appointments
          WHERE substr(start_time, 1, 10) = @date
            AND (@clinic IS NULL OR clinic = @clinic)
            AND (@location IS NULL OR location = @location)
          ORDER BY start_time, id
        `)
        .all({ date, clinic: clinic ?? null, location: location ?? null });
      return rows.map(toAppointment);
    });
  }

  bookedAppointments(clinic: string, location: string): StoredAppointment[] {
    return this.guard("bookedAppointments", () => {
      const rows = this.db
        .prepare<[string, string], RawAppointmentRow>(`
          SELECT * FROM appointments
          WHERE clinic = ? AND location = ? AND status = 'BOOKED'
          ORDER BY start_time
        `)
        .all(clinic, location);
      return rows.map(toAppointment);
    });
  }

  insertAppointment(appointment: StoredAppointment): void {
    this.guard("insertAppointment", () => {
      this.db.prepare(`
        INSERT INTO appointments (id, subject_id, subject_name, clinic, location, start_time, end_time, status, note, updated_at)
        VALUES (@id, @subjectId, @subjectName, @clinic, @location, @startTime, @endTime, @status, @note, @updatedAt)
      `).run(toParams(appointment));
    });
  }

  /** Cache refresh: insert or overwrite every appointment in one transaction. */
  upsertAppointments(appointments: readonly StoredAppointment[]): void {
    this.guard("upsertAppointments", () => {
      const statement = this.db.prepare(`
        INSERT INTO appointments (id, subject_id, subject_name, clinic, location, start_time, end_time, status, note, updated_at)
        VALUES (@id, @subjectId, @subjectName, @clinic, @location, @startTime, @endTime, @status, @note, @updatedAt)
        ON CONFLICT(id) DO UPDATE SET
          subject_id = excluded.subject_id,
          subject_name = excluded.subject_name,
          clinic = excluded.clinic,
          location = excluded.location,
          start_time = excluded.start_time,
          end_time = excluded.end_time,
          status = excluded.status,
          note = excluded.note,
          updated_at = excluded.updated_at
      `);
      this.db.transaction((items: readonly StoredAppointment[]) => {
        for (const item of items) statement.run(toParams(item));
      })(appointments);
    });
  }

  updateAppointmentTime(id: string, startTime: string, endTime: string): void {
    this.guard("updateAppointmentTime", () => {
      this.db
        .prepare("UPDATE appointments SET start_time = ?, end_time = ?, updated_at = ? WHERE id = ?")
        .run(startTime, endTime, new Date().toISOString(), id);
    });
  }

  updateAppointmentStatus(id: string, status: AppointmentStatus): void {
    this.guard("updateAppointmentStatus", () => {
      this.db
        .prepare("UPDATE appointments SET status = ?, updated_at = ? WHERE id = ?")
        .run(status, new Date().toISOString(), id);
    });
  }

  // --- Vital readings ---

  insertReading(reading: VitalReading): void {
    this.guard("insertReading", () => {
      this.db.prepare(`
        INSERT INTO vital_readings (id, subject_id, captured_at, heart_rate_bpm, body_temperature_c, blood_glucose_mmol_l, synced, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        reading.id,
        reading.subjectId,
        reading.capturedAt,
        reading.heartRateBpm,
        reading.bodyTemperatureC,
        reading.bloodGlucoseMmolL,
        reading.synced ? 1 : 0,
        new Date().toISOString(),
      );
    });
  }

  unsyncedReadings(): VitalReading[] {
    return this.guard("unsyncedReadings", () => {
      const rows = this.db
        .prepare<[], RawReadingRow>("SELECT * FROM vital_readings WHERE synced = 0 ORDER BY captured_at, id")
        .all();
      return rows.map(toReading);
    });
  }

  /** Flip `synced` on for every id in one transaction. Returns rows changed. */
  markReadingsSynced(ids: readonly string[]): number {
    return this.guard("markReadingsSynced", () => {
      const statement = this.db.prepare<[string]>(
        "UPDATE vital_readings SET synced = 1 WHERE id = ? AND synced = 0"
      );
      return this.db.transaction((batch: readonly string[]) => {
        let changed = 0;
        for (const id of batch) changed += statement.run(id).changes;
        return changed;
      })(ids);
    });
  }

  /** Newest first. */
  readingsForSubject(subjectId: string, page: number, pageSize: number): VitalReading[] {
    return this.guard("readingsForSubject", () => {
      const rows = this.db
        .prepare<[string, number, number], RawReadingRow>(`
          SELECT * FROM vital_readings
          WHERE subject_id = ?
          ORDER BY captured_at DESC, id DESC
          LIMIT ? OFFSET ?
        `)
        .all(subjectId, pageSize, page * pageSize);
      return rows.map(toReading);
    });
  }

  latestReading(subjectId: string): VitalReading | undefined {
    return this.guard("latestReading", () => {
      const row = this.db
        .prepare<[string], RawReadingRow>(`
          SELECT * FROM vital_readings
          WHERE subject_id = ?
          ORDER BY captured_at DESC, id DESC
          LIMIT 1
        `)
        .get(subjectId);
      return row ? toReading(row) : undefined;
    });
  }

  // --- Patient records ---

  getPatientRecord(subjectId: string): PatientRecord | undefined {
    return this.guard("getPatientRecord", () => {
      const row = this.db
        .prepare<[string], RawPatientRecordRow>("SELECT * FROM patient_records WHERE subject_id = ?")
        .get(subjectId);
      return row ? toPatientRecord(row) : undefined;
    });
  }

  upsertPatientRecord(record: PatientRecord): void {
    this.guard("upsertPatientRecord", () => {
      this.db.prepare(`
        INSERT INTO patient_records (subject_id, conditions, allergies, medications, updated_at)
        VALUES (@subjectId, @conditions, @allergies, @medications, @updatedAt)
        ON CONFLICT(subject_id) DO UPDATE SET
          conditions = excluded.conditions,
          allergies = excluded.allergies,
          medications = excluded.medications,
          updated_at = excluded.updated_at
      `).run({
        subjectId: record.subjectId,
        conditions: JSON.stringify(record.conditions),
        allergies: JSON.stringify(record.allergies),
        medications: JSON.stringify(record.medications),
        updatedAt: record.updatedAt,
      });
    });
  }

  // --- Sync runs ---

  createRun(runId: string): void {
    this.guard("createRun", () => {
      this.db
        .prepare("INSERT INTO sync_runs (run_id, started_at, status) VALUES (?, ?, 'running')")
        .run(runId, new Date().toISOString());
    });
  }

  completeRun(
    runId: string,
    status: Exclude<SyncRunStatus, "running">,
    uploaded: number,
    errorMessage?: string,
  ): void {
    this.guard("completeRun", () => {
      this.db.prepare(`
        UPDATE sync_runs
        SET completed_at = ?, status = ?, uploaded = ?, error_message = ?
        WHERE run_id = ?
      `).run(new Date().toISOString(), status, uploaded, errorMessage ?? null, runId);
    });
  }

  /** Delete finished runs completed before `cutoff` (ISO instant). Returns rows removed. */
  pruneRuns(cutoff: string): number {
    return this.guard("pruneRuns", () =>
      this.db
        .prepare<[string]>("DELETE FROM sync_runs WHERE completed_at IS NOT NULL AND completed_at < ?")
        .run(cutoff).changes
    );
  }

  findRun(runId: string): SyncRunRecord | undefined {
    return this.guard("findRun", () => {
      const row = this.db
        .prepare<[string], RawSyncRunRow>("SELECT * FROM sync_runs WHERE run_id = ?")
        .get(runId);
      return row ? toSyncRun(row) : undefined;
    });
  }

  private guard<T>(operation: string, work: () => T): T {
    try {
      return work();
    } catch (error) {
      throw new StorageError(operation, error);
    }
  }
}

export function openLocalStore(location: string): LocalStore {
  try {
    return new LocalStore(openDatabase(location));
  } catch (error) {
    throw new StorageError("open", error);
  }
}

// --- Internal helpers ---

function toParams(appointment: StoredAppointment) {
  return {
    id: appointment.id,
    subjectId: appointment.subjectId,
    subjectName: appointment.subjectName,
    clinic: appointment.clinic,
    location: appointment.location,
    startTime: appointment.startTime,
    endTime: appointment.endTime,
    status: appointment.status,
    note: appointment.note ?? null,
    updatedAt: new Date().toISOString(),
  };
}

function toAppointment(row: RawAppointmentRow): StoredAppointment {
  const status = APPOINTMENT_STATUSES.find((s) => s === row.status);
  if (!status) {
    throw new Error(`Unknown appointment status "${row.status}" on ${row.id}`);
  }
  return {
    id: row.id,
    subjectId: row.subject_id,
    subjectName: row.subject_name,
    clinic: row.clinic,
    location: row.location,
    startTime: row.start_time,
    endTime: row.end_time,
    status,
    note: row.note ?? undefined,
  };
}

function toReading(row: RawReadingRow): VitalReading {
  return {
    id: row.id,
    subjectId: row.subject_id,
    capturedAt: row.captured_at,
    heartRateBpm: row.heart_rate_bpm,
    bodyTemperatureC: row.body_temperature_c,
    bloodGlucoseMmolL: row.blood_glucose_mmol_l,
    synced: row.synced === 1,
  };
}

const storedListSchema = z.array(z.string());

function toPatientRecord(row: RawPatientRecordRow): PatientRecord {
  return {
    subjectId: row.subject_id,
    conditions: storedListSchema.parse(JSON.parse(row.conditions)),
    allergies: storedListSchema.parse(JSON.parse(row.allergies)),
    medications: storedListSchema.parse(JSON.parse(row.medications)),
    updatedAt: row.updated_at,
  };
}

function toSyncRun(row: RawSyncRunRow): SyncRunRecord {
  const status = RUN_STATUSES.find((s) => s === row.status);
  if (!status) {
    throw new Error(`Unknown sync run status "${row.status}" on ${row.run_id}`);
  }
  return {
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    status,
    uploaded: row.uploaded,
    errorMessage: row.error_message,
  };
}
