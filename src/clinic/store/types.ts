import type { SyncRunStatus } from "@/clinic/types";

export interface SyncRunRecord {
  runId: string;
  startedAt: string;
  completedAt: string | null;
  status: SyncRunStatus;
  uploaded: number;
  errorMessage: string | null;
}

// Row shapes as better-sqlite3 returns them.

export interface RawAppointmentRow {
  id: string;
  subject_id: string;
  subject_name: string;
  clinic: string;
  location: string;
  start_time: string;
  end_time: string;
  status: string;
  note: string | null;
  updated_at: string;
}

export interface RawReadingRow {
  id: string;
  subject_id: string;
  captured_at: string;
  heart_rate_bpm: number;
  body_temperature_c: number;
  blood_glucose_mmol_l: number;
  synced: number;
  created_at: string;
}

export interface RawPatientRecordRow {
  subject_id: string;
  conditions: string;
  allergies: string;
  medications: string;
  updated_at: string;
}

export interface RawSyncRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  status: string;
  uploaded: number;
  error_message: string | null;
}
