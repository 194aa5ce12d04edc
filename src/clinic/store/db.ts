import Database from "better-sqlite3";
import path from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS appointments (
  id TEXT PRIMARY KEY,
  subject_id TEXT NOT NULL,
  subject_name TEXT NOT NULL,
  clinic TEXT NOT NULL,
  location TEXT NOT NULL,
  start_time TEXT NOT NULL,
  end_time TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('BOOKED', 'CANCELLED', 'COMPLETED')),
  note TEXT,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_appointments_start ON appointments(start_time);
CREATE INDEX IF NOT EXISTS idx_appointments_slot ON appointments(clinic, location, status);

CREATE TABLE IF NOT EXISTS vital_readings (
  id TEXT PRIMARY KEY,
  subject_id TEXT NOT NULL,
  captured_at TEXT NOT NULL,
  heart_rate_bpm INTEGER NOT NULL,
  body_temperature_c REAL NOT NULL,
  blood_glucose_mmol_l REAL NOT NULL,
  synced INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_readings_synced ON vital_readings(synced);
CREATE INDEX IF NOT EXISTS idx_readings_subject ON vital_readings(subject_id, captured_at);

-- List columns hold JSON arrays of strings.
CREATE TABLE IF NOT EXISTS patient_records (
  subject_id TEXT PRIMARY KEY,
  conditions TEXT NOT NULL DEFAULT '[]',
  allergies TEXT NOT NULL DEFAULT '[]',
  medications TEXT NOT NULL DEFAULT '[]',
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  status TEXT NOT NULL,
  uploaded INTEGER NOT NULL DEFAULT 0,
  error_message TEXT
);
`;

export const IN_MEMORY = ":memory:";

/** Open (creating if needed) the store database and apply the schema. */
export function openDatabase(location: string): Database.Database {
  const db = location === IN_MEMORY ? new Database(IN_MEMORY) : new Database(path.resolve(location));
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);
  return db;
}
