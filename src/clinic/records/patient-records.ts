import type { PatientRecord, PatientSummary } from "@/clinic/types";
import { patientRecordInputSchema, type PatientRecordInput } from "@/clinic/types/api";
import { ValidationError } from "@/clinic/errors";
import type { LocalStore } from "@/clinic/store/local-store";
import { createChildLogger } from "@/clinic/logger";

const log = createChildLogger("patient-records");

function cleanList(items: readonly string[]): string[] {
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Conditions, allergies and medications per subject. Saving replaces the
 * whole record; the summary joins it with the newest captured reading.
 */
export class PatientRecords {
  constructor(private readonly store: LocalStore) {}

  save(input: PatientRecordInput): PatientRecord {
    const parsed = patientRecordInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ValidationError(`Invalid patient record: ${issues}`);
    }

    const record: PatientRecord = {
      subjectId: parsed.data.subjectId,
      conditions: cleanList(parsed.data.conditions),
      allergies: cleanList(parsed.data.allergies),
      medications: cleanList(parsed.data.medications),
      updatedAt: new Date().toISOString(),
    };
    this.store.upsertPatientRecord(record);
    log.info("Patient record saved", { subjectId: record.subjectId });
    return record;
  }

  /** A subject with no saved record gets empty lists. */
  summary(subjectId: string): PatientSummary {
    if (!subjectId) {
      throw new ValidationError("Subject ID is required");
    }
    const record = this.store.getPatientRecord(subjectId);
    const latestReading = this.store.latestReading(subjectId);
    return {
      subjectId,
      conditions: record?.conditions ?? [],
      allergies: record?.allergies ?? [],
      medications: record?.medications ?? [],
      ...(latestReading ? { latestReading } : {}),
    };
  }
}
