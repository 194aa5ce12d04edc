import { randomUUID } from "crypto";
import type { VitalReading } from "@/clinic/types";
import { vitalReadingInputSchema, type VitalReadingInput } from "@/clinic/types/api";
import { ValidationError } from "@/clinic/errors";
import { normalizeWallClock } from "@/clinic/scheduling/interval";
import type { LocalStore } from "@/clinic/store/local-store";
import { createChildLogger } from "@/clinic/logger";

const log = createChildLogger("vitals");

const MAX_PAGE_SIZE = 100;

/** Captures readings locally; the sync worker uploads them later. */
export class VitalsRecorder {
  constructor(private readonly store: LocalStore) {}

  record(input: VitalReadingInput): VitalReading {
    const parsed = vitalReadingInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ValidationError(`Invalid vital reading: ${issues}`);
    }

    const reading: VitalReading = {
      ...parsed.data,
      id: randomUUID(),
      capturedAt: normalizeWallClock(parsed.data.capturedAt),
      synced: false,
    };
    this.store.insertReading(reading);
    log.info("Reading captured", { id: reading.id });
    return reading;
  }

  history(subjectId: string, page = 0, pageSize = 20): VitalReading[] {
    if (!Number.isInteger(page) || page < 0) {
      throw new ValidationError(`Invalid page ${page}`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new ValidationError(`Page size must be between 1 and ${MAX_PAGE_SIZE}`);
    }
    return this.store.readingsForSubject(subjectId, page, pageSize);
  }

  latest(subjectId: string): VitalReading | undefined {
    return this.store.latestReading(subjectId);
  }
}
