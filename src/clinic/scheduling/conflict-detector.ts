import type { StoredAppointment } from "@/clinic/types";
import { createInterval, type Interval } from "./interval";

export function overlaps(candidate: Interval, existing: Interval): boolean {
  return candidate.start < existing.end && existing.start < candidate.end;
}

/**
 * Ids of BOOKED appointments at the same clinic and location whose interval
 * overlaps the candidate. `excludeId` is skipped so a record being
 * rescheduled never conflicts with itself.
 */
export function findConflicts(
  candidate: Interval,
  existing: readonly StoredAppointment[],
  clinic: string,
  location: string,
  excludeId?: string,
): string[] {
  const conflicts: string[] = [];
  for (const appointment of existing) {
    if (appointment.status !== "BOOKED") continue;
    if (appointment.clinic !== clinic || appointment.location !== location) continue;
    if (excludeId !== undefined && appointment.id === excludeId) continue;
    if (overlaps(candidate, createInterval(appointment.startTime, appointment.endTime))) {
      conflicts.push(appointment.id);
    }
  }
  return conflicts;
}
