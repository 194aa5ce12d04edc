import type { Appointment, VitalReading } from "@/clinic/types";
import { createInterval, normalizeWallClock } from "@/clinic/scheduling/interval";
import type { RemoteAppointment, RemoteAppointmentBody, RemoteReadingBody } from "./types";

/** Throws ValidationError for impossible timestamps or an end not after the start. */
export function mapAppointment(raw: RemoteAppointment): Appointment {
  const startTime = normalizeWallClock(raw.startTime);
  const endTime = normalizeWallClock(raw.endTime);
  createInterval(startTime, endTime);
  return {
    id: raw.id ?? undefined,
    subjectId: raw.subjectId,
    subjectName: raw.subjectName,
    clinic: raw.clinic,
    location: raw.location,
    startTime,
    endTime,
    status: raw.status,
    note: raw.note || undefined,
  };
}

export function toAppointmentBody(appointment: Appointment): RemoteAppointmentBody {
  return {
    id: appointment.id ?? null,
    subjectId: appointment.subjectId,
    subjectName: appointment.subjectName,
    clinic: appointment.clinic,
    location: appointment.location,
    startTime: appointment.startTime,
    endTime: appointment.endTime,
    status: appointment.status,
    note: appointment.note ?? null,
  };
}

export function toReadingBody(reading: VitalReading): RemoteReadingBody {
  return {
    id: reading.id,
    subjectId: reading.subjectId,
    capturedAt: reading.capturedAt,
    heartRateBpm: reading.heartRateBpm,
    bodyTemperatureC: reading.bodyTemperatureC,
    bloodGlucoseMmolL: reading.bloodGlucoseMmolL,
  };
}
