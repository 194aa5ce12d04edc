// Wire shapes of the scheduling service.
import { z } from "zod";
import { wallClockSchema } from "@/clinic/types/api";

const remoteIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

export const remoteAppointmentSchema = z.object({
  id: remoteIdSchema.nullish(),
  subjectId: remoteIdSchema,
  subjectName: z.string(),
  clinic: z.string(),
  location: z.string(),
  startTime: wallClockSchema,
  endTime: wallClockSchema,
  status: z.enum(["BOOKED", "CANCELLED", "COMPLETED"]),
  note: z.string().nullish(),
});

export const remoteDaySchema = z.array(remoteAppointmentSchema);

export const bookResponseSchema = z
  .object({ id: remoteIdSchema.nullish() })
  .default({});

export const errorBodySchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
});

export type RemoteAppointment = z.infer<typeof remoteAppointmentSchema>;

export interface RemoteAppointmentBody {
  id: string | null;
  subjectId: string;
  subjectName: string;
  clinic: string;
  location: string;
  startTime: string;
  endTime: string;
  status: string;
  note: string | null;
}

export interface RemoteReadingBody {
  id: string;
  subjectId: string;
  capturedAt: string;
  heartRateBpm: number;
  bodyTemperatureC: number;
  bloodGlucoseMmolL: number;
}

export interface BulkUploadBody {
  records: RemoteReadingBody[];
}
