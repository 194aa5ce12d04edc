import { z } from "zod";

export const wallClockSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?$/, "Expected YYYY-MM-DDTHH:mm[:ss]");

export const appointmentInputSchema = z.object({
  subjectId: z.string().min(1, "Subject ID is required"),
  subjectName: z.string().min(1, "Subject name is required"),
  clinic: z.string().min(1, "Clinic is required"),
  location: z.string().min(1, "Location is required"),
  startTime: wallClockSchema,
  endTime: wallClockSchema,
  note: z.string().max(2000).optional(),
});

export const vitalReadingInputSchema = z.object({
  subjectId: z.string().min(1, "Subject ID is required"),
  capturedAt: wallClockSchema,
  heartRateBpm: z.number().int().min(20).max(250),
  bodyTemperatureC: z.number().min(30).max(45),
  bloodGlucoseMmolL: z.number().min(0.5).max(40),
});

const clinicalListSchema = z.array(z.string().trim().max(200)).max(100).default([]);

export const patientRecordInputSchema = z.object({
  subjectId: z.string().min(1, "Subject ID is required"),
  conditions: clinicalListSchema,
  allergies: clinicalListSchema,
  medications: clinicalListSchema,
});

export const remoteOptionsSchema = z.object({
  baseUrl: z.string().url("Remote base URL must be a URL"),
  timeoutMs: z.number().int().positive().default(10_000),
});

export type AppointmentInput = z.infer<typeof appointmentInputSchema>;
export type VitalReadingInput = z.infer<typeof vitalReadingInputSchema>;
export type PatientRecordInput = z.input<typeof patientRecordInputSchema>;
export type RemoteOptions = z.input<typeof remoteOptionsSchema>;
