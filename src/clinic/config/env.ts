import { z } from "zod";

const envSchema = z.object({
  CLINIC_API_URL: z.string().url("CLINIC_API_URL must be a URL"),
  // Supplied by the credential store; the engine refuses to start without it.
  CLINIC_API_TOKEN: z.string().min(1, "CLINIC_API_TOKEN is required"),

  CLINIC_STORE_PATH: z
    .string()
    .default("./clinic_store.db"),

  CLINIC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),

  CLINIC_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(10_000),
  // setInterval caps out at 2^31-1 ms (about 24.8 days).
  CLINIC_SYNC_INTERVAL_MINUTES: z.coerce
    .number()
    .positive()
    .max(35_791, "CLINIC_SYNC_INTERVAL_MINUTES must be at most 35791")
    .default(30),
  CLINIC_RUN_RETENTION_DAYS: z.coerce
    .number()
    .int()
    .positive()
    .default(30),

  CLINIC_ROLE: z
    .enum(["PATIENT", "CLINICIAN", "RECEPTIONIST", "ADMIN"])
    .default("RECEPTIONIST"),
});

export type ClinicEnv = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): ClinicEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Clinic environment validation failed:\n${issues}\n\nCopy .env.example to .env.local and fill in the values.`
    );
  }
  return result.data;
}

let _env: ClinicEnv | null = null;

export function getEnv(): ClinicEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
