import { config } from "dotenv";
import { runInteractiveSession } from "./interactive";
import { createClinicEngine, READING_SYNC_TAG, type ClinicEngine } from "@/clinic";
import { getEnv } from "@/clinic/config/env";
import { createChildLogger, logger } from "@/clinic/logger";

config({ path: ".env.local" });

const log = createChildLogger("cli");

const args = process.argv.slice(2);
const syncOnce = args.includes("--sync-once");
const daemon = args.includes("--daemon");

let engine: ClinicEngine | null = null;

async function runDaemon(active: ClinicEngine): Promise<void> {
  active.startPeriodicSync();
  // First run straight away rather than waiting a full period.
  await active.scheduler.trigger(READING_SYNC_TAG);
  log.info("Periodic reading sync running; Ctrl+C to stop");

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
}

async function main() {
  const env = getEnv();
  // The logger is built before .env.local is read.
  logger.level = env.CLINIC_LOG_LEVEL;
  engine = createClinicEngine(env);

  if (syncOnce) {
    // Headless: one upload pass, summary on stdout
    const summary = await engine.worker.run();
    console.log(JSON.stringify(summary, null, 2));
    if (summary.status === "retry") process.exitCode = 2;
  } else if (daemon) {
    await runDaemon(engine);
  } else {
    await runInteractiveSession(engine);
  }

  await engine.close();
}

main().catch(async (err: unknown) => {
  console.error("Clinic sync failed:", err instanceof Error ? err.message : err);
  await engine?.close();
  process.exit(1);
});
