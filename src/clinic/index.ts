import type { ClinicEnv } from "@/clinic/config/env";
import { createChildLogger } from "@/clinic/logger";
import { openLocalStore, type LocalStore } from "@/clinic/store/local-store";
import { RemoteClient, bearerToken, type RemoteApi } from "@/clinic/remote/client";
import { SchedulingRepository } from "@/clinic/scheduling/repository";
import { ReadingSyncWorker } from "@/clinic/sync/worker";
import { PeriodicJobScheduler } from "@/clinic/sync/scheduler";
import { VitalsRecorder } from "@/clinic/vitals/recorder";
import { PatientRecords } from "@/clinic/records/patient-records";

const log = createChildLogger("engine");

export const READING_SYNC_TAG = "reading-sync";

export interface ClinicEngine {
  store: LocalStore;
  remote: RemoteApi;
  scheduling: SchedulingRepository;
  vitals: VitalsRecorder;
  records: PatientRecords;
  worker: ReadingSyncWorker;
  scheduler: PeriodicJobScheduler;
  /** Register the recurring reading sync. False if it was already registered. */
  startPeriodicSync(): boolean;
  close(): Promise<void>;
}

/**
 * Build the engine from configuration. The store is opened here and closed
 * by `close()`; nothing is held in module state.
 */
export function createClinicEngine(env: ClinicEnv, overrides?: { remote?: RemoteApi }): ClinicEngine {
  const remote = overrides?.remote ?? new RemoteClient(
    { baseUrl: env.CLINIC_API_URL, timeoutMs: env.CLINIC_REQUEST_TIMEOUT_MS },
    bearerToken(env.CLINIC_API_TOKEN),
  );
  const store = openLocalStore(env.CLINIC_STORE_PATH);
  const scheduling = new SchedulingRepository({
    store,
    remote,
    currentRole: () => env.CLINIC_ROLE,
  });
  const vitals = new VitalsRecorder(store);
  const records = new PatientRecords(store);
  const worker = new ReadingSyncWorker(store, remote, { retentionDays: env.CLINIC_RUN_RETENTION_DAYS });
  const scheduler = new PeriodicJobScheduler();

  log.info("Engine ready", { store: env.CLINIC_STORE_PATH, role: env.CLINIC_ROLE });

  return {
    store,
    remote,
    scheduling,
    vitals,
    records,
    worker,
    scheduler,
    startPeriodicSync: () =>
      scheduler.register(
        READING_SYNC_TAG,
        Math.round(env.CLINIC_SYNC_INTERVAL_MINUTES * 60_000),
        () => worker.run(),
      ),
    close: async () => {
      await scheduler.stop();
      store.close();
      log.info("Engine closed");
    },
  };
}

export { SchedulingRepository, createAppointment } from "@/clinic/scheduling/repository";
export { findConflicts, overlaps } from "@/clinic/scheduling/conflict-detector";
export { createInterval, type Interval } from "@/clinic/scheduling/interval";
export { LocalStore, openLocalStore } from "@/clinic/store/local-store";
export { RemoteClient, bearerToken } from "@/clinic/remote/client";
export { ReadingSyncWorker } from "@/clinic/sync/worker";
export { PeriodicJobScheduler } from "@/clinic/sync/scheduler";
export { VitalsRecorder } from "@/clinic/vitals/recorder";
export { PatientRecords } from "@/clinic/records/patient-records";
export * from "@/clinic/errors";
export type * from "@/clinic/types";
