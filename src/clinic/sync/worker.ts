import { randomUUID } from "crypto";
import type { SyncRunSummary } from "@/clinic/types";
import { assertNever } from "@/clinic/types";
import { errorMessage } from "@/clinic/errors";
import { createChildLogger } from "@/clinic/logger";
import type { LocalStore } from "@/clinic/store/local-store";
import type { RemoteApi } from "@/clinic/remote/client";

const log = createChildLogger("reading-sync");

/**
 * Drains unsynced vital readings to the remote service. One run uploads the
 * whole pending batch; only a confirmed upload marks readings as synced, and
 * every other outcome leaves them for the next scheduled run.
 */
export interface ReadingSyncWorkerOptions {
  /** Finished runs older than this are dropped from the ledger. */
  retentionDays?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class ReadingSyncWorker {
  private readonly retentionDays: number;

  constructor(
    private readonly store: LocalStore,
    private readonly remote: RemoteApi,
    options: ReadingSyncWorkerOptions = {},
  ) {
    this.retentionDays = options.retentionDays ?? 30;
  }

  async run(signal?: AbortSignal): Promise<SyncRunSummary> {
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    let uploaded = 0;

    try {
      this.store.createRun(runId);
      const pruned = this.store.pruneRuns(new Date(Date.now() - this.retentionDays * DAY_MS).toISOString());
      if (pruned > 0) log.debug("Pruned old sync runs", { runId, pruned });

      const pending = this.store.unsyncedReadings();
      if (pending.length === 0) {
        log.debug("No readings to sync", { runId });
        return this.finish(runId, startedAt, "noop", 0);
      }

      log.info("Uploading pending readings", { runId, count: pending.length });
      const outcome = await this.remote.uploadReadings(pending, signal);

      switch (outcome.kind) {
        case "success":
          uploaded = this.store.markReadingsSynced(pending.map((r) => r.id));
          log.info("Readings synced", { runId, count: uploaded });
          return this.finish(runId, startedAt, "synced", uploaded);
        case "application-error":
          return this.retry(runId, startedAt, `Remote rejected upload (${outcome.code}): ${outcome.message}`);
        case "transport-error":
          return this.retry(runId, startedAt, `Remote unreachable: ${errorMessage(outcome.cause)}`);
        default:
          return assertNever(outcome);
      }
    } catch (error) {
      return this.retry(runId, startedAt, errorMessage(error), uploaded);
    }
  }

  private retry(runId: string, startedAt: string, message: string, uploaded = 0): SyncRunSummary {
    log.warn("Reading sync will retry on next run", { runId, error: message });
    try {
      return this.finish(runId, startedAt, "retry", uploaded, message);
    } catch (error) {
      // The ledger itself is unavailable; report the run without recording it.
      log.error("Could not record sync run", { runId, error: errorMessage(error) });
      return { runId, startedAt, completedAt: new Date().toISOString(), status: "retry", uploaded, error: message };
    }
  }

  private finish(
    runId: string,
    startedAt: string,
    status: SyncRunSummary["status"],
    uploaded: number,
    error?: string,
  ): SyncRunSummary {
    this.store.completeRun(runId, status, uploaded, error);
    return {
      runId,
      startedAt,
      completedAt: new Date().toISOString(),
      status,
      uploaded,
      ...(error !== undefined ? { error } : {}),
    };
  }
}
