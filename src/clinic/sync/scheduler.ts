import { ValidationError, errorMessage } from "@/clinic/errors";
import { createChildLogger } from "@/clinic/logger";

const log = createChildLogger("scheduler");

// Larger delays make Node fall back to 1 ms.
const MAX_PERIOD_MS = 2 ** 31 - 1;

export type PeriodicJob = () => Promise<unknown>;

interface Registration {
  job: PeriodicJob;
  timer: NodeJS.Timeout;
  running: Promise<void> | null;
}

/**
 * Recurring jobs with a keep-existing policy: a tag is registered once, and
 * a tick that finds the tag's previous run still in flight is dropped rather
 * than queued.
 */
export class PeriodicJobScheduler {
  private registrations = new Map<string, Registration>();

  /** Returns false when the tag is already registered; the existing job is kept. */
  register(tag: string, periodMs: number, job: PeriodicJob): boolean {
    if (!Number.isInteger(periodMs) || periodMs < 1 || periodMs > MAX_PERIOD_MS) {
      throw new ValidationError(`Period for ${tag} must be an integer between 1 and ${MAX_PERIOD_MS} ms`);
    }
    if (this.registrations.has(tag)) {
      log.debug("Job already registered, keeping existing", { tag });
      return false;
    }
    const timer = setInterval(() => {
      this.trigger(tag).catch((error: unknown) => {
        log.error("Scheduled trigger failed", { tag, error: errorMessage(error) });
      });
    }, periodMs);
    this.registrations.set(tag, { job, timer, running: null });
    log.info("Job registered", { tag, periodMs });
    return true;
  }

  /**
   * Run the tag's job now. Resolves false without running when the tag is
   * unknown or a run is already in flight.
   */
  async trigger(tag: string): Promise<boolean> {
    const registration = this.registrations.get(tag);
    if (!registration) return false;
    if (registration.running) {
      log.debug("Job still running, trigger dropped", { tag });
      return false;
    }

    const run = registration.job().then(
      () => undefined,
      (error: unknown) => {
        log.error("Job failed", { tag, error: errorMessage(error) });
      },
    );
    registration.running = run;
    try {
      await run;
    } finally {
      registration.running = null;
    }
    return true;
  }

  isRunning(tag: string): boolean {
    return this.registrations.get(tag)?.running != null;
  }

  /** Cancel every timer and wait for runs already in flight. */
  async stop(): Promise<void> {
    const inFlight: Promise<void>[] = [];
    for (const [tag, registration] of this.registrations) {
      clearInterval(registration.timer);
      if (registration.running) inFlight.push(registration.running);
      log.debug("Job unregistered", { tag });
    }
    this.registrations.clear();
    await Promise.all(inFlight);
  }
}
