import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PeriodicJobScheduler } from "@/clinic/sync/scheduler";
import { ValidationError } from "@/clinic/errors";

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

describe("PeriodicJobScheduler", () => {
  let scheduler: PeriodicJobScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new PeriodicJobScheduler();
  });

  afterEach(async () => {
    await scheduler.stop();
    vi.useRealTimers();
  });

  it("runs a job once per period", async () => {
    const job = vi.fn(async () => undefined);
    scheduler.register("sync", 1000, job);

    await vi.advanceTimersByTimeAsync(999);
    expect(job).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(job).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(2000);
    expect(job).toHaveBeenCalledTimes(3);
  });

  it("keeps the existing registration for a tag", async () => {
    const first = vi.fn(async () => undefined);
    const second = vi.fn(async () => undefined);

    expect(scheduler.register("sync", 1000, first)).toBe(true);
    expect(scheduler.register("sync", 10, second)).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).not.toHaveBeenCalled();
  });

  it("drops triggers while a run is in flight", async () => {
    let finish: () => void = () => {};
    const job = vi.fn(() => new Promise<void>((resolve) => { finish = () => resolve(); }));
    scheduler.register("sync", 60_000, job);

    const running = scheduler.trigger("sync");
    expect(scheduler.isRunning("sync")).toBe(true);
    await expect(scheduler.trigger("sync")).resolves.toBe(false);

    finish();
    await expect(running).resolves.toBe(true);
    expect(scheduler.isRunning("sync")).toBe(false);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it("drops ticks that arrive while the previous run is still going", async () => {
    let finish: () => void = () => {};
    const job = vi.fn(() => new Promise<void>((resolve) => { finish = () => resolve(); }));
    scheduler.register("sync", 1000, job);

    await vi.advanceTimersByTimeAsync(3000);
    expect(job).toHaveBeenCalledTimes(1);

    finish();
    await flushMicrotasks();
    await vi.advanceTimersByTimeAsync(1000);
    expect(job).toHaveBeenCalledTimes(2);
    finish();
  });

  it("refuses periods a timer cannot hold", () => {
    const job = vi.fn(async () => undefined);

    expect(() => scheduler.register("sync", 2 ** 31, job)).toThrow(
      "Period for sync must be an integer between 1 and 2147483647 ms"
    );
    expect(() => scheduler.register("sync", 0, job)).toThrow(ValidationError);
    expect(scheduler.register("sync", 2 ** 31 - 1, job)).toBe(true);
  });

  it("does nothing for an unknown tag", async () => {
    await expect(scheduler.trigger("missing")).resolves.toBe(false);
    expect(scheduler.isRunning("missing")).toBe(false);
  });

  it("keeps ticking after a job fails", async () => {
    const job = vi.fn(async () => {
      throw new Error("boom");
    });
    scheduler.register("sync", 1000, job);

    await vi.advanceTimersByTimeAsync(3000);
    expect(job).toHaveBeenCalledTimes(3);
  });

  it("stops every timer", async () => {
    const job = vi.fn(async () => undefined);
    scheduler.register("sync", 1000, job);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(5000);

    expect(job).not.toHaveBeenCalled();
    expect(scheduler.register("sync", 1000, job)).toBe(true);
  });
});
