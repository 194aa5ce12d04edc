import { randomUUID } from "crypto";
import type { Appointment, StoredAppointment, SyncOutcome, UserRole } from "@/clinic/types";
import { assertNever } from "@/clinic/types";
import { appointmentInputSchema, type AppointmentInput } from "@/clinic/types/api";
import {
  ApplicationError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  OperationCancelledError,
  StorageError,
  TransportError,
  ValidationError,
} from "@/clinic/errors";
import { assertCanManageAppointments } from "@/clinic/access";
import { createChildLogger } from "@/clinic/logger";
import type { LocalStore } from "@/clinic/store/local-store";
import type { RemoteApi } from "@/clinic/remote/client";
import { findConflicts } from "./conflict-detector";
import { createInterval, normalizeDate, normalizeWallClock } from "./interval";
import { KeyedLock, slotKey } from "./keyed-lock";

const log = createChildLogger("scheduling");

export interface SchedulingRepositoryDeps {
  store: LocalStore;
  remote: RemoteApi;
  /** Who is acting. Mutations are refused for roles that may not manage appointments. */
  currentRole: () => UserRole | Promise<UserRole>;
  lock?: KeyedLock;
}

/** Validate booking input and build a BOOKED appointment with normalised times. */
export function createAppointment(input: AppointmentInput): Appointment {
  const parsed = appointmentInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid appointment: ${issues}`);
  }
  const startTime = normalizeWallClock(parsed.data.startTime);
  const endTime = normalizeWallClock(parsed.data.endTime);
  createInterval(startTime, endTime);
  return {
    subjectId: parsed.data.subjectId,
    subjectName: parsed.data.subjectName,
    clinic: parsed.data.clinic,
    location: parsed.data.location,
    startTime,
    endTime,
    status: "BOOKED",
    note: parsed.data.note,
  };
}

/**
 * Reads go to the remote service first and fall back to the local cache.
 * Mutations need a remote acknowledgement before anything is written locally,
 * and run their conflict check and write under a lock on (clinic, location).
 */
export class SchedulingRepository {
  private store: LocalStore;
  private remote: RemoteApi;
  private currentRole: () => UserRole | Promise<UserRole>;
  private lock: KeyedLock;

  constructor(deps: SchedulingRepositoryDeps) {
    this.store = deps.store;
    this.remote = deps.remote;
    this.currentRole = deps.currentRole;
    this.lock = deps.lock ?? new KeyedLock();
  }

  /**
   * Appointments for a day. Remote results refresh the cache; any remote
   * failure falls back to whatever the cache holds, possibly nothing.
   */
  async queryDay(date: string, clinicFilter?: string, locationFilter?: string, signal?: AbortSignal): Promise<Appointment[]> {
    const day = normalizeDate(date);
    const outcome = await this.remote.fetchDay(day, clinicFilter, locationFilter, signal);

    switch (outcome.kind) {
      case "success":
        this.refreshCache(outcome.data);
        return outcome.data;
      case "application-error":
        log.info("Remote rejected day query, serving cache", { day, status: outcome.code });
        return this.store.appointmentsForDay(day, clinicFilter, locationFilter);
      case "transport-error":
        log.info("Remote unreachable, serving cache", { day });
        return this.store.appointmentsForDay(day, clinicFilter, locationFilter);
      default:
        return assertNever(outcome);
    }
  }

  async book(input: AppointmentInput, signal?: AbortSignal): Promise<StoredAppointment> {
    await this.ensureCanManage();
    const appointment = createAppointment(input);
    const interval = createInterval(appointment.startTime, appointment.endTime);
    const { clinic, location } = appointment;

    return this.lock.runExclusive(slotKey(clinic, location), async () => {
      throwIfCancelled(signal, "book");
      const conflicts = findConflicts(interval, this.store.bookedAppointments(clinic, location), clinic, location);
      if (conflicts.length > 0) {
        log.info("Booking refused, slot taken", { clinic, location, conflicts });
        throw new ConflictError(conflicts);
      }

      const receipt = unwrap(await this.remote.book(appointment, signal), "book");
      const stored: StoredAppointment = { ...appointment, id: receipt.id ?? randomUUID() };
      this.store.insertAppointment(stored);
      log.info("Appointment booked", { id: stored.id, clinic, location });
      return stored;
    });
  }

  async reschedule(id: string, newStart: string, newEnd: string, signal?: AbortSignal): Promise<StoredAppointment> {
    await this.ensureCanManage();
    const startTime = normalizeWallClock(newStart);
    const endTime = normalizeWallClock(newEnd);
    const interval = createInterval(startTime, endTime);
    const { clinic, location } = this.requireBooked(id, "reschedule");

    return this.lock.runExclusive(slotKey(clinic, location), async () => {
      throwIfCancelled(signal, "reschedule");
      // Re-read under the lock: another caller may have changed it meanwhile.
      const current = this.requireBooked(id, "reschedule");
      const conflicts = findConflicts(interval, this.store.bookedAppointments(clinic, location), clinic, location, id);
      if (conflicts.length > 0) {
        log.info("Reschedule refused, slot taken", { id, clinic, location, conflicts });
        throw new ConflictError(conflicts);
      }

      const updated: StoredAppointment = { ...current, startTime, endTime };
      unwrap(await this.remote.update(id, updated, signal), "reschedule");
      this.store.updateAppointmentTime(id, startTime, endTime);
      log.info("Appointment rescheduled", { id, clinic, location });
      return updated;
    });
  }

  async cancel(id: string, signal?: AbortSignal): Promise<StoredAppointment> {
    await this.ensureCanManage();
    const { clinic, location } = this.requireBooked(id, "cancel");

    return this.lock.runExclusive(slotKey(clinic, location), async () => {
      throwIfCancelled(signal, "cancel");
      const current = this.requireBooked(id, "cancel");
      unwrap(await this.remote.cancel(id, signal), "cancel");
      this.store.updateAppointmentStatus(id, "CANCELLED");
      log.info("Appointment cancelled", { id, clinic, location });
      return { ...current, status: "CANCELLED" };
    });
  }

  async complete(id: string, signal?: AbortSignal): Promise<StoredAppointment> {
    await this.ensureCanManage();
    const { clinic, location } = this.requireBooked(id, "complete");

    return this.lock.runExclusive(slotKey(clinic, location), async () => {
      throwIfCancelled(signal, "complete");
      const current = this.requireBooked(id, "complete");
      const updated: StoredAppointment = { ...current, status: "COMPLETED" };
      unwrap(await this.remote.update(id, updated, signal), "complete");
      this.store.updateAppointmentStatus(id, "COMPLETED");
      log.info("Appointment completed", { id, clinic, location });
      return updated;
    });
  }

  private async ensureCanManage(): Promise<void> {
    assertCanManageAppointments(await this.currentRole());
  }

  private requireBooked(id: string, action: string): StoredAppointment {
    const appointment = this.store.getAppointment(id);
    if (!appointment) {
      throw new NotFoundError("Appointment", id);
    }
    if (appointment.status !== "BOOKED") {
      throw new InvalidTransitionError(`Cannot ${action} appointment ${id}: it is ${appointment.status}`);
    }
    return appointment;
  }

  private refreshCache(appointments: readonly Appointment[]): void {
    // A cached row with an unusable interval would break every later conflict
    // check at its clinic and location.
    const cacheable = appointments.filter(
      (a): a is StoredAppointment => a.id !== undefined && hasUsableInterval(a),
    );
    if (cacheable.length < appointments.length) {
      log.warn("Remote returned appointments without ids or valid times; not cached", {
        skipped: appointments.length - cacheable.length,
      });
    }
    try {
      this.store.upsertAppointments(cacheable);
    } catch (error) {
      // The fetched data is still correct; only the cache is stale.
      if (!(error instanceof StorageError)) throw error;
      log.error("Cache refresh failed", { error: error.message });
    }
  }
}

function unwrap<T>(outcome: SyncOutcome<T>, action: string): T {
  switch (outcome.kind) {
    case "success":
      return outcome.data;
    case "application-error":
      throw new ApplicationError(outcome.code, outcome.message);
    case "transport-error":
      throw new TransportError(
        `Scheduling service unreachable during ${action}; nothing was changed, try again`,
        outcome.cause,
      );
    default:
      return assertNever(outcome);
  }
}

function hasUsableInterval(appointment: Appointment): boolean {
  try {
    createInterval(appointment.startTime, appointment.endTime);
    return true;
  } catch (error) {
    if (error instanceof ValidationError) return false;
    throw error;
  }
}

function throwIfCancelled(signal: AbortSignal | undefined, action: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(action);
  }
}
