import type { Appointment, SyncOutcome, VitalReading } from "@/clinic/types";
import { remoteOptionsSchema, type RemoteOptions } from "@/clinic/types/api";
import { CredentialsUnavailableError, OperationCancelledError, errorMessage } from "@/clinic/errors";
import { createChildLogger } from "@/clinic/logger";
import { batchKey } from "@/clinic/sync/hash";
import { bookResponseSchema, errorBodySchema, remoteDaySchema } from "./types";
import { mapAppointment, toAppointmentBody, toReadingBody } from "./mappers";

const log = createChildLogger("remote-client");

/** Resolves the `Authorization` header value for each request. */
export type AuthHeaderProvider = () => Promise<string>;

export interface BookReceipt {
  id?: string;
}

/** Everything the engine needs from the scheduling service. */
export interface RemoteApi {
  fetchDay(date: string, clinic?: string, location?: string, signal?: AbortSignal): Promise<SyncOutcome<Appointment[]>>;
  book(appointment: Appointment, signal?: AbortSignal): Promise<SyncOutcome<BookReceipt>>;
  update(id: string, appointment: Appointment, signal?: AbortSignal): Promise<SyncOutcome<void>>;
  cancel(id: string, signal?: AbortSignal): Promise<SyncOutcome<void>>;
  uploadReadings(readings: readonly VitalReading[], signal?: AbortSignal): Promise<SyncOutcome<void>>;
}

interface RequestSpec<T> {
  method: "GET" | "POST" | "PUT" | "DELETE";
  path: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  parse: (body: unknown) => T;
}

export function bearerToken(token: string): AuthHeaderProvider {
  return async () => {
    if (!token) {
      throw new CredentialsUnavailableError("No API token configured for the scheduling service");
    }
    return `Bearer ${token}`;
  };
}

export class RemoteClient implements RemoteApi {
  private baseUrl: string;
  private timeoutMs: number;
  private authorize: AuthHeaderProvider;

  constructor(options: RemoteOptions, authorize: AuthHeaderProvider) {
    const parsed = remoteOptionsSchema.parse(options);
    this.baseUrl = parsed.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = parsed.timeoutMs;
    this.authorize = authorize;
  }

  async fetchDay(date: string, clinic?: string, location?: string, signal?: AbortSignal): Promise<SyncOutcome<Appointment[]>> {
    return this.send({
      method: "GET",
      path: "/appointments",
      query: { date, clinic, location },
      signal,
      parse: (body) => remoteDaySchema.parse(body).map(mapAppointment),
    });
  }

  async book(appointment: Appointment, signal?: AbortSignal): Promise<SyncOutcome<BookReceipt>> {
    return this.send({
      method: "POST",
      path: "/appointments",
      body: toAppointmentBody(appointment),
      signal,
      parse: (body) => {
        const receipt = bookResponseSchema.parse(body);
        return receipt.id ? { id: receipt.id } : {};
      },
    });
  }

  async update(id: string, appointment: Appointment, signal?: AbortSignal): Promise<SyncOutcome<void>> {
    return this.send({
      method: "PUT",
      path: `/appointments/${encodeURIComponent(id)}`,
      body: toAppointmentBody({ ...appointment, id }),
      signal,
      parse: () => undefined,
    });
  }

  async cancel(id: string, signal?: AbortSignal): Promise<SyncOutcome<void>> {
    return this.send({
      method: "DELETE",
      path: `/appointments/${encodeURIComponent(id)}`,
      signal,
      parse: () => undefined,
    });
  }

  /** Upload is idempotent on the service side, keyed by reading id. */
  async uploadReadings(readings: readonly VitalReading[], signal?: AbortSignal): Promise<SyncOutcome<void>> {
    return this.send({
      method: "POST",
      path: "/pending-records/bulk",
      body: { records: readings.map(toReadingBody) },
      headers: { "Idempotency-Key": batchKey(readings.map((r) => r.id)) },
      signal,
      parse: () => undefined,
    });
  }

  private async authorizationHeader(): Promise<string> {
    try {
      return await this.authorize();
    } catch (error) {
      if (error instanceof CredentialsUnavailableError) throw error;
      throw new CredentialsUnavailableError(
        `Authorization header unavailable: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async send<T>(spec: RequestSpec<T>): Promise<SyncOutcome<T>> {
    const operation = `${spec.method} ${spec.path}`;
    if (spec.signal?.aborted) {
      throw new OperationCancelledError(operation);
    }

    const authorization = await this.authorizationHeader();

    const url = new URL(`${this.baseUrl}${spec.path}`);
    if (spec.query) {
      Object.entries(spec.query).forEach(([k, v]) => {
        if (v !== undefined && v !== "") url.searchParams.set(k, v);
      });
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = spec.signal ? AbortSignal.any([spec.signal, timeout]) : timeout;

    log.debug("Remote request", { operation });

    let status: number;
    let statusText: string;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(url, {
        method: spec.method,
        headers: {
          Authorization: authorization,
          Accept: "application/json",
          ...(spec.body !== undefined ? { "Content-Type": "application/json" } : {}),
          ...spec.headers,
        },
        body: spec.body !== undefined ? JSON.stringify(spec.body) : undefined,
        signal,
      });
      ({ status, statusText, ok } = response);
      text = await response.text();
    } catch (error) {
      if (spec.signal?.aborted) {
        throw new OperationCancelledError(operation);
      }
      log.warn("Remote call got no answer", { operation, error: errorMessage(error) });
      return { kind: "transport-error", cause: error };
    }

    if (!ok) {
      const message = readErrorMessage(text) ?? (statusText || `HTTP ${status}`);
      log.warn("Remote rejected request", { operation, status });
      return { kind: "application-error", code: status, message };
    }

    try {
      const body: unknown = text.trim() === "" ? undefined : JSON.parse(text);
      return { kind: "success", data: spec.parse(body) };
    } catch (error) {
      log.warn("Remote answered with an unreadable body", { operation, error: errorMessage(error) });
      return { kind: "transport-error", cause: error };
    }
  }
}

function readErrorMessage(text: string): string | undefined {
  if (!text.trim()) return undefined;
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data.message ?? parsed.data.error;
  } catch {
    // Not JSON; use the raw body.
  }
  return text.slice(0, 200);
}
