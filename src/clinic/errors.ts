export type ClinicSyncErrorCode =
  | "VALIDATION"
  | "CONFLICT"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "FORBIDDEN"
  | "APPLICATION"
  | "TRANSPORT"
  | "STORAGE"
  | "CREDENTIALS"
  | "CANCELLED";

/** Base class for every error the engine raises on purpose. */
export abstract class ClinicSyncError extends Error {
  abstract readonly code: ClinicSyncErrorCode;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ClinicSyncError {
  readonly code = "VALIDATION";
}

export class ConflictError extends ClinicSyncError {
  readonly code = "CONFLICT";

  constructor(readonly conflictingIds: string[]) {
    super(`Appointment conflicts with ${conflictingIds.length} booked appointment(s)`);
  }
}

export class NotFoundError extends ClinicSyncError {
  readonly code = "NOT_FOUND";

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
  }
}

export class InvalidTransitionError extends ClinicSyncError {
  readonly code = "INVALID_TRANSITION";
}

export class ForbiddenError extends ClinicSyncError {
  readonly code = "FORBIDDEN";
}

/** The remote service answered and rejected the request. */
export class ApplicationError extends ClinicSyncError {
  readonly code = "APPLICATION";

  constructor(readonly status: number, message: string) {
    super(`Remote rejected request (${status}): ${message}`);
  }
}

/** No definitive answer from the remote service. */
export class TransportError extends ClinicSyncError {
  readonly code = "TRANSPORT";
  override readonly retryable = true;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export class StorageError extends ClinicSyncError {
  readonly code = "STORAGE";

  constructor(operation: string, cause: unknown) {
    super(`Local store failed during ${operation}: ${errorMessage(cause)}`, { cause });
  }
}

export class CredentialsUnavailableError extends ClinicSyncError {
  readonly code = "CREDENTIALS";
}

export class OperationCancelledError extends ClinicSyncError {
  readonly code = "CANCELLED";

  constructor(operation: string) {
    super(`${operation} was cancelled`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
