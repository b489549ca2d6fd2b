// src/errors.ts

export type ValidationCode =
  | "bad_email"
  | "bad_date_format"
  | "inverted_range"
  | "bad_rate"
  | "unavailable"
  | "already_completed"
  | "invalid_vehicle"
  | "duplicate_plate"
  | "vehicle_rented"
  | "user_renting"
  | "invalid_user"
  | "duplicate_email"
  | "bad_credentials";

export type EntityName = "vehicle" | "user" | "rental";

export type ErrorCode = ValidationCode | `${EntityName}_not_found` | "storage_error";

/** Base for every failure the services report to their caller. */
export abstract class ServiceError extends Error {
  abstract readonly code: ErrorCode;
}

/** Bad input or a business rule rejection. Never retried. */
export class ValidationError extends ServiceError {
  readonly name = "ValidationError";

  constructor(readonly code: ValidationCode, message: string) {
    super(message);
  }
}

export class NotFoundError extends ServiceError {
  readonly name = "NotFoundError";
  readonly code: `${EntityName}_not_found`;

  constructor(readonly entity: EntityName, message: string) {
    super(message);
    this.code = `${entity}_not_found`;
  }
}

/** I/O or backing store failure; `cause` keeps the underlying error. */
export class StorageError extends ServiceError {
  readonly name = "StorageError";
  readonly code = "storage_error";

  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
