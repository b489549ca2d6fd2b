// src/middleware/errors.ts
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { NotFoundError, ServiceError, StorageError, ValidationError, messageOf, type ErrorCode } from "../errors";

const CONFLICTS: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "unavailable",
  "already_completed",
  "duplicate_plate",
  "duplicate_email",
  "vehicle_rented",
  "user_renting",
]);

/** HTTP status for a service failure. */
export function toHttpStatus(err: ServiceError): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof StorageError) return 503;
  if (err instanceof ValidationError) return CONFLICTS.has(err.code) ? 409 : 400;
  return 500;
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ServiceError) {
    if (err instanceof StorageError) console.error(err);
    return res.status(toHttpStatus(err)).json({ error: err.code, detail: err.message });
  }
  if (err instanceof ZodError) {
    return res.status(400).json({ error: "invalid_request", detail: err.issues });
  }
  console.error(err);
  res.status(500).json({ error: "internal_error", detail: messageOf(err) });
};
