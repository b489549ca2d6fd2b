// src/validators/parse.ts
import type { z } from "zod";
import { ValidationError, type ValidationCode } from "../errors";

/** Parses `input`, turning a schema failure into a ValidationError with `code`. */
export function parseOrReject<S extends z.ZodTypeAny>(schema: S, input: unknown, code: ValidationCode): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(code, `${where}${issue?.message ?? "invalid input"}`);
  }
  return parsed.data;
}
