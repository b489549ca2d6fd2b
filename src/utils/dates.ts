// src/utils/dates.ts
import { differenceInCalendarDays, isValid, parse } from "date-fns";
import { ValidationError } from "../errors";

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export type DateRange = { startDate: string; endDate: string; days: number };

/** Parse a `YYYY-MM-DD` calendar date; null when the text is not a real day. */
export function parseCalendarDate(text: string): Date | null {
  if (!ISO_DAY.test(text)) return null;
  const d = parse(text, "yyyy-MM-dd", new Date(2000, 0, 1));
  return isValid(d) ? d : null;
}

/**
 * Validates a rental window and counts its calendar days.
 * Throws bad_date_format before inverted_range.
 */
export function parseRange(startDate: string, endDate: string): DateRange {
  const start = parseCalendarDate(startDate);
  const end = parseCalendarDate(endDate);
  if (!start || !end) {
    throw new ValidationError("bad_date_format", "Dates must be in YYYY-MM-DD format");
  }
  const days = differenceInCalendarDays(end, start);
  if (days <= 0) {
    throw new ValidationError("inverted_range", "Start date must be before end date");
  }
  return { startDate, endDate, days };
}
