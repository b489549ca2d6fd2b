// src/services/invoice.ts
import { format } from "date-fns";
import { parseCalendarDate } from "../utils/dates";
import { GUEST_USER_ID, type RentalSummary } from "./rentals";

const money = (n: number) => `${n.toFixed(2)} EUR`;

function displayDay(isoDay: string) {
  const d = parseCalendarDate(isoDay);
  if (!d) throw new Error(`Cannot format date ${isoDay}`);
  return format(d, "dd/MM/yyyy");
}

/** Plain-text rental invoice. */
export function formatInvoice(summary: RentalSummary, issuedAt: Date = new Date()): string {
  const lines = [
    "RENTAL INVOICE",
    `Rental ID: ${summary.rentalId}`,
    `Issued: ${format(issuedAt, "dd/MM/yyyy HH:mm")}`,
    "",
    `Customer: ${summary.userName}`,
  ];
  if (summary.userId !== GUEST_USER_ID) lines.push(`Customer ID: ${summary.userId}`);
  lines.push(
    "",
    `Vehicle: ${summary.make} ${summary.model} (plate ${summary.plate})`,
    `Period: ${displayDay(summary.startDate)} - ${displayDay(summary.endDate)} (${summary.days} days)`,
    `Daily rate: ${money(summary.dailyRate)}`,
    `Discount: ${summary.discountPercent}%`,
    "",
    `TOTAL: ${money(summary.totalCost)}`
  );
  return lines.join("\n");
}
