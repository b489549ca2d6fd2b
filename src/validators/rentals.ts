// src/validators/rentals.ts
import { z } from "zod";

// Date format and email syntax are left to the rental service, which
// reports each with its own error code.
export const RentalRequest = z.object({
  plate: z.string().trim().min(1),
  startDate: z.string(),
  endDate: z.string(),
  email: z.string().trim().optional(),
});

export type RentalRequestInput = z.infer<typeof RentalRequest>;
