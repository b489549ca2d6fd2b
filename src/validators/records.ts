// src/validators/records.ts
// Shapes of stored rows, checked when a snapshot is read back from disk.
import { z } from "zod";
import type { EntityKind, EntityMap } from "../store/gateway";

export const VehicleRecord = z.object({
  id: z.string(),
  plate: z.string(),
  make: z.string(),
  model: z.string(),
  typeCategory: z.string(),
  priceCategory: z.string(),
  year: z.number().int(),
  dailyRate: z.number(),
  mileage: z.number(),
  color: z.string(),
  fuelType: z.string(),
  horsepower: z.number(),
  seats: z.number().int(),
  available: z.boolean(),
});

export const UserRecord = z.object({
  id: z.string(),
  name: z.string(),
  role: z.enum(["admin", "client"]),
  email: z.string(),
  passwordHash: z.string(),
});

export const RentalRecord = z.object({
  id: z.string(),
  vehicleId: z.string(),
  userId: z.string(),
  startDate: z.string(),
  endDate: z.string(),
  totalCost: z.number(),
  active: z.boolean(),
});

export const RecordSchemas: { [K in EntityKind]: z.ZodType<EntityMap[K]> } = {
  vehicles: VehicleRecord,
  users: UserRecord,
  rentals: RentalRecord,
};
