// src/validators/vehicles.ts
import { z } from "zod";

export const VehicleCreate = z.object({
  plate: z.string().trim().min(1).max(20),
  make: z.string().trim().min(1).max(50),
  model: z.string().trim().min(1).max(50),
  typeCategory: z.string().trim().min(1).max(50),
  priceCategory: z.string().trim().min(1).max(50),
  year: z.coerce.number().int().min(1900).max(2100),
  dailyRate: z.coerce.number().positive(),
  mileage: z.coerce.number().int().nonnegative(),
  color: z.string().trim().min(1).max(20),
  fuelType: z.string().trim().min(1).max(20),
  horsepower: z.coerce.number().int().positive(),
  seats: z.coerce.number().int().min(2),
});

export const PlateUpdate = z.object({
  plate: z.string().trim().min(1).max(20),
});

export const VehicleFilter = z.object({
  priceCategory: z.string().optional(),
  typeCategory: z.string().optional(),
  make: z.string().optional(),
  model: z.string().optional(),
});

export type VehicleCreateInput = z.input<typeof VehicleCreate>;
export type VehicleFilterInput = z.infer<typeof VehicleFilter>;
