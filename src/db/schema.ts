// src/db/schema.ts
import {
  pgTable, varchar, integer, boolean, doublePrecision, date
} from "drizzle-orm/pg-core";

// ── Fleet ─────────────────────────────────────────────────────────────────────
export const vehicles = pgTable("vehicles", {
  id: varchar("id", { length: 10 }).primaryKey(), // UID001
  plate: varchar("plate", { length: 20 }).notNull().unique(),
  make: varchar("make", { length: 50 }).notNull(),
  model: varchar("model", { length: 50 }).notNull(),
  typeCategory: varchar("type_category", { length: 50 }).notNull(),
  priceCategory: varchar("price_category", { length: 50 }).notNull(),
  year: integer("year").notNull(),
  dailyRate: doublePrecision("daily_rate").notNull(),
  mileage: integer("mileage").notNull(),
  color: varchar("color", { length: 20 }).notNull(),
  fuelType: varchar("fuel_type", { length: 20 }).notNull(),
  horsepower: integer("horsepower").notNull(),
  seats: integer("seats").notNull(),
  available: boolean("available").default(true).notNull()
});

// ── Accounts ──────────────────────────────────────────────────────────────────
export const users = pgTable("users", {
  id: varchar("id", { length: 10 }).primaryKey(), // U001
  name: varchar("name", { length: 100 }).notNull(),
  role: varchar("role", { length: 20, enum: ["admin", "client"] }).notNull(),
  email: varchar("email", { length: 100 }).notNull().unique(),
  passwordHash: varchar("password_hash", { length: 255 }).notNull()
});

// ── Rentals: never deleted, active flips true -> false once ──────────────────
export const rentals = pgTable("rentals", {
  id: varchar("id", { length: 10 }).primaryKey(), // A001
  vehicleId: varchar("vehicle_id", { length: 10 }).notNull(),
  userId: varchar("user_id", { length: 10 }).notNull(), // user id or GUEST
  startDate: date("start_date", { mode: "string" }).notNull(),
  endDate: date("end_date", { mode: "string" }).notNull(),
  totalCost: doublePrecision("total_cost").notNull(),
  active: boolean("active").default(true).notNull()
});

export type Vehicle = typeof vehicles.$inferSelect;
export type User = typeof users.$inferSelect;
export type Rental = typeof rentals.$inferSelect;
export type UserRole = User["role"];
