// src/services/rentals.ts
import type { Rental, User, Vehicle } from "../db/schema";
import { NotFoundError, ValidationError } from "../errors";
import type { PersistenceGateway, SnapshotScope } from "../store/gateway";
import { parseRange } from "../utils/dates";
import { isValidEmail } from "../utils/email";
import { nextId } from "../utils/id";
import { priceBreakdown, tierOf, type PriceBreakdown } from "./pricing";

export const GUEST_USER_ID = "GUEST";

export type ReserveInput = {
  plate: string;
  startDate: string;
  endDate: string;
  email?: string;
};

/** Flat record handed to the invoice formatter once a reservation commits. */
export type RentalSummary = {
  rentalId: string;
  vehicleId: string;
  plate: string;
  make: string;
  model: string;
  startDate: string;
  endDate: string;
  days: number;
  dailyRate: number;
  discountPercent: number;
  totalCost: number;
  userId: string;
  userName: string;
};

type Checked = { vehicle: Vehicle; user?: User; price: PriceBreakdown };

export class RentalService {
  constructor(private readonly store: PersistenceGateway) {}

  /**
   * Books an available vehicle. The new active rental and the vehicle's
   * availability flip are saved in one transaction.
   */
  reserve(input: ReserveInput): Promise<RentalSummary> {
    return this.store.transaction(async (scope) => {
      const { vehicle, user, price } = await this.check(scope, input);

      const rentals = await scope.load("rentals");
      const rental: Rental = {
        id: nextId("rentals", rentals),
        vehicleId: vehicle.id,
        userId: user?.id ?? GUEST_USER_ID,
        startDate: price.startDate,
        endDate: price.endDate,
        totalCost: price.total,
        active: true,
      };
      await scope.save("rentals", [...rentals, rental]);

      const vehicles = await scope.load("vehicles");
      await scope.save(
        "vehicles",
        vehicles.map((v) => (v.id === vehicle.id ? { ...v, available: false } : v))
      );

      return {
        rentalId: rental.id,
        vehicleId: vehicle.id,
        plate: vehicle.plate,
        make: vehicle.make,
        model: vehicle.model,
        startDate: rental.startDate,
        endDate: rental.endDate,
        days: price.days,
        dailyRate: vehicle.dailyRate,
        discountPercent: price.discountPercent,
        totalCost: rental.totalCost,
        userId: rental.userId,
        userName: user?.name ?? "Guest",
      };
    });
  }

  /** Price preview: the same checks as `reserve`, nothing written. */
  async quote(input: ReserveInput): Promise<PriceBreakdown> {
    const { price } = await this.check(this.store, input);
    return price;
  }

  /** Ends an active rental and releases its vehicle. */
  complete(rentalId: string): Promise<boolean> {
    return this.store.transaction(async (scope) => {
      const rentals = await scope.load("rentals");
      const rental = rentals.find((r) => r.id === rentalId);
      if (!rental) throw new NotFoundError("rental", `No rental with id ${rentalId}`);
      if (!rental.active) {
        throw new ValidationError("already_completed", `Rental ${rentalId} is already completed`);
      }

      await scope.save(
        "rentals",
        rentals.map((r) => (r.id === rentalId ? { ...r, active: false } : r))
      );

      const vehicles = await scope.load("vehicles");
      if (!vehicles.some((v) => v.id === rental.vehicleId)) {
        console.warn(`[rentals] completing ${rentalId}: vehicle ${rental.vehicleId} no longer exists`);
      }
      await scope.save(
        "vehicles",
        vehicles.map((v) => (v.id === rental.vehicleId ? { ...v, available: true } : v))
      );
      return true;
    });
  }

  /** Every rental of one user, oldest first. Empty when the user never rented. */
  async history(userId: string): Promise<Rental[]> {
    const users = await this.store.load("users");
    if (!users.some((u) => u.id === userId)) {
      throw new NotFoundError("user", `No user with id ${userId}`);
    }
    const rentals = await this.store.load("rentals");
    return rentals.filter((r) => r.userId === userId);
  }

  async historyByEmail(email: string): Promise<Rental[]> {
    const users = await this.store.load("users");
    const user = users.find((u) => u.email === email);
    if (!user) throw new NotFoundError("user", `No user registered with email ${email}`);
    return this.history(user.id);
  }

  async get(rentalId: string): Promise<Rental> {
    const rentals = await this.store.load("rentals");
    const rental = rentals.find((r) => r.id === rentalId);
    if (!rental) throw new NotFoundError("rental", `No rental with id ${rentalId}`);
    return rental;
  }

  list(): Promise<Rental[]> {
    return this.store.load("rentals");
  }

  // Validation order matters: callers map each failure to a distinct response.
  private async check(scope: SnapshotScope, input: ReserveInput): Promise<Checked> {
    const vehicles = await scope.load("vehicles");
    const vehicle = vehicles.find((v) => v.plate === input.plate);
    if (!vehicle) throw new NotFoundError("vehicle", `No vehicle with plate ${input.plate}`);

    const email = input.email ? input.email : undefined;
    if (email !== undefined && !isValidEmail(email)) {
      throw new ValidationError("bad_email", `Invalid email address: ${email}`);
    }

    parseRange(input.startDate, input.endDate);

    if (!vehicle.available) {
      throw new ValidationError("unavailable", `Vehicle ${vehicle.make} ${vehicle.model} (${vehicle.plate}) is not available`);
    }

    let user: User | undefined;
    if (email !== undefined) {
      const users = await scope.load("users");
      user = users.find((u) => u.email === email);
      if (!user) throw new NotFoundError("user", `No user registered with email ${email}`);
    }

    const price = priceBreakdown(input.startDate, input.endDate, vehicle.dailyRate, tierOf(user));
    return { vehicle, user, price };
  }
}
