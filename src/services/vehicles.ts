// src/services/vehicles.ts
import type { Vehicle } from "../db/schema";
import { NotFoundError, ValidationError } from "../errors";
import type { PersistenceGateway } from "../store/gateway";
import { nextId } from "../utils/id";
import { parseOrReject } from "../validators/parse";
import { PlateUpdate, VehicleCreate, type VehicleCreateInput, type VehicleFilterInput } from "../validators/vehicles";

function distinctSorted(values: string[]) {
  return [...new Set(values)].sort((a, b) => a.localeCompare(b));
}

export class VehicleService {
  constructor(private readonly store: PersistenceGateway) {}

  /** Available vehicles matching every filter given. */
  async list(filter: VehicleFilterInput = {}): Promise<Vehicle[]> {
    const vehicles = await this.store.load("vehicles");
    return vehicles.filter((v) =>
      v.available &&
      (filter.priceCategory === undefined || v.priceCategory === filter.priceCategory) &&
      (filter.typeCategory === undefined || v.typeCategory === filter.typeCategory) &&
      (filter.make === undefined || v.make === filter.make) &&
      (filter.model === undefined || v.model === filter.model)
    );
  }

  async priceCategories(): Promise<string[]> {
    const vehicles = await this.store.load("vehicles");
    return distinctSorted(vehicles.map((v) => v.priceCategory));
  }

  async typeCategories(): Promise<string[]> {
    const vehicles = await this.store.load("vehicles");
    return distinctSorted(vehicles.map((v) => v.typeCategory));
  }

  async getByPlate(plate: string): Promise<Vehicle> {
    const vehicles = await this.store.load("vehicles");
    const vehicle = vehicles.find((v) => v.plate === plate);
    if (!vehicle) throw new NotFoundError("vehicle", `No vehicle with plate ${plate}`);
    return vehicle;
  }

  async register(input: VehicleCreateInput): Promise<Vehicle> {
    const data = parseOrReject(VehicleCreate, input, "invalid_vehicle");
    return this.store.transaction(async (scope) => {
      const vehicles = await scope.load("vehicles");
      if (vehicles.some((v) => v.plate === data.plate)) {
        throw new ValidationError("duplicate_plate", `A vehicle with plate ${data.plate} already exists`);
      }
      const rentals = await scope.load("rentals");
      const vehicle: Vehicle = {
        id: nextId("vehicles", vehicles, rentals.map((r) => r.vehicleId)),
        ...data,
        available: true,
      };
      await scope.save("vehicles", [...vehicles, vehicle]);
      return vehicle;
    });
  }

  async updatePlate(id: string, newPlate: string): Promise<Vehicle> {
    const { plate } = parseOrReject(PlateUpdate, { plate: newPlate }, "invalid_vehicle");
    return this.store.transaction(async (scope) => {
      const vehicles = await scope.load("vehicles");
      const vehicle = vehicles.find((v) => v.id === id);
      if (!vehicle) throw new NotFoundError("vehicle", `No vehicle with id ${id}`);
      if (vehicle.plate === plate) return vehicle;
      if (vehicles.some((v) => v.plate === plate && v.id !== id)) {
        throw new ValidationError("duplicate_plate", `A vehicle with plate ${plate} already exists`);
      }
      const updated = { ...vehicle, plate };
      await scope.save("vehicles", vehicles.map((v) => (v.id === id ? updated : v)));
      return updated;
    });
  }

  /** Deletes a vehicle; one that is out on rental is refused. */
  remove(id: string): Promise<{ deletedId: string }> {
    return this.store.transaction(async (scope) => {
      const vehicles = await scope.load("vehicles");
      const vehicle = vehicles.find((v) => v.id === id);
      if (!vehicle) throw new NotFoundError("vehicle", `No vehicle with id ${id}`);
      if (!vehicle.available) {
        throw new ValidationError("vehicle_rented", `Vehicle ${id} is out on rental and cannot be deleted`);
      }
      await scope.save("vehicles", vehicles.filter((v) => v.id !== id));
      return { deletedId: id };
    });
  }
}
