// src/routes/vehicles.ts
import { Router } from "express";
import { requireIdentity } from "../middleware/identity";
import type { VehicleService } from "../services/vehicles";
import { PlateUpdate, VehicleCreate, VehicleFilter } from "../validators/vehicles";

export function vehiclesRouter(vehicles: VehicleService) {
  const router = Router();

  // available vehicles, narrowed by price/type category, make and model
  router.get("/", async (req, res, next) => {
    try {
      const filter = VehicleFilter.parse(req.query);
      res.json(await vehicles.list(filter));
    } catch (e) { next(e); }
  });

  router.get("/categories/price", async (_req, res, next) => {
    try {
      res.json(await vehicles.priceCategories());
    } catch (e) { next(e); }
  });

  router.get("/categories/type", async (_req, res, next) => {
    try {
      res.json(await vehicles.typeCategories());
    } catch (e) { next(e); }
  });

  router.get("/:plate", async (req, res, next) => {
    try {
      res.json(await vehicles.getByPlate(req.params.plate));
    } catch (e) { next(e); }
  });

  // register
  router.post("/", requireIdentity("admin"), async (req, res, next) => {
    try {
      const input = VehicleCreate.parse(req.body ?? {});
      res.status(201).json(await vehicles.register(input));
    } catch (e) { next(e); }
  });

  // change plate
  router.patch("/:id/plate", requireIdentity("admin"), async (req, res, next) => {
    try {
      const { plate } = PlateUpdate.parse(req.body ?? {});
      res.json(await vehicles.updatePlate(req.params.id, plate));
    } catch (e) { next(e); }
  });

  router.delete("/:id", requireIdentity("admin"), async (req, res, next) => {
    try {
      res.json(await vehicles.remove(req.params.id));
    } catch (e) { next(e); }
  });

  return router;
}
