// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { health } from "./routes/health";
import { vehiclesRouter } from "./routes/vehicles";
import { usersRouter } from "./routes/users";
import { rentalsRouter } from "./routes/rentals";
import { errorHandler } from "./middleware/errors";
import type { PersistenceGateway } from "./store/gateway";
import { RentalService } from "./services/rentals";
import { UserService } from "./services/users";
import { VehicleService } from "./services/vehicles";

export function createServices(store: PersistenceGateway) {
  return {
    vehicles: new VehicleService(store),
    users: new UserService(store),
    rentals: new RentalService(store),
  };
}

export type Services = ReturnType<typeof createServices>;

export function createApp({ vehicles, users, rentals }: Services, { logRequests = true } = {}) {
  const app = express();
  app.use(helmet());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: "1mb" }));
  if (logRequests) app.use(morgan("dev"));

  app.use("/health", health);
  app.use("/api/vehicles", vehiclesRouter(vehicles));
  app.use("/api/users", usersRouter(users));
  app.use("/api/rentals", rentalsRouter(rentals, users));

  app.use(errorHandler);
  return app;
}
