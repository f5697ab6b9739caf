import express from "express";
import cors from "cors";
import { createRouter } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";
import type { RoutePlanningService } from "./services/route-planning.service.js";

export function createApp(service: RoutePlanningService): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use(createRouter(service));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
