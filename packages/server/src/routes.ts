import { Router } from "express";
import { configController } from "./controllers/config.controller.js";
import { healthController } from "./controllers/health.controller.js";
import { networkController } from "./controllers/network.controller.js";
import { routeController } from "./controllers/route.controller.js";
import type { RoutePlanningService } from "./services/route-planning.service.js";

/** Mount every controller; thrown errors reach the error handler */
export function createRouter(service: RoutePlanningService): Router {
  const router = Router();

  router.use("/health", healthController());
  router.use("/api/network", networkController(service));
  router.use("/api/routes", routeController(service));
  router.use("/api/config", configController(service));

  return router;
}
