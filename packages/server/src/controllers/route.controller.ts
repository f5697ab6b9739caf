import { Router } from "express";
import type { Request, Response } from "express";
import type { PlanStrategy } from "@roadtrip/types";
import { planRouteRequestSchema } from "../models/requests.js";
import type { CompareRoutesResponse, PlanRouteResponse } from "../models/responses.js";
import type { RoutePlanningService } from "../services/route-planning.service.js";

/**
 * Route endpoints under `api/routes`.
 *
 * Bodies are validated here; a ZodError or planning error propagates to the
 * error handler, which picks the status.
 */
export function routeController(service: RoutePlanningService): Router {
  const router = Router();

  const plan =
    (strategy: PlanStrategy) =>
    (req: Request, res: Response<PlanRouteResponse>): void => {
      res.json(service.plan(strategy, planRouteRequestSchema.parse(req.body)));
    };

  /** Shortest route visiting every attraction (exhaustive search) */
  router.post("/optimal", plan("optimal"));

  /** Nearest-neighbor route visiting every attraction */
  router.post("/heuristic", plan("heuristic"));

  /** Run both planners and report their outcomes and timings */
  router.post("/compare", (req: Request, res: Response<CompareRoutesResponse>) => {
    res.json(service.compare(planRouteRequestSchema.parse(req.body)));
  });

  return router;
}
