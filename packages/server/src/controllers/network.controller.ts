import { Router } from "express";
import type { Request, Response } from "express";
import type { NetworkSummaryResponse } from "../models/responses.js";
import type { RoutePlanningService } from "../services/route-planning.service.js";

export function networkController(service: RoutePlanningService): Router {
  const router = Router();

  /** Size of the loaded road network and attraction table */
  router.get("/", (_req: Request, res: Response<NetworkSummaryResponse>) => {
    res.json(service.summary());
  });

  return router;
}
