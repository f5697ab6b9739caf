import { Router } from "express";
import type { Request, Response } from "express";
import type { ProfileListItem } from "../models/responses.js";
import type { RoutePlanningService } from "../services/route-planning.service.js";

export function configController(service: RoutePlanningService): Router {
  const router = Router();

  /** List all available planner profiles */
  router.get("/profiles", (_req: Request, res: Response<ProfileListItem[]>) => {
    res.json(service.profiles());
  });

  return router;
}
