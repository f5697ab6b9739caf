import { Router } from "express";
import type { Request, Response } from "express";
import type { HealthResponse } from "../models/responses.js";

export function healthController(): Router {
  const router = Router();

  /** Liveness check */
  router.get("/", (_req: Request, res: Response<HealthResponse>) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  return router;
}
