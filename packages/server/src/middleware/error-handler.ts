import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { RouteInfeasibleError } from "../services/route-planning.service.js";
import type { ErrorResponse } from "../models/responses.js";

function statusOf(err: Error): number {
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response<ErrorResponse>,
  next: NextFunction,
): void {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.issues,
    });
    return;
  }

  if (err instanceof RouteInfeasibleError) {
    console.warn(`[error] ${err.message}`);
    res.status(err.status).json({ message: err.message, reason: err.reason });
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    res.status(statusOf(err)).json({ message: err.message });
    return;
  }

  next(err);
}
