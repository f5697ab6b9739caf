import { z } from "zod";

const cityName = z.string().trim().min(1, "City name is required");

/** Body of the plan and compare endpoints */
export const planRouteRequestSchema = z.object({
  start: cityName,
  end: cityName,
  /** Attraction names, resolved to waypoint cities; unknown names are skipped */
  attractions: z.array(z.string().trim().min(1)).max(50).default([]),
});

export type PlanRouteRequest = z.infer<typeof planRouteRequestSchema>;
