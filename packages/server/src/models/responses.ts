import type { InfeasibleReason, PlannedRoute } from "@roadtrip/types";
import type { PlannerComparison } from "@roadtrip/routing";

export interface HealthResponse {
  status: "ok";
  uptime: number;
}

export interface NetworkSummaryResponse {
  cities: number;
  roads: number;
  attractions: number;
  maxExactWaypoints: number;
  distanceUnit: string;
}

export interface ProfileListItem {
  name: string;
  description: string;
}

export interface PlanRouteResponse {
  route: PlannedRoute;
}

export type CompareRoutesResponse = PlannerComparison;

export interface ErrorResponse {
  message: string;
  reason?: InfeasibleReason;
  details?: unknown;
}
