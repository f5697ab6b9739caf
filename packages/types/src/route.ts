/**
 * Planned routes - the output of the planning engine.
 */

import type { CityId } from "./network.js";

/** Which algorithm produced a route */
export type PlanStrategy = "optimal" | "heuristic";

/** A complete route from start to end through every waypoint */
export interface PlannedRoute {
  strategy: PlanStrategy;
  /** Every city traversed, start first and end last */
  path: CityId[];
  /** Sum of the road distances along `path` */
  totalDistance: number;
  /** Order in which the waypoints are visited */
  visitOrder: CityId[];
  /** Waypoints that had to be visited, in first-occurrence order */
  waypoints: CityId[];
  /** Attraction names that could not be resolved to a city */
  skippedAttractions: string[];
}

/** Why no route could be produced */
export type InfeasibleReason =
  | "destination-unreachable"
  | "waypoint-unreachable"
  | "no-feasible-ordering";

export interface RouteOutcome {
  kind: "route";
  route: PlannedRoute;
}

export interface InfeasibleOutcome {
  kind: "infeasible";
  strategy: PlanStrategy;
  reason: InfeasibleReason;
  /** Human-readable explanation */
  message: string;
  waypoints: CityId[];
  skippedAttractions: string[];
}

/** Result of a planning call */
export type PlanOutcome = RouteOutcome | InfeasibleOutcome;

/** A planning request, as given by a consumer */
export interface PlanRequest {
  start: CityId;
  end: CityId;
  /** Attraction names; resolved to waypoint cities before planning */
  attractions: string[];
}
