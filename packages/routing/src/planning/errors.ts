/**
 * Planning errors.
 *
 * Each carries the HTTP status the API should answer with. An unreachable
 * destination is not an error: it is reported as an infeasible outcome.
 */

import type { CityId } from "@roadtrip/types";

/** Start or end city is not in the road network */
export class UnknownCityError extends Error {
  readonly status = 404;

  constructor(
    readonly city: CityId,
    readonly role: "start" | "end",
  ) {
    super(`${role === "start" ? "Start" : "Destination"} city '${city}' not found in the road network`);
    this.name = "UnknownCityError";
  }
}

/** Consecutive path segments do not share their join city */
export class InvalidSegmentJoinError extends Error {
  readonly status = 500;

  constructor(message: string) {
    super(message);
    this.name = "InvalidSegmentJoinError";
  }
}

/** More waypoints than the exact optimizer is allowed to enumerate */
export class WaypointLimitError extends Error {
  readonly status = 400;

  constructor(
    readonly waypointCount: number,
    readonly limit: number,
  ) {
    super(
      `Exact planning supports at most ${limit} waypoints (got ${waypointCount}); use the heuristic planner instead`,
    );
    this.name = "WaypointLimitError";
  }
}
