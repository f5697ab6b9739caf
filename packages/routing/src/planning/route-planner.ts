/**
 * Route planner facade.
 *
 * Validates the request, resolves attractions to waypoints, runs the shared
 * Dijkstra precompute and hands the table to one of the two planners.
 *
 * Every call returns its result explicitly. The last-distance accessors exist
 * for reporting code that reads the distance after the call; they are reset
 * at the start of each call of their strategy.
 */

import type {
  AttractionMapper,
  CityId,
  PlanOutcome,
  PlanStrategy,
} from "@roadtrip/types";
import type { RoadNetwork } from "../domain/road-network.js";
import { UnknownCityError, WaypointLimitError } from "./errors.js";
import { collectKeyPoints, resolveWaypoints } from "./key-points.js";
import { ShortestPathTable } from "./shortest-path-table.js";
import { planExact } from "./exact-optimizer.js";
import { planNearestNeighbor } from "./nearest-neighbor.js";
import type { SequenceResult } from "./sequence.js";

/** Options for the route planner */
export interface RoutePlannerOptions {
  /** Largest waypoint count the exact optimizer will enumerate (k! orderings) */
  maxExactWaypoints?: number;
}

/** Default planner options */
export const DEFAULT_PLANNER_OPTIONS: Required<RoutePlannerOptions> = {
  maxExactWaypoints: 9,
};

type Solver = (
  table: ShortestPathTable,
  start: CityId,
  end: CityId,
  waypoints: readonly CityId[],
) => SequenceResult;

const SOLVERS: Record<PlanStrategy, Solver> = {
  optimal: planExact,
  heuristic: planNearestNeighbor,
};

export class RoutePlanner {
  private readonly options: Required<RoutePlannerOptions>;
  private lastDistance: Partial<Record<PlanStrategy, number>> = {};

  constructor(
    private readonly network: RoadNetwork,
    private readonly attractions: AttractionMapper,
    options?: RoutePlannerOptions,
  ) {
    this.options = { ...DEFAULT_PLANNER_OPTIONS, ...options };
  }

  get maxExactWaypoints(): number {
    return this.options.maxExactWaypoints;
  }

  /** Shortest route through every waypoint (exhaustive search) */
  planOptimal(start: CityId, end: CityId, attractionNames: readonly string[]): PlanOutcome {
    return this.plan("optimal", start, end, attractionNames);
  }

  /** Greedy nearest-neighbor route through every waypoint */
  planHeuristic(start: CityId, end: CityId, attractionNames: readonly string[]): PlanOutcome {
    return this.plan("heuristic", start, end, attractionNames);
  }

  plan(
    strategy: PlanStrategy,
    start: CityId,
    end: CityId,
    attractionNames: readonly string[],
  ): PlanOutcome {
    delete this.lastDistance[strategy];

    console.log(
      `[planner] ${strategy}: ${start} -> ${end} via ${attractionNames.length > 0 ? attractionNames.join(", ") : "none"}`,
    );

    if (!this.network.hasCity(start)) throw new UnknownCityError(start, "start");
    if (!this.network.hasCity(end)) throw new UnknownCityError(end, "end");

    const { waypoints, skippedAttractions } = resolveWaypoints(
      start,
      end,
      attractionNames,
      this.attractions,
    );

    if (strategy === "optimal" && waypoints.length > this.options.maxExactWaypoints) {
      throw new WaypointLimitError(waypoints.length, this.options.maxExactWaypoints);
    }

    const keyPoints = collectKeyPoints(start, end, waypoints);
    const table = ShortestPathTable.build(this.network, keyPoints);
    console.log(
      `[planner] Precomputed ${table.sourcesComputed} shortest-path trees for waypoints: ${waypoints.length > 0 ? waypoints.join(", ") : "none"}`,
    );

    const result = SOLVERS[strategy](table, start, end, waypoints);

    if (result.kind === "infeasible") {
      console.warn(`[planner] ${strategy}: ${result.message}`);
      return {
        kind: "infeasible",
        strategy,
        reason: result.reason,
        message: result.message,
        waypoints,
        skippedAttractions,
      };
    }

    this.lastDistance[strategy] = result.totalDistance;
    console.log(
      `[planner] ${strategy}: ${result.totalDistance.toFixed(1)} over ${result.path.length} cities, visit order: ${result.visitOrder.join(" -> ") || "direct"}`,
    );

    return {
      kind: "route",
      route: {
        strategy,
        path: result.path,
        totalDistance: result.totalDistance,
        visitOrder: result.visitOrder,
        waypoints,
        skippedAttractions,
      },
    };
  }

  /** Distance of the last feasible optimal plan, if the last call produced one */
  getLastOptimalDistance(): number | undefined {
    return this.lastDistance.optimal;
  }

  /** Distance of the last feasible heuristic plan, if the last call produced one */
  getLastHeuristicDistance(): number | undefined {
    return this.lastDistance.heuristic;
  }
}
