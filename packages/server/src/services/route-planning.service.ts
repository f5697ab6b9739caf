/**
 * Route planning service: owns the loaded network and planner, and turns
 * plan outcomes into API responses.
 */

import type { InfeasibleReason, PlanStrategy } from "@roadtrip/types";
import {
  RoutePlanner,
  comparePlanners,
  listProfiles,
  loadAttractionMapper,
  loadPlannerConfig,
  loadRoadNetwork,
  resolveDataPath,
  type MapAttractionMapper,
  type PlannerConfig,
  type ProfileInfo,
  type RoadNetwork,
} from "@roadtrip/routing";
import type { PlanRouteRequest } from "../models/requests.js";
import type {
  CompareRoutesResponse,
  NetworkSummaryResponse,
  PlanRouteResponse,
} from "../models/responses.js";

export interface RoutePlanningDeps {
  network: RoadNetwork;
  attractions: MapAttractionMapper;
  config: PlannerConfig;
  /** Directory holding `default.json` and `profiles/`; found by walking up when omitted */
  configsRoot?: string;
}

export class RoutePlanningService {
  private readonly planner: RoutePlanner;

  constructor(private readonly deps: RoutePlanningDeps) {
    this.planner = new RoutePlanner(deps.network, deps.attractions, {
      maxExactWaypoints: deps.config.maxExactWaypoints,
    });
  }

  /** Load config (optionally a named profile) and both CSV files from disk */
  static fromConfig(profileName?: string, configsRoot?: string): RoutePlanningService {
    const config = loadPlannerConfig(profileName, configsRoot);
    const { network } = loadRoadNetwork(resolveDataPath(config.data.roads, configsRoot));
    const { mapper } = loadAttractionMapper(resolveDataPath(config.data.attractions, configsRoot));
    return new RoutePlanningService({ network, attractions: mapper, config, configsRoot });
  }

  /**
   * Plan a route with the given strategy.
   * Throws RouteInfeasibleError when no route exists.
   */
  plan(strategy: PlanStrategy, req: PlanRouteRequest): PlanRouteResponse {
    const outcome = this.planner.plan(strategy, req.start, req.end, req.attractions);
    if (outcome.kind === "infeasible") {
      throw new RouteInfeasibleError(outcome.message, outcome.reason);
    }
    return { route: outcome.route };
  }

  /** Run both strategies on the same request */
  compare(req: PlanRouteRequest): CompareRoutesResponse {
    return comparePlanners(this.planner, req);
  }

  /** Named config profiles available to the planner */
  profiles(): ProfileInfo[] {
    return listProfiles(this.deps.configsRoot);
  }

  summary(): NetworkSummaryResponse {
    return {
      cities: this.deps.network.size,
      roads: this.deps.network.roadCount,
      attractions: this.deps.attractions.size,
      maxExactWaypoints: this.planner.maxExactWaypoints,
      distanceUnit: this.deps.config.distanceUnit,
    };
  }
}

export class RouteInfeasibleError extends Error {
  readonly status = 422;

  constructor(
    message: string,
    readonly reason: InfeasibleReason,
  ) {
    super(message);
    this.name = "RouteInfeasibleError";
  }
}
