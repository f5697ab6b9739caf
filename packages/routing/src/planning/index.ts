/**
 * Route planning module.
 *
 * Request -> waypoints -> shortest-path table -> exact or greedy ordering
 * -> assembled route.
 */

export {
  RoutePlanner,
  DEFAULT_PLANNER_OPTIONS,
  type RoutePlannerOptions,
} from "./route-planner.js";
export { resolveWaypoints, collectKeyPoints, type ResolvedWaypoints } from "./key-points.js";
export { ShortestPathTable } from "./shortest-path-table.js";
export { planExact } from "./exact-optimizer.js";
export { planNearestNeighbor } from "./nearest-neighbor.js";
export { assemblePath } from "./path-assembler.js";
export { permutations, factorial } from "./permutations.js";
export { type SequenceResult } from "./sequence.js";
export {
  comparePlanners,
  formatComparison,
  type PlannerComparison,
  type StrategyRun,
} from "./comparison.js";
export { UnknownCityError, InvalidSegmentJoinError, WaypointLimitError } from "./errors.js";
