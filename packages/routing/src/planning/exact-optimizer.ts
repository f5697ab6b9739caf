/**
 * Exact route optimizer.
 *
 * Tries every ordering of the waypoints and keeps the shortest feasible one.
 * All distances come from the precomputed table, so each ordering costs O(k)
 * and the whole search O(k! * k) on top of k+2 Dijkstra runs. The factorial
 * term is why callers cap the waypoint count.
 *
 * Orderings are enumerated lazily in swap/backtrack order from the input
 * order; a later ordering only replaces the best one when it is strictly
 * shorter, so ties resolve to the first ordering enumerated.
 */

import type { CityId } from "@roadtrip/types";
import type { ShortestPathTable } from "./shortest-path-table.js";
import { factorial, permutations } from "./permutations.js";
import {
  directRoute,
  expandSequence,
  infeasible,
  sequenceDistance,
  type SequenceResult,
} from "./sequence.js";

export function planExact(
  table: ShortestPathTable,
  start: CityId,
  end: CityId,
  waypoints: readonly CityId[],
): SequenceResult {
  if (waypoints.length === 0) {
    return directRoute(table, start, end);
  }

  let bestOrdering: CityId[] | undefined;
  let bestDistance = Infinity;
  let unreachable = 0;

  for (const ordering of permutations(waypoints)) {
    const total = sequenceDistance(table, [start, ...ordering, end]);
    if (!Number.isFinite(total)) {
      unreachable++;
      continue;
    }
    if (total < bestDistance) {
      bestDistance = total;
      bestOrdering = ordering;
    }
  }

  console.log(
    `[exact] Evaluated ${factorial(waypoints.length)} orderings of ${waypoints.length} waypoints, ${unreachable} infeasible`,
  );

  if (!bestOrdering) {
    return infeasible(
      "no-feasible-ordering",
      "Could not find a valid route visiting all specified attractions",
    );
  }

  return expandSequence(table, [start, ...bestOrdering, end], bestDistance, bestOrdering);
}
