/**
 * Nearest-neighbor route builder.
 *
 * Greedy alternative to the exact optimizer: from the current city, always
 * travel to the closest waypoint not yet visited, then on to the end. O(k^2)
 * table lookups instead of O(k!), with no guarantee of the shortest route.
 *
 * Ties go to the waypoint that comes first in the waypoint list.
 */

import type { CityId } from "@roadtrip/types";
import type { ShortestPathTable } from "./shortest-path-table.js";
import { directRoute, expandSequence, infeasible, type SequenceResult } from "./sequence.js";

export function planNearestNeighbor(
  table: ShortestPathTable,
  start: CityId,
  end: CityId,
  waypoints: readonly CityId[],
): SequenceResult {
  if (waypoints.length === 0) {
    return directRoute(table, start, end);
  }

  const unvisited = [...waypoints];
  const visitOrder: CityId[] = [];
  let current = start;
  let totalDistance = 0;

  while (unvisited.length > 0) {
    let nearest: CityId | undefined;
    let nearestIndex = -1;
    let nearestDistance = Infinity;

    for (const [index, city] of unvisited.entries()) {
      const distance = table.distance(current, city);
      if (distance < nearestDistance) {
        nearest = city;
        nearestIndex = index;
        nearestDistance = distance;
      }
    }

    if (nearest === undefined) {
      return infeasible(
        "waypoint-unreachable",
        `No remaining waypoint (${unvisited.join(", ")}) is reachable from '${current}'`,
      );
    }

    unvisited.splice(nearestIndex, 1);
    visitOrder.push(nearest);
    totalDistance += nearestDistance;
    current = nearest;
  }

  const finalLeg = table.distance(current, end);
  if (!Number.isFinite(finalLeg)) {
    return infeasible(
      "destination-unreachable",
      `Destination city '${end}' is unreachable from last waypoint '${current}'`,
    );
  }
  totalDistance += finalLeg;

  return expandSequence(table, [start, ...visitOrder, end], totalDistance, visitOrder);
}
