/**
 * Single-source shortest paths over the road network.
 *
 * Classic Dijkstra with a binary heap and lazy deletion: when a city's
 * tentative distance improves a new heap entry is pushed, and entries for
 * cities that are already settled are dropped when popped. Distances and
 * predecessors only change on strict improvement, so the first shortest
 * predecessor found for a city is the one that is kept.
 *
 * Road distances must be non-negative. O((V + E) log V).
 */

import type { CityId, ShortestPathTree } from "@roadtrip/types";
import type { RoadNetwork } from "../domain/road-network.js";
import { PriorityQueue } from "./priority-queue.js";

/**
 * Compute the shortest-path tree rooted at `source`.
 *
 * Returns empty maps when the source is not in the network; callers decide
 * whether that is an error.
 */
export function dijkstra(network: RoadNetwork, source: CityId): ShortestPathTree {
  const distances = new Map<CityId, number>();
  const predecessors = new Map<CityId, CityId>();

  if (!network.hasCity(source)) {
    return { source, distances, predecessors };
  }

  for (const city of network.cities()) {
    distances.set(city, Infinity);
  }
  distances.set(source, 0);

  const settled = new Set<CityId>();
  const queue = new PriorityQueue<CityId>();
  queue.enqueue(source, 0);

  while (!queue.isEmpty()) {
    const entry = queue.dequeue();
    if (!entry) break;
    const city = entry.item;

    // Stale entry
    if (settled.has(city)) continue;
    settled.add(city);

    const cityDistance = entry.priority;
    for (const neighbor of network.neighbors(city)) {
      if (settled.has(neighbor.city)) continue;
      const candidate = cityDistance + neighbor.distance;
      if (candidate < (distances.get(neighbor.city) ?? Infinity)) {
        distances.set(neighbor.city, candidate);
        predecessors.set(neighbor.city, city);
        queue.enqueue(neighbor.city, candidate);
      }
    }
  }

  return { source, distances, predecessors };
}

/**
 * Walk the predecessor chain from `target` back to the tree's source.
 *
 * Returns `[source]` when target is the source itself, and undefined when the
 * target is unreachable or the chain does not lead back to the source.
 */
export function reconstructPath(tree: ShortestPathTree, target: CityId): CityId[] | undefined {
  const { source, distances, predecessors } = tree;

  if (target === source) {
    return distances.has(source) ? [source] : undefined;
  }
  if (!predecessors.has(target)) return undefined;

  const path: CityId[] = [target];
  let current = target;
  // A chain longer than the city count means the map is corrupt
  const limit = distances.size;
  while (current !== source) {
    const previous = predecessors.get(current);
    if (previous === undefined || path.length > limit) {
      console.error(`[dijkstra] Predecessor chain from ${target} does not reach ${source}`);
      return undefined;
    }
    path.push(previous);
    current = previous;
  }

  return path.reverse();
}
