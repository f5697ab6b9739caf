/**
 * Shared precompute step for both planners.
 *
 * Runs Dijkstra exactly once per key point (start, end and every waypoint).
 * After that, every pairwise distance and segment lookup is a map read, so
 * evaluating an ordering never triggers another search.
 */

import type { CityId, ShortestPathTree } from "@roadtrip/types";
import type { RoadNetwork } from "../domain/road-network.js";
import { dijkstra, reconstructPath } from "../search/dijkstra.js";

export class ShortestPathTable {
  private constructor(private readonly trees: Map<CityId, ShortestPathTree>) {}

  static build(network: RoadNetwork, keyPoints: Iterable<CityId>): ShortestPathTable {
    const trees = new Map<CityId, ShortestPathTree>();
    for (const point of keyPoints) {
      if (!trees.has(point)) {
        trees.set(point, dijkstra(network, point));
      }
    }
    return new ShortestPathTable(trees);
  }

  /** Number of Dijkstra runs the table was built from */
  get sourcesComputed(): number {
    return this.trees.size;
  }

  /** Tree rooted at a key point, if it was precomputed */
  tree(source: CityId): ShortestPathTree | undefined {
    return this.trees.get(source);
  }

  /** Shortest distance between two key points; Infinity when unknown or unreachable */
  distance(from: CityId, to: CityId): number {
    return this.trees.get(from)?.distances.get(to) ?? Infinity;
  }

  /** Shortest path between two key points, or undefined when unreachable */
  path(from: CityId, to: CityId): CityId[] | undefined {
    const tree = this.trees.get(from);
    if (!tree) return undefined;
    if (!Number.isFinite(tree.distances.get(to) ?? Infinity)) return undefined;
    return reconstructPath(tree, to);
  }
}
