/**
 * Road network graph.
 *
 * An undirected weighted multigraph keyed by opaque city identifiers. Every
 * road is stored in both directions; parallel roads between the same pair of
 * cities are all kept, so shortest-path search sees each of them.
 *
 * Cities only exist once a road references them. The network is built once
 * (usually by the CSV loader) and must not be mutated while a plan is running.
 */

import type { CityId, Neighbor, RoadEdge } from "@roadtrip/types";

const NO_NEIGHBORS: readonly Neighbor[] = Object.freeze([]);

export class RoadNetwork {
  /** city -> adjacency list */
  private adjacency = new Map<CityId, Neighbor[]>();
  private roads = 0;

  /** Build a network from a list of roads */
  static fromRoads(roads: Iterable<RoadEdge>): RoadNetwork {
    const network = new RoadNetwork();
    for (const road of roads) {
      network.addRoad(road.cityA, road.cityB, road.distance);
    }
    return network;
  }

  /**
   * Add an undirected road. The distance is expected to be finite and
   * non-negative; loaders are responsible for rejecting anything else.
   */
  addRoad(cityA: CityId, cityB: CityId, distance: number): void {
    this.neighborList(cityA).push({ city: cityB, distance });
    if (cityA !== cityB) {
      this.neighborList(cityB).push({ city: cityA, distance });
    }
    this.roads++;
  }

  /** Neighbors of a city; empty for unknown cities */
  neighbors(city: CityId): readonly Neighbor[] {
    return this.adjacency.get(city) ?? NO_NEIGHBORS;
  }

  /** All cities with at least one road */
  cities(): Set<CityId> {
    return new Set(this.adjacency.keys());
  }

  hasCity(city: CityId): boolean {
    return this.adjacency.has(city);
  }

  /** Number of cities */
  get size(): number {
    return this.adjacency.size;
  }

  /** Number of undirected roads added */
  get roadCount(): number {
    return this.roads;
  }

  /** Length of the shortest direct road between two cities, if any */
  edgeDistance(cityA: CityId, cityB: CityId): number | undefined {
    let best: number | undefined;
    for (const n of this.neighbors(cityA)) {
      if (n.city === cityB && (best === undefined || n.distance < best)) {
        best = n.distance;
      }
    }
    return best;
  }

  private neighborList(city: CityId): Neighbor[] {
    let list = this.adjacency.get(city);
    if (!list) {
      list = [];
      this.adjacency.set(city, list);
    }
    return list;
  }
}
