/**
 * Road network types.
 *
 * Cities are opaque string identifiers: the engine never parses them, it only
 * compares them for identity. The network is an undirected multigraph, so the
 * same pair of cities may be joined by several roads of different length.
 */

/** Opaque city identifier (e.g. "Austin TX") */
export type CityId = string;

/** An undirected road between two cities, as read from a roads file */
export interface RoadEdge {
  cityA: CityId;
  cityB: CityId;
  /** Non-negative, finite distance */
  distance: number;
}

/** One adjacency entry: the city at the other end and the road length */
export interface Neighbor {
  city: CityId;
  distance: number;
}

/**
 * Single-source shortest-path tree.
 *
 * `distances` has an entry for every city in the network (Infinity when
 * unreachable). `predecessors` only has entries for reachable cities other
 * than the source.
 */
export interface ShortestPathTree {
  source: CityId;
  distances: Map<CityId, number>;
  predecessors: Map<CityId, CityId>;
}

/** Maps an attraction name to the city it is located in */
export interface AttractionMapper {
  resolve(attractionName: string): CityId | undefined;
}
