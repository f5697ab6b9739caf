/**
 * @roadtrip/routing
 *
 * Road trip planning engine: shortest route from a start city to an end city
 * through every city that hosts a requested attraction.
 *
 * Key concepts:
 * - RoadNetwork: undirected weighted multigraph of cities and roads
 * - Shortest-path tree: Dijkstra distances + predecessors from one source
 * - Key point: start, end or waypoint; each gets one Dijkstra run
 * - Planner: exact (all orderings) or heuristic (nearest neighbor)
 *
 * Pipeline:
 * 1. Load roads/attractions CSV -> RoadNetwork + AttractionMapper
 * 2. Resolve attractions -> waypoints
 * 3. Dijkstra from every key point -> ShortestPathTable
 * 4. Pick a visiting order -> assemble segments -> PlannedRoute
 */

// Domain
export * from "./domain/index.js";

// Modules
export * from "./search/index.js";
export * from "./planning/index.js";
export * from "./ingestion/index.js";
export * from "./config/index.js";
