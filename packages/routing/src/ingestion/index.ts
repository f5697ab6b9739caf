/**
 * Data ingestion module.
 *
 * Builds the planner's inputs from the two CSV files:
 * roads.csv -> RoadNetwork, attractions.csv -> AttractionMapper.
 */

import { readFileSync } from "node:fs";

import { RoadNetwork } from "../domain/road-network.js";
import { MapAttractionMapper } from "./attraction-mapper.js";
import { parseAttractionsCsv, parseRoadsCsv } from "./csv/index.js";

export { MapAttractionMapper } from "./attraction-mapper.js";
export * from "./csv/index.js";

/** Result of loading a roads file */
export interface RoadNetworkLoadResult {
  network: RoadNetwork;
  stats: {
    citiesCount: number;
    roadsCount: number;
    skippedCount: number;
    ingestionTimeMs: number;
  };
}

/** Result of loading an attractions file */
export interface AttractionsLoadResult {
  mapper: MapAttractionMapper;
  stats: {
    attractionsCount: number;
    skippedCount: number;
  };
}

/**
 * Load a road network from a roads CSV file.
 *
 * @param path - Path to the roads file
 */
export function loadRoadNetwork(path: string): RoadNetworkLoadResult {
  const startTime = Date.now();
  console.log(`[ingest] Loading roads from ${path}`);

  const { roads, skipped } = parseRoadsCsv(readFileSync(path, "utf-8"));
  const network = RoadNetwork.fromRoads(roads);

  const stats = {
    citiesCount: network.size,
    roadsCount: network.roadCount,
    skippedCount: skipped.length,
    ingestionTimeMs: Date.now() - startTime,
  };
  console.log(
    `[ingest] ${stats.roadsCount} roads, ${stats.citiesCount} cities, ${stats.skippedCount} lines skipped (${stats.ingestionTimeMs}ms)`,
  );

  return { network, stats };
}

/**
 * Load the attraction -> city table from an attractions CSV file.
 *
 * @param path - Path to the attractions file
 */
export function loadAttractionMapper(path: string): AttractionsLoadResult {
  console.log(`[ingest] Loading attractions from ${path}`);

  const { attractions, skipped } = parseAttractionsCsv(readFileSync(path, "utf-8"));
  const mapper = new MapAttractionMapper(attractions);

  console.log(`[ingest] ${mapper.size} attractions, ${skipped.length} lines skipped`);

  return { mapper, stats: { attractionsCount: mapper.size, skippedCount: skipped.length } };
}
