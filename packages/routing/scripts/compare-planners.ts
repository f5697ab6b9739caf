/**
 * Compare the exact and heuristic planners on a few cross-country trips.
 * Usage: npx tsx scripts/compare-planners.ts [profile]
 */
import type { PlanRequest } from "@roadtrip/types";
import {
  RoutePlanner,
  comparePlanners,
  formatComparison,
  loadAttractionMapper,
  loadPlannerConfig,
  loadRoadNetwork,
  resolveDataPath,
} from "../src/index.js";

const TRIPS: PlanRequest[] = [
  { start: "Houston TX", end: "Philadelphia PA", attractions: [] },
  { start: "Philadelphia PA", end: "San Antonio TX", attractions: ["Hollywood Sign"] },
  { start: "San Jose CA", end: "Phoenix AZ", attractions: ["Liberty Bell", "Millennium Park"] },
  {
    start: "New York NY",
    end: "San Diego CA",
    attractions: ["Millennium Park", "NASA Space Center", "The Alamo"],
  },
];

function main(): void {
  const profile = process.argv[2];
  const config = loadPlannerConfig(profile);
  console.log(`Profile: ${profile ?? "default"} (exact planning up to ${config.maxExactWaypoints} waypoints)`);

  const { network, stats } = loadRoadNetwork(resolveDataPath(config.data.roads));
  const { mapper } = loadAttractionMapper(resolveDataPath(config.data.attractions));
  if (stats.citiesCount === 0 || mapper.size === 0) {
    console.error("No roads or attractions loaded. Exiting.");
    process.exitCode = 1;
    return;
  }

  const planner = new RoutePlanner(network, mapper, {
    maxExactWaypoints: config.maxExactWaypoints,
  });

  for (const trip of TRIPS) {
    const comparison = comparePlanners(planner, trip);
    console.log("\n==================================================");
    console.log(formatComparison(comparison, config.distanceUnit));
    console.log("==================================================");
  }
}

main();
