/**
 * Waypoint resolution.
 *
 * Turns the requested attraction names into the list of cities the route has
 * to pass through. Unknown attractions are skipped with a warning rather than
 * failing the request, and cities that are already the start or the end are
 * implicitly visited.
 */

import type { AttractionMapper, CityId } from "@roadtrip/types";

export interface ResolvedWaypoints {
  /** Intermediate cities in first-occurrence order, without duplicates */
  waypoints: CityId[];
  /** Attraction names the mapper did not know */
  skippedAttractions: string[];
}

export function resolveWaypoints(
  start: CityId,
  end: CityId,
  attractionNames: readonly string[],
  mapper: AttractionMapper,
): ResolvedWaypoints {
  const waypoints: CityId[] = [];
  const seen = new Set<CityId>([start, end]);
  const skippedAttractions: string[] = [];

  for (const name of attractionNames) {
    const city = mapper.resolve(name);
    if (city === undefined) {
      console.warn(`[key-points] Attraction '${name}' not found. Skipping.`);
      skippedAttractions.push(name);
      continue;
    }
    if (seen.has(city)) continue;
    seen.add(city);
    waypoints.push(city);
  }

  return { waypoints, skippedAttractions };
}

/** Start, end and waypoints, each once */
export function collectKeyPoints(start: CityId, end: CityId, waypoints: readonly CityId[]): CityId[] {
  return [...new Set([start, end, ...waypoints])];
}
