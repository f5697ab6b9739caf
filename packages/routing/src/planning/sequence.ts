/**
 * Helpers shared by the exact and heuristic planners: pricing a visiting
 * sequence from the precomputed table and turning it into a full path.
 */

import type { CityId, InfeasibleReason } from "@roadtrip/types";
import type { ShortestPathTable } from "./shortest-path-table.js";
import { assemblePath } from "./path-assembler.js";

/** What a planner produces before the facade attaches request details */
export type SequenceResult =
  | {
      kind: "route";
      path: CityId[];
      totalDistance: number;
      visitOrder: CityId[];
    }
  | {
      kind: "infeasible";
      reason: InfeasibleReason;
      message: string;
    };

export function infeasible(reason: InfeasibleReason, message: string): SequenceResult {
  return { kind: "infeasible", reason, message };
}

/** Total distance of visiting `sequence` in order; Infinity if any leg is unreachable */
export function sequenceDistance(table: ShortestPathTable, sequence: readonly CityId[]): number {
  let total = 0;
  for (let i = 0; i + 1 < sequence.length; i++) {
    const leg = table.distance(sequence[i]!, sequence[i + 1]!);
    if (!Number.isFinite(leg)) return Infinity;
    total += leg;
  }
  return total;
}

/**
 * Expand a priced visiting sequence into the full city path.
 *
 * Every leg is known to be reachable at this point; a missing segment is
 * passed to the assembler as empty so it fails loudly.
 */
export function expandSequence(
  table: ShortestPathTable,
  sequence: readonly CityId[],
  totalDistance: number,
  visitOrder: CityId[],
): SequenceResult {
  const segments: CityId[][] = [];
  for (let i = 0; i + 1 < sequence.length; i++) {
    segments.push(table.path(sequence[i]!, sequence[i + 1]!) ?? []);
  }
  return { kind: "route", path: assemblePath(segments), totalDistance, visitOrder };
}

/** Shortest start -> end path, used when there is nothing to visit on the way */
export function directRoute(table: ShortestPathTable, start: CityId, end: CityId): SequenceResult {
  const distance = table.distance(start, end);
  const path = table.path(start, end);
  if (!Number.isFinite(distance) || !path) {
    return infeasible(
      "destination-unreachable",
      `Destination city '${end}' is unreachable from start city '${start}'`,
    );
  }
  return { kind: "route", path, totalDistance: distance, visitOrder: [] };
}
