/**
 * Roads file parser.
 *
 * Format: one road per line, `cityA,cityB,distance`, no header. Malformed
 * lines are skipped with a warning; the rest of the file still loads.
 */

import type { RoadEdge } from "@roadtrip/types";
import { readCsvRecords, type SkippedRecord } from "./records.js";

export interface RoadsParseResult {
  roads: RoadEdge[];
  skipped: SkippedRecord[];
}

export function parseRoadsCsv(text: string): RoadsParseResult {
  const roads: RoadEdge[] = [];
  const skipped: SkippedRecord[] = [];

  for (const { line, fields } of readCsvRecords(text)) {
    const [cityA, cityB, rawDistance] = fields;
    if (fields.length !== 3 || cityA === undefined || cityB === undefined || rawDistance === undefined) {
      skipped.push({ line, reason: `expected 3 columns, found ${fields.length}` });
      continue;
    }
    if (cityA === "" || cityB === "") {
      skipped.push({ line, reason: "empty city name" });
      continue;
    }
    const distance = rawDistance === "" ? NaN : Number(rawDistance);
    if (!Number.isFinite(distance) || distance < 0) {
      skipped.push({ line, reason: `invalid distance '${rawDistance}'` });
      continue;
    }
    roads.push({ cityA, cityB, distance });
  }

  for (const { line, reason } of skipped) {
    console.warn(`[ingest] roads line ${line} skipped: ${reason}`);
  }

  return { roads, skipped };
}
