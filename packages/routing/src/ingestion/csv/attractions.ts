/**
 * Attractions file parser.
 *
 * Format: `attraction,city` per line, no header. A name listed twice keeps
 * the city from its last line.
 */

import type { CityId } from "@roadtrip/types";
import { readCsvRecords, type SkippedRecord } from "./records.js";

export interface AttractionsParseResult {
  attractions: Map<string, CityId>;
  skipped: SkippedRecord[];
}

export function parseAttractionsCsv(text: string): AttractionsParseResult {
  const attractions = new Map<string, CityId>();
  const skipped: SkippedRecord[] = [];

  for (const { line, fields } of readCsvRecords(text)) {
    const [name, city] = fields;
    if (fields.length !== 2 || name === undefined || city === undefined) {
      skipped.push({ line, reason: `expected 2 columns, found ${fields.length}` });
      continue;
    }
    if (name === "" || city === "") {
      skipped.push({ line, reason: "empty attraction or city name" });
      continue;
    }
    attractions.set(name, city);
  }

  for (const { line, reason } of skipped) {
    console.warn(`[ingest] attractions line ${line} skipped: ${reason}`);
  }

  return { attractions, skipped };
}
