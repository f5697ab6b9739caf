/**
 * Low-level CSV record reading via csv-parse.
 *
 * Returns every non-blank record with the line it ended on, so callers can
 * report which lines they rejected.
 */

import { parse } from "csv-parse/sync";
import { z } from "zod";

/** A parsed CSV row and the (1-based) line it came from */
export interface CsvRecord {
  line: number;
  fields: string[];
}

/** A row that was rejected during ingestion */
export interface SkippedRecord {
  line: number;
  reason: string;
}

const parsedRecordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  }),
);

export function readCsvRecords(text: string): CsvRecord[] {
  const raw: unknown = parse(text, {
    info: true,
    trim: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    skip_records_with_empty_values: true,
  });
  return parsedRecordsSchema.parse(raw).map(({ record, info }) => ({
    line: info.lines,
    fields: record,
  }));
}
