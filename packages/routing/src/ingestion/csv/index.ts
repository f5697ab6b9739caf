export { parseRoadsCsv, type RoadsParseResult } from "./roads.js";
export { parseAttractionsCsv, type AttractionsParseResult } from "./attractions.js";
export { readCsvRecords, type CsvRecord, type SkippedRecord } from "./records.js";
