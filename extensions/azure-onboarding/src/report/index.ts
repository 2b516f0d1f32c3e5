export { RESULT_COLUMNS, formatResultsCsv, formatSummary, toResultRecords, writeResultsFile } from "./results.js";
export type { ResultRecord } from "./results.js";
