export {
  formatCsv,
  isResultsCsvName,
  loadResultRows,
  parseCsv,
  RESULTS_CSV_COLUMNS,
  RESULTS_CSV_PREFIX,
  writeResultsCsv,
} from './csv.js';
export type { ReadRecordsOptions } from './records.js';
export { readRecords, readResultRows } from './records.js';
export type { RowsRenderOptions, SummaryRenderOptions } from './renderer.js';
export { printSummary, renderRate, renderRows, renderScore, renderSummary } from './renderer.js';
export type { ResultRow } from './rows.js';
export { formatTimestamp, parseTimestamp, recordToRows, testCaseLabel } from './rows.js';
export type {
  MetricSummary,
  ResultsSummary,
  RowBound,
  RowFilter,
  TimelinePoint,
} from './summary.js';
export { filterRows, summarizeRows } from './summary.js';
