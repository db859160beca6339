/**
 * Persistence and reporting for LLM evaluation results.
 *
 * @example
 * ```ts
 * import { ContainsMetric, evaluate, LocalStorage } from 'deepeval-results';
 *
 * const storage = new LocalStorage('.deepeval_results');
 * const { resultId, results } = await evaluate(
 *   [{ name: 'greeting', input: 'Say hi', actualOutput: 'Hi there!' }],
 *   [new ContainsMetric('hi')],
 *   { storage },
 * );
 *
 * if (resultId) {
 *   const record = await storage.load(resultId);
 * }
 * ```
 */

export type {
  CloudStorageConfig,
  LocalStorageConfig,
  MetricThresholds,
  SaveMode,
  StorageConfig,
} from './config.js';
// Configuration
export {
  DEFAULT_METRIC_THRESHOLD,
  getMetricThreshold,
  loadStorageConfigFromFile,
  parseStorageSettings,
  resolveStorageConfig,
  storageSettingsSchema,
} from './config.js';
// Errors
export type { PersistenceErrorOptions } from './errors.js';
export { ConfigurationError, NotFoundError, PersistenceError } from './errors.js';
export type { EvaluateOptions, EvaluationOutcome } from './evaluate.js';
// Evaluation
export { evaluate } from './evaluate.js';
export type { MetricOptions, MetricScore } from './metrics/index.js';
// Metrics
export {
  ContainsMetric,
  DEFAULT_THRESHOLD,
  ExactMatchMetric,
  Metric,
  runMetric,
} from './metrics/index.js';
export type {
  MetricSummary,
  ReadRecordsOptions,
  ResultRow,
  ResultsSummary,
  RowBound,
  RowFilter,
  RowsRenderOptions,
  SummaryRenderOptions,
  TimelinePoint,
} from './reporting/index.js';
// Reporting
export {
  filterRows,
  formatCsv,
  formatTimestamp,
  loadResultRows,
  parseCsv,
  parseTimestamp,
  printSummary,
  readRecords,
  readResultRows,
  recordToRows,
  renderRows,
  renderSummary,
  RESULTS_CSV_PREFIX,
  summarizeRows,
  writeResultsCsv,
} from './reporting/index.js';
export type { RecordDocument } from './serialization/index.js';
// Serialization
export {
  buildRecordDocument,
  parseRecordDocument,
  recordDocumentSchema,
} from './serialization/index.js';
export type {
  IdOptions,
  IdStrategy,
  LocalStorageOptions,
  RemoteStorageOptions,
  StorageBackend,
  StorageKind,
} from './storage/index.js';
// Storage
export {
  createStorage,
  DEFAULT_STORAGE_DIR,
  LocalStorage,
  RemoteStorage,
  ResultIdGenerator,
} from './storage/index.js';
// Core types
export type {
  EvaluationRecord,
  LLMTestCase,
  MetricDescriptor,
  MetricOutcome,
  MetricResults,
  ResultOrigin,
} from './types.js';
export { metricName } from './types.js';
