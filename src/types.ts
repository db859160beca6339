/**
 * Core type definitions for evaluation records.
 */

/**
 * One input/output/expected-output/context tuple subject to evaluation.
 */
export interface LLMTestCase {
  /** Name of the case. Used as the subject label of descriptive result ids. */
  name?: string | null;
  input: string;
  actualOutput?: string | null;
  expectedOutput?: string | null;
  context?: string[] | null;
  retrievalContext?: string[] | null;
}

/**
 * The outcome of one metric on one test case.
 */
export interface MetricOutcome {
  score: number;
  success: boolean;
  reason?: string | null;
  error?: string | null;
  threshold?: number;
}

/**
 * Metric name -> one outcome per test case, in test-case order.
 */
export type MetricResults = Record<string, MetricOutcome[]>;

/**
 * Anything that names a metric: the name itself, or an object exposing it.
 */
export type MetricDescriptor = string | { readonly name: string };

/**
 * Context labels recorded alongside a descriptive result id.
 */
export interface ResultOrigin {
  testFile: string;
  testType: string;
  testSubject: string;
}

/**
 * The unit of persistence. Immutable once written.
 */
export interface EvaluationRecord {
  resultId: string;
  testCases: LLMTestCase[];
  /** Order matches the metrics supplied to `save`, not the key order of `results`. */
  metricNames: string[];
  results: MetricResults;
  /** Milliseconds since epoch, captured at save time. */
  timestamp: number;
  origin: ResultOrigin | null;
}

export function metricName(metric: MetricDescriptor): string {
  return typeof metric === 'string' ? metric : metric.name;
}
