/**
 * Run metrics over test cases and persist the outcome.
 *
 * Every metric is applied to every test case; outcomes are grouped by metric
 * name and kept in test-case order, then saved as one record.
 */

import pLimit from 'p-limit';
import type { Metric } from './metrics/metric.js';
import { runMetric } from './metrics/run-metric.js';
import type { StorageBackend } from './storage/backend.js';
import type { LLMTestCase, MetricOutcome, MetricResults } from './types.js';

export interface EvaluateOptions {
  /** Where to save the results. Nothing is persisted when omitted. */
  storage?: StorageBackend | null;
  /** Maximum number of metric runs in flight. */
  maxConcurrency?: number;
  /**
   * Per-metric pass thresholds, keyed by metric name, overriding each metric's
   * own `threshold`. See `resolveStorageConfig` for reading them from the environment.
   */
  thresholds?: Record<string, number> | null;
}

export interface EvaluationOutcome {
  /** Identifier of the saved record, or null when no storage was given. */
  resultId: string | null;
  results: MetricResults;
}

/**
 * Evaluate test cases against metrics.
 */
export async function evaluate(
  testCases: LLMTestCase[],
  metrics: Metric[],
  opts?: EvaluateOptions,
): Promise<EvaluationOutcome> {
  if (testCases.length === 0) {
    throw new Error('evaluate needs at least one test case');
  }

  const names = new Set<string>();
  for (const metric of metrics) {
    if (names.has(metric.name)) {
      throw new Error(`Duplicate metric name: '${metric.name}'`);
    }
    names.add(metric.name);
  }

  const maxConcurrency = opts?.maxConcurrency;
  if (maxConcurrency !== undefined && maxConcurrency < 1) {
    throw new Error(`maxConcurrency must be >= 1, got ${maxConcurrency}`);
  }
  const limit = maxConcurrency ? pLimit(maxConcurrency) : pLimit(Infinity);

  const thresholds = metrics.map((metric) => {
    const threshold = opts?.thresholds?.[metric.name] ?? metric.threshold;
    if (!Number.isFinite(threshold)) {
      throw new Error(`Threshold for '${metric.name}' must be a finite number, got ${threshold}`);
    }
    return threshold;
  });

  const outcomes: MetricOutcome[][] = await Promise.all(
    metrics.map((metric, i) => {
      const threshold = thresholds[i] ?? metric.threshold;
      return Promise.all(testCases.map((tc) => limit(() => runMetric(metric, tc, threshold))));
    }),
  );

  const results: MetricResults = {};
  metrics.forEach((metric, i) => {
    results[metric.name] = outcomes[i] ?? [];
  });

  const resultId = opts?.storage ? await opts.storage.save(testCases, metrics, results) : null;
  return { resultId, results };
}
