/**
 * Run a metric and normalize its output.
 */

import type { LLMTestCase, MetricOutcome } from '../types.js';
import type { Metric, MetricScore } from './metric.js';

/**
 * Run a metric on one test case. `threshold` overrides the metric's own.
 *
 * Never rejects: an exception or an unusable score is recorded as a failed
 * outcome with `error` set.
 */
export async function runMetric(
  metric: Metric,
  testCase: LLMTestCase,
  threshold: number = metric.threshold,
): Promise<MetricOutcome> {
  try {
    const raw = await metric.measure(testCase);
    const { score, reason } = normalizeScore(raw);
    if (!Number.isFinite(score)) {
      throw new TypeError(`${metric.name} returned a non-finite score: ${score}`);
    }
    return {
      score,
      success: metric.isSuccessful(score, threshold),
      reason: reason ?? null,
      error: null,
      threshold,
    };
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    return {
      score: 0,
      success: false,
      reason: null,
      error: `${error.name}: ${error.message}`,
      threshold,
    };
  }
}

function normalizeScore(raw: number | MetricScore): MetricScore {
  return typeof raw === 'number' ? { score: raw } : raw;
}
