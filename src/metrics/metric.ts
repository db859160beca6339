/**
 * Metric: base class for all scoring checks.
 *
 * Subclasses implement `measure(testCase)`, which can return a value
 * directly or a Promise.
 */

import type { LLMTestCase } from '../types.js';

export const DEFAULT_THRESHOLD = 0.5;

/**
 * A score with an optional explanation.
 */
export interface MetricScore {
  score: number;
  reason?: string | null;
}

export interface MetricOptions {
  /** Minimum score counted as a success. */
  threshold?: number;
}

/**
 * Base class for all metrics.
 *
 * Example:
 * ```ts
 * class NonEmpty extends Metric {
 *   readonly name = 'non_empty';
 *   measure(tc: LLMTestCase): number {
 *     return tc.actualOutput ? 1 : 0;
 *   }
 * }
 * ```
 */
export abstract class Metric {
  /** Stable identifier stored with every record. */
  abstract readonly name: string;
  readonly threshold: number;

  constructor(opts?: MetricOptions) {
    const threshold = opts?.threshold ?? DEFAULT_THRESHOLD;
    if (!Number.isFinite(threshold)) {
      throw new Error(`threshold must be a finite number, got ${threshold}`);
    }
    this.threshold = threshold;
  }

  /**
   * Score one test case.
   */
  abstract measure(testCase: LLMTestCase): number | MetricScore | Promise<number | MetricScore>;

  isSuccessful(score: number, threshold: number = this.threshold): boolean {
    return score >= threshold;
  }

  toString(): string {
    return `${this.constructor.name}(name=${JSON.stringify(this.name)}, threshold=${this.threshold})`;
  }
}
