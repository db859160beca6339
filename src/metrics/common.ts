/**
 * Built-in metrics: ExactMatchMetric, ContainsMetric.
 */

import type { LLMTestCase } from '../types.js';
import { Metric, type MetricOptions, type MetricScore } from './metric.js';

/**
 * 1 when the actual output equals the expected output, else 0.
 */
export class ExactMatchMetric extends Metric {
  readonly name: string;
  readonly trim: boolean;

  constructor(opts?: MetricOptions & { trim?: boolean; name?: string }) {
    super(opts);
    this.name = opts?.name ?? 'exact_match';
    this.trim = opts?.trim ?? true;
  }

  measure(tc: LLMTestCase): MetricScore {
    if (tc.expectedOutput == null) {
      throw new Error(`${this.name} requires expectedOutput`);
    }
    const actual = this.trim ? (tc.actualOutput ?? '').trim() : (tc.actualOutput ?? '');
    const expected = this.trim ? tc.expectedOutput.trim() : tc.expectedOutput;
    if (actual === expected) {
      return { score: 1, reason: 'Output matches the expected output' };
    }
    return {
      score: 0,
      reason: `Output ${truncatedRepr(actual)} does not match expected ${truncatedRepr(expected)}`,
    };
  }
}

/**
 * Fraction of the given phrases found in the actual output.
 */
export class ContainsMetric extends Metric {
  readonly name: string;
  readonly phrases: string[];
  readonly caseSensitive: boolean;

  constructor(
    phrases: string | string[],
    opts?: MetricOptions & { caseSensitive?: boolean; name?: string },
  ) {
    super(opts);
    this.phrases = typeof phrases === 'string' ? [phrases] : [...phrases];
    if (this.phrases.length === 0) {
      throw new Error('ContainsMetric needs at least one phrase');
    }
    this.caseSensitive = opts?.caseSensitive ?? false;
    this.name = opts?.name ?? 'contains';
  }

  measure(tc: LLMTestCase): MetricScore {
    const normalize = (s: string) => (this.caseSensitive ? s : s.toLowerCase());
    const output = normalize(tc.actualOutput ?? '');
    const missing = this.phrases.filter((p) => !output.includes(normalize(p)));
    const score = (this.phrases.length - missing.length) / this.phrases.length;

    if (missing.length === 0) {
      return { score, reason: 'Output contains every expected phrase' };
    }
    return {
      score,
      reason: `Output is missing ${missing.map((p) => truncatedRepr(p)).join(', ')}`,
    };
  }
}

function truncatedRepr(value: string, maxLength = 100): string {
  const repr = JSON.stringify(value);
  if (repr.length > maxLength) {
    const half = Math.floor(maxLength / 2);
    return `${repr.slice(0, half)}...${repr.slice(-half)}`;
  }
  return repr;
}
