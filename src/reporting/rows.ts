/**
 * Flat, tabular projection of evaluation records.
 */

import type { EvaluationRecord, LLMTestCase } from '../types.js';

/**
 * One metric outcome for one test case.
 */
export interface ResultRow {
  /** `YYYYMMDD_HHMMSS`, UTC. */
  timestamp: string;
  testCaseName: string;
  metricName: string;
  score: number;
  threshold: number | null;
  success: boolean;
  reason: string | null;
  error: string | null;
}

const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

/**
 * Format milliseconds since epoch as `YYYYMMDD_HHMMSS` in UTC.
 */
export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${String(d.getUTCFullYear()).padStart(4, '0')}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `_${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

/**
 * Parse a `YYYYMMDD_HHMMSS` UTC timestamp into milliseconds since epoch.
 */
export function parseTimestamp(value: string): number {
  const m = TIMESTAMP_PATTERN.exec(value);
  if (!m) {
    throw new Error(`Invalid timestamp '${value}', expected YYYYMMDD_HHMMSS`);
  }
  const [year = 0, month = 1, day = 1, hour = 0, minute = 0, second = 0] = m
    .slice(1)
    .map(Number);
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  if (formatTimestamp(ms) !== value) {
    throw new Error(`Invalid timestamp '${value}', no such date`);
  }
  return ms;
}

export function testCaseLabel(tc: LLMTestCase | undefined, index: number): string {
  return tc?.name ?? `Case ${index + 1}`;
}

/**
 * Flatten a record into rows: metrics in `metricNames` order (then any other
 * result keys), test cases in input order.
 */
export function recordToRows(record: EvaluationRecord): ResultRow[] {
  const timestamp = formatTimestamp(record.timestamp);
  const extraNames = Object.keys(record.results).filter((k) => !record.metricNames.includes(k));

  const rows: ResultRow[] = [];
  for (const metricName of [...record.metricNames, ...extraNames]) {
    const outcomes = record.results[metricName] ?? [];
    outcomes.forEach((outcome, i) => {
      rows.push({
        timestamp,
        testCaseName: testCaseLabel(record.testCases[i], i),
        metricName,
        score: outcome.score,
        threshold: outcome.threshold ?? null,
        success: outcome.success,
        reason: outcome.reason ?? null,
        error: outcome.error ?? null,
      });
    });
  }
  return rows;
}
