/**
 * Filtering and aggregation of report rows.
 */

import { parseTimestamp, type ResultRow } from './rows.js';

/**
 * A `Date` or millisecond bound is an exact instant. A `YYYY-MM-DD` string is a
 * UTC calendar day: as `from` it starts at midnight, as `to` it covers the whole day.
 */
export type RowBound = Date | number | string;

export interface RowFilter {
  /** Inclusive lower bound. */
  from?: RowBound | null;
  /** Inclusive upper bound. */
  to?: RowBound | null;
  /** Keep only these metrics. Omit to keep all. */
  metrics?: string[] | null;
}

export interface MetricSummary {
  metricName: string;
  count: number;
  successRate: number;
  averageScore: number;
  minScore: number;
  medianScore: number;
  maxScore: number;
}

export interface TimelinePoint {
  timestamp: string;
  metricName: string;
  count: number;
  successRate: number;
}

export interface ResultsSummary {
  total: number;
  /** Null when there are no rows. */
  successRate: number | null;
  averageScore: number | null;
  /** Sorted by metric name. */
  metrics: MetricSummary[];
  /** Sorted by timestamp, then metric name. */
  timeline: TimelinePoint[];
}

export function filterRows(rows: ResultRow[], filter: RowFilter): ResultRow[] {
  const from = toMillis(filter.from, 'start');
  const to = toMillis(filter.to, 'end');
  const metrics = filter.metrics ? new Set(filter.metrics) : null;

  return rows.filter((row) => {
    if (metrics && !metrics.has(row.metricName)) return false;
    if (from === null && to === null) return true;
    const ts = parseTimestamp(row.timestamp);
    if (from !== null && ts < from) return false;
    if (to !== null && ts > to) return false;
    return true;
  });
}

export function summarizeRows(rows: ResultRow[]): ResultsSummary {
  const byMetric = groupBy(rows, (row) => row.metricName);
  const metrics: MetricSummary[] = [...byMetric.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([metricName, group]) => {
      const scores = group.map((row) => row.score).sort((a, b) => a - b);
      return {
        metricName,
        count: group.length,
        successRate: successRate(group),
        averageScore: mean(scores),
        minScore: scores[0] ?? 0,
        medianScore: median(scores),
        maxScore: scores[scores.length - 1] ?? 0,
      };
    });

  const byPoint = groupBy(rows, (row) => `${row.timestamp}\u0000${row.metricName}`);
  const timeline: TimelinePoint[] = [...byPoint.values()]
    .map((group) => ({
      timestamp: group[0]?.timestamp ?? '',
      metricName: group[0]?.metricName ?? '',
      count: group.length,
      successRate: successRate(group),
    }))
    .sort(
      (a, b) => a.timestamp.localeCompare(b.timestamp) || a.metricName.localeCompare(b.metricName),
    );

  return {
    total: rows.length,
    successRate: rows.length > 0 ? successRate(rows) : null,
    averageScore: rows.length > 0 ? mean(rows.map((row) => row.score)) : null,
    metrics,
    timeline,
  };
}

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function toMillis(value: RowBound | null | undefined, edge: 'start' | 'end'): number | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number') return value;

  const m = DATE_PATTERN.exec(value);
  const [year = 0, month = 1, day = 1] = (m?.slice(1) ?? []).map(Number);
  const start = Date.UTC(year, month - 1, day);
  if (!m || new Date(start).toISOString().slice(0, 10) !== value) {
    throw new Error(`Invalid date bound '${value}', expected YYYY-MM-DD`);
  }
  return edge === 'start' ? start : start + DAY_MS - 1;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

function successRate(rows: ResultRow[]): number {
  return rows.filter((row) => row.success).length / rows.length;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function median(sorted: number[]): number {
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? 0;
  return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
}
