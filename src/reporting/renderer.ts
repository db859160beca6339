/**
 * Terminal table rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { ResultRow } from './rows.js';
import type { ResultsSummary } from './summary.js';

export interface SummaryRenderOptions {
  title?: string;
  includeTimeline?: boolean;
}

export interface RowsRenderOptions {
  /** Show at most this many rows, newest first. */
  limit?: number;
  includeReasons?: boolean;
}

export function renderScore(value: number): string {
  return value.toFixed(2);
}

export function renderRate(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Render aggregated results as a formatted string.
 */
export function renderSummary(summary: ResultsSummary, opts?: SummaryRenderOptions): string {
  const title = opts?.title ?? 'Evaluation Results';
  if (summary.total === 0 || summary.successRate === null || summary.averageScore === null) {
    return `${title}\nNo evaluation results found.`;
  }

  const lines = [
    chalk.bold(title),
    `Overall Success Rate: ${colorRate(summary.successRate)}`,
    `Average Score: ${renderScore(summary.averageScore)}`,
  ];

  const metrics = new Table({
    head: ['Metric', 'Runs', 'Success Rate', 'Average', 'Min', 'Median', 'Max'],
    style: { head: [], border: [] },
  });
  for (const m of summary.metrics) {
    metrics.push([
      chalk.bold(m.metricName),
      String(m.count),
      colorRate(m.successRate),
      renderScore(m.averageScore),
      renderScore(m.minScore),
      renderScore(m.medianScore),
      renderScore(m.maxScore),
    ]);
  }
  lines.push(metrics.toString());

  if ((opts?.includeTimeline ?? true) && summary.timeline.length > 0) {
    const timeline = new Table({
      head: ['Timestamp', 'Metric', 'Runs', 'Success Rate'],
      style: { head: [], border: [] },
    });
    for (const point of summary.timeline) {
      timeline.push([
        point.timestamp,
        point.metricName,
        String(point.count),
        colorRate(point.successRate),
      ]);
    }
    lines.push(chalk.bold('Timeline'), timeline.toString());
  }

  return lines.join('\n');
}

/**
 * Render individual rows, newest first.
 */
export function renderRows(rows: ResultRow[], opts?: RowsRenderOptions): string {
  const sorted = [...rows].sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  const shown = opts?.limit !== undefined ? sorted.slice(0, opts.limit) : sorted;

  const head = ['Timestamp', 'Test Case', 'Metric', 'Score', 'Threshold', 'Success'];
  if (opts?.includeReasons) head.push('Reason');

  const table = new Table({ head, style: { head: [], border: [] } });
  for (const row of shown) {
    const cells = [
      row.timestamp,
      row.testCaseName,
      row.metricName,
      renderScore(row.score),
      row.threshold === null ? '-' : renderScore(row.threshold),
      row.success ? chalk.green('✔') : chalk.red('✘'),
    ];
    if (opts?.includeReasons) {
      cells.push(row.error ? chalk.red(row.error) : (row.reason ?? '-'));
    }
    table.push(cells);
  }
  return table.toString();
}

export function printSummary(summary: ResultsSummary, opts?: SummaryRenderOptions): void {
  console.log(renderSummary(summary, opts));
}

function colorRate(rate: number): string {
  const text = renderRate(rate);
  if (rate >= 0.8) return chalk.green(text);
  if (rate >= 0.5) return chalk.yellow(text);
  return chalk.red(text);
}
