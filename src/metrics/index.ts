export { ContainsMetric, ExactMatchMetric } from './common.js';
export type { MetricOptions, MetricScore } from './metric.js';
export { DEFAULT_THRESHOLD, Metric } from './metric.js';
export { runMetric } from './run-metric.js';
