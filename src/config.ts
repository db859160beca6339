/**
 * Storage configuration: resolved once from an environment map or a
 * YAML/JSON file, then passed explicitly to `createStorage`.
 *
 * Environment variables:
 * - `DEEPEVAL_SAVE_MODE`: `local` (default) or `cloud`
 * - `DEEPEVAL_RESULTS_DIR`: local storage root, default `.deepeval_results`
 * - `DEEPEVAL_API_KEY`: bearer credential, required for `cloud`
 * - `DEEPEVAL_API_URL`, `DEEPEVAL_API_VERSION`: remote endpoint
 * - `DEEPEVAL_ID_STRATEGY`: `opaque` (default) or `descriptive`
 * - `DEEPEVAL_API_TIMEOUT_MS`: remote request timeout
 * - `DEEPEVAL_<METRIC>_THRESHOLD`: pass threshold for the metric named `<metric>`
 *   (lowercased), e.g. `DEEPEVAL_ANSWER_RELEVANCY_THRESHOLD` for `answer_relevancy`
 */

import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, toError } from './errors.js';
import type { IdStrategy } from './storage/identifier.js';
import { DEFAULT_STORAGE_DIR } from './storage/local.js';
import { API_KEY_ENV_VAR, DEFAULT_API_URL, DEFAULT_API_VERSION } from './storage/remote.js';

export type SaveMode = 'local' | 'cloud';

/** Threshold used for metrics the configuration does not name. */
export const DEFAULT_METRIC_THRESHOLD = 0.7;

/** Metric name -> pass threshold. */
export type MetricThresholds = Record<string, number>;

interface BaseStorageConfig {
  metricThresholds: MetricThresholds;
}

export interface LocalStorageConfig extends BaseStorageConfig {
  saveMode: 'local';
  localSaveDir: string;
  idStrategy: IdStrategy;
}

export interface CloudStorageConfig extends BaseStorageConfig {
  saveMode: 'cloud';
  apiKey: string;
  apiUrl: string;
  apiVersion: string;
  timeoutMs: number | null;
}

export type StorageConfig = LocalStorageConfig | CloudStorageConfig;

type Env = Record<string, string | undefined>;

const ENV_KEYS = {
  saveMode: 'DEEPEVAL_SAVE_MODE',
  localSaveDir: 'DEEPEVAL_RESULTS_DIR',
  apiKey: API_KEY_ENV_VAR,
  apiUrl: 'DEEPEVAL_API_URL',
  apiVersion: 'DEEPEVAL_API_VERSION',
  idStrategy: 'DEEPEVAL_ID_STRATEGY',
  timeoutMs: 'DEEPEVAL_API_TIMEOUT_MS',
} as const;

const THRESHOLD_ENV_PATTERN = /^DEEPEVAL_([A-Z0-9_]+)_THRESHOLD$/;

export const storageSettingsSchema = z
  .object({
    saveMode: z.enum(['local', 'cloud']).default('local'),
    localSaveDir: z.string().min(1).default(DEFAULT_STORAGE_DIR),
    apiKey: z.string().min(1).optional(),
    apiUrl: z.string().url().default(DEFAULT_API_URL),
    apiVersion: z.string().min(1).default(DEFAULT_API_VERSION),
    idStrategy: z.enum(['opaque', 'descriptive']).default('opaque'),
    timeoutMs: z.coerce.number().int().positive().optional(),
    metricThresholds: z.record(z.string().min(1), z.coerce.number().finite()).default({}),
  })
  .strict();

export type StorageSettings = z.input<typeof storageSettingsSchema>;

/**
 * Resolve the storage configuration from environment variables.
 * Empty variables count as unset. The environment is never modified.
 */
export function resolveStorageConfig(env: Env = process.env): StorageConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName]?.trim();
    if (value) raw[key] = value;
  }

  const thresholds: Record<string, string> = {};
  for (const [envName, value] of Object.entries(env)) {
    const match = THRESHOLD_ENV_PATTERN.exec(envName);
    const trimmed = value?.trim();
    if (match?.[1] && trimmed) thresholds[match[1].toLowerCase()] = trimmed;
  }
  raw.metricThresholds = thresholds;

  return parseStorageSettings(raw, 'environment');
}

/**
 * Pass threshold configured for a metric, or `DEFAULT_METRIC_THRESHOLD`.
 */
export function getMetricThreshold(config: StorageConfig, metricName: string): number {
  return config.metricThresholds[metricName] ?? DEFAULT_METRIC_THRESHOLD;
}

/**
 * Load the storage configuration from a YAML or JSON file.
 * `apiKey` falls back to `DEEPEVAL_API_KEY` in `env` when the file has none.
 */
export function loadStorageConfigFromFile(
  path: string,
  opts?: { fmt?: 'yaml' | 'json'; env?: Env },
): StorageConfig {
  const fmt = opts?.fmt ?? inferFormat(path);

  let data: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    data = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  } catch (e) {
    const error = toError(e);
    throw new ConfigurationError(`Could not read config file '${path}': ${error.message}`);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigurationError(`Config file '${path}' must contain a mapping`);
  }

  const env = opts?.env ?? process.env;
  const settings: Record<string, unknown> = { ...data };
  const envKey = env[API_KEY_ENV_VAR]?.trim();
  if (settings.apiKey === undefined && envKey) {
    settings.apiKey = envKey;
  }
  return parseStorageSettings(settings, `config file '${basename(path)}'`);
}

/**
 * Validate raw settings and narrow them to a local or cloud configuration.
 */
export function parseStorageSettings(data: unknown, source = 'settings'): StorageConfig {
  const parsed = storageSettingsSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid storage configuration in ${source}: ${issues}`);
  }

  const settings = parsed.data;
  if (settings.saveMode === 'local') {
    return {
      saveMode: 'local',
      localSaveDir: settings.localSaveDir,
      idStrategy: settings.idStrategy,
      metricThresholds: settings.metricThresholds,
    };
  }

  if (!settings.apiKey) {
    throw new ConfigurationError(
      `API key required for cloud save mode (set ${API_KEY_ENV_VAR} or apiKey)`,
    );
  }
  return {
    saveMode: 'cloud',
    apiKey: settings.apiKey,
    apiUrl: settings.apiUrl,
    apiVersion: settings.apiVersion,
    timeoutMs: settings.timeoutMs ?? null,
    metricThresholds: settings.metricThresholds,
  };
}

function inferFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new ConfigurationError(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}
