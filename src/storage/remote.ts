/**
 * Remote storage: records are sent to and fetched from the results API.
 *
 * The service assigns identifiers; this backend never invents one. Requests
 * are never retried here.
 */

import { ConfigurationError, NotFoundError, PersistenceError, toError } from '../errors.js';
import { buildRecordDocument, parseRecordDocument } from '../serialization/record.js';
import { saveResponseSchema } from '../serialization/schema.js';
import type {
  EvaluationRecord,
  LLMTestCase,
  MetricDescriptor,
  MetricResults,
} from '../types.js';
import type { StorageBackend } from './backend.js';

export const DEFAULT_API_URL = 'https://api.confident-ai.com';
export const DEFAULT_API_VERSION = 'v1';
export const API_KEY_ENV_VAR = 'DEEPEVAL_API_KEY';

/** Status codes that mean the record does not exist. */
const ABSENT_STATUSES = new Set([404, 410]);

export interface RemoteStorageOptions {
  /** Bearer credential. Falls back to `DEEPEVAL_API_KEY` in `env`. */
  apiKey?: string | null;
  baseUrl?: string;
  apiVersion?: string;
  /** Abort requests that take longer than this many milliseconds. */
  timeoutMs?: number;
  /** Environment consulted for the credential fallback. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  fetch?: typeof fetch;
  /** Millisecond clock used for timestamps. Defaults to `Date.now`. */
  clock?: () => number;
}

export class RemoteStorage implements StorageBackend {
  readonly kind = 'remote' as const;
  readonly baseUrl: string;
  readonly apiVersion: string;
  readonly timeoutMs: number | null;
  private readonly apiKey: string;
  private readonly fetchFn: typeof fetch;
  private readonly clock: () => number;

  constructor(opts?: RemoteStorageOptions) {
    const env = opts?.env ?? process.env;
    const apiKey = opts?.apiKey || env[API_KEY_ENV_VAR];
    if (!apiKey) {
      throw new ConfigurationError(
        `API key required for remote storage: pass apiKey or set ${API_KEY_ENV_VAR}`,
      );
    }
    if (opts?.timeoutMs !== undefined && !(opts.timeoutMs > 0)) {
      throw new ConfigurationError(`timeoutMs must be > 0, got ${opts.timeoutMs}`);
    }

    this.apiKey = apiKey;
    this.baseUrl = (opts?.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.apiVersion = (opts?.apiVersion ?? DEFAULT_API_VERSION).replace(/^\/+|\/+$/g, '');
    this.timeoutMs = opts?.timeoutMs ?? null;
    this.fetchFn = opts?.fetch ?? ((input, init) => fetch(input, init));
    this.clock = opts?.clock ?? Date.now;
  }

  get resultsUrl(): string {
    return `${this.baseUrl}/${this.apiVersion}/results`;
  }

  async save(
    testCases: LLMTestCase[],
    metrics: MetricDescriptor[],
    results: MetricResults,
  ): Promise<string> {
    const doc = buildRecordDocument({ testCases, metrics, results, timestamp: this.clock() });

    const response = await this.request(this.resultsUrl, {
      method: 'POST',
      headers: { ...this.authHeaders(), 'Content-Type': 'application/json' },
      body: JSON.stringify(doc),
    });

    if (!response.ok) {
      throw await rejectedRequest('Saving results', response);
    }

    const parsed = saveResponseSchema.safeParse(await readJson(response, 'save response'));
    if (!parsed.success) {
      throw new PersistenceError('Save response did not contain a result_id', {
        status: response.status,
      });
    }
    return parsed.data.result_id;
  }

  async load(resultId: string): Promise<EvaluationRecord> {
    const response = await this.request(`${this.resultsUrl}/${encodeURIComponent(resultId)}`, {
      method: 'GET',
      headers: this.authHeaders(),
    });

    if (ABSENT_STATUSES.has(response.status)) {
      throw new NotFoundError(resultId);
    }
    if (!response.ok) {
      throw await rejectedRequest(`Loading results '${resultId}'`, response);
    }

    return parseRecordDocument(await readJson(response, `result record '${resultId}'`), resultId);
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const signal = this.timeoutMs !== null ? AbortSignal.timeout(this.timeoutMs) : undefined;
    try {
      return await this.fetchFn(url, signal ? { ...init, signal } : init);
    } catch (e) {
      const error = toError(e);
      if (error.name === 'TimeoutError' || error.name === 'AbortError') {
        throw new PersistenceError(
          `${init.method ?? 'GET'} ${url} timed out after ${this.timeoutMs ?? 0}ms`,
          { cause: error },
        );
      }
      throw new PersistenceError(`${init.method ?? 'GET'} ${url} failed: ${error.message}`, {
        cause: error,
      });
    }
  }
}

async function rejectedRequest(action: string, response: Response): Promise<PersistenceError> {
  const body = await response
    .text()
    .catch((e: unknown) => `<unreadable body: ${toError(e).message}>`);
  return new PersistenceError(`${action} failed with status ${response.status}: ${body}`, {
    status: response.status,
    body,
  });
}

async function readJson(response: Response, what: string): Promise<unknown> {
  let text: string;
  try {
    text = await response.text();
  } catch (e) {
    const error = toError(e);
    throw new PersistenceError(`Could not read ${what}: ${error.message}`, {
      status: response.status,
      cause: error,
    });
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    const error = toError(e);
    throw new PersistenceError(`Malformed ${what}: ${error.message}`, {
      status: response.status,
      body: text,
      cause: error,
    });
  }
}
