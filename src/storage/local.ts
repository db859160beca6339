/**
 * Filesystem storage: one pretty-printed JSON document per record, named
 * `{resultId}.json`, under a storage root.
 *
 * There is no locking. Concurrent saves never touch the same file because
 * every file is created exclusively; a load that races a save of the same
 * record may observe a partially written file and fail with PersistenceError.
 * A save that fails after creating its file removes that file again.
 */

import { mkdirSync } from 'node:fs';
import { readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ConfigurationError, NotFoundError, PersistenceError, toError } from '../errors.js';
import {
  buildRecordDocument,
  parseRecordText,
  stringifyRecordDocument,
} from '../serialization/record.js';
import type {
  EvaluationRecord,
  LLMTestCase,
  MetricDescriptor,
  MetricResults,
} from '../types.js';
import type { StorageBackend } from './backend.js';
import { type IdOptions, type IdStrategy, ResultIdGenerator } from './identifier.js';

export const DEFAULT_STORAGE_DIR = '.deepeval_results';

/** Upper bound on exclusive-create retries when an id is already taken. */
const MAX_ID_ATTEMPTS = 1000;

export interface LocalStorageOptions {
  /** Defaults to `opaque`. */
  idStrategy?: IdStrategy;
  /** Explicit labels for descriptive ids. */
  idOptions?: IdOptions;
  /** Millisecond clock used for timestamps. Defaults to `Date.now`. */
  clock?: () => number;
}

export class LocalStorage implements StorageBackend {
  readonly kind = 'local' as const;
  readonly storageDir: string;
  private readonly ids: ResultIdGenerator;
  private readonly idOptions: IdOptions | undefined;
  private readonly clock: () => number;

  constructor(storageDir: string = DEFAULT_STORAGE_DIR, opts?: LocalStorageOptions) {
    if (!storageDir.trim()) {
      throw new ConfigurationError('A storage directory is required for local storage');
    }
    this.storageDir = resolve(storageDir);
    this.ids = new ResultIdGenerator(opts?.idStrategy ?? 'opaque');
    this.idOptions = opts?.idOptions;
    this.clock = opts?.clock ?? Date.now;

    try {
      mkdirSync(this.storageDir, { recursive: true });
    } catch (e) {
      const error = toError(e);
      throw new PersistenceError(
        `Could not create storage directory '${this.storageDir}': ${error.message}`,
        { cause: error },
      );
    }
  }

  get idStrategy(): IdStrategy {
    return this.ids.strategy;
  }

  async save(
    testCases: LLMTestCase[],
    metrics: MetricDescriptor[],
    results: MetricResults,
  ): Promise<string> {
    const timestamp = this.clock();
    // resolved before the first await so the caller's frames are still on the stack
    const origin = this.ids.originFor(testCases, this.idOptions);
    const doc = buildRecordDocument({ testCases, metrics, results, timestamp, origin });

    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      doc.timestamp = timestamp + attempt;
      const resultId = this.ids.generate(doc.timestamp, origin);
      const path = this.pathFor(resultId);

      try {
        await writeFile(path, stringifyRecordDocument(doc), { encoding: 'utf-8', flag: 'wx' });
        return resultId;
      } catch (e) {
        if (errorCode(e) === 'EEXIST') continue;
        const error = toError(e);
        // `wx` means any file at `path` now was created by this attempt
        const leftover = await rm(path, { force: true }).then(
          () => null,
          (cleanupError: unknown) => toError(cleanupError),
        );
        const suffix = leftover ? ` (partial file not removed: ${leftover.message})` : '';
        throw new PersistenceError(
          `Could not write results '${resultId}': ${error.message}${suffix}`,
          { cause: error },
        );
      }
    }

    throw new PersistenceError(
      `Could not allocate a unique result id in '${this.storageDir}' after ${MAX_ID_ATTEMPTS} attempts`,
    );
  }

  async load(resultId: string): Promise<EvaluationRecord> {
    if (!isFileStem(resultId)) {
      throw new NotFoundError(resultId);
    }

    let text: string;
    try {
      text = await readFile(this.pathFor(resultId), 'utf-8');
    } catch (e) {
      if (errorCode(e) === 'ENOENT') {
        throw new NotFoundError(resultId);
      }
      const error = toError(e);
      throw new PersistenceError(`Could not read results '${resultId}': ${error.message}`, {
        cause: error,
      });
    }

    return parseRecordText(text, resultId);
  }

  /**
   * Identifiers of every record under the storage root, sorted.
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.storageDir);
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return [];
      const error = toError(e);
      throw new PersistenceError(
        `Could not list storage directory '${this.storageDir}': ${error.message}`,
        { cause: error },
      );
    }

    return entries
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }

  private pathFor(resultId: string): string {
    return join(this.storageDir, `${resultId}.json`);
  }
}

function isFileStem(resultId: string): boolean {
  return (
    resultId.length > 0 &&
    !resultId.includes('/') &&
    !resultId.includes('\\') &&
    resultId !== '.' &&
    resultId !== '..'
  );
}

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}
