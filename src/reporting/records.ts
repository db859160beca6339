import pLimit from 'p-limit';
import type { LocalStorage } from '../storage/local.js';
import type { EvaluationRecord } from '../types.js';
import { recordToRows, type ResultRow } from './rows.js';

export interface ReadRecordsOptions {
  /** Maximum number of files read in parallel. Defaults to 8. */
  maxConcurrency?: number;
}

/**
 * Load every record under a local storage root, oldest first.
 * A corrupt record rejects the whole scan with PersistenceError.
 */
export async function readRecords(
  storage: LocalStorage,
  opts?: ReadRecordsOptions,
): Promise<EvaluationRecord[]> {
  const limit = pLimit(opts?.maxConcurrency ?? 8);
  const ids = await storage.list();
  const records = await Promise.all(ids.map((id) => limit(() => storage.load(id))));
  return records.sort(
    (a, b) => a.timestamp - b.timestamp || a.resultId.localeCompare(b.resultId),
  );
}

/**
 * Load every record under a local storage root as report rows.
 */
export async function readResultRows(
  storage: LocalStorage,
  opts?: ReadRecordsOptions,
): Promise<ResultRow[]> {
  const records = await readRecords(storage, opts);
  return records.flatMap(recordToRows);
}
