/**
 * The contract shared by every storage backend.
 */

import type {
  EvaluationRecord,
  LLMTestCase,
  MetricDescriptor,
  MetricResults,
} from '../types.js';

export type StorageKind = 'local' | 'remote';

/**
 * Persists evaluation records and loads them back by identifier.
 *
 * Implemented by exactly two classes, `LocalStorage` and `RemoteStorage`,
 * told apart by `kind`.
 */
export interface StorageBackend {
  readonly kind: StorageKind;

  /**
   * Persist one new record and resolve to its identifier.
   *
   * Rejects with PersistenceError when the medium refuses the write or the
   * inputs cannot form a valid record.
   */
  save(
    testCases: LLMTestCase[],
    metrics: MetricDescriptor[],
    results: MetricResults,
  ): Promise<string>;

  /**
   * Load a record. Rejects with NotFoundError when nothing is stored under
   * `resultId`, and with PersistenceError on read failures or corrupt data.
   */
  load(resultId: string): Promise<EvaluationRecord>;
}
