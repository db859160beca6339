import type { StorageConfig } from '../config.js';
import type { StorageBackend } from './backend.js';
import { LocalStorage } from './local.js';
import { RemoteStorage } from './remote.js';

/**
 * Build the backend selected by an already-resolved configuration.
 */
export function createStorage(
  config: StorageConfig,
  opts?: { fetch?: typeof fetch },
): StorageBackend {
  switch (config.saveMode) {
    case 'local':
      return new LocalStorage(config.localSaveDir, { idStrategy: config.idStrategy });
    case 'cloud':
      return new RemoteStorage({
        apiKey: config.apiKey,
        baseUrl: config.apiUrl,
        apiVersion: config.apiVersion,
        timeoutMs: config.timeoutMs ?? undefined,
        // the key is already resolved; do not consult process.env again
        env: {},
        fetch: opts?.fetch,
      });
  }
}
