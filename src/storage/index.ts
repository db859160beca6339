export type { StorageBackend, StorageKind } from './backend.js';
export { createStorage } from './factory.js';
export type { GeneratedId, IdOptions, IdStrategy } from './identifier.js';
export {
  describeOrigin,
  descriptiveResultId,
  MAX_LABEL_LENGTH,
  opaqueResultId,
  originFromStack,
  ResultIdGenerator,
  toPathSafeLabel,
  UNKNOWN_LABEL,
} from './identifier.js';
export type { LocalStorageOptions } from './local.js';
export { DEFAULT_STORAGE_DIR, LocalStorage } from './local.js';
export type { RemoteStorageOptions } from './remote.js';
export {
  API_KEY_ENV_VAR,
  DEFAULT_API_URL,
  DEFAULT_API_VERSION,
  RemoteStorage,
} from './remote.js';
