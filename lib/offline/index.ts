// Offline Core - Public API
// Cache store, request queue and sync coordinator over an injected key-value store

export * from './errors';
export * from './logger';
export * from './config';

export type { KeyValueStore, KeyValueUpdater, OfflineStore } from './key-value-store';
export { MemoryKeyValueStore, createMemoryOfflineStore } from './memory-store';
export {
  DB_NAME,
  DB_VERSION,
  STORE_NAMES,
  IdbKeyValueStore,
  openOfflineDatabase,
  deleteOfflineDatabase,
  createIndexedDbOfflineStore,
  type OfflineCoreDB,
  type OfflineStoreName,
} from './indexed-db';

export * from './metadata-tracker';
export * from './cache-store';
export * from './request-queue';
export * from './sync-coordinator';
export * from './sync-scheduler';
export * from './offline-fetch';
export * from './offline-support';

export * from '../../types';
