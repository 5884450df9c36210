// Offline Core - Persistence Contract
// Key-value surface shared by the cache, metadata tracker and request queue

import type { CacheMetadata, OfflineRequest } from '../../types';

/**
 * Receives the current value (or undefined) and returns the next one.
 * Returning undefined deletes the key.
 */
export type KeyValueUpdater<V> = (current: V | undefined) => V | undefined;

/**
 * Persistent key-value namespace.
 * Every put, delete and update is atomic per key.
 */
export interface KeyValueStore<V> {
  get(key: string): Promise<V | undefined>;
  put(key: string, value: V): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
  values(): Promise<V[]>;
  clear(): Promise<void>;
  /**
   * Read-modify-write in a single atomic step.
   * Resolves with the value that was stored, or undefined if the key was deleted.
   */
  update(key: string, updater: KeyValueUpdater<V>): Promise<V | undefined>;
}

/**
 * The three independent namespaces used by the offline core
 */
export interface OfflineStore {
  cache: KeyValueStore<unknown>;
  metadata: KeyValueStore<CacheMetadata>;
  queue: KeyValueStore<OfflineRequest>;
  /** Releases underlying resources (connections, handles) */
  close?(): Promise<void>;
}
