// Offline Core - In-Memory Store
// Map-backed KeyValueStore for tests and hosts without durable storage
// Values are structured-cloned in and out, as IndexedDB does

import type { CacheMetadata, OfflineRequest } from '../../types';

import type { KeyValueStore, KeyValueUpdater, OfflineStore } from './key-value-store';

export class MemoryKeyValueStore<V> implements KeyValueStore<V> {
  private readonly entries = new Map<string, V>();

  async get(key: string): Promise<V | undefined> {
    const value = this.entries.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async put(key: string, value: V): Promise<void> {
    this.entries.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.entries.keys());
  }

  async values(): Promise<V[]> {
    return Array.from(this.entries.values(), (value) => structuredClone(value));
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  // Runs synchronously between awaits, so no other caller can interleave
  async update(key: string, updater: KeyValueUpdater<V>): Promise<V | undefined> {
    const current = this.entries.get(key);
    const next = updater(current === undefined ? undefined : structuredClone(current));
    if (next === undefined) {
      this.entries.delete(key);
      return undefined;
    }
    this.entries.set(key, structuredClone(next));
    return structuredClone(next);
  }

  get size(): number {
    return this.entries.size;
  }
}

export function createMemoryOfflineStore(): OfflineStore {
  return {
    cache: new MemoryKeyValueStore<unknown>(),
    metadata: new MemoryKeyValueStore<CacheMetadata>(),
    queue: new MemoryKeyValueStore<OfflineRequest>(),
  };
}
