// Offline Core - IndexedDB Store
// Schema: cache_values, cache_metadata, request_queue
// Runs wherever an IndexedDB implementation is installed (browser, or fake-indexeddb under Node)

import { openDB, deleteDB, type DBSchema, type IDBPDatabase, type StoreNames, type StoreValue } from 'idb';

import type { CacheMetadata, OfflineRequest } from '../../types';

import { PersistenceError } from './errors';
import type { KeyValueStore, KeyValueUpdater, OfflineStore } from './key-value-store';
import { createLogger, type Logger } from './logger';

// ============================================================================
// DATABASE SCHEMA
// ============================================================================

/**
 * Current database version
 * Increment this when making schema changes
 */
export const DB_VERSION = 1;

/**
 * Default database name
 */
export const DB_NAME = 'offline-core';

/**
 * IndexedDB schema definition. Keys are out-of-line so the stored values stay opaque.
 */
export interface OfflineCoreDB extends DBSchema {
  cache_values: {
    key: string;
    value: unknown;
  };
  cache_metadata: {
    key: string;
    value: CacheMetadata;
  };
  request_queue: {
    key: string;
    value: OfflineRequest;
  };
}

export type OfflineStoreName = StoreNames<OfflineCoreDB>;

export const STORE_NAMES: readonly OfflineStoreName[] = [
  'cache_values',
  'cache_metadata',
  'request_queue',
];

// ============================================================================
// DATABASE LIFECYCLE
// ============================================================================

/**
 * Opens or creates the database, creating any missing store
 */
export async function openOfflineDatabase(
  name: string = DB_NAME,
  logger: Logger = createLogger('IndexedDB')
): Promise<IDBPDatabase<OfflineCoreDB>> {
  if (typeof indexedDB === 'undefined') {
    throw new PersistenceError('open', new Error('IndexedDB is not available in this environment'));
  }

  logger.debug(`Opening database ${name} version ${DB_VERSION}`);

  try {
    return await openDB<OfflineCoreDB>(name, DB_VERSION, {
      upgrade(db, oldVersion, newVersion) {
        logger.info(`Upgrade triggered: v${oldVersion} → v${newVersion ?? DB_VERSION}`);
        for (const storeName of STORE_NAMES) {
          if (!db.objectStoreNames.contains(storeName)) {
            db.createObjectStore(storeName);
          }
        }
      },
      blocked() {
        logger.warn(`Database ${name} upgrade blocked by an open connection`);
      },
    });
  } catch (error) {
    logger.error(`Failed to open database ${name}`, { error });
    throw new PersistenceError('open', error);
  }
}

/**
 * Deletes the entire database (for testing/reset)
 */
export async function deleteOfflineDatabase(name: string = DB_NAME): Promise<void> {
  try {
    await deleteDB(name);
  } catch (error) {
    throw new PersistenceError('deleteDatabase', error);
  }
}

// ============================================================================
// KEY-VALUE ADAPTER
// ============================================================================

/**
 * KeyValueStore over one object store. Each operation runs in its own transaction.
 */
export class IdbKeyValueStore<Name extends OfflineStoreName>
  implements KeyValueStore<StoreValue<OfflineCoreDB, Name>>
{
  constructor(
    private readonly db: IDBPDatabase<OfflineCoreDB>,
    private readonly storeName: Name
  ) {}

  async get(key: string): Promise<StoreValue<OfflineCoreDB, Name> | undefined> {
    return this.run('get', () => this.db.get(this.storeName, key));
  }

  async put(key: string, value: StoreValue<OfflineCoreDB, Name>): Promise<void> {
    await this.run('put', () => this.db.put(this.storeName, value, key));
  }

  async delete(key: string): Promise<void> {
    await this.run('delete', () => this.db.delete(this.storeName, key));
  }

  async keys(): Promise<string[]> {
    return this.run('keys', () => this.db.getAllKeys(this.storeName));
  }

  async values(): Promise<StoreValue<OfflineCoreDB, Name>[]> {
    return this.run('values', () => this.db.getAll(this.storeName));
  }

  async clear(): Promise<void> {
    await this.run('clear', () => this.db.clear(this.storeName));
  }

  async update(
    key: string,
    updater: KeyValueUpdater<StoreValue<OfflineCoreDB, Name>>
  ): Promise<StoreValue<OfflineCoreDB, Name> | undefined> {
    return this.run('update', async () => {
      const tx = this.db.transaction(this.storeName, 'readwrite');
      const store = tx.objectStore(this.storeName);
      const next = updater(await store.get(key));
      if (next === undefined) {
        await store.delete(key);
      } else {
        await store.put(next, key);
      }
      await tx.done;
      return next;
    });
  }

  private async run<T>(operation: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw new PersistenceError(`${this.storeName}.${operation}`, error);
    }
  }
}

/**
 * Opens the database and exposes its three namespaces as an OfflineStore
 */
export async function createIndexedDbOfflineStore(
  options: { name?: string; logger?: Logger } = {}
): Promise<OfflineStore> {
  const db = await openOfflineDatabase(options.name, options.logger);

  return {
    cache: new IdbKeyValueStore(db, 'cache_values'),
    metadata: new IdbKeyValueStore(db, 'cache_metadata'),
    queue: new IdbKeyValueStore(db, 'request_queue'),
    async close() {
      db.close();
    },
  };
}
