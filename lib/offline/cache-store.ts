// Offline Core - Cache Store
// Strategy-driven reads over a persistent key-value namespace plus the metadata tracker
//
// Strategy:
//   cacheFirst           → fresh hit served from cache, otherwise fetch + store
//   networkFirst         → fetch + store, fall back to any cached value on failure
//   cacheOnly            → cached value or CacheMissError, never fetches
//   networkOnly          → fetch only, cache untouched
//   staleWhileRevalidate → cached value now, refresh in the background

import type { CacheMetadata } from '../../types';

import type { CachePolicy } from './config';
import { CacheMissError, NetworkError, isOfflineError, toErrorMessage } from './errors';
import type { KeyValueStore } from './key-value-store';
import { createLogger, type Logger } from './logger';
import { MetadataTracker, isMetadataExpired, type RecordWriteOptions } from './metadata-tracker';

// ============================================================================
// TYPES
// ============================================================================

export type Fetcher<T> = (key: string) => Promise<T>;

export interface CachedResult<T> {
  value: T;
  /** Where the returned value came from */
  source: 'cache' | 'network';
  /** True when a cached value past its expiry was returned */
  stale: boolean;
}

export interface FetchOptions<T> {
  /** Narrows a cached value back to T; values are returned as stored when omitted */
  parse?: (raw: unknown) => T;
  /** Called after a background refresh has been stored */
  onRevalidate?: (value: T) => void;
}

export interface CacheLimits {
  maxBytes: number;
  maxEntries: number;
}

export interface CacheStoreOptions {
  /** TTL applied when a policy carries none, in ms */
  defaultTtl?: number;
  logger?: Logger;
  sizeEstimator?: (value: unknown) => number;
}

interface CacheLookup {
  value: unknown;
  metadata: CacheMetadata | undefined;
}

// ============================================================================
// SIZE ESTIMATION
// ============================================================================

const encoder = new TextEncoder();

/**
 * Estimated payload size in bytes: raw bytes, UTF-8 strings, JSON for everything else
 */
export function estimateSize(value: unknown): number {
  if (value instanceof Uint8Array) return value.byteLength;
  if (value instanceof ArrayBuffer) return value.byteLength;
  if (typeof value === 'string') return encoder.encode(value).length;

  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(value);
  } catch {
    // Cycles and BigInt cannot be serialized; fall back to the string form
    serialized = String(value);
  }
  return serialized === undefined ? 0 : encoder.encode(serialized).length;
}

/**
 * Eviction order: lowest accessCount first, then least recently accessed, then key
 */
export function compareForEviction(a: CacheMetadata, b: CacheMetadata): number {
  if (a.accessCount !== b.accessCount) return a.accessCount - b.accessCount;
  if (a.lastAccessedAt !== b.lastAccessedAt) return a.lastAccessedAt - b.lastAccessedAt;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

// ============================================================================
// CACHE STORE CLASS
// ============================================================================

export class CacheStore {
  private readonly logger: Logger;
  private readonly defaultTtl: number | undefined;
  private readonly sizeEstimator: (value: unknown) => number;

  /** Tail of the write chain per key */
  private readonly keyLocks = new Map<string, Promise<void>>();

  /** Background refreshes in flight, one per key */
  private readonly revalidations = new Map<string, Promise<void>>();

  constructor(
    private readonly values: KeyValueStore<unknown>,
    private readonly tracker: MetadataTracker,
    options: CacheStoreOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('CacheStore');
    this.defaultTtl = options.defaultTtl;
    this.sizeEstimator = options.sizeEstimator ?? estimateSize;
  }

  /**
   * Reads a key through the given policy
   */
  async fetch<T>(
    key: string,
    policy: CachePolicy,
    fetcher: Fetcher<T>,
    options: FetchOptions<T> = {}
  ): Promise<CachedResult<T>> {
    const ttl = policy.ttl ?? this.defaultTtl;

    switch (policy.strategy) {
      case 'cacheFirst': {
        const cached = await this.lookup(key);
        if (cached && !this.isStale(cached)) {
          return this.serveCached(key, cached, false, options);
        }
        return this.fetchAndStore(key, fetcher, ttl);
      }

      case 'networkFirst':
        return this.networkWithFallback(key, fetcher, ttl, options);

      case 'cacheOnly': {
        const cached = await this.lookup(key);
        if (!cached) {
          throw new CacheMissError(key);
        }
        return this.serveCached(key, cached, this.isStale(cached), options);
      }

      case 'networkOnly':
        return { value: await fetcher(key), source: 'network', stale: false };

      case 'staleWhileRevalidate': {
        const cached = await this.lookup(key);
        if (!cached) {
          return this.networkWithFallback(key, fetcher, ttl, options);
        }
        const result = await this.serveCached(key, cached, this.isStale(cached), options);
        this.revalidateInBackground(key, fetcher, ttl, options.onRevalidate);
        return result;
      }
    }
  }

  /**
   * Returns the cached value (any freshness) and records the access
   */
  async read<T = unknown>(key: string, parse?: (raw: unknown) => T): Promise<T | undefined> {
    const cached = await this.lookup(key);
    if (!cached) return undefined;
    await this.tracker.recordAccess(key);
    return toValue(cached.value, parse);
  }

  /**
   * Stores a value and its metadata together. Writes to one key are serialized.
   */
  async write(key: string, value: unknown, options: RecordWriteOptions = {}): Promise<CacheMetadata> {
    const ttl = options.ttl ?? this.defaultTtl;
    return this.withKeyLock(key, async () => {
      await this.values.put(key, value);
      try {
        return await this.tracker.recordWrite(key, this.sizeEstimator(value), { ...options, ttl });
      } catch (error) {
        // Never leave a value without metadata
        await this.values.delete(key);
        throw error;
      }
    });
  }

  /**
   * Deletes value and metadata; idempotent
   */
  async remove(key: string): Promise<void> {
    await this.withKeyLock(key, async () => {
      await this.values.delete(key);
      await this.tracker.remove(key);
    });
  }

  async has(key: string): Promise<boolean> {
    return (await this.values.get(key)) !== undefined;
  }

  async keys(): Promise<string[]> {
    return this.values.keys();
  }

  async clear(): Promise<void> {
    await this.values.clear();
    await this.tracker.clear();
  }

  /**
   * Removes every expired entry, plus values left without metadata
   * Returns the evicted keys
   */
  async purgeExpired(): Promise<string[]> {
    const now = Date.now();
    const allMetadata = await this.tracker.list();
    const tracked = new Set(allMetadata.map((m) => m.key));

    const expired = allMetadata.filter((m) => isMetadataExpired(m, now)).map((m) => m.key);
    const orphans = (await this.values.keys()).filter((key) => !tracked.has(key));

    const evicted: string[] = [];
    for (const key of [...expired, ...orphans]) {
      if (await this.evictIfStale(key)) {
        evicted.push(key);
      }
    }

    if (evicted.length > 0) {
      this.logger.debug(`Purged ${evicted.length} expired or orphaned entries`);
    }
    return evicted;
  }

  /**
   * Evicts the least used entries until both limits hold
   * Returns the evicted keys
   */
  async enforceLimits(limits: CacheLimits): Promise<string[]> {
    const candidates = (await this.tracker.list()).sort(compareForEviction);

    let totalBytes = candidates.reduce((sum, m) => sum + m.sizeInBytes, 0);
    let totalEntries = candidates.length;
    const evicted: string[] = [];

    for (const metadata of candidates) {
      if (totalBytes <= limits.maxBytes && totalEntries <= limits.maxEntries) break;
      await this.remove(metadata.key);
      evicted.push(metadata.key);
      totalBytes -= metadata.sizeInBytes;
      totalEntries -= 1;
    }

    if (evicted.length > 0) {
      this.logger.info(`Evicted ${evicted.length} entries to stay within cache limits`, {
        maxBytes: limits.maxBytes,
        maxEntries: limits.maxEntries,
      });
    }
    return evicted;
  }

  /**
   * Resolves once every background refresh started so far has settled
   */
  async whenIdle(): Promise<void> {
    await Promise.all(Array.from(this.revalidations.values()));
  }

  // ============================================================================
  // PRIVATE HELPER METHODS
  // ============================================================================

  private async lookup(key: string): Promise<CacheLookup | null> {
    const value = await this.values.get(key);
    if (value === undefined) return null;
    return { value, metadata: await this.tracker.get(key) };
  }

  /**
   * Re-checks a purge candidate under its key lock, so a write that finished
   * after the candidate list was built keeps its entry
   */
  private async evictIfStale(key: string): Promise<boolean> {
    return this.withKeyLock(key, async () => {
      const metadata = await this.tracker.get(key);
      if (metadata && !isMetadataExpired(metadata)) return false;
      if (!metadata && (await this.values.get(key)) === undefined) return false;

      await this.values.delete(key);
      await this.tracker.remove(key);
      return true;
    });
  }

  private isStale(cached: CacheLookup): boolean {
    // Untracked values cannot prove freshness
    return !cached.metadata || isMetadataExpired(cached.metadata);
  }

  private async serveCached<T>(
    key: string,
    cached: CacheLookup,
    stale: boolean,
    options: FetchOptions<T>
  ): Promise<CachedResult<T>> {
    await this.tracker.recordAccess(key);
    return { value: toValue(cached.value, options.parse), source: 'cache', stale };
  }

  private async fetchAndStore<T>(
    key: string,
    fetcher: Fetcher<T>,
    ttl: number | undefined
  ): Promise<CachedResult<T>> {
    let value: T;
    try {
      value = await fetcher(key);
    } catch (error) {
      throw toNetworkError(key, error);
    }
    await this.write(key, value, { ttl });
    return { value, source: 'network', stale: false };
  }

  private async networkWithFallback<T>(
    key: string,
    fetcher: Fetcher<T>,
    ttl: number | undefined,
    options: FetchOptions<T>
  ): Promise<CachedResult<T>> {
    let value: T;
    try {
      value = await fetcher(key);
    } catch (error) {
      const cached = await this.lookup(key);
      if (!cached) {
        throw toNetworkError(key, error);
      }
      this.logger.debug(`Network failed for ${key}, serving cached value`, {
        error: toErrorMessage(error),
      });
      return this.serveCached(key, cached, this.isStale(cached), options);
    }
    await this.write(key, value, { ttl });
    return { value, source: 'network', stale: false };
  }

  private revalidateInBackground<T>(
    key: string,
    fetcher: Fetcher<T>,
    ttl: number | undefined,
    onRevalidate?: (value: T) => void
  ): void {
    if (this.revalidations.has(key)) return;

    const task = fetcher(key)
      .then(async (value) => {
        await this.write(key, value, { ttl });
        onRevalidate?.(value);
      })
      .catch((error: unknown) => {
        // Cached value already served; the refresh failure is only reported
        this.logger.warn(`Background refresh failed for ${key}`, { error: toErrorMessage(error) });
      })
      .finally(() => {
        this.revalidations.delete(key);
      });

    this.revalidations.set(key, task);
  }

  private async withKeyLock<R>(key: string, action: () => Promise<R>): Promise<R> {
    const previous = this.keyLocks.get(key) ?? Promise.resolve();
    const run = previous.then(action);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.keyLocks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.keyLocks.get(key) === tail) {
        this.keyLocks.delete(key);
      }
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function toNetworkError(key: string, error: unknown): Error {
  if (isOfflineError(error)) return error;
  return new NetworkError(`Fetch failed for ${key}: ${toErrorMessage(error)}`, error, { key });
}

function toValue<T>(raw: unknown, parse?: (raw: unknown) => T): T {
  if (parse) return parse(raw);
  // Values under a key are written by the caller that reads them back
  return raw as T;
}
