// Offline Core - Metadata Tracker
// Single source of truth for cache-entry freshness and usage statistics

import type { CacheMetadata } from '../../types';

import type { KeyValueStore } from './key-value-store';

// ============================================================================
// TYPES
// ============================================================================

export interface MetadataStats {
  totalEntries: number;
  totalBytes: number;
  expiredCount: number;
}

export interface RecordWriteOptions {
  /** Time to live in ms; omitted means the entry never expires */
  ttl?: number;
  etag?: string;
  headers?: Record<string, string>;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/**
 * True iff the metadata has an expiry and now has reached it (boundary included)
 */
export function isMetadataExpired(metadata: CacheMetadata, now: number = Date.now()): boolean {
  return metadata.expiresAt !== null && now >= metadata.expiresAt;
}

/**
 * Age of the entry in ms, never negative even if the clock moved backwards
 */
export function metadataAge(metadata: CacheMetadata, now: number = Date.now()): number {
  return Math.max(0, now - metadata.createdAt);
}

// ============================================================================
// METADATA TRACKER CLASS
// ============================================================================

export class MetadataTracker {
  constructor(private readonly store: KeyValueStore<CacheMetadata>) {}

  /**
   * Creates or replaces the metadata for a key. accessCount restarts at 0.
   */
  async recordWrite(
    key: string,
    sizeInBytes: number,
    options: RecordWriteOptions = {}
  ): Promise<CacheMetadata> {
    const now = Date.now();
    const metadata: CacheMetadata = {
      key,
      createdAt: now,
      expiresAt: options.ttl !== undefined ? now + options.ttl : null,
      sizeInBytes: Math.max(0, Math.round(sizeInBytes)),
      accessCount: 0,
      lastAccessedAt: now,
      ...(options.etag !== undefined && { etag: options.etag }),
      ...(options.headers !== undefined && { headers: { ...options.headers } }),
    };
    await this.store.put(key, metadata);
    return metadata;
  }

  /**
   * Increments accessCount; no-op when the key has no metadata
   */
  async recordAccess(key: string): Promise<CacheMetadata | undefined> {
    const now = Date.now();
    return this.store.update(key, (current) =>
      current
        ? { ...current, accessCount: current.accessCount + 1, lastAccessedAt: now }
        : undefined
    );
  }

  async get(key: string): Promise<CacheMetadata | undefined> {
    return this.store.get(key);
  }

  async isExpired(key: string): Promise<boolean> {
    const metadata = await this.store.get(key);
    return metadata !== undefined && isMetadataExpired(metadata);
  }

  /**
   * Deletes the metadata; idempotent
   */
  async remove(key: string): Promise<void> {
    await this.store.delete(key);
  }

  async list(): Promise<CacheMetadata[]> {
    return this.store.values();
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }

  /**
   * Aggregate figures used for eviction and size-limit decisions
   */
  async stats(): Promise<MetadataStats> {
    const now = Date.now();
    const all = await this.store.values();

    return all.reduce<MetadataStats>(
      (acc, metadata) => ({
        totalEntries: acc.totalEntries + 1,
        totalBytes: acc.totalBytes + metadata.sizeInBytes,
        expiredCount: acc.expiredCount + (isMetadataExpired(metadata, now) ? 1 : 0),
      }),
      { totalEntries: 0, totalBytes: 0, expiredCount: 0 }
    );
  }
}
