// Offline Core - Configuration & Policies
// OfflineConfig presets, cache policies and sync policies, validated with zod

import { z } from 'zod';

import type { CacheStrategy, ConflictResolution } from '../../types';

import { ConfigValidationError, type ConfigFieldIssue } from './errors';
import type { LogLevel } from './logger';

// ============================================================================
// CONSTANTS
// ============================================================================

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;

export const BYTES_PER_MB = 1024 * 1024;

// ============================================================================
// OFFLINE CONFIG
// ============================================================================

const nonNegativeInt = z.number().int().min(0, 'Must be a non-negative integer');
const positiveDuration = z.number().finite().positive('Must be greater than 0');

export const offlineConfigSchema = z
  .object({
    // Cache
    maxCacheSizeInMB: z.number().finite().min(0, 'Must be non-negative'),
    maxCacheEntries: nonNegativeInt,
    cacheDuration: z.number().finite().min(0, 'Must be non-negative'),
    // Retry
    maxRetries: nonNegativeInt,
    retryDelay: positiveDuration,
    retryMultiplier: z.number().finite().min(1, 'Must be at least 1'),
    maxRetryDelay: positiveDuration,
    retryJitter: z.number().min(0, 'Must be at least 0').lt(1, 'Must be below 1'),
    // Queue
    maxQueueSize: nonNegativeInt,
    queuePersistence: z.boolean(),
    // Sync
    syncInterval: positiveDuration,
    syncTimeout: positiveDuration,
    requestTimeout: positiveDuration,
    enableAutoSync: z.boolean(),
    syncOnReconnect: z.boolean(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.maxRetryDelay < config.retryDelay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxRetryDelay'],
        message: 'Must be greater than or equal to retryDelay',
      });
    }
  });

export type OfflineConfig = Readonly<z.infer<typeof offlineConfigSchema>>;

export type OfflineConfigPreset = 'development' | 'production';

const DEVELOPMENT_DEFAULTS: z.infer<typeof offlineConfigSchema> = {
  maxCacheSizeInMB: 50,
  maxCacheEntries: 1000,
  cacheDuration: HOUR,
  maxRetries: 3,
  retryDelay: SECOND,
  retryMultiplier: 2,
  maxRetryDelay: 30 * SECOND,
  retryJitter: 0,
  maxQueueSize: 100,
  queuePersistence: true,
  syncInterval: MINUTE,
  syncTimeout: 2 * MINUTE,
  requestTimeout: 30 * SECOND,
  enableAutoSync: true,
  syncOnReconnect: true,
  logLevel: 'debug' satisfies LogLevel,
};

const PRODUCTION_DEFAULTS: z.infer<typeof offlineConfigSchema> = {
  maxCacheSizeInMB: 100,
  maxCacheEntries: 5000,
  cacheDuration: 24 * HOUR,
  maxRetries: 5,
  retryDelay: 2 * SECOND,
  retryMultiplier: 2,
  maxRetryDelay: MINUTE,
  retryJitter: 0.1,
  maxQueueSize: 500,
  queuePersistence: true,
  syncInterval: 15 * MINUTE,
  syncTimeout: 5 * MINUTE,
  requestTimeout: 30 * SECOND,
  enableAutoSync: true,
  syncOnReconnect: true,
  logLevel: 'warn' satisfies LogLevel,
};

/**
 * Converts zod issues into the field list carried by ConfigValidationError
 */
export function toFieldIssues(error: z.ZodError): ConfigFieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Builds a validated, frozen configuration.
 * Throws ConfigValidationError listing every offending field.
 */
export function createOfflineConfig(
  overrides: Partial<OfflineConfig> = {},
  preset: OfflineConfigPreset = 'production'
): OfflineConfig {
  const base = preset === 'development' ? DEVELOPMENT_DEFAULTS : PRODUCTION_DEFAULTS;
  const parsed = offlineConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    throw new ConfigValidationError(toFieldIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

export function developmentConfig(overrides: Partial<OfflineConfig> = {}): OfflineConfig {
  return createOfflineConfig(overrides, 'development');
}

export function productionConfig(overrides: Partial<OfflineConfig> = {}): OfflineConfig {
  return createOfflineConfig(overrides, 'production');
}

/**
 * Cache byte budget derived from maxCacheSizeInMB
 */
export function maxCacheBytes(config: OfflineConfig): number {
  return Math.floor(config.maxCacheSizeInMB * BYTES_PER_MB);
}

// ============================================================================
// CACHE POLICY
// ============================================================================

export const CACHE_STRATEGIES = [
  'cacheFirst',
  'networkFirst',
  'cacheOnly',
  'networkOnly',
  'staleWhileRevalidate',
] as const satisfies readonly CacheStrategy[];

const cachePolicySchema = z.object({
  strategy: z.enum(CACHE_STRATEGIES),
  ttl: z.number().finite().min(0, 'Must be non-negative').optional(),
});

export interface CachePolicy {
  readonly strategy: CacheStrategy;
  /** Time to live for entries written by this read, in ms */
  readonly ttl?: number;
}

export function createCachePolicy(strategy: CacheStrategy, ttl?: number): CachePolicy {
  const parsed = cachePolicySchema.safeParse({ strategy, ttl });
  if (!parsed.success) {
    throw new ConfigValidationError(toFieldIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

export const CachePolicies = {
  cacheFirst: (ttl?: number) => createCachePolicy('cacheFirst', ttl),
  networkFirst: (ttl?: number) => createCachePolicy('networkFirst', ttl),
  cacheOnly: () => createCachePolicy('cacheOnly'),
  networkOnly: () => createCachePolicy('networkOnly'),
  staleWhileRevalidate: (ttl?: number) => createCachePolicy('staleWhileRevalidate', ttl),
} as const;

// ============================================================================
// SYNC POLICY
// ============================================================================

const syncPolicySchema = z
  .object({
    conflictResolution: z.enum(['serverWins', 'clientWins', 'merge', 'promptUser']),
    syncOnlyOnWifi: z.boolean(),
    syncOnlyWhenCharging: z.boolean(),
  })
  .strict();

export interface SyncPolicy {
  readonly conflictResolution: ConflictResolution;
  readonly syncOnlyOnWifi: boolean;
  readonly syncOnlyWhenCharging: boolean;
}

export const DEFAULT_SYNC_POLICY: SyncPolicy = Object.freeze({
  conflictResolution: 'serverWins',
  syncOnlyOnWifi: false,
  syncOnlyWhenCharging: false,
});

export function createSyncPolicy(overrides: Partial<SyncPolicy> = {}): SyncPolicy {
  const parsed = syncPolicySchema.safeParse({ ...DEFAULT_SYNC_POLICY, ...overrides });
  if (!parsed.success) {
    throw new ConfigValidationError(toFieldIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}
