// Offline Core - Shared Types
// Domain types shared by the cache, request queue and sync coordinator

// ============================================================================
// CACHE
// ============================================================================

/**
 * Read strategies supported by the cache store
 */
export type CacheStrategy =
  | 'cacheFirst'
  | 'networkFirst'
  | 'cacheOnly'
  | 'networkOnly'
  | 'staleWhileRevalidate';

/**
 * Freshness and usage statistics for one cache key
 */
export interface CacheMetadata {
  key: string;
  createdAt: number;
  expiresAt: number | null;
  sizeInBytes: number;
  accessCount: number;
  lastAccessedAt: number;
  etag?: string;
  headers?: Record<string, string>;
}

/**
 * Raw cached value. Opaque to the core, keyed identically to its metadata.
 */
export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
}

// ============================================================================
// REQUEST QUEUE
// ============================================================================

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const REQUEST_PRIORITIES = ['high', 'normal', 'low'] as const;
export type RequestPriority = (typeof REQUEST_PRIORITIES)[number];

/**
 * Server side of a promptUser conflict, kept on the request until resolveConflict
 */
export interface PendingConflict {
  serverBody?: unknown;
  message?: string;
  detectedAt: number;
}

/**
 * A mutation waiting for the network
 */
export interface OfflineRequest {
  id: string;
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  createdAt: number;
  /** Enqueue counter, breaks createdAt ties */
  sequence: number;
  priority: RequestPriority;
  retryCount: number;
  lastError?: string;
  lastAttemptAt?: number;
  nextRetryAt?: number;
  /** Re-submit with the executor's force flag (client wins) */
  force?: boolean;
  /** Set while the request waits for resolveConflict; sync passes skip it */
  conflict?: PendingConflict;
  metadata?: Record<string, unknown>;
}

/**
 * Input accepted by RequestQueue.enqueue; counters are filled in by the queue
 */
export interface OfflineRequestDraft {
  id?: string;
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  createdAt?: number;
  priority?: RequestPriority;
  metadata?: Record<string, unknown>;
}

// ============================================================================
// NETWORK EXECUTOR
// ============================================================================

export interface ExecutorRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  /** Ask the server to overwrite its state (conflict resolution) */
  force: boolean;
}

export type ExecutorResult =
  | { status: 'success'; body?: unknown }
  | { status: 'error'; error: string; code?: string | number; retryable?: boolean }
  | { status: 'conflict'; serverBody?: unknown; message?: string };

export type NetworkExecutor = (request: ExecutorRequest) => Promise<ExecutorResult>;

// ============================================================================
// CONNECTIVITY
// ============================================================================

export type ConnectionType = 'wifi' | 'cellular' | 'ethernet' | 'none';

export interface BatteryStatus {
  charging: boolean;
  /** 0-100 */
  level: number;
}

export interface ConnectivitySignal {
  getConnectionType(): Promise<ConnectionType>;
  getBatteryStatus?(): Promise<BatteryStatus>;
}

// ============================================================================
// SYNC
// ============================================================================

export type ConflictResolution = 'serverWins' | 'clientWins' | 'merge' | 'promptUser';

export type MergeFunction = (clientBody: unknown, serverBody: unknown) => unknown | Promise<unknown>;

export type SyncResultCode =
  | 'SYNC_IN_PROGRESS'
  | 'POLICY_CONSTRAINT_UNMET'
  | 'NO_CONNECTIVITY'
  | 'PERSISTENCE_ERROR'
  | 'SYNC_ERROR';

export interface SyncError {
  requestId: string;
  code: string;
  message: string;
}

/**
 * A request held back by the promptUser policy until resolveConflict settles it
 */
export interface SuspendedRequest {
  requestId: string;
  code: 'CONFLICT_UNRESOLVED';
  clientBody?: unknown;
  serverBody?: unknown;
  message?: string;
}

export interface SyncResult {
  readonly success: boolean;
  readonly syncedCount: number;
  readonly failedCount: number;
  readonly exhaustedCount: number;
  readonly deferredCount: number;
  readonly evictedCount: number;
  readonly suspended: readonly SuspendedRequest[];
  readonly errors: readonly SyncError[];
  readonly cancelled: boolean;
  readonly code?: SyncResultCode;
  readonly errorMessage?: string;
  readonly timestamp: number;
}
