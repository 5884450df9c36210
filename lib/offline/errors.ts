// Offline Core - Error Handling
// Error codes, typed error classes and helpers for cache, queue and sync failures

// =============================================================================
// Error Code Enum (for runtime use)
// =============================================================================

/**
 * Error codes raised by the offline core
 *
 * @example
 * ```typescript
 * try {
 *   await cache.fetch('profile', CachePolicies.cacheOnly(), loadProfile);
 * } catch (error) {
 *   if (isOfflineError(error) && error.code === OfflineErrorCodes.CACHE_MISS) {
 *     showPlaceholder();
 *   }
 * }
 * ```
 */
export enum OfflineErrorCodes {
  CACHE_MISS = 'CACHE_MISS',
  NETWORK_ERROR = 'NETWORK_ERROR',
  QUEUE_FULL = 'QUEUE_FULL',
  CONFIG_VALIDATION = 'CONFIG_VALIDATION',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  CONFLICT_UNRESOLVED = 'CONFLICT_UNRESOLVED',
  INVALID_REQUEST = 'INVALID_REQUEST',
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
}

// =============================================================================
// Error Messages (Default messages for each error code)
// =============================================================================

export const OFFLINE_ERROR_MESSAGES: Record<OfflineErrorCodes, string> = {
  [OfflineErrorCodes.CACHE_MISS]: 'No cached data',
  [OfflineErrorCodes.NETWORK_ERROR]: 'Network request failed',
  [OfflineErrorCodes.QUEUE_FULL]: 'Request queue is full',
  [OfflineErrorCodes.CONFIG_VALIDATION]: 'Invalid offline configuration',
  [OfflineErrorCodes.PERSISTENCE_ERROR]: 'Persistent store operation failed',
  [OfflineErrorCodes.CONFLICT_UNRESOLVED]: 'Conflict awaiting user resolution',
  [OfflineErrorCodes.INVALID_REQUEST]: 'Invalid offline request',
  [OfflineErrorCodes.RETRIES_EXHAUSTED]: 'Request ran out of retries',
};

// =============================================================================
// Error Classes
// =============================================================================

export class OfflineError extends Error {
  readonly code: OfflineErrorCodes;
  readonly details: Record<string, unknown>;

  constructor(
    code: OfflineErrorCodes,
    message?: string,
    details: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message || OFFLINE_ERROR_MESSAGES[code], cause !== undefined ? { cause } : undefined);
    this.name = 'OfflineError';
    this.code = code;
    this.details = details;
  }
}

export class CacheMissError extends OfflineError {
  readonly key: string;

  constructor(key: string) {
    super(OfflineErrorCodes.CACHE_MISS, `No cached data for key: ${key}`, { key });
    this.name = 'CacheMissError';
    this.key = key;
  }
}

export class NetworkError extends OfflineError {
  constructor(message?: string, cause?: unknown, details: Record<string, unknown> = {}) {
    super(OfflineErrorCodes.NETWORK_ERROR, message, details, cause);
    this.name = 'NetworkError';
  }
}

export class QueueFullError extends OfflineError {
  readonly maxQueueSize: number;

  constructor(maxQueueSize: number) {
    super(
      OfflineErrorCodes.QUEUE_FULL,
      `Request queue is full (max ${maxQueueSize} requests)`,
      { maxQueueSize }
    );
    this.name = 'QueueFullError';
    this.maxQueueSize = maxQueueSize;
  }
}

/**
 * One offending configuration field
 */
export interface ConfigFieldIssue {
  field: string;
  message: string;
}

export class ConfigValidationError extends OfflineError {
  readonly fields: ConfigFieldIssue[];

  constructor(fields: ConfigFieldIssue[]) {
    super(
      OfflineErrorCodes.CONFIG_VALIDATION,
      `Invalid offline configuration: ${fields.map((f) => `${f.field} (${f.message})`).join(', ')}`,
      { fields }
    );
    this.name = 'ConfigValidationError';
    this.fields = fields;
  }
}

export class PersistenceError extends OfflineError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(
      OfflineErrorCodes.PERSISTENCE_ERROR,
      `Persistent store ${operation} failed: ${toErrorMessage(cause)}`,
      { operation },
      cause
    );
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export class ConflictUnresolvedError extends OfflineError {
  readonly requestId: string;

  constructor(requestId: string) {
    super(OfflineErrorCodes.CONFLICT_UNRESOLVED, undefined, { requestId });
    this.name = 'ConflictUnresolvedError';
    this.requestId = requestId;
  }
}

export class InvalidRequestError extends OfflineError {
  constructor(issues: ConfigFieldIssue[]) {
    super(
      OfflineErrorCodes.INVALID_REQUEST,
      `Invalid offline request: ${issues.map((i) => `${i.field} (${i.message})`).join(', ')}`,
      { issues }
    );
    this.name = 'InvalidRequestError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isOfflineError(error: unknown): error is OfflineError {
  return error instanceof OfflineError;
}

/**
 * Extracts a readable message from anything thrown
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error === undefined) return 'Unknown error';
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
