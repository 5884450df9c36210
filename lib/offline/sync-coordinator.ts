// Offline Core - Sync Coordinator
// Drains the request queue against the injected executor with exponential backoff,
// resolves conflicts per SyncPolicy and garbage-collects the cache after each pass

import type {
  ConnectivitySignal,
  ExecutorRequest,
  ExecutorResult,
  MergeFunction,
  NetworkExecutor,
  OfflineRequest,
  PendingConflict,
  SuspendedRequest,
  SyncError,
  SyncResult,
  SyncResultCode,
} from '../../types';

import type { CacheStore } from './cache-store';
import { DEFAULT_SYNC_POLICY, maxCacheBytes, type OfflineConfig, type SyncPolicy } from './config';
import { InvalidRequestError, OfflineErrorCodes, PersistenceError, toErrorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { shouldRetry, type RequestQueue } from './request-queue';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * 4xx codes that still deserve a retry (timeout, rate limit)
 */
export const RETRYABLE_CLIENT_CODES = [408, 429];

export type RetryConfig = Pick<OfflineConfig, 'retryDelay' | 'retryMultiplier' | 'maxRetryDelay' | 'retryJitter'>;

/**
 * Calculates retry delay with exponential backoff and jitter:
 * min(retryDelay * retryMultiplier^retryCount, maxRetryDelay) ± retryJitter
 *
 * @param retryCount - Failed attempts before the one just recorded
 * @param random - Source in [0, 1), replaceable for deterministic tests
 */
export function calculateRetryDelay(
  retryCount: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const baseDelay = Math.min(
    config.retryDelay * Math.pow(config.retryMultiplier, retryCount),
    config.maxRetryDelay
  );

  const jitter = baseDelay * config.retryJitter * (random() * 2 - 1);

  return Math.max(0, Math.round(baseDelay + jitter));
}

/**
 * Determines if an error code is retryable.
 * 4xx client errors are not, except 408 and 429. Unknown and 5xx codes are.
 */
export function isRetryableError(errorCode?: string | number): boolean {
  if (errorCode === undefined) return true;

  const code = typeof errorCode === 'string' ? parseInt(errorCode, 10) : errorCode;

  if (!isNaN(code) && code >= 400 && code < 500) {
    return RETRYABLE_CLIENT_CODES.includes(code);
  }

  return true;
}

// ============================================================================
// TYPES
// ============================================================================

export type ConflictChoice = 'server' | 'client' | 'merge';

export type SyncCompleteListener = (result: SyncResult) => void;

export interface SyncCoordinatorOptions {
  queue: RequestQueue;
  executor: NetworkExecutor;
  config: OfflineConfig;
  /** Garbage-collected after each pass when given */
  cache?: CacheStore;
  syncPolicy?: SyncPolicy;
  connectivity?: ConnectivitySignal;
  mergeFn?: MergeFunction;
  logger?: Logger;
  /** Jitter source */
  random?: () => number;
}

interface PassTally {
  syncedCount: number;
  failedCount: number;
  exhaustedCount: number;
  deferredCount: number;
  suspended: SuspendedRequest[];
  errors: SyncError[];
  cancelled: boolean;
}

interface PassAbort {
  code: SyncResultCode;
  message: string;
}

type FailureCause = Extract<ExecutorResult, { status: 'error' }>;

// ============================================================================
// SYNC RESULT HELPERS
// ============================================================================

function emptyTally(): PassTally {
  return {
    syncedCount: 0,
    failedCount: 0,
    exhaustedCount: 0,
    deferredCount: 0,
    suspended: [],
    errors: [],
    cancelled: false,
  };
}

function buildResult(
  tally: PassTally,
  extra: { success: boolean; evictedCount?: number; code?: SyncResultCode; errorMessage?: string }
): SyncResult {
  return Object.freeze({
    success: extra.success,
    syncedCount: tally.syncedCount,
    failedCount: tally.failedCount,
    exhaustedCount: tally.exhaustedCount,
    deferredCount: tally.deferredCount,
    evictedCount: extra.evictedCount ?? 0,
    suspended: Object.freeze([...tally.suspended]),
    errors: Object.freeze([...tally.errors]),
    cancelled: tally.cancelled,
    ...(extra.code !== undefined && { code: extra.code }),
    ...(extra.errorMessage !== undefined && { errorMessage: extra.errorMessage }),
    timestamp: Date.now(),
  });
}

function abortedResult(abort: PassAbort, tally: PassTally = emptyTally()): SyncResult {
  return buildResult(tally, { success: false, code: abort.code, errorMessage: abort.message });
}

function toExecutorRequest(request: OfflineRequest, overrides: Partial<ExecutorRequest> = {}): ExecutorRequest {
  return {
    method: request.method,
    url: request.url,
    ...(request.headers !== undefined && { headers: request.headers }),
    ...(request.body !== undefined && { body: request.body }),
    force: request.force === true,
    ...overrides,
  };
}

// ============================================================================
// SYNC COORDINATOR CLASS
// ============================================================================

export class SyncCoordinator {
  private readonly queue: RequestQueue;
  private readonly executor: NetworkExecutor;
  private readonly config: OfflineConfig;
  private readonly cache: CacheStore | undefined;
  private readonly policy: SyncPolicy;
  private readonly connectivity: ConnectivitySignal | undefined;
  private readonly mergeFn: MergeFunction | undefined;
  private readonly logger: Logger;
  private readonly random: () => number;

  private readonly listeners = new Set<SyncCompleteListener>();
  private isRunning = false;
  private cancelRequested = false;
  private lastResult: SyncResult | null = null;
  private currentPass: Promise<SyncResult> | null = null;

  constructor(options: SyncCoordinatorOptions) {
    this.queue = options.queue;
    this.executor = options.executor;
    this.config = options.config;
    this.cache = options.cache;
    this.policy = options.syncPolicy ?? DEFAULT_SYNC_POLICY;
    this.connectivity = options.connectivity;
    this.mergeFn = options.mergeFn;
    this.logger = options.logger ?? createLogger('SyncCoordinator');
    this.random = options.random ?? Math.random;
  }

  /**
   * Checks if sync is currently running
   */
  isSyncing(): boolean {
    return this.isRunning;
  }

  getLastResult(): SyncResult | null {
    return this.lastResult;
  }

  /**
   * Asks the running pass to stop before its next request.
   * The request in flight runs to completion.
   */
  cancel(): boolean {
    if (!this.isRunning) return false;
    this.cancelRequested = true;
    return true;
  }

  /**
   * Resolves once the pass in flight, if any, has finished
   */
  async whenIdle(): Promise<void> {
    if (this.currentPass) {
      await this.currentPass;
    }
  }

  onSyncComplete(listener: SyncCompleteListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs one sync pass.
   * Processes queued requests in priority order (high > normal > low), FIFO within a priority.
   * A call made while a pass is running returns at once with SYNC_IN_PROGRESS.
   */
  async sync(): Promise<SyncResult> {
    if (this.isRunning) {
      return abortedResult({ code: 'SYNC_IN_PROGRESS', message: 'Sync is already running' });
    }

    this.isRunning = true;
    this.cancelRequested = false;
    const pass = this.runPass();
    this.currentPass = pass;

    let result: SyncResult;
    try {
      result = await pass;
    } finally {
      this.isRunning = false;
      this.cancelRequested = false;
      this.currentPass = null;
    }

    this.lastResult = result;
    this.emit(result);
    return result;
  }

  /**
   * Settles a request suspended under promptUser and makes it eligible for the next pass.
   *   server → drop the local change
   *   client → resubmit with force
   *   merge  → resubmit mergedBody with force
   * Returns false when the request is no longer queued.
   */
  async resolveConflict(id: string, choice: ConflictChoice, mergedBody?: unknown): Promise<boolean> {
    const existing = await this.queue.get(id);
    if (!existing) return false;

    switch (choice) {
      case 'server':
        await this.queue.remove(id);
        break;
      case 'client':
        await this.queue.update(id, { force: true, nextRetryAt: undefined, conflict: undefined });
        break;
      case 'merge':
        if (mergedBody === undefined) {
          throw new InvalidRequestError([{ field: 'mergedBody', message: 'Required for a merge resolution' }]);
        }
        await this.queue.update(id, { body: mergedBody, force: true, nextRetryAt: undefined, conflict: undefined });
        break;
    }

    this.logger.info(`Conflict on ${id} resolved in favour of ${choice}`);
    return true;
  }

  // ============================================================================
  // PASS
  // ============================================================================

  private async runPass(): Promise<SyncResult> {
    const tally = emptyTally();
    const deadline = Date.now() + this.config.syncTimeout;

    try {
      const abort = await this.checkConstraints();
      if (abort) {
        this.logger.info(`Sync skipped: ${abort.message}`);
        return abortedResult(abort);
      }

      const requests = await this.queue.dequeueOrdered();
      this.logger.debug(`Starting sync pass over ${requests.length} request(s)`);

      for (const request of requests) {
        if (this.cancelRequested || Date.now() >= deadline) {
          tally.cancelled = true;
          this.logger.info('Sync pass stopped before completion', {
            reason: this.cancelRequested ? 'cancelled' : 'deadline',
          });
          break;
        }

        if (request.conflict !== undefined) {
          tally.suspended.push(toSuspended(request, request.conflict));
          continue;
        }

        if (!shouldRetry(request, this.config.maxRetries)) {
          // Exhausted in an earlier pass, or maxRetries allows no attempt at all
          await this.queue.remove(request.id);
          tally.exhaustedCount++;
          tally.errors.push({
            requestId: request.id,
            code: OfflineErrorCodes.RETRIES_EXHAUSTED,
            message: `Dropped unsent after ${request.retryCount} attempt(s), maxRetries is ${this.config.maxRetries}`,
          });
          this.logger.warn(`Request ${request.id} dropped without being sent`, {
            url: request.url,
            retryCount: request.retryCount,
            maxRetries: this.config.maxRetries,
          });
          continue;
        }

        if (request.nextRetryAt !== undefined && request.nextRetryAt > Date.now()) {
          tally.deferredCount++;
          continue;
        }

        await this.processRequest(request, deadline, tally);
      }

      const evictedCount = await this.collectGarbage();

      this.logger.info(
        `Sync pass done: ${tally.syncedCount} synced, ${tally.failedCount} failed, ${tally.deferredCount} deferred`
      );
      return buildResult(tally, { success: true, evictedCount });
    } catch (error) {
      const code: SyncResultCode = error instanceof PersistenceError ? 'PERSISTENCE_ERROR' : 'SYNC_ERROR';
      this.logger.error('Sync pass aborted', { code, error: toErrorMessage(error) });
      return abortedResult({ code, message: toErrorMessage(error) }, tally);
    }
  }

  /**
   * Returns the abort reason when connectivity or SyncPolicy forbid a pass
   */
  private async checkConstraints(): Promise<PassAbort | null> {
    const { syncOnlyOnWifi, syncOnlyWhenCharging } = this.policy;
    const unmet: PassAbort = { code: 'POLICY_CONSTRAINT_UNMET', message: 'policy constraint unmet' };

    if (!this.connectivity) {
      // Without a signal no constraint can be shown to hold
      return syncOnlyOnWifi || syncOnlyWhenCharging ? unmet : null;
    }

    const connection = await this.connectivity.getConnectionType();
    if (connection === 'none') {
      return { code: 'NO_CONNECTIVITY', message: 'no connectivity' };
    }
    if (syncOnlyOnWifi && connection !== 'wifi') {
      return unmet;
    }

    if (syncOnlyWhenCharging) {
      if (!this.connectivity.getBatteryStatus) return unmet;
      const battery = await this.connectivity.getBatteryStatus();
      if (!battery.charging) return unmet;
    }

    return null;
  }

  /**
   * Executes one request and records the outcome. Never throws for executor failures.
   */
  private async processRequest(request: OfflineRequest, deadline: number, tally: PassTally): Promise<void> {
    const outcome = await this.execute(toExecutorRequest(request), deadline);

    switch (outcome.status) {
      case 'success':
        await this.queue.markSucceeded(request.id);
        tally.syncedCount++;
        break;

      case 'error':
        await this.recordFailure(request, outcome, tally);
        break;

      case 'conflict':
        await this.handleConflict(request, outcome, deadline, tally);
        break;
    }
  }

  private async handleConflict(
    request: OfflineRequest,
    conflict: Extract<ExecutorResult, { status: 'conflict' }>,
    deadline: number,
    tally: PassTally
  ): Promise<void> {
    if (request.force) {
      // Already resubmitted with force once
      await this.recordFailure(request, conflictFailure(conflict, 'Conflict persisted after forced resubmission'), tally);
      return;
    }

    switch (this.policy.conflictResolution) {
      case 'serverWins':
        this.logger.info(`Conflict on ${request.id}: keeping server state`);
        await this.queue.markSucceeded(request.id);
        tally.syncedCount++;
        return;

      case 'clientWins':
        await this.resubmit(request, toExecutorRequest(request, { force: true }), deadline, tally);
        return;

      case 'merge': {
        if (!this.mergeFn) {
          await this.recordFailure(
            request,
            { status: 'error', error: 'No merge function configured', code: 'MERGE_FAILED', retryable: false },
            tally
          );
          return;
        }

        let merged: unknown;
        try {
          merged = await this.mergeFn(request.body, conflict.serverBody);
        } catch (error) {
          await this.recordFailure(
            request,
            { status: 'error', error: `Merge failed: ${toErrorMessage(error)}`, code: 'MERGE_FAILED', retryable: false },
            tally
          );
          return;
        }

        await this.resubmit(request, toExecutorRequest(request, { body: merged, force: true }), deadline, tally);
        return;
      }

      case 'promptUser': {
        const pending: PendingConflict = {
          detectedAt: Date.now(),
          ...(conflict.serverBody !== undefined && { serverBody: conflict.serverBody }),
          ...(conflict.message !== undefined && { message: conflict.message }),
        };
        await this.queue.update(request.id, { conflict: pending });
        this.logger.info(`Conflict on ${request.id} suspended for user resolution`);
        tally.suspended.push(toSuspended(request, pending));
        return;
      }
    }
  }

  /**
   * One forced resubmission; a second conflict is a failure
   */
  private async resubmit(
    request: OfflineRequest,
    forced: ExecutorRequest,
    deadline: number,
    tally: PassTally
  ): Promise<void> {
    const outcome = await this.execute(forced, deadline);

    switch (outcome.status) {
      case 'success':
        await this.queue.markSucceeded(request.id);
        tally.syncedCount++;
        return;
      case 'error':
        await this.recordFailure(request, outcome, tally);
        return;
      case 'conflict':
        await this.recordFailure(request, conflictFailure(outcome, 'Conflict persisted after forced resubmission'), tally);
        return;
    }
  }

  private async recordFailure(request: OfflineRequest, failure: FailureCause, tally: PassTally): Promise<void> {
    const terminal = failure.retryable === false || !isRetryableError(failure.code);
    const nextRetryAt = terminal
      ? undefined
      : Date.now() + calculateRetryDelay(request.retryCount, this.config, this.random);

    const marked = await this.queue.markFailed(request.id, failure.error, {
      terminal,
      ...(nextRetryAt !== undefined && { nextRetryAt }),
    });

    tally.failedCount++;
    tally.errors.push({
      requestId: request.id,
      code: String(failure.code ?? OfflineErrorCodes.NETWORK_ERROR),
      message: failure.error,
    });
    if (marked?.exhausted) {
      tally.exhaustedCount++;
    }

    this.logger.warn(`Request ${request.id} failed`, {
      error: failure.error,
      terminal,
      retryCount: marked?.request.retryCount,
    });
  }

  /**
   * Runs the executor bounded by min(requestTimeout, time left in the pass).
   * A throw or a timeout becomes an error result.
   */
  private async execute(request: ExecutorRequest, deadline: number): Promise<ExecutorResult> {
    const timeoutMs = Math.max(0, Math.min(this.config.requestTimeout, deadline - Date.now()));

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<ExecutorResult>((resolve) => {
      timer = setTimeout(
        () => resolve({ status: 'error', error: `Request timed out after ${timeoutMs}ms`, code: 'TIMEOUT' }),
        timeoutMs
      );
    });

    const attempt = Promise.resolve()
      .then(() => this.executor(request))
      .catch(
        (error: unknown): ExecutorResult => ({
          status: 'error',
          error: toErrorMessage(error),
          code: OfflineErrorCodes.NETWORK_ERROR,
        })
      );

    try {
      return await Promise.race([attempt, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Purges expired entries, then evicts the least used until within budget
   */
  private async collectGarbage(): Promise<number> {
    if (!this.cache) return 0;

    const expired = await this.cache.purgeExpired();
    const evicted = await this.cache.enforceLimits({
      maxBytes: maxCacheBytes(this.config),
      maxEntries: this.config.maxCacheEntries,
    });
    return expired.length + evicted.length;
  }

  private emit(result: SyncResult): void {
    this.listeners.forEach((listener) => {
      try {
        listener(result);
      } catch (error) {
        this.logger.error('Sync listener threw', { error: toErrorMessage(error) });
      }
    });
  }
}

function toSuspended(request: OfflineRequest, conflict: PendingConflict): SuspendedRequest {
  return {
    requestId: request.id,
    code: 'CONFLICT_UNRESOLVED',
    ...(request.body !== undefined && { clientBody: request.body }),
    ...(conflict.serverBody !== undefined && { serverBody: conflict.serverBody }),
    ...(conflict.message !== undefined && { message: conflict.message }),
  };
}

function conflictFailure(
  conflict: Extract<ExecutorResult, { status: 'conflict' }>,
  fallbackMessage: string
): FailureCause {
  return { status: 'error', error: conflict.message ?? fallbackMessage, code: 'CONFLICT' };
}
