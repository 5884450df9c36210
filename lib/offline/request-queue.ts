// Offline Core - Request Queue
// Durable, priority-ordered store of mutations waiting for the network
//
// Ordering: high > normal > low, then FIFO by createdAt, then enqueue sequence

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import {
  HTTP_METHODS,
  REQUEST_PRIORITIES,
  type OfflineRequest,
  type OfflineRequestDraft,
  type RequestPriority,
} from '../../types';

import type { OfflineConfig } from './config';
import { toFieldIssues } from './config';
import { InvalidRequestError, QueueFullError } from './errors';
import type { KeyValueStore } from './key-value-store';
import { createLogger, type Logger } from './logger';
import { MemoryKeyValueStore } from './memory-store';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Priority order for draining, highest first
 */
export const PRIORITY_ORDER: readonly RequestPriority[] = REQUEST_PRIORITIES;

export type RequestQueueConfig = Pick<OfflineConfig, 'maxQueueSize' | 'maxRetries' | 'queuePersistence'>;

const stringRecord = z.record(z.string());

const requestDraftSchema = z
  .object({
    id: z.string().min(1, 'Must not be empty').optional(),
    method: z.enum(HTTP_METHODS),
    url: z.string().min(1, 'Must not be empty'),
    headers: stringRecord.optional(),
    body: z.unknown().optional(),
    createdAt: z.number().int().min(0, 'Must be a non-negative timestamp').optional(),
    priority: z.enum(REQUEST_PRIORITIES).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .strict();

/**
 * Shape check for records read back from persistence
 */
const storedRequestSchema = z.object({
  id: z.string().min(1),
  method: z.enum(HTTP_METHODS),
  url: z.string().min(1),
  createdAt: z.number(),
  sequence: z.number(),
  priority: z.enum(REQUEST_PRIORITIES),
  retryCount: z.number().int().min(0),
});

// ============================================================================
// TYPES
// ============================================================================

export type QueueListener = (size: number) => void;

export interface MarkFailedOptions {
  /** Earliest time the coordinator may attempt the request again */
  nextRetryAt?: number;
  /** Remove immediately regardless of retryCount (non-retryable failure) */
  terminal?: boolean;
}

export interface MarkFailedResult {
  /** The request as it stood after the failure was recorded */
  request: OfflineRequest;
  /** True when the request was removed from the queue */
  exhausted: boolean;
}

export type RequestPatch = Partial<
  Pick<OfflineRequest, 'headers' | 'body' | 'force' | 'metadata' | 'nextRetryAt' | 'conflict'>
>;

// ============================================================================
// PURE HELPERS
// ============================================================================

export function shouldRetry(request: OfflineRequest, maxRetries: number): boolean {
  return request.retryCount < maxRetries;
}

/**
 * Drain order comparator. Retried requests keep their original createdAt.
 */
export function compareRequests(a: OfflineRequest, b: OfflineRequest): number {
  const priorityA = PRIORITY_ORDER.indexOf(a.priority);
  const priorityB = PRIORITY_ORDER.indexOf(b.priority);
  if (priorityA !== priorityB) {
    return priorityA - priorityB;
  }
  if (a.createdAt !== b.createdAt) {
    return a.createdAt - b.createdAt;
  }
  return a.sequence - b.sequence;
}

// ============================================================================
// REQUEST QUEUE CLASS
// ============================================================================

export class RequestQueue {
  private readonly store: KeyValueStore<OfflineRequest>;
  private readonly logger: Logger;
  private readonly listeners = new Set<QueueListener>();

  private nextSequence = 0;
  private loaded: Promise<void> | null = null;

  /** Serializes enqueue so the size check and the write cannot interleave */
  private enqueueChain: Promise<void> = Promise.resolve();

  constructor(
    store: KeyValueStore<OfflineRequest>,
    private readonly config: RequestQueueConfig,
    options: { logger?: Logger } = {}
  ) {
    // Memory-only when persistence is off
    this.store = config.queuePersistence ? store : new MemoryKeyValueStore<OfflineRequest>();
    this.logger = options.logger ?? createLogger('RequestQueue');
  }

  /**
   * Restores persisted requests. Unreadable records are dropped.
   * Called implicitly by the first enqueue.
   */
  async load(): Promise<OfflineRequest[]> {
    await this.ensureLoaded();
    return this.dequeueOrdered();
  }

  /**
   * Appends a request. Throws QueueFullError when the queue is at maxQueueSize
   * and InvalidRequestError when the draft is malformed or its id is taken.
   */
  async enqueue(draft: OfflineRequestDraft): Promise<OfflineRequest> {
    const run = this.enqueueChain.then(() => this.append(draft));
    this.enqueueChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * All pending requests in drain order. Pure read.
   */
  async dequeueOrdered(): Promise<OfflineRequest[]> {
    const requests = await this.store.values();
    return requests.sort(compareRequests);
  }

  async get(id: string): Promise<OfflineRequest | undefined> {
    return this.store.get(id);
  }

  async size(): Promise<number> {
    return (await this.store.keys()).length;
  }

  /**
   * Removes a request permanently. Idempotent.
   */
  async markSucceeded(id: string): Promise<void> {
    await this.removeIfPresent(id, 'succeeded');
  }

  /**
   * Cancels a pending request. Idempotent.
   */
  async remove(id: string): Promise<void> {
    await this.removeIfPresent(id, 'removed');
  }

  /**
   * Records a failed attempt. Increments retryCount and removes the request
   * once retryCount reaches maxRetries, in one atomic update.
   * Returns null when the id is not queued.
   */
  async markFailed(
    id: string,
    error: string,
    options: MarkFailedOptions = {}
  ): Promise<MarkFailedResult | null> {
    const outcome: { result: MarkFailedResult | null } = { result: null };

    await this.store.update(id, (current) => {
      if (!current) return undefined;

      const failed: OfflineRequest = {
        ...current,
        retryCount: current.retryCount + 1,
        lastError: error,
        lastAttemptAt: Date.now(),
        ...(options.nextRetryAt !== undefined && { nextRetryAt: options.nextRetryAt }),
      };
      const exhausted = options.terminal === true || !shouldRetry(failed, this.config.maxRetries);
      outcome.result = { request: failed, exhausted };
      return exhausted ? undefined : failed;
    });

    const { result } = outcome;
    if (result === null) return null;
    const { request, exhausted } = result;
    if (exhausted) {
      this.logger.warn(`Request ${id} removed after ${request.retryCount} attempt(s)`, {
        url: request.url,
        error,
      });
    }
    await this.notify();
    return result;
  }

  /**
   * Stamps lastAttemptAt before the executor is called
   */
  async markAttempt(id: string): Promise<OfflineRequest | undefined> {
    const now = Date.now();
    return this.store.update(id, (current) => (current ? { ...current, lastAttemptAt: now } : undefined));
  }

  /**
   * Patches fields used for out-of-band conflict resolution; an undefined field clears it.
   * Returns undefined when the id is not queued.
   */
  async update(id: string, patch: RequestPatch): Promise<OfflineRequest | undefined> {
    return this.store.update(id, (current) => (current ? { ...current, ...patch } : undefined));
  }

  async clear(): Promise<void> {
    await this.store.clear();
    this.logger.info('Queue cleared');
    await this.notify();
  }

  /**
   * Listens to queue size after each change
   */
  subscribe(listener: QueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============================================================================
  // PRIVATE HELPER METHODS
  // ============================================================================

  private ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      this.loaded = this.restore();
    }
    return this.loaded;
  }

  private async restore(): Promise<void> {
    const keys = await this.store.keys();
    let maxSequence = -1;
    let restored = 0;

    for (const key of keys) {
      const parsed = storedRequestSchema.safeParse(await this.store.get(key));
      if (!parsed.success || parsed.data.id !== key) {
        this.logger.warn('Dropping unreadable queued request', { key });
        await this.store.delete(key);
        continue;
      }
      maxSequence = Math.max(maxSequence, parsed.data.sequence);
      restored++;
    }

    this.nextSequence = Math.max(this.nextSequence, maxSequence + 1);
    if (restored > 0) {
      this.logger.debug(`Restored ${restored} queued request(s)`);
    }
  }

  private async append(draft: OfflineRequestDraft): Promise<OfflineRequest> {
    await this.ensureLoaded();

    const parsed = requestDraftSchema.safeParse(draft);
    if (!parsed.success) {
      throw new InvalidRequestError(toFieldIssues(parsed.error));
    }

    const size = await this.size();
    if (size >= this.config.maxQueueSize) {
      this.logger.warn(`Rejecting request to ${draft.url}: queue full`, { size });
      throw new QueueFullError(this.config.maxQueueSize);
    }

    const data = parsed.data;
    const id = data.id ?? uuidv4();
    if ((await this.store.get(id)) !== undefined) {
      throw new InvalidRequestError([{ field: 'id', message: `Request ${id} is already queued` }]);
    }

    const request: OfflineRequest = {
      id,
      method: data.method,
      url: data.url,
      ...(data.headers !== undefined && { headers: data.headers }),
      ...(data.body !== undefined && { body: data.body }),
      createdAt: data.createdAt ?? Date.now(),
      sequence: this.nextSequence++,
      priority: data.priority ?? 'normal',
      retryCount: 0,
      ...(data.metadata !== undefined && { metadata: data.metadata }),
    };

    await this.store.put(id, request);
    this.logger.debug(`Queued ${request.method} ${request.url}`, { id, priority: request.priority });
    await this.notify();
    return request;
  }

  private async removeIfPresent(id: string, reason: string): Promise<void> {
    const outcome = { existed: false };
    await this.store.update(id, (current) => {
      outcome.existed = current !== undefined;
      return undefined;
    });
    if (!outcome.existed) return;

    this.logger.debug(`Request ${id} ${reason}`);
    await this.notify();
  }

  private async notify(): Promise<void> {
    if (this.listeners.size === 0) return;
    const size = await this.size();
    this.listeners.forEach((listener) => listener(size));
  }
}
