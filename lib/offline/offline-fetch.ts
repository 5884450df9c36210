// Offline Core - Offline Send Wrapper
// Sends a mutation straight away when possible, queues it for the next sync otherwise

import type {
  ConnectivitySignal,
  ExecutorResult,
  HttpMethod,
  NetworkExecutor,
  OfflineRequest,
  OfflineRequestDraft,
} from '../../types';

import { NetworkError, toErrorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import type { RequestQueue } from './request-queue';
import { isRetryableError } from './sync-coordinator';

// ============================================================================
// TYPES
// ============================================================================

/**
 * HTTP methods that are considered mutations
 */
const MUTATION_METHODS: readonly HttpMethod[] = ['POST', 'PUT', 'PATCH', 'DELETE'];

export interface OfflineSenderOptions {
  queue: RequestQueue;
  executor: NetworkExecutor;
  connectivity?: ConnectivitySignal;
  /** Callback when a request is queued instead of sent */
  onQueued?: (request: OfflineRequest, reason: string) => void;
  logger?: Logger;
}

export type OfflineSendResult =
  | { queued: false; result: ExecutorResult }
  | { queued: true; request: OfflineRequest; reason: string };

export type OfflineSender = (draft: OfflineRequestDraft) => Promise<OfflineSendResult>;

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Checks if a method is a mutation (POST, PUT, PATCH, DELETE)
 */
export function isMutationMethod(method: HttpMethod): boolean {
  return MUTATION_METHODS.includes(method);
}

/**
 * Checks connectivity; without a signal the network is assumed reachable
 */
export async function isOnline(connectivity?: ConnectivitySignal): Promise<boolean> {
  if (!connectivity) return true;
  return (await connectivity.getConnectionType()) !== 'none';
}

// ============================================================================
// OFFLINE SENDER
// ============================================================================

/**
 * Creates a sender that executes online and falls back to the queue.
 *
 * Offline, or on a thrown or retryable executor failure, the draft is queued and
 * `{ queued: true }` is returned. Success, conflicts and non-retryable errors are
 * handed back to the caller unchanged. A full queue rejects with QueueFullError,
 * and a GET that cannot be sent rejects with NetworkError.
 */
export function createOfflineSender(options: OfflineSenderOptions): OfflineSender {
  const logger = options.logger ?? createLogger('OfflineSender');

  const queueDraft = async (draft: OfflineRequestDraft, reason: string): Promise<OfflineSendResult> => {
    // Reads belong to the cache store, only mutations wait in the queue
    if (!isMutationMethod(draft.method)) {
      throw new NetworkError(`${draft.method} ${draft.url} could not be sent: ${reason}`, undefined, {
        url: draft.url,
      });
    }
    const request = await options.queue.enqueue(draft);
    logger.info(`Queued ${request.method} ${request.url} for later sync`, { reason });
    options.onQueued?.(request, reason);
    return { queued: true, request, reason };
  };

  return async (draft) => {
    if (!(await isOnline(options.connectivity))) {
      return queueDraft(draft, 'offline');
    }

    let result: ExecutorResult;
    try {
      result = await options.executor({
        method: draft.method,
        url: draft.url,
        ...(draft.headers !== undefined && { headers: draft.headers }),
        ...(draft.body !== undefined && { body: draft.body }),
        force: false,
      });
    } catch (error) {
      logger.warn(`Send failed for ${draft.url}`, { error: toErrorMessage(error) });
      return queueDraft(draft, toErrorMessage(error));
    }

    if (result.status === 'error' && result.retryable !== false && isRetryableError(result.code)) {
      return queueDraft(draft, result.error);
    }

    return { queued: false, result };
  };
}
