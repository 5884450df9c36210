// Offline Core - Composition Root
// Wires tracker, cache, queue, coordinator and scheduler over one OfflineStore.
// The host owns the returned instance; nothing here is global.

import type { ConnectivitySignal, MergeFunction, NetworkExecutor } from '../../types';

import { CacheStore } from './cache-store';
import { DEFAULT_SYNC_POLICY, type OfflineConfig, type SyncPolicy } from './config';
import type { OfflineStore } from './key-value-store';
import { createLogger, defaultLogLevel, type Logger } from './logger';
import { MetadataTracker } from './metadata-tracker';
import { createOfflineSender, type OfflineSender } from './offline-fetch';
import { RequestQueue } from './request-queue';
import { SyncCoordinator } from './sync-coordinator';
import { SyncScheduler } from './sync-scheduler';

export interface OfflineSupportOptions {
  config: OfflineConfig;
  store: OfflineStore;
  executor: NetworkExecutor;
  connectivity?: ConnectivitySignal;
  syncPolicy?: SyncPolicy;
  mergeFn?: MergeFunction;
  /**
   * Builds the logger for each component. Defaults to console at config.logLevel,
   * or silent under tests.
   */
  loggerFactory?: (scope: string) => Logger;
}

export interface OfflineSupport {
  readonly config: OfflineConfig;
  readonly tracker: MetadataTracker;
  readonly cache: CacheStore;
  readonly queue: RequestQueue;
  readonly coordinator: SyncCoordinator;
  readonly scheduler: SyncScheduler;
  readonly send: OfflineSender;
  /** Empties cache, metadata and queue */
  clearAllData(): Promise<void>;
  /** Stops triggers, waits for the running pass and background refreshes, then closes the store */
  dispose(): Promise<void>;
}

/**
 * Builds every component, restores the persisted queue and starts auto sync
 * when the config enables it
 */
export async function createOfflineSupport(options: OfflineSupportOptions): Promise<OfflineSupport> {
  const { config, store, executor, connectivity } = options;
  const level = defaultLogLevel() === 'silent' ? 'silent' : config.logLevel;
  const loggerFor = options.loggerFactory ?? ((scope: string) => createLogger(scope, level));

  const tracker = new MetadataTracker(store.metadata);
  const cache = new CacheStore(store.cache, tracker, {
    defaultTtl: config.cacheDuration,
    logger: loggerFor('CacheStore'),
  });
  const queue = new RequestQueue(store.queue, config, { logger: loggerFor('RequestQueue') });
  const coordinator = new SyncCoordinator({
    queue,
    executor,
    config,
    cache,
    syncPolicy: options.syncPolicy ?? DEFAULT_SYNC_POLICY,
    ...(connectivity !== undefined && { connectivity }),
    ...(options.mergeFn !== undefined && { mergeFn: options.mergeFn }),
    logger: loggerFor('SyncCoordinator'),
  });
  const scheduler = new SyncScheduler(coordinator, config, { logger: loggerFor('SyncScheduler') });
  const send = createOfflineSender({
    queue,
    executor,
    ...(connectivity !== undefined && { connectivity }),
    logger: loggerFor('OfflineSender'),
  });

  await queue.load();
  scheduler.start();

  return {
    config,
    tracker,
    cache,
    queue,
    coordinator,
    scheduler,
    send,
    async clearAllData() {
      await cache.clear();
      await queue.clear();
    },
    async dispose() {
      scheduler.stop();
      coordinator.cancel();
      await coordinator.whenIdle();
      await cache.whenIdle();
      await store.close?.();
    },
  };
}
