// Offline Core - Sync Scheduler
// Periodic and reconnect triggers for the sync coordinator

import type { ConnectionType, SyncResult } from '../../types';

import type { OfflineConfig } from './config';
import { toErrorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import type { SyncCoordinator } from './sync-coordinator';

export type SyncTrigger = 'manual' | 'interval' | 'reconnect';

export type SchedulerConfig = Pick<OfflineConfig, 'syncInterval' | 'enableAutoSync' | 'syncOnReconnect'>;

export class SyncScheduler {
  private readonly logger: Logger;
  private interval: ReturnType<typeof setInterval> | null = null;
  private lastConnection: ConnectionType | null = null;

  constructor(
    private readonly coordinator: Pick<SyncCoordinator, 'sync'>,
    private readonly config: SchedulerConfig,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? createLogger('SyncScheduler');
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  /**
   * Starts the periodic trigger. No-op when auto sync is disabled or already started.
   */
  start(): boolean {
    if (!this.config.enableAutoSync || this.interval !== null) return false;

    this.interval = setInterval(() => {
      void this.triggerSync('interval');
    }, this.config.syncInterval);

    this.logger.debug(`Auto sync every ${this.config.syncInterval}ms`);
    return true;
  }

  /**
   * Stops future triggers; a pass already running is left alone
   */
  stop(): void {
    if (this.interval === null) return;
    clearInterval(this.interval);
    this.interval = null;
  }

  /**
   * Feeds a connectivity change. Coming back from 'none' triggers a pass when syncOnReconnect is set.
   */
  async notifyConnectivityChange(connection: ConnectionType): Promise<SyncResult | null> {
    const previous = this.lastConnection;
    this.lastConnection = connection;

    const reconnected = connection !== 'none' && previous === 'none';
    if (!reconnected || !this.config.syncOnReconnect) return null;

    this.logger.info(`Connectivity regained (${connection}), syncing`);
    return this.triggerSync('reconnect');
  }

  /**
   * Runs a pass and logs instead of rejecting. Resolves null when the pass threw.
   */
  async triggerSync(trigger: SyncTrigger = 'manual'): Promise<SyncResult | null> {
    try {
      const result = await this.coordinator.sync();
      if (!result.success && result.code !== 'SYNC_IN_PROGRESS') {
        this.logger.warn(`Sync (${trigger}) did not complete`, {
          code: result.code,
          errorMessage: result.errorMessage,
        });
      }
      return result;
    } catch (error) {
      this.logger.error(`Sync (${trigger}) threw`, { error: toErrorMessage(error) });
      return null;
    }
  }
}
