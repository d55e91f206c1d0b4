/**
 * Interval runner over ReconciliationService.syncAllConnections.
 */

import { silentLogger, type Logger } from '@banksync/types';
import type { ConnectionSyncSummary } from './types.js';

export interface SyncRunner {
  syncAllConnections(): Promise<ConnectionSyncSummary[]>;
}

export interface ScheduledSyncConfig {
  intervalMs: number;
  runImmediately?: boolean;
  onSyncComplete?: (results: ConnectionSyncSummary[]) => void;
  onSyncError?: (error: Error) => void;
  logger?: Logger;
}

export interface ScheduledSyncStatus {
  isRunning: boolean;
  intervalMs: number;
  lastRunAt: string | null;
  nextRunAt: string | null;
  totalRuns: number;
  consecutiveErrors: number;
}

export class SyncScheduler {
  private readonly runner: SyncRunner;
  private timer: ReturnType<typeof setInterval> | null = null;
  private config: ScheduledSyncConfig | null = null;
  private inFlight: Promise<void> | null = null;
  private lastRunAt: string | null = null;
  private totalRuns = 0;
  private consecutiveErrors = 0;

  constructor(runner: SyncRunner) {
    this.runner = runner;
  }

  /**
   * Start syncing at the configured interval. A tick that fires while the
   * previous run is still going is skipped.
   */
  start(config: ScheduledSyncConfig): void {
    if (this.timer !== null) {
      throw new Error('Scheduled sync is already running. Call stop() first.');
    }
    if (!Number.isFinite(config.intervalMs) || config.intervalMs <= 0) {
      throw new Error(`Invalid sync interval: ${config.intervalMs}ms`);
    }

    this.config = config;
    const logger = config.logger ?? silentLogger;

    if (config.runImmediately === true) {
      this.tick(config, logger);
    }

    this.timer = setInterval(() => {
      this.tick(config, logger);
    }, config.intervalMs);

    logger.info('Scheduled sync started', { intervalMs: config.intervalMs });
  }

  /**
   * Stop scheduled sync. A run already in progress finishes on its own;
   * await `idle()` to wait for it.
   */
  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.config = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Resolves once no run is in progress. */
  async idle(): Promise<void> {
    while (this.inFlight !== null) {
      await this.inFlight;
    }
  }

  getStatus(): ScheduledSyncStatus {
    const isRunning = this.timer !== null;
    const intervalMs = this.config?.intervalMs ?? 0;

    let nextRunAt: string | null = null;
    if (isRunning && this.lastRunAt !== null && intervalMs > 0) {
      nextRunAt = new Date(new Date(this.lastRunAt).getTime() + intervalMs).toISOString();
    } else if (isRunning && intervalMs > 0) {
      // First run hasn't happened yet
      nextRunAt = new Date(Date.now() + intervalMs).toISOString();
    }

    return {
      isRunning,
      intervalMs,
      lastRunAt: this.lastRunAt,
      nextRunAt,
      totalRuns: this.totalRuns,
      consecutiveErrors: this.consecutiveErrors,
    };
  }

  private tick(config: ScheduledSyncConfig, logger: Logger): void {
    if (this.inFlight !== null) {
      logger.warn('Previous sync still running, skipping this tick');
      return;
    }
    this.inFlight = this.run(config, logger).finally(() => {
      this.inFlight = null;
    });
  }

  private async run(config: ScheduledSyncConfig, logger: Logger): Promise<void> {
    try {
      const results = await this.runner.syncAllConnections();
      this.lastRunAt = new Date().toISOString();
      this.totalRuns++;
      this.consecutiveErrors = 0;
      config.onSyncComplete?.(results);
    } catch (error) {
      this.consecutiveErrors++;
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Scheduled sync failed', { error: err, consecutiveErrors: this.consecutiveErrors });
      config.onSyncError?.(err);
    }
  }
}
