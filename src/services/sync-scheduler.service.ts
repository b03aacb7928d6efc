import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import { SyncResult } from '../types/result.types';
import { Logger } from '../utils/logger';
import { ISyncService } from './sync.interface';

/**
 * Runs a full Sync every `sync.intervalMs` while the webhook server is up.
 * Cycles never overlap; a failed cycle is logged and the schedule continues.
 */
@injectable()
export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SyncResult | null> | null = null;
  private readonly logger: Logger;

  constructor(
    @inject('ISyncService') private readonly syncService: ISyncService,
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('Logger') logger: Logger
  ) {
    this.logger = logger.child({ component: 'sync-scheduler' });
  }

  start(): boolean {
    const intervalMs = this.config.sync.intervalMs;
    if (intervalMs <= 0 || this.timer) {
      return false;
    }

    this.timer = setInterval(() => {
      void this.runOnce();
    }, intervalMs);
    this.timer.unref();

    this.logger.info({ intervalMs }, 'Scheduled sync started');
    return true;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Scheduled sync stopped');
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Runs one cycle. Resolves to null when a cycle is already in flight or the cycle failed.
   */
  async runOnce(): Promise<SyncResult | null> {
    if (this.inFlight) {
      this.logger.debug('Previous sync cycle still running, skipping');
      return null;
    }

    this.inFlight = this.syncService.sync().catch(error => {
      this.logger.error({ err: error }, 'Scheduled sync failed');
      return null;
    });

    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }
}
