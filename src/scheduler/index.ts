import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import type { SyncService } from "../sync/service.js";
import { isBusy } from "../sync/service.js";

export interface SchedulerOptions {
  watchRenewalIntervalMs: number;
  fullSyncIntervalMs: number;
  logger?: Logger;
}

export class Scheduler {
  private intervals: NodeJS.Timeout[] = [];
  private running = false;
  private logger: Logger;

  constructor(
    private readonly service: SyncService,
    private readonly options: SchedulerOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      this.logger.warn("Scheduler already running");
      return;
    }

    this.running = true;

    const watchInterval = setInterval(() => {
      void this.renewWatch();
    }, this.options.watchRenewalIntervalMs);
    this.intervals.push(watchInterval);

    const fullSyncInterval = setInterval(() => {
      void this.fullSync();
    }, this.options.fullSyncIntervalMs);
    this.intervals.push(fullSyncInterval);

    this.logger.info(
      {
        watchRenewalIntervalMs: this.options.watchRenewalIntervalMs,
        fullSyncIntervalMs: this.options.fullSyncIntervalMs,
      },
      "Scheduler started"
    );
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const interval of this.intervals) {
      clearInterval(interval);
    }
    this.intervals = [];
    this.logger.info("Scheduler stopped");
  }

  /**
   * Renew the Gmail watch when it is missing or near expiry. Never throws.
   */
  async renewWatch(now: Date = new Date()): Promise<void> {
    try {
      const result = await this.service.renewWatchIfDue(now);
      if (result === null) {
        this.logger.debug("Watch renewal not due");
      } else if (isBusy(result)) {
        this.logger.info({ runningOperation: result.runningOperation }, "Watch renewal skipped, busy");
      } else {
        this.logger.info({ expiry: result.expiry, cursor: result.cursorAfter }, "Watch renewed");
      }
    } catch (error) {
      this.logger.error({ err: error }, "Watch renewal failed");
    }
  }

  /**
   * Run one scheduled full sync. Never throws.
   */
  async fullSync(): Promise<void> {
    try {
      const result = await this.service.fullSync();
      if (isBusy(result)) {
        this.logger.info({ runningOperation: result.runningOperation }, "Scheduled full sync skipped, busy");
      } else if (result.retryable) {
        this.logger.warn({ processed: result.processed, error: result.error }, "Scheduled full sync stopped early");
      }
    } catch (error) {
      this.logger.error({ err: error }, "Scheduled full sync failed");
    }
  }
}
