// Gmail watch (push subscription) registration and renewal
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import type { WatchStateStore } from "../state/watch-state-store.js";
import type { Mailbox } from "../shared/types/capabilities.js";
import type { WatchState } from "../shared/types/sync.js";

export interface WatchRegistration {
  before: WatchState | null;
  after: WatchState;
  expiry: Date;
}

export interface WatchRegistrarOptions {
  mailbox: Mailbox;
  store: WatchStateStore;
  mailboxAddress: string;
  labelIds: string[];
  /** Renew when the watch expires within this window */
  renewBeforeExpiryMs: number;
  logger?: Logger;
}

export class WatchRegistrar {
  private logger: Logger;

  constructor(private readonly options: WatchRegistrarOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * (Re-)register the watch. Always overwrites the expiry and label filter;
   * the history cursor is only initialized when none is stored yet so that
   * a renewal never skips history. Nothing is written if the call fails.
   */
  async register(): Promise<WatchRegistration> {
    const { mailbox, store, labelIds } = this.options;

    const before = await store.load();
    const result = await mailbox.createOrRenewWatch(labelIds);

    const after: WatchState = {
      mailbox: before?.mailbox ?? this.options.mailboxAddress,
      historyCursor: before?.historyCursor ?? result.historyId,
      watchExpiry: result.expiration,
      labelFilter: [...labelIds],
    };
    await store.save(after);

    this.logger.info(
      {
        cursorBefore: before?.historyCursor ?? null,
        cursorAfter: after.historyCursor,
        watchHistoryId: result.historyId,
        expiry: result.expiration.toISOString(),
      },
      "Gmail watch registered"
    );

    return { before, after, expiry: result.expiration };
  }

  async isRenewalDue(now: Date = new Date()): Promise<boolean> {
    const state = await this.options.store.load();
    if (!state?.watchExpiry) {
      return true;
    }
    return state.watchExpiry.getTime() - now.getTime() <= this.options.renewBeforeExpiryMs;
  }
}
