// Sync service: composes the trigger paths behind one single-flight lock
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import { MessageProcessor } from "../pipeline/processor.js";
import type { ProcessedMessageStore } from "../state/processed-store.js";
import type { WatchStateStore } from "../state/watch-state-store.js";
import type { InvoiceConverter, Mailbox, RemoteStorage } from "../shared/types/capabilities.js";
import type { Notification, ProcessedRecord, SyncSummary, WatchState } from "../shared/types/sync.js";
import { FullSyncPoller } from "./full-sync.js";
import { IncrementalSyncEngine } from "./incremental-sync.js";
import { OperationLock } from "./lock.js";
import { PushHandler } from "./push-handler.js";
import type { PushResult } from "./push-handler.js";
import { WatchRegistrar } from "./watch-registrar.js";

export interface SyncServiceSettings {
  query: string;
  processedLabelName: string;
  markAsRead: boolean;
  destinationFolderId: string;
  watchLabelIds: string[];
  watchLabelFilterAction: "include" | "exclude";
  syncAfterStart: boolean;
  maxCycles: number;
  maxMessagesPerCycle: number;
  renewBeforeExpiryMs: number;
}

export interface SyncServiceDeps {
  mailbox: Mailbox;
  storage: RemoteStorage;
  converter: InvoiceConverter;
  store: WatchStateStore;
  processedIndex?: ProcessedMessageStore;
  settings: SyncServiceSettings;
  logger?: Logger;
}

export type Busy = { skipped: "busy"; runningOperation: string };

export interface StartWatchResult {
  watch: WatchState;
  cursorBefore: string | null;
  cursorAfter: string | null;
  expiry: string;
  sync?: SyncSummary;
}

export function isBusy(value: object): value is Busy {
  return "skipped" in value && value.skipped === "busy";
}

/**
 * Wires the registrar, push handler, incremental engine and full-sync poller
 * around one MessageProcessor. Every public operation goes through
 * `OperationLock`, so at most one pass touches the cursor at a time.
 */
export class SyncService {
  readonly lock = new OperationLock();
  readonly mailboxAddress: string;
  readonly processor: MessageProcessor;
  readonly registrar: WatchRegistrar;
  readonly incremental: IncrementalSyncEngine;
  readonly poller: FullSyncPoller;
  readonly pushHandler: PushHandler;

  private logger: Logger;

  private constructor(
    private readonly deps: SyncServiceDeps,
    mailboxAddress: string,
    processedLabelId: string
  ) {
    const { mailbox, store, settings } = deps;
    this.logger = deps.logger ?? silentLogger;
    this.mailboxAddress = mailboxAddress;

    this.processor = new MessageProcessor({
      mailbox,
      storage: deps.storage,
      converter: deps.converter,
      processedIndex: deps.processedIndex,
      processedLabelId,
      destinationFolderId: settings.destinationFolderId,
      mailboxAddress,
      markAsRead: settings.markAsRead,
      logger: this.logger.child({ component: "pipeline" }),
    });

    this.registrar = new WatchRegistrar({
      mailbox,
      store,
      mailboxAddress,
      labelIds: settings.watchLabelIds,
      renewBeforeExpiryMs: settings.renewBeforeExpiryMs,
      logger: this.logger.child({ component: "watch" }),
    });

    this.incremental = new IncrementalSyncEngine({
      mailbox,
      store,
      processor: this.processor,
      // An exclude-style watch has no positive label set to match against
      labelFilter: settings.watchLabelFilterAction === "include" ? settings.watchLabelIds : [],
      logger: this.logger.child({ component: "incremental-sync" }),
    });

    this.poller = new FullSyncPoller({
      mailbox,
      processor: this.processor,
      query: settings.query,
      processedLabelName: settings.processedLabelName,
      maxMessagesPerCycle: settings.maxMessagesPerCycle,
      logger: this.logger.child({ component: "full-sync" }),
    });

    this.pushHandler = new PushHandler({
      store,
      incremental: this.incremental,
      fullSync: this.poller,
      mailboxAddress,
      maxCycles: settings.maxCycles,
      logger: this.logger.child({ component: "push" }),
    });
  }

  /**
   * Resolve the mailbox address and processed label id, then build the service
   */
  static async create(deps: SyncServiceDeps): Promise<SyncService> {
    const mailboxAddress = await deps.mailbox.getAddress();
    const processedLabelId = await deps.mailbox.ensureLabel(deps.settings.processedLabelName);
    return new SyncService(deps, mailboxAddress, processedLabelId);
  }

  get defaultMaxCycles(): number {
    return this.deps.settings.maxCycles;
  }

  async handlePush(notification: Notification): Promise<PushResult | Busy> {
    const result = await this.lock.tryRun("push", () => this.pushHandler.handle(notification));
    if (!result.acquired) {
      this.logger.info(
        { historyMarker: notification.historyMarker, runningOperation: result.holder },
        "Push skipped, another operation is running"
      );
      return { skipped: "busy", runningOperation: result.holder };
    }
    return result.value;
  }

  async startWatch(): Promise<StartWatchResult | Busy> {
    const result = await this.lock.tryRun("start-watch", async () => {
      const registration = await this.registrar.register();
      const response: StartWatchResult = {
        watch: registration.after,
        cursorBefore: registration.before?.historyCursor ?? null,
        cursorAfter: registration.after.historyCursor,
        expiry: registration.expiry.toISOString(),
      };

      if (this.deps.settings.syncAfterStart) {
        response.sync = await this.poller.fullSync(this.deps.settings.maxCycles);
      }
      return response;
    });

    return result.acquired ? result.value : { skipped: "busy", runningOperation: result.holder };
  }

  /**
   * Renew the watch only when it is missing or close to expiry
   */
  async renewWatchIfDue(now: Date = new Date()): Promise<StartWatchResult | Busy | null> {
    if (!(await this.registrar.isRenewalDue(now))) {
      return null;
    }
    return this.startWatch();
  }

  async fullSync(maxCycles: number = this.deps.settings.maxCycles): Promise<SyncSummary | Busy> {
    const result = await this.lock.tryRun("full-sync", async () => {
      const before = await this.deps.store.load();
      const summary = await this.poller.fullSync(maxCycles);
      const cursor = before?.historyCursor ?? null;
      return { ...summary, cursorBefore: cursor, cursorAfter: cursor };
    });
    return result.acquired ? result.value : { skipped: "busy", runningOperation: result.holder };
  }

  async readState(): Promise<WatchState | null> {
    return this.deps.store.load();
  }

  /**
   * Operator recovery: forget the cursor so the next push bootstraps with a
   * full sync. Processed labels are untouched, so nothing is re-uploaded.
   */
  async resetState(): Promise<{ reset: true } | Busy> {
    const result = await this.lock.tryRun("reset-state", async () => {
      await this.deps.store.reset();
      this.logger.warn({ mailbox: this.mailboxAddress }, "Watch state reset by operator");
      return { reset: true as const };
    });
    return result.acquired ? result.value : { skipped: "busy", runningOperation: result.holder };
  }

  async listProcessed(limit?: number): Promise<ProcessedRecord[]> {
    return this.deps.processedIndex ? this.deps.processedIndex.list(limit) : [];
  }
}
