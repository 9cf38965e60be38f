// Wiring of config, database and Google clients into a SyncService
import type { Config } from "./config/index.js";
import { createDatabase } from "./db/index.js";
import type { DatabaseHandle } from "./db/index.js";
import type { Logger } from "./lib/logger.js";
import { UblInvoiceConverter } from "./services/conversion/ubl-converter.js";
import { DriveStorage, GmailMailbox, PubSubPushVerifier, createAuthorizedClient } from "./services/google/index.js";
import type { PushVerifier } from "./services/google/index.js";
import { SqliteProcessedMessageStore } from "./state/processed-store.js";
import { SqliteWatchStateStore } from "./state/watch-state-store.js";
import { SyncService } from "./sync/service.js";

export interface Runtime {
  service: SyncService;
  verifier: PushVerifier;
  database: DatabaseHandle;
}

export async function createRuntime(config: Config, logger: Logger): Promise<Runtime> {
  const database = createDatabase(config.database.url);

  try {
    const auth = createAuthorizedClient(config.gmail.credentialsPath, config.gmail.tokenPath, logger);
    const mailbox = new GmailMailbox(auth, {
      userId: config.gmail.userId,
      topicName: config.watch.topicName,
      labelFilterAction: config.watch.labelFilterAction,
      historyPageSize: config.sync.historyPageSize,
      logger: logger.child({ component: "gmail" }),
    });
    const mailboxAddress = await mailbox.getAddress();

    const service = await SyncService.create({
      mailbox,
      storage: new DriveStorage(auth, logger.child({ component: "drive" })),
      converter: new UblInvoiceConverter(),
      store: new SqliteWatchStateStore(database.db, mailboxAddress),
      processedIndex: new SqliteProcessedMessageStore(database.db),
      settings: {
        query: config.gmail.query,
        processedLabelName: config.gmail.processedLabelName,
        markAsRead: config.gmail.markAsRead,
        destinationFolderId: config.drive.parentFolderId,
        watchLabelIds: config.watch.labelIds,
        watchLabelFilterAction: config.watch.labelFilterAction,
        syncAfterStart: config.watch.syncAfterStart,
        maxCycles: config.sync.maxCycles,
        maxMessagesPerCycle: config.sync.maxMessagesPerCycle,
        renewBeforeExpiryMs: config.scheduler.renewBeforeExpiryMs,
      },
      logger,
    });

    const verifier = new PubSubPushVerifier({
      audience: config.push.audience,
      serviceAccountEmail: config.push.serviceAccountEmail,
      verificationToken: config.push.verificationToken,
    });

    return { service, verifier, database };
  } catch (error) {
    database.close();
    throw error;
  }
}
