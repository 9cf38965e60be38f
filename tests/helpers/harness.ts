/**
 * Builds a SyncService over the in-memory fakes
 */

import { SyncService } from '../../src/sync/service.js';
import type { SyncServiceSettings } from '../../src/sync/service.js';
import type { ProcessedMessageStore } from '../../src/state/processed-store.js';
import { FakeConverter, FakeMailbox, FakeStorage, MemoryWatchStateStore } from './mock-clients.js';

export interface Harness {
  mailbox: FakeMailbox;
  storage: FakeStorage;
  converter: FakeConverter;
  store: MemoryWatchStateStore;
  service: SyncService;
  processedLabelId: string;
}

export const TEST_SETTINGS: SyncServiceSettings = {
  query: 'has:attachment filename:zip in:inbox',
  processedLabelName: 'invoice-processed',
  markAsRead: false,
  destinationFolderId: 'drive-root',
  watchLabelIds: ['INBOX'],
  watchLabelFilterAction: 'include',
  syncAfterStart: false,
  maxCycles: 20,
  maxMessagesPerCycle: 20,
  renewBeforeExpiryMs: 48 * 60 * 60 * 1000,
};

export async function createHarness(
  options: { settings?: Partial<SyncServiceSettings>; processedIndex?: ProcessedMessageStore; mailbox?: FakeMailbox } = {}
): Promise<Harness> {
  const mailbox = options.mailbox ?? new FakeMailbox();
  const storage = new FakeStorage();
  storage.events = mailbox.events;
  const converter = new FakeConverter();
  const store = new MemoryWatchStateStore(mailbox.address);

  const settings = { ...TEST_SETTINGS, ...options.settings };
  const service = await SyncService.create({
    mailbox,
    storage,
    converter,
    store,
    processedIndex: options.processedIndex,
    settings,
  });

  const processedLabelId = await mailbox.ensureLabel(settings.processedLabelName);
  return { mailbox, storage, converter, store, service, processedLabelId };
}
