import { beforeEach, describe, expect, test } from 'vitest';
import { HistoryExpiredError, TransientIOError } from '../../lib/errors.js';
import { createHarness } from '../../../tests/helpers/harness.js';
import type { Harness } from '../../../tests/helpers/harness.js';
import { buildZip, invoiceZip } from '../../../tests/helpers/test-fixtures.js';

let h: Harness;

beforeEach(async () => {
  h = await createHarness();
});

async function addInvoice(id: string, labels: string[] = ['INBOX']): Promise<string> {
  return h.mailbox.addMessage({ id, labels, attachments: [[`${id}.zip`, await invoiceZip(`INV-${id}`)]] });
}

describe('IncrementalSyncEngine.syncFrom', () => {
  test('collects messages added after the cursor and reports the highest history id', async () => {
    await addInvoice('M1');
    await addInvoice('M2');

    const delta = await h.service.incremental.syncFrom('100');

    expect(delta.candidates.map((c) => c.messageId)).toEqual(['M1', 'M2']);
    expect(delta.newCursor).toBe('102');
  });

  test('only returns history after the cursor', async () => {
    await addInvoice('M1');
    await addInvoice('M2');

    const delta = await h.service.incremental.syncFrom('101');

    expect(delta.candidates.map((c) => c.messageId)).toEqual(['M2']);
  });

  test('deduplicates a message repeated across history records', async () => {
    await addInvoice('M1');
    h.mailbox.repeatInHistory('M1');

    const delta = await h.service.incremental.syncFrom('100');

    expect(delta.candidates.map((c) => c.messageId)).toEqual(['M1']);
    expect(delta.newCursor).toBe('102');
  });

  test('drops messages outside the label filter', async () => {
    await addInvoice('M1', ['INBOX']);
    await addInvoice('M2', ['SENT']);

    const delta = await h.service.incremental.syncFrom('100');

    expect(delta.candidates.map((c) => c.messageId)).toEqual(['M1']);
    expect(delta.newCursor).toBe('102');
  });

  test('accepts every message when the watch excludes labels', async () => {
    const excluding = await createHarness({ settings: { watchLabelFilterAction: 'exclude', watchLabelIds: ['SPAM'] } });
    excluding.mailbox.addMessage({ id: 'M1', labels: ['SENT'] });

    const delta = await excluding.service.incremental.syncFrom('100');

    expect(delta.candidates.map((c) => c.messageId)).toEqual(['M1']);
  });

  test('follows page tokens until the history is exhausted', async () => {
    h.mailbox.historyPageSize = 2;
    for (const id of ['M1', 'M2', 'M3', 'M4', 'M5']) await addInvoice(id);

    const delta = await h.service.incremental.syncFrom('100');

    expect(delta.pages).toBe(3);
    expect(delta.candidates).toHaveLength(5);
    expect(delta.newCursor).toBe('105');
  });

  test('surfaces HistoryExpiredError for a cursor that is too old', async () => {
    h.mailbox.historyExpiredBefore = '150';
    await expect(h.service.incremental.syncFrom('100')).rejects.toBeInstanceOf(HistoryExpiredError);
  });
});

describe('IncrementalSyncEngine.run', () => {
  test('processes candidates in order and then persists the new cursor', async () => {
    await addInvoice('M1');
    await addInvoice('M2');

    const summary = await h.service.incremental.run('100');

    expect(summary).toEqual({
      mode: 'history_incremental',
      cursorBefore: '100',
      cursorAfter: '102',
      checked: 2,
      processed: 2,
      skipped: 0,
      failed: 0,
    });
    expect(h.storage.folderNames()).toEqual(['INV-M1', 'INV-M2']);
    expect(h.store.state?.historyCursor).toBe('102');
  });

  test('a failing message does not stop the batch', async () => {
    h.mailbox.addMessage({ id: 'M1', attachments: [['broken.zip', await buildZip([['notes.txt', 'no invoice here']])]] });
    await addInvoice('M2');

    const summary = await h.service.incremental.run('100');

    expect(summary).toMatchObject({ checked: 2, processed: 1, failed: 1, cursorAfter: '102' });
    expect(h.mailbox.labelsOf('M1')).toEqual(['INBOX']);
    expect(h.mailbox.labelsOf('M2')).toEqual(['INBOX', h.processedLabelId]);
  });

  test('mail without a ZIP attachment is skipped rather than failed', async () => {
    h.mailbox.addMessage({ id: 'NEWSLETTER', subject: 'Weekly news' });
    await addInvoice('M1');

    const summary = await h.service.incremental.run('100');

    expect(summary).toEqual({
      mode: 'history_incremental',
      cursorBefore: '100',
      cursorAfter: '102',
      checked: 2,
      processed: 1,
      skipped: 1,
      failed: 0,
    });
    expect(h.mailbox.labelsOf('NEWSLETTER')).toEqual(['INBOX']);
  });

  test('holds the cursor back when a message hits a transient failure', async () => {
    await h.store.advanceCursor('100');
    await addInvoice('M1');
    await addInvoice('M2');
    h.mailbox.failures.set('getMessage:M1', new TransientIOError('gmail.users.messages.get', 'socket hang up'));

    const first = await h.service.incremental.run('100');

    expect(first).toEqual({
      mode: 'history_incremental',
      cursorBefore: '100',
      cursorAfter: '100',
      checked: 2,
      processed: 1,
      skipped: 0,
      failed: 1,
      retryable: true,
    });
    expect(h.store.state?.historyCursor).toBe('100');

    h.mailbox.failures.clear();
    const second = await h.service.incremental.run('100');

    expect(second).toMatchObject({ cursorAfter: '102', processed: 1, skipped: 1, failed: 0 });
    expect(second.retryable).toBeUndefined();
    expect(h.storage.folderNames()).toEqual(['INV-M2', 'INV-M1']);
  });

  test('never moves the stored cursor backwards', async () => {
    await addInvoice('M1');
    await h.store.advanceCursor('500');

    const summary = await h.service.incremental.run('500');

    expect(summary.cursorAfter).toBe('500');
    expect(h.store.state?.historyCursor).toBe('500');
  });

  test('leaves the cursor untouched when the history has expired', async () => {
    await h.store.advanceCursor('100');
    const saves = h.store.saves;
    h.mailbox.historyExpiredBefore = '150';

    await expect(h.service.incremental.run('100')).rejects.toBeInstanceOf(HistoryExpiredError);
    expect(h.store.saves).toBe(saves);
    expect(h.store.state?.historyCursor).toBe('100');
  });
});
