// Idempotent per-message pipeline: label gate, download, convert, upload, label
import {
  AuthRejectedError,
  MalformedInputError,
  StateUnavailableError,
  TransientIOError,
  errorMessage,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { silentLogger } from '../lib/logger.js';
import type { ProcessedMessageStore } from '../state/processed-store.js';
import type {
  AttachmentPart,
  InvoiceConverter,
  Mailbox,
  OutputFile,
  RemoteStorage,
} from '../shared/types/capabilities.js';
import type { CandidateMessage, Outcome, UploadedFolder } from '../shared/types/sync.js';
import { convertArchive } from './archive.js';
import { fileStem, hasExtension, safeName } from './naming.js';

export interface ProcessorOptions {
  mailbox: Mailbox;
  storage: RemoteStorage;
  converter: InvoiceConverter;
  processedIndex?: ProcessedMessageStore;
  /** Gmail label id marking completed messages */
  processedLabelId: string;
  destinationFolderId: string;
  mailboxAddress: string;
  markAsRead?: boolean;
  logger?: Logger;
}

interface PreparedUpload {
  folderName: string;
  files: OutputFile[];
}

export function isZipAttachment(part: AttachmentPart): boolean {
  return hasExtension(part.filename, '.zip');
}

export class MessageProcessor {
  private logger: Logger;

  constructor(private readonly options: ProcessorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run one message through the pipeline. Failures of the message itself are
   * reported as a `failed` outcome so a batch keeps going; transient IO is
   * flagged `retryable`. An unavailable state store or rejected credentials
   * fail the whole pass and are rethrown.
   */
  async process(candidate: CandidateMessage): Promise<Outcome> {
    const { messageId } = candidate;
    try {
      return await this.run(candidate);
    } catch (error) {
      if (error instanceof StateUnavailableError || error instanceof AuthRejectedError) {
        throw error;
      }

      const reason = errorMessage(error);
      if (error instanceof TransientIOError) {
        this.logger.warn({ messageId, reason }, 'Message deferred after transient failure');
        return { messageId, status: 'failed', reason, retryable: true };
      }
      if (error instanceof MalformedInputError) {
        this.logger.warn({ messageId, reason }, 'Message has no convertible invoice archive');
      } else {
        this.logger.error({ messageId, err: error }, 'Failed to process message');
      }
      return { messageId, status: 'failed', reason };
    }
  }

  private async run(candidate: CandidateMessage): Promise<Outcome> {
    const { mailbox, processedIndex, processedLabelId } = this.options;
    const { messageId } = candidate;

    if (candidate.hasAttachment === false) {
      return { messageId, status: 'skipped', reason: 'no ZIP attachment' };
    }

    if (processedIndex && (await processedIndex.has(messageId))) {
      return { messageId, status: 'skipped', reason: 'already recorded as processed' };
    }

    // Labels are re-read here; the candidate's labels may be stale
    const message = await mailbox.getMessage(messageId);
    if (message.labels.includes(processedLabelId)) {
      return { messageId, status: 'skipped', reason: 'processed label present' };
    }

    const archives = message.attachments.filter(isZipAttachment);
    if (archives.length === 0) {
      // Not an invoice mail at all; nothing to retry
      this.logger.debug({ messageId, subject: message.subject }, 'Message without ZIP attachment skipped');
      return { messageId, status: 'skipped', reason: 'no ZIP attachment' };
    }

    const uploads: PreparedUpload[] = [];
    for (const part of archives) {
      const data = await mailbox.getAttachment(messageId, part);
      if (data.length === 0) {
        this.logger.warn({ messageId, attachment: part.filename }, 'ZIP attachment is empty');
        continue;
      }

      try {
        uploads.push(await this.prepare(data));
      } catch (error) {
        if (!(error instanceof MalformedInputError)) throw error;
        this.logger.warn(
          { messageId, attachment: part.filename, reason: error.message },
          'ZIP attachment skipped: no convertible invoice'
        );
      }
    }

    if (uploads.length === 0) {
      throw new MalformedInputError('No ZIP attachment holds a convertible invoice');
    }

    const folders: UploadedFolder[] = [];
    for (const upload of uploads) {
      const folderId = await this.options.storage.uploadFolder(
        upload.files,
        this.options.destinationFolderId,
        upload.folderName
      );
      folders.push({ folderId, folderName: upload.folderName });
    }

    // Only after every upload succeeded
    await mailbox.setLabel(messageId, processedLabelId, { markAsRead: this.options.markAsRead ?? false });

    if (processedIndex) {
      try {
        await processedIndex.record({
          messageId,
          mailbox: this.options.mailboxAddress,
          destinationFolderId: folders.map((folder) => folder.folderId).join(','),
          folderName: folders.map((folder) => folder.folderName).join(','),
        });
      } catch (error) {
        // The label is already applied and remains the authoritative marker
        this.logger.warn({ messageId, err: errorMessage(error) }, 'Could not record processed message locally');
      }
    }

    this.logger.info({ messageId, subject: message.subject, folders }, 'Message processed');
    return { messageId, status: 'processed', folders };
  }

  private async prepare(data: Buffer): Promise<PreparedUpload> {
    const converted = await convertArchive(data, this.options.converter);
    const files = converted.pdf ? [...converted.files, converted.pdf] : [...converted.files];
    return {
      folderName: safeName(converted.invoiceId, safeName(fileStem(converted.xmlName))),
      files,
    };
  }
}
