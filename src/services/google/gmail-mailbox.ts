// Gmail API implementation of the Mailbox capability
import { google, gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { HistoryExpiredError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import { silentLogger } from '../../lib/logger.js';
import { httpStatusOf, withRetry } from '../../lib/retry.js';
import type {
  AttachmentPart,
  HistoryEntry,
  HistoryPage,
  Mailbox,
  MailMessage,
  SearchPage,
  SetLabelOptions,
  WatchRegistrationResult,
} from '../../shared/types/capabilities.js';

export interface GmailMailboxOptions {
  userId?: string;
  topicName?: string;
  labelFilterAction?: 'include' | 'exclude';
  historyPageSize?: number;
  logger?: Logger;
}

/**
 * Extract header value from message
 */
export function getHeader(message: gmail_v1.Schema$Message, name: string): string | undefined {
  const headers = message.payload?.headers || [];
  const header = headers.find((h) => h.name?.toLowerCase() === name.toLowerCase());
  return header?.value ?? undefined;
}

/**
 * Flatten the MIME tree and keep the parts that carry a file name
 */
export function collectAttachmentParts(payload: gmail_v1.Schema$MessagePart | undefined): AttachmentPart[] {
  const parts: AttachmentPart[] = [];
  const stack: gmail_v1.Schema$MessagePart[] = payload ? [payload] : [];

  while (stack.length > 0) {
    const part = stack.shift();
    if (!part) break;

    const filename = (part.filename ?? '').trim();
    if (filename) {
      parts.push({
        filename,
        mimeType: part.mimeType ?? 'application/octet-stream',
        data: part.body?.data ?? undefined,
        attachmentId: part.body?.attachmentId ?? undefined,
      });
    }

    stack.push(...(part.parts ?? []));
  }

  return parts;
}

export function toHistoryEntry(record: gmail_v1.Schema$History): HistoryEntry {
  const messagesAdded: HistoryEntry['messagesAdded'] = [];
  for (const added of record.messagesAdded ?? []) {
    const id = added.message?.id;
    if (!id) continue;
    messagesAdded.push({
      messageId: id,
      threadId: added.message?.threadId ?? '',
      labels: added.message?.labelIds ?? [],
    });
  }

  return { id: record.id ?? '', messagesAdded };
}

export class GmailMailbox implements Mailbox {
  private gmail: gmail_v1.Gmail;
  private userId: string;
  private logger: Logger;
  private labelCache = new Map<string, string>();
  private address?: string;

  constructor(
    auth: OAuth2Client,
    private readonly options: GmailMailboxOptions = {}
  ) {
    this.gmail = google.gmail({ version: 'v1', auth });
    this.userId = options.userId ?? 'me';
    this.logger = options.logger ?? silentLogger;
  }

  private retry<T>(operation: () => Promise<T>, name: string): Promise<T> {
    return withRetry(operation, name, { logger: this.logger });
  }

  async getAddress(): Promise<string> {
    if (this.address) {
      return this.address;
    }

    const response = await this.retry(
      () => this.gmail.users.getProfile({ userId: this.userId }),
      'gmail.users.getProfile'
    );
    if (!response.data.emailAddress) {
      throw new Error('Failed to get user profile from Gmail');
    }

    this.address = response.data.emailAddress;
    return this.address;
  }

  /**
   * One page of messageAdded history records since `startHistoryId`
   */
  async fetchHistory(startHistoryId: string, pageToken?: string): Promise<HistoryPage> {
    try {
      const response = await this.retry(
        () =>
          this.gmail.users.history.list({
            userId: this.userId,
            startHistoryId,
            pageToken,
            maxResults: this.options.historyPageSize ?? 500,
            historyTypes: ['messageAdded'],
          }),
        'gmail.users.history.list'
      );

      return {
        entries: (response.data.history ?? []).map(toHistoryEntry),
        historyId: response.data.historyId?.toString() || startHistoryId,
        nextPageToken: response.data.nextPageToken ?? undefined,
      };
    } catch (error) {
      // startHistoryId older than the retained history window
      if (httpStatusOf(error) === 404) {
        throw new HistoryExpiredError(startHistoryId, { cause: error });
      }
      throw error;
    }
  }

  async search(query: string, maxResults: number, pageToken?: string): Promise<SearchPage> {
    const response = await this.retry(
      () =>
        this.gmail.users.messages.list({
          userId: this.userId,
          q: query,
          maxResults,
          pageToken,
        }),
      'gmail.users.messages.list'
    );

    const messages = (response.data.messages ?? []).flatMap((message) =>
      message.id ? [{ messageId: message.id, threadId: message.threadId ?? '' }] : []
    );

    return { messages, nextPageToken: response.data.nextPageToken ?? undefined };
  }

  async getMessage(messageId: string): Promise<MailMessage> {
    const response = await this.retry(
      () =>
        this.gmail.users.messages.get({
          userId: this.userId,
          id: messageId,
          format: 'full',
        }),
      'gmail.users.messages.get'
    );

    const message = response.data;
    return {
      messageId: message.id ?? messageId,
      threadId: message.threadId ?? '',
      labels: message.labelIds ?? [],
      subject: getHeader(message, 'Subject') ?? '',
      attachments: collectAttachmentParts(message.payload),
    };
  }

  async getAttachment(messageId: string, part: AttachmentPart): Promise<Buffer> {
    let encoded = part.data;

    if (part.attachmentId) {
      const attachmentId = part.attachmentId;
      const response = await this.retry(
        () =>
          this.gmail.users.messages.attachments.get({
            userId: this.userId,
            messageId,
            id: attachmentId,
          }),
        'gmail.users.messages.attachments.get'
      );
      encoded = response.data.data ?? undefined;
    }

    if (!encoded) {
      return Buffer.alloc(0);
    }
    return Buffer.from(encoded, 'base64url');
  }

  async ensureLabel(name: string): Promise<string> {
    const cached = this.labelCache.get(name);
    if (cached) {
      return cached;
    }

    const listed = await this.retry(
      () => this.gmail.users.labels.list({ userId: this.userId }),
      'gmail.users.labels.list'
    );
    const existing = (listed.data.labels ?? []).find((label) => label.name === name);
    if (existing?.id) {
      this.labelCache.set(name, existing.id);
      return existing.id;
    }

    const created = await this.retry(
      () =>
        this.gmail.users.labels.create({
          userId: this.userId,
          requestBody: {
            name,
            labelListVisibility: 'labelShow',
            messageListVisibility: 'show',
          },
        }),
      'gmail.users.labels.create'
    );
    if (!created.data.id) {
      throw new Error(`Failed to create label: ${name}`);
    }

    this.logger.info({ label: name, labelId: created.data.id }, 'Created Gmail label');
    this.labelCache.set(name, created.data.id);
    return created.data.id;
  }

  async setLabel(messageId: string, labelId: string, options: SetLabelOptions = {}): Promise<void> {
    await this.retry(
      () =>
        this.gmail.users.messages.modify({
          userId: this.userId,
          id: messageId,
          requestBody: {
            addLabelIds: [labelId],
            removeLabelIds: options.markAsRead ? ['UNREAD'] : [],
          },
        }),
      'gmail.users.messages.modify'
    );
  }

  /**
   * Watch mailbox for push notifications via Pub/Sub
   */
  async createOrRenewWatch(labelIds: string[]): Promise<WatchRegistrationResult> {
    const topicName = this.options.topicName;
    if (!topicName) {
      throw new Error('watch.topicName must be configured to register a Gmail watch');
    }

    const requestBody: gmail_v1.Schema$WatchRequest = { topicName };
    if (labelIds.length > 0) {
      requestBody.labelIds = labelIds;
      requestBody.labelFilterAction = this.options.labelFilterAction ?? 'include';
    }

    const response = await this.retry(
      () => this.gmail.users.watch({ userId: this.userId, requestBody }),
      'gmail.users.watch'
    );

    if (!response.data.historyId || !response.data.expiration) {
      throw new Error('Failed to set up Gmail watch');
    }

    return {
      historyId: response.data.historyId.toString(),
      expiration: new Date(parseInt(response.data.expiration, 10)),
    };
  }
}
