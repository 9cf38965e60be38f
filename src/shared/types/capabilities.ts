// Capability contracts for the external collaborators the sync core depends on

export interface HistoryEntry {
  id: string;
  messagesAdded: Array<{
    messageId: string;
    threadId: string;
    labels: string[];
  }>;
}

export interface HistoryPage {
  entries: HistoryEntry[];
  /** Mailbox history id reported alongside this page */
  historyId: string;
  nextPageToken?: string;
}

export interface MessageSummary {
  messageId: string;
  threadId: string;
}

export interface SearchPage {
  messages: MessageSummary[];
  nextPageToken?: string;
}

export interface AttachmentPart {
  filename: string;
  mimeType: string;
  /** Inline base64url data for small parts */
  data?: string;
  attachmentId?: string;
}

export interface MailMessage {
  messageId: string;
  threadId: string;
  labels: string[];
  subject: string;
  attachments: AttachmentPart[];
}

export interface WatchRegistrationResult {
  historyId: string;
  expiration: Date;
}

export interface SetLabelOptions {
  markAsRead?: boolean;
}

export interface Mailbox {
  /** Resolved email address of the watched mailbox */
  getAddress(): Promise<string>;
  /** Throws HistoryExpiredError when the start cursor is too old */
  fetchHistory(startHistoryId: string, pageToken?: string): Promise<HistoryPage>;
  search(query: string, maxResults: number, pageToken?: string): Promise<SearchPage>;
  getMessage(messageId: string): Promise<MailMessage>;
  getAttachment(messageId: string, part: AttachmentPart): Promise<Buffer>;
  /** Resolve (creating if needed) a user label by display name, returning its id */
  ensureLabel(name: string): Promise<string>;
  setLabel(messageId: string, labelId: string, options?: SetLabelOptions): Promise<void>;
  createOrRenewWatch(labelIds: string[]): Promise<WatchRegistrationResult>;
}

export interface OutputFile {
  name: string;
  mimeType: string;
  content: Buffer;
}

export interface RemoteStorage {
  /**
   * Upload files into `folderName` under `parentId`. Calling again with the
   * same folder name reuses the folder and never duplicates files.
   */
  uploadFolder(files: OutputFile[], parentId: string, folderName: string): Promise<string>;
}

export interface ConversionResult {
  /** Invoice identity used to name the destination folder; empty if unknown */
  invoiceId: string;
  files: OutputFile[];
}

export interface InvoiceConverter {
  /** Throws MalformedInputError when `xml` holds no convertible invoice */
  convert(xml: Buffer, sourceName: string): Promise<ConversionResult>;
}
