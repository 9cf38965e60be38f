// Google Drive implementation of the RemoteStorage capability
import { Readable } from 'stream';
import { google, drive_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import type { Logger } from '../../lib/logger.js';
import { silentLogger } from '../../lib/logger.js';
import { withRetry } from '../../lib/retry.js';
import type { OutputFile, RemoteStorage } from '../../shared/types/capabilities.js';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

export function escapeDriveQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export class DriveStorage implements RemoteStorage {
  private drive: drive_v3.Drive;
  private logger: Logger;

  constructor(auth: OAuth2Client, logger: Logger = silentLogger) {
    this.drive = google.drive({ version: 'v3', auth });
    this.logger = logger;
  }

  private retry<T>(operation: () => Promise<T>, name: string): Promise<T> {
    return withRetry(operation, name, { logger: this.logger });
  }

  async uploadFolder(files: OutputFile[], parentId: string, folderName: string): Promise<string> {
    const folderId = await this.ensureFolder(folderName, parentId);
    for (const file of files) {
      await this.uploadFileIfMissing(file, folderId);
    }
    return folderId;
  }

  private async findChild(query: string, name: string): Promise<string | undefined> {
    const listed = await this.retry(
      () =>
        this.drive.files.list({
          q: query,
          spaces: 'drive',
          fields: 'files(id,name)',
          pageSize: 1,
        }),
      name
    );
    const [first] = listed.data.files ?? [];
    return first?.id ?? undefined;
  }

  /**
   * Find a folder by name under `parentId`, creating it when absent
   */
  async ensureFolder(folderName: string, parentId: string): Promise<string> {
    const query =
      `mimeType='${FOLDER_MIME_TYPE}' and name='${escapeDriveQueryValue(folderName)}' ` +
      `and '${escapeDriveQueryValue(parentId)}' in parents and trashed=false`;

    const existing = await this.findChild(query, 'drive.files.list.folder');
    if (existing) {
      return existing;
    }

    const created = await this.retry(
      () =>
        this.drive.files.create({
          requestBody: {
            name: folderName,
            mimeType: FOLDER_MIME_TYPE,
            parents: [parentId],
          },
          fields: 'id,name',
        }),
      'drive.files.create.folder'
    );
    if (!created.data.id) {
      throw new Error(`Drive did not return an id for folder ${folderName}`);
    }

    this.logger.info({ folderName, folderId: created.data.id }, 'Created Drive folder');
    return created.data.id;
  }

  private async uploadFileIfMissing(file: OutputFile, folderId: string): Promise<void> {
    const query =
      `name='${escapeDriveQueryValue(file.name)}' and ` +
      `'${escapeDriveQueryValue(folderId)}' in parents and trashed=false`;

    const existing = await this.findChild(query, 'drive.files.list.file');
    if (existing) {
      this.logger.info({ file: file.name, folderId }, 'File already in Drive, keeping it');
      return;
    }

    await this.retry(
      () =>
        this.drive.files.create({
          requestBody: {
            name: file.name,
            parents: [folderId],
          },
          media: {
            mimeType: file.mimeType,
            body: Readable.from(file.content),
          },
          fields: 'id,name',
        }),
      'drive.files.create.file'
    );
    this.logger.info({ file: file.name, folderId }, 'Uploaded file to Drive');
  }
}
