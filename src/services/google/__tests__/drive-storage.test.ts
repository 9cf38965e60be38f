/**
 * Drive storage adapter tests
 */

import { beforeEach, describe, expect, test, vi } from 'vitest';
import { OAuth2Client } from 'google-auth-library';
import { DriveStorage, escapeDriveQueryValue } from '../drive-storage.js';

// Mock googleapis
const mockDrive = vi.hoisted(() => ({
  files: {
    list: vi.fn(),
    create: vi.fn(),
  },
}));

vi.mock('googleapis', () => ({
  google: {
    drive: () => mockDrive,
  },
}));

const files = [
  { name: 'INV-001.xlsx', mimeType: 'application/test', content: Buffer.from('xlsx') },
  { name: 'INV-001.pdf', mimeType: 'application/pdf', content: Buffer.from('pdf') },
];

beforeEach(() => {
  vi.clearAllMocks();
});

describe('escapeDriveQueryValue', () => {
  test('escapes quotes and backslashes', () => {
    expect(escapeDriveQueryValue("O'Brien\\co")).toBe("O\\'Brien\\\\co");
  });
});

describe('DriveStorage', () => {
  test('creates the folder and uploads every file when nothing exists', async () => {
    mockDrive.files.list.mockResolvedValue({ data: { files: [] } });
    mockDrive.files.create
      .mockResolvedValueOnce({ data: { id: 'folder-9', name: 'INV-001' } })
      .mockResolvedValue({ data: { id: 'file-x' } });

    const folderId = await new DriveStorage(new OAuth2Client()).uploadFolder(files, 'drive-root', 'INV-001');

    expect(folderId).toBe('folder-9');
    expect(mockDrive.files.create).toHaveBeenCalledTimes(3);
    expect(mockDrive.files.create.mock.calls[0][0]).toEqual({
      requestBody: { name: 'INV-001', mimeType: 'application/vnd.google-apps.folder', parents: ['drive-root'] },
      fields: 'id,name',
    });
    expect(mockDrive.files.list.mock.calls[0][0]).toMatchObject({
      q: "mimeType='application/vnd.google-apps.folder' and name='INV-001' and 'drive-root' in parents and trashed=false",
    });
  });

  test('reuses an existing folder and skips files already uploaded', async () => {
    mockDrive.files.list
      .mockResolvedValueOnce({ data: { files: [{ id: 'folder-1', name: 'INV-001' }] } })
      .mockResolvedValueOnce({ data: { files: [{ id: 'file-1', name: 'INV-001.xlsx' }] } })
      .mockResolvedValueOnce({ data: { files: [] } });
    mockDrive.files.create.mockResolvedValue({ data: { id: 'file-2' } });

    const folderId = await new DriveStorage(new OAuth2Client()).uploadFolder(files, 'drive-root', 'INV-001');

    expect(folderId).toBe('folder-1');
    expect(mockDrive.files.create).toHaveBeenCalledTimes(1);
    expect(mockDrive.files.create.mock.calls[0][0]).toMatchObject({
      requestBody: { name: 'INV-001.pdf', parents: ['folder-1'] },
      media: { mimeType: 'application/pdf' },
    });
  });
});
