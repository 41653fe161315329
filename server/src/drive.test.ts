import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { DriveStorage, FOLDER_MIME, escapeQueryValue, type DriveFilesClient } from './drive.js';
import { StorageError } from '../../src/api/storage.js';

function fakeClient(): {
  client: DriveFilesClient;
  list: Mock<DriveFilesClient['list']>;
  create: Mock<DriveFilesClient['create']>;
  update: Mock<DriveFilesClient['update']>;
} {
  const list = vi.fn<DriveFilesClient['list']>(async () => ({ files: [] }));
  const create = vi.fn<DriveFilesClient['create']>(async () => ({ id: 'new-folder' }));
  const update = vi.fn<DriveFilesClient['update']>(async ({ fileId }) => ({ id: fileId }));
  return { client: { list, create, update }, list, create, update };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('escapeQueryValue', () => {
  it('escapes quotes and backslashes', () => {
    expect(escapeQueryValue("Bob's \\ notes")).toBe("Bob\\'s \\\\ notes");
  });
});

describe('DriveStorage', () => {
  it('lists every page of children and maps folder mime types', async () => {
    const fake = fakeClient();
    fake.list
      .mockResolvedValueOnce({
        files: [
          { id: 'a', name: 'logo.png', mimeType: 'image/png' },
          { id: 'b', name: 'Projects', mimeType: FOLDER_MIME },
        ],
        nextPageToken: 'page-2',
      })
      .mockResolvedValueOnce({ files: [{ id: 'c', name: 'tax.pdf', mimeType: 'application/pdf' }] });

    const entries = await new DriveStorage(fake.client).list('root');

    expect(entries).toEqual([
      { id: 'a', name: 'logo.png', kind: 'file' },
      { id: 'b', name: 'Projects', kind: 'folder' },
      { id: 'c', name: 'tax.pdf', kind: 'file' },
    ]);
    expect(fake.list).toHaveBeenCalledTimes(2);
    expect(fake.list.mock.calls[0]?.[0]).toMatchObject({ q: "'root' in parents and trashed=false", pageToken: undefined });
    expect(fake.list.mock.calls[1]?.[0]).toMatchObject({ pageToken: 'page-2' });
  });

  it('reuses an existing folder', async () => {
    const fake = fakeClient();
    fake.list.mockResolvedValueOnce({ files: [{ id: 'existing', name: '01_Code' }] });

    const id = await new DriveStorage(fake.client).createIfAbsent('01_Code', 'dest');

    expect(id).toBe('existing');
    expect(fake.create).not.toHaveBeenCalled();
    expect(fake.list.mock.calls[0]?.[0].q).toBe(
      `mimeType='${FOLDER_MIME}' and name='01_Code' and 'dest' in parents and trashed=false`,
    );
  });

  it('creates a missing folder under the parent', async () => {
    const fake = fakeClient();
    const id = await new DriveStorage(fake.client).createIfAbsent("Kim's files", 'root');

    expect(id).toBe('new-folder');
    expect(fake.list.mock.calls[0]?.[0].q).toContain("name='Kim\\'s files'");
    expect(fake.create).toHaveBeenCalledWith({
      requestBody: { name: "Kim's files", mimeType: FOLDER_MIME, parents: ['root'] },
      fields: 'id',
    });
  });

  it('moves with a single parent swap', async () => {
    const fake = fakeClient();
    await new DriveStorage(fake.client).move('file-1', 'src', 'dst');

    expect(fake.update).toHaveBeenCalledTimes(1);
    expect(fake.update).toHaveBeenCalledWith({
      fileId: 'file-1',
      addParents: 'dst',
      removeParents: 'src',
      fields: 'id, parents',
    });
  });

  it('wraps API failures in StorageError', async () => {
    const fake = fakeClient();
    fake.update.mockRejectedValueOnce(new Error('insufficientPermissions'));

    const move = new DriveStorage(fake.client).move('file-1', 'src', 'dst');
    await expect(move).rejects.toBeInstanceOf(StorageError);
    await expect(move).rejects.toThrow('Drive move of file-1 failed: insufficientPermissions');
  });
});
