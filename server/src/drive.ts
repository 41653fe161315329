import { google } from 'googleapis';
import { StorageError, type StorageEntry, type StorageProvider } from '../../src/api/storage.js';

export const FOLDER_MIME = 'application/vnd.google-apps.folder';

export interface DriveFile {
  id?: string | null;
  name?: string | null;
  mimeType?: string | null;
}

export interface DriveFileList {
  files?: DriveFile[];
  nextPageToken?: string | null;
}

/** The slice of the Drive v3 files resource the organizer needs */
export interface DriveFilesClient {
  list(params: { q: string; fields: string; pageSize: number; pageToken?: string }): Promise<DriveFileList>;
  create(params: {
    requestBody: { name: string; mimeType: string; parents: string[] };
    fields: string;
  }): Promise<DriveFile>;
  update(params: { fileId: string; addParents: string; removeParents: string; fields: string }): Promise<DriveFile>;
}

export interface DriveCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

/**
 * Files client backed by googleapis, authorized with a stored refresh token.
 */
export function createDriveFilesClient(creds: DriveCredentials): DriveFilesClient {
  const auth = new google.auth.OAuth2(creds.clientId, creds.clientSecret);
  auth.setCredentials({ refresh_token: creds.refreshToken });
  const files = google.drive({ version: 'v3', auth }).files;

  return {
    list: async (params) => (await files.list(params)).data,
    create: async (params) => (await files.create(params)).data,
    update: async (params) => (await files.update(params)).data,
  };
}

/** Quote a value for a Drive query string literal */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DriveStorage implements StorageProvider {
  constructor(
    private readonly files: DriveFilesClient,
    private readonly pageSize = 100,
  ) {}

  async list(containerId: string): Promise<StorageEntry[]> {
    const entries: StorageEntry[] = [];
    let pageToken: string | undefined;

    do {
      let page: DriveFileList;
      try {
        page = await this.files.list({
          q: `'${escapeQueryValue(containerId)}' in parents and trashed=false`,
          fields: 'nextPageToken, files(id, name, mimeType)',
          pageSize: this.pageSize,
          pageToken,
        });
      } catch (error) {
        throw new StorageError(`Listing ${containerId} failed: ${errorText(error)}`, error);
      }

      for (const file of page.files ?? []) {
        if (!file.id || !file.name) continue;
        entries.push({
          id: file.id,
          name: file.name,
          kind: file.mimeType === FOLDER_MIME ? 'folder' : 'file',
        });
      }
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken);

    return entries;
  }

  async createIfAbsent(name: string, parentId: string): Promise<string> {
    try {
      const existing = await this.files.list({
        q:
          `mimeType='${FOLDER_MIME}' and name='${escapeQueryValue(name)}' ` +
          `and '${escapeQueryValue(parentId)}' in parents and trashed=false`,
        fields: 'files(id, name)',
        pageSize: 1,
      });
      const found = existing.files?.[0]?.id;
      if (found) return found;

      console.log(`[Organize] Creating folder ${name}`);
      const created = await this.files.create({
        requestBody: { name, mimeType: FOLDER_MIME, parents: [parentId] },
        fields: 'id',
      });
      if (!created.id) throw new Error('Drive returned no folder id');
      return created.id;
    } catch (error) {
      throw new StorageError(`Could not create folder ${name}: ${errorText(error)}`, error);
    }
  }

  async move(itemId: string, fromId: string, toId: string): Promise<void> {
    // One update call swaps the parent, so the item is never in both or neither
    try {
      await this.files.update({
        fileId: itemId,
        addParents: toId,
        removeParents: fromId,
        fields: 'id, parents',
      });
    } catch (error) {
      throw new StorageError(`Drive move of ${itemId} failed: ${errorText(error)}`, error);
    }
  }
}
