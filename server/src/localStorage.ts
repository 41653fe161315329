import fs from 'fs/promises';
import path from 'path';
import { StorageError, type StorageEntry, type StorageProvider } from '../../src/api/storage.js';

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

/**
 * A directory tree as a storage provider. Ids are absolute paths; moves are
 * plain renames, so source and destination must share a filesystem.
 */
export class LocalStorage implements StorageProvider {
  async list(containerId: string): Promise<StorageEntry[]> {
    const dir = path.resolve(containerId);
    try {
      const dirents = await fs.readdir(dir, { withFileTypes: true });
      return dirents
        .filter((d) => d.isFile() || d.isDirectory())
        .map((d): StorageEntry => ({
          id: path.join(dir, d.name),
          name: d.name,
          kind: d.isDirectory() ? 'folder' : 'file',
        }));
    } catch (error) {
      throw new StorageError(`Cannot list ${dir}`, error);
    }
  }

  async createIfAbsent(name: string, parentId: string): Promise<string> {
    const target = path.join(path.resolve(parentId), name);
    try {
      await fs.mkdir(target, { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create folder ${target}`, error);
    }
    return target;
  }

  async move(itemId: string, fromId: string, toId: string): Promise<void> {
    const source = path.resolve(itemId);
    if (path.dirname(source) !== path.resolve(fromId)) {
      throw new StorageError(`${source} is not in ${fromId}`);
    }
    const target = path.join(path.resolve(toId), path.basename(source));
    if (await exists(target)) {
      throw new StorageError(`Refusing to overwrite ${target}`);
    }
    try {
      await fs.rename(source, target);
    } catch (error) {
      throw new StorageError(`Cannot move ${source} to ${toId}`, error);
    }
  }
}
