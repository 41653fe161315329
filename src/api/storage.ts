/**
 * Hierarchical storage contract used by the organizer.
 * Implementations: DriveStorage (Google Drive), LocalStorage (a directory).
 */
import type { ItemKind } from '../domain/types';

export interface StorageEntry {
  id: string;
  name: string;
  kind: ItemKind;
}

export interface StorageProvider {
  /** Direct children of a container */
  list(containerId: string): Promise<StorageEntry[]>;

  /** Id of the child folder `name` under `parentId`, creating it when missing */
  createIfAbsent(name: string, parentId: string): Promise<string>;

  /** Relocate one item; must leave it either fully moved or untouched */
  move(itemId: string, fromId: string, toId: string): Promise<void>;
}

export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}
