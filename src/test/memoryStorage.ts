import { StorageError, type StorageEntry, type StorageProvider } from '../api/storage';
import type { ItemKind } from '../domain/types';

interface Node {
  id: string;
  name: string;
  kind: ItemKind;
  parentId: string | null;
}

/** In-process StorageProvider for tests */
export class MemoryStorage implements StorageProvider {
  readonly nodes = new Map<string, Node>();
  readonly created: string[] = [];
  readonly failMoves = new Set<string>();
  private seq = 0;

  constructor(readonly rootId = 'root') {
    this.nodes.set(rootId, { id: rootId, name: rootId, kind: 'folder', parentId: null });
  }

  add(name: string, kind: ItemKind, parentId: string = this.rootId): string {
    const id = `n${++this.seq}`;
    this.nodes.set(id, { id, name, kind, parentId });
    return id;
  }

  parentOf(id: string): string | null {
    return this.nodes.get(id)?.parentId ?? null;
  }

  nameOf(id: string | null): string | null {
    if (id === null) return null;
    return this.nodes.get(id)?.name ?? null;
  }

  async list(containerId: string): Promise<StorageEntry[]> {
    return [...this.nodes.values()]
      .filter((n) => n.parentId === containerId)
      .map(({ id, name, kind }) => ({ id, name, kind }));
  }

  async createIfAbsent(name: string, parentId: string): Promise<string> {
    const existing = [...this.nodes.values()].find(
      (n) => n.parentId === parentId && n.kind === 'folder' && n.name === name,
    );
    if (existing) return existing.id;
    const id = this.add(name, 'folder', parentId);
    this.created.push(name);
    return id;
  }

  async move(itemId: string, fromId: string, toId: string): Promise<void> {
    const node = this.nodes.get(itemId);
    if (!node || node.parentId !== fromId) {
      throw new StorageError(`Item ${itemId} is not in ${fromId}`);
    }
    if (this.failMoves.has(node.name)) {
      throw new StorageError(`Write refused for ${node.name}`);
    }
    node.parentId = toId;
  }
}
