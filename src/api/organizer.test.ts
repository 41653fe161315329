import { describe, it, expect, vi } from 'vitest';
import { createRuleset } from './classifier';
import { organize } from './organizer';
import { StorageError } from './storage';
import { MemoryStorage } from '../test/memoryStorage';

const ruleset = createRuleset([
  { id: '01_Images', extensions: ['png', 'jpg'] },
  { id: '02_Tax', keywords: ['tax', '세무'] },
  { id: '99_Other' },
]);

function seed() {
  const storage = new MemoryStorage();
  const ids = {
    report: storage.add('report_tax.pdf', 'file'),
    logo: storage.add('logo.png', 'file'),
    random: storage.add('random.txt', 'file'),
    taxFolder: storage.add('세무 자료', 'folder'),
  };
  return { storage, ids };
}

describe('organize', () => {
  it('moves every item into <destination>/<rule id>', async () => {
    const { storage, ids } = seed();
    const log = vi.fn();

    const report = await organize(storage, ruleset, { sourceId: 'root', destinationName: 'Sorted', log });

    expect(report.moved).toBe(4);
    expect(report.failed).toBe(0);
    expect(storage.nameOf(storage.parentOf(ids.report))).toBe('02_Tax');
    expect(storage.nameOf(storage.parentOf(ids.logo))).toBe('01_Images');
    expect(storage.nameOf(storage.parentOf(ids.random))).toBe('99_Other');
    expect(storage.nameOf(storage.parentOf(ids.taxFolder))).toBe('02_Tax');
    expect(report.lines).toEqual([
      'report_tax.pdf → 02_Tax',
      'logo.png → 01_Images',
      'random.txt → 99_Other',
      '세무 자료 → 02_Tax',
    ]);
    expect(log).toHaveBeenLastCalledWith('4 moved, 0 failed, 0 skipped');
  });

  it('creates containers lazily and only once', async () => {
    const { storage } = seed();
    storage.add('second_tax.doc', 'file');

    await organize(storage, ruleset, { sourceId: 'root', destinationName: 'Sorted', log: vi.fn() });

    expect(storage.created).toEqual(['Sorted', '02_Tax', '01_Images', '99_Other']);
  });

  it('never deletes: the set of item ids is preserved', async () => {
    const { storage } = seed();
    const before = [...storage.nodes.keys()].filter((id) => id !== 'root').sort();

    await organize(storage, ruleset, { sourceId: 'root', destinationName: 'Sorted', log: vi.fn() });

    const after = [...storage.nodes.keys()].filter((id) => id !== 'root');
    for (const id of before) {
      expect(after).toContain(id);
      expect(storage.parentOf(id)).not.toBeNull();
    }
  });

  it('continues after a failed move and reports it', async () => {
    const { storage, ids } = seed();
    storage.failMoves.add('logo.png');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const report = await organize(storage, ruleset, { sourceId: 'root', destinationName: 'Sorted', log: vi.fn() });

    expect(report.moved).toBe(3);
    expect(report.failed).toBe(1);
    expect(report.failures).toEqual([
      { item: expect.objectContaining({ name: 'logo.png' }), ruleId: '01_Images', error: 'Write refused for logo.png' },
    ]);
    expect(storage.parentOf(ids.logo)).toBe('root');
    expect(storage.nameOf(storage.parentOf(ids.random))).toBe('99_Other');
    errorSpy.mockRestore();
  });

  it('leaves its own containers and skip-pattern folders alone', async () => {
    const { storage } = seed();
    const existing = storage.add('Sorted', 'folder');
    storage.add('02_Tax', 'folder');
    storage.add('07_Old', 'folder');

    const report = await organize(storage, ruleset, {
      sourceId: 'root',
      destinationName: 'Sorted',
      skipPattern: /^\d{2}_/,
      log: vi.fn(),
    });

    expect(report.skipped).toBe(3);
    expect(report.moved).toBe(4);
    expect(storage.parentOf(existing)).toBe('root');
    expect(storage.created).not.toContain('Sorted');
  });

  it('dry run classifies without touching storage', async () => {
    const { storage, ids } = seed();

    const report = await organize(storage, ruleset, {
      sourceId: 'root',
      destinationName: 'Sorted',
      dryRun: true,
      log: vi.fn(),
    });

    expect(report.moved).toBe(0);
    expect(report.assignments.map((a) => a.ruleId)).toEqual(['02_Tax', '01_Images', '99_Other', '02_Tax']);
    expect(storage.created).toEqual([]);
    expect(storage.parentOf(ids.logo)).toBe('root');
  });

  it('stops before moving anything when a file holds the destination name', async () => {
    const { storage, ids } = seed();
    storage.add('Sorted', 'file');

    const run = organize(storage, ruleset, { sourceId: 'root', destinationName: 'Sorted', log: vi.fn() });

    await expect(run).rejects.toBeInstanceOf(StorageError);
    await expect(run).rejects.toThrow(
      'Destination "Sorted" cannot be created: a file with that name is in the source',
    );
    expect(storage.created).toEqual([]);
    expect(storage.parentOf(ids.logo)).toBe('root');
  });
});
