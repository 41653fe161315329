/**
 * Applies classifier assignments to a storage container.
 *
 * Single pass: list once, classify, then move each item into
 * <destination>/<rule id>. Containers are created on first use and cached
 * for the run. Nothing is ever deleted; a failed move is recorded and the
 * batch carries on.
 */
import { classify, toItem } from './classifier';
import { StorageError, type StorageProvider } from './storage';
import type { Assignment, Item, Ruleset } from '../domain/types';

export interface OrganizeOptions {
  sourceId: string;
  destinationName: string;
  skipPattern?: RegExp | null;
  dryRun?: boolean;
  log?: (line: string) => void;
}

export interface OrganizeFailure {
  item: Item;
  ruleId: string;
  error: string;
}

export interface OrganizeReport {
  moved: number;
  failed: number;
  skipped: number;
  assignments: Assignment[];
  failures: OrganizeFailure[];
  lines: string[];
}

export function moveLine(name: string, ruleId: string): string {
  return `${name} → ${ruleId}`;
}

export function summaryLine(report: Pick<OrganizeReport, 'moved' | 'failed' | 'skipped'>): string {
  return `${report.moved} moved, ${report.failed} failed, ${report.skipped} skipped`;
}

export async function organize(
  storage: StorageProvider,
  ruleset: Ruleset,
  options: OrganizeOptions,
): Promise<OrganizeReport> {
  const log = options.log ?? ((line: string) => console.log(`[Organize] ${line}`));
  const reserved = new Set([options.destinationName, ...ruleset.rules.map((r) => r.id)]);

  const entries = await storage.list(options.sourceId);

  // A file holding the destination name would fail every move, so stop before the first
  const blocker = entries.find((e) => e.kind === 'file' && e.name === options.destinationName);
  if (blocker) {
    throw new StorageError(
      `Destination "${options.destinationName}" cannot be created: a file with that name is in the source`,
    );
  }

  const items: Item[] = [];
  let skipped = 0;
  for (const entry of entries) {
    // Our own containers stay where they are
    if (entry.kind === 'folder' && (reserved.has(entry.name) || options.skipPattern?.test(entry.name))) {
      skipped++;
      continue;
    }
    items.push(toItem(entry));
  }

  const assignments = classify(items, ruleset);
  const report: OrganizeReport = { moved: 0, failed: 0, skipped, assignments, failures: [], lines: [] };

  if (options.dryRun) {
    for (const { item, ruleId } of assignments) {
      const line = moveLine(item.name, ruleId);
      report.lines.push(line);
      log(`(dry run) ${line}`);
    }
    log(`(dry run) ${assignments.length} items classified, ${skipped} skipped`);
    return report;
  }

  let destinationId: string | null = null;
  const containers = new Map<string, string>();

  async function containerFor(ruleId: string): Promise<string> {
    const cached = containers.get(ruleId);
    if (cached) return cached;
    if (destinationId === null) {
      destinationId = await storage.createIfAbsent(options.destinationName, options.sourceId);
    }
    const id = await storage.createIfAbsent(ruleId, destinationId);
    containers.set(ruleId, id);
    return id;
  }

  for (const { item, ruleId } of assignments) {
    try {
      const targetId = await containerFor(ruleId);
      await storage.move(item.id, options.sourceId, targetId);
      report.moved++;
      const line = moveLine(item.name, ruleId);
      report.lines.push(line);
      log(line);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      report.failed++;
      report.failures.push({ item, ruleId, error: message });
      console.error(`[Organize] Failed to move ${item.name} → ${ruleId}:`, message);
    }
  }

  log(summaryLine(report));
  return report;
}
