/**
 * Rule-based item classifier.
 *
 * Priority (strict):
 *   1. Extension match, across every rule in declaration order   [highest]
 *   2. Keyword substring match, across every rule in declaration order
 *   3. Catch-all (last rule, empty criteria)
 *
 * Keywords are plain substring containment on the lowercased name, so
 * 'tax' also matches 'taxonomy'. That is intended.
 */
import { z } from 'zod';
import type { Assignment, CategoryRule, Item, ItemKind, Ruleset } from '../domain/types';

export const DEFAULT_CATCH_ALL = '99_기타';

export class RulesetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RulesetError';
  }
}

/** Lowercase substring after the last '.', '' when there is none */
export function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  if (dot === -1) return '';
  return name.slice(dot + 1).toLowerCase();
}

export function toItem(entry: { id: string; name: string; kind: ItemKind }): Item {
  return {
    id: entry.id,
    name: entry.name,
    kind: entry.kind,
    extension: entry.kind === 'file' ? extensionOf(entry.name) : '',
  };
}

// --- Ruleset construction ---

export const RuleConfigSchema = z.object({
  id: z.string().trim().min(1),
  extensions: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
});

export const RulesFileSchema = z.object({
  catchAll: z.string().trim().min(1).optional(),
  skipPattern: z.string().optional(),
  rules: z.array(RuleConfigSchema),
});

export type RuleConfig = z.input<typeof RuleConfigSchema>;
export type RulesFile = z.infer<typeof RulesFileSchema>;

function normalizeExtension(ext: string): string {
  return ext.trim().toLowerCase().replace(/^\.+/, '');
}

function toRule(config: RuleConfig): CategoryRule {
  return {
    id: config.id.trim(),
    extensions: new Set((config.extensions ?? []).map(normalizeExtension).filter((e) => e.length > 0)),
    keywords: (config.keywords ?? []).map((k) => k.toLowerCase()).filter((k) => k.length > 0),
  };
}

function isEmptyRule(rule: CategoryRule): boolean {
  return rule.extensions.size === 0 && rule.keywords.length === 0;
}

/**
 * Build an ordered ruleset. A trailing rule with no criteria becomes the
 * catch-all; otherwise one named `catchAllId` (default `99_기타`) is appended.
 * Naming a different `catchAllId` next to a trailing empty rule is an error.
 */
export function createRuleset(configs: RuleConfig[], catchAllId?: string): Ruleset {
  const rules = configs.map(toRule);

  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new RulesetError(`Duplicate rule id: ${rule.id}`);
    }
    seen.add(rule.id);
  }

  const last = rules[rules.length - 1];
  if (last && isEmptyRule(last)) {
    if (catchAllId !== undefined && catchAllId !== last.id) {
      throw new RulesetError(
        `Catch-all id "${catchAllId}" conflicts with the trailing empty rule "${last.id}"`,
      );
    }
    return { rules, catchAll: last };
  }

  const id = catchAllId ?? DEFAULT_CATCH_ALL;
  if (seen.has(id)) {
    throw new RulesetError(`Catch-all id "${id}" is already used by a rule with criteria`);
  }
  const catchAll: CategoryRule = { id, extensions: new Set(), keywords: [] };
  return { rules: [...rules, catchAll], catchAll };
}

export function parseRulesFile(raw: unknown): { ruleset: Ruleset; skipPattern: RegExp | null } {
  const parsed = RulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new RulesetError(`Invalid rules file${where ? ` at ${where}` : ''}: ${issue?.message ?? 'unknown error'}`);
  }

  const { rules, catchAll, skipPattern } = parsed.data;
  let pattern: RegExp | null = null;
  if (skipPattern) {
    try {
      pattern = new RegExp(skipPattern);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RulesetError(`Invalid skipPattern: ${message}`);
    }
  }

  return { ruleset: createRuleset(rules, catchAll), skipPattern: pattern };
}

// --- Classification ---

export function classifyItem(item: Item, ruleset: Ruleset): Assignment {
  if (item.kind === 'file' && item.extension) {
    for (const rule of ruleset.rules) {
      if (rule.extensions.has(item.extension)) {
        return { item, ruleId: rule.id, matchedBy: 'extension' };
      }
    }
  }

  const name = item.name.toLowerCase();
  for (const rule of ruleset.rules) {
    for (const keyword of rule.keywords) {
      if (name.includes(keyword)) {
        return { item, ruleId: rule.id, matchedBy: 'keyword' };
      }
    }
  }

  return { item, ruleId: ruleset.catchAll.id, matchedBy: 'fallback' };
}

/** One assignment per item, in input order */
export function classify(items: readonly Item[], ruleset: Ruleset): Assignment[] {
  return items.map((item) => classifyItem(item, ruleset));
}
