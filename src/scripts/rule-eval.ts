/**
 * Rule Evaluation Script
 * Classifies a list of names (or a directory listing) without touching anything
 * and reports coverage per category.
 * Usage: npm run ruleeval -- (--file <names.txt> | --dir <path>) [--rules <rules.json>]
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { classify, parseRulesFile, toItem } from '../api/classifier.js';
import type { Assignment, Item, Ruleset } from '../domain/types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_RULES = path.join(__dirname, '../data/default-rules.json');

function argValue(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx !== -1 && args[idx + 1]) return args[idx + 1] ?? null;
  return null;
}

function parseArgs(): { filePath: string | null; dirPath: string | null; rulesPath: string } {
  const args = process.argv.slice(2);
  return {
    filePath: argValue(args, '--file'),
    dirPath: argValue(args, '--dir'),
    rulesPath: argValue(args, '--rules') ?? DEFAULT_RULES,
  };
}

function printUsage(): void {
  console.log(`
Rule Evaluation Script
======================
Usage: npm run ruleeval -- (--file <names.txt> | --dir <path>) [--rules <rules.json>]

Examples:
  npm run ruleeval -- --file ./names.txt          one file name per line; a trailing '/' marks a folder
  npm run ruleeval -- --dir ~/Downloads

Prints:
1. Items per category
2. How each item matched (extension / keyword / catch-all)
3. Coverage and the most common unmatched extensions
`);
}

function itemsFromFile(filePath: string): Item[] {
  return fs
    .readFileSync(filePath, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line, idx) =>
      line.endsWith('/')
        ? toItem({ id: `line-${idx + 1}`, name: line.slice(0, -1), kind: 'folder' })
        : toItem({ id: `line-${idx + 1}`, name: line, kind: 'file' }),
    );
}

function itemsFromDir(dirPath: string): Item[] {
  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .filter((d) => d.isFile() || d.isDirectory())
    .map((d) => toItem({ id: path.join(dirPath, d.name), name: d.name, kind: d.isDirectory() ? 'folder' : 'file' }));
}

function runEvaluation(assignments: Assignment[], ruleset: Ruleset): void {
  console.log('\n=== Rule evaluation ===\n');

  const total = assignments.length;
  console.log(`Items: ${total}`);

  const categoryStats = new Map<string, number>();
  const sourceStats = new Map<string, number>();
  const unmatchedExtensions = new Map<string, number>();

  for (const { item, ruleId, matchedBy } of assignments) {
    categoryStats.set(ruleId, (categoryStats.get(ruleId) || 0) + 1);
    sourceStats.set(matchedBy, (sourceStats.get(matchedBy) || 0) + 1);
    if (matchedBy === 'fallback') {
      const ext = item.kind === 'folder' ? '(folder)' : item.extension || '(none)';
      unmatchedExtensions.set(ext, (unmatchedExtensions.get(ext) || 0) + 1);
    }
  }

  console.log('\n--- Per category ---');
  const sortedCategories = Array.from(categoryStats.entries()).sort((a, b) => b[1] - a[1]);
  for (const [category, count] of sortedCategories) {
    const percent = ((count / total) * 100).toFixed(1);
    console.log(`${category}: ${count} (${percent}%)`);
  }

  console.log('\n--- Matched by ---');
  for (const [source, count] of sourceStats.entries()) {
    console.log(`${source}: ${count}`);
  }

  const fallback = categoryStats.get(ruleset.catchAll.id) || 0;
  const coveragePercent = total > 0 ? (((total - fallback) / total) * 100).toFixed(1) : '0.0';
  console.log(`\n--- Coverage ---`);
  console.log(`Classified: ${total - fallback} (${coveragePercent}%)`);
  console.log(`Catch-all (${ruleset.catchAll.id}): ${fallback}`);

  if (unmatchedExtensions.size > 0) {
    console.log('\n--- Unmatched extensions TOP 10 ---');
    Array.from(unmatchedExtensions.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, 10)
      .forEach(([ext, count], idx) => {
        console.log(`${idx + 1}. ${ext} (${count})`);
      });
  }

  console.log('\n=== Done ===');
}

async function main(): Promise<void> {
  const { filePath, dirPath, rulesPath } = parseArgs();

  if (!filePath && !dirPath) {
    printUsage();
    process.exit(1);
  }

  const resolvedRules = path.resolve(rulesPath);
  if (!fs.existsSync(resolvedRules)) {
    console.error(`Error: rules file not found: ${resolvedRules}`);
    process.exit(1);
  }
  const { ruleset } = parseRulesFile(JSON.parse(fs.readFileSync(resolvedRules, 'utf-8')));

  const source = path.resolve(filePath ?? dirPath ?? '.');
  if (!fs.existsSync(source)) {
    console.error(`Error: not found: ${source}`);
    process.exit(1);
  }

  console.log(`Reading: ${source}`);
  const items = filePath ? itemsFromFile(source) : itemsFromDir(source);

  runEvaluation(classify(items, ruleset), ruleset);
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
