/**
 * Organize a folder into <destination>/<category> sub-folders.
 * Usage: npm run organize -- (--local <dir> | --drive [--folder <id>]) [--rules <file>] [--dry-run]
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseRulesFile } from '../../src/api/classifier.js';
import { organize, type OrganizeReport } from '../../src/api/organizer.js';
import type { StorageProvider } from '../../src/api/storage.js';
import { config } from '../src/config.js';
import { DriveStorage, createDriveFilesClient } from '../src/drive.js';
import { LocalStorage } from '../src/localStorage.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_RULES = path.join(__dirname, '../../src/data/default-rules.json');

interface Args {
  local: string | null;
  drive: boolean;
  folder: string;
  rules: string;
  dryRun: boolean;
}

function valueAfter(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1) return null;
  const value = args[idx + 1];
  return value && !value.startsWith('--') ? value : null;
}

function parseArgs(): Args | null {
  const args = process.argv.slice(2);
  const local = valueAfter(args, '--local');
  const drive = args.includes('--drive');

  // Exactly one source
  if ((local === null) === !drive) return null;
  if (args.includes('--local') && local === null) return null;

  return {
    local,
    drive,
    folder: valueAfter(args, '--folder') ?? 'root',
    rules: valueAfter(args, '--rules') ?? DEFAULT_RULES,
    dryRun: args.includes('--dry-run'),
  };
}

function printUsage(): void {
  console.log(`
Folder organizer
================
Usage: npm run organize -- (--local <dir> | --drive [--folder <id>]) [--rules <file>] [--dry-run]

Examples:
  npm run organize -- --local ~/Downloads --dry-run
  npm run organize -- --drive --rules ./my-rules.json

Every direct child of the source is moved into
"${config.organizeDestination}/<category>" by extension, then name keyword.
Nothing is deleted. Drive access needs DRIVE_CLIENT_ID, DRIVE_CLIENT_SECRET
and DRIVE_REFRESH_TOKEN in .env.
`);
}

function buildStorage(args: Args): { storage: StorageProvider; sourceId: string } {
  if (args.local !== null) {
    return { storage: new LocalStorage(), sourceId: path.resolve(args.local) };
  }

  if (!config.driveClientId || !config.driveClientSecret || !config.driveRefreshToken) {
    throw new Error('Drive credentials are missing (DRIVE_CLIENT_ID / DRIVE_CLIENT_SECRET / DRIVE_REFRESH_TOKEN)');
  }
  const client = createDriveFilesClient({
    clientId: config.driveClientId,
    clientSecret: config.driveClientSecret,
    refreshToken: config.driveRefreshToken,
  });
  return { storage: new DriveStorage(client), sourceId: args.folder };
}

function printTally(report: OrganizeReport): void {
  const counts = new Map<string, number>();
  for (const { ruleId } of report.assignments) {
    counts.set(ruleId, (counts.get(ruleId) || 0) + 1);
  }

  console.log('\n--- Per category ---');
  const sorted = Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
  for (const [ruleId, count] of sorted) {
    console.log(`${ruleId}: ${count}`);
  }

  if (report.failures.length > 0) {
    console.log('\n--- Failed ---');
    for (const failure of report.failures) {
      console.log(`${failure.item.name} → ${failure.ruleId}: ${failure.error}`);
    }
  }
}

async function main(): Promise<void> {
  const args = parseArgs();
  if (!args) {
    printUsage();
    process.exit(1);
  }

  const rulesPath = path.resolve(args.rules);
  if (!fs.existsSync(rulesPath)) {
    console.error(`[Organize] Rules file not found: ${rulesPath}`);
    process.exit(1);
  }
  const { ruleset, skipPattern } = parseRulesFile(JSON.parse(fs.readFileSync(rulesPath, 'utf-8')));
  console.log(`[Organize] ${ruleset.rules.length} rules from ${rulesPath}`);

  const { storage, sourceId } = buildStorage(args);
  const report = await organize(storage, ruleset, {
    sourceId,
    destinationName: config.organizeDestination,
    skipPattern,
    dryRun: args.dryRun,
  });

  printTally(report);

  if (report.failed > 0) {
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('[Organize] Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
