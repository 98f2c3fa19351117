#!/usr/bin/env node

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

import { RestoreCommandOptions, restoreCommand, parsePositiveInt } from './commands/restore';
import { ListCommandOptions, listCommand } from './commands/list';
import { DEFAULT_MAX_INDEX_FILES } from './config';
import { printError } from './utils/messages';

const FALLBACK_VERSION = '0.1.0';

const PackageJsonSchema = z.object({ version: z.string() });

// Read version from package.json when running from source
function readVersion(): string {
  const packageJsonPath = join(__dirname, '../package.json');
  if (!existsSync(packageJsonPath)) {
    return FALLBACK_VERSION;
  }
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : FALLBACK_VERSION;
}

const program = new Command();

program
  .name('history-restore')
  .description('Restore files from VS Code / Cursor local history into an existing project tree')
  .version(readVersion());

program
  .command('restore', { isDefault: true })
  .description('Restore each file to its newest save inside a time window')
  .argument('<source-root>', "Original project root (the tree the history's resource paths point into)")
  .argument('<history-root>', "History root, e.g. '~/Library/Application Support/Code/User/History'")
  .argument('<destination-root>', 'Destination project root (the current tree to fix in place)')
  .option('--before <when>', "Upper bound, exclusive (e.g. '2025-09-20 10:20:00')")
  .option('--after <when>', 'Lower bound, inclusive')
  .option('--dry-run', "Plan only; don't write files")
  .option(
    '--max-index-files <n>',
    `Safety limit for indexing destination files (default: ${DEFAULT_MAX_INDEX_FILES})`,
    parsePositiveInt
  )
  .option('--min-suffix-match <n>', 'Path segments that must agree for a filename match (default: 1)', parsePositiveInt)
  .option('--refresh-index', 'Make files restored earlier in the run visible to filename matching')
  .option('--backup', 'Copy existing destination files aside before overwriting them')
  .option('--exclude <pattern...>', 'gitignore-style patterns to leave out')
  .action(async (sourceRoot: string, historyRoot: string, destinationRoot: string, options: RestoreCommandOptions) => {
    await restoreCommand(sourceRoot, historyRoot, destinationRoot, {
      ...options,
      dryRun: options.dryRun || false,
      refreshIndex: options.refreshIndex || false,
      backup: options.backup || false,
    });
  });

program
  .command('list')
  .description('List tracked files under the source root and the snapshot a window selects')
  .argument('<source-root>', 'Original project root')
  .argument('<history-root>', 'History root')
  .option('--before <when>', 'Upper bound, exclusive')
  .option('--after <when>', 'Lower bound, inclusive')
  .option('--exclude <pattern...>', 'gitignore-style patterns to leave out')
  .action(async (sourceRoot: string, historyRoot: string, options: ListCommandOptions) => {
    await listCommand(sourceRoot, historyRoot, options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  printError('Unexpected error', error instanceof Error ? error : String(error));
  process.exit(1);
});
