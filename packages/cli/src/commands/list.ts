/**
 * List tracked files and the snapshot a window would select for each.
 */

import * as path from 'path';
import { existsSync } from 'fs';
import { loadConfig } from '../config';
import { TrackedFile, loadTrackedFiles } from '../services/history/SnapshotIndex';
import { isInScope } from '../services/restore/RestoreOrchestrator';
import { TimeWindow, selectSnapshot } from '../services/restore/TemporalSelector';
import { formatTimestamp, parseBoundMs } from '../utils/dates';
import { UsageError, isUsageError } from '../utils/errors';
import { ExcludeMatcher, excludeNothing, loadExcludeMatcher } from '../utils/ignore';
import { printError, printInfo, printPlain } from '../utils/messages';
import { isWithin, normalizeUserPath } from '../utils/paths';

export interface ListCommandOptions {
  after?: string;
  before?: string;
  exclude?: string[];
}

export interface ListingRow {
  source: string;
  snapshotCount: number;
  /** Timestamp of the snapshot the window selects, null when none does */
  selected: number | null;
}

/**
 * In-scope tracked files, sorted by path, with their selected snapshot.
 * An empty window selects each file's newest snapshot.
 */
export function buildListing(
  files: readonly TrackedFile[],
  sourceRoot: string,
  window: TimeWindow,
  isExcluded: ExcludeMatcher = excludeNothing
): ListingRow[] {
  const root = path.resolve(sourceRoot);
  return files
    .filter(file => isInScope(file.resource, root))
    .filter(file => !isExcluded(isWithin(file.resource, root) ? path.relative(root, file.resource) : path.basename(file.resource)))
    .map(file => {
      const chosen = selectSnapshot(file.entries, window);
      return {
        source: file.resource,
        snapshotCount: file.entries.length,
        selected: chosen ? chosen.timestamp : null,
      };
    })
    .sort((a, b) => a.source.localeCompare(b.source));
}

export function formatListingRow(row: ListingRow): string {
  const selected = row.selected === null ? '-' : formatTimestamp(row.selected);
  return `${row.source}  ${row.snapshotCount} snapshot(s)  selected: ${selected}`;
}

export async function listCommand(sourceRoot: string, historyRoot: string, options: ListCommandOptions): Promise<void> {
  try {
    const config = loadConfig();
    const history = normalizeUserPath(historyRoot);
    if (!existsSync(history)) {
      throw new UsageError(`history directory not found: ${history}`);
    }

    const afterMs = parseBoundMs(options.after);
    const beforeMs = parseBoundMs(options.before);
    if (afterMs !== undefined && beforeMs !== undefined && afterMs >= beforeMs) {
      throw new UsageError('--after must be earlier than --before.');
    }

    const files = await loadTrackedFiles(history, { indexFileName: config.indexFileName });
    const rows = buildListing(
      files,
      normalizeUserPath(sourceRoot),
      { afterMs, beforeMs },
      loadExcludeMatcher([...config.exclude, ...(options.exclude ?? [])])
    );

    if (rows.length === 0) {
      printInfo('No tracked files under the source root.');
      return;
    }

    rows.forEach(row => printPlain(formatListingRow(row)));
    const selectable = rows.filter(row => row.selected !== null).length;
    printPlain('');
    printInfo(
      `${rows.length} tracked file(s), ${selectable} with a snapshot in the window.`,
      selectable < rows.length ? 'Files marked "-" would be left untouched by restore.' : undefined
    );
  } catch (error) {
    if (isUsageError(error)) {
      printError(error.message);
    } else {
      printError('Unexpected error', error instanceof Error ? error : String(error));
    }
    process.exit(1);
  }
}
