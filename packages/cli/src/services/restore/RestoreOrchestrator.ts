import { promises as fs } from 'fs';
import * as path from 'path';
import * as fsExtra from 'fs-extra';
import { BlobLocator } from '../history/BlobLocator';
import type { TrackedFile } from '../history/SnapshotIndex';
import { errorMessage } from '../../utils/errors';
import { ExcludeMatcher, excludeNothing } from '../../utils/ignore';
import { Logger, consoleLogger } from '../../utils/messages';
import { isWithin, pathSegments } from '../../utils/paths';
import { DestinationPlacer, PlacementTier } from './DestinationPlacer';
import { TimeWindow, selectSnapshot } from './TemporalSelector';

export type RestoreAction = 'RESTORED' | 'WOULD_RESTORE';

export type SkipReason = 'out-of-scope' | 'excluded' | 'no-match' | 'missing-blob' | 'read-failed' | 'write-failed';

export interface RestoreOutcome {
  action: RestoreAction;
  /** Historical path of the tracked file */
  source: string;
  destination: string;
  tier: PlacementTier;
  /** Timestamp of the snapshot that was used */
  timestamp: number;
  blobPath: string;
  /** Copy of the overwritten file, when --backup made one */
  backupPath?: string;
}

export interface RestoreSummary {
  outcomes: RestoreOutcome[];
  restoredCount: number;
  skipped: Record<SkipReason, number>;
}

export interface RestoreOptions {
  sourceRoot: string;
  destinationRoot: string;
  window: TimeWindow;
  dryRun?: boolean;
  /** Copy an existing destination file aside before overwriting it */
  backup?: boolean;
  /** Matched against the path relative to the source root */
  isExcluded?: ExcludeMatcher;
  /** Stamp used in backup file names */
  runStartedAt?: Date;
}

export interface RestoreDependencies {
  placer: DestinationPlacer;
  blobs?: BlobLocator;
  logger?: Logger;
  /** Called once per restored or planned file, in processing order */
  onOutcome?: (outcome: RestoreOutcome) => void;
}

/**
 * Whether a tracked file belongs to the source tree. Besides real
 * containment, a file counts when the source root's folder name appears
 * among its ancestors (or is its own name), because the machine that
 * captured the history may have used a different absolute root.
 */
export function isInScope(filePath: string, sourceRoot: string): boolean {
  if (isWithin(filePath, sourceRoot)) {
    return true;
  }
  const rootName = path.basename(sourceRoot);
  if (!rootName) {
    return false;
  }
  const segments = pathSegments(filePath);
  const ancestors = segments.slice(0, -1);
  return ancestors.includes(rootName) || path.basename(filePath) === rootName;
}

export function formatOutcome(outcome: RestoreOutcome): string {
  return `${outcome.action}: ${outcome.source} -> ${outcome.destination}`;
}

export function formatSummary(summary: RestoreSummary, destinationRoot: string, dryRun: boolean): string {
  return dryRun
    ? `Plan complete. Would restore ${summary.restoredCount} file(s) into: ${destinationRoot}`
    : `Done. Restored ${summary.restoredCount} file(s) into: ${destinationRoot}`;
}

export function backupPathFor(destination: string, runStartedAt: Date): string {
  return `${destination}.bak-${runStartedAt.toISOString().replace(/[:.]/g, '-')}`;
}

function emptySkipCounts(): Record<SkipReason, number> {
  return {
    'out-of-scope': 0,
    excluded: 0,
    'no-match': 0,
    'missing-blob': 0,
    'read-failed': 0,
    'write-failed': 0,
  };
}

/**
 * Restore every tracked file to its newest snapshot inside the window.
 * Files are handled one at a time; a failure only skips that file.
 */
export async function runRestore(
  files: readonly TrackedFile[],
  options: RestoreOptions,
  deps: RestoreDependencies
): Promise<RestoreSummary> {
  const sourceRoot = path.resolve(options.sourceRoot);
  const destinationRoot = path.resolve(options.destinationRoot);
  const dryRun = options.dryRun ?? false;
  const isExcluded = options.isExcluded ?? excludeNothing;
  const runStartedAt = options.runStartedAt ?? new Date();
  const blobs = deps.blobs ?? new BlobLocator();
  const logger = deps.logger ?? consoleLogger;

  const summary: RestoreSummary = { outcomes: [], restoredCount: 0, skipped: emptySkipCounts() };

  if (!dryRun) {
    await fsExtra.ensureDir(destinationRoot);
  }

  for (const file of files) {
    const source = file.resource;

    if (!isInScope(source, sourceRoot)) {
      summary.skipped['out-of-scope']++;
      continue;
    }

    const relativeToSource = isWithin(source, sourceRoot) ? path.relative(sourceRoot, source) : path.basename(source);
    if (isExcluded(relativeToSource)) {
      summary.skipped.excluded++;
      continue;
    }

    const chosen = selectSnapshot(file.entries, options.window);
    if (!chosen || chosen.timestamp === null) {
      summary.skipped['no-match']++;
      continue;
    }

    if (!chosen.id) {
      logger.warn(`snapshot ${chosen.timestamp} of ${source} has no content id`);
      summary.skipped['missing-blob']++;
      continue;
    }

    const blobPath = await blobs.locate(file.folder, chosen.id);
    if (!blobPath) {
      logger.warn(`missing content blob for ${source} (${chosen.id})`);
      summary.skipped['missing-blob']++;
      continue;
    }

    let text: string;
    try {
      text = await blobs.readText(blobPath);
    } catch (error) {
      logger.warn(`could not read ${blobPath}: ${errorMessage(error)}`);
      summary.skipped['read-failed']++;
      continue;
    }

    const placement = await deps.placer.chooseDest(source);
    const destination = placement.path;
    let backupPath: string | undefined;

    if (!dryRun) {
      try {
        if (options.backup && (await fsExtra.pathExists(destination))) {
          backupPath = backupPathFor(destination, runStartedAt);
          await fsExtra.copy(destination, backupPath);
        }
        await fsExtra.ensureDir(path.dirname(destination));
        await fs.writeFile(destination, text, 'utf-8');
      } catch (error) {
        logger.warn(`could not write ${destination}: ${errorMessage(error)}`);
        summary.skipped['write-failed']++;
        continue;
      }
    }
    // Dry runs note planned destinations too
    deps.placer.noteWritten(destination);

    const outcome: RestoreOutcome = {
      action: dryRun ? 'WOULD_RESTORE' : 'RESTORED',
      source,
      destination,
      tier: placement.tier,
      timestamp: chosen.timestamp,
      blobPath,
      ...(backupPath ? { backupPath } : {}),
    };
    summary.outcomes.push(outcome);
    summary.restoredCount++;
    deps.onOutcome?.(outcome);
  }

  return summary;
}
