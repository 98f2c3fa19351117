/**
 * Restore Command
 *
 * Restores every tracked file under <source-root> to its newest local-history
 * snapshot inside the --after / --before window and writes it into
 * <destination-root>.
 */

import { existsSync } from 'fs';
import { InvalidArgumentError } from 'commander';
import { RestoreConfig, loadConfig } from '../config';
import { BlobLocator } from '../services/history/BlobLocator';
import { loadTrackedFiles } from '../services/history/SnapshotIndex';
import { DestinationPlacer } from '../services/restore/DestinationPlacer';
import {
  RestoreSummary,
  formatOutcome,
  formatSummary,
  runRestore,
} from '../services/restore/RestoreOrchestrator';
import { TimeWindow } from '../services/restore/TemporalSelector';
import { parseBoundMs } from '../utils/dates';
import { UsageError, isUsageError } from '../utils/errors';
import { loadExcludeMatcher } from '../utils/ignore';
import { Logger, consoleLogger, printError, printPlain, printSuccess } from '../utils/messages';
import { ExpandOptions, normalizeUserPath } from '../utils/paths';

export interface RestoreCommandOptions {
  after?: string;
  before?: string;
  dryRun?: boolean;
  maxIndexFiles?: number;
  minSuffixMatch?: number;
  refreshIndex?: boolean;
  backup?: boolean;
  exclude?: string[];
}

export interface RestorePlan {
  sourceRoot: string;
  historyRoot: string;
  destinationRoot: string;
  window: TimeWindow;
  dryRun: boolean;
  backup: boolean;
  config: RestoreConfig;
}

/**
 * commander argument parser for positive integer options
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Parse and validate the window bounds. At least one is required, and
 * --after must be strictly earlier than --before.
 */
export function buildWindow(after: string | undefined, before: string | undefined): TimeWindow {
  if (!after && !before) {
    throw new UsageError('Provide at least one bound: --before, --after, or both.');
  }

  const beforeMs = parseBoundMs(before);
  const afterMs = parseBoundMs(after);
  if (beforeMs !== undefined && afterMs !== undefined && afterMs >= beforeMs) {
    throw new UsageError('--after must be earlier than --before.');
  }

  return { afterMs, beforeMs };
}

/**
 * Validate the command line and merge it over the loaded configuration.
 * @throws UsageError for anything that should abort the run
 */
export function buildRestorePlan(
  sourceArg: string,
  historyArg: string,
  destinationArg: string,
  options: RestoreCommandOptions,
  config: RestoreConfig,
  expand: ExpandOptions = {}
): RestorePlan {
  const historyRoot = normalizeUserPath(historyArg, expand);
  const sourceRoot = normalizeUserPath(sourceArg, expand);
  const destinationRoot = normalizeUserPath(destinationArg, expand);

  if (!existsSync(historyRoot)) {
    throw new UsageError(`history directory not found: ${historyRoot}`);
  }

  const window = buildWindow(options.after, options.before);

  return {
    sourceRoot,
    historyRoot,
    destinationRoot,
    window,
    dryRun: options.dryRun ?? false,
    backup: options.backup ?? false,
    config: {
      ...config,
      maxIndexFiles: options.maxIndexFiles ?? config.maxIndexFiles,
      minSuffixMatch: options.minSuffixMatch ?? config.minSuffixMatch,
      refreshIndex: options.refreshIndex || config.refreshIndex,
      exclude: [...config.exclude, ...(options.exclude ?? [])],
    },
  };
}

export interface RestoreIO {
  logger?: Logger;
  /** Receives each primary output line */
  print?: (line: string) => void;
}

/**
 * Run a validated plan. Returns null when the history store holds no
 * records at all.
 */
export async function executeRestore(plan: RestorePlan, io: RestoreIO = {}): Promise<RestoreSummary | null> {
  const logger = io.logger ?? consoleLogger;
  const print = io.print ?? printPlain;

  const files = await loadTrackedFiles(plan.historyRoot, {
    indexFileName: plan.config.indexFileName,
    logger,
  });
  if (files.length === 0) {
    logger.warn(`no ${plan.config.indexFileName} files found under history root.`);
    return null;
  }

  const isExcluded = loadExcludeMatcher(plan.config.exclude, plan.destinationRoot);
  const placer = new DestinationPlacer({
    sourceRoot: plan.sourceRoot,
    destinationRoot: plan.destinationRoot,
    maxIndexFiles: plan.config.maxIndexFiles,
    minSuffixMatch: plan.config.minSuffixMatch,
    refreshIndex: plan.config.refreshIndex,
    isExcluded,
    logger,
  });

  return runRestore(
    files,
    {
      sourceRoot: plan.sourceRoot,
      destinationRoot: plan.destinationRoot,
      window: plan.window,
      dryRun: plan.dryRun,
      backup: plan.backup,
      isExcluded,
    },
    {
      placer,
      blobs: new BlobLocator(plan.config.fallbackFolder),
      logger,
      onOutcome: outcome => print(formatOutcome(outcome)),
    }
  );
}

export async function restoreCommand(
  sourceRoot: string,
  historyRoot: string,
  destinationRoot: string,
  options: RestoreCommandOptions
): Promise<void> {
  try {
    const plan = buildRestorePlan(sourceRoot, historyRoot, destinationRoot, options, loadConfig());
    const summary = await executeRestore(plan);
    if (!summary) {
      return;
    }

    printPlain('');
    printSuccess(formatSummary(summary, plan.destinationRoot, plan.dryRun));
  } catch (error) {
    if (isUsageError(error)) {
      printError(error.message);
    } else {
      printError('Unexpected error', error instanceof Error ? error : String(error));
    }
    process.exit(1);
  }
}
