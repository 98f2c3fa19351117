import { promises as fs } from 'fs';
import * as path from 'path';
import { glob, escape } from 'glob';
import { z } from 'zod';
import { DEFAULT_INDEX_FILE_NAME } from '../../config';
import { errorMessage } from '../../utils/errors';
import { Logger, consoleLogger } from '../../utils/messages';
import { resourceToPath } from '../../utils/paths';

/**
 * One `entries.json` record as written by the editor's local history.
 * Extra fields (source, sourceDescription, version) are ignored.
 */
const SnapshotRecordSchema = z.object({
  timestamp: z.number().nullable().optional(),
  id: z.string().nullable().optional(),
});

const HistoryRecordSchema = z.object({
  resource: z.string(),
  entries: z.array(SnapshotRecordSchema),
});

export interface Snapshot {
  timestamp: number | null;
  id: string | null;
}

export interface TrackedFile {
  /** Absolute path of the file when it was saved */
  resource: string;
  /** Folder holding the record; content blobs live beside it */
  folder: string;
  entries: Snapshot[];
}

export interface LoadOptions {
  indexFileName?: string;
  logger?: Logger;
  /** Path conventions used to read resource locators */
  platform?: NodeJS.Platform;
}

/**
 * Parse one record. Returns null (after warning) when the record is not
 * usable, and null silently when it has no entries.
 */
export function parseHistoryRecord(
  recordPath: string,
  content: string,
  logger: Logger = consoleLogger,
  platform: NodeJS.Platform = process.platform
): TrackedFile | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn(`could not parse JSON: ${recordPath} (${errorMessage(error)})`);
    return null;
  }

  const result = HistoryRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'record';
    logger.warn(`skipping malformed history record: ${recordPath} (${where}: ${issue ? issue.message : 'invalid'})`);
    return null;
  }

  const record = result.data;
  if (record.entries.length === 0) {
    return null;
  }

  return {
    resource: (platform === 'win32' ? path.win32 : path.posix).resolve(resourceToPath(record.resource, platform)),
    folder: path.dirname(recordPath),
    entries: record.entries.map(entry => ({
      timestamp: entry.timestamp ?? null,
      id: entry.id ?? null,
    })),
  };
}

/**
 * Find every history record under `historyRoot`.
 */
export async function findHistoryRecords(historyRoot: string, indexFileName: string = DEFAULT_INDEX_FILE_NAME): Promise<string[]> {
  const files = await glob(`**/${escape(indexFileName)}`, {
    cwd: historyRoot,
    absolute: true,
    dot: true,
    nodir: true,
  });
  return files.sort();
}

/**
 * Load every tracked file from the history store. Unreadable or malformed
 * records are skipped with a warning.
 */
export async function loadTrackedFiles(historyRoot: string, options: LoadOptions = {}): Promise<TrackedFile[]> {
  const logger = options.logger ?? consoleLogger;
  const recordPaths = await findHistoryRecords(historyRoot, options.indexFileName);

  const tracked: TrackedFile[] = [];
  for (const recordPath of recordPaths) {
    let content: string;
    try {
      content = await fs.readFile(recordPath, 'utf-8');
    } catch (error) {
      logger.warn(`could not read ${recordPath}: ${errorMessage(error)}`);
      continue;
    }

    const file = parseHistoryRecord(recordPath, content, logger, options.platform);
    if (file) {
      tracked.push(file);
    }
  }

  return tracked;
}
