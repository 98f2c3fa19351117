/**
 * Shared helpers for filesystem-backed tests: temporary trees and
 * local-history records laid out the way the editor writes them.
 */

import * as os from 'os';
import * as path from 'path';
import * as fsExtra from 'fs-extra';
import { pathToFileURL } from 'url';
import { Logger } from '../utils/messages';

export interface RecordingLogger extends Logger {
  warnings: string[];
}

export function recordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (message: string) => {
      warnings.push(message);
    },
  };
}

export async function makeTempDir(prefix: string = 'history-restore-'): Promise<string> {
  return fsExtra.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fsExtra.ensureDir(path.dirname(target));
    await fsExtra.writeFile(target, content, 'utf-8');
  }
}

export interface FakeEntry {
  timestamp?: number | null;
  id?: string | null;
  /** Blob content; omitted means no blob is written */
  content?: string;
  /** Write the blob under the fallback subfolder instead of beside the record */
  inFallback?: boolean;
}

/**
 * Write `<historyRoot>/<folder>/entries.json` plus its blobs.
 * Returns the record folder.
 */
export async function writeHistoryRecord(
  historyRoot: string,
  folder: string,
  resourcePath: string,
  entries: FakeEntry[]
): Promise<string> {
  const recordFolder = path.join(historyRoot, folder);
  await fsExtra.ensureDir(recordFolder);

  const record = {
    version: 1,
    resource: pathToFileURL(resourcePath).href,
    entries: entries.map(entry => {
      const item: Record<string, unknown> = {};
      if (entry.id !== undefined) item.id = entry.id;
      if (entry.timestamp !== undefined) item.timestamp = entry.timestamp;
      return item;
    }),
  };
  await fsExtra.writeFile(path.join(recordFolder, 'entries.json'), JSON.stringify(record), 'utf-8');

  for (const entry of entries) {
    if (entry.id && entry.content !== undefined) {
      const blobDir = entry.inFallback ? path.join(recordFolder, 'entries') : recordFolder;
      await fsExtra.ensureDir(blobDir);
      await fsExtra.writeFile(path.join(blobDir, entry.id), entry.content, 'utf-8');
    }
  }

  return recordFolder;
}
