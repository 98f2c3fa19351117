import { promises as fs } from 'fs';
import * as path from 'path';
import { DEFAULT_FALLBACK_FOLDER } from '../../config';

/**
 * BlobLocator - resolves snapshot content stored beside a history record
 *
 * Local history keeps each revision as a file named by its entry id in the
 * record's folder. Some layouts put them one level down, in a fallback
 * subfolder (`entries/` by default).
 */
export class BlobLocator {
  private readonly fallbackFolder: string;

  constructor(fallbackFolder: string = DEFAULT_FALLBACK_FOLDER) {
    this.fallbackFolder = fallbackFolder;
  }

  /**
   * Candidate locations for a blob, in lookup order
   */
  candidates(recordFolder: string, blobId: string): string[] {
    return [
      path.join(recordFolder, blobId),
      path.join(recordFolder, this.fallbackFolder, blobId),
    ];
  }

  /**
   * Path of the first candidate that exists, or null
   */
  async locate(recordFolder: string, blobId: string): Promise<string | null> {
    for (const candidate of this.candidates(recordFolder, blobId)) {
      if (await this.exists(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  /**
   * Read a blob as UTF-8 text. Undecodable bytes become U+FFFD.
   */
  async readText(blobPath: string): Promise<string> {
    const data = await fs.readFile(blobPath);
    return data.toString('utf-8');
  }

  private async exists(candidate: string): Promise<boolean> {
    try {
      await fs.access(candidate);
      return true;
    } catch {
      return false;
    }
  }
}
