import * as path from 'path';
import * as fsExtra from 'fs-extra';
import { globIterate } from 'glob';
import { DEFAULT_MAX_INDEX_FILES } from '../../config';
import { ExcludeMatcher, excludeNothing } from '../../utils/ignore';
import { Logger, consoleLogger } from '../../utils/messages';

export interface DestinationIndexOptions {
  maxFiles?: number;
  isExcluded?: ExcludeMatcher;
  logger?: Logger;
}

/**
 * DestinationIndex - filename -> full paths under the destination root
 *
 * Built once, before the first placement of a run, and kept for the rest of
 * it. Files written after the build are only visible if the owner calls
 * `add()`.
 */
export class DestinationIndex {
  private readonly rootDir: string;
  private readonly maxFiles: number;
  private readonly isExcluded: ExcludeMatcher;
  private readonly logger: Logger;
  private byName: Map<string, string[]> | null = null;
  private fileCount = 0;
  private truncated = false;

  constructor(rootDir: string, options: DestinationIndexOptions = {}) {
    this.rootDir = path.resolve(rootDir);
    this.maxFiles = options.maxFiles ?? DEFAULT_MAX_INDEX_FILES;
    this.isExcluded = options.isExcluded ?? excludeNothing;
    this.logger = options.logger ?? consoleLogger;
  }

  get isBuilt(): boolean {
    return this.byName !== null;
  }

  /** Number of indexed files (0 before the first lookup) */
  get size(): number {
    return this.fileCount;
  }

  /** True when indexing stopped at `maxFiles` */
  get isTruncated(): boolean {
    return this.truncated;
  }

  /**
   * Walk the destination tree now unless already done.
   */
  async build(): Promise<void> {
    await this.ensureBuilt();
  }

  /**
   * All indexed paths whose base name is `filename`, sorted
   */
  async candidates(filename: string): Promise<readonly string[]> {
    const index = await this.ensureBuilt();
    return index.get(filename) ?? [];
  }

  /**
   * Record a file that now exists under the root. No-op before the index
   * is built, since the build will pick it up.
   */
  add(filePath: string): void {
    if (!this.byName) {
      return;
    }
    const resolved = path.resolve(filePath);
    const name = path.basename(resolved);
    const existing = this.byName.get(name);
    if (!existing) {
      this.byName.set(name, [resolved]);
      this.fileCount++;
      return;
    }
    if (existing.includes(resolved)) {
      return;
    }
    existing.push(resolved);
    existing.sort();
    this.fileCount++;
  }

  private async ensureBuilt(): Promise<Map<string, string[]>> {
    if (this.byName) {
      return this.byName;
    }

    const index = new Map<string, string[]>();
    let count = 0;

    // A dry run may target a root that does not exist yet
    if (!(await fsExtra.pathExists(this.rootDir))) {
      this.byName = index;
      this.fileCount = 0;
      return index;
    }

    for await (const filePath of globIterate('**/*', {
      cwd: this.rootDir,
      absolute: true,
      dot: true,
      nodir: true,
    })) {
      if (this.isExcluded(path.relative(this.rootDir, filePath))) {
        continue;
      }
      if (count >= this.maxFiles) {
        this.truncated = true;
        this.logger.warn(
          `destination index stopped at ${this.maxFiles} files under ${this.rootDir}; raise --max-index-files to index more`
        );
        break;
      }

      const name = path.basename(filePath);
      const bucket = index.get(name);
      if (bucket) {
        bucket.push(filePath);
      } else {
        index.set(name, [filePath]);
      }
      count++;
    }

    for (const bucket of index.values()) {
      bucket.sort();
    }

    this.byName = index;
    this.fileCount = count;
    return index;
  }
}
