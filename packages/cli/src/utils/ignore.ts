/**
 * .historyrestoreignore support for leaving files out of a restore.
 */

import ignore from 'ignore';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';

export const IGNORE_FILE = '.historyrestoreignore';

/**
 * Returns true when a relative path should be left alone.
 */
export type ExcludeMatcher = (relativePath: string) => boolean;

export const excludeNothing: ExcludeMatcher = () => false;

/**
 * Build a matcher from explicit patterns plus the .historyrestoreignore in
 * `ignoreFileDir`, if present. With no patterns at all nothing is excluded.
 *
 * @param patterns - gitignore-style patterns from flags or config
 * @param ignoreFileDir - Directory that may contain .historyrestoreignore
 */
export function loadExcludeMatcher(patterns: readonly string[], ignoreFileDir?: string): ExcludeMatcher {
  const lines = [...patterns];

  if (ignoreFileDir) {
    const ignorePath = join(ignoreFileDir, IGNORE_FILE);
    if (existsSync(ignorePath)) {
      const content = readFileSync(ignorePath, 'utf-8');
      lines.push(
        ...content
          .split(/\r?\n/)
          .map(l => l.trim())
          .filter(l => l.length > 0 && !l.startsWith('#'))
      );
    }
  }

  if (lines.length === 0) {
    return excludeNothing;
  }

  const ig = ignore();
  ig.add(lines);

  return (relativePath: string): boolean => {
    // ignore expects path.relative()-style paths (no leading ./ or /)
    const normalized = relativePath.replace(/\\/g, '/').replace(/^\.\//, '').replace(/^\/+/, '');
    if (normalized === '') {
      return false;
    }
    return ig.ignores(normalized);
  };
}
