/**
 * Path helpers
 *
 * Normalizes user-supplied path arguments and converts local-history
 * resource locators (file:///Users/me/app/a.ts, file:///c%3A/work/a.ts,
 * vscode-remote://ssh-remote%2Bbox/home/me/a.ts) into filesystem paths.
 */

import * as os from 'os';
import * as path from 'path';

const WINDOWS_DRIVE_PATH = /^[a-zA-Z]:[\\/]/;
const LEADING_SLASH_DRIVE = /^\/[a-zA-Z]:/;
const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export interface ExpandOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Strip one pair of matching surrounding quotes.
 */
export function dequote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references. Unset variables
 * are left as written.
 */
export function expandPath(value: string, options: ExpandOptions = {}): string {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  let expanded = value;
  if (expanded === '~' || expanded.startsWith('~/') || expanded.startsWith('~\\')) {
    expanded = homeDir + expanded.slice(1);
  }

  return expanded.replace(ENV_REFERENCE, (match: string, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (!name) {
      return match;
    }
    const resolved = env[name];
    return resolved === undefined ? match : resolved;
  });
}

/**
 * Dequote, expand and resolve a path argument to an absolute path.
 */
export function normalizeUserPath(value: string, options: ExpandOptions = {}): string {
  return path.resolve(expandPath(dequote(value.trim()), options));
}

function decodeSegment(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed percent escapes are kept verbatim
    return value;
  }
}

/**
 * Convert a record's resource locator to a path in the conventions of
 * `platform`. The URL host is ignored; only its decoded path is used.
 * Plain paths are percent-decoded the same way.
 */
export function resourceToPath(locator: string, platform: NodeJS.Platform = process.platform): string {
  const pathImpl = platform === 'win32' ? path.win32 : path.posix;

  if (WINDOWS_DRIVE_PATH.test(locator)) {
    return pathImpl.normalize(decodeSegment(locator));
  }

  let raw: string;
  try {
    raw = decodeSegment(new URL(locator).pathname);
  } catch {
    // Not a URL: a plain path, still percent-decoded
    raw = decodeSegment(locator);
  }

  if (platform === 'win32' && LEADING_SLASH_DRIVE.test(raw)) {
    raw = raw.slice(1);
  }

  return pathImpl.normalize(raw);
}

/**
 * Path parts below the filesystem root, outermost first.
 */
export function pathSegments(filePath: string): string[] {
  const { root } = path.parse(filePath);
  return filePath
    .slice(root.length)
    .split(/[\\/]+/)
    .filter(segment => segment.length > 0);
}

/**
 * True when `child` is `parent` itself or lies below it.
 */
export function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  if (rel === '') {
    return true;
  }
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Number of trailing path segments two segment lists share, compared from
 * the filename backward.
 */
export function commonSuffixLength(a: readonly string[], b: readonly string[]): number {
  const limit = Math.min(a.length, b.length);
  let length = 0;
  while (length < limit && a[a.length - 1 - length] === b[b.length - 1 - length]) {
    length++;
  }
  return length;
}
