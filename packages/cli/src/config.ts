import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { UsageError, errorMessage } from './utils/errors';

export const DEFAULT_MAX_INDEX_FILES = 200000;
export const DEFAULT_INDEX_FILE_NAME = 'entries.json';
export const DEFAULT_FALLBACK_FOLDER = 'entries';

export const LOCAL_CONFIG_FILE = 'history-restore.config.json';
export const GLOBAL_CONFIG_FILE = '.historyrestorerc';

const ConfigFileSchema = z
  .object({
    maxIndexFiles: z.number().int().positive(),
    minSuffixMatch: z.number().int().positive(),
    refreshIndex: z.boolean(),
    indexFileName: z.string().min(1),
    fallbackFolder: z.string().min(1),
    exclude: z.array(z.string()),
  })
  .partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface RestoreConfig {
  /** Upper bound on files indexed from the destination tree */
  maxIndexFiles: number;
  /** Shortest path-suffix agreement accepted by filename matching */
  minSuffixMatch: number;
  /** Add freshly written files to the destination index during a run */
  refreshIndex: boolean;
  /** Name of the per-file history record */
  indexFileName: string;
  /** Subfolder searched when a content blob is not beside its record */
  fallbackFolder: string;
  /** gitignore-style patterns excluded from restore and indexing */
  exclude: string[];
}

export const DEFAULT_CONFIG: RestoreConfig = {
  maxIndexFiles: DEFAULT_MAX_INDEX_FILES,
  minSuffixMatch: 1,
  refreshIndex: false,
  indexFileName: DEFAULT_INDEX_FILE_NAME,
  fallbackFolder: DEFAULT_FALLBACK_FOLDER,
  exclude: [],
};

function readConfigFile(configPath: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new UsageError(
      `Could not read config file ${configPath}: ${errorMessage(error)}`
    );
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new UsageError(`Invalid config file ${configPath}: ${issues}`);
  }
  return result.data;
}

function parsePositiveIntEnv(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Load configuration with priority (highest first):
 * 1. Environment variables (HISTORY_RESTORE_*)
 * 2. Local config file (./history-restore.config.json)
 * 3. Global config file (~/.historyrestorerc)
 * 4. Built-in defaults
 *
 * Command-line flags are applied on top by the commands.
 */
export function loadConfig(options: LoadConfigOptions = {}): RestoreConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? env.HOME ?? env.USERPROFILE ?? '';

  const config: RestoreConfig = { ...DEFAULT_CONFIG, exclude: [...DEFAULT_CONFIG.exclude] };

  const layers: ConfigFile[] = [];
  if (homeDir) {
    const globalConfigPath = join(homeDir, GLOBAL_CONFIG_FILE);
    if (existsSync(globalConfigPath)) {
      layers.push(readConfigFile(globalConfigPath));
    }
  }

  const localConfigPath = join(cwd, LOCAL_CONFIG_FILE);
  if (existsSync(localConfigPath)) {
    layers.push(readConfigFile(localConfigPath));
  }

  for (const layer of layers) {
    if (layer.maxIndexFiles !== undefined) config.maxIndexFiles = layer.maxIndexFiles;
    if (layer.minSuffixMatch !== undefined) config.minSuffixMatch = layer.minSuffixMatch;
    if (layer.refreshIndex !== undefined) config.refreshIndex = layer.refreshIndex;
    if (layer.indexFileName !== undefined) config.indexFileName = layer.indexFileName;
    if (layer.fallbackFolder !== undefined) config.fallbackFolder = layer.fallbackFolder;
    // Exclusion lists accumulate rather than replace
    if (layer.exclude !== undefined) config.exclude.push(...layer.exclude);
  }

  const envMaxIndexFiles = parsePositiveIntEnv('HISTORY_RESTORE_MAX_INDEX_FILES', env);
  if (envMaxIndexFiles !== undefined) {
    config.maxIndexFiles = envMaxIndexFiles;
  }
  if (env.HISTORY_RESTORE_FALLBACK_FOLDER) {
    config.fallbackFolder = env.HISTORY_RESTORE_FALLBACK_FOLDER;
  }
  if (env.HISTORY_RESTORE_INDEX_FILE) {
    config.indexFileName = env.HISTORY_RESTORE_INDEX_FILE;
  }

  return config;
}
