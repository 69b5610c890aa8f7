/**
 * Charter Tracker CLI Configuration Management
 *
 * Loads configuration from .charter-trackerrc (YAML or JSON) with environment
 * variable overrides and defaults. The config file is validated with zod.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CHARTER_TRACKER_*, AZURE_*)
 * 3. Config file (.charter-trackerrc or --config path)
 * 4. Default values
 *
 * Azure credentials are read from the environment only.
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_BACKUP_FREQUENCY,
  DEFAULT_BASE_PATH,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MANIFEST_FILE_NAME,
  DEFAULT_TRACKED_EXTENSION,
} from '../../core/constants.js';
import { ConfigurationError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type SourceKind = 'local' | 'azure';

/**
 * Paths configuration
 */
export interface PathsConfig {
  /** SQLite database file */
  readonly database: string;
  /** Download cache for the Azure source */
  readonly cache: string;
  /** Directory for saved reports and extracted archives */
  readonly reports: string;
  /** Directory of backup ZIPs for the local source */
  readonly backups: string | null;
}

/**
 * Tracking settings
 */
export interface TrackingConfig {
  readonly basePath: string;
  readonly extension: string;
  readonly manifestFileName: string;
  readonly batchSize: number;
  readonly backupFrequency: number;
  /** Parent paths excluded from stats, reports and extraction */
  readonly ignoredParentPaths: readonly string[];
}

export interface AzureConfig {
  readonly sasUrl: string | null;
  readonly connectionString: string | null;
  readonly containerName: string | null;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly source: SourceKind;
  readonly paths: PathsConfig;
  readonly tracking: TrackingConfig;
  readonly azure: AzureConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    source: z.enum(['local', 'azure']).optional(),
    paths: z
      .object({
        database: z.string().min(1),
        cache: z.string().min(1),
        reports: z.string().min(1),
        backups: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
    tracking: z
      .object({
        base_path: z.string().min(1),
        extension: z.string().min(1),
        manifest_file_name: z.string().min(1),
        batch_size: z.number().int().positive(),
        backup_frequency: z.number().int().positive(),
        ignored_parent_paths: z.array(z.string()),
      })
      .partial()
      .strict()
      .optional(),
    azure: z
      .object({
        container_name: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  version: 1,

  paths: {
    database: './data/charter_tracking.db',
    cache: './data/backup_cache',
    reports: './reports',
  },

  tracking: {
    basePath: DEFAULT_BASE_PATH,
    extension: DEFAULT_TRACKED_EXTENSION,
    manifestFileName: DEFAULT_MANIFEST_FILE_NAME,
    batchSize: DEFAULT_BATCH_SIZE,
    backupFrequency: DEFAULT_BACKUP_FREQUENCY,
    ignoredParentPaths: [],
  },
} as const;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.charter-trackerrc',
  '.charter-trackerrc.yaml',
  '.charter-trackerrc.yml',
  '.charter-trackerrc.json',
];

/**
 * Find config file in directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers both
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${filePath}`,
      result.error.errors.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Environment accessors bound to one environment
 */
function envReader(env: Env) {
  const get = (name: string): string | undefined => {
    const value = env[`CHARTER_TRACKER_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  return {
    get,
    bool(name: string): boolean | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      return value.toLowerCase() === 'true' || value === '1';
    },
    number(name: string): number | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      const num = parseInt(value, 10);
      if (isNaN(num)) {
        throw new ConfigurationError(`CHARTER_TRACKER_${name} must be a number, got "${value}"`);
      }
      return num;
    },
    list(name: string): string[] | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    },
    source(name: string): SourceKind | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      if (value === 'local' || value === 'azure') return value;
      throw new ConfigurationError(`CHARTER_TRACKER_${name} must be "local" or "azure"`);
    },
    raw(name: string): string | null {
      const value = env[name];
      return value === undefined || value === '' ? null : value;
    },
  };
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  cwd?: string;
  /** Environment to read (default: process.env) */
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    source?: SourceKind;
    database?: string;
    backupDir?: string;
    backupFrequency?: number;
    batchSize?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for unreadable or invalid config files
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = envReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  // Find config file
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = env.get('CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const backups =
    overrides.backupDir ?? env.get('BACKUP_DIR') ?? fileConfig.paths?.backups ?? null;

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    source:
      overrides.source ??
      env.source('SOURCE') ??
      fileConfig.source ??
      (backups !== null ? 'local' : 'azure'),

    paths: {
      database:
        overrides.database ??
        env.get('DB_PATH') ??
        fileConfig.paths?.database ??
        DEFAULT_CONFIG.paths.database,
      cache: env.get('CACHE_DIR') ?? fileConfig.paths?.cache ?? DEFAULT_CONFIG.paths.cache,
      reports:
        env.get('REPORTS_DIR') ?? fileConfig.paths?.reports ?? DEFAULT_CONFIG.paths.reports,
      backups,
    },

    tracking: {
      basePath:
        env.get('BASE_PATH') ??
        fileConfig.tracking?.base_path ??
        DEFAULT_CONFIG.tracking.basePath,
      extension:
        env.get('EXTENSION') ??
        fileConfig.tracking?.extension ??
        DEFAULT_CONFIG.tracking.extension,
      manifestFileName:
        env.get('MANIFEST_FILE_NAME') ??
        fileConfig.tracking?.manifest_file_name ??
        DEFAULT_CONFIG.tracking.manifestFileName,
      batchSize:
        overrides.batchSize ??
        env.number('BATCH_SIZE') ??
        fileConfig.tracking?.batch_size ??
        DEFAULT_CONFIG.tracking.batchSize,
      backupFrequency:
        overrides.backupFrequency ??
        env.number('BACKUP_FREQUENCY') ??
        fileConfig.tracking?.backup_frequency ??
        DEFAULT_CONFIG.tracking.backupFrequency,
      ignoredParentPaths:
        env.list('IGNORED_PARENT_PATHS') ??
        fileConfig.tracking?.ignored_parent_paths ??
        DEFAULT_CONFIG.tracking.ignoredParentPaths,
    },

    azure: {
      sasUrl: env.raw('AZURE_CONTAINER_SAS_URL'),
      connectionString: env.raw('AZURE_STORAGE_CONNECTION_STRING'),
      containerName:
        env.raw('AZURE_CONTAINER_NAME') ?? fileConfig.azure?.container_name ?? null,
    },

    // Runtime flags
    verbose: overrides.verbose ?? env.bool('VERBOSE') ?? false,
    json: overrides.json ?? env.bool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Resolve a configured path relative to the config file (or the cwd)
 */
export function resolvePath(config: CLIConfig, path: string): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, path);
}

/**
 * Validate configuration
 *
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  const issues: string[] = [];

  if (config.version !== 1) {
    issues.push(`unsupported config version ${config.version}, expected 1`);
  }
  if (!Number.isInteger(config.tracking.batchSize) || config.tracking.batchSize < 1) {
    issues.push('batch size must be a positive integer');
  }
  if (!Number.isInteger(config.tracking.backupFrequency) || config.tracking.backupFrequency < 1) {
    issues.push('backup frequency must be a positive integer');
  }
  if (config.source === 'local' && config.paths.backups === null) {
    issues.push('local source needs a backup directory (CHARTER_TRACKER_BACKUP_DIR or paths.backups)');
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid configuration', issues);
  }
}
