/**
 * CLI Runtime Context
 *
 * Holds the configuration resolved in the preAction hook and builds the
 * store, backup source and tracker that commands work with.
 *
 * @module cli/lib/context
 */

import { SqliteCharterStore } from '../../persistence/sqlite-charter-store.js';
import type { BackupSource } from '../../sources/backup-source.js';
import { LocalBackupSource } from '../../sources/local-backup-source.js';
import {
  AzureBackupSource,
  azureBlobContainer,
  createContainerClient,
} from '../../sources/azure-backup-source.js';
import { DualSourceExtractor } from '../../extraction/dual-source-extractor.js';
import { CharterTracker } from '../../tracking/charter-tracker.js';
import { ConfigurationError } from '../../core/errors.js';
import { resolvePath, type CLIConfig } from './config.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  /** Epoch ms before the config was loaded; command durations start here */
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function setGlobalContext(context: GlobalContext): void {
  globalContext = context;
}

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call setGlobalContext first.');
  }
  return globalContext;
}

// ============================================================================
// Factories
// ============================================================================

export async function openStore(config: CLIConfig): Promise<SqliteCharterStore> {
  return SqliteCharterStore.open({
    path: resolvePath(config, config.paths.database),
    batchSize: config.tracking.batchSize,
  });
}

export function createBackupSource(config: CLIConfig): BackupSource {
  if (config.source === 'local') {
    if (config.paths.backups === null) {
      throw new ConfigurationError('Local source needs a backup directory');
    }
    return new LocalBackupSource(resolvePath(config, config.paths.backups));
  }

  const client = createContainerClient({
    sasUrl: config.azure.sasUrl ?? undefined,
    connectionString: config.azure.connectionString ?? undefined,
    containerName: config.azure.containerName ?? undefined,
  });
  return new AzureBackupSource(azureBlobContainer(client), resolvePath(config, config.paths.cache));
}

export function createTracker(config: CLIConfig, store: SqliteCharterStore): CharterTracker {
  const extractor = new DualSourceExtractor({
    basePath: config.tracking.basePath,
    extension: config.tracking.extension,
    manifestFileName: config.tracking.manifestFileName,
  });
  return new CharterTracker(store, { basePath: config.tracking.basePath, extractor });
}

/**
 * Run a command body against an open store and close it afterwards
 */
export async function withStore<T>(
  config: CLIConfig,
  body: (store: SqliteCharterStore) => Promise<T>
): Promise<T> {
  const store = await openStore(config);
  try {
    return await body(store);
  } finally {
    await store.close();
  }
}
