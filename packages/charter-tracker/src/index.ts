/**
 * Charter Tracker
 *
 * Tracks which charters appear in and disappear from a sequence of full
 * repository backups.
 *
 * @packageDocumentation
 */

// Core
export type * from './core/types.js';
export {
  BackupFilenameError,
  BackupProcessingError,
  BackupSourceError,
  ConfigurationError,
} from './core/errors.js';
export { Logger, createLogger, configureLogging, logger, type LogLevel } from './core/utils/logger.js';

export * from './core/constants.js';

// Normalization
export * from './normalization/index.js';

// Extraction
export { ZipArchiveReader, isValidZip, type ArchiveReader } from './extraction/archive.js';
export {
  parseBackupFilename,
  isBackupFilename,
  shouldProcessBackup,
  type BackupFilenameResult,
} from './extraction/backup-filename.js';
export {
  parseManifestDescriptor,
  type ManifestDescriptor,
  type ManifestParseResult,
} from './extraction/manifest-parser.js';
export {
  DualSourceExtractor,
  isTrackedPath,
  reconcilePaths,
  findDiscrepancies,
  type BackupExtraction,
  type ExtractorOptions,
  type SkippedDescriptor,
} from './extraction/dual-source-extractor.js';

// Persistence
export type {
  CharterStore,
  CharterInsert,
  CharterRef,
  DiscrepancyInsert,
  EventInsert,
} from './persistence/charter-store.js';
export { SqliteCharterStore, type SqliteStoreOptions } from './persistence/sqlite-charter-store.js';

// Tracking
export { CharterTracker, type CharterTrackerOptions } from './tracking/charter-tracker.js';

// Sources
export * from './sources/index.js';

// Services
export {
  SyncService,
  selectBackups,
  type SyncOptions,
  type SyncSummary,
  type SyncFailure,
} from './services/sync-service.js';
export {
  MissingCharterExporter,
  findEntryName,
  type ExportFailure,
  type ExportResult,
} from './services/missing-charter-exporter.js';
