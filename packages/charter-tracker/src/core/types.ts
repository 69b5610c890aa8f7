/**
 * Charter Tracker Core Types
 *
 * Domain records shared by the extractor, the state tracker and the store.
 * Database rows use snake_case (see persistence/charter-store.ts); these are
 * the camelCase shapes the rest of the code works with.
 */

// ============================================================================
// Enum Types
// ============================================================================

/**
 * Current lifecycle status of a charter
 */
export type CharterStatus = 'present' | 'missing';

/**
 * Lifecycle event kinds
 */
export type CharterEventType = 'appeared' | 'disappeared';

/**
 * ISO8601 timestamp without zone, as parsed from a backup filename.
 * Example: "2024-01-15T02:30:00"
 */
export type BackupTimestamp = string;

// ============================================================================
// Domain Records
// ============================================================================

export interface Charter {
  readonly id: number;
  /** Normalized path, the identity key */
  readonly filePath: string;
  /** Raw path as first observed in a backup */
  readonly filePathRaw: string | null;
  /** Collection path relative to the base collection ('' at root level) */
  readonly parentPath: string;
  readonly firstSeenBackupId: number;
  readonly lastSeenBackupId: number;
  readonly status: CharterStatus;
}

export interface Backup {
  readonly id: number;
  readonly filename: string;
  readonly backupDate: BackupTimestamp;
  /** Null until the backup transaction committed */
  readonly processedAt: string | null;
  readonly charterCount: number;
  readonly processingTimeSec: number | null;
}

export interface CharterEvent {
  readonly id: number;
  readonly charterId: number;
  readonly backupId: number;
  readonly eventType: CharterEventType;
  readonly eventDate: BackupTimestamp;
}

/**
 * A normalized path present in exactly one of the two backup listings
 */
export interface Discrepancy {
  readonly filePath: string;
  readonly inManifest: boolean;
  readonly inEntries: boolean;
}

export interface StoredDiscrepancy extends Discrepancy {
  readonly id: number;
  readonly backupId: number;
  readonly backupFilename: string;
}

// ============================================================================
// Processing Results
// ============================================================================

/**
 * Statistics returned for every applied backup
 */
export interface BackupProcessingStats {
  readonly backupId: number;
  readonly filename: string;
  readonly backupDate: BackupTimestamp;
  readonly charterCount: number;
  /** Charters seen for the first time */
  readonly appeared: number;
  readonly disappeared: number;
  /** Charters that went from missing back to present */
  readonly reappeared: number;
  readonly discrepancies: number;
  /** Manifest descriptors that could not be parsed */
  readonly skippedDescriptors: number;
  readonly durationSeconds: number;
}

export type BackupOutcome =
  | { readonly status: 'processed'; readonly stats: BackupProcessingStats }
  | { readonly status: 'skipped'; readonly filename: string };

// ============================================================================
// Report Views
// ============================================================================

export interface TrackerStats {
  readonly processedBackups: number;
  readonly totalCharters: number;
  readonly missingCharters: number;
  readonly disappearanceEvents: number;
  readonly totalDiscrepancies: number;
}

export interface MissingCharter {
  readonly filePath: string;
  readonly filePathRaw: string | null;
  readonly parentPath: string;
  readonly firstSeenBackup: string;
  readonly firstSeenDate: BackupTimestamp;
  readonly lastSeenBackup: string;
  readonly lastSeenDate: BackupTimestamp;
}

export interface MissingByParent {
  readonly parentPath: string;
  readonly missingCount: number;
  readonly earliestFirstSeen: BackupTimestamp;
  readonly latestFirstSeen: BackupTimestamp;
  readonly earliestDisappearance: BackupTimestamp | null;
  readonly latestDisappearance: BackupTimestamp | null;
}

export interface CharterHistoryEntry {
  readonly eventType: CharterEventType;
  readonly eventDate: BackupTimestamp;
  readonly backupFilename: string;
}
