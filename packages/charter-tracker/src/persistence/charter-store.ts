/**
 * Charter Store Contract
 *
 * What the state tracker needs from persistence: transactional batch CRUD
 * over backups, charters, events and discrepancies. Report queries used by
 * the CLI live on the same interface so commands never depend on a driver.
 *
 * Design principles:
 *   1. Batch operations take arrays and chunk internally
 *   2. Mutations are only visible after commit()
 *   3. Query methods return camelCase domain records
 */

import type {
  Backup,
  BackupTimestamp,
  CharterEventType,
  CharterHistoryEntry,
  CharterStatus,
  Discrepancy,
  MissingByParent,
  MissingCharter,
  StoredDiscrepancy,
  TrackerStats,
} from '../core/types.js';

// ============================================================================
// Insert Types
// ============================================================================

export interface CharterInsert {
  readonly filePath: string;
  readonly filePathRaw: string;
  readonly parentPath: string;
  readonly firstBackupId: number;
}

export interface EventInsert {
  readonly charterId: number;
  readonly backupId: number;
  readonly eventType: CharterEventType;
  readonly eventDate: BackupTimestamp;
}

export interface DiscrepancyInsert extends Discrepancy {
  readonly backupId: number;
}

/**
 * Identity and status of a stored charter
 */
export interface CharterRef {
  readonly id: number;
  readonly status: CharterStatus;
}

// ============================================================================
// Store Interface
// ============================================================================

export interface CharterStore {
  // Transactions ------------------------------------------------------------

  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;

  // Backups -----------------------------------------------------------------

  /**
   * Insert the backup if unknown
   *
   * @returns Backup ID (existing or new)
   */
  upsertBackup(filename: string, backupDate: BackupTimestamp): Promise<number>;

  isBackupProcessed(filename: string): Promise<boolean>;

  markBackupProcessed(
    backupId: number,
    charterCount: number,
    durationSeconds: number
  ): Promise<void>;

  // Charters ----------------------------------------------------------------

  findCharterByPath(path: string): Promise<CharterRef | null>;

  findCharterByPaths(paths: readonly string[]): Promise<Map<string, CharterRef>>;

  /**
   * Insert new charters as present, first and last seen in `firstBackupId`
   *
   * @returns Assigned IDs in input order
   */
  insertCharters(charters: readonly CharterInsert[]): Promise<number[]>;

  /**
   * Record that the charters were seen in `backupId` (also sets them present)
   */
  updateLastSeen(charterIds: readonly number[], backupId: number): Promise<void>;

  markMissing(charterIds: readonly number[]): Promise<void>;

  /**
   * Normalized path -> charter ID for every present charter
   */
  loadPresentCharters(): Promise<Map<string, number>>;

  // Events and discrepancies -----------------------------------------------

  insertEvents(events: readonly EventInsert[]): Promise<void>;

  insertDiscrepancies(discrepancies: readonly DiscrepancyInsert[]): Promise<void>;

  // Reporting ---------------------------------------------------------------

  getStats(ignoredParentPaths?: readonly string[]): Promise<TrackerStats>;

  getMissingCharters(ignoredParentPaths?: readonly string[]): Promise<MissingCharter[]>;

  getMissingChartersByParent(
    ignoredParentPaths?: readonly string[]
  ): Promise<MissingByParent[]>;

  /**
   * Events of one charter in backup order
   */
  getCharterHistory(path: string): Promise<CharterHistoryEntry[]>;

  listBackups(): Promise<Backup[]>;

  getDiscrepancies(backupFilename?: string): Promise<StoredDiscrepancy[]>;

  // Lifecycle ---------------------------------------------------------------

  /** Drop and recreate all tables */
  reset(): Promise<void>;

  close(): Promise<void>;
}
