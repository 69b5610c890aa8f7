/**
 * SQLite Charter Store
 *
 * CharterStore on better-sqlite3. better-sqlite3 is synchronous; the async
 * signatures exist so the tracker stays independent of the driver.
 *
 * ARCHITECTURE:
 * - Explicit BEGIN/COMMIT/ROLLBACK driven by the state tracker (one per backup)
 * - WAL mode so reports can read while a sync runs
 * - Every IN (...) statement chunked at a configurable batch size
 * - Schema versioned through schema_migrations
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type {
  Backup,
  BackupTimestamp,
  CharterEventType,
  CharterHistoryEntry,
  CharterStatus,
  MissingByParent,
  MissingCharter,
  StoredDiscrepancy,
  TrackerStats,
} from '../core/types.js';
import { DEFAULT_BATCH_SIZE } from '../core/constants.js';
import { chunk } from '../core/utils/batch.js';
import type {
  CharterInsert,
  CharterRef,
  CharterStore,
  DiscrepancyInsert,
  EventInsert,
} from './charter-store.js';

// ============================================================================
// Public Types
// ============================================================================

export interface SqliteStoreOptions {
  /** Database file path, or ':memory:' */
  readonly path: string;
  /** Maximum IDs or paths bound per chunked statement */
  readonly batchSize?: number;
}

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface CharterRefRow {
  readonly id: number;
  readonly file_path: string;
  readonly current_status: CharterStatus;
}

interface BackupRow {
  readonly id: number;
  readonly filename: string;
  readonly backup_date: string;
  readonly processed_at: string | null;
  readonly charter_count: number;
  readonly processing_time_sec: number | null;
}

interface MissingCharterRow {
  readonly file_path: string;
  readonly file_path_raw: string | null;
  readonly parent_path: string;
  readonly first_seen_backup: string;
  readonly first_seen_date: string;
  readonly last_seen_backup: string;
  readonly last_seen_date: string;
}

interface MissingByParentRow {
  readonly parent_path: string;
  readonly missing_count: number;
  readonly earliest_first_seen: string;
  readonly latest_first_seen: string;
  readonly earliest_disappearance: string | null;
  readonly latest_disappearance: string | null;
}

interface HistoryRow {
  readonly event_type: CharterEventType;
  readonly event_date: string;
  readonly filename: string;
}

interface DiscrepancyRow {
  readonly id: number;
  readonly backup_id: number;
  readonly filename: string;
  readonly file_path: string;
  readonly in_contents_xml: number;
  readonly in_zip_entries: number;
}

interface CountRow {
  readonly count: number;
}

// ============================================================================
// Helpers
// ============================================================================

const placeholders = (count: number): string => new Array<string>(count).fill('?').join(', ');

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (c) => `\\${c}`);

/**
 * WHERE fragment excluding charters under ignored parent paths
 */
function ignoredParentsClause(ignored: readonly string[]): {
  readonly sql: string;
  readonly params: string[];
} {
  if (ignored.length === 0) {
    return { sql: '', params: [] };
  }
  const sql = ignored
    .map(() => `AND c.parent_path <> ? AND c.parent_path NOT LIKE ? ESCAPE '\\'`)
    .join(' ');
  const params = ignored.flatMap((path) => [path, `${escapeLike(path)}/%`]);
  return { sql, params };
}

// ============================================================================
// SQLite Charter Store
// ============================================================================

export class SqliteCharterStore implements CharterStore {
  private readonly db: Database.Database;
  private readonly batchSize: number;

  constructor(options: SqliteStoreOptions) {
    if (options.path !== ':memory:') {
      mkdirSync(dirname(options.path), { recursive: true });
    }

    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }

    this.db = new Database(options.path);
    this.batchSize = batchSize;

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('cache_size = -64000');
  }

  /**
   * Open a store and bring its schema up to date
   */
  static async open(options: SqliteStoreOptions): Promise<SqliteCharterStore> {
    const store = new SqliteCharterStore(options);
    await store.runMigrations();
    return store;
  }

  // ============================================================================
  // Migration Management
  // ============================================================================

  /**
   * Run all pending migrations
   */
  async runMigrations(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const currentVersion = await this.getDatabaseVersion();
    const record = this.db.prepare<[number, string]>(
      'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
    );

    const applyPending = this.db.transaction(() => {
      for (const migration of this.getMigrations()) {
        if (migration.version > currentVersion) {
          migration.up(this.db);
          record.run(migration.version, migration.name);
        }
      }
    });

    applyPending();
  }

  /**
   * Get current database version
   *
   * @returns Current schema version (0 if no migrations applied)
   */
  async getDatabaseVersion(): Promise<number> {
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    return row?.version ?? 0;
  }

  private getMigrations(): readonly Migration[] {
    return [
      {
        version: 1,
        name: 'initial_schema',
        up: (db) => {
          db.exec(`
            CREATE TABLE backups (
              id INTEGER PRIMARY KEY AUTOINCREMENT,
              filename TEXT NOT NULL UNIQUE,
              backup_date TEXT NOT NULL,
              processed_at TEXT,
              charter_count INTEGER NOT NULL DEFAULT 0,
              processing_time_sec REAL
            );

            CREATE TABLE charters (
              id INTEGER PRIMARY KEY AUTOINCREMENT,
              file_path TEXT NOT NULL UNIQUE,
              file_path_raw TEXT,
              parent_path TEXT NOT NULL DEFAULT '',
              first_seen_backup_id INTEGER NOT NULL REFERENCES backups(id),
              last_seen_backup_id INTEGER NOT NULL REFERENCES backups(id),
              current_status TEXT NOT NULL DEFAULT 'present'
                CHECK (current_status IN ('present', 'missing'))
            );

            CREATE TABLE charter_events (
              id INTEGER PRIMARY KEY AUTOINCREMENT,
              charter_id INTEGER NOT NULL REFERENCES charters(id),
              backup_id INTEGER NOT NULL REFERENCES backups(id),
              event_type TEXT NOT NULL CHECK (event_type IN ('appeared', 'disappeared')),
              event_date TEXT NOT NULL
            );

            CREATE TABLE discrepancies (
              id INTEGER PRIMARY KEY AUTOINCREMENT,
              backup_id INTEGER NOT NULL REFERENCES backups(id),
              file_path TEXT NOT NULL,
              in_contents_xml INTEGER NOT NULL CHECK (in_contents_xml IN (0, 1)),
              in_zip_entries INTEGER NOT NULL CHECK (in_zip_entries IN (0, 1))
            );

            CREATE INDEX idx_charters_status ON charters(current_status);
            CREATE INDEX idx_charters_parent ON charters(parent_path);
            CREATE INDEX idx_events_charter ON charter_events(charter_id);
            CREATE INDEX idx_events_backup ON charter_events(backup_id);
            CREATE INDEX idx_events_type ON charter_events(event_type);
            CREATE INDEX idx_backups_date ON backups(backup_date);
            CREATE INDEX idx_discrepancies_backup ON discrepancies(backup_id);
          `);
        },
      },
    ];
  }

  // ============================================================================
  // Transactions
  // ============================================================================

  async beginTransaction(): Promise<void> {
    this.db.exec('BEGIN');
  }

  async commit(): Promise<void> {
    this.db.exec('COMMIT');
  }

  async rollback(): Promise<void> {
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  // ============================================================================
  // Backups
  // ============================================================================

  async upsertBackup(filename: string, backupDate: BackupTimestamp): Promise<number> {
    this.db
      .prepare<[string, string]>(
        'INSERT OR IGNORE INTO backups (filename, backup_date) VALUES (?, ?)'
      )
      .run(filename, backupDate);

    const row = this.db
      .prepare<[string], { id: number }>('SELECT id FROM backups WHERE filename = ?')
      .get(filename);

    if (!row) {
      throw new Error(`Failed to upsert backup: ${filename}`);
    }
    return row.id;
  }

  async isBackupProcessed(filename: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { id: number }>(
        'SELECT id FROM backups WHERE filename = ? AND processed_at IS NOT NULL'
      )
      .get(filename);
    return row !== undefined;
  }

  async markBackupProcessed(
    backupId: number,
    charterCount: number,
    durationSeconds: number
  ): Promise<void> {
    this.db
      .prepare<[string, number, number, number]>(`
        UPDATE backups
        SET processed_at = ?, charter_count = ?, processing_time_sec = ?
        WHERE id = ?
      `)
      .run(new Date().toISOString(), charterCount, durationSeconds, backupId);
  }

  async listBackups(): Promise<Backup[]> {
    const rows = this.db
      .prepare<[], BackupRow>('SELECT * FROM backups ORDER BY backup_date, id')
      .all();

    return rows.map((row) => ({
      id: row.id,
      filename: row.filename,
      backupDate: row.backup_date,
      processedAt: row.processed_at,
      charterCount: row.charter_count,
      processingTimeSec: row.processing_time_sec,
    }));
  }

  // ============================================================================
  // Charters
  // ============================================================================

  async findCharterByPath(path: string): Promise<CharterRef | null> {
    const row = this.db
      .prepare<[string], CharterRefRow>(
        'SELECT id, file_path, current_status FROM charters WHERE file_path = ?'
      )
      .get(path);
    return row ? { id: row.id, status: row.current_status } : null;
  }

  async findCharterByPaths(paths: readonly string[]): Promise<Map<string, CharterRef>> {
    const result = new Map<string, CharterRef>();

    for (const batch of chunk(paths, this.batchSize)) {
      const rows = this.db
        .prepare<string[], CharterRefRow>(
          `SELECT id, file_path, current_status FROM charters
           WHERE file_path IN (${placeholders(batch.length)})`
        )
        .all(...batch);

      for (const row of rows) {
        result.set(row.file_path, { id: row.id, status: row.current_status });
      }
    }

    return result;
  }

  async insertCharters(charters: readonly CharterInsert[]): Promise<number[]> {
    const insert = this.db.prepare<[string, string, string, number, number]>(`
      INSERT INTO charters
        (file_path, file_path_raw, parent_path, first_seen_backup_id, last_seen_backup_id, current_status)
      VALUES (?, ?, ?, ?, ?, 'present')
    `);

    return charters.map((charter) =>
      Number(
        insert.run(
          charter.filePath,
          charter.filePathRaw,
          charter.parentPath,
          charter.firstBackupId,
          charter.firstBackupId
        ).lastInsertRowid
      )
    );
  }

  async updateLastSeen(charterIds: readonly number[], backupId: number): Promise<void> {
    for (const batch of chunk(charterIds, this.batchSize)) {
      this.db
        .prepare<number[]>(
          `UPDATE charters
           SET last_seen_backup_id = ?, current_status = 'present'
           WHERE id IN (${placeholders(batch.length)})`
        )
        .run(backupId, ...batch);
    }
  }

  async markMissing(charterIds: readonly number[]): Promise<void> {
    for (const batch of chunk(charterIds, this.batchSize)) {
      this.db
        .prepare<number[]>(
          `UPDATE charters SET current_status = 'missing'
           WHERE id IN (${placeholders(batch.length)})`
        )
        .run(...batch);
    }
  }

  async loadPresentCharters(): Promise<Map<string, number>> {
    const rows = this.db
      .prepare<[], CharterRefRow>(
        `SELECT id, file_path, current_status FROM charters WHERE current_status = 'present'`
      )
      .all();
    return new Map(rows.map((row) => [row.file_path, row.id]));
  }

  // ============================================================================
  // Events and Discrepancies
  // ============================================================================

  async insertEvents(events: readonly EventInsert[]): Promise<void> {
    const insert = this.db.prepare<[number, number, string, string]>(`
      INSERT INTO charter_events (charter_id, backup_id, event_type, event_date)
      VALUES (?, ?, ?, ?)
    `);
    for (const event of events) {
      insert.run(event.charterId, event.backupId, event.eventType, event.eventDate);
    }
  }

  async insertDiscrepancies(discrepancies: readonly DiscrepancyInsert[]): Promise<void> {
    const insert = this.db.prepare<[number, string, number, number]>(`
      INSERT INTO discrepancies (backup_id, file_path, in_contents_xml, in_zip_entries)
      VALUES (?, ?, ?, ?)
    `);
    for (const d of discrepancies) {
      insert.run(d.backupId, d.filePath, d.inManifest ? 1 : 0, d.inEntries ? 1 : 0);
    }
  }

  async getDiscrepancies(backupFilename?: string): Promise<StoredDiscrepancy[]> {
    const base = `
      SELECT d.id, d.backup_id, b.filename, d.file_path, d.in_contents_xml, d.in_zip_entries
      FROM discrepancies d
      JOIN backups b ON b.id = d.backup_id
    `;
    const order = 'ORDER BY b.backup_date, d.id';

    const rows =
      backupFilename === undefined
        ? this.db.prepare<[], DiscrepancyRow>(`${base} ${order}`).all()
        : this.db
            .prepare<[string], DiscrepancyRow>(`${base} WHERE b.filename = ? ${order}`)
            .all(backupFilename);

    return rows.map((row) => ({
      id: row.id,
      backupId: row.backup_id,
      backupFilename: row.filename,
      filePath: row.file_path,
      inManifest: row.in_contents_xml === 1,
      inEntries: row.in_zip_entries === 1,
    }));
  }

  // ============================================================================
  // Reporting
  // ============================================================================

  private count(sql: string, params: readonly string[] = []): number {
    const row = this.db.prepare<string[], CountRow>(sql).get(...params);
    return row?.count ?? 0;
  }

  async getStats(ignoredParentPaths: readonly string[] = []): Promise<TrackerStats> {
    const ignored = ignoredParentsClause(ignoredParentPaths);

    return {
      processedBackups: this.count(
        'SELECT COUNT(*) AS count FROM backups WHERE processed_at IS NOT NULL'
      ),
      totalCharters: this.count('SELECT COUNT(*) AS count FROM charters'),
      missingCharters: this.count(
        `SELECT COUNT(*) AS count FROM charters c
         WHERE c.current_status = 'missing' ${ignored.sql}`,
        ignored.params
      ),
      disappearanceEvents: this.count(
        `SELECT COUNT(*) AS count FROM charter_events WHERE event_type = 'disappeared'`
      ),
      totalDiscrepancies: this.count('SELECT COUNT(*) AS count FROM discrepancies'),
    };
  }

  async getMissingCharters(ignoredParentPaths: readonly string[] = []): Promise<MissingCharter[]> {
    const ignored = ignoredParentsClause(ignoredParentPaths);
    const rows = this.db
      .prepare<string[], MissingCharterRow>(`
        SELECT
          c.file_path,
          c.file_path_raw,
          c.parent_path,
          b1.filename AS first_seen_backup,
          b1.backup_date AS first_seen_date,
          b2.filename AS last_seen_backup,
          b2.backup_date AS last_seen_date
        FROM charters c
        JOIN backups b1 ON c.first_seen_backup_id = b1.id
        JOIN backups b2 ON c.last_seen_backup_id = b2.id
        WHERE c.current_status = 'missing' ${ignored.sql}
        ORDER BY b2.backup_date DESC, c.file_path
      `)
      .all(...ignored.params);

    return rows.map((row) => ({
      filePath: row.file_path,
      filePathRaw: row.file_path_raw,
      parentPath: row.parent_path,
      firstSeenBackup: row.first_seen_backup,
      firstSeenDate: row.first_seen_date,
      lastSeenBackup: row.last_seen_backup,
      lastSeenDate: row.last_seen_date,
    }));
  }

  async getMissingChartersByParent(
    ignoredParentPaths: readonly string[] = []
  ): Promise<MissingByParent[]> {
    const ignored = ignoredParentsClause(ignoredParentPaths);
    const rows = this.db
      .prepare<string[], MissingByParentRow>(`
        SELECT
          c.parent_path,
          COUNT(*) AS missing_count,
          MIN(b1.backup_date) AS earliest_first_seen,
          MAX(b1.backup_date) AS latest_first_seen,
          MIN(d.event_date) AS earliest_disappearance,
          MAX(d.event_date) AS latest_disappearance
        FROM charters c
        JOIN backups b1 ON c.first_seen_backup_id = b1.id
        LEFT JOIN (
          SELECT charter_id, MAX(event_date) AS event_date
          FROM charter_events
          WHERE event_type = 'disappeared'
          GROUP BY charter_id
        ) d ON d.charter_id = c.id
        WHERE c.current_status = 'missing' ${ignored.sql}
        GROUP BY c.parent_path
        ORDER BY missing_count DESC, c.parent_path
      `)
      .all(...ignored.params);

    return rows.map((row) => ({
      parentPath: row.parent_path,
      missingCount: row.missing_count,
      earliestFirstSeen: row.earliest_first_seen,
      latestFirstSeen: row.latest_first_seen,
      earliestDisappearance: row.earliest_disappearance,
      latestDisappearance: row.latest_disappearance,
    }));
  }

  async getCharterHistory(path: string): Promise<CharterHistoryEntry[]> {
    const rows = this.db
      .prepare<[string], HistoryRow>(`
        SELECT e.event_type, e.event_date, b.filename
        FROM charter_events e
        JOIN charters c ON c.id = e.charter_id
        JOIN backups b ON b.id = e.backup_id
        WHERE c.file_path = ?
        ORDER BY b.backup_date, e.id
      `)
      .all(path);

    return rows.map((row) => ({
      eventType: row.event_type,
      eventDate: row.event_date,
      backupFilename: row.filename,
    }));
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async reset(): Promise<void> {
    this.db.exec(`
      DROP TABLE IF EXISTS discrepancies;
      DROP TABLE IF EXISTS charter_events;
      DROP TABLE IF EXISTS charters;
      DROP TABLE IF EXISTS backups;
      DROP TABLE IF EXISTS schema_migrations;
    `);
    await this.runMigrations();
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
