/**
 * Charter State Tracker
 *
 * Applies backups in chronological order. Each backup is diffed against the
 * set of charters present after the previous backup, and the resulting
 * mutations and events are written in a single store transaction.
 *
 * STATE TRANSITIONS per normalized path:
 *   unknown          -> present   (new charter, `appeared` event)
 *   missing          -> present   (reappearance, `appeared` event)
 *   present          -> present   (last-seen update only)
 *   present, absent  -> missing   (`disappeared` event)
 *
 * The in-memory state is only replaced after the transaction commits, so a
 * rolled-back backup leaves both the store and the tracker as they were.
 */

import type {
  BackupOutcome,
  BackupProcessingStats,
  BackupTimestamp,
} from '../core/types.js';
import { DEFAULT_BASE_PATH } from '../core/constants.js';
import { BackupFilenameError, BackupProcessingError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { ArchiveReader } from '../extraction/archive.js';
import { parseBackupFilename } from '../extraction/backup-filename.js';
import {
  DualSourceExtractor,
  type BackupExtraction,
} from '../extraction/dual-source-extractor.js';
import { extractParentPath } from '../normalization/path-normalizer.js';
import type { CharterInsert, CharterStore, EventInsert } from '../persistence/charter-store.js';

const log = createLogger({ module: 'tracker' });

// ============================================================================
// Types
// ============================================================================

export interface CharterTrackerOptions {
  /** Base collection path; also used to derive parent paths */
  readonly basePath?: string;
  /** Extractor to use (defaults to one configured with basePath) */
  readonly extractor?: DualSourceExtractor;
}

/**
 * Result of diffing one backup against the stored state
 */
interface StateDiff {
  readonly seenIds: number[];
  readonly reappearedIds: number[];
  readonly newCharters: CharterInsert[];
  readonly missing: Array<readonly [path: string, id: number]>;
}

// ============================================================================
// Tracker
// ============================================================================

export class CharterTracker {
  private readonly store: CharterStore;
  private readonly extractor: DualSourceExtractor;
  private readonly basePath: string;

  /** Normalized path -> charter ID of every present charter */
  private currentState = new Map<string, number>();
  private stateLoaded = false;

  constructor(store: CharterStore, options: CharterTrackerOptions = {}) {
    this.store = store;
    this.basePath = options.basePath ?? DEFAULT_BASE_PATH;
    this.extractor = options.extractor ?? new DualSourceExtractor({ basePath: this.basePath });
  }

  /**
   * Load the present charters from the store
   */
  async loadCurrentState(): Promise<void> {
    this.currentState = await this.store.loadPresentCharters();
    this.stateLoaded = true;
    log.info('Loaded current state', { presentCharters: this.currentState.size });
  }

  /**
   * Number of charters currently present
   */
  get presentCount(): number {
    return this.currentState.size;
  }

  /**
   * Snapshot of the present charters (normalized path -> charter ID)
   */
  getCurrentState(): ReadonlyMap<string, number> {
    return new Map(this.currentState);
  }

  /**
   * Apply one backup. The archive stays open; closing it is up to the caller.
   *
   * @throws BackupFilenameError if the filename carries no valid timestamp
   * @throws BackupProcessingError if the transaction failed (rolled back)
   */
  async processBackup(filename: string, archive: ArchiveReader): Promise<BackupOutcome> {
    if (await this.store.isBackupProcessed(filename)) {
      log.info('Backup already processed, skipping', { filename });
      return { status: 'skipped', filename };
    }

    const parsed = parseBackupFilename(filename);
    if (!parsed.ok) {
      throw new BackupFilenameError(filename, parsed.reason);
    }

    if (!this.stateLoaded) {
      await this.loadCurrentState();
    }

    const startTime = Date.now();

    const extraction = await this.extractor.extract(archive);
    const extractedAt = Date.now();

    const { stats, nextState } = await this.applyInTransaction(
      filename,
      parsed.timestamp,
      extraction,
      startTime
    );

    this.currentState = nextState;

    log.info('Processed backup', {
      filename,
      charters: stats.charterCount,
      appeared: stats.appeared,
      reappeared: stats.reappeared,
      disappeared: stats.disappeared,
      discrepancies: stats.discrepancies,
      extractMs: extractedAt - startTime,
      applyMs: Date.now() - extractedAt,
    });

    return { status: 'processed', stats };
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private async applyInTransaction(
    filename: string,
    backupDate: BackupTimestamp,
    extraction: BackupExtraction,
    startTime: number
  ): Promise<{ stats: BackupProcessingStats; nextState: Map<string, number> }> {
    const working = new Map(this.currentState);

    await this.store.beginTransaction();
    try {
      const backupId = await this.store.upsertBackup(filename, backupDate);

      await this.store.insertDiscrepancies(
        extraction.discrepancies.map((discrepancy) => ({ ...discrepancy, backupId }))
      );

      const diff = await this.diff(extraction, backupId, working);

      const newIds = await this.store.insertCharters(diff.newCharters);
      if (newIds.length !== diff.newCharters.length) {
        throw new Error(
          `Store returned ${newIds.length} IDs for ${diff.newCharters.length} new charters`
        );
      }
      diff.newCharters.forEach((charter, index) => {
        working.set(charter.filePath, newIds[index]);
      });

      await this.store.updateLastSeen([...diff.seenIds, ...diff.reappearedIds], backupId);

      const missingIds = diff.missing.map(([, id]) => id);
      await this.store.markMissing(missingIds);
      for (const [path] of diff.missing) {
        working.delete(path);
      }

      const event = (
        charterId: number,
        eventType: EventInsert['eventType']
      ): EventInsert => ({ charterId, backupId, eventType, eventDate: backupDate });

      await this.store.insertEvents([
        ...newIds.map((id) => event(id, 'appeared')),
        ...diff.reappearedIds.map((id) => event(id, 'appeared')),
        ...missingIds.map((id) => event(id, 'disappeared')),
      ]);

      const durationSeconds = (Date.now() - startTime) / 1000;
      await this.store.markBackupProcessed(backupId, extraction.mapping.size, durationSeconds);

      await this.store.commit();

      return {
        nextState: working,
        stats: {
          backupId,
          filename,
          backupDate,
          charterCount: extraction.mapping.size,
          appeared: newIds.length,
          disappeared: missingIds.length,
          reappeared: diff.reappearedIds.length,
          discrepancies: extraction.discrepancies.length,
          skippedDescriptors: extraction.skippedDescriptors.length,
          durationSeconds,
        },
      };
    } catch (error) {
      try {
        await this.store.rollback();
      } catch (rollbackError) {
        log.error('Rollback failed', {
          filename,
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      }
      throw new BackupProcessingError(filename, error);
    }
  }

  /**
   * Classify every charter of the backup against the working state.
   * Reappeared and already-present charters are added to `working`.
   */
  private async diff(
    extraction: BackupExtraction,
    backupId: number,
    working: Map<string, number>
  ): Promise<StateDiff> {
    const seenIds: number[] = [];
    const notInState: string[] = [];

    for (const path of extraction.mapping.keys()) {
      const id = this.currentState.get(path);
      if (id === undefined) {
        notInState.push(path);
      } else {
        seenIds.push(id);
      }
    }

    const known = await this.store.findCharterByPaths(notInState);
    const reappearedIds: number[] = [];
    const newCharters: CharterInsert[] = [];

    for (const path of notInState) {
      const ref = known.get(path);
      if (ref === undefined) {
        newCharters.push({
          filePath: path,
          filePathRaw: extraction.mapping.get(path) ?? path,
          parentPath: extractParentPath(path, this.basePath),
          firstBackupId: backupId,
        });
      } else if (ref.status === 'missing') {
        reappearedIds.push(ref.id);
        working.set(path, ref.id);
      } else {
        seenIds.push(ref.id);
        working.set(path, ref.id);
      }
    }

    const missing: Array<readonly [string, number]> = [];
    for (const [path, id] of this.currentState) {
      if (!extraction.mapping.has(path)) {
        missing.push([path, id]);
      }
    }

    return { seenIds, reappearedIds, newCharters, missing };
  }
}
