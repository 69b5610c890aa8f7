/**
 * Sync Service
 *
 * Brings the store up to date with a backup source: list, sample by
 * frequency, drop what is already processed, then apply the remaining
 * backups one by one in chronological order.
 *
 * Fetching is pipelined one backup ahead: while backup N is applied, the
 * download of backup N+1 is already running. Application itself is strictly
 * sequential. A failed backup is logged and recorded, and the sync moves on.
 */

import type { BackupProcessingStats } from '../core/types.js';
import { DEFAULT_BACKUP_FREQUENCY } from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import type { ArchiveReader } from '../extraction/archive.js';
import { shouldProcessBackup } from '../extraction/backup-filename.js';
import type { CharterStore } from '../persistence/charter-store.js';
import type { BackupSource } from '../sources/backup-source.js';
import type { CharterTracker } from '../tracking/charter-tracker.js';

const log = createLogger({ module: 'sync' });

// ============================================================================
// Types
// ============================================================================

export interface SyncOptions {
  /** Keep every Nth backup (1 keeps all); the latest is always kept */
  readonly frequency?: number;
  /** Checked between backups */
  readonly signal?: AbortSignal;
  /** Called after every backup that was applied */
  readonly onProcessed?: (stats: BackupProcessingStats) => void;
}

export interface SyncFailure {
  readonly filename: string;
  readonly error: string;
}

export interface SyncSummary {
  /** Backups listed by the source */
  readonly available: number;
  /** Backups left after frequency sampling */
  readonly selected: number;
  /** Selected backups that were already processed */
  readonly alreadyProcessed: number;
  readonly processed: readonly BackupProcessingStats[];
  readonly failures: readonly SyncFailure[];
  /** True when the signal stopped the sync early */
  readonly aborted: boolean;
}

type FetchResult =
  | { readonly ok: true; readonly archive: ArchiveReader }
  | { readonly ok: false; readonly error: string };

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// ============================================================================
// Sampling
// ============================================================================

/**
 * Every `frequency`-th backup starting with the first, plus the latest
 */
export function selectBackups(filenames: readonly string[], frequency: number): string[] {
  const selected = filenames.filter((_, index) => shouldProcessBackup(index, frequency));
  const latest = filenames[filenames.length - 1];
  if (latest !== undefined && selected[selected.length - 1] !== latest) {
    selected.push(latest);
  }
  return selected;
}

// ============================================================================
// Service
// ============================================================================

export class SyncService {
  constructor(
    private readonly source: BackupSource,
    private readonly store: CharterStore,
    private readonly tracker: CharterTracker
  ) {}

  async sync(options: SyncOptions = {}): Promise<SyncSummary> {
    const frequency = options.frequency ?? DEFAULT_BACKUP_FREQUENCY;

    const available = await this.source.listBackupIdentifiers();
    const selected = selectBackups(available, frequency);

    const queue: string[] = [];
    for (const filename of selected) {
      if (!(await this.store.isBackupProcessed(filename))) {
        queue.push(filename);
      }
    }

    log.info('Sync plan', {
      available: available.length,
      selected: selected.length,
      toProcess: queue.length,
      frequency,
    });

    await this.tracker.loadCurrentState();

    const processed: BackupProcessingStats[] = [];
    const failures: SyncFailure[] = [];
    let aborted = false;

    let pending: Promise<FetchResult> | null = queue.length > 0 ? this.fetch(queue[0]) : null;

    for (let index = 0; index < queue.length; index++) {
      const filename = queue[index];

      if (options.signal?.aborted) {
        log.warn('Sync aborted', { remaining: queue.length - index });
        aborted = true;
        if (pending) {
          const unused = await pending;
          if (unused.ok) {
            await this.closeArchive(queue[index], unused.archive);
          }
        }
        break;
      }

      const fetched: FetchResult = pending
        ? await pending
        : { ok: false, error: 'archive was not fetched' };
      pending = index + 1 < queue.length ? this.fetch(queue[index + 1]) : null;

      if (!fetched.ok) {
        log.error('Fetching backup failed', { filename, error: fetched.error });
        failures.push({ filename, error: fetched.error });
        continue;
      }

      try {
        const outcome = await this.tracker.processBackup(filename, fetched.archive);
        if (outcome.status === 'processed') {
          processed.push(outcome.stats);
          options.onProcessed?.(outcome.stats);
        }
      } catch (error) {
        log.error('Processing backup failed', { filename, error: errorMessage(error) });
        failures.push({ filename, error: errorMessage(error) });
      } finally {
        await this.closeArchive(filename, fetched.archive);
      }
    }

    return {
      available: available.length,
      selected: selected.length,
      alreadyProcessed: selected.length - queue.length,
      processed,
      failures,
      aborted,
    };
  }

  private async closeArchive(filename: string, archive: ArchiveReader): Promise<void> {
    try {
      await archive.close();
    } catch (error) {
      log.warn('Closing backup archive failed', { filename, error: errorMessage(error) });
    }
  }

  private async fetch(filename: string): Promise<FetchResult> {
    try {
      return { ok: true, archive: await this.source.fetchArchive(filename) };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }
}
