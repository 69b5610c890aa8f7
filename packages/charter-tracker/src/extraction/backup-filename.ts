/**
 * Backup Filename Parsing
 *
 * Full backups are named `full<YYYYMMDD>-<HHMM>.zip`. The snapshot timestamp
 * comes from the name only; archive metadata is not trusted.
 */

import type { BackupTimestamp } from '../core/types.js';
import { BACKUP_FILENAME_EXTENSION, BACKUP_FILENAME_PREFIX } from '../core/constants.js';

const BACKUP_FILENAME_PATTERN = /^full(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})\.zip$/;

export type BackupFilenameResult =
  | { readonly ok: true; readonly timestamp: BackupTimestamp }
  | { readonly ok: false; readonly reason: string };

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Parse the snapshot timestamp out of a backup filename
 *
 * @example
 * ```typescript
 * parseBackupFilename('full20240115-0230.zip');
 * // => { ok: true, timestamp: '2024-01-15T02:30:00' }
 * ```
 */
export function parseBackupFilename(filename: string): BackupFilenameResult {
  const match = BACKUP_FILENAME_PATTERN.exec(filename);
  if (!match) {
    return {
      ok: false,
      reason: `expected ${BACKUP_FILENAME_PREFIX}YYYYMMDD-HHMM${BACKUP_FILENAME_EXTENSION}`,
    };
  }

  const [year, month, day, hour, minute] = match.slice(1).map(Number);

  // Date.UTC rolls over out-of-range fields; round-tripping catches that
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute
  ) {
    return { ok: false, reason: 'date or time out of range' };
  }

  return {
    ok: true,
    timestamp: `${year}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:00`,
  };
}

/**
 * True for names that look like full backups (listing filter)
 */
export function isBackupFilename(name: string): boolean {
  return name.startsWith(BACKUP_FILENAME_PREFIX) && name.endsWith(BACKUP_FILENAME_EXTENSION);
}

/**
 * Sampling rule: keep every `frequency`-th backup, starting with the first
 */
export function shouldProcessBackup(backupIndex: number, frequency: number): boolean {
  if (frequency <= 1) {
    return true;
  }
  return backupIndex % frequency === 0;
}
