/**
 * Backup Filename Tests
 */

import { describe, it, expect } from 'vitest';
import {
  isBackupFilename,
  parseBackupFilename,
  shouldProcessBackup,
} from '../../../extraction/backup-filename.js';

describe('parseBackupFilename', () => {
  it('parses the snapshot timestamp', () => {
    expect(parseBackupFilename('full20240115-0230.zip')).toEqual({
      ok: true,
      timestamp: '2024-01-15T02:30:00',
    });
  });

  it('accepts leap days', () => {
    expect(parseBackupFilename('full20240229-2359.zip')).toEqual({
      ok: true,
      timestamp: '2024-02-29T23:59:00',
    });
  });

  it('rejects other names', () => {
    for (const name of ['incr20240115-0230.zip', 'full2024011-0230.zip', 'full20240115-0230.tar']) {
      expect(parseBackupFilename(name)).toEqual({
        ok: false,
        reason: 'expected fullYYYYMMDD-HHMM.zip',
      });
    }
  });

  it('rejects impossible dates and times', () => {
    for (const name of ['full20230229-0000.zip', 'full20241301-0000.zip', 'full20240115-2460.zip']) {
      expect(parseBackupFilename(name)).toEqual({ ok: false, reason: 'date or time out of range' });
    }
  });
});

describe('isBackupFilename', () => {
  it('matches full backup archives only', () => {
    expect(isBackupFilename('full20240115-0230.zip')).toBe(true);
    expect(isBackupFilename('full-anything.zip')).toBe(true);
    expect(isBackupFilename('incremental.zip')).toBe(false);
    expect(isBackupFilename('full20240115-0230.zip.part')).toBe(false);
  });
});

describe('shouldProcessBackup', () => {
  it('keeps every Nth backup starting with the first', () => {
    const kept = [0, 1, 2, 3, 4, 5, 6, 7].filter((i) => shouldProcessBackup(i, 3));
    expect(kept).toEqual([0, 3, 6]);
  });

  it('keeps everything at frequency 1', () => {
    expect([0, 1, 2].every((i) => shouldProcessBackup(i, 1))).toBe(true);
  });
});
