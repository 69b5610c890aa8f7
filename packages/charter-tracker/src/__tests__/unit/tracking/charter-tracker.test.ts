/**
 * Charter Tracker Tests
 *
 * Applies sequences of in-memory backups to an in-memory SQLite store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CharterTracker } from '../../../tracking/charter-tracker.js';
import { SqliteCharterStore } from '../../../persistence/sqlite-charter-store.js';
import type { EventInsert } from '../../../persistence/charter-store.js';
import { BackupFilenameError, BackupProcessingError } from '../../../core/errors.js';
import type { BackupOutcome, BackupProcessingStats } from '../../../core/types.js';
import { BASE, InMemoryArchive, consistentBackup, manifestXml } from '../../utils/archives.js';

const BACKUP_1 = 'full20240101-0000.zip';
const BACKUP_2 = 'full20240108-0000.zip';
const BACKUP_3 = 'full20240115-0000.zip';

const A = `${BASE}/coll/A.xml`;
const B = `${BASE}/coll/B.xml`;

/**
 * Store whose event insert can be made to fail
 */
class FlakyStore extends SqliteCharterStore {
  failEvents = false;

  async insertEvents(events: readonly EventInsert[]): Promise<void> {
    if (this.failEvents) {
      throw new Error('disk full');
    }
    return super.insertEvents(events);
  }
}

function processedStats(outcome: BackupOutcome): BackupProcessingStats {
  if (outcome.status !== 'processed') {
    throw new Error(`expected a processed backup, got ${outcome.status}`);
  }
  return outcome.stats;
}

describe('CharterTracker', () => {
  let store: FlakyStore;
  let tracker: CharterTracker;

  beforeEach(async () => {
    store = new FlakyStore({ path: ':memory:', batchSize: 2 });
    await store.runMigrations();
    tracker = new CharterTracker(store, { basePath: BASE });
    await tracker.loadCurrentState();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('lifecycle', () => {
    it('records appearance, disappearance and reappearance', async () => {
      const first = processedStats(
        await tracker.processBackup(BACKUP_1, consistentBackup('coll', ['A.xml', 'B.xml']))
      );
      expect(first).toMatchObject({
        filename: BACKUP_1,
        backupDate: '2024-01-01T00:00:00',
        charterCount: 2,
        appeared: 2,
        disappeared: 0,
        reappeared: 0,
        discrepancies: 0,
      });
      expect([...tracker.getCurrentState().keys()]).toEqual([A, B]);

      const second = processedStats(
        await tracker.processBackup(BACKUP_2, consistentBackup('coll', ['A.xml']))
      );
      expect(second).toMatchObject({ charterCount: 1, appeared: 0, disappeared: 1, reappeared: 0 });
      expect(await store.findCharterByPath(B)).toMatchObject({ status: 'missing' });
      expect(await store.getCharterHistory(A)).toHaveLength(1);

      const [missingB] = await store.getMissingCharters();
      expect(missingB).toMatchObject({
        filePath: B,
        parentPath: 'coll',
        firstSeenBackup: BACKUP_1,
        lastSeenBackup: BACKUP_1,
      });

      const third = processedStats(
        await tracker.processBackup(BACKUP_3, consistentBackup('coll', ['A.xml', 'B.xml']))
      );
      expect(third).toMatchObject({ charterCount: 2, appeared: 0, disappeared: 0, reappeared: 1 });
      expect(await store.findCharterByPath(B)).toMatchObject({ status: 'present' });
      expect((await store.getCharterHistory(B)).map((e) => [e.eventType, e.backupFilename])).toEqual([
        ['appeared', BACKUP_1],
        ['disappeared', BACKUP_2],
        ['appeared', BACKUP_3],
      ]);

      expect(await store.getStats()).toEqual({
        processedBackups: 3,
        totalCharters: 2,
        missingCharters: 0,
        disappearanceEvents: 1,
        totalDiscrepancies: 0,
      });
    });

    it('updates last-seen without events for charters still present', async () => {
      await tracker.processBackup(BACKUP_1, consistentBackup('coll', ['A.xml']));
      await tracker.processBackup(BACKUP_2, consistentBackup('coll', ['A.xml', 'B.xml']));
      await tracker.processBackup(BACKUP_3, consistentBackup('coll', ['B.xml']));

      const [missingA] = await store.getMissingCharters();
      expect(missingA).toMatchObject({ filePath: A, lastSeenBackup: BACKUP_2 });
      expect(await store.getCharterHistory(A)).toHaveLength(2);
    });

    it('continues from the stored state in a new tracker', async () => {
      await tracker.processBackup(BACKUP_1, consistentBackup('coll', ['A.xml', 'B.xml']));
      await tracker.processBackup(BACKUP_2, consistentBackup('coll', ['A.xml']));

      const restarted = new CharterTracker(store, { basePath: BASE });
      await restarted.loadCurrentState();
      expect(restarted.presentCount).toBe(1);

      const stats = processedStats(
        await restarted.processBackup(BACKUP_3, consistentBackup('coll', []))
      );
      expect(stats).toMatchObject({ charterCount: 0, disappeared: 1, reappeared: 0 });
      expect(restarted.presentCount).toBe(0);
    });
  });

  describe('extraction results', () => {
    it('stores discrepancies and tracks entry-only charters', async () => {
      const dir = `${BASE}/coll`;
      const archive = new InMemoryArchive([
        [`${dir}/__contents__.xml`, manifestXml(`/${dir}`, ['A.xml'])],
        [`${dir}/A.xml`, '<charter/>'],
        [`${dir}/B.xml`, '<charter/>'],
      ]);

      const stats = processedStats(await tracker.processBackup(BACKUP_1, archive));

      expect(stats).toMatchObject({ charterCount: 2, appeared: 2, discrepancies: 1 });
      expect(await store.getDiscrepancies(BACKUP_1)).toMatchObject([
        { filePath: B, inManifest: false, inEntries: true },
      ]);
    });

    it('keeps the entry spelling as the raw path', async () => {
      const dir = `${BASE}/coll`;
      await tracker.processBackup(
        BACKUP_1,
        new InMemoryArchive([
          [`${dir}/__contents__.xml`, manifestXml(`/${dir}`, ['A&7C;B.xml'])],
          [`${dir}/A%7CB.xml`, '<charter/>'],
        ])
      );
      await tracker.processBackup(BACKUP_2, consistentBackup('coll', []));

      expect(await store.getMissingCharters()).toMatchObject([
        { filePath: `${dir}/A|B.xml`, filePathRaw: `${dir}/A%7CB.xml` },
      ]);
    });
  });

  describe('guards', () => {
    it('skips backups that are already processed', async () => {
      await tracker.processBackup(BACKUP_1, consistentBackup('coll', ['A.xml']));

      const outcome = await tracker.processBackup(BACKUP_1, consistentBackup('coll', []));

      expect(outcome).toEqual({ status: 'skipped', filename: BACKUP_1 });
      expect(tracker.presentCount).toBe(1);
      expect((await store.getStats()).disappearanceEvents).toBe(0);
    });

    it('rejects unparseable filenames before touching the store', async () => {
      await expect(
        tracker.processBackup('full20241301-0000.zip', consistentBackup('coll', ['A.xml']))
      ).rejects.toBeInstanceOf(BackupFilenameError);

      expect(await store.listBackups()).toEqual([]);
      expect(tracker.presentCount).toBe(0);
    });

    it('rolls back store and memory when the transaction fails', async () => {
      await tracker.processBackup(BACKUP_1, consistentBackup('coll', ['A.xml', 'B.xml']));

      store.failEvents = true;
      const failed = tracker.processBackup(BACKUP_2, consistentBackup('coll', ['A.xml']));
      await expect(failed).rejects.toBeInstanceOf(BackupProcessingError);
      await expect(failed).rejects.toThrow(
        `Processing ${BACKUP_2} failed and was rolled back: disk full`
      );

      expect([...tracker.getCurrentState().keys()]).toEqual([A, B]);
      expect(await store.isBackupProcessed(BACKUP_2)).toBe(false);
      expect((await store.listBackups()).map((b) => b.filename)).toEqual([BACKUP_1]);
      expect(await store.findCharterByPath(B)).toMatchObject({ status: 'present' });

      store.failEvents = false;
      const retried = processedStats(
        await tracker.processBackup(BACKUP_2, consistentBackup('coll', ['A.xml']))
      );
      expect(retried.disappeared).toBe(1);
    });
  });
});
