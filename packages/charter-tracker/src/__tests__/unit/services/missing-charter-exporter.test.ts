/**
 * Missing Charter Exporter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZipArchiveReader } from '../../../extraction/archive.js';
import { SqliteCharterStore } from '../../../persistence/sqlite-charter-store.js';
import {
  MissingCharterExporter,
  findEntryName,
} from '../../../services/missing-charter-exporter.js';
import { BASE, InMemoryArchive } from '../../utils/archives.js';
import { FakeBackupSource } from '../../utils/fake-source.js';

const B1 = { filename: 'full20240101-0000.zip', date: '2024-01-01T00:00:00' };
const B2 = { filename: 'full20240108-0000.zip', date: '2024-01-08T00:00:00' };

describe('findEntryName', () => {
  it('finds the hex-escaped spelling of a normalized path', () => {
    const entries = new Set([`${BASE}/coll/A&7C;B.xml`]);
    expect(findEntryName(entries, `${BASE}/coll/A|B.xml`, null)).toBe(`${BASE}/coll/A&7C;B.xml`);
  });

  it('prefers the raw spelling', () => {
    const entries = new Set([`${BASE}/coll/A%7CB.xml`, `${BASE}/coll/A|B.xml`]);
    expect(findEntryName(entries, `${BASE}/coll/A|B.xml`, `${BASE}/coll/A%7CB.xml`)).toBe(
      `${BASE}/coll/A%7CB.xml`
    );
  });

  it('returns null when no variant matches', () => {
    expect(findEntryName(new Set(['other.xml']), `${BASE}/coll/A.xml`, null)).toBeNull();
  });
});

describe('MissingCharterExporter', () => {
  let store: SqliteCharterStore;
  let source: FakeBackupSource;
  let outDir: string;

  const addMissing = async (
    backup: { filename: string; date: string },
    parentPath: string,
    names: readonly string[]
  ): Promise<void> => {
    const backupId = await store.upsertBackup(backup.filename, backup.date);
    const ids = await store.insertCharters(
      names.map((name) => ({
        filePath: `${BASE}/${parentPath}/${name}`,
        filePathRaw: `${BASE}/${parentPath}/${name}`,
        parentPath,
        firstBackupId: backupId,
      }))
    );
    await store.markMissing(ids);
  };

  beforeEach(async () => {
    store = await SqliteCharterStore.open({ path: ':memory:' });
    source = new FakeBackupSource();
    outDir = mkdtempSync(join(tmpdir(), 'charter-export-'));
  });

  afterEach(async () => {
    await store.close();
    rmSync(outDir, { recursive: true, force: true });
  });

  it('recovers missing charters through path variants', async () => {
    await addMissing(B1, 'coll', ['A|B.xml', 'Müller.xml', 'gone.xml']);
    await addMissing(B1, 'ignored', ['x.xml']);
    await addMissing(B2, 'other', ['late.xml']);
    source.add(
      B1.filename,
      new InMemoryArchive([
        [`${BASE}/coll/A&7C;B.xml`, 'ab'],
        [`${BASE}/coll/M├╝ller.xml`, 'mu'],
        [`${BASE}/ignored/x.xml`, 'x'],
      ])
    );
    const outputPath = join(outDir, 'missing.zip');

    const result = await new MissingCharterExporter(store, source, ['ignored']).export(outputPath);

    expect(result.missing).toBe(4);
    expect(result.extracted).toBe(2);
    expect(result.outputPath).toBe(outputPath);
    expect(result.failures).toEqual([
      {
        filePath: `${BASE}/other/late.xml`,
        lastSeenBackup: B2.filename,
        reason: `backup unavailable: Download of ${B2.filename} failed: connection reset`,
      },
      {
        filePath: `${BASE}/coll/gone.xml`,
        lastSeenBackup: B1.filename,
        reason: 'no path variant found in backup',
      },
    ]);

    const written = await ZipArchiveReader.open(outputPath);
    expect(written.listEntries()).toHaveLength(2);
    expect((await written.readEntry(`${BASE}/coll/A|B.xml`))?.toString('utf8')).toBe('ab');
    await written.close();
  });

  it('writes no archive when nothing could be recovered', async () => {
    await addMissing(B1, 'coll', ['gone.xml']);
    source.add(B1.filename, new InMemoryArchive([]));
    const outputPath = join(outDir, 'missing.zip');

    const result = await new MissingCharterExporter(store, source).export(outputPath);

    expect(result).toMatchObject({ missing: 1, extracted: 0, outputPath: null });
    expect(existsSync(outputPath)).toBe(false);
  });

  it('does nothing without missing charters', async () => {
    const result = await new MissingCharterExporter(store, source).export(join(outDir, 'x.zip'));

    expect(result).toEqual({ missing: 0, extracted: 0, failures: [], outputPath: null });
    expect(source.fetched).toEqual([]);
  });
});
