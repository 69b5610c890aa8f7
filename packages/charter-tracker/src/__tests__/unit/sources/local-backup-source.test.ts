/**
 * Local Backup Source Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BackupSourceError } from '../../../core/errors.js';
import { LocalBackupSource } from '../../../sources/local-backup-source.js';
import { buildZip } from '../../utils/archives.js';

describe('LocalBackupSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'charter-local-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists backup archives in chronological order', async () => {
    writeFileSync(join(dir, 'full20240108-0000.zip'), buildZip({ 'a.xml': 'a' }));
    writeFileSync(join(dir, 'full20240101-0000.zip'), buildZip({ 'a.xml': 'a' }));
    writeFileSync(join(dir, 'notes.txt'), 'not a backup');
    writeFileSync(join(dir, 'incr20240102-0000.zip'), buildZip({ 'a.xml': 'a' }));

    const source = new LocalBackupSource(dir);

    expect(await source.listBackupIdentifiers()).toEqual([
      'full20240101-0000.zip',
      'full20240108-0000.zip',
    ]);
  });

  it('opens a backup archive', async () => {
    writeFileSync(join(dir, 'full20240101-0000.zip'), buildZip({ 'db/a.xml': 'content' }));

    const archive = await new LocalBackupSource(dir).fetchArchive('full20240101-0000.zip');

    expect(archive.listEntries()).toEqual(['db/a.xml']);
    expect((await archive.readEntry('db/a.xml'))?.toString('utf8')).toBe('content');
    await archive.close();
  });

  it('rejects missing and unreadable archives', async () => {
    writeFileSync(join(dir, 'full20240101-0000.zip'), 'garbage');
    const source = new LocalBackupSource(dir);

    await expect(source.fetchArchive('full20240101-0000.zip')).rejects.toBeInstanceOf(
      BackupSourceError
    );
    await expect(source.fetchArchive('full20240108-0000.zip')).rejects.toBeInstanceOf(
      BackupSourceError
    );
  });

  it('fails to list a directory that does not exist', async () => {
    const source = new LocalBackupSource(join(dir, 'absent'));

    await expect(source.listBackupIdentifiers()).rejects.toThrow(
      `Cannot list backup directory ${join(dir, 'absent')}`
    );
  });
});
