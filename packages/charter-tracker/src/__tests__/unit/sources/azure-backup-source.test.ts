/**
 * Azure Backup Source Tests
 *
 * The blob container is faked in process; no requests leave the test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BackupSourceError, ConfigurationError } from '../../../core/errors.js';
import {
  AzureBackupSource,
  createContainerClient,
  type BlobContainer,
} from '../../../sources/azure-backup-source.js';
import { buildZip, OVER_2_GIB, writeSparseZip } from '../../utils/archives.js';

class FakeContainer implements BlobContainer {
  readonly downloads: string[] = [];

  constructor(private readonly blobs: Map<string, Buffer>) {}

  async *listBlobNames(prefix: string): AsyncIterable<string> {
    for (const name of this.blobs.keys()) {
      if (name.startsWith(prefix)) {
        yield name;
      }
    }
  }

  async downloadToFile(blobName: string, filePath: string): Promise<void> {
    this.downloads.push(blobName);
    const data = this.blobs.get(blobName);
    if (!data) {
      throw new Error('BlobNotFound');
    }
    await writeFile(filePath, data);
  }
}

const BACKUP = 'full20240101-0000.zip';

describe('AzureBackupSource', () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = mkdtempSync(join(tmpdir(), 'charter-azure-'));
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
  });

  it('lists full backups in chronological order', async () => {
    const container = new FakeContainer(
      new Map([
        ['full20240108-0000.zip', Buffer.alloc(0)],
        [BACKUP, Buffer.alloc(0)],
        ['fullbackup.txt', Buffer.alloc(0)],
        ['incr20240102-0000.zip', Buffer.alloc(0)],
      ])
    );

    const source = new AzureBackupSource(container, cacheDir);

    expect(await source.listBackupIdentifiers()).toEqual([BACKUP, 'full20240108-0000.zip']);
  });

  it('downloads once and reuses the cached archive', async () => {
    const container = new FakeContainer(new Map([[BACKUP, buildZip({ 'db/a.xml': 'a' })]]));
    const source = new AzureBackupSource(container, cacheDir);

    const first = await source.fetchArchive(BACKUP);
    const second = await source.fetchArchive(BACKUP);

    expect(first.listEntries()).toEqual(['db/a.xml']);
    expect(second.listEntries()).toEqual(['db/a.xml']);
    expect(container.downloads).toEqual([BACKUP]);
    expect(existsSync(source.getCachePath(BACKUP))).toBe(true);
    await first.close();
    await second.close();
  });

  it('reuses a cached archive larger than 2 GiB', async () => {
    const container = new FakeContainer(new Map());
    const source = new AzureBackupSource(container, cacheDir);
    writeSparseZip(source.getCachePath(BACKUP), { 'db/a.xml': 'a' }, OVER_2_GIB);

    const archive = await source.fetchArchive(BACKUP);

    expect(container.downloads).toEqual([]);
    expect(existsSync(source.getCachePath(BACKUP))).toBe(true);
    expect((await archive.readEntry('db/a.xml'))?.toString('utf8')).toBe('a');
    await archive.close();
  });

  it('downloads again when the cached archive is corrupt', async () => {
    const container = new FakeContainer(new Map([[BACKUP, buildZip({ 'db/a.xml': 'a' })]]));
    const source = new AzureBackupSource(container, cacheDir);
    writeFileSync(source.getCachePath(BACKUP), 'truncated');

    const archive = await source.fetchArchive(BACKUP);

    expect(container.downloads).toEqual([BACKUP]);
    expect((await archive.readEntry('db/a.xml'))?.toString('utf8')).toBe('a');
    await archive.close();
  });

  it('rejects downloads that are not ZIP archives and caches nothing', async () => {
    const container = new FakeContainer(new Map([[BACKUP, Buffer.from('not a zip')]]));
    const source = new AzureBackupSource(container, cacheDir);

    await expect(source.fetchArchive(BACKUP)).rejects.toThrow(
      `Downloaded ${BACKUP} is not a valid ZIP archive`
    );
    expect(existsSync(source.getCachePath(BACKUP))).toBe(false);
    expect(existsSync(`${source.getCachePath(BACKUP)}.part`)).toBe(false);
  });

  it('wraps download errors', async () => {
    const source = new AzureBackupSource(new FakeContainer(new Map()), cacheDir);

    const result = source.fetchArchive(BACKUP);

    await expect(result).rejects.toBeInstanceOf(BackupSourceError);
    await expect(result).rejects.toThrow(`Download of ${BACKUP} failed: BlobNotFound`);
  });
});

describe('createContainerClient', () => {
  it('requires a SAS URL or a connection string with container name', () => {
    expect(() => createContainerClient({})).toThrow(ConfigurationError);
    expect(() =>
      createContainerClient({ connectionString: 'UseDevelopmentStorage=true' })
    ).toThrow(ConfigurationError);
  });

  it('builds a client from a container SAS URL', () => {
    const client = createContainerClient({
      sasUrl: 'https://devaccount.blob.core.windows.net/backups?sv=test-token',
    });

    expect(client.containerName).toBe('backups');
  });
});
