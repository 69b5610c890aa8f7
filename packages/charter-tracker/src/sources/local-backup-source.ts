/**
 * Local Backup Source
 *
 * A directory of backup ZIPs, e.g. a mounted share or a pre-filled cache.
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { BackupSourceError } from '../core/errors.js';
import { ZipArchiveReader, type ArchiveReader } from '../extraction/archive.js';
import { isBackupFilename } from '../extraction/backup-filename.js';
import type { BackupSource } from './backup-source.js';

export class LocalBackupSource implements BackupSource {
  constructor(private readonly directory: string) {}

  async listBackupIdentifiers(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      throw new BackupSourceError(
        `Cannot list backup directory ${this.directory}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    // Names embed the timestamp, so lexical order is chronological
    return names.filter(isBackupFilename).sort();
  }

  async fetchArchive(filename: string): Promise<ArchiveReader> {
    const path = join(this.directory, filename);

    try {
      const info = await stat(path);
      if (!info.isFile()) {
        throw new Error('not a regular file');
      }
      return await ZipArchiveReader.open(path);
    } catch (error) {
      throw new BackupSourceError(
        `Cannot open backup ${path}: ${error instanceof Error ? error.message : String(error)}`,
        filename
      );
    }
  }
}
