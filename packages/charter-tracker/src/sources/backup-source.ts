/**
 * Backup Source Contract
 *
 * Where backup archives come from. The sync service only needs a
 * chronological listing and a way to open one archive.
 */

import type { ArchiveReader } from '../extraction/archive.js';

export interface BackupSource {
  /**
   * Backup filenames in chronological order.
   * Only names of the form `full*.zip` are listed.
   */
  listBackupIdentifiers(): Promise<string[]>;

  /**
   * Open one backup archive
   *
   * @throws BackupSourceError if the archive cannot be fetched or read
   */
  fetchArchive(filename: string): Promise<ArchiveReader>;
}
