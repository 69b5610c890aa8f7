/**
 * Azure Blob Backup Source
 *
 * Lists full backups in an Azure Blob container and downloads them into a
 * local cache directory. A cached archive is reused when it is a readable
 * ZIP; a corrupt one is deleted and downloaded again. Downloads are not
 * retried.
 */

import { BlobServiceClient, ContainerClient } from '@azure/storage-blob';
import { existsSync } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { BACKUP_FILENAME_PREFIX } from '../core/constants.js';
import { BackupSourceError, ConfigurationError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { isValidZip, ZipArchiveReader, type ArchiveReader } from '../extraction/archive.js';
import { isBackupFilename } from '../extraction/backup-filename.js';
import type { BackupSource } from './backup-source.js';

const log = createLogger({ module: 'azure-source' });

// ============================================================================
// Container Abstraction
// ============================================================================

/**
 * The two container operations the source uses
 */
export interface BlobContainer {
  listBlobNames(prefix: string): AsyncIterable<string>;
  downloadToFile(blobName: string, filePath: string): Promise<void>;
}

/**
 * BlobContainer over an Azure SDK ContainerClient
 */
export function azureBlobContainer(client: ContainerClient): BlobContainer {
  return {
    async *listBlobNames(prefix: string): AsyncIterable<string> {
      for await (const blob of client.listBlobsFlat({ prefix })) {
        yield blob.name;
      }
    },
    async downloadToFile(blobName: string, filePath: string): Promise<void> {
      await client.getBlobClient(blobName).downloadToFile(filePath);
    },
  };
}

export interface AzureCredentials {
  /** Container URL carrying a SAS token */
  readonly sasUrl?: string;
  readonly connectionString?: string;
  readonly containerName?: string;
}

/**
 * Build a ContainerClient from a SAS URL, or a connection string plus container name
 *
 * @throws ConfigurationError if neither is configured
 */
export function createContainerClient(credentials: AzureCredentials): ContainerClient {
  if (credentials.sasUrl) {
    return new ContainerClient(credentials.sasUrl);
  }
  if (credentials.connectionString && credentials.containerName) {
    return BlobServiceClient.fromConnectionString(
      credentials.connectionString
    ).getContainerClient(credentials.containerName);
  }
  throw new ConfigurationError('Azure backup source is not configured', [
    'set AZURE_CONTAINER_SAS_URL',
    'or set AZURE_STORAGE_CONNECTION_STRING and AZURE_CONTAINER_NAME',
  ]);
}

// ============================================================================
// Source
// ============================================================================

export class AzureBackupSource implements BackupSource {
  constructor(
    private readonly container: BlobContainer,
    private readonly cacheDir: string
  ) {}

  async listBackupIdentifiers(): Promise<string[]> {
    const names: string[] = [];
    try {
      for await (const name of this.container.listBlobNames(BACKUP_FILENAME_PREFIX)) {
        if (isBackupFilename(name)) {
          names.push(name);
        }
      }
    } catch (error) {
      throw new BackupSourceError(
        `Cannot list backups: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return names.sort();
  }

  /**
   * Local path of a backup in the cache directory
   */
  getCachePath(filename: string): string {
    return join(this.cacheDir, filename);
  }

  async fetchArchive(filename: string): Promise<ArchiveReader> {
    const cachePath = this.getCachePath(filename);

    if (existsSync(cachePath)) {
      if (await isValidZip(cachePath)) {
        log.debug('Using cached backup', { filename });
        return ZipArchiveReader.open(cachePath);
      }
      log.warn('Cached backup is corrupt, downloading again', { filename });
      await rm(cachePath, { force: true });
    }

    await mkdir(this.cacheDir, { recursive: true });
    const partialPath = `${cachePath}.part`;

    try {
      log.info('Downloading backup', { filename });
      await this.container.downloadToFile(filename, partialPath);
    } catch (error) {
      await rm(partialPath, { force: true });
      throw new BackupSourceError(
        `Download of ${filename} failed: ${error instanceof Error ? error.message : String(error)}`,
        filename
      );
    }

    if (!(await isValidZip(partialPath))) {
      await rm(partialPath, { force: true });
      throw new BackupSourceError(`Downloaded ${filename} is not a valid ZIP archive`, filename);
    }

    await rename(partialPath, cachePath);
    return ZipArchiveReader.open(cachePath);
  }
}
