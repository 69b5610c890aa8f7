/**
 * Backup Archive Access
 *
 * The extractor only needs the entry list and random access to entry bytes,
 * so it works against this interface instead of a ZIP library directly.
 *
 * ZipArchiveReader reads the central directory once when opened and then
 * inflates single entries on demand from the file descriptor. Full backups
 * run to several gigabytes, so the archive is never loaded as a whole.
 */

import { buffer } from 'node:stream/consumers';
import type { Readable } from 'node:stream';
import yauzl, { type Entry, type Options, type ZipFile } from 'yauzl';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'archive' });

/**
 * Random-access view of one backup archive
 */
export interface ArchiveReader {
  /** Entry names in archive order (directories excluded) */
  listEntries(): readonly string[];

  /** Entry bytes, or null when no entry has exactly this name */
  readEntry(name: string): Promise<Buffer | null>;

  /** Release the underlying file; entries cannot be read afterwards */
  close(): Promise<void>;
}

const OPEN_OPTIONS: Options = { lazyEntries: true, autoClose: false };

function openZip(source: string | Buffer): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    const callback = (error: Error | null, zipfile: ZipFile): void => {
      if (error) {
        reject(error);
      } else {
        resolve(zipfile);
      }
    };
    if (typeof source === 'string') {
      yauzl.open(source, OPEN_OPTIONS, callback);
    } else {
      yauzl.fromBuffer(source, OPEN_OPTIONS, callback);
    }
  });
}

/**
 * File entries of the central directory by name; the first of duplicate names wins
 */
function readCentralDirectory(zipfile: ZipFile): Promise<Map<string, Entry>> {
  return new Promise((resolve, reject) => {
    const entries = new Map<string, Entry>();
    zipfile.on('entry', (entry: Entry) => {
      if (!entry.fileName.endsWith('/') && !entries.has(entry.fileName)) {
        entries.set(entry.fileName, entry);
      }
      zipfile.readEntry();
    });
    zipfile.once('end', () => resolve(entries));
    zipfile.once('error', reject);
    zipfile.readEntry();
  });
}

/**
 * ArchiveReader over a ZIP file or in-memory ZIP buffer
 */
export class ZipArchiveReader implements ArchiveReader {
  private readonly entryNames: readonly string[];

  private constructor(
    private readonly zipfile: ZipFile,
    private readonly entries: ReadonlyMap<string, Entry>
  ) {
    this.entryNames = [...entries.keys()];
  }

  /**
   * Open an archive and read its central directory
   *
   * @throws Error when the source is not a readable ZIP archive
   */
  static async open(source: string | Buffer): Promise<ZipArchiveReader> {
    const zipfile = await openZip(source);
    try {
      return new ZipArchiveReader(zipfile, await readCentralDirectory(zipfile));
    } catch (error) {
      zipfile.close();
      throw error;
    }
  }

  listEntries(): readonly string[] {
    return this.entryNames;
  }

  async readEntry(name: string): Promise<Buffer | null> {
    const entry = this.entries.get(name);
    if (!entry) {
      return null;
    }
    const stream = await new Promise<Readable>((resolve, reject) => {
      this.zipfile.openReadStream(entry, (error, readStream) => {
        if (error) {
          reject(error);
        } else {
          resolve(readStream);
        }
      });
    });
    return buffer(stream);
  }

  async close(): Promise<void> {
    this.zipfile.close();
  }
}

/**
 * Check that a file is a readable ZIP archive.
 *
 * Only the central directory is read, so the check costs the same for any
 * archive size.
 */
export async function isValidZip(source: string | Buffer): Promise<boolean> {
  let reader: ZipArchiveReader;
  try {
    reader = await ZipArchiveReader.open(source);
  } catch (error) {
    log.debug('Not a readable ZIP archive', {
      source: typeof source === 'string' ? source : '<buffer>',
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
  await reader.close();
  return true;
}
