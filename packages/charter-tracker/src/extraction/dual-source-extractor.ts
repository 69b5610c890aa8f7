/**
 * Dual-Source Charter Extractor
 *
 * A backup lists its charters twice: once in the per-collection manifest
 * descriptors, once as actual ZIP entries. The two listings use different
 * encodings for the same names and do not always agree. This module reads
 * both, reconciles them by normalized path, and reports every normalized
 * path that only one listing knows about.
 *
 * Extraction is pure: it reads the archive and never touches the store.
 *
 * RECONCILIATION ORDER (tested contract):
 *   entry-source paths first, in archive order, then manifest-source paths in
 *   descriptor order. The first raw path seen for a normalized identity is the
 *   representative, so whenever a charter exists as a ZIP entry its
 *   representative raw path is the byte-exact entry name.
 *
 * @module extraction/dual-source-extractor
 */

import type { Discrepancy } from '../core/types.js';
import {
  DEFAULT_BASE_PATH,
  DEFAULT_MANIFEST_FILE_NAME,
  DEFAULT_TRACKED_EXTENSION,
} from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { normalizePath } from '../normalization/path-normalizer.js';
import type { ArchiveReader } from './archive.js';
import { parseManifestDescriptor } from './manifest-parser.js';

const log = createLogger({ module: 'extractor' });

// ============================================================================
// Types
// ============================================================================

export interface ExtractorOptions {
  /** Collection under which charters are tracked */
  readonly basePath?: string;
  /** Extension of tracked records */
  readonly extension?: string;
  /** File name of manifest descriptors */
  readonly manifestFileName?: string;
}

export interface SkippedDescriptor {
  readonly entryName: string;
  readonly error: string;
}

/**
 * Everything extracted from one backup
 */
export interface BackupExtraction {
  /** Raw charter paths declared by manifest descriptors */
  readonly manifestPaths: ReadonlySet<string>;
  /** Raw charter paths present as archive entries */
  readonly entryPaths: ReadonlySet<string>;
  /** Normalized path -> representative raw path, one entry per charter */
  readonly mapping: ReadonlyMap<string, string>;
  readonly discrepancies: readonly Discrepancy[];
  readonly skippedDescriptors: readonly SkippedDescriptor[];
}

// ============================================================================
// Filtering
// ============================================================================

/**
 * Whether a path names a tracked charter under the base collection
 */
export function isTrackedPath(
  path: string,
  basePath: string,
  extension: string = DEFAULT_TRACKED_EXTENSION
): boolean {
  const normPath = normalizePath(path);
  const normBase = normalizePath(basePath);
  return normPath.startsWith(normBase) && normPath.endsWith(extension);
}

// ============================================================================
// Reconciliation
// ============================================================================

/**
 * Map normalized identity to the first raw path seen for it
 */
export function reconcilePaths(rawPaths: Iterable<string>): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const raw of rawPaths) {
    const normalized = normalizePath(raw);
    if (!mapping.has(normalized)) {
      mapping.set(normalized, raw);
    }
  }
  return mapping;
}

/**
 * Normalized paths present in exactly one listing.
 *
 * Manifest-only paths come first, in manifest order, then entry-only paths.
 */
export function findDiscrepancies(
  manifestPaths: Iterable<string>,
  entryPaths: Iterable<string>
): Discrepancy[] {
  const manifestNormalized = new Set<string>();
  for (const raw of manifestPaths) manifestNormalized.add(normalizePath(raw));

  const entryNormalized = new Set<string>();
  for (const raw of entryPaths) entryNormalized.add(normalizePath(raw));

  const discrepancies: Discrepancy[] = [];
  for (const filePath of manifestNormalized) {
    if (!entryNormalized.has(filePath)) {
      discrepancies.push({ filePath, inManifest: true, inEntries: false });
    }
  }
  for (const filePath of entryNormalized) {
    if (!manifestNormalized.has(filePath)) {
      discrepancies.push({ filePath, inManifest: false, inEntries: true });
    }
  }
  return discrepancies;
}

// ============================================================================
// Extractor
// ============================================================================

export class DualSourceExtractor {
  private readonly basePath: string;
  private readonly extension: string;
  private readonly manifestFileName: string;

  constructor(options: ExtractorOptions = {}) {
    this.basePath = options.basePath ?? DEFAULT_BASE_PATH;
    this.extension = options.extension ?? DEFAULT_TRACKED_EXTENSION;
    this.manifestFileName = options.manifestFileName ?? DEFAULT_MANIFEST_FILE_NAME;
  }

  private isManifestEntry(name: string): boolean {
    return name.endsWith(this.manifestFileName);
  }

  /**
   * Charter paths declared by manifest descriptors.
   *
   * Broken descriptors are skipped and reported; they never abort extraction.
   */
  async extractFromManifests(archive: ArchiveReader): Promise<{
    paths: Set<string>;
    skipped: SkippedDescriptor[];
  }> {
    const paths = new Set<string>();
    const skipped: SkippedDescriptor[] = [];

    for (const entryName of archive.listEntries()) {
      if (!this.isManifestEntry(entryName)) {
        continue;
      }

      const content = await archive.readEntry(entryName);
      if (content === null) {
        skipped.push({ entryName, error: 'entry could not be read' });
        continue;
      }

      const result = parseManifestDescriptor(entryName, content.toString('utf8'));
      if (!result.ok) {
        log.warn('Skipping unparseable manifest descriptor', {
          entry: entryName,
          error: result.error,
        });
        skipped.push({ entryName, error: result.error });
        continue;
      }

      const { collectionPath, resourceNames } = result.descriptor;
      for (const resourceName of resourceNames) {
        if (!resourceName.endsWith(this.extension)) {
          continue;
        }
        const fullPath = `${collectionPath}/${resourceName.replace(/^\/+/, '')}`;
        if (isTrackedPath(fullPath, this.basePath, this.extension)) {
          paths.add(fullPath);
        }
      }
    }

    return { paths, skipped };
  }

  /**
   * Charter paths present as archive entries (descriptors excluded)
   */
  extractFromEntries(archive: ArchiveReader): Set<string> {
    const paths = new Set<string>();
    for (const entryName of archive.listEntries()) {
      if (this.isManifestEntry(entryName)) {
        continue;
      }
      if (isTrackedPath(entryName, this.basePath, this.extension)) {
        paths.add(entryName);
      }
    }
    return paths;
  }

  /**
   * Extract, reconcile and compare both listings of one backup
   */
  async extract(archive: ArchiveReader): Promise<BackupExtraction> {
    const { paths: manifestPaths, skipped } = await this.extractFromManifests(archive);
    const entryPaths = this.extractFromEntries(archive);

    const mapping = reconcilePaths([...entryPaths, ...manifestPaths]);
    const discrepancies = findDiscrepancies(manifestPaths, entryPaths);

    log.debug('Extracted backup listings', {
      manifestPaths: manifestPaths.size,
      entryPaths: entryPaths.size,
      charters: mapping.size,
      discrepancies: discrepancies.length,
      skippedDescriptors: skipped.length,
    });

    return {
      manifestPaths,
      entryPaths,
      mapping,
      discrepancies,
      skippedDescriptors: skipped,
    };
  }
}
