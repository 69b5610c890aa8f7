/**
 * Missing Charter Exporter
 *
 * Recovers the files of missing charters from the last backup that still
 * contained them. The stored normalized path rarely matches the archive
 * entry byte for byte, so every historically plausible encoding of the path
 * is tried in turn. Recovered files are written to a new ZIP under their
 * normalized path.
 */

import AdmZip from 'adm-zip';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { MissingCharter } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { ArchiveReader } from '../extraction/archive.js';
import { generatePathVariants } from '../normalization/path-variants.js';
import type { CharterStore } from '../persistence/charter-store.js';
import type { BackupSource } from '../sources/backup-source.js';

const log = createLogger({ module: 'exporter' });

// ============================================================================
// Types
// ============================================================================

export interface ExportFailure {
  readonly filePath: string;
  readonly lastSeenBackup: string;
  readonly reason: string;
}

export interface ExportResult {
  readonly missing: number;
  readonly extracted: number;
  readonly failures: readonly ExportFailure[];
  /** Null when nothing was recovered and no archive was written */
  readonly outputPath: string | null;
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * First path variant that names an entry of the archive
 */
export function findEntryName(
  entryNames: ReadonlySet<string>,
  filePath: string,
  filePathRaw: string | null
): string | null {
  const variants = generatePathVariants(filePath, filePathRaw ?? undefined);
  return variants.find((variant) => entryNames.has(variant)) ?? null;
}

/**
 * Missing charters grouped by the backup they were last seen in
 */
function groupByLastSeen(charters: readonly MissingCharter[]): Map<string, MissingCharter[]> {
  const groups = new Map<string, MissingCharter[]>();
  for (const charter of charters) {
    const group = groups.get(charter.lastSeenBackup);
    if (group) {
      group.push(charter);
    } else {
      groups.set(charter.lastSeenBackup, [charter]);
    }
  }
  return groups;
}

// ============================================================================
// Exporter
// ============================================================================

export class MissingCharterExporter {
  constructor(
    private readonly store: CharterStore,
    private readonly source: BackupSource,
    private readonly ignoredParentPaths: readonly string[] = []
  ) {}

  async export(outputPath: string): Promise<ExportResult> {
    const missing = await this.store.getMissingCharters(this.ignoredParentPaths);
    const output = new AdmZip();
    const failures: ExportFailure[] = [];
    let extracted = 0;

    for (const [backup, charters] of groupByLastSeen(missing)) {
      let archive: ArchiveReader;
      try {
        archive = await this.source.fetchArchive(backup);
      } catch (error) {
        const reason = `backup unavailable: ${error instanceof Error ? error.message : String(error)}`;
        log.warn('Cannot open backup for extraction', { backup, charters: charters.length });
        for (const charter of charters) {
          failures.push({ filePath: charter.filePath, lastSeenBackup: backup, reason });
        }
        continue;
      }

      try {
        const entryNames = new Set(archive.listEntries());
        for (const charter of charters) {
          const entryName = findEntryName(entryNames, charter.filePath, charter.filePathRaw);
          const data = entryName === null ? null : await archive.readEntry(entryName);

          if (data === null) {
            failures.push({
              filePath: charter.filePath,
              lastSeenBackup: backup,
              reason: 'no path variant found in backup',
            });
            continue;
          }

          output.addFile(charter.filePath, data);
          extracted++;
        }
      } finally {
        await archive.close();
      }
    }

    let writtenPath: string | null = null;
    if (extracted > 0) {
      mkdirSync(dirname(outputPath), { recursive: true });
      output.writeZip(outputPath);
      writtenPath = outputPath;
    }

    log.info('Extracted missing charters', {
      missing: missing.length,
      extracted,
      failed: failures.length,
    });

    return { missing: missing.length, extracted, failures, outputPath: writtenPath };
  }
}
