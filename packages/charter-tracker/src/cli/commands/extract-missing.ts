/**
 * Extract Missing Charters Command
 *
 * Copies every missing charter out of the last backup that contained it
 * into a new ZIP archive.
 *
 * Usage:
 *   charter-tracker extract-missing [--output file.zip] [--failures file.csv]
 */

import type { Command } from 'commander';
import { join, resolve } from 'node:path';
import {
  MissingCharterExporter,
  type ExportFailure,
} from '../../services/missing-charter-exporter.js';
import { EXIT_CODES, runCommand } from '../lib/command.js';
import { createBackupSource, withStore } from '../lib/context.js';
import { resolvePath } from '../lib/config.js';
import {
  fileTimestamp,
  formatCsv,
  formatJson,
  printOutput,
  printSuccess,
  printWarning,
  writeOutputFile,
  type TableColumn,
} from '../lib/output.js';

interface ExtractOptions {
  readonly output?: string;
  readonly failures?: string;
}

const FAILURE_COLUMNS: readonly TableColumn<ExportFailure>[] = [
  { key: 'filePath', header: 'file_path' },
  { key: 'lastSeenBackup', header: 'last_seen_backup' },
  { key: 'reason', header: 'reason' },
];

export function registerExtractMissingCommand(program: Command): void {
  program
    .command('extract-missing')
    .description('Recover missing charters from their last backup into a ZIP')
    .option('-o, --output <file>', 'Output ZIP (default: reports directory)')
    .option('--failures <file>', 'CSV listing charters that could not be recovered')
    .action(async (options: ExtractOptions) => {
      await runCommand(async ({ config }) => {
        const stamp = fileTimestamp();
        const reportsDir = resolvePath(config, config.paths.reports);
        const outputPath = options.output
          ? resolve(options.output)
          : join(reportsDir, `missing_charters_${stamp}.zip`);

        const result = await withStore(config, (store) =>
          new MissingCharterExporter(
            store,
            createBackupSource(config),
            config.tracking.ignoredParentPaths
          ).export(outputPath)
        );

        let failuresPath: string | null = null;
        if (result.failures.length > 0) {
          failuresPath = options.failures
            ? resolve(options.failures)
            : join(reportsDir, `extraction_failures_${stamp}.csv`);
          writeOutputFile(failuresPath, formatCsv(result.failures, FAILURE_COLUMNS));
        }

        if (config.json) {
          printOutput(formatJson({ ...result, failuresPath }));
        } else {
          printOutput(`Missing charters: ${result.missing}`);
          if (result.outputPath) {
            printSuccess(`Extracted ${result.extracted} charters to ${result.outputPath}`);
          }
          if (failuresPath) {
            printWarning(`${result.failures.length} charters not recovered, see ${failuresPath}`);
          }
        }

        return result.failures.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
      });
    });
}
