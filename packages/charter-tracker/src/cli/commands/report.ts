/**
 * Missing Charters Report Command
 *
 * Usage:
 *   charter-tracker report [options]
 *
 * Options:
 *   -l, --limit <n>      Rows shown in table output (default: 50)
 *   --format <fmt>       table|json|ndjson|csv (default: table)
 *   -o, --output <file>  Write the full report to a file (CSV unless --format says otherwise)
 *   --save               Write the full report to the reports directory
 */

import type { Command } from 'commander';
import { join, resolve } from 'node:path';
import type { MissingCharter } from '../../core/types.js';
import { parsePositiveInt, runCommand } from '../lib/command.js';
import { withStore } from '../lib/context.js';
import { resolvePath, type CLIConfig } from '../lib/config.js';
import {
  fileTimestamp,
  formatOutput,
  parseOutputFormat,
  printOutput,
  printSuccess,
  writeOutputFile,
  type OutputFormat,
  type TableColumn,
} from '../lib/output.js';

export interface ReportFileOptions {
  readonly format: OutputFormat;
  readonly limit: number;
  readonly output?: string;
  readonly save?: boolean;
}

export const MISSING_CHARTER_COLUMNS: readonly TableColumn<MissingCharter>[] = [
  { key: 'filePath', header: 'file_path' },
  { key: 'parentPath', header: 'parent_path' },
  { key: 'firstSeenBackup', header: 'first_seen_backup' },
  { key: 'firstSeenDate', header: 'first_seen_date' },
  { key: 'lastSeenBackup', header: 'last_seen_backup' },
  { key: 'lastSeenDate', header: 'last_seen_date' },
];

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Report charters that are currently missing')
    .option('-l, --limit <n>', 'Rows shown in table output', parsePositiveInt, 50)
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', parseOutputFormat, 'table')
    .option('-o, --output <file>', 'Write the full report to a file')
    .option('--save', 'Write the full report to the reports directory')
    .action(async (options: ReportFileOptions) => {
      await runCommand(async ({ config }) => {
        const rows = await withStore(config, (store) =>
          store.getMissingCharters(config.tracking.ignoredParentPaths)
        );
        emitReport(config, rows, MISSING_CHARTER_COLUMNS, options, 'missing_charters');
      });
    });
}

/**
 * Print a report and optionally write it to a file.
 *
 * Files always hold every row; table output on the console is cut at the limit.
 */
export function emitReport<T>(
  config: CLIConfig,
  rows: readonly T[],
  columns: readonly TableColumn<T>[],
  options: ReportFileOptions,
  baseName: string
): void {
  const format: OutputFormat = config.json ? 'json' : options.format;
  const fileFormat: OutputFormat = format === 'table' ? 'csv' : format;

  const targets: string[] = [];
  if (options.output) {
    targets.push(resolve(options.output));
  }
  if (options.save) {
    const extension = fileFormat === 'ndjson' ? 'ndjson' : fileFormat;
    targets.push(
      join(resolvePath(config, config.paths.reports), `${baseName}_${fileTimestamp()}.${extension}`)
    );
  }

  for (const target of targets) {
    writeOutputFile(target, formatOutput(rows, fileFormat, columns));
    if (!config.json) {
      printSuccess(`Wrote ${rows.length} rows to ${target}`);
    }
  }

  if (targets.length > 0 && format !== 'table') {
    return;
  }

  const shown = format === 'table' ? rows.slice(0, options.limit) : rows;
  printOutput(formatOutput(shown, format, columns));
  if (format === 'table' && rows.length > shown.length) {
    printOutput(`\n... and ${rows.length - shown.length} more (use --output or --save for all)`);
  }
}
