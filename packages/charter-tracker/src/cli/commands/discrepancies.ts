/**
 * Discrepancies Command
 *
 * Lists paths found in only one of the two listings of a backup.
 *
 * Usage:
 *   charter-tracker discrepancies [backup] [--limit n] [--format fmt] [--output file] [--save]
 */

import type { Command } from 'commander';
import type { StoredDiscrepancy } from '../../core/types.js';
import { parsePositiveInt, runCommand } from '../lib/command.js';
import { withStore } from '../lib/context.js';
import { formatters, parseOutputFormat, type TableColumn } from '../lib/output.js';
import { emitReport, type ReportFileOptions } from './report.js';

const DISCREPANCY_COLUMNS: readonly TableColumn<StoredDiscrepancy>[] = [
  { key: 'backupFilename', header: 'backup' },
  { key: 'filePath', header: 'file_path' },
  { key: 'inManifest', header: 'in_contents_xml', formatter: formatters.yesNo },
  { key: 'inEntries', header: 'in_zip_entries', formatter: formatters.yesNo },
];

export function registerDiscrepanciesCommand(program: Command): void {
  program
    .command('discrepancies [backup]')
    .description('List manifest/entry discrepancies of one backup or of all backups')
    .option('-l, --limit <n>', 'Rows shown in table output', parsePositiveInt, 50)
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', parseOutputFormat, 'table')
    .option('-o, --output <file>', 'Write the full list to a file')
    .option('--save', 'Write the full list to the reports directory')
    .action(async (backup: string | undefined, options: ReportFileOptions) => {
      await runCommand(async ({ config }) => {
        const rows = await withStore(config, (store) => store.getDiscrepancies(backup));
        emitReport(config, rows, DISCREPANCY_COLUMNS, options, 'discrepancies');
      });
    });
}
