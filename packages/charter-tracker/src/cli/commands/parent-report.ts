/**
 * Missing Charters by Parent Path Command
 *
 * Usage:
 *   charter-tracker parent-report [--limit n] [--format fmt] [--output file] [--save]
 */

import type { Command } from 'commander';
import type { MissingByParent } from '../../core/types.js';
import { parsePositiveInt, runCommand } from '../lib/command.js';
import { withStore } from '../lib/context.js';
import { formatters, parseOutputFormat, type TableColumn } from '../lib/output.js';
import { emitReport, type ReportFileOptions } from './report.js';

export const MISSING_BY_PARENT_COLUMNS: readonly TableColumn<MissingByParent>[] = [
  { key: 'parentPath', header: 'parent_path', formatter: formatters.optional },
  { key: 'missingCount', header: 'missing_count', align: 'right' },
  { key: 'earliestFirstSeen', header: 'earliest_first_seen' },
  { key: 'latestFirstSeen', header: 'latest_first_seen' },
  { key: 'earliestDisappearance', header: 'earliest_disappearance', formatter: formatters.optional },
  { key: 'latestDisappearance', header: 'latest_disappearance', formatter: formatters.optional },
];

export function registerParentReportCommand(program: Command): void {
  program
    .command('parent-report')
    .description('Missing charters grouped by parent collection')
    .option('-l, --limit <n>', 'Rows shown in table output', parsePositiveInt, 50)
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', parseOutputFormat, 'table')
    .option('-o, --output <file>', 'Write the full report to a file')
    .option('--save', 'Write the full report to the reports directory')
    .action(async (options: ReportFileOptions) => {
      await runCommand(async ({ config }) => {
        const rows = await withStore(config, (store) =>
          store.getMissingChartersByParent(config.tracking.ignoredParentPaths)
        );
        emitReport(config, rows, MISSING_BY_PARENT_COLUMNS, options, 'missing_by_parent');
      });
    });
}
