/**
 * Charter History Command
 *
 * Usage:
 *   charter-tracker history <path>
 *
 * The path may be given raw or normalized; it is normalized before lookup.
 */

import type { Command } from 'commander';
import type { CharterHistoryEntry } from '../../core/types.js';
import { normalizePath } from '../../normalization/path-normalizer.js';
import { EXIT_CODES, runCommand } from '../lib/command.js';
import { withStore } from '../lib/context.js';
import { formatJson, formatTable, printOutput, type TableColumn } from '../lib/output.js';

const HISTORY_COLUMNS: readonly TableColumn<CharterHistoryEntry>[] = [
  { key: 'eventDate', header: 'date' },
  { key: 'eventType', header: 'event' },
  { key: 'backupFilename', header: 'backup' },
];

export function registerHistoryCommand(program: Command): void {
  program
    .command('history <path>')
    .description('Show the appearance and disappearance events of one charter')
    .action(async (path: string) => {
      await runCommand(async ({ config }) => {
        const filePath = normalizePath(path);
        const { charter, history } = await withStore(config, async (store) => ({
          charter: await store.findCharterByPath(filePath),
          history: await store.getCharterHistory(filePath),
        }));

        if (config.json) {
          printOutput(formatJson({ filePath, status: charter?.status ?? null, history }));
          return charter ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
        }

        if (!charter) {
          printOutput(`No charter found for ${filePath}`);
          return EXIT_CODES.WARNINGS;
        }

        printOutput(`${filePath} (${charter.status})\n`);
        printOutput(formatTable(history, HISTORY_COLUMNS));
        return EXIT_CODES.SUCCESS;
      });
    });
}
