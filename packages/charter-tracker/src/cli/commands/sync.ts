/**
 * Sync Command
 *
 * Applies every new backup of the configured source to the database.
 *
 * Usage:
 *   charter-tracker sync [options]
 *
 * Options:
 *   --frequency <n>   Process every Nth backup (the latest is always processed)
 *
 * Ctrl-C stops the sync after the backup in progress.
 */

import type { Command } from 'commander';
import type { BackupProcessingStats } from '../../core/types.js';
import { SyncService, type SyncSummary } from '../../services/sync-service.js';
import { EXIT_CODES, parsePositiveInt, runCommand, type ExitCode } from '../lib/command.js';
import { createBackupSource, createTracker, withStore } from '../lib/context.js';
import type { CLIConfig } from '../lib/config.js';
import { formatJson, printOutput, printWarning } from '../lib/output.js';

interface SyncOptions {
  readonly frequency?: number;
}

/**
 * Register the sync command
 */
export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Process new backups and record charter changes')
    .option('-f, --frequency <n>', 'Process every Nth backup', parsePositiveInt)
    .action(async (options: SyncOptions) => {
      await runCommand(({ config }) => executeSync(config, options));
    });
}

/**
 * One line per applied backup
 */
export function formatBackupLine(stats: BackupProcessingStats): string {
  return (
    `${stats.filename}: ${stats.charterCount} charters, ` +
    `+${stats.appeared} new, ${stats.reappeared} reappeared, ` +
    `-${stats.disappeared} disappeared, ${stats.discrepancies} discrepancies ` +
    `(${stats.durationSeconds.toFixed(1)}s)`
  );
}

/**
 * Closing summary of a sync run
 */
export function formatSyncSummary(summary: SyncSummary): string {
  const lines = [
    '',
    `Backups available: ${summary.available}`,
    `Selected:          ${summary.selected}`,
    `Already processed: ${summary.alreadyProcessed}`,
    `Processed now:     ${summary.processed.length}`,
    `Failed:            ${summary.failures.length}`,
  ];

  if (summary.aborted) {
    lines.push('', 'Sync was interrupted; remaining backups are processed on the next run.');
  }
  if (summary.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of summary.failures) {
      lines.push(`  ${failure.filename}: ${failure.error}`);
    }
  }
  return lines.join('\n');
}

async function executeSync(config: CLIConfig, options: SyncOptions): Promise<ExitCode> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    printWarning('Interrupt received, stopping after the current backup');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let summary: SyncSummary;
  try {
    summary = await withStore(config, (store) => {
      const service = new SyncService(
        createBackupSource(config),
        store,
        createTracker(config, store)
      );
      return service.sync({
        frequency: options.frequency ?? config.tracking.backupFrequency,
        signal: controller.signal,
        onProcessed: config.json ? undefined : (stats) => printOutput(formatBackupLine(stats)),
      });
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  printOutput(config.json ? formatJson(summary) : formatSyncSummary(summary));

  if (summary.aborted) {
    return EXIT_CODES.USER_CANCELLED;
  }
  return summary.failures.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}
