/**
 * Stats Command
 *
 * Usage:
 *   charter-tracker stats
 */

import type { Command } from 'commander';
import type { TrackerStats } from '../../core/types.js';
import { runCommand } from '../lib/command.js';
import { withStore } from '../lib/context.js';
import { formatJson, formatters, printOutput } from '../lib/output.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show tracking statistics')
    .action(async () => {
      await runCommand(async ({ config }) => {
        const stats = await withStore(config, (store) =>
          store.getStats(config.tracking.ignoredParentPaths)
        );
        printOutput(config.json ? formatJson(stats) : formatStats(stats));
      });
    });
}

export function formatStats(stats: TrackerStats): string {
  const n = formatters.number;
  return [
    'Charter Tracking Statistics',
    '',
    `Processed backups:    ${n(stats.processedBackups)}`,
    `Total charters:       ${n(stats.totalCharters)}`,
    `Missing charters:     ${n(stats.missingCharters)}`,
    `Disappearance events: ${n(stats.disappearanceEvents)}`,
    `Discrepancies:        ${n(stats.totalDiscrepancies)}`,
  ].join('\n');
}
