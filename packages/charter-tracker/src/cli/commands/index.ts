/**
 * CLI Commands Index
 *
 * Central registry of all CLI commands.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSyncCommand } from './sync.js';
import { registerStatsCommand } from './stats.js';
import { registerReportCommand } from './report.js';
import { registerParentReportCommand } from './parent-report.js';
import { registerHistoryCommand } from './history.js';
import { registerDiscrepanciesCommand } from './discrepancies.js';
import { registerExtractMissingCommand } from './extract-missing.js';
import { registerResetCommand } from './reset.js';

export function registerCommands(program: Command): void {
  registerSyncCommand(program);
  registerStatsCommand(program);
  registerReportCommand(program);
  registerParentReportCommand(program);
  registerHistoryCommand(program);
  registerDiscrepanciesCommand(program);
  registerExtractMissingCommand(program);
  registerResetCommand(program);
}
