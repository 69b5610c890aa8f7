#!/usr/bin/env tsx
/**
 * Charter Tracker CLI Entry Point
 *
 * Tracks charters across full repository backups: sync new backups, report
 * missing charters, inspect histories and recover lost files.
 *
 * @module charter-tracker-cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type SourceKind } from '../src/cli/lib/config.js';
import { EXIT_CODES, parsePositiveInt } from '../src/cli/lib/command.js';
import { setGlobalContext } from '../src/cli/lib/context.js';
import { registerCommands } from '../src/cli/commands/index.js';
import { ConfigurationError } from '../src/core/errors.js';
import { configureLogging, logger } from '../src/core/utils/logger.js';

// ============================================================================
// CLI Setup
// ============================================================================

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly db?: string;
  readonly source?: SourceKind;
  readonly backupDir?: string;
  readonly batchSize?: number;
}

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return '0.0.0';
}

function parseSource(value: string): SourceKind {
  if (value !== 'local' && value !== 'azure') {
    throw new Error(`Invalid source: ${value}. Must be one of: local, azure`);
  }
  return value;
}

async function initializeContext(options: GlobalOptions): Promise<void> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      database: options.db,
      source: options.source,
      backupDir: options.backupDir,
      batchSize: options.batchSize,
    },
  });

  // Command output goes to stdout; progress logs only with --verbose or LOG_LEVEL
  configureLogging({
    level: config.verbose ? 'debug' : process.env.LOG_LEVEL ? undefined : 'warn',
    json: config.json ? true : undefined,
  });

  setGlobalContext({ config, startTime });
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('charter-tracker')
    .description('Track appearance and disappearance of charters across repository backups')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .charter-trackerrc)')
    .option('--db <path>', 'SQLite database path')
    .option('--source <kind>', 'Backup source: local|azure', parseSource)
    .option('--backup-dir <path>', 'Directory of backup ZIPs (selects the local source)')
    .option('--batch-size <n>', 'Maximum items per batched database statement', parsePositiveInt)
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(
          `Configuration error: ${
            error instanceof ConfigurationError
              ? error.getSummary()
              : error instanceof Error
                ? error.message
                : String(error)
          }`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  loadDotenv();
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
