/**
 * Reset Command
 *
 * Drops and recreates all tables. Asks for confirmation unless --force.
 *
 * Usage:
 *   charter-tracker reset [--force]
 */

import type { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import { EXIT_CODES, runCommand } from '../lib/command.js';
import { withStore } from '../lib/context.js';
import { printOutput, printSuccess } from '../lib/output.js';

interface ResetOptions {
  readonly force?: boolean;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'yes';
  } finally {
    rl.close();
  }
}

export function registerResetCommand(program: Command): void {
  program
    .command('reset')
    .description('Delete all tracking data')
    .option('--force', 'Skip the confirmation prompt')
    .action(async (options: ResetOptions) => {
      await runCommand(async ({ config }) => {
        if (!options.force) {
          const confirmed = await confirm(
            `This deletes all tracking data in ${config.paths.database}. Type "yes" to continue: `
          );
          if (!confirmed) {
            printOutput('Cancelled.');
            return EXIT_CODES.USER_CANCELLED;
          }
        }

        await withStore(config, (store) => store.reset());
        printSuccess('Database reset');
        return EXIT_CODES.SUCCESS;
      });
    });
}
