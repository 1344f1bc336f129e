import { Command } from 'commander';
import { resetDatabase } from '../../storage/database.js';
import { config } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';
import * as readline from 'readline';

async function confirmReset(): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question('Type "RESET" to confirm: ', (answer) => {
      rl.close();
      resolve(answer === 'RESET');
    });
  });
}

export const resetCommand = new Command('reset')
  .description('Delete all stored students, courses, tasks and sessions (DESTRUCTIVE)')
  .option('--force', 'Skip confirmation prompt')
  .action(async (options: { force?: boolean }) => {
    console.log('\n========================================');
    console.log('         WARNING: DESTRUCTIVE ACTION');
    console.log('========================================\n');
    console.log(`This command deletes ${config.paths.database}.\n`);
    console.log('Consequences:');
    console.log('  - Every registered account is removed');
    console.log('  - All courses, tasks and recorded study sessions are lost');
    console.log('  - Running timers are discarded\n');

    if (!options.force) {
      const confirmed = await confirmReset();
      if (!confirmed) {
        console.log('\nReset cancelled.');
        return;
      }
    }

    try {
      resetDatabase();
      console.log('\nAll tracking data has been deleted.');
    } catch (error) {
      logger.error(`Reset failed: ${error}`);
      console.error(`\nReset failed: ${error}`);
      process.exit(1);
    }
  });
