import type { Command } from 'commander';
import { removeOrphans } from '../core/orphans.js';
import { fail } from '../ui/output.js';
import { exitWith, sessionFromFlags, yesOption, type SessionFlags } from './shared.js';

export function registerOrphans(program: Command): void {
  program
    .command('orphans')
    .description('Remove packages no longer required by anything')
    .addOption(yesOption())
    .action(async (opts: SessionFlags) => {
      try {
        exitWith(await removeOrphans(sessionFromFlags(opts)));
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}
