import type { Command } from 'commander';
import { runShell } from '../shell/index.js';
import { fail } from '../ui/output.js';
import { managerOption, sessionFromFlags, type SessionFlags } from './shared.js';

export function registerShell(program: Command): void {
  program
    .command('shell', { isDefault: true })
    .description('Start the interactive menu (default)')
    .addOption(managerOption())
    .action(async (opts: SessionFlags) => {
      try {
        process.exitCode = await runShell(sessionFromFlags(opts));
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}
