import type { Command } from 'commander';
import { showSystemInfo } from '../shell/info-screen.js';
import { fail } from '../ui/output.js';
import { sessionFromFlags } from './shared.js';

export function registerInfo(program: Command): void {
  program
    .command('info')
    .description('Show installed package count, managers and recent log entries')
    .action(async () => {
      try {
        await showSystemInfo(sessionFromFlags({}));
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}
