import type { Command } from 'commander';
import { installPackage } from '../core/install.js';
import { fail } from '../ui/output.js';
import { exitWith, managerOption, sessionFromFlags, yesOption, type SessionFlags } from './shared.js';

export function registerInstall(program: Command): void {
  program
    .command('install')
    .description('Install a package, suggesting close matches for unknown names')
    .argument('<package>', 'Package name')
    .addOption(managerOption())
    .addOption(yesOption())
    .action(async (pkg: string, opts: SessionFlags) => {
      try {
        exitWith(await installPackage(sessionFromFlags(opts), pkg));
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}
