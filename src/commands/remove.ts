import { Option, type Command } from 'commander';
import { REMOVE_MODES, RemoveModeSchema } from '../config/schema.js';
import { REMOVE_MODE_DESCRIPTIONS, removePackage } from '../core/remove.js';
import { fail } from '../ui/output.js';
import { exitWith, sessionFromFlags, yesOption, type SessionFlags } from './shared.js';

interface RemoveFlags extends SessionFlags {
  mode: string;
}

export function registerRemove(program: Command): void {
  program
    .command('remove')
    .alias('uninstall')
    .description('Remove an installed package')
    .argument('<package>', 'Package name')
    .addOption(
      new Option('--mode <mode>', REMOVE_MODES.map((m) => `${m}: ${REMOVE_MODE_DESCRIPTIONS[m]}`).join('; '))
        .choices(REMOVE_MODES)
        .default('simple'),
    )
    .addOption(yesOption())
    .action(async (pkg: string, opts: RemoveFlags) => {
      try {
        const session = sessionFromFlags(opts);
        exitWith(await removePackage(session, pkg, RemoveModeSchema.parse(opts.mode)));
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}
