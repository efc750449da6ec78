import { Option, type Command } from 'commander';
import { UPDATE_MODES, UpdateModeSchema } from '../config/schema.js';
import { UPDATE_MODE_DESCRIPTIONS } from '../core/managers.js';
import { updateSystem } from '../core/update.js';
import { fail } from '../ui/output.js';
import { exitWith, managerOption, sessionFromFlags, yesOption, type SessionFlags } from './shared.js';

interface UpdateFlags extends SessionFlags {
  mode: string;
}

export function registerUpdate(program: Command): void {
  program
    .command('update')
    .alias('upgrade')
    .description('Update installed packages')
    .addOption(
      new Option('--mode <mode>', UPDATE_MODES.map((m) => `${m}: ${UPDATE_MODE_DESCRIPTIONS[m]}`).join('; '))
        .choices(UPDATE_MODES)
        .default('standard'),
    )
    .addOption(managerOption())
    .addOption(yesOption())
    .action(async (opts: UpdateFlags) => {
      try {
        const session = sessionFromFlags(opts);
        exitWith(await updateSystem(session, UpdateModeSchema.parse(opts.mode)));
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}
