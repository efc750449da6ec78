import chalk from 'chalk';
import { UPDATE_MODES } from '../config/schema.js';
import { installPackage } from '../core/install.js';
import { MANAGERS, UPDATE_MODE_DESCRIPTIONS } from '../core/managers.js';
import { removeOrphans } from '../core/orphans.js';
import { removePackage } from '../core/remove.js';
import { findSimilar } from '../core/search.js';
import type { Session } from '../core/session.js';
import { updateSystem } from '../core/update.js';
import type { UpdateMode } from '../types/config.js';
import { heading } from '../ui/output.js';
import type { Choice } from '../ui/prompts.js';
import { showSystemInfo } from './info-screen.js';

type Action =
  | 'install'
  | 'remove'
  | 'remove-full'
  | 'purge'
  | 'update'
  | 'search'
  | 'info'
  | 'orphans'
  | 'back';

const ACTIONS: Choice<Action>[] = [
  { name: '1. Install package', value: 'install' },
  { name: '2. Remove package (simple)', value: 'remove' },
  { name: '3. Remove package + unused dependencies', value: 'remove-full' },
  { name: '4. PURGE package + clean cache', value: 'purge' },
  { name: '5. Update system', value: 'update' },
  { name: '6. Search packages', value: 'search' },
  { name: '7. Show system information', value: 'info' },
  { name: '8. Remove orphaned packages', value: 'orphans' },
  { name: '0. Back to manager selection', value: 'back' },
];

const UPDATE_CHOICES: Choice<UpdateMode | 'cancel'>[] = [
  ...UPDATE_MODES.map((mode, i) => ({ name: `${i + 1}. ${UPDATE_MODE_DESCRIPTIONS[mode]}`, value: mode })),
  { name: '0. Cancel', value: 'cancel' },
];

async function askPackage(session: Session, verb: string): Promise<string> {
  return (await session.prompter.input(`Enter package name to ${verb}`)).trim();
}

async function runAction(session: Session, action: Exclude<Action, 'back'>): Promise<void> {
  switch (action) {
    case 'install': {
      const pkg = await askPackage(session, 'install');
      if (pkg) await installPackage(session, pkg);
      return;
    }
    case 'remove':
    case 'remove-full': {
      const pkg = await askPackage(session, 'remove');
      if (pkg) await removePackage(session, pkg, action === 'remove' ? 'simple' : 'full');
      return;
    }
    case 'purge': {
      const pkg = await askPackage(session, 'purge');
      if (!pkg) return;
      console.log(chalk.red('Warning: This will remove the package, dependencies, and clean cache!'));
      const proceed =
        session.settings.get('auto_confirm') || (await session.prompter.confirm('Continue?', false));
      if (proceed) await removePackage(session, pkg, 'purge');
      return;
    }
    case 'update': {
      heading('System Update Options');
      const mode = await session.prompter.select('Choose update mode', UPDATE_CHOICES);
      if (mode !== 'cancel') await updateSystem(session, mode);
      return;
    }
    case 'search': {
      const query = (await session.prompter.input('Enter search query')).trim();
      if (query) await findSimilar(session, query);
      return;
    }
    case 'info':
      await showSystemInfo(session);
      return;
    case 'orphans':
      await removeOrphans(session);
      return;
  }
}

/** Runs actions against the session's manager until the user goes back. */
export async function runActionMenu(session: Session): Promise<void> {
  console.log(chalk.green(`\nUsing ${MANAGERS[session.manager].displayName}`));
  for (;;) {
    heading('Available Actions');
    const action = await session.prompter.select('Choose an action', ACTIONS);
    if (action === 'back') return;
    await runAction(session, action);
  }
}
