import chalk from 'chalk';
import { MANAGER_IDS } from '../config/schema.js';
import { MANAGERS, isAurHelper } from '../core/managers.js';
import { installHelper } from '../core/helper.js';
import type { Session } from '../core/session.js';
import type { ManagerId } from '../types/config.js';
import type { Choice } from '../ui/prompts.js';
import { showConfigMenu } from './config-menu.js';

type ManagerChoice = ManagerId | 'config' | 'exit';

/** Asks for a manager until one is usable; null means exit. */
export async function chooseManager(session: Session): Promise<ManagerId | null> {
  for (;;) {
    const installed = new Map<ManagerId, boolean>();
    for (const id of MANAGER_IDS) {
      installed.set(id, await session.runner.which(id));
    }

    const choices: Choice<ManagerChoice>[] = MANAGER_IDS.map((id, i) => {
      const descriptor = MANAGERS[id];
      const status = installed.get(id) ? chalk.green('✓') : chalk.red('✗');
      const scope = descriptor.supportsAUR ? '(AUR support)' : '(Official repos only)';
      return { name: `${i + 1}. ${status} ${descriptor.displayName} ${scope}`, value: id };
    });
    choices.push(
      { name: `${MANAGER_IDS.length + 1}. Configuration`, value: 'config' },
      { name: '0. Exit', value: 'exit' },
    );

    const choice = await session.prompter.select(
      'Choose your package manager',
      choices,
      session.settings.get('default_manager'),
    );

    if (choice === 'exit') return null;
    if (choice === 'config') {
      await showConfigMenu(session);
      continue;
    }
    if (!installed.get(choice) && isAurHelper(choice)) {
      if (!(await installHelper(session, choice))) continue;
    }
    return choice;
  }
}
