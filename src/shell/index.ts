import chalk from 'chalk';
import { DESCRIPTION, DISPLAY_NAME } from '../config/branding.js';
import type { Session } from '../core/session.js';
import { fail, info } from '../ui/output.js';
import { isPromptExit } from '../ui/prompts.js';
import { runActionMenu } from './action-menu.js';
import { chooseManager } from './manager-menu.js';

function printBanner(): void {
  const width = 60;
  const center = (text: string) => {
    const left = Math.floor((width - text.length) / 2);
    return `║${' '.repeat(left)}${text}${' '.repeat(width - text.length - left)}║`;
  };
  console.log(
    chalk.bold.blue(
      [`╔${'═'.repeat(width)}╗`, center(DISPLAY_NAME), center(DESCRIPTION), `╚${'═'.repeat(width)}╝`].join('\n'),
    ),
  );
}

/**
 * Interactive loop: pick a manager, run actions, repeat. Returns the process exit code.
 */
export async function runShell(session: Session): Promise<number> {
  printBanner();
  try {
    for (;;) {
      const manager = await chooseManager(session);
      if (!manager) {
        info('Goodbye!');
        return 0;
      }
      session.manager = manager;
      await runActionMenu(session);
    }
  } catch (err) {
    if (isPromptExit(err)) {
      info('Interrupted by user. Goodbye!');
      return 0;
    }
    const message = err instanceof Error ? err.message : String(err);
    fail(`An unexpected error occurred: ${message}`);
    session.logger.error(`Unexpected error: ${message}`);
    return 1;
  }
}
