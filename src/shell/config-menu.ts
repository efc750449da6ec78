import chalk from 'chalk';
import { MANAGER_IDS, MAX_SEARCH_RESULTS_LIMIT } from '../config/schema.js';
import { parseConfigValue } from '../config/settings.js';
import type { Session } from '../core/session.js';
import type { ConfigKey, ManagerId } from '../types/config.js';
import { ok, setColorsEnabled } from '../ui/output.js';
import type { Choice } from '../ui/prompts.js';

type ToggleKey = 'auto_confirm' | 'show_progress' | 'backup_before_operations' | 'colors_enabled';

const LABELS: Record<ConfigKey, string> = {
  default_manager: 'Default manager',
  auto_confirm: 'Auto-confirm operations',
  show_progress: 'Show progress indicators',
  backup_before_operations: 'Backup before operations',
  max_search_results: 'Max search results',
  search_cutoff: 'Search cutoff',
  colors_enabled: 'Colors enabled',
};

const MENU_ORDER: ConfigKey[] = [
  'default_manager',
  'auto_confirm',
  'show_progress',
  'backup_before_operations',
  'max_search_results',
  'search_cutoff',
  'colors_enabled',
];

function toggle(session: Session, key: ToggleKey): void {
  const value = !session.settings.get(key);
  session.settings.set(key, value);
  if (key === 'colors_enabled') setColorsEnabled(value);
  ok(`${LABELS[key]}: ${value}`);
}

/** Returns a prompt validator that accepts what `parseConfigValue` accepts for `key`. */
function validatorFor(key: ConfigKey): (value: string) => boolean | string {
  return (value) => {
    const parsed = parseConfigValue(key, value);
    return parsed.ok || parsed.error;
  };
}

async function editNumber(
  session: Session,
  key: 'max_search_results' | 'search_cutoff',
  hint: string,
): Promise<void> {
  const raw = await session.prompter.input(`Enter ${LABELS[key].toLowerCase()} (${hint})`, {
    default: String(session.settings.get(key)),
    validate: validatorFor(key),
  });
  const parsed = parseConfigValue(key, raw);
  if (parsed.ok && typeof parsed.value === 'number') {
    session.settings.set(key, parsed.value);
    ok(`${LABELS[key]} set to ${parsed.value}`);
  }
}

export async function showConfigMenu(session: Session): Promise<void> {
  for (;;) {
    console.log(chalk.bold.magenta('\nConfiguration'));
    const choices: Choice<ConfigKey | 'back'>[] = MENU_ORDER.map((key, i) => ({
      name: `${i + 1}. ${LABELS[key]}: ${session.settings.get(key)}`,
      value: key,
    }));
    choices.push({ name: '0. Back', value: 'back' });

    const choice = await session.prompter.select('Select option to modify', choices);
    switch (choice) {
      case 'back':
        return;
      case 'default_manager': {
        const manager = await session.prompter.select<ManagerId>(
          'Default manager',
          MANAGER_IDS.map((id) => ({ name: id, value: id })),
          session.settings.get('default_manager'),
        );
        session.settings.set('default_manager', manager);
        ok(`Default manager set to ${manager}`);
        break;
      }
      case 'max_search_results':
        await editNumber(session, choice, `1-${MAX_SEARCH_RESULTS_LIMIT}`);
        break;
      case 'search_cutoff':
        await editNumber(session, choice, '0-1');
        break;
      default:
        toggle(session, choice);
    }
  }
}
