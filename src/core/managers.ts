import { AUR_BASE_URL } from '../config/branding.js';
import { AUR_HELPER_IDS } from '../config/schema.js';
import type { AurHelperId, ManagerId, UpdateMode } from '../types/config.js';
import type { Command, ManagerDescriptor } from '../types/packages.js';

// ── Descriptors ─────────────────────────────────────────────────────

export const MANAGERS: Readonly<Record<ManagerId, Readonly<ManagerDescriptor>>> = Object.freeze({
  pacman: Object.freeze({ id: 'pacman', displayName: 'Pacman', requiresElevation: true, supportsAUR: false }),
  yay: Object.freeze({ id: 'yay', displayName: 'Yay', requiresElevation: false, supportsAUR: true }),
  paru: Object.freeze({ id: 'paru', displayName: 'Paru', requiresElevation: false, supportsAUR: true }),
});

export function isAurHelper(id: ManagerId): id is AurHelperId {
  return AUR_HELPER_IDS.some((helper) => helper === id);
}

// ── Command templates ───────────────────────────────────────────────

const NO_CONFIRM = '--noconfirm';

function command(file: string, args: string[], noConfirm = false): Command {
  return { file, args: noConfirm ? [...args, NO_CONFIRM] : args };
}

/** Prefixes sudo when the manager needs root for writes. */
function asManager(manager: ManagerId, args: string[], noConfirm: boolean): Command {
  return MANAGERS[manager].requiresElevation
    ? command('sudo', [manager, ...args], noConfirm)
    : command(manager, args, noConfirm);
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function searchCommand(manager: ManagerId, query: string): Command {
  return command(manager, ['-Ss', query]);
}

export function exactSearchCommand(manager: ManagerId, name: string): Command {
  return command(manager, ['-Ss', `^${escapeRegex(name)}$`]);
}

export function installedListCommand(): Command {
  return command('pacman', ['-Qq']);
}

export function installCommand(manager: ManagerId, pkg: string, noConfirm: boolean): Command {
  return asManager(manager, ['-S', pkg], noConfirm);
}

export function removeCommand(pkg: string, noConfirm: boolean): Command {
  return command('sudo', ['pacman', '-Rns', pkg], noConfirm);
}

export function orphanListCommand(): Command {
  return command('pacman', ['-Qtdq']);
}

export function orphanRemoveCommand(orphans: string[], noConfirm: boolean): Command {
  return command('sudo', ['pacman', '-Rns', ...orphans], noConfirm);
}

export function cacheCleanCommand(noConfirm: boolean): Command {
  return command('sudo', ['pacman', '-Sc'], noConfirm);
}

export function gitBootstrapCommand(): Command {
  return command('sudo', ['pacman', '-Sy', 'git'], true);
}

export function helperCloneCommand(helper: AurHelperId, cwd: string): Command {
  return { ...command('git', ['clone', `${AUR_BASE_URL}/${helper}.git`]), cwd };
}

export function helperBuildCommand(cwd: string, noConfirm: boolean): Command {
  return { ...command('makepkg', ['-si'], noConfirm), cwd };
}

// ── Update plans ────────────────────────────────────────────────────

export interface UpdatePlan {
  commands: Command[];
  warnings: string[];
}

/**
 * Commands for one update run. `installedHelpers` lists the AUR helpers found on PATH,
 * in preference order; it only matters when the active manager is pacman.
 */
export function planUpdate(
  manager: ManagerId,
  mode: UpdateMode,
  installedHelpers: AurHelperId[],
  noConfirm: boolean,
): UpdatePlan {
  const fallbackHelper = AUR_HELPER_IDS.find((h) => installedHelpers.includes(h));
  const warnings: string[] = [];
  let commands: Command[];

  switch (mode) {
    case 'standard':
      commands = [asManager(manager, ['-Syu'], noConfirm)];
      break;
    case 'refresh':
      commands = [asManager(manager, ['-Syyu'], noConfirm)];
      break;
    case 'full':
      if (isAurHelper(manager)) {
        commands = [asManager(manager, ['-Syu'], noConfirm)];
      } else if (fallbackHelper) {
        commands = [asManager(fallbackHelper, ['-Syu'], noConfirm)];
      } else {
        commands = [asManager('pacman', ['-Syu'], noConfirm)];
        warnings.push('No AUR helper available, updating official repos only');
      }
      break;
    case 'force':
      if (isAurHelper(manager)) {
        commands = [asManager(manager, ['-Syyu'], noConfirm)];
      } else {
        commands = [asManager('pacman', ['-Syyu'], noConfirm)];
        if (fallbackHelper) {
          commands.push(asManager(fallbackHelper, ['-Syu'], noConfirm));
        }
      }
      break;
  }

  return { commands, warnings };
}

export const UPDATE_MODE_DESCRIPTIONS: Record<UpdateMode, string> = {
  standard: 'Update official repository packages',
  full: 'Update all packages including AUR',
  refresh: 'Refresh package databases and update',
  force: 'Force refresh databases and update all packages',
};
