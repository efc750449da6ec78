import chalk from 'chalk';
import type { OperationOutcome } from '../types/operations.js';
import { backupSystemState } from './backup.js';
import { orphanListCommand, orphanRemoveCommand } from './managers.js';
import { splitLines } from './search.js';
import { noConfirm, type Session } from './session.js';
import { fail, info, ok, warn } from '../ui/output.js';

const PREVIEW_LIMIT = 10;
const TARGET = 'orphaned packages';

/** Orphan names, or null when pacman could not be queried. */
export async function listOrphans(session: Session): Promise<string[] | null> {
  const { success, output } = await session.runner.run(orphanListCommand());
  // pacman -Qtdq exits 1 when there is nothing to list
  if (!success) return output.trim() === '' ? [] : null;
  return splitLines(output);
}

/** Removes the given orphans in one pacman call; no prompt. */
export async function sweepOrphans(session: Session, orphans: string[]): Promise<boolean> {
  if (orphans.length === 0) return true;
  const { success } = await session.runner.run(
    orphanRemoveCommand(orphans, noConfirm(session)),
    { captureOutput: false },
  );
  return success;
}

export interface RemoveOrphansOptions {
  /** The user already agreed to the removal. */
  confirmed?: boolean;
}

export async function removeOrphans(
  session: Session,
  options: RemoveOrphansOptions = {},
): Promise<OperationOutcome> {
  info('Checking for orphaned packages...');

  const orphans = await listOrphans(session);
  if (orphans === null) {
    fail('Failed to check for orphaned packages.');
    return { status: 'failed', target: TARGET, backupFile: null, reason: 'Could not list orphans' };
  }
  if (orphans.length === 0) {
    ok('No orphaned packages found.');
    return { status: 'succeeded', target: TARGET, backupFile: null, warnings: [] };
  }

  console.log(chalk.yellow(`Found ${orphans.length} orphaned packages:`));
  for (const name of orphans.slice(0, PREVIEW_LIMIT)) {
    console.log(`  • ${name}`);
  }
  if (orphans.length > PREVIEW_LIMIT) {
    console.log(`  ... and ${orphans.length - PREVIEW_LIMIT} more`);
  }

  if (!options.confirmed && !session.settings.get('auto_confirm')) {
    const confirmed = await session.prompter.confirm('Remove these orphaned packages?', false);
    if (!confirmed) {
      info('Orphaned package removal cancelled.');
      return { status: 'cancelled', target: TARGET };
    }
  }

  const backupFile = await backupSystemState(session);

  if (!(await sweepOrphans(session, orphans))) {
    fail('Failed to remove orphaned packages.');
    session.logger.error('Failed to remove orphaned packages');
    if (backupFile) warn(`System backup available at: ${backupFile}`);
    return { status: 'failed', target: TARGET, backupFile, reason: 'Removal command failed' };
  }

  ok('Orphaned packages removed successfully!');
  session.logger.info(`Removed ${orphans.length} orphaned packages`);
  return { status: 'succeeded', target: TARGET, backupFile, warnings: [] };
}
