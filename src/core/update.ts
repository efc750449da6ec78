import chalk from 'chalk';
import { AUR_HELPER_IDS } from '../config/schema.js';
import type { AurHelperId, UpdateMode } from '../types/config.js';
import type { OperationOutcome } from '../types/operations.js';
import { backupSystemState } from './backup.js';
import { UPDATE_MODE_DESCRIPTIONS, planUpdate } from './managers.js';
import { listOrphans, removeOrphans } from './orphans.js';
import { formatCommand } from './runner.js';
import { noConfirm, type Session } from './session.js';
import { fail, info, ok, warn } from '../ui/output.js';

const TARGET = 'system';

export async function installedHelpers(session: Session): Promise<AurHelperId[]> {
  const found: AurHelperId[] = [];
  for (const helper of AUR_HELPER_IDS) {
    if (await session.runner.which(helper)) found.push(helper);
  }
  return found;
}

/** Upgrades the system; stops at the first failing step, then offers orphan cleanup. */
export async function updateSystem(session: Session, mode: UpdateMode = 'standard'): Promise<OperationOutcome> {
  const backupFile = await backupSystemState(session);
  info(`Updating system (${UPDATE_MODE_DESCRIPTIONS[mode]})...`);

  const helpers = session.manager === 'pacman' ? await installedHelpers(session) : [];
  const plan = planUpdate(session.manager, mode, helpers, noConfirm(session));
  for (const message of plan.warnings) warn(message);

  for (const [i, command] of plan.commands.entries()) {
    if (plan.commands.length > 1) {
      console.log(chalk.cyan(`Step ${i + 1}/${plan.commands.length}: ${formatCommand(command)}`));
    }
    const { success } = await session.runner.run(command, { captureOutput: false });
    if (!success) {
      const display = formatCommand(command);
      fail(`Failed to execute: ${display}`);
      session.logger.error(`Update command failed: ${display}`);
      fail('System update failed!');
      if (backupFile) warn(`System backup available at: ${backupFile}`);
      return { status: 'failed', target: TARGET, backupFile, reason: `Failed to execute: ${display}` };
    }
  }

  ok('System update completed successfully!');
  session.logger.info(`System update completed successfully with mode: ${mode}`);

  await offerOrphanRemoval(session);
  return { status: 'succeeded', target: TARGET, backupFile, warnings: plan.warnings };
}

async function offerOrphanRemoval(session: Session): Promise<void> {
  const orphans = await listOrphans(session);
  if (!orphans || orphans.length === 0) return;

  warn(`Found orphaned packages: ${orphans.length} packages`);
  if (session.settings.get('auto_confirm')) return;

  const remove = await session.prompter.confirm('Remove orphaned packages?', false);
  if (remove) await removeOrphans(session, { confirmed: true });
}
