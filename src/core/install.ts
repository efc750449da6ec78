import type { OperationOutcome } from '../types/operations.js';
import { backupSystemState } from './backup.js';
import { installCommand } from './managers.js';
import { findSimilar, getInstalledPackages, packageExists } from './search.js';
import { noConfirm, type Session } from './session.js';
import { validatePackageName } from './validation.js';
import { fail, info, ok, warn } from '../ui/output.js';

/**
 * Installs `query` with the session's manager. A name the repositories do not know
 * goes through fuzzy disambiguation first.
 */
export async function installPackage(session: Session, query: string): Promise<OperationOutcome> {
  const invalid = validatePackageName(query);
  if (invalid) {
    fail(`Invalid package name: ${query}`);
    return { status: 'rejected', target: query, reason: invalid };
  }

  let target = query;
  if (!(await packageExists(session, query))) {
    const picked = await findSimilar(session, query);
    if (!picked) return { status: 'cancelled', target: query };
    const invalidPick = validatePackageName(picked);
    if (invalidPick) {
      fail(`Invalid package name: ${picked}`);
      return { status: 'rejected', target: picked, reason: invalidPick };
    }
    target = picked;
  }

  const installed = await getInstalledPackages(session);
  if (installed.includes(target)) {
    warn(`Package '${target}' is already installed.`);
    if (!session.settings.get('auto_confirm')) {
      const reinstall = await session.prompter.confirm('Reinstall?', false);
      if (!reinstall) return { status: 'cancelled', target };
    }
  }

  const backupFile = await backupSystemState(session);

  info(`Installing ${target} with ${session.manager}...`);
  const { success } = await session.runner.run(
    installCommand(session.manager, target, noConfirm(session)),
    { captureOutput: false },
  );

  if (!success) {
    fail(`Failed to install package '${target}'.`);
    session.logger.error(`Failed to install package: ${target}`);
    if (backupFile) warn(`System backup available at: ${backupFile}`);
    return { status: 'failed', target, backupFile, reason: 'Install command failed' };
  }

  ok(`Package '${target}' installed successfully!`);
  session.logger.info(`Successfully installed package: ${target}`);
  return { status: 'succeeded', target, backupFile, warnings: [] };
}
