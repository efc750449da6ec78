import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { APP_NAME } from '../config/branding.js';
import type { AurHelperId } from '../types/config.js';
import { gitBootstrapCommand, helperBuildCommand, helperCloneCommand } from './managers.js';
import { noConfirm, type Session } from './session.js';
import { withSpinner } from '../ui/spinner.js';
import { fail, info, ok, warn } from '../ui/output.js';

/** Clones the helper from the AUR and builds it with makepkg in a scratch directory. */
export async function installHelper(session: Session, helper: AurHelperId): Promise<boolean> {
  warn(`${helper} not found.`);

  if (!session.settings.get('auto_confirm')) {
    const proceed = await session.prompter.confirm(`Do you want to install ${helper}?`, true);
    if (!proceed) {
      info('Installation cancelled.');
      return false;
    }
  }

  if (!(await session.runner.which('git'))) {
    info('Installing git dependency...');
    const { success } = await session.runner.run(gitBootstrapCommand(), { captureOutput: false });
    if (!success) {
      fail('Failed to install git. Cannot proceed.');
      return false;
    }
  }

  const workDir = mkdtempSync(join(tmpdir(), `${APP_NAME}-`));
  try {
    const cloned = await withSpinner(
      `Cloning ${helper} repository`,
      () => session.runner.run(helperCloneCommand(helper, workDir)),
      session.settings.get('show_progress'),
      (result) => result.success,
    );
    if (!cloned.success) {
      fail(`Failed to clone ${helper} repository.`);
      return false;
    }

    info(`Building and installing ${helper}...`);
    const built = await session.runner.run(
      helperBuildCommand(join(workDir, helper), noConfirm(session)),
      { captureOutput: false },
    );
    if (!built.success) {
      fail(`Failed to build/install ${helper}.`);
      session.logger.error(`Failed to install AUR helper: ${helper}`);
      return false;
    }

    ok(`${helper} installed successfully!`);
    session.logger.info(`Installed AUR helper: ${helper}`);
    return true;
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}
