import type { RemoveMode } from '../types/config.js';
import type { PhaseReport, RemoveOutcome, RemovePhase } from '../types/operations.js';
import { backupSystemState } from './backup.js';
import { cacheCleanCommand, removeCommand } from './managers.js';
import { listOrphans, sweepOrphans } from './orphans.js';
import { getInstalledPackages } from './search.js';
import { noConfirm, type Session } from './session.js';
import { validatePackageName } from './validation.js';
import { fail, info, ok, warn } from '../ui/output.js';

export const REMOVE_MODE_PHASES: Record<RemoveMode, readonly RemovePhase[]> = {
  simple: ['remove'],
  full: ['remove', 'orphan-sweep'],
  purge: ['remove', 'orphan-sweep', 'cache-clean'],
};

export const REMOVE_MODE_DESCRIPTIONS: Record<RemoveMode, string> = {
  simple: 'Remove package only',
  full: 'Remove package and unused dependencies',
  purge: 'Remove package, dependencies, and clean cache',
};

const PHASE_LABELS: Record<RemovePhase, string> = {
  remove: 'package removal',
  'orphan-sweep': 'orphan sweep',
  'cache-clean': 'cache clean',
};

async function runPhase(session: Session, phase: RemovePhase, pkg: string): Promise<boolean> {
  const interactive = { captureOutput: false };
  switch (phase) {
    case 'remove':
      return (await session.runner.run(removeCommand(pkg, noConfirm(session)), interactive)).success;
    case 'orphan-sweep': {
      info('Removing unused dependencies...');
      const orphans = await listOrphans(session);
      if (orphans === null) return false;
      return sweepOrphans(session, orphans);
    }
    case 'cache-clean':
      info('Cleaning package cache...');
      return (await session.runner.run(cacheCleanCommand(noConfirm(session)), interactive)).success;
  }
}

/**
 * Removes an installed package. The mode's phases run in order and the first failure
 * skips the rest; the outcome succeeds whenever the package itself was removed.
 */
export async function removePackage(
  session: Session,
  pkg: string,
  mode: RemoveMode = 'simple',
): Promise<RemoveOutcome> {
  const invalid = validatePackageName(pkg);
  if (invalid) {
    fail(`Invalid package name: ${pkg}`);
    return { status: 'rejected', target: pkg, reason: invalid, phases: [] };
  }

  const installed = await getInstalledPackages(session);
  if (!installed.includes(pkg)) {
    warn(`Package '${pkg}' is not installed.`);
    return { status: 'rejected', target: pkg, reason: 'Package is not installed', phases: [] };
  }

  const backupFile = await backupSystemState(session);
  info(`Removing ${pkg} (${REMOVE_MODE_DESCRIPTIONS[mode]})...`);

  const phases: PhaseReport[] = [];
  let aborted = false;
  for (const phase of REMOVE_MODE_PHASES[mode]) {
    if (aborted) {
      phases.push({ phase, status: 'skipped' });
      continue;
    }
    const success = await runPhase(session, phase, pkg);
    phases.push({ phase, status: success ? 'succeeded' : 'failed' });
    aborted = !success;
  }

  if (phases[0]?.status !== 'succeeded') {
    fail(`Failed to remove package '${pkg}'.`);
    session.logger.error(`Failed to remove package: ${pkg}`);
    if (backupFile) warn(`System backup available at: ${backupFile}`);
    return { status: 'failed', target: pkg, backupFile, reason: 'Remove command failed', phases };
  }

  const warnings = phases
    .filter((report) => report.status === 'failed')
    .map((report) => `${PHASE_LABELS[report.phase]} failed`);
  for (const message of warnings) warn(message);

  ok(`Package '${pkg}' removed successfully!`);
  session.logger.info(`Successfully removed package: ${pkg} (mode: ${mode})`);
  return { status: 'succeeded', target: pkg, backupFile, warnings, phases };
}
