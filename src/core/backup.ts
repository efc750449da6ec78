import { join } from 'node:path';
import { writeTextFile } from '../utils/fs.js';
import { installedListCommand } from './managers.js';
import type { Session } from './session.js';

export function backupFileName(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `packages_${day}_${time}.txt`;
}

/**
 * Writes the installed package list to a timestamped file when backups are on.
 * Returns the file path, or null when disabled or anything went wrong.
 */
export async function backupSystemState(session: Session, now = new Date()): Promise<string | null> {
  if (!session.settings.get('backup_before_operations')) return null;

  const { success, output } = await session.runner.run(installedListCommand());
  if (!success) {
    session.logger.error('Failed to backup system state: could not list installed packages');
    return null;
  }

  const backupFile = join(session.paths.backupDir, backupFileName(now));
  try {
    writeTextFile(backupFile, output);
  } catch (err) {
    session.logger.error(`Failed to backup system state: ${String(err)}`);
    return null;
  }

  session.logger.info(`System state backed up to: ${backupFile}`);
  return backupFile;
}
