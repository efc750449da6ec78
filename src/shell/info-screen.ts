import chalk from 'chalk';
import { collectSystemInfo } from '../core/system-info.js';
import type { Session } from '../core/session.js';
import { heading } from '../ui/output.js';

export async function showSystemInfo(session: Session): Promise<void> {
  const info = await collectSystemInfo(session);

  heading('System Information');
  console.log(`Installed packages: ${info.installedCount}`);

  console.log(chalk.bold('\nAvailable Package Managers:'));
  for (const manager of info.managers) {
    const status = manager.installed ? chalk.green('✓ Installed') : chalk.red('✗ Not installed');
    console.log(`  ${manager.displayName}: ${status}`);
  }

  if (info.recentLog.length > 0) {
    console.log(chalk.bold('\nRecent Operations:'));
    for (const line of info.recentLog) {
      console.log(`  ${line}`);
    }
  }
}
