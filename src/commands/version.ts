import type { Command } from 'commander';
import { APP_NAME } from '../config/branding.js';
import { currentVersion } from '../core/version.js';

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Print version information')
    .option('--short', 'Print version number only')
    .option('--json', 'Print version info as JSON')
    .action((opts: { short?: boolean; json?: boolean }) => {
      const version = currentVersion();

      if (opts.short) {
        console.log(version);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify({ name: APP_NAME, version, node: process.version }, null, 2));
        return;
      }

      console.log(`${APP_NAME} version ${version} (node ${process.version})`);
    });
}
