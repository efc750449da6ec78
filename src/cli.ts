#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DISPLAY_NAME } from './config/branding.js';
import { currentVersion } from './core/version.js';
import {
  registerShell,
  registerSearch,
  registerInstall,
  registerRemove,
  registerUpdate,
  registerOrphans,
  registerInfo,
  registerConfig,
  registerVersion,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(
    `${DISPLAY_NAME} searches, installs, removes and updates Arch Linux packages\n` +
      'through pacman, yay or paru. Run without a command for the interactive menu.',
  )
  .version(currentVersion(), '-V, --version')
  .showHelpAfterError(true);

// Register all commands
registerShell(program);
registerSearch(program);
registerInstall(program);
registerRemove(program);
registerUpdate(program);
registerOrphans(program);
registerInfo(program);
registerConfig(program);
registerVersion(program);

await program.parseAsync();
