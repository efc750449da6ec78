import { createSettingsStore, withOverrides, type SettingsStore } from '../config/settings.js';
import type { Config, ManagerId } from '../types/config.js';
import { createFileLogger, type Logger } from './logger.js';
import { resolvePaths, type Paths } from './paths.js';
import { ProcessRunner, type CommandRunner } from './runner.js';
import { inquirerPrompter, type Prompter } from '../ui/prompts.js';
import { setColorsEnabled } from '../ui/output.js';

/** State threaded through every operation and screen. */
export interface Session {
  manager: ManagerId;
  settings: SettingsStore;
  runner: CommandRunner;
  logger: Logger;
  prompter: Prompter;
  paths: Paths;
}

export interface SessionOptions {
  manager?: ManagerId;
  overrides?: Partial<Config>;
  paths?: Paths;
}

export function createSession(options: SessionOptions = {}): Session {
  const paths = options.paths ?? resolvePaths();
  const logger = createFileLogger(paths.logFile);
  const stored = createSettingsStore(paths.configFile, logger);
  const settings = options.overrides ? withOverrides(stored, options.overrides) : stored;

  setColorsEnabled(settings.get('colors_enabled'));

  return {
    manager: options.manager ?? settings.get('default_manager'),
    settings,
    runner: new ProcessRunner({ logger }),
    logger,
    prompter: inquirerPrompter,
    paths,
  };
}

export function noConfirm(session: Session): boolean {
  return session.settings.get('auto_confirm');
}
