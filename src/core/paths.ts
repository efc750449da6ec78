import { homedir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_DIR, CONFIG_FILE, LOG_FILE, envVar } from '../config/branding.js';

// ── Directory constants ─────────────────────────────────────────────

const BACKUPS_DIR = 'backups';

export interface Paths {
  configFile: string;
  logFile: string;
  backupDir: string;
}

// ── Path resolution ─────────────────────────────────────────────────

export function getConfigHome(): string {
  return process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
}

export function getCacheHome(): string {
  return process.env.XDG_CACHE_HOME || join(homedir(), '.cache');
}

export function getConfigPath(): string {
  return process.env[envVar('CONFIG')] ?? join(getConfigHome(), CONFIG_DIR, CONFIG_FILE);
}

export function getLogPath(): string {
  return process.env[envVar('LOG')] ?? join(getCacheHome(), LOG_FILE);
}

export function getBackupDir(): string {
  return process.env[envVar('BACKUPS')] ?? join(getCacheHome(), CONFIG_DIR, BACKUPS_DIR);
}

export function resolvePaths(): Paths {
  return {
    configFile: getConfigPath(),
    logFile: getLogPath(),
    backupDir: getBackupDir(),
  };
}
