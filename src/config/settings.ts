import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { ConfigSchema, ConfigValueSchemas } from './schema.js';
import type { Config, ConfigKey } from '../types/config.js';
import type { Logger } from '../core/logger.js';
import { warn } from '../ui/output.js';

export const DEFAULT_CONFIG: Readonly<Config> = Object.freeze(ConfigSchema.parse({}));

export interface SettingsStore {
  readonly path: string;
  get<K extends ConfigKey>(key: K): Config[K];
  /** Updates one key and rewrites the whole file. */
  set<K extends ConfigKey>(key: K, value: Config[K]): void;
  all(): Config;
}

export function loadConfig(path: string): Config {
  let raw: unknown = {};
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    // Missing or corrupt file: every key takes its default
    raw = {};
  }
  const parsed = ConfigSchema.safeParse(raw);
  return parsed.success ? parsed.data : { ...DEFAULT_CONFIG };
}

export function saveConfig(path: string, config: Config): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * File-backed settings. A failed write keeps the new value for this process
 * and only warns.
 */
export function createSettingsStore(path: string, logger?: Logger): SettingsStore {
  const config = loadConfig(path);
  return {
    path,
    get: (key) => config[key],
    set: (key, value) => {
      config[key] = value;
      try {
        saveConfig(path, config);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        warn(`Could not save config: ${message}`);
        logger?.error(`Failed to save config to ${path}: ${message}`);
      }
    },
    all: () => ({ ...config }),
  };
}

/** Settings view with some keys pinned for this process only; pinned keys are never written. */
export function withOverrides(store: SettingsStore, overrides: Partial<Config>): SettingsStore {
  const merged = () => ({ ...store.all(), ...overrides });
  return {
    path: store.path,
    get: (key) => merged()[key],
    set: (key, value) => store.set(key, value),
    all: merged,
  };
}

export type ParsedValue =
  | { ok: true; value: Config[ConfigKey] }
  | { ok: false; error: string };

export function parseConfigValue(key: ConfigKey, raw: string): ParsedValue {
  const result = ConfigValueSchemas[key].safeParse(raw.trim());
  if (!result.success) {
    return { ok: false, error: result.error.issues.map((i) => i.message).join('; ') };
  }
  return { ok: true, value: result.data };
}
