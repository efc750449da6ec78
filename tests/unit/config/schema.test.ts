import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  ConfigValueSchemas,
  PackageNameSchema,
  UpdateModeSchema,
} from '../../../src/config/schema.js';

describe('PackageNameSchema', () => {
  it('accepts names with the allowed punctuation', () => {
    for (const name of ['vim', 'python-pip', 'gtk2+', 'lib32-glibc', 'qt5.15', 'node@20']) {
      expect(PackageNameSchema.safeParse(name).success).toBe(true);
    }
  });

  it('rejects a leading symbol', () => {
    expect(PackageNameSchema.safeParse('-rf').success).toBe(false);
    expect(PackageNameSchema.safeParse('.hidden').success).toBe(false);
  });

  it('rejects shell metacharacters and whitespace', () => {
    for (const name of ['vim;ls', 'a b', 'x$(id)', 'foo|bar', '']) {
      expect(PackageNameSchema.safeParse(name).success).toBe(false);
    }
  });

  it('caps the length at 255', () => {
    expect(PackageNameSchema.safeParse('a'.repeat(255)).success).toBe(true);
    expect(PackageNameSchema.safeParse('a'.repeat(256)).success).toBe(false);
  });
});

describe('ConfigSchema', () => {
  it('fills every missing key with its default', () => {
    expect(ConfigSchema.parse({})).toEqual({
      default_manager: 'pacman',
      auto_confirm: false,
      show_progress: true,
      backup_before_operations: true,
      max_search_results: 10,
      search_cutoff: 0.3,
      colors_enabled: true,
    });
  });

  it('replaces only the invalid keys', () => {
    const config = ConfigSchema.parse({ default_manager: 'apt', auto_confirm: true, search_cutoff: 2 });
    expect(config.default_manager).toBe('pacman');
    expect(config.auto_confirm).toBe(true);
    expect(config.search_cutoff).toBe(0.3);
  });

  it('drops unknown keys', () => {
    expect(ConfigSchema.parse({ theme: 'dark' })).not.toHaveProperty('theme');
  });
});

describe('ConfigValueSchemas', () => {
  it('parses boolean text strictly', () => {
    expect(ConfigValueSchemas.auto_confirm.parse('true')).toBe(true);
    expect(ConfigValueSchemas.auto_confirm.safeParse('yes').success).toBe(false);
  });

  it('coerces numbers within their bounds', () => {
    expect(ConfigValueSchemas.max_search_results.parse('25')).toBe(25);
    expect(ConfigValueSchemas.max_search_results.safeParse('51').success).toBe(false);
    expect(ConfigValueSchemas.search_cutoff.parse('0.5')).toBe(0.5);
  });
});

describe('UpdateModeSchema', () => {
  it('knows the four update modes', () => {
    expect(UpdateModeSchema.options).toEqual(['standard', 'full', 'refresh', 'force']);
  });
});
