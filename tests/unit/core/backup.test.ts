import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { backupFileName, backupSystemState } from '../../../src/core/backup.js';
import { makeSession, respondWith } from '../../helpers/session.js';

describe('backup', () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `pacmate-backup-test-${Date.now()}`);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names files after the local date and time', () => {
    expect(backupFileName(new Date(2025, 0, 5, 7, 8, 9))).toBe('packages_20250105_070809.txt');
  });

  it('does nothing when backups are disabled', async () => {
    const { session, runner } = makeSession({ dir });
    expect(await backupSystemState(session)).toBeNull();
    expect(runner.calls).toEqual([]);
  });

  it('writes the installed package list', async () => {
    const { session } = makeSession({
      dir,
      config: { backup_before_operations: true },
      responder: respondWith({ 'pacman -Qq': { success: true, output: 'base\nlinux\nvim' } }),
    });
    const file = await backupSystemState(session, new Date(2025, 5, 30, 23, 59, 1));
    expect(file).toBe(join(dir, 'backups', 'packages_20250630_235901.txt'));
    expect(readFileSync(join(dir, 'backups', 'packages_20250630_235901.txt'), 'utf-8')).toBe('base\nlinux\nvim');
  });

  it('returns null without writing when the package list is unavailable', async () => {
    const { session } = makeSession({
      dir,
      config: { backup_before_operations: true },
      responder: () => ({ success: false, output: 'pacman: not found' }),
    });
    expect(await backupSystemState(session)).toBeNull();
    expect(existsSync(join(dir, 'backups'))).toBe(false);
  });
});
