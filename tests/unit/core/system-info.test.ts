import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { collectSystemInfo, tailLog } from '../../../src/core/system-info.js';
import { makeSession, respondWith } from '../../helpers/session.js';

describe('system-info', () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `pacmate-info-test-${Date.now()}`);
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('tails the last five non-empty log lines', () => {
    const logFile = join(dir, 'pacmate.log');
    writeFileSync(logFile, ['1', '2', '3', '4', '5', '6', '7', ''].join('\n'));
    expect(tailLog(logFile)).toEqual(['3', '4', '5', '6', '7']);
    expect(tailLog(join(dir, 'missing.log'))).toEqual([]);
  });

  it('collects package count, manager status and recent log lines', async () => {
    writeFileSync(join(dir, 'pacmate.log'), '[2025-01-01 10:00:00] INFO: hello\n');
    const { session } = makeSession({
      dir,
      tools: ['pacman', 'paru'],
      responder: respondWith({ 'pacman -Qq': { success: true, output: 'base\nlinux' } }),
    });

    expect(await collectSystemInfo(session)).toEqual({
      installedCount: 2,
      managers: [
        { id: 'pacman', displayName: 'Pacman', installed: true },
        { id: 'yay', displayName: 'Yay', installed: false },
        { id: 'paru', displayName: 'Paru', installed: true },
      ],
      recentLog: ['[2025-01-01 10:00:00] INFO: hello'],
    });
  });
});
