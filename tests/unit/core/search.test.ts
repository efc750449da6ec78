import { describe, it, expect, beforeEach, vi } from 'vitest';
import { findSimilar, getInstalledPackages, packageExists } from '../../../src/core/index.js';
import { makeSession, respondWith } from '../../helpers/session.js';

describe('search', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('lists installed packages and treats a failed query as none', async () => {
    const listed = makeSession({
      responder: respondWith({ 'pacman -Qq': { success: true, output: 'base\n\nvim\n' } }),
    });
    expect(await getInstalledPackages(listed.session)).toEqual(['base', 'vim']);

    const broken = makeSession({ responder: () => ({ success: false, output: 'base' }) });
    expect(await getInstalledPackages(broken.session)).toEqual([]);
  });

  it('escapes regex characters in the exact-name query', async () => {
    const { session, runner } = makeSession({
      responder: respondWith({ 'pacman -Ss ^g\\+\\+$': { success: true, output: 'core/gcc 14.1-1\n    GNU compiler' } }),
    });
    expect(await packageExists(session, 'g++')).toBe(false);
    expect(runner.commands()).toEqual(['pacman -Ss ^g\\+\\+$']);
  });

  it('requires an exact name among the search hits', async () => {
    const { session } = makeSession({
      manager: 'paru',
      responder: respondWith({
        'paru -Ss ^htop$': { success: true, output: 'extra/htop 3.3.0-1\n    Interactive process viewer' },
      }),
    });
    expect(await packageExists(session, 'htop')).toBe(true);
  });

  it('returns null when every hit falls below the cutoff', async () => {
    const { session, prompter } = makeSession({
      responder: respondWith({ 'pacman -Ss vim': { success: true, output: 'core/bash 5.2-1\n    Shell' } }),
    });
    expect(await findSimilar(session, 'vim')).toBeNull();
    expect(prompter.messages).toEqual([]);
  });
});
