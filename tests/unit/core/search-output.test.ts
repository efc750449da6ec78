import { describe, it, expect } from 'vitest';
import { parseSearchOutput, buildPackageLookup } from '../../../src/core/search-output.js';

describe('search-output', () => {
  describe('parseSearchOutput', () => {
    it('parses headers with and without descriptions', () => {
      const raw = [
        'core/firefox 120.0.1-1',
        '    A web browser',
        'extra/firefox-esr 115.0-1',
      ].join('\n');

      expect(parseSearchOutput(raw)).toEqual([
        { name: 'firefox', repository: 'core', version: '120.0.1-1', description: 'A web browser' },
        { name: 'firefox-esr', repository: 'extra', version: '115.0-1', description: '' },
      ]);
    });

    it('ignores group and installed markers after the version', () => {
      const raw = 'extra/xorg-server 21.1.13-1 (xorg) [installed]\n    Xorg X server';
      expect(parseSearchOutput(raw)).toEqual([
        { name: 'xorg-server', repository: 'extra', version: '21.1.13-1', description: 'Xorg X server' },
      ]);
    });

    it('uses "unknown" when the version token is missing', () => {
      expect(parseSearchOutput('aur/yay-bin')).toEqual([
        { name: 'yay-bin', repository: 'aur', version: 'unknown', description: '' },
      ]);
    });

    it('accepts tab-indented descriptions and CRLF line endings', () => {
      const raw = 'aur/paru 2.0.3-1\r\n\tFeature packed AUR helper\r\n';
      expect(parseSearchOutput(raw)).toEqual([
        { name: 'paru', repository: 'aur', version: '2.0.3-1', description: 'Feature packed AUR helper' },
      ]);
    });

    it('skips headers whose first token does not split into repo/name', () => {
      const raw = [
        'a/b/c 1.0-1',
        '    nested slashes',
        '/missing-repo 1.0-1',
        'missing-name/ 1.0-1',
        'text mentioning a/b pair',
        'core/ok 1.0-1',
        '    kept',
      ].join('\n');

      expect(parseSearchOutput(raw)).toEqual([
        { name: 'ok', repository: 'core', version: '1.0-1', description: 'kept' },
      ]);
    });

    it('never treats an indented line as a header', () => {
      expect(parseSearchOutput('    extra/not-a-header 1.0-1')).toEqual([]);
    });

    it('is total over degenerate input', () => {
      expect(parseSearchOutput('')).toEqual([]);
      expect(parseSearchOutput('\n\n')).toEqual([]);
      expect(parseSearchOutput('    only a description\n    and another')).toEqual([]);
      expect(parseSearchOutput('error: target not found: nothing')).toEqual([]);
    });

    it('takes only the line directly after the header as description', () => {
      const raw = ['core/a 1-1', '', '    too late'].join('\n');
      expect(parseSearchOutput(raw)[0].description).toBe('');
    });

    it('keeps duplicate names in source order', () => {
      const raw = ['core/dup 1-1', 'extra/dup 2-1'].join('\n');
      expect(parseSearchOutput(raw).map((p) => p.repository)).toEqual(['core', 'extra']);
    });
  });

  describe('buildPackageLookup', () => {
    it('lets later records overwrite earlier ones', () => {
      const lookup = buildPackageLookup(parseSearchOutput('core/dup 1-1\nextra/dup 2-1'));
      expect(lookup.size).toBe(1);
      expect(lookup.get('dup')?.version).toBe('2-1');
    });
  });
});
