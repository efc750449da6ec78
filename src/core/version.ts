import { readFileSync } from 'node:fs';

// Two levels up from both src/core and dist/core.
const PACKAGE_JSON = new URL('../../package.json', import.meta.url);

export function currentVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Running from an unpacked single file
  }
  return 'dev';
}
