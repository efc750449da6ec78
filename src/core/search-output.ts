import type { PackageRecord } from '../types/packages.js';

const LEADING_WHITESPACE = /^\s/;

/**
 * Parses `<manager> -Ss` output:
 *
 * ```
 * extra/firefox 120.0.1-1 [installed]
 *     Standalone web browser from mozilla.org
 * ```
 *
 * Lines that do not form a valid header are skipped; any input yields a (possibly empty) list.
 */
export function parseSearchOutput(raw: string): PackageRecord[] {
  const lines = raw.split(/\r?\n/);
  const packages: PackageRecord[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.includes('/') || LEADING_WHITESPACE.test(line)) continue;

    const header = parseHeader(line);
    if (!header) continue;

    const next = i + 1 < lines.length ? lines[i + 1] : '';
    packages.push({
      ...header,
      description: LEADING_WHITESPACE.test(next) ? next.trim() : '',
    });
  }

  return packages;
}

function parseHeader(line: string): Omit<PackageRecord, 'description'> | null {
  const [qualified, version] = line.trim().split(/\s+/);
  if (!qualified) return null;

  const parts = qualified.split('/');
  if (parts.length !== 2) return null;
  const [repository, name] = parts;
  if (!repository || !name) return null;

  return { name, repository, version: version ?? 'unknown' };
}

/** Name → record; a later record with the same name replaces an earlier one. */
export function buildPackageLookup(records: PackageRecord[]): Map<string, PackageRecord> {
  const lookup = new Map<string, PackageRecord>();
  for (const record of records) {
    lookup.set(record.name, record);
  }
  return lookup;
}
