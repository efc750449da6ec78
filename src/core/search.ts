import chalk from 'chalk';
import type { PackageRecord } from '../types/packages.js';
import { exactSearchCommand, installedListCommand, searchCommand } from './managers.js';
import { buildPackageLookup, parseSearchOutput } from './search-output.js';
import { rankCandidates } from './fuzzy.js';
import type { Session } from './session.js';
import { withSpinner } from '../ui/spinner.js';
import { printTable, truncate } from '../ui/table.js';
import { info, ok, warn } from '../ui/output.js';

const CANCEL = '__cancel__';
const DESCRIPTION_WIDTH = 40;

export function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

export async function getInstalledPackages(session: Session): Promise<string[]> {
  const { success, output } = await session.runner.run(installedListCommand());
  return success ? splitLines(output) : [];
}

export async function searchPackages(session: Session, query: string): Promise<PackageRecord[]> {
  const { success, output } = await session.runner.run(searchCommand(session.manager, query));
  if (!success || !output) return [];
  return parseSearchOutput(output);
}

/** True when the repositories carry a package named exactly `name`. */
export async function packageExists(session: Session, name: string): Promise<boolean> {
  return withSpinner(
    `Checking if '${name}' exists`,
    async () => {
      const { success, output } = await session.runner.run(exactSearchCommand(session.manager, name));
      if (!success) return false;
      return parseSearchOutput(output).some((pkg) => pkg.name === name);
    },
    session.settings.get('show_progress'),
  );
}

/**
 * Searches for `query`, ranks the hits by name similarity and lets the user pick one.
 * Auto-confirm takes the best match. Returns null when nothing is chosen.
 */
export async function findSimilar(session: Session, query: string): Promise<string | null> {
  info(`Searching for packages matching '${query}'...`);

  const packages = await searchPackages(session, query);
  if (packages.length === 0) {
    warn('No packages found.');
    return null;
  }

  const ranked = rankCandidates(
    query,
    packages.map((pkg) => pkg.name),
    session.settings.get('max_search_results'),
    session.settings.get('search_cutoff'),
  );
  if (ranked.length === 0) {
    warn('No similar packages found.');
    return null;
  }

  const lookup = buildPackageLookup(packages);
  console.log(chalk.green('\nSimilar packages found:'));
  printTable(
    ['No.', 'Name', 'Repo', 'Version', 'Match', 'Description'],
    ranked.map((candidate, i) => {
      const pkg = lookup.get(candidate.name);
      return [
        String(i + 1),
        candidate.name,
        pkg?.repository ?? 'unknown',
        pkg?.version ?? 'unknown',
        `${Math.round(candidate.score * 100)}%`,
        truncate(pkg?.description ?? '', DESCRIPTION_WIDTH),
      ];
    }),
    ['right', 'left', 'left', 'left', 'right', 'left'],
  );

  let selected: string;
  if (session.settings.get('auto_confirm')) {
    selected = ranked[0].name;
  } else {
    selected = await session.prompter.select('Select a package', [
      ...ranked.map((candidate, i) => ({ name: `${i + 1}. ${candidate.name}`, value: candidate.name })),
      { name: '0. Cancel', value: CANCEL },
    ]);
    if (selected === CANCEL) {
      info('Search cancelled.');
      return null;
    }
  }

  const pkg = lookup.get(selected);
  ok(`Selected: ${selected} (${pkg?.repository ?? 'unknown'})`);
  if (pkg?.description) console.log(`  ${pkg.description}`);
  return selected;
}
