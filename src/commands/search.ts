import type { Command } from 'commander';
import { rankCandidates } from '../core/fuzzy.js';
import { searchPackages } from '../core/search.js';
import { buildPackageLookup } from '../core/search-output.js';
import { fail } from '../ui/output.js';
import { printTable, truncate } from '../ui/table.js';
import { managerOption, sessionFromFlags, type SessionFlags } from './shared.js';

interface SearchFlags extends SessionFlags {
  json?: boolean;
  fuzzy?: boolean;
}

export function registerSearch(program: Command): void {
  program
    .command('search')
    .description('Search the repositories')
    .argument('<query>', 'Search terms (regular expression)')
    .addOption(managerOption())
    .option('--fuzzy', 'Only show names close to the query, best match first')
    .option('--json', 'Output as JSON')
    .action(async (query: string, opts: SearchFlags) => {
      try {
        const session = sessionFromFlags(opts);
        let packages = await searchPackages(session, query);

        if (opts.fuzzy) {
          const ranked = rankCandidates(
            query,
            packages.map((pkg) => pkg.name),
            session.settings.get('max_search_results'),
            session.settings.get('search_cutoff'),
          );
          const lookup = buildPackageLookup(packages);
          packages = ranked.flatMap((c) => lookup.get(c.name) ?? []);
        }

        if (opts.json) {
          console.log(JSON.stringify(packages, null, 2));
          return;
        }

        if (packages.length === 0) {
          console.log('No packages found.');
          return;
        }

        printTable(
          ['Repo', 'Name', 'Version', 'Description'],
          packages.map((pkg) => [pkg.repository, pkg.name, pkg.version, truncate(pkg.description, 60)]),
        );
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}
