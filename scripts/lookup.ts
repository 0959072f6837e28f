/**
 * Ticker lookup CLI
 * Resolves company queries and prints the results as JSON
 *
 * Usage:
 *   npx tsx scripts/lookup.ts lookup "WhatsApp" [more queries...]
 *   npx tsx scripts/lookup.ts search "alphabet" --limit=5
 */

import './load_env';
import { createTickerResolver } from '../src/index';
import { closeDatabase } from '../src/data/db';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('lookup_cli');

export type LookupCommand =
  | { command: 'lookup'; queries: string[] }
  | { command: 'search'; query: string; limit: number | undefined };

const USAGE = 'Usage: lookup <query...> | search <query> [--limit=N]';

export function parseArgs(argv: string[]): LookupCommand {
  const [command, ...rest] = argv;
  const limitArg = rest.find((arg) => arg.startsWith('--limit='));
  const positional = rest.filter((arg) => !arg.startsWith('--'));

  if (command === 'lookup') {
    if (positional.length === 0) {
      throw new Error(`lookup needs at least one query\n${USAGE}`);
    }
    return { command: 'lookup', queries: positional };
  }

  if (command === 'search') {
    if (positional.length === 0) {
      throw new Error(`search needs a query\n${USAGE}`);
    }
    let limit: number | undefined;
    if (limitArg) {
      limit = Number.parseInt(limitArg.split('=')[1] ?? '', 10);
      if (!Number.isFinite(limit)) {
        throw new Error(`Invalid --limit value: ${limitArg}`);
      }
    }
    return { command: 'search', query: positional.join(' '), limit };
  }

  throw new Error(USAGE);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const resolver = createTickerResolver();

  try {
    const output =
      args.command === 'lookup'
        ? await resolver.lookupMany(args.queries)
        : await resolver.search(args.query, args.limit);
    console.log(JSON.stringify(output, null, 2));
  } finally {
    closeDatabase();
  }
}

if (process.argv[1]?.endsWith('lookup.ts')) {
  main().catch((error) => {
    logger.error({ error }, 'Lookup failed');
    console.error('Lookup failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
