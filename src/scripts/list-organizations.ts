#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { getOrganizations } from '../lib/resources/organizations.js';
import { formatOrganizationLines } from '../lib/tools/organizations.js';
import { sessionFromEnv, unwrapOrExit } from '../lib/cli.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      search: { type: 'string', short: 's' },
    },
  });

  const session = sessionFromEnv();
  const filter = values.search ? { Search: values.search } : undefined;
  const orgs = unwrapOrExit('Organizations', await getOrganizations(session, filter));
  process.stdout.write(`${formatOrganizationLines(orgs.Items).join('\n')}\n`);
}

main().catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
