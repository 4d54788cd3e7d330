#!/usr/bin/env node
/**
 * Lists agreement products for an organization as `ItemLegalName: PartNumber`,
 * optionally narrowed to one product family, e.g.
 *   cloudiq-products --org 123456 --family "Office 365"
 */
import { parseArgs } from 'node:util';
import { getAgreementProducts } from '../lib/resources/products.js';
import { formatProductLines } from '../lib/tools/products.js';
import { requireOrganizationId, sessionFromEnv, unwrapOrExit } from '../lib/cli.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      org: { type: 'string' },
      family: { type: 'string', short: 'f' },
    },
  });

  const session = sessionFromEnv();
  const orgId = requireOrganizationId(session, values.org);
  const filter = values.family ? { 'Include.ProductFamilyNames': values.family } : undefined;

  const products = unwrapOrExit(
    'Agreement products',
    await getAgreementProducts(session, orgId, filter),
  );
  process.stdout.write(`${formatProductLines(products.Items).join('\n')}\n`);
}

main().catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
