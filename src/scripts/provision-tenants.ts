#!/usr/bin/env node
/**
 * Provisions and licenses customer tenants listed in a CSV.
 *
 * Input CSV columns: tenant_name, domain_prefix, plus any quantity columns the
 * profile names (exo_quantity in the bundled example). Generated admin
 * credentials are appended to the output CSV one row per tenant.
 */
import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import {
  appendCredentials,
  planProvisioning,
  provisionTenants,
  readProvisionProfile,
} from '../lib/provision.js';
import { reportError, sessionFromEnv } from '../lib/cli.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i', default: 'tenants.csv' },
      output: { type: 'string', short: 'o', default: 'admin_creds.csv' },
      profile: { type: 'string', short: 'p', default: 'provision.json' },
    },
  });
  const input = values.input ?? 'tenants.csv';
  const output = values.output ?? 'admin_creds.csv';
  const profilePath = values.profile ?? 'provision.json';

  const session = sessionFromEnv();
  const profile = readProvisionProfile(profilePath);
  const plans = planProvisioning(readFileSync(input, 'utf-8'), profile);
  process.stderr.write(`Provisioning ${plans.length} tenant(s) from ${input}\n`);

  const report = await provisionTenants(session, plans, {
    profile,
    writeCredentials: appendCredentials(output),
  });

  process.stdout.write(`Provisioned ${report.provisioned.length} of ${plans.length} tenant(s)\n`);
  if (report.failure) {
    const f = report.failure;
    if (f.unsavedCredentials) {
      const c = f.unsavedCredentials;
      process.stdout.write(`Unsaved admin login for ${c.tenantName}: ${c.username} ${c.password}\n`);
    }
    reportError(`Row ${f.row} (${f.tenantName}) failed at ${f.step}`, f.error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
