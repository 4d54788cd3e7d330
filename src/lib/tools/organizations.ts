import { z } from 'zod';
import type { Session } from '../auth.js';
import {
  getOrganization,
  getOrganizations,
  type Organization,
} from '../resources/organizations.js';

export const organizationsToolDefinition = {
  name: 'ciq_organizations',
  description:
    'List Cloud-IQ organizations visible to the configured API user. ' +
    'With org_id: returns that single organization.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      search: { type: 'string', description: 'Search text to filter organizations by name' },
      org_id: { type: 'integer', description: 'Organization ID for a single-organization lookup' },
    },
  },
};

export const organizationsArgsSchema = z.object({
  search: z.string().optional(),
  org_id: z.number().int().positive().optional(),
});

export type OrganizationsArgs = z.infer<typeof organizationsArgsSchema>;

/**
 * One line per organization: `Name (Id)`, with the account number when known.
 */
export function formatOrganizationLines(orgs: Organization[]): string[] {
  return orgs.map((o) => {
    const account = o.AccountNumber ? ` [${o.AccountNumber}]` : '';
    return `${o.Name} (${o.Id})${account}`;
  });
}

export async function executeOrganizations(
  session: Session,
  args: OrganizationsArgs,
): Promise<string> {
  if (args.org_id !== undefined) {
    const result = await getOrganization(session, args.org_id);
    if (!result.ok) {
      return `Error: ${result.error.message}`;
    }
    return formatOrganizationLines([result.data]).join('\n');
  }

  const filter = args.search ? { Search: args.search } : undefined;
  const result = await getOrganizations(session, filter);
  if (!result.ok) {
    return `Error: ${result.error.message}`;
  }

  const items = result.data.Items ?? [];
  if (items.length === 0) {
    return 'No organizations found.';
  }
  return formatOrganizationLines(items).join('\n');
}
