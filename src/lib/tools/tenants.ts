import { z } from 'zod';
import type { Session } from '../auth.js';
import {
  getCustomerTenant,
  getCustomerTenants,
  type CustomerTenant,
} from '../resources/tenants.js';

export const tenantsToolDefinition = {
  name: 'ciq_tenants',
  description:
    'List customer tenants of an organization. ' +
    'With tenant_id: returns that tenant only.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      org_id: {
        type: 'integer',
        description: 'Organization ID (defaults to CLOUDIQ_ORG_ID / organizationId)',
      },
      tenant_id: { type: 'integer', description: 'Customer tenant ID for drill-down' },
      search: { type: 'string', description: 'Search text to filter tenants by name' },
    },
  },
};

export const tenantsArgsSchema = z.object({
  org_id: z.number().int().positive().optional(),
  tenant_id: z.number().int().positive().optional(),
  search: z.string().optional(),
});

export type TenantsArgs = z.infer<typeof tenantsArgsSchema>;

function formatTenant(t: CustomerTenant): string {
  const domain = t.Domain || (t.DomainPrefix ? `${t.DomainPrefix}.onmicrosoft.com` : 'N/A');
  return `${t.Name} (${t.Id}) - ${domain}`;
}

export async function executeTenants(session: Session, args: TenantsArgs): Promise<string> {
  if (args.tenant_id !== undefined) {
    const result = await getCustomerTenant(session, args.tenant_id);
    if (!result.ok) {
      return `Error: ${result.error.message}`;
    }
    return formatTenant(result.data);
  }

  const orgId = args.org_id ?? session.config.organizationId;
  if (orgId === undefined) {
    return 'Error: org_id is required when no default organization is configured.';
  }

  const filter = args.search ? { Search: args.search } : undefined;
  const result = await getCustomerTenants(session, orgId, filter);
  if (!result.ok) {
    return `Error: ${result.error.message}`;
  }

  const items = result.data.Items ?? [];
  if (items.length === 0) {
    return 'No customer tenants found.';
  }
  return items.map(formatTenant).join('\n');
}
