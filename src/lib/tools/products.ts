import { z } from 'zod';
import type { Session } from '../auth.js';
import { getAgreementProducts, type AgreementProduct } from '../resources/products.js';

export const productsToolDefinition = {
  name: 'ciq_products',
  description:
    'List products an organization can buy, as "ItemLegalName: PartNumber". ' +
    'Optionally narrowed to a product family such as "Office 365".',
  inputSchema: {
    type: 'object' as const,
    properties: {
      org_id: {
        type: 'integer',
        description: 'Organization ID (defaults to CLOUDIQ_ORG_ID / organizationId)',
      },
      family: { type: 'string', description: 'Product family name, e.g. "Azure Active Directory"' },
    },
  },
};

export const productsArgsSchema = z.object({
  org_id: z.number().int().positive().optional(),
  family: z.string().optional(),
});

export type ProductsArgs = z.infer<typeof productsArgsSchema>;

export function formatProductLines(items: AgreementProduct[]): string[] {
  return items.map((item) => {
    const product = item.ProductVariant.Product;
    return `${product.ItemLegalName}: ${product.PartNumber}`;
  });
}

export async function executeProducts(session: Session, args: ProductsArgs): Promise<string> {
  const orgId = args.org_id ?? session.config.organizationId;
  if (orgId === undefined) {
    return 'Error: org_id is required when no default organization is configured.';
  }

  const filter = args.family ? { 'Include.ProductFamilyNames': args.family } : undefined;
  const result = await getAgreementProducts(session, orgId, filter);
  if (!result.ok) {
    return `Error: ${result.error.message}`;
  }

  const items = result.data.Items ?? [];
  if (items.length === 0) {
    return args.family ? `No products found in family "${args.family}".` : 'No products found.';
  }
  return formatProductLines(items).join('\n');
}
