import { appendFileSync, readFileSync } from 'node:fs';
import { setTimeout as delay } from 'node:timers/promises';
import JSON5 from 'json5';
import { z } from 'zod';
import type { Session } from './auth.js';
import { formatCsvRow, parseCsv } from './csv.js';
import { createSubscription } from './resources/subscriptions.js';
import { createTenant, createTenantAgreement } from './resources/tenants.js';
import {
  buildCustomerTenant,
  buildSubscription,
  buildTenantAgreement,
  CustomerTenantType,
} from './schemas.js';
import type { ApiError } from '../types/api.js';

export const TENANT_COLUMNS = ['tenant_name', 'domain_prefix', 'exo_quantity'] as const;
export const DEFAULT_DELAY_MS = 1000;

const contactSchema = z.object({
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: z.string().email(),
  phoneNumber: z.string().min(1),
});

const subscriptionTemplateSchema = z
  .object({
    name: z.string().min(1),
    partNumber: z.string().min(1),
    billingCycle: z.number().int().positive(),
    termDuration: z.string().regex(/^P\d+[DMY]$/, 'must be an ISO 8601 duration such as P1M'),
    quantity: z.number().int().positive().optional(),
    quantityColumn: z.string().min(1).optional(),
  })
  .refine((s) => (s.quantity === undefined) !== (s.quantityColumn === undefined), {
    message: 'exactly one of quantity or quantityColumn is required',
  });

export const provisionProfileSchema = z.object({
  organization: z.object({ id: z.number().int().positive(), name: z.string().optional() }),
  invoiceProfile: z.object({ id: z.number().int().positive(), name: z.string().optional() }),
  tenantType: z
    .union([z.literal(CustomerTenantType.T1), z.literal(CustomerTenantType.T2)])
    .default(CustomerTenantType.T1),
  contact: contactSchema,
  address: z.object({
    firstName: z.string().min(1),
    lastName: z.string().min(1),
    addressLine1: z.string().min(1),
    city: z.string().min(1),
    countryCode: z.string().length(2),
    region: z.string(),
    postalCode: z.string(),
  }),
  agreementContact: contactSchema.optional(),
  subscriptions: z.array(subscriptionTemplateSchema),
  delayMs: z.number().int().nonnegative().default(DEFAULT_DELAY_MS),
});

export type ProvisionProfile = z.infer<typeof provisionProfileSchema>;
export type SubscriptionTemplate = z.infer<typeof subscriptionTemplateSchema>;

export function readProvisionProfile(filePath: string): ProvisionProfile {
  const parsed: unknown = JSON5.parse(readFileSync(filePath, 'utf-8'));
  const result = provisionProfileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid provisioning profile ${filePath}: ${issues.join('; ')}`);
  }
  return result.data;
}

export interface PlannedSubscription {
  name: string;
  partNumber: string;
  quantity: number;
  billingCycle: number;
  termDuration: string;
}

export interface TenantPlan {
  /** 1-based data row number in the input file. */
  row: number;
  tenantName: string;
  domainPrefix: string;
  subscriptions: PlannedSubscription[];
}

function parseQuantity(value: string | undefined, column: string, row: number): number {
  const trimmed = (value ?? '').trim();
  const n = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(n) || n <= 0) {
    throw new Error(`Row ${row}: ${column} must be a positive integer, got "${value ?? ''}"`);
  }
  return n;
}

/**
 * Validates the tenant CSV against the profile and resolves every
 * subscription quantity before any API call is made.
 */
export function planProvisioning(csvText: string, profile: ProvisionProfile): TenantPlan[] {
  const { header, rows } = parseCsv(csvText);

  const required = new Set<string>(['tenant_name', 'domain_prefix']);
  for (const s of profile.subscriptions) {
    if (s.quantityColumn) required.add(s.quantityColumn);
  }
  const missing = [...required].filter((c) => !header.includes(c));
  if (rows.length > 0 && missing.length > 0) {
    throw new Error(`Tenant CSV is missing columns: ${missing.join(', ')}`);
  }

  return rows.map((values, idx) => {
    const row = idx + 1;
    const tenantName = (values['tenant_name'] ?? '').trim();
    const domainPrefix = (values['domain_prefix'] ?? '').trim();
    if (!tenantName) throw new Error(`Row ${row}: tenant_name is empty`);
    if (!/^[A-Za-z0-9]+$/.test(domainPrefix)) {
      throw new Error(`Row ${row}: domain_prefix must be alphanumeric, got "${domainPrefix}"`);
    }

    const subscriptions = profile.subscriptions.map((s) => ({
      name: s.name,
      partNumber: s.partNumber,
      quantity: s.quantityColumn
        ? parseQuantity(values[s.quantityColumn], s.quantityColumn, row)
        : (s.quantity ?? 1),
      billingCycle: s.billingCycle,
      termDuration: s.termDuration,
    }));

    return { row, tenantName, domainPrefix, subscriptions };
  });
}

const createdTenantSchema = z.object({
  Tenant: z.object({ Id: z.number() }).passthrough(),
  User: z.object({ UserName: z.string(), Password: z.string() }).passthrough(),
});

export interface AdminCredentials {
  tenantName: string;
  domainPrefix: string;
  username: string;
  password: string;
}

export type ProvisionStep = 'tenant' | 'agreement' | 'subscription';

export interface ProvisionFailure {
  row: number;
  tenantName: string;
  step: ProvisionStep;
  error: ApiError;
  /** Set when the tenant exists but its admin login could not be written. */
  unsavedCredentials?: AdminCredentials;
}

export interface ProvisionReport {
  /** Admin logins of every tenant created, in input order. */
  provisioned: AdminCredentials[];
  failure?: ProvisionFailure;
}

export interface ProvisionOptions {
  profile: ProvisionProfile;
  /** Called once per created tenant, before the agreement is signed. */
  writeCredentials: (credentials: AdminCredentials) => void;
  sleep?: (ms: number) => Promise<void>;
  log?: (line: string) => void;
  now?: () => Date;
}

/**
 * Returns a writer that appends one `tenant_name,domain_prefix,username,password`
 * line per tenant to `filePath`. No header; CRLF line endings; a new file is
 * created readable by the owner only.
 */
export function appendCredentials(filePath: string): (credentials: AdminCredentials) => void {
  return (c) => {
    appendFileSync(filePath, formatCsvRow([c.tenantName, c.domainPrefix, c.username, c.password]), {
      mode: 0o600,
    });
  };
}

function defaultLog(line: string): void {
  process.stderr.write(`${line}\n`);
}

/**
 * Provisions tenants one after another: tenant, admin credentials,
 * customer agreement, subscriptions. Pauses between rows to stay under the
 * API rate limit. Stops at the first failure and reports it; rows already
 * done are kept.
 */
export async function provisionTenants(
  session: Session,
  plans: TenantPlan[],
  options: ProvisionOptions,
): Promise<ProvisionReport> {
  const { profile, writeCredentials } = options;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const log = options.log ?? defaultLog;
  const now = options.now ?? (() => new Date());
  const provisioned: AdminCredentials[] = [];

  for (const [i, plan] of plans.entries()) {
    if (i > 0 && profile.delayMs > 0) {
      await sleep(profile.delayMs);
    }

    const fail = (
      step: ProvisionStep,
      error: ApiError,
      unsavedCredentials?: AdminCredentials,
    ): ProvisionReport => {
      log(`[${plan.row}] ${plan.tenantName}: ${step} failed: ${error.message}`);
      const failure: ProvisionFailure = { row: plan.row, tenantName: plan.tenantName, step, error };
      if (unsavedCredentials) failure.unsavedCredentials = unsavedCredentials;
      return { provisioned, failure };
    };

    const tenantBody = buildCustomerTenant({
      tenantName: plan.tenantName,
      domainPrefix: plan.domainPrefix,
      organization: profile.organization,
      invoiceProfile: profile.invoiceProfile,
      contact: profile.contact,
      address: profile.address,
      tenantType: profile.tenantType,
    });
    const created = await createTenant(session, tenantBody);
    if (!created.ok) return fail('tenant', created.error);

    const tenant = createdTenantSchema.safeParse(created.data);
    if (!tenant.success) {
      return fail('tenant', {
        status: 200,
        message: 'Tenant response is missing Tenant.Id or admin credentials',
        body: created.data,
      });
    }

    const credentials: AdminCredentials = {
      tenantName: plan.tenantName,
      domainPrefix: plan.domainPrefix,
      username: tenant.data.User.UserName,
      password: tenant.data.User.Password,
    };
    provisioned.push(credentials);
    const tenantId = tenant.data.Tenant.Id;
    try {
      writeCredentials(credentials);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return fail(
        'tenant',
        {
          status: 200,
          message: `Tenant ${tenantId} was created but its credentials could not be saved: ${reason}`,
        },
        credentials,
      );
    }
    log(`[${plan.row}] ${plan.tenantName}: created tenant ${tenantId} (${credentials.username})`);

    const agreement = buildTenantAgreement(profile.agreementContact ?? profile.contact, now());
    const agreed = await createTenantAgreement(session, tenantId, agreement);
    if (!agreed.ok) return fail('agreement', agreed.error);
    log(`[${plan.row}] ${plan.tenantName}: accepted customer agreement`);

    for (const sub of plan.subscriptions) {
      const result = await createSubscription(session, buildSubscription({ ...sub, tenantId }));
      if (!result.ok) return fail('subscription', result.error);
      log(`[${plan.row}] ${plan.tenantName}: subscribed ${sub.name} x${sub.quantity}`);
    }
  }

  return { provisioned };
}
