import type { Session } from '../auth.js';
import { apiDelete, apiGet, apiPost } from '../http.js';
import type { CustomerTenantAgreement, CustomerTenantDetailed } from '../schemas.js';
import type { ApiResult, Id, JsonObject, QueryParams } from '../../types/api.js';
import { seg, withFilter } from './params.js';

export interface CustomerTenant {
  Id: number;
  Name: string;
  DomainPrefix?: string;
  Domain?: string;
  ExternalPublisherCustomerId?: string;
  [key: string]: unknown;
}

export interface CustomerTenantCollection {
  Items: CustomerTenant[];
  TotalHits?: number;
  [key: string]: unknown;
}

/** Response to a tenant creation; `User` carries the generated admin login. */
export interface CreatedCustomerTenant {
  Tenant: CustomerTenant;
  User: { UserName: string; Password: string; [key: string]: unknown };
  [key: string]: unknown;
}

export function getCustomerTenants(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<CustomerTenantCollection>> {
  return apiGet<CustomerTenantCollection>(
    session,
    '/CustomerTenants',
    withFilter({ OrganizationId: orgId }, filter),
  );
}

export function getCustomerTenant(
  session: Session,
  tenantId: Id,
): Promise<ApiResult<CustomerTenant>> {
  return apiGet<CustomerTenant>(session, `/CustomerTenants/${seg(tenantId)}`);
}

export function getCustomerTenantDetails(
  session: Session,
  tenantId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/CustomerTenants/${seg(tenantId)}/detailed`);
}

export function getCustomerTenantAzurePlan(
  session: Session,
  tenantId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/CustomerTenants/${seg(tenantId)}/AzurePlan`);
}

export function getCustomerTenantAgreements(
  session: Session,
  tenantId: Id,
  agreementTypeConsent: number,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/CustomerTenants/${seg(tenantId)}/Agreements`, {
    AgreementTypeConsent: agreementTypeConsent,
  });
}

/**
 * Creates a CSP tenant. Fields the caller does not know should be null
 * rather than omitted.
 */
export function createTenant(
  session: Session,
  body: CustomerTenantDetailed,
): Promise<ApiResult<CreatedCustomerTenant>> {
  return apiPost<CreatedCustomerTenant>(session, '/CustomerTenants', body);
}

export function createTenantAgreement(
  session: Session,
  tenantId: Id,
  body: CustomerTenantAgreement,
): Promise<ApiResult<JsonObject>> {
  return apiPost<JsonObject>(session, `/customertenants/${seg(tenantId)}/agreements`, body);
}

export function deleteCustomerTenant(session: Session, tenantId: Id): Promise<ApiResult<number>> {
  return apiDelete(session, `/CustomerTenants/${seg(tenantId)}`);
}
