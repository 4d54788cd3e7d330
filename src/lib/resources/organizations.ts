import type { Session } from '../auth.js';
import { apiGet } from '../http.js';
import type { ApiResult, Id, JsonObject, QueryParams } from '../../types/api.js';
import { seg, withFilter } from './params.js';

export interface Organization {
  Id: number;
  Name: string;
  AccountNumber?: string;
  ParentId?: number;
  [key: string]: unknown;
}

export interface OrganizationCollection {
  Items: Organization[];
  TotalHits?: number;
  [key: string]: unknown;
}

export function getOrganizations(
  session: Session,
  filter?: QueryParams,
): Promise<ApiResult<OrganizationCollection>> {
  return apiGet<OrganizationCollection>(session, '/Organizations', filter);
}

export function getOrganization(session: Session, orgId: Id): Promise<ApiResult<Organization>> {
  return apiGet<Organization>(session, `/Organizations/${seg(orgId)}`);
}

export function getOrganizationSalesContact(
  session: Session,
  orgId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/Organizations/${seg(orgId)}/salescontact`);
}

/** Whether the current credentials may act on the organization. */
export function getOrganizationHasAccess(session: Session, orgId: Id): Promise<ApiResult<boolean>> {
  return apiGet<boolean>(session, `/Organizations/HasAccess/${seg(orgId)}`);
}

export function getOrganizationAccess(
  session: Session,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/OrganizationAccess', filter);
}

export function getOrganizationAccessGrant(
  session: Session,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/OrganizationAccess/grant', filter);
}

export function getAddresses(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/organizations/${seg(orgId)}/Addresses`, filter);
}

export function getAddress(
  session: Session,
  orgId: Id,
  addressId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(
    session,
    `/organizations/${seg(orgId)}/Addresses/${seg(addressId)}`,
    filter,
  );
}

/** Activity log for an entity, usually an organization. */
export function getActivityLogs(
  session: Session,
  entityId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/ActivityLogs', withFilter({ Id: entityId }, filter));
}
