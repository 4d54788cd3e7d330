import type { Session } from '../auth.js';
import { apiDelete, apiGet, apiPatch } from '../http.js';
import type { ApiResult, Id, JsonObject, QueryParams } from '../../types/api.js';
import { seg, withFilter } from './params.js';

export interface AgreementProduct {
  Id?: number;
  ProductVariant: {
    Product: { ItemLegalName: string; PartNumber: string; [key: string]: unknown };
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

export interface AgreementProductCollection {
  Items: AgreementProduct[];
  ProductFamilies?: Array<{ Key: string; [key: string]: unknown }>;
  Filter?: JsonObject;
  TotalHits?: number;
  [key: string]: unknown;
}

/**
 * Products available to an organization. Filters such as
 * `Include.ProductFamilyNames` narrow the result.
 */
export function getAgreementProducts(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<AgreementProductCollection>> {
  return apiGet<AgreementProductCollection>(
    session,
    '/AgreementProducts',
    withFilter({ OrganizationId: orgId }, filter),
  );
}

export function getSupportedBillingCycles(
  session: Session,
  partNumber: string,
  filter?: QueryParams,
): Promise<ApiResult<unknown>> {
  return apiGet(session, `/AgreementProducts/${seg(partNumber)}/supportedbillingcycles`, filter);
}

export function getAgreements(
  session: Session,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Agreements', filter);
}

export function getAgreementReports(
  session: Session,
  productContainerId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/AgreementReports/${seg(productContainerId)}`);
}

export function getProductContainers(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(
    session,
    '/ProductContainers',
    withFilter({ OrganizationId: orgId }, filter),
  );
}

export function getProductContainer(
  session: Session,
  productContainerId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/ProductContainers/${seg(productContainerId)}`);
}

export function getProductContainerRowIssues(
  session: Session,
  productContainerId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/ProductContainers/rowissues/${seg(productContainerId)}`);
}

/** Returns the organization's shopping cart container, creating it if needed. */
export function getProductContainerShoppingCart(
  session: Session,
  orgId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/ProductContainers/getorcreateshoppingcart', {
    OrganizationId: orgId,
  });
}

export function deleteProductContainer(
  session: Session,
  productContainerId: Id,
): Promise<ApiResult<number>> {
  return apiDelete(session, `/ProductContainers/${seg(productContainerId)}`);
}

export function patchProductContainerRow(
  session: Session,
  containerId: Id,
  rowId: Id,
  body: JsonObject,
): Promise<ApiResult<JsonObject>> {
  return apiPatch<JsonObject>(
    session,
    `/ProductContainers/${seg(containerId)}/row/${seg(rowId)}`,
    body,
  );
}

export function getPrograms(session: Session, filter?: QueryParams): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Programs', filter);
}

export function getProgram(session: Session, programId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/Programs/${seg(programId)}`);
}

export function getPublishers(
  session: Session,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/publishers', filter);
}

export function getPublisher(session: Session, publisherId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/publishers/${seg(publisherId)}`);
}

export function getRegions(session: Session, filter?: QueryParams): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Regions', filter);
}

export function getRegionByCode(
  session: Session,
  regionCode: string,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Regions/bycode', { regionCode });
}

export function deleteResellerSalesPrices(
  session: Session,
  objectId: Id,
  filter?: QueryParams,
): Promise<ApiResult<number>> {
  return apiDelete(session, '/ResellerSalesPrices', withFilter({ objectID: objectId }, filter));
}
