import type { Session } from '../auth.js';
import { apiDelete, apiGet } from '../http.js';
import type { ApiResult, Id, JsonObject, QueryParams } from '../../types/api.js';
import { seg, withFilter } from './params.js';

export function getBillingCycles(
  session: Session,
  includeUnknown = false,
): Promise<ApiResult<unknown>> {
  return apiGet(session, '/BillingCycles', { includeUnknown });
}

export function getProductVariantBillingCycles(
  session: Session,
  productVariantId: Id,
): Promise<ApiResult<unknown>> {
  return apiGet(session, `/BillingCycles/productVariant/${seg(productVariantId)}`);
}

export function getBillingCyclesNameDictionary(session: Session): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/BillingCycles/cspNameDictionary');
}

export function getBillingStatements(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(
    session,
    '/BillingStatements',
    withFilter({ OrganizationId: orgId }, filter),
  );
}

export function getGroupedBillingStatements(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(
    session,
    '/BillingStatements/grouped',
    withFilter({ OrganizationId: orgId }, filter),
  );
}

export function getBillingStatementExcel(
  session: Session,
  statementId: Id,
): Promise<ApiResult<unknown>> {
  return apiGet(session, `/BillingStatements/file/${seg(statementId)}`);
}

export function getBillingStatementCsv(
  session: Session,
  statementId: Id,
): Promise<ApiResult<unknown>> {
  return apiGet(session, `/BillingStatements/${seg(statementId)}/reconciliationfile`);
}

export function getBillingStatementJson(
  session: Session,
  statementId: Id,
): Promise<ApiResult<unknown>> {
  return apiGet(session, `/BillingStatements/${seg(statementId)}/billingrecordsfile`);
}

export function getInvoiceProfiles(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(
    session,
    '/InvoiceProfiles',
    withFilter({ OrganizationId: orgId }, filter),
  );
}

export function getInvoiceProfile(
  session: Session,
  invoiceProfileId: Id,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/InvoiceProfiles/${seg(invoiceProfileId)}`);
}

export function deleteInvoiceProfile(
  session: Session,
  invoiceProfileId: Id,
): Promise<ApiResult<number>> {
  return apiDelete(session, `/InvoiceProfiles/${seg(invoiceProfileId)}`);
}

/** Usage cost for an organization; `filter` carries the time range. */
export function getUsageCost(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/UsageCost/organization/${seg(orgId)}`, filter);
}

export function getGroupings(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Groupings', withFilter({ OrganizationId: orgId }, filter));
}

export function getGrouping(session: Session, groupingId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/Groupings/${seg(groupingId)}`);
}

export function deleteGrouping(session: Session, groupingId: Id): Promise<ApiResult<number>> {
  return apiDelete(session, `/Groupings/${seg(groupingId)}`);
}

export function getConsumers(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Consumers', withFilter({ OrganizationId: orgId }, filter));
}

export function getConsumer(session: Session, consumerId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/Consumers/${seg(consumerId)}`);
}

export function deleteConsumer(session: Session, consumerId: Id): Promise<ApiResult<number>> {
  return apiDelete(session, `/Consumers/${seg(consumerId)}`);
}

export function getCrayonAccounts(
  session: Session,
  orgId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(
    session,
    '/CrayonAccounts',
    withFilter({ OrganizationId: orgId }, filter),
  );
}

export function getCrayonAccount(session: Session, accountId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/CrayonAccounts/${seg(accountId)}`);
}
