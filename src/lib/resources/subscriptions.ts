import type { Session } from '../auth.js';
import { apiDelete, apiGet, apiPatch, apiPost } from '../http.js';
import type { SubscriptionDetailed } from '../schemas.js';
import type { ApiResult, Id, JsonObject, QueryParams } from '../../types/api.js';
import { seg } from './params.js';

export function createSubscription(
  session: Session,
  body: SubscriptionDetailed,
): Promise<ApiResult<JsonObject>> {
  return apiPost<JsonObject>(session, '/Subscriptions', body);
}

export function deleteSubscriptionTag(
  session: Session,
  subscriptionId: Id,
): Promise<ApiResult<number>> {
  return apiDelete(session, `/Subscriptions/${seg(subscriptionId)}/tags`);
}

export function deleteAssetTag(session: Session, assetId: Id): Promise<ApiResult<number>> {
  return apiDelete(session, `/Assets/${seg(assetId)}/tags`);
}

export function getAzurePlan(session: Session, azurePlanId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/AzurePlans/${seg(azurePlanId)}`);
}

export function getAzureSubscriptions(
  session: Session,
  azurePlanId: Id,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/AzurePlans/${seg(azurePlanId)}/azureSubscriptions`, filter);
}

export function renameAzureSubscription(
  session: Session,
  azurePlanId: Id,
  subscriptionId: Id,
  body: JsonObject,
): Promise<ApiResult<JsonObject>> {
  return apiPatch<JsonObject>(
    session,
    `/AzurePlans/${seg(azurePlanId)}/azureSubscriptions/${seg(subscriptionId)}/rename`,
    body,
  );
}
