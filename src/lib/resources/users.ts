import type { Session } from '../auth.js';
import { apiDelete, apiGet, apiPost, apiPut } from '../http.js';
import type { ApiResult, Id, JsonObject, QueryParams } from '../../types/api.js';
import { seg } from './params.js';

export interface MeResponse {
  UserId?: string;
  UserName?: string;
  Token?: string;
  Claims?: Array<{ Type: string; Value: string }>;
  [key: string]: unknown;
}

/** The user the session's credentials belong to. */
export function me(session: Session): Promise<ApiResult<MeResponse>> {
  return apiGet<MeResponse>(session, '/Me');
}

export function getUsers(session: Session, filter?: QueryParams): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Users', filter);
}

export function getUser(session: Session, userId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/Users/${seg(userId)}`);
}

export function getUserByName(session: Session, username: string): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Users/user', { userName: username });
}

export function deleteUser(session: Session, userId: Id): Promise<ApiResult<number>> {
  return apiDelete(session, `/Users/${seg(userId)}`);
}

export function getClients(session: Session, filter?: QueryParams): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/Clients', filter);
}

export function getClient(session: Session, clientId: Id): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, `/Clients/${seg(clientId)}`);
}

export function createClient(session: Session, body: JsonObject): Promise<ApiResult<JsonObject>> {
  return apiPost<JsonObject>(session, '/Clients', body);
}

export function updateClient(
  session: Session,
  clientId: Id,
  body: JsonObject,
): Promise<ApiResult<JsonObject>> {
  return apiPut<JsonObject>(session, `/Clients/${seg(clientId)}`, body);
}

export function deleteClient(session: Session, clientId: Id): Promise<ApiResult<number>> {
  return apiDelete(session, `/Clients/${seg(clientId)}`);
}

export function createSecret(session: Session, body: JsonObject): Promise<ApiResult<JsonObject>> {
  return apiPost<JsonObject>(session, '/Secrets', body);
}

export function deleteSecret(
  session: Session,
  clientId: Id,
  secretId: Id,
): Promise<ApiResult<number>> {
  return apiDelete(session, '/Secrets', { clientID: clientId, secretID: secretId });
}

export function getManagementLinks(
  session: Session,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/ManagementLinks', filter);
}

export function getGroupedManagementLinks(
  session: Session,
  filter?: QueryParams,
): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/ManagementLinks/grouped', filter);
}

export function getBlogItems(session: Session, filter?: QueryParams): Promise<ApiResult<JsonObject>> {
  return apiGet<JsonObject>(session, '/BlogItems', filter);
}
