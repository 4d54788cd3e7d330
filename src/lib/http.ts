import { z } from 'zod';
import { connectionError, getAccessToken, readBody, type Session } from './auth.js';
import type { ApiResult, JsonObject, QueryParams } from '../types/api.js';
import type { ClientConfig } from '../types/tokens.js';

type Method = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Joins the base URL, an API path and a query dictionary.
 * Entries whose value is undefined or null are dropped.
 */
export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = `${baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  if (!params) return url;

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    search.append(key, String(value));
  }
  const qs = search.toString();
  return qs ? `${url}?${qs}` : url;
}

function errorMessage(method: Method, status: number): string {
  if (method === 'POST' && status === 500) {
    return '500 Error. Check your schema definition.';
  }
  return `${status} Error`;
}

async function send(
  method: Method,
  url: string,
  headers: Record<string, string>,
  body?: unknown,
): Promise<ApiResult<Response>> {
  try {
    const response = await fetch(url, {
      method,
      headers,
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });
    return { ok: true, data: response };
  } catch (err) {
    return { ok: false, error: connectionError(err) };
  }
}

/**
 * Authenticated request against the Cloud-IQ API.
 * Only a 200 counts as success; every other status becomes an ApiError
 * carrying the decoded body.
 */
async function apiRequest<T>(
  session: Session,
  method: Method,
  path: string,
  options: { params?: QueryParams; body?: unknown } = {},
): Promise<ApiResult<T>> {
  const token = await getAccessToken(session);
  if (!token.ok) return token;

  const headers: Record<string, string> = {
    Authorization: `Bearer ${token.data}`,
    Accept: method === 'DELETE' ? '*/*' : 'application/json',
  };
  if (method !== 'DELETE') {
    headers['Content-Type'] = 'application/json';
  }

  const sent = await send(
    method,
    buildUrl(session.config.baseUrl, path, options.params),
    headers,
    options.body,
  );
  if (!sent.ok) return sent;

  const response = sent.data;
  const read = await readBody(response);
  if (!read.ok) return read;
  const payload = read.data;

  if (response.status !== 200) {
    return {
      ok: false,
      error: {
        status: response.status,
        message: errorMessage(method, response.status),
        body: payload,
      },
    };
  }

  return { ok: true, data: payload as T };
}

export function apiGet<T = unknown>(
  session: Session,
  path: string,
  params?: QueryParams,
): Promise<ApiResult<T>> {
  return apiRequest<T>(session, 'GET', path, { params });
}

export function apiPost<T = unknown>(
  session: Session,
  path: string,
  body: unknown,
): Promise<ApiResult<T>> {
  return apiRequest<T>(session, 'POST', path, { body });
}

export function apiPut<T = unknown>(
  session: Session,
  path: string,
  body: unknown,
): Promise<ApiResult<T>> {
  return apiRequest<T>(session, 'PUT', path, { body });
}

export function apiPatch<T = unknown>(
  session: Session,
  path: string,
  body: unknown,
): Promise<ApiResult<T>> {
  return apiRequest<T>(session, 'PATCH', path, { body });
}

/**
 * DELETE returns the status code rather than the body; most endpoints
 * answer with a bare boolean.
 */
export async function apiDelete(
  session: Session,
  path: string,
  params?: QueryParams,
): Promise<ApiResult<number>> {
  const result = await apiRequest<unknown>(session, 'DELETE', path, { params });
  if (!result.ok) return result;
  return { ok: true, data: 200 };
}

const pingSchema = z.record(z.unknown());

/**
 * Unauthenticated ping; useful to check that the API is reachable
 * before any credentials are involved.
 */
export async function ping(config: ClientConfig): Promise<ApiResult<JsonObject>> {
  const sent = await send('GET', buildUrl(config.baseUrl, '/ping'), { Accept: '*/*' });
  if (!sent.ok) return sent;

  const response = sent.data;
  const read = await readBody(response);
  if (!read.ok) return read;
  const payload = read.data;
  if (response.status !== 200) {
    return {
      ok: false,
      error: { status: response.status, message: `${response.status} Error`, body: payload },
    };
  }
  const parsed = pingSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      error: { status: 200, message: 'Unexpected ping response', body: payload },
    };
  }
  return { ok: true, data: parsed.data };
}
