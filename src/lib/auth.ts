import { z } from 'zod';
import type { ApiError, ApiResult } from '../types/api.js';
import type { ClientConfig, TokenData } from '../types/tokens.js';

export const TOKEN_SCOPE = 'CustomerApi';

const tokenResponseSchema = z.object({
  AccessToken: z.string().min(1),
  ExpiresIn: z.coerce.number().int().positive(),
  TokenType: z.string().optional(),
  RefreshToken: z.string().nullish(),
  IdToken: z.string().nullish(),
});

/**
 * Holds the single bearer token for a session. The token is only ever
 * replaced as a whole.
 */
export class TokenCache {
  private token: TokenData | null = null;

  get(): TokenData | null {
    return this.token;
  }

  set(token: TokenData): void {
    this.token = { ...token };
  }

  clear(): void {
    this.token = null;
  }
}

export interface Session {
  readonly config: ClientConfig;
  readonly cache: TokenCache;
}

export function createSession(config: ClientConfig, cache: TokenCache = new TokenCache()): Session {
  return { config, cache };
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Returns true if the token expires within `windowSeconds` of `now`.
 */
export function isTokenExpired(
  token: TokenData,
  windowSeconds: number,
  now: number = nowSeconds(),
): boolean {
  return token.expiresAt - now <= windowSeconds;
}

export function connectionError(err: unknown): ApiError {
  return {
    status: 0,
    message: `Connection error: ${err instanceof Error ? err.message : String(err)}`,
  };
}

/**
 * Reads a response body as JSON, falling back to the raw text. A connection
 * dropped mid-body comes back as a status 0 error.
 * @internal Exported for testing only.
 */
export async function readBody(response: Response): Promise<ApiResult<unknown>> {
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    return { ok: false, error: connectionError(err) };
  }
  if (text === '') return { ok: true, data: null };
  try {
    const parsed: unknown = JSON.parse(text);
    return { ok: true, data: parsed };
  } catch {
    return { ok: true, data: text };
  }
}

/**
 * Requests a bearer token with the resource owner password grant.
 * Never throws; failures come back as an error result.
 */
export async function requestToken(config: ClientConfig): Promise<ApiResult<TokenData>> {
  const body = new URLSearchParams({
    grant_type: 'password',
    username: config.username,
    password: config.password,
    scope: TOKEN_SCOPE,
  });
  const basic = Buffer.from(`${config.clientId}:${config.clientSecret}`).toString('base64');

  let response: Response;
  try {
    response = await fetch(`${config.baseUrl}/connect/token`, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: body.toString(),
    });
  } catch (err) {
    return { ok: false, error: connectionError(err) };
  }

  const read = await readBody(response);
  if (!read.ok) return read;
  const payload = read.data;

  if (response.status !== 200) {
    const message =
      response.status === 400
        ? '400 Bad Request. Please check the API credentials you provided.'
        : `Token request failed (${response.status})`;
    return { ok: false, error: { status: response.status, message, body: payload } };
  }

  const parsed = tokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        status: response.status,
        message: `Invalid token response: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`,
        body: payload,
      },
    };
  }

  const data = parsed.data;
  const token: TokenData = {
    accessToken: data.AccessToken,
    expiresAt: nowSeconds() + data.ExpiresIn,
  };
  if (data.TokenType) token.tokenType = data.TokenType;
  if (data.RefreshToken) token.refreshToken = data.RefreshToken;
  if (data.IdToken) token.idToken = data.IdToken;
  return { ok: true, data: token };
}

/**
 * Returns a valid access token for the session.
 * Reuses the cached token unless it is missing or inside the expiry window,
 * in which case a new one is requested and replaces the cache.
 */
export async function getAccessToken(session: Session): Promise<ApiResult<string>> {
  const cached = session.cache.get();
  if (cached && !isTokenExpired(cached, session.config.expiryWindowSeconds)) {
    return { ok: true, data: cached.accessToken };
  }

  const result = await requestToken(session.config);
  if (!result.ok) {
    session.cache.clear();
    return result;
  }

  session.cache.set(result.data);
  return { ok: true, data: result.data.accessToken };
}
