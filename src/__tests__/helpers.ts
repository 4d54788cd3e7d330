import { jest } from '@jest/globals';
import { ReadableStream } from 'node:stream/web';
import { createSession, nowSeconds, TokenCache, type Session } from '../lib/auth.js';
import type { ClientConfig } from '../types/tokens.js';

export const BASE = 'https://api.test/api/v1';

export const TEST_CONFIG: ClientConfig = {
  clientId: 'test-client-id',
  clientSecret: 'test-client-secret',
  username: 'api-user',
  password: 'test-password',
  baseUrl: BASE,
  expiryWindowSeconds: 600,
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** A response whose body stream fails while it is being read. */
export function brokenBodyResponse(message: string, status = 200): Response {
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new Error(message));
    },
  });
  return new Response(stream, { status });
}

export type FetchHandler = (url: string, init: RequestInit | undefined) => Response;

/**
 * Replaces globalThis.fetch with a mock that answers every call through
 * `handler`. A fresh Response is built per call since bodies read once.
 */
export function installFetch(handler: FetchHandler): jest.Mock<typeof fetch> {
  const mock = jest.fn<typeof fetch>((input, init) =>
    Promise.resolve(handler(String(input), init)),
  );
  globalThis.fetch = mock;
  return mock;
}

/** Session whose cache already holds a token valid for an hour. */
export function sessionWithToken(config: ClientConfig = TEST_CONFIG): Session {
  const cache = new TokenCache();
  cache.set({ accessToken: 'test-token', expiresAt: nowSeconds() + 3600 });
  return createSession(config, cache);
}

/** Parses the JSON body the code under test sent. */
export function sentBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}
