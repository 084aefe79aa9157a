import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { ClientConfigSchema } from '../schemas/index.js';
import type { ClientConfig, JsonValue } from '../schemas/index.js';

export const GRAPH_BASE = 'https://graph.facebook.com/v21.0';

/**
 * Config with a placeholder token and no backoff delay
 */
export function testConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return ClientConfigSchema.parse({ accessToken: 'test-token', baseDelayMs: 0, ...overrides });
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

export function graphPage(data: JsonValue[], next?: string): Response {
  return jsonResponse(next ? { data, paging: { next } } : { data });
}

export function graphError(
  status: number,
  code: number,
  message: string,
  headers: Record<string, string> = {}
): Response {
  return jsonResponse(
    { error: { message, type: 'OAuthException', code } },
    { status, headers: { 'Content-Type': 'application/json', ...headers } }
  );
}

export function cursorUrl(endpoint: string, cursor: string): string {
  return `${GRAPH_BASE}/${endpoint}?after=${cursor}`;
}

/**
 * Replace global fetch with a mock; undo with vi.unstubAllGlobals()
 */
export function stubFetch(): Mock<typeof fetch> {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function requestedUrl(fetchMock: Mock<typeof fetch>, call: number): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}
