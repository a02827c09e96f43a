import { vi, type Mock } from 'vitest';
import { TenderlyClient } from '../client.js';
import type { Logger } from '../internal/http.js';

export const TEST_BASE_URL = 'https://api.tenderly.test/api/v1';
export const PROJECT_URL = `${TEST_BASE_URL}/account/acme/project/sandbox`;
export const TEST_KEY = 'test-secret';

export const ADDR_A = '0x1111111111111111111111111111111111111111';
export const ADDR_B = '0x2222222222222222222222222222222222222222';

/**
 * Helper to create a mock JSON Response.
 */
export function mockResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function mockText(text: string, status = 200): Response {
  return new Response(text, { status, headers: { 'Content-Type': 'text/plain' } });
}

export function mockEmpty(status = 204): Response {
  return new Response(null, { status });
}

/** Replace global fetch; every queued response is built fresh per call. */
export function stubFetch(): Mock {
  const fetchSpy = vi.fn();
  vi.stubGlobal('fetch', fetchSpy);
  return fetchSpy;
}

export function respondWith(fetchSpy: Mock, body: unknown, status = 200): void {
  fetchSpy.mockImplementationOnce(() => Promise.resolve(mockResponse(body, status)));
}

export function respondEmpty(fetchSpy: Mock, status = 204): void {
  fetchSpy.mockImplementationOnce(() => Promise.resolve(mockEmpty(status)));
}

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

export function callAt(fetchSpy: Mock, index = 0): RecordedCall {
  const call = fetchSpy.mock.calls[index];
  if (!call) throw new Error(`fetch was not called ${index + 1} time(s)`);
  const url: string = call[0];
  const init: RequestInit = call[1];
  return {
    url,
    method: init.method ?? 'GET',
    headers: new Headers(init.headers),
    body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}

export function createTestClient(logger?: Logger): TenderlyClient {
  return new TenderlyClient({
    accessKey: TEST_KEY,
    accountSlug: 'acme',
    projectSlug: 'sandbox',
    baseUrl: TEST_BASE_URL,
    logger,
  });
}

export function vnetFixture(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'vnet-1',
    slug: 'staging-fork',
    display_name: 'Staging Fork',
    fork_config: { network_id: 1, block_number: '0x112a880' },
    virtual_network_config: { chain_config: { chain_id: 73571 } },
    rpcs: [
      { name: 'Admin RPC', url: 'https://virtual.mainnet.rpc.tenderly.test/admin-abc' },
      { name: 'Public RPC', url: 'https://virtual.mainnet.rpc.tenderly.test/public-abc' },
    ],
    status: 'running',
    ...overrides,
  };
}
