import { vi } from 'vitest';

export type FakeFetchHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

export function installFakeFetch(handler: FakeFetchHandler) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    handler(String(input), init),
  );
  globalThis.fetch = fetchMock as unknown as typeof fetch;
  return fetchMock;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
