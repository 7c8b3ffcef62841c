import { afterEach, describe, expect, it, vi } from 'vitest';

import { buildSlackPayload, sendSlackNotification } from '../src/notify/slack';
import { installFakeFetch } from './helpers/fake-fetch';

const WEBHOOK_URL = 'https://hooks.example.com/services/test';

describe('notify/slack', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  it('builds the incoming-webhook payload', () => {
    expect(buildSlackPayload('✅ all good')).toEqual({ text: '✅ all good' });
  });

  it('posts the text as JSON and reports success', async () => {
    const fetchMock = installFakeFetch((url, init) => {
      expect(url).toBe(WEBHOOK_URL);
      expect(init?.method).toBe('POST');
      expect(new Headers(init?.headers).get('content-type')).toBe('application/json');
      expect(init?.body).toBe('{"text":"hello"}');
      return new Response('ok', { status: 200 });
    });

    await expect(sendSlackNotification(WEBHOOK_URL, 'hello')).resolves.toEqual({
      status: 'success',
      httpStatus: 200,
      error: null,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports non-2xx responses as failed', async () => {
    installFakeFetch(() => new Response('invalid_payload', { status: 400 }));

    await expect(sendSlackNotification(WEBHOOK_URL, 'hello')).resolves.toEqual({
      status: 'failed',
      httpStatus: 400,
      error: 'HTTP 400',
    });
  });

  it('does not reject when the request throws', async () => {
    installFakeFetch(() => {
      throw new Error('getaddrinfo ENOTFOUND hooks.example.com');
    });

    await expect(sendSlackNotification(WEBHOOK_URL, 'hello')).resolves.toEqual({
      status: 'failed',
      httpStatus: null,
      error: 'getaddrinfo ENOTFOUND hooks.example.com',
    });
  });

  it('gives up after the timeout', async () => {
    vi.useFakeTimers();
    installFakeFetch((_url, init) => {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });

    const outcomePromise = sendSlackNotification(WEBHOOK_URL, 'hello', { timeoutMs: 100 });
    await vi.advanceTimersByTimeAsync(100);

    await expect(outcomePromise).resolves.toEqual({
      status: 'failed',
      httpStatus: null,
      error: 'Timeout after 100ms',
    });
  });
});
