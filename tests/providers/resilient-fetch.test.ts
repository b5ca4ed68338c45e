/**
 * Resilient fetch tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  resilientFetch,
  parseRetryAfter,
  ResilientFetchError,
  isCancellationError,
  isTimeoutError,
} from '../../src/providers/resilient-fetch.js';

const FAST = { baseRetryDelay: 1, maxRetryDelay: 5 };

function respondWith(...statuses: number[]) {
  let call = 0;
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const status = statuses[Math.min(call, statuses.length - 1)];
    call++;
    return new Response(status === 200 ? '{"ok":true}' : 'error', { status });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('resilientFetch', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the first successful response', async () => {
    const fetchMock = respondWith(200);

    const result = await resilientFetch({ url: 'https://example.test', init: {}, providerName: 'test' });

    expect(result.attempts).toBe(1);
    expect(result.response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries retryable statuses and reports each retry', async () => {
    const fetchMock = respondWith(503, 200);
    const retries: number[] = [];

    const result = await resilientFetch({
      url: 'https://example.test',
      init: {},
      providerName: 'test',
      networkConfig: FAST,
      onRetry: (attempt) => retries.push(attempt),
    });

    expect(result.attempts).toBe(2);
    expect(retries).toEqual([1]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('hands non-retryable statuses back to the caller', async () => {
    respondWith(400);

    const result = await resilientFetch({ url: 'https://example.test', init: {}, providerName: 'test' });

    expect(result.response.status).toBe(400);
    expect(result.attempts).toBe(1);
  });

  it('gives up after maxRetries', async () => {
    respondWith(500);

    const error = await resilientFetch({
      url: 'https://example.test',
      init: {},
      providerName: 'test',
      networkConfig: { ...FAST, maxRetries: 2 },
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResilientFetchError);
    expect(error).toMatchObject({ attempts: 2, message: 'test request failed after 2 attempts: HTTP 500' });
  });

  it('allows extra attempts for rate limits', async () => {
    const fetchMock = respondWith(429, 429, 429, 200);

    const result = await resilientFetch({
      url: 'https://example.test',
      init: {},
      providerName: 'test',
      networkConfig: { ...FAST, maxRetries: 2, maxRetriesFor429: 2 },
    });

    expect(result.attempts).toBe(4);
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it('wraps network errors once retries run out', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const error = await resilientFetch({
      url: 'https://example.test',
      init: {},
      providerName: 'test',
      networkConfig: { ...FAST, maxRetries: 1 },
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResilientFetchError);
    expect(error).toMatchObject({ message: 'test network error after 1 attempts: fetch failed' });
  });

  it('reports a timeout when the request outlives its deadline', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('aborted'), { name: 'AbortError' }));
            });
          })
      )
    );

    const error = await resilientFetch({
      url: 'https://example.test',
      init: {},
      providerName: 'test',
      networkConfig: { ...FAST, timeout: 5, maxRetries: 1 },
    }).catch((err: unknown) => err);

    expect(isTimeoutError(error)).toBe(true);
    expect(isCancellationError(error)).toBe(false);
  });

  it('does not call fetch when the signal is already aborted', async () => {
    const fetchMock = respondWith(200);
    const controller = new AbortController();
    controller.abort();

    const error = await resilientFetch({
      url: 'https://example.test',
      init: {},
      providerName: 'test',
      signal: controller.signal,
    }).catch((err: unknown) => err);

    expect(isCancellationError(error)).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
  });

  it('returns null for a missing or unreadable header', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
  });

  it('returns null for a date in the past', () => {
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT')).toBeNull();
  });
});
