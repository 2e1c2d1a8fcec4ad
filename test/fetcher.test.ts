import { afterEach, describe, expect, it, vi } from 'vitest';

import { Fetcher, classifyContent, type FetcherOptions } from '../src/crawler/network/fetcher.js';
import { RateLimiter } from '../src/crawler/network/rateLimiter.js';
import type { FetchLike } from '../src/types.js';
import { createRecordingLogger, networkFailure } from './helpers/mockSite.js';

const URL_A = 'https://example.com/a';

const limiters: RateLimiter[] = [];

function createFetcher(fetchImpl: FetchLike, overrides: Partial<FetcherOptions> = {}) {
  const limiter = new RateLimiter({ rate: 1_000 });
  limiters.push(limiter);
  const logger = createRecordingLogger();
  const fetcher = new Fetcher({
    userAgent: 'sitewalk-test/1.0',
    timeoutMs: 1_000,
    retryTimes: 2,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 0,
    limiter,
    logger,
    fetchImpl,
    ...overrides,
  });
  return { fetcher, logger };
}

function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/html; charset=utf-8' } });
}

afterEach(() => {
  for (const limiter of limiters.splice(0)) {
    limiter.dispose();
  }
});

describe('Fetcher', () => {
  it('returns text content for a successful HTML response', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => htmlResponse('<p>hello</p>'));
    const { fetcher } = createFetcher(fetchImpl);

    const result = await fetcher.fetch(URL_A);

    expect(result).toMatchObject({
      url: URL_A,
      finalUrl: URL_A,
      status: 200,
      contentType: 'text/html; charset=utf-8',
      attempts: 1,
      content: { kind: 'text', text: '<p>hello</p>' },
    });
    expect(result.error).toBeUndefined();
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('sends the configured user agent', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => htmlResponse(''));
    const { fetcher } = createFetcher(fetchImpl);

    await fetcher.fetch(URL_A);

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get('user-agent')).toBe('sitewalk-test/1.0');
  });

  it('retries 5xx responses until one succeeds', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(htmlResponse('busy', 503))
      .mockResolvedValueOnce(htmlResponse('busy', 503))
      .mockResolvedValueOnce(htmlResponse('ok'));
    const { fetcher } = createFetcher(fetchImpl);

    const result = await fetcher.fetch(URL_A);

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(result.status).toBe(200);
    expect(result.attempts).toBe(3);
    expect(result.error).toBeUndefined();
  });

  it('reports a transient error once retries are exhausted', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => htmlResponse('down', 500));
    const { fetcher } = createFetcher(fetchImpl, { retryTimes: 1 });

    const result = await fetcher.fetch(URL_A);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(result.status).toBe(500);
    expect(result.attempts).toBe(2);
    expect(result.error).toMatchObject({ kind: 'transient', message: 'HTTP 500' });
  });

  it('does not retry 4xx responses', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => htmlResponse('gone', 404));
    const { fetcher } = createFetcher(fetchImpl);

    const result = await fetcher.fetch(URL_A);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(result.status).toBe(404);
    expect(result.error).toMatchObject({ kind: 'client', message: 'HTTP 404', name: 'ClientError' });
  });

  it('retries network failures and keeps the error code', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw networkFailure('ECONNREFUSED');
    });
    const { fetcher } = createFetcher(fetchImpl, { retryTimes: 1 });

    const result = await fetcher.fetch(URL_A);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(result.status).toBeNull();
    expect(result.error?.kind).toBe('transient');
    expect(result.error?.message).toBe('fetch failed (ECONNREFUSED)');
    expect(result.error?.details?.code).toBe('ECONNREFUSED');
  });

  it('times out requests that never answer', async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          reject(new DOMException('This operation was aborted', 'AbortError'));
        });
      });
    const { fetcher } = createFetcher(fetchImpl, { timeoutMs: 20, retryTimes: 0 });

    const result = await fetcher.fetch(URL_A);

    expect(result.error).toMatchObject({
      kind: 'transient',
      message: 'Request timed out after 20ms',
    });
    expect(result.error?.details?.code).toBe('ETIMEDOUT');
  });

  it('skips the network for paths robots.txt disallows', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => htmlResponse('secret'));
    const isAllowed = vi.fn(async () => false);
    const { fetcher } = createFetcher(fetchImpl, { robots: { isAllowed } });

    const result = await fetcher.fetch('https://example.com/private/x');

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(isAllowed).toHaveBeenCalledWith('https://example.com/private/x', 'sitewalk-test/1.0');
    expect(result.status).toBeNull();
    expect(result.attempts).toBe(0);
    expect(result.error).toMatchObject({ kind: 'forbidden', name: 'ForbiddenError' });
  });

  it('consults robots.txt once per logical fetch', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(htmlResponse('busy', 502))
      .mockResolvedValueOnce(htmlResponse('ok'));
    const isAllowed = vi.fn(async () => true);
    const { fetcher } = createFetcher(fetchImpl, { robots: { isAllowed } });

    await fetcher.fetch(URL_A);

    expect(isAllowed).toHaveBeenCalledTimes(1);
  });

  it('bypasses robots.txt when asked', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => htmlResponse('User-agent: *'));
    const isAllowed = vi.fn(async () => false);
    const { fetcher } = createFetcher(fetchImpl, { robots: { isAllowed } });

    const result = await fetcher.fetch('https://example.com/robots.txt', { bypassRobots: true });

    expect(isAllowed).not.toHaveBeenCalled();
    expect(result.status).toBe(200);
  });

  it('lower-cases response header names', async () => {
    const fetchImpl = vi.fn<FetchLike>(
      async () => new Response('ok', { headers: { 'X-Custom': 'v', 'Content-Type': 'text/plain' } }),
    );
    const { fetcher } = createFetcher(fetchImpl);

    const result = await fetcher.fetch(URL_A);

    expect(result.headers['x-custom']).toBe('v');
    expect(result.contentType).toBe('text/plain');
  });

  it('passes unsupported binary bodies through and logs them', async () => {
    const fetchImpl = vi.fn<FetchLike>(
      async () => new Response(new Uint8Array([137, 80, 78, 71]), { headers: { 'content-type': 'image/png' } }),
    );
    const { fetcher, logger } = createFetcher(fetchImpl);

    const result = await fetcher.fetch(URL_A);

    expect(result.error).toBeUndefined();
    expect(result.content).toEqual({
      kind: 'binary',
      bytes: new Uint8Array([137, 80, 78, 71]),
      supported: false,
    });
    expect(logger.info).toHaveBeenCalledWith(
      { url: URL_A, contentType: 'image/png' },
      'Unsupported content type; passing body through as binary',
    );
  });

  it('rejects with a cancelled error when its signal aborts', async () => {
    const controller = new AbortController();
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          reject(new DOMException('This operation was aborted', 'AbortError'));
        });
        controller.abort();
      });
    const { fetcher } = createFetcher(fetchImpl, { signal: controller.signal });

    await expect(fetcher.fetch(URL_A)).rejects.toMatchObject({ kind: 'cancelled' });
  });

  it('doubles the backoff per attempt up to the cap', () => {
    const { fetcher } = createFetcher(vi.fn<FetchLike>(), {
      retryBaseDelayMs: 100,
      retryMaxDelayMs: 250,
    });

    expect([0, 1, 2, 3].map((attempt) => fetcher.backoffFor(attempt))).toEqual([100, 200, 250, 250]);
  });
});

describe('classifyContent', () => {
  const bytes = new TextEncoder().encode('{"ok":true}');

  it('decodes text and JSON bodies', () => {
    expect(classifyContent('application/json', bytes)).toEqual({ kind: 'text', text: '{"ok":true}' });
    expect(classifyContent('text/plain; charset="utf-8"', bytes)).toEqual({
      kind: 'text',
      text: '{"ok":true}',
    });
  });

  it('honours the declared charset', () => {
    const latin1 = new Uint8Array([99, 97, 102, 233]);
    expect(classifyContent('text/html; charset=iso-8859-1', latin1)).toEqual({
      kind: 'text',
      text: 'café',
    });
  });

  it('falls back to UTF-8 for unknown charsets', () => {
    expect(classifyContent('text/plain; charset=made-up', bytes)).toEqual({
      kind: 'text',
      text: '{"ok":true}',
    });
  });

  it('marks document types as supported binary content', () => {
    expect(classifyContent('application/pdf', bytes)).toMatchObject({ kind: 'binary', supported: true });
    expect(classifyContent('application/octet-stream', bytes)).toMatchObject({
      kind: 'binary',
      supported: false,
    });
    expect(classifyContent(undefined, bytes)).toMatchObject({ kind: 'binary', supported: false });
  });
});
