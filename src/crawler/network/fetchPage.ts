import { createCancelledError, createTransientError, isCrawlerError } from '../../errors.js';
import type { FetchLike } from '../../types.js';

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

export interface RawResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  contentType?: string;
  /** Empty for error statuses; their bodies are discarded unread. */
  body: Uint8Array;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * One HTTP GET, bounded by `timeoutMs` from dispatch until the body has been
 * read. Network failures and timeouts surface as transient errors; an abort
 * of `options.signal` surfaces as a cancelled error.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<RawResponse> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  const onCallerAbort = (): void => controller.abort();
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    if (options.signal?.aborted) {
      throw createCancelledError('Fetch cancelled before dispatch', { url });
    }

    const fetchImpl = options.fetchImpl ?? defaultFetch;
    const response = await fetchImpl(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': options.userAgent,
        accept: 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
      },
    });

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    let body: Uint8Array = new Uint8Array(0);
    if (response.status >= 400) {
      await response.body?.cancel();
    } else {
      body = new Uint8Array(await response.arrayBuffer());
    }

    return {
      url: response.url || url,
      status: response.status,
      headers,
      contentType: headers['content-type'],
      body,
    };
  } catch (error) {
    if (isCrawlerError(error)) {
      throw error;
    }

    const err = error instanceof Error ? error : new Error(String(error));

    if (options.signal?.aborted && !timedOut) {
      throw createCancelledError('Fetch cancelled', { url }, { cause: err });
    }

    const code = timedOut ? 'ETIMEDOUT' : extractErrorCode(err);
    const message = timedOut
      ? `Request timed out after ${options.timeoutMs}ms`
      : describeNetworkError(err, code);

    throw createTransientError(
      message,
      {
        url,
        timeoutMs: options.timeoutMs,
        ...(typeof code === 'string' ? { code } : {}),
      },
      { cause: err },
    );
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}

function describeNetworkError(error: Error, code: string | undefined): string {
  const base = error.message || 'Request failed';
  return code && !base.includes(code) ? `${base} (${code})` : base;
}

function extractErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
