import {
  createCancelledError,
  createClientError,
  createForbiddenError,
  createTransientError,
  ensureCrawlerError,
  type CrawlerError,
} from '../../errors.js';
import type { LoggerLike } from '../../logger.js';
import type { FetchLike, FetchResult, PageContent } from '../../types.js';
import { fetchPage, type RawResponse } from './fetchPage.js';
import type { RateLimiter } from './rateLimiter.js';

export interface RobotsPolicyCheck {
  isAllowed(url: string, userAgent: string): Promise<boolean>;
}

export interface FetcherOptions {
  userAgent: string;
  timeoutMs: number;
  retryTimes: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  limiter: RateLimiter;
  robots?: RobotsPolicyCheck;
  logger: LoggerLike;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
}

export interface FetchOverrides {
  timeoutMs?: number;
  retryTimes?: number;
  /** Used for robots.txt itself. */
  bypassRobots?: boolean;
}

// Binary types handed to document discovery; anything else binary is "unsupported".
const DOCUMENT_TYPES = new Set([
  'application/pdf',
  'application/msword',
  'application/rtf',
  'application/vnd.ms-excel',
  'application/vnd.ms-powerpoint',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  'application/vnd.oasis.opendocument.text',
  'application/vnd.oasis.opendocument.spreadsheet',
  'application/vnd.oasis.opendocument.presentation',
  'application/epub+zip',
  'application/zip',
]);

/**
 * Performs one logical fetch: rate-limit, robots check, HTTP GET, and
 * retries with exponential backoff for 5xx and network failures. Per-page
 * failures come back inside the result; only cancellation rejects.
 */
export class Fetcher {
  private readonly logger: LoggerLike;

  constructor(private readonly options: FetcherOptions) {
    this.logger = options.logger.child({ component: 'fetcher' });
  }

  async fetch(url: string, overrides: FetchOverrides = {}): Promise<FetchResult> {
    const { limiter, robots, userAgent, signal } = this.options;
    const retryTimes = overrides.retryTimes ?? this.options.retryTimes;
    const timeoutMs = overrides.timeoutMs ?? this.options.timeoutMs;
    const startedAt = Date.now();

    let attempts = 0;
    let lastStatus: number | null = null;
    let lastHeaders: Record<string, string> = {};
    let lastError: CrawlerError | undefined;

    for (let attempt = 0; attempt <= retryTimes; attempt += 1) {
      await limiter.acquire(signal);

      if (attempt === 0 && robots && !overrides.bypassRobots) {
        const allowed = await robots.isAllowed(url, userAgent);
        if (!allowed) {
          this.logger.debug({ url }, 'Disallowed by robots.txt');
          return freezeResult({
            url,
            finalUrl: url,
            status: null,
            headers: {},
            attempts: 0,
            durationMs: Date.now() - startedAt,
            error: createForbiddenError('Disallowed by robots.txt', { url }),
          });
        }
      }

      attempts += 1;

      try {
        const raw = await fetchPage(url, {
          timeoutMs,
          userAgent,
          signal,
          fetchImpl: this.options.fetchImpl,
        });

        if (raw.status >= 500) {
          lastStatus = raw.status;
          lastHeaders = raw.headers;
          lastError = createTransientError(`HTTP ${raw.status}`, { url, status: raw.status });
        } else if (raw.status >= 400) {
          return freezeResult({
            ...baseResult(url, raw, attempts, startedAt),
            error: createClientError(`HTTP ${raw.status}`, { url, status: raw.status }),
          });
        } else {
          return freezeResult({
            ...baseResult(url, raw, attempts, startedAt),
            content: this.classify(url, raw),
          });
        }
      } catch (error) {
        const crawlerError = ensureCrawlerError(error, { kind: 'transient', severity: 'recoverable' });
        if (crawlerError.kind === 'cancelled') {
          throw crawlerError;
        }
        lastStatus = null;
        lastHeaders = {};
        lastError = crawlerError;
      }

      if (attempt < retryTimes) {
        const backoffMs = this.backoffFor(attempt);
        this.logger.debug(
          { url, attempt: attempt + 1, reason: lastError?.message, backoffMs },
          'Transient failure; retrying',
        );
        await delay(backoffMs, signal);
      }
    }

    this.logger.debug({ url, attempts, reason: lastError?.message }, 'Retries exhausted');

    return freezeResult({
      url,
      finalUrl: url,
      status: lastStatus,
      headers: lastHeaders,
      attempts,
      durationMs: Date.now() - startedAt,
      error: lastError ?? createTransientError('Request failed', { url }),
    });
  }

  /** base × 2^attempt, capped. */
  backoffFor(attempt: number): number {
    return Math.min(this.options.retryMaxDelayMs, this.options.retryBaseDelayMs * 2 ** attempt);
  }

  private classify(url: string, raw: RawResponse): PageContent {
    const content = classifyContent(raw.contentType, raw.body);
    if (content.kind === 'binary' && !content.supported) {
      this.logger.info(
        { url, contentType: raw.contentType ?? null },
        'Unsupported content type; passing body through as binary',
      );
    }
    return content;
  }
}

export function classifyContent(contentType: string | undefined, body: Uint8Array): PageContent {
  const [mimePart = '', ...params] = (contentType ?? '').split(';');
  const mime = mimePart.trim().toLowerCase();

  if (mime.startsWith('text/') || mime === 'application/json') {
    return { kind: 'text', text: decodeText(body, charsetOf(params)) };
  }

  return { kind: 'binary', bytes: body, supported: DOCUMENT_TYPES.has(mime) };
}

function charsetOf(params: string[]): string | undefined {
  for (const param of params) {
    const [key = '', value = ''] = param.split('=');
    if (key.trim().toLowerCase() === 'charset') {
      return value.trim().replace(/^"|"$/g, '') || undefined;
    }
  }
  return undefined;
}

function decodeText(body: Uint8Array, charset: string | undefined): string {
  try {
    return new TextDecoder(charset ?? 'utf-8').decode(body);
  } catch {
    // Unknown charset label.
    return new TextDecoder('utf-8').decode(body);
  }
}

function baseResult(
  url: string,
  raw: RawResponse,
  attempts: number,
  startedAt: number,
): Omit<FetchResult, 'content' | 'error'> {
  return {
    url,
    finalUrl: raw.url,
    status: raw.status,
    headers: raw.headers,
    contentType: raw.contentType,
    attempts,
    durationMs: Date.now() - startedAt,
  };
}

function freezeResult(result: FetchResult): FetchResult {
  Object.freeze(result.headers);
  if (result.content) {
    Object.freeze(result.content);
  }
  return Object.freeze(result);
}

async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(createCancelledError('Backoff cancelled'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(createCancelledError('Backoff cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
