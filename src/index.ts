import { CrawlOrchestrator } from './crawler/orchestrator.js';
import { normalizeUrl } from './crawler/url/normalizeUrl.js';
import { createConfigurationError } from './errors.js';
import { isLogLevel } from './logger.js';
import type {
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlReport,
  CrawlScope,
  OutputFormat,
  RobotsPolicy,
} from './types.js';

export const DEFAULT_OPTIONS: Readonly<CrawlOptions> = {
  maxDepth: 2,
  timeoutMs: 10_000,
  rateLimit: 2,
  burst: 2,
  userAgent: 'sitewalk/1.0',
  retryTimes: 1,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 30_000,
  concurrency: 8,
  maxPages: undefined,
  scope: 'same-domain',
  robotsPolicy: 'fail-open',
  robotsTimeoutMs: 5_000,
  respectCrawlDelay: true,
  format: 'text',
  quiet: false,
  logLevel: 'silent',
};

export const VALID_SCOPES = [
  'same-domain',
  'same-subdomain',
  'unrestricted',
] as const satisfies readonly CrawlScope[];
export const VALID_ROBOTS_POLICIES = ['fail-open', 'fail-closed'] as const satisfies readonly RobotsPolicy[];
export const VALID_FORMATS = ['text', 'json'] as const satisfies readonly OutputFormat[];

/**
 * Crawls `startUrl` breadth-first and returns every page outcome in depth
 * order together with the run summary. Invalid configuration and an
 * unreachable seed reject; per-page failures are part of the report.
 */
export async function crawlOrchestrator(
  startUrl: string,
  config: CrawlOrchestratorConfig = {},
): Promise<CrawlReport> {
  const url = validateStartUrl(startUrl);
  const options = resolveOptions(config);

  const normalizedStart = normalizeUrl(url.href);
  if (!normalizedStart) {
    throw createConfigurationError('Unable to normalize the starting URL.', { startUrl: url.href });
  }

  const orchestrator = new CrawlOrchestrator(normalizedStart, options, {
    handlers: config.handlers,
    parser: config.parser,
    logger: config.logger,
    signal: config.signal,
    fetchImpl: config.fetchImpl,
  });

  const pages = await orchestrator.crawl();
  return { pages, summary: orchestrator.summary() };
}

export function validateStartUrl(startUrl: string): URL {
  let url: URL;

  try {
    url = new URL(startUrl);
  } catch {
    throw createConfigurationError(`Invalid URL: ${startUrl}`, { startUrl });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('Start URL must use http or https protocol.', {
      protocol: url.protocol,
      startUrl,
    });
  }

  return url;
}

export function resolveOptions(config: CrawlOrchestratorConfig = {}): CrawlOptions {
  const rateLimit = coercePositiveNumber(config.rateLimit ?? DEFAULT_OPTIONS.rateLimit, 'rate-limit');

  const options: CrawlOptions = {
    maxDepth: coerceNonNegativeInteger(config.maxDepth ?? DEFAULT_OPTIONS.maxDepth, 'max-depth'),
    timeoutMs: coercePositiveInteger(config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 'timeout-ms'),
    rateLimit,
    burst: coercePositiveNumber(config.burst ?? Math.max(1, rateLimit), 'burst'),
    userAgent: requireNonEmpty(config.userAgent ?? DEFAULT_OPTIONS.userAgent, 'user-agent'),
    retryTimes: coerceNonNegativeInteger(
      config.retryTimes ?? DEFAULT_OPTIONS.retryTimes,
      'retry-times',
    ),
    retryBaseDelayMs: coerceNonNegativeInteger(
      config.retryBaseDelayMs ?? DEFAULT_OPTIONS.retryBaseDelayMs,
      'retry-base-delay-ms',
    ),
    retryMaxDelayMs: coerceNonNegativeInteger(
      config.retryMaxDelayMs ?? DEFAULT_OPTIONS.retryMaxDelayMs,
      'retry-max-delay-ms',
    ),
    concurrency: coercePositiveInteger(
      config.concurrency ?? DEFAULT_OPTIONS.concurrency,
      'concurrency',
    ),
    maxPages:
      config.maxPages === undefined ? undefined : coercePositiveInteger(config.maxPages, 'max-pages'),
    scope: oneOf(config.scope ?? DEFAULT_OPTIONS.scope, VALID_SCOPES, 'scope'),
    robotsPolicy: oneOf(
      config.robotsPolicy ?? DEFAULT_OPTIONS.robotsPolicy,
      VALID_ROBOTS_POLICIES,
      'robots-policy',
    ),
    robotsTimeoutMs: coercePositiveInteger(
      config.robotsTimeoutMs ?? DEFAULT_OPTIONS.robotsTimeoutMs,
      'robots-timeout-ms',
    ),
    respectCrawlDelay: config.respectCrawlDelay ?? DEFAULT_OPTIONS.respectCrawlDelay,
    format: oneOf(config.format ?? DEFAULT_OPTIONS.format, VALID_FORMATS, 'format'),
    quiet: config.quiet ?? DEFAULT_OPTIONS.quiet,
    logLevel: config.logLevel ?? DEFAULT_OPTIONS.logLevel,
  };

  if (!isLogLevel(options.logLevel)) {
    throw createConfigurationError(`Unsupported log-level: ${options.logLevel}`, {
      value: options.logLevel,
    });
  }

  if (options.retryMaxDelayMs < options.retryBaseDelayMs) {
    throw createConfigurationError('retry-max-delay-ms must not be below retry-base-delay-ms.', {
      retryBaseDelayMs: options.retryBaseDelayMs,
      retryMaxDelayMs: options.retryMaxDelayMs,
    });
  }

  return options;
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return value;
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return value;
}

function coercePositiveNumber(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be greater than zero.`, { value, field });
  }

  return value;
}

function requireNonEmpty(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw createConfigurationError(`${field} must not be empty.`, { field });
  }

  return trimmed;
}

function oneOf<T extends string>(value: string, allowed: readonly T[], field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw createConfigurationError(`Unsupported ${field}: ${value}`, { value, allowed });
  }

  return match;
}

export { CrawlOrchestrator } from './crawler/orchestrator.js';
export { Frontier } from './crawler/state/frontier.js';
export { RateLimiter } from './crawler/network/rateLimiter.js';
export { RobotsGate } from './crawler/network/robotsGate.js';
export { Fetcher, classifyContent } from './crawler/network/fetcher.js';
export { parseRobotsTxt, isPathAllowed } from './crawler/parsing/robotsTxt.js';
export { htmlLinkExtractor, parseLinks } from './crawler/parsing/parseLinks.js';
export { normalizeUrl } from './crawler/url/normalizeUrl.js';
export { inScope, registrableDomain } from './crawler/url/scope.js';
export { CrawlerError, isCrawlerError } from './errors.js';
export type {
  CrawlHandlers,
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlReport,
  CrawlScope,
  CrawlSummary,
  FetchResult,
  LinkExtractor,
  OutputFormat,
  PageContent,
  PageResult,
  RobotsPolicy,
} from './types.js';
