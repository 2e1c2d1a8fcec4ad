import type { CrawlerError, ErrorKind } from './errors.js';
import type { LoggerLike } from './logger.js';

export type OutputFormat = 'text' | 'json';

export type CrawlScope = 'same-domain' | 'same-subdomain' | 'unrestricted';

/** What to do with an origin whose robots.txt could not be retrieved. */
export type RobotsPolicy = 'fail-open' | 'fail-closed';

export type CrawlState = 'idle' | 'running' | 'draining' | 'done';

export type PageContent =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'binary'; readonly bytes: Uint8Array; readonly supported: boolean };

export interface FetchResult {
  readonly url: string;
  readonly finalUrl: string;
  readonly status: number | null;
  /** Lower-cased header names. */
  readonly headers: Readonly<Record<string, string>>;
  readonly contentType?: string;
  readonly content?: PageContent;
  readonly attempts: number;
  readonly durationMs: number;
  readonly error?: CrawlerError;
}

export interface PageResult {
  url: string;
  depth: number;
  links: string[];
  fetch: FetchResult;
}

export interface FailureEvent {
  url: string;
  depth: number;
  kind: ErrorKind;
  reason: string;
  attempts: number;
}

export interface LinkExtractor {
  extractLinks(result: FetchResult): string[];
}

export interface CrawlOptions {
  maxDepth: number;
  timeoutMs: number;
  rateLimit: number;
  burst: number;
  userAgent: string;
  retryTimes: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  concurrency: number;
  maxPages?: number;
  scope: CrawlScope;
  robotsPolicy: RobotsPolicy;
  robotsTimeoutMs: number;
  respectCrawlDelay: boolean;
  format: OutputFormat;
  quiet: boolean;
  logLevel: string;
}

export interface LevelSummary {
  depth: number;
  dispatched: number;
  succeeded: number;
  failed: number;
  enqueuedNext: number;
}

export interface CrawlSummary {
  pagesFetched: number;
  pagesSucceeded: number;
  pagesFailed: number;
  pagesForbidden: number;
  clientErrors: number;
  transientFailures: number;
  unsupportedContent: number;
  binaryPages: number;
  uniqueUrlsDiscovered: number;
  duplicatesFiltered: number;
  outOfScopeFiltered: number;
  capRejected: number;
  totalLinksExtracted: number;
  maxDepth: number;
  levelsCompleted: number;
  statusCounts: Record<string, number>;
  failureReasons: Record<string, number>;
  retryAttempts: number;
  actualMaxConcurrency: number;
  peakFrontierSize: number;
  durationMs: number;
  cancelled: boolean;
  failureLog: FailureEvent[];
}

export interface CrawlReport {
  pages: PageResult[];
  summary: CrawlSummary;
}

export type CrawlOrchestratorOptions = Partial<CrawlOptions>;

export interface CrawlHandlers {
  onPage(result: PageResult): void;
  onLevel?(level: LevelSummary): void;
  onError?(error: Error, context: { url: string; depth: number }): void;
  onComplete?(summary: CrawlSummary): void;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CrawlOrchestratorConfig extends CrawlOrchestratorOptions {
  handlers?: CrawlHandlers;
  parser?: LinkExtractor;
  logger?: LoggerLike;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}
