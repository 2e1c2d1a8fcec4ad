import pLimit from 'p-limit';

import {
  createConfigurationError,
  createInternalError,
  createSeedError,
  ensureCrawlerError,
  type CrawlerError,
} from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';
import type {
  CrawlHandlers,
  CrawlOptions,
  CrawlState,
  CrawlSummary,
  FetchLike,
  FetchResult,
  LevelSummary,
  LinkExtractor,
  PageResult,
} from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { Fetcher } from './network/fetcher.js';
import { RateLimiter } from './network/rateLimiter.js';
import { RobotsGate } from './network/robotsGate.js';
import { htmlLinkExtractor } from './parsing/parseLinks.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { FailureTracker } from './state/failures.js';
import { Frontier } from './state/frontier.js';
import { initializeStats, recordPageMetrics, type CrawlStats } from './state/stats.js';
import { normalizeUrl } from './url/normalizeUrl.js';
import { inScope } from './url/scope.js';

export interface OrchestratorDependencies {
  handlers?: CrawlHandlers;
  parser?: LinkExtractor;
  logger?: LoggerLike;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  /** Cancel the run on SIGINT. Defaults to true. */
  handleSigint?: boolean;
}

const NOOP_HANDLERS: CrawlHandlers = { onPage: () => undefined };

/**
 * Breadth-first crawl driver. Each depth level is drained from the frontier,
 * fetched with bounded concurrency, and fully settled before links found on
 * it are queued and the next level starts.
 */
export class CrawlOrchestrator {
  private currentState: CrawlState = 'idle';
  private readonly frontier: Frontier;
  private readonly failures = new FailureTracker();
  private readonly stats: CrawlStats;
  private readonly limiter: RateLimiter;
  private readonly robots: RobotsGate;
  private readonly fetcher: Fetcher;
  private readonly controller = new AbortController();
  private readonly logger: LoggerLike;
  private readonly parser: LinkExtractor;
  private readonly handlers: CrawlHandlers;
  private readonly results: PageResult[] = [];
  private readonly seed: URL;
  private readonly sigintHandler = (): void => {
    this.logger.info('SIGINT received; cancelling crawl');
    this.cancel();
  };
  private readonly callerAbortHandler = (): void => {
    this.cancel();
  };
  private sigintAttached = false;
  private startTime = 0;
  private runningCount = 0;
  private cancelled = false;

  constructor(
    seedUrl: string,
    private readonly options: CrawlOptions,
    private readonly deps: OrchestratorDependencies = {},
  ) {
    const normalizedSeed = normalizeUrl(seedUrl);
    if (!normalizedSeed) {
      throw createConfigurationError('Unable to normalize the starting URL.', { startUrl: seedUrl });
    }

    this.seed = new URL(normalizedSeed);
    this.logger = (deps.logger ?? getLogger()).child({ component: 'orchestrator' });
    this.parser = deps.parser ?? htmlLinkExtractor;
    this.handlers = deps.handlers ?? NOOP_HANDLERS;
    this.frontier = new Frontier(normalizedSeed, {
      scope: options.scope,
      maxPages: options.maxPages,
    });
    this.stats = initializeStats(0);
    this.limiter = new RateLimiter({ rate: options.rateLimit, burst: options.burst });

    const baseLogger = deps.logger ?? getLogger();
    this.robots = new RobotsGate({
      load: (robotsUrl) =>
        this.fetcher.fetch(robotsUrl, {
          bypassRobots: true,
          retryTimes: 0,
          timeoutMs: options.robotsTimeoutMs,
        }),
      policy: options.robotsPolicy,
      logger: baseLogger,
    });
    this.fetcher = new Fetcher({
      userAgent: options.userAgent,
      timeoutMs: options.timeoutMs,
      retryTimes: options.retryTimes,
      retryBaseDelayMs: options.retryBaseDelayMs,
      retryMaxDelayMs: options.retryMaxDelayMs,
      limiter: this.limiter,
      robots: this.robots,
      logger: baseLogger,
      fetchImpl: deps.fetchImpl,
      signal: this.controller.signal,
    });
  }

  get state(): CrawlState {
    return this.currentState;
  }

  get seedUrl(): string {
    return this.seed.href;
  }

  /** Stops dispatch and aborts in-flight fetches; `crawl()` resolves with what finished. */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.controller.abort();
  }

  async crawl(): Promise<PageResult[]> {
    if (this.currentState !== 'idle') {
      throw createInternalError('A crawl orchestrator can only run once.', {
        state: this.currentState,
      });
    }

    this.currentState = 'running';
    this.startTime = Date.now();
    this.attachCancellation();

    try {
      this.frontier.enqueue(this.seed.href, 0);
      this.stats.peakFrontierSize = this.frontier.pending;
      await this.applyCrawlDelay();

      for (let depth = 0; depth <= this.options.maxDepth; depth += 1) {
        if (this.cancelled || !this.frontier.hasPending(depth)) {
          break;
        }
        await this.runLevel(depth);
      }

      this.transition('draining');
      const dropped = this.frontier.discardPending();
      if (dropped > 0) {
        this.logger.debug({ dropped }, 'Discarded pending frontier entries');
      }
      this.transition('done');

      this.handlers.onComplete?.(this.summary());
      return [...this.results];
    } catch (error) {
      const crawlerError = ensureCrawlerError(error, { kind: 'internal' });
      if (crawlerError.kind === 'cancelled') {
        this.transition('done');
        this.handlers.onComplete?.(this.summary());
        return [...this.results];
      }

      this.cancel();
      this.transition('done');
      throw reportCrawlerError(crawlerError, { stage: 'crawl' }, {
        throwOnFatal: false,
        logger: this.logger,
      });
    } finally {
      this.limiter.dispose();
      this.detachCancellation();
    }
  }

  summary(): CrawlSummary {
    return buildCrawlSummary({
      stats: this.stats,
      frontier: this.frontier,
      failures: this.failures,
      startTime: this.startTime,
      cancelled: this.cancelled,
    });
  }

  private async runLevel(depth: number): Promise<void> {
    const urls = this.frontier.drainLevel(depth);
    const limit = pLimit(this.options.concurrency);
    this.logger.debug({ depth, urls: urls.length }, 'Dispatching depth level');

    const fetched = await Promise.all(urls.map((url) => limit(() => this.fetchOne(url))));

    const level: LevelSummary = { depth, dispatched: 0, succeeded: 0, failed: 0, enqueuedNext: 0 };

    // Results are handled in drain order, not completion order.
    for (const [index, url] of urls.entries()) {
      const result = fetched[index];
      if (!result) {
        continue;
      }

      if (depth === 0) {
        await this.assertSeedReachable(url, result);
      }

      const page = this.completePage(url, depth, result);
      level.dispatched += 1;
      if (page.fetch.error) {
        level.failed += 1;
      } else {
        level.succeeded += 1;
      }
    }

    level.enqueuedNext = this.frontier.pending;
    this.stats.peakFrontierSize = Math.max(this.stats.peakFrontierSize, this.frontier.pending);

    if (!this.cancelled) {
      this.stats.levelsCompleted += 1;
      this.handlers.onLevel?.(level);
    }
  }

  private async fetchOne(url: string): Promise<FetchResult | undefined> {
    if (this.cancelled) {
      return undefined;
    }

    this.runningCount += 1;
    this.stats.actualMaxConcurrency = Math.max(this.stats.actualMaxConcurrency, this.runningCount);

    try {
      return await this.fetcher.fetch(url);
    } catch (error) {
      const crawlerError = ensureCrawlerError(error, { kind: 'internal' });
      if (crawlerError.kind === 'cancelled') {
        return undefined;
      }
      throw crawlerError;
    } finally {
      this.runningCount -= 1;
    }
  }

  private async assertSeedReachable(url: string, result: FetchResult): Promise<void> {
    if (isUnreachable(result)) {
      const reason = result.error?.message ?? 'unknown error';
      throw createSeedError(
        `Seed URL is unreachable: ${reason}`,
        { url, attempts: result.attempts },
        { cause: result.error },
      );
    }

    if (result.error?.kind !== 'forbidden') {
      return;
    }

    // Under fail-closed a dead host surfaces as a denied seed; the robots load tells them apart.
    const entry = await this.robots.rulesFor(this.seed.origin);
    if (entry.source === 'unreachable' && entry.status === null) {
      const reason = entry.error?.message ?? 'robots.txt request failed';
      throw createSeedError(
        `Seed URL is unreachable: ${reason}`,
        { url, robotsUrl: `${entry.origin}/robots.txt` },
        { cause: entry.error },
      );
    }
  }

  private completePage(url: string, depth: number, result: FetchResult): PageResult {
    const page: PageResult = { url, depth, links: [], fetch: result };

    if (result.finalUrl !== url) {
      this.frontier.markSeen(result.finalUrl);
    }

    if (result.error) {
      this.recordFailure(page, result.error, 'fetch');
    } else if (result.content?.kind === 'text') {
      page.links = this.extractLinks(page, result);
    }

    recordPageMetrics(this.stats, page);
    this.results.push(page);
    this.handlers.onPage(page);
    return page;
  }

  private extractLinks(page: PageResult, result: FetchResult): string[] {
    let rawLinks: string[];
    try {
      rawLinks = this.parser.extractLinks(result);
    } catch (error) {
      const crawlerError = ensureCrawlerError(error, { kind: 'parse', severity: 'recoverable' });
      this.recordFailure(page, crawlerError, 'parse');
      return [];
    }

    const links = new Set<string>();
    const canEnqueue = page.depth + 1 <= this.options.maxDepth && !this.cancelled;

    for (const raw of rawLinks) {
      const normalized = normalizeUrl(raw, result.finalUrl);
      if (!normalized) {
        continue;
      }

      if (canEnqueue) {
        this.frontier.enqueue(normalized, page.depth + 1);
      }

      if (inScope(this.seed, normalized, this.options.scope)) {
        links.add(normalized);
      }
    }

    return [...links];
  }

  private recordFailure(page: PageResult, error: CrawlerError, stage: string): void {
    this.failures.record(page, error);
    reportCrawlerError(
      error,
      { stage, url: page.url, depth: page.depth, attempts: page.fetch.attempts },
      { throwOnFatal: false, logger: this.logger },
    );
    this.handlers.onError?.(error, { url: page.url, depth: page.depth });
  }

  private async applyCrawlDelay(): Promise<void> {
    if (!this.options.respectCrawlDelay) {
      return;
    }

    const delayMs = await this.robots.crawlDelayMs(this.seed.href, this.options.userAgent);
    if (delayMs === undefined || delayMs <= 0) {
      return;
    }

    const rate = 1_000 / delayMs;
    if (rate < this.limiter.currentRate) {
      this.logger.info({ crawlDelayMs: delayMs, rate }, 'Slowing down to honour Crawl-delay');
      this.limiter.updateRate(rate);
    }
  }

  private transition(next: CrawlState): void {
    this.logger.debug({ from: this.currentState, to: next }, 'Crawl state transition');
    this.currentState = next;
  }

  private attachCancellation(): void {
    const { signal } = this.deps;
    if (signal) {
      if (signal.aborted) {
        this.cancel();
      } else {
        signal.addEventListener('abort', this.callerAbortHandler, { once: true });
      }
    }

    if ((this.deps.handleSigint ?? true) && typeof process.once === 'function') {
      process.once('SIGINT', this.sigintHandler);
      this.sigintAttached = true;
    }
  }

  private detachCancellation(): void {
    this.deps.signal?.removeEventListener('abort', this.callerAbortHandler);

    if (this.sigintAttached) {
      process.removeListener('SIGINT', this.sigintHandler);
      this.sigintAttached = false;
    }
  }
}

function isUnreachable(result: FetchResult): boolean {
  return result.status === null && result.error?.kind === 'transient';
}
