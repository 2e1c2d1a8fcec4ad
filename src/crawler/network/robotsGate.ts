import { ensureCrawlerError, type CrawlerError } from '../../errors.js';
import type { LoggerLike } from '../../logger.js';
import type { FetchResult, RobotsPolicy } from '../../types.js';
import {
  EMPTY_RULES,
  crawlDelaySeconds,
  isPathAllowed,
  parseRobotsTxt,
  type RobotsRuleSet,
} from '../parsing/robotsTxt.js';

export type RobotsSource = 'fetched' | 'missing' | 'unreachable';

export interface RobotsEntry {
  origin: string;
  rules: RobotsRuleSet;
  source: RobotsSource;
  /** HTTP status of the robots.txt response; null when no response arrived. */
  status: number | null;
  /** Why the load failed, for unreachable origins. */
  error?: CrawlerError;
  fetchedAt: number;
  /** Set when the origin is unreachable under the fail-closed policy. */
  denyAll: boolean;
}

export interface RobotsGateOptions {
  /** Fetches robots.txt; must not consult the gate itself. */
  load: (robotsUrl: string) => Promise<FetchResult>;
  policy?: RobotsPolicy;
  logger: LoggerLike;
  now?: () => number;
}

/**
 * Per-origin robots.txt cache for one crawl run. The first lookup for an
 * origin fetches its robots.txt; concurrent lookups share that fetch, and a
 * failed fetch is cached like any other outcome.
 */
export class RobotsGate {
  private readonly cache = new Map<string, Promise<RobotsEntry>>();
  private readonly policy: RobotsPolicy;
  private readonly logger: LoggerLike;
  private readonly now: () => number;

  constructor(private readonly options: RobotsGateOptions) {
    this.policy = options.policy ?? 'fail-open';
    this.logger = options.logger.child({ component: 'robots' });
    this.now = options.now ?? Date.now;
  }

  async isAllowed(url: string, userAgent: string): Promise<boolean> {
    const target = new URL(url);
    const entry = await this.rulesFor(target.origin);

    if (entry.denyAll) {
      return false;
    }

    return isPathAllowed(entry.rules, `${target.pathname}${target.search}`, userAgent);
  }

  async crawlDelayMs(url: string, userAgent: string): Promise<number | undefined> {
    const entry = await this.rulesFor(new URL(url).origin);
    const seconds = crawlDelaySeconds(entry.rules, userAgent);
    return seconds === undefined ? undefined : seconds * 1_000;
  }

  rulesFor(origin: string): Promise<RobotsEntry> {
    const cached = this.cache.get(origin);
    if (cached) {
      return cached;
    }

    const pending = this.fetchEntry(origin).catch((error: unknown) => {
      // A rejected load (cancellation) is not cached.
      this.cache.delete(origin);
      throw error;
    });
    this.cache.set(origin, pending);
    return pending;
  }

  get cachedOrigins(): number {
    return this.cache.size;
  }

  private async fetchEntry(origin: string): Promise<RobotsEntry> {
    const robotsUrl = `${origin}/robots.txt`;
    const result = await this.options.load(robotsUrl);

    if (result.status !== null && result.status >= 200 && result.status < 300 && result.content) {
      const text =
        result.content.kind === 'text'
          ? result.content.text
          : new TextDecoder('utf-8', { fatal: false }).decode(result.content.bytes);
      const rules = safeParse(text, this.logger, robotsUrl);
      this.logger.debug({ robotsUrl, groups: rules.groups.length }, 'Loaded robots.txt');
      return this.entry(origin, rules, 'fetched', false, result);
    }

    if (result.status !== null && result.status >= 400 && result.status < 500) {
      this.logger.debug({ robotsUrl, status: result.status }, 'No robots.txt; all paths allowed');
      return this.entry(origin, EMPTY_RULES, 'missing', false, result);
    }

    const denyAll = this.policy === 'fail-closed';
    this.logger.warn(
      { robotsUrl, status: result.status, reason: result.error?.message, policy: this.policy },
      denyAll
        ? 'robots.txt unavailable; denying all paths for origin'
        : 'robots.txt unavailable; allowing all paths for origin',
    );
    return this.entry(origin, EMPTY_RULES, 'unreachable', denyAll, result);
  }

  private entry(
    origin: string,
    rules: RobotsRuleSet,
    source: RobotsSource,
    denyAll: boolean,
    result: FetchResult,
  ): RobotsEntry {
    return {
      origin,
      rules,
      source,
      status: result.status,
      error: source === 'unreachable' ? result.error : undefined,
      fetchedAt: this.now(),
      denyAll,
    };
  }
}

function safeParse(text: string, logger: LoggerLike, robotsUrl: string): RobotsRuleSet {
  try {
    return parseRobotsTxt(text);
  } catch (error) {
    const crawlerError = ensureCrawlerError(error, { kind: 'parse', severity: 'recoverable' });
    logger.warn({ robotsUrl, reason: crawlerError.message }, 'Malformed robots.txt ignored');
    return EMPTY_RULES;
  }
}
