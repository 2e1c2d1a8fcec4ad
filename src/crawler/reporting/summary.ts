import type { CrawlSummary } from '../../types.js';
import type { FailureTracker } from '../state/failures.js';
import type { Frontier } from '../state/frontier.js';
import type { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  stats: CrawlStats;
  frontier: Frontier;
  failures: FailureTracker;
  startTime: number;
  cancelled: boolean;
  now?: number;
}): CrawlSummary {
  const { stats, frontier, failures, startTime, cancelled, now = Date.now() } = options;

  return {
    pagesFetched: stats.pagesFetched,
    pagesSucceeded: stats.pagesSucceeded,
    pagesFailed: stats.pagesFailed,
    pagesForbidden: stats.pagesForbidden,
    clientErrors: stats.clientErrors,
    transientFailures: stats.transientFailures,
    unsupportedContent: stats.unsupportedContent,
    binaryPages: stats.binaryPages,
    uniqueUrlsDiscovered: frontier.uniqueCount,
    duplicatesFiltered: frontier.rejections.duplicate,
    outOfScopeFiltered: frontier.rejections['out-of-scope'],
    capRejected: frontier.rejections.cap,
    totalLinksExtracted: stats.totalLinksExtracted,
    maxDepth: stats.maxDepth,
    levelsCompleted: stats.levelsCompleted,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([status, count]) => [String(status), count]),
    ),
    failureReasons: Object.fromEntries(stats.failureReasons.entries()),
    retryAttempts: stats.retryAttempts,
    actualMaxConcurrency: stats.actualMaxConcurrency,
    peakFrontierSize: stats.peakFrontierSize,
    durationMs: now - startTime,
    cancelled,
    failureLog: [...failures.list()],
  };
}
