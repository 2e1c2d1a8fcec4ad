import type { PageResult } from '../../types.js';

export interface CrawlStats {
  pagesFetched: number;
  pagesSucceeded: number;
  pagesFailed: number;
  pagesForbidden: number;
  clientErrors: number;
  transientFailures: number;
  unsupportedContent: number;
  binaryPages: number;
  maxDepth: number;
  levelsCompleted: number;
  totalLinksExtracted: number;
  statusCounts: Map<number, number>;
  failureReasons: Map<string, number>;
  retryAttempts: number;
  actualMaxConcurrency: number;
  peakFrontierSize: number;
}

export function initializeStats(initialFrontierSize: number): CrawlStats {
  return {
    pagesFetched: 0,
    pagesSucceeded: 0,
    pagesFailed: 0,
    pagesForbidden: 0,
    clientErrors: 0,
    transientFailures: 0,
    unsupportedContent: 0,
    binaryPages: 0,
    maxDepth: 0,
    levelsCompleted: 0,
    totalLinksExtracted: 0,
    statusCounts: new Map<number, number>(),
    failureReasons: new Map<string, number>(),
    retryAttempts: 0,
    actualMaxConcurrency: 0,
    peakFrontierSize: initialFrontierSize,
  };
}

export function recordPageMetrics(stats: CrawlStats, page: PageResult): void {
  const { fetch } = page;

  stats.pagesFetched += 1;
  stats.maxDepth = Math.max(stats.maxDepth, page.depth);
  stats.totalLinksExtracted += page.links.length;
  stats.retryAttempts += Math.max(0, fetch.attempts - 1);

  if (typeof fetch.status === 'number') {
    increment(stats.statusCounts, fetch.status);
  }

  if (!fetch.error) {
    stats.pagesSucceeded += 1;
    if (fetch.content?.kind === 'binary') {
      stats.binaryPages += 1;
      if (!fetch.content.supported) {
        stats.unsupportedContent += 1;
      }
    }
    return;
  }

  stats.pagesFailed += 1;
  increment(stats.failureReasons, fetch.error.message);

  switch (fetch.error.kind) {
    case 'forbidden':
      stats.pagesForbidden += 1;
      break;
    case 'client':
      stats.clientErrors += 1;
      break;
    case 'transient':
      stats.transientFailures += 1;
      break;
    default:
      break;
  }
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}
