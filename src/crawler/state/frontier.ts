import type { CrawlScope } from '../../types.js';
import { normalizeUrl } from '../url/normalizeUrl.js';
import { inScope } from '../url/scope.js';

export interface FrontierOptions {
  scope: CrawlScope;
  maxPages?: number;
}

export type EnqueueRejection = 'invalid' | 'duplicate' | 'out-of-scope' | 'cap';

/**
 * Visited set plus per-depth pending lists. A URL is recorded as seen the
 * moment it is enqueued, so it can be drained at most once per run.
 */
export class Frontier {
  private readonly seen = new Set<string>();
  private readonly levels = new Map<number, string[]>();
  private readonly seed: URL;
  private pendingCount = 0;
  private enqueuedCount = 0;

  readonly rejections: Record<EnqueueRejection, number> = {
    invalid: 0,
    duplicate: 0,
    'out-of-scope': 0,
    cap: 0,
  };

  constructor(seedUrl: string, private readonly options: FrontierOptions) {
    this.seed = new URL(seedUrl);
  }

  enqueue(url: string, depth: number): boolean {
    return this.tryEnqueue(url, depth) === undefined;
  }

  /** Same as {@link enqueue} but reports why a URL was turned away. */
  tryEnqueue(url: string, depth: number): EnqueueRejection | undefined {
    const normalized = normalizeUrl(url, this.seed);
    if (!normalized) {
      return this.reject('invalid');
    }

    if (this.seen.has(normalized)) {
      return this.reject('duplicate');
    }

    if (!inScope(this.seed, normalized, this.options.scope)) {
      return this.reject('out-of-scope');
    }

    if (this.isFull()) {
      return this.reject('cap');
    }

    this.seen.add(normalized);
    const level = this.levels.get(depth);
    if (level) {
      level.push(normalized);
    } else {
      this.levels.set(depth, [normalized]);
    }
    this.pendingCount += 1;
    this.enqueuedCount += 1;
    return undefined;
  }

  /** Removes and returns everything queued for `depth`, in enqueue order. */
  drainLevel(depth: number): string[] {
    const level = this.levels.get(depth) ?? [];
    this.levels.delete(depth);
    this.pendingCount -= level.length;
    return level;
  }

  /**
   * Records a URL (e.g. a redirect target) as seen without queueing it.
   * Does not count against the page cap.
   */
  markSeen(url: string): void {
    const normalized = normalizeUrl(url, this.seed);
    if (normalized) {
      this.seen.add(normalized);
    }
  }

  hasSeen(url: string): boolean {
    const normalized = normalizeUrl(url, this.seed);
    return normalized !== null && this.seen.has(normalized);
  }

  hasPending(depth?: number): boolean {
    if (depth === undefined) {
      return this.pendingCount > 0;
    }
    return (this.levels.get(depth)?.length ?? 0) > 0;
  }

  /** Drops every pending entry; the visited set is left untouched. */
  discardPending(): number {
    const dropped = this.pendingCount;
    this.levels.clear();
    this.pendingCount = 0;
    return dropped;
  }

  get pending(): number {
    return this.pendingCount;
  }

  get uniqueCount(): number {
    return this.seen.size;
  }

  private isFull(): boolean {
    return this.options.maxPages !== undefined && this.enqueuedCount >= this.options.maxPages;
  }

  private reject(reason: EnqueueRejection): EnqueueRejection {
    this.rejections[reason] += 1;
    return reason;
  }
}
