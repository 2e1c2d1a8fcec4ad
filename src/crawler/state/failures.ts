import type { CrawlerError } from '../../errors.js';
import type { FailureEvent, PageResult } from '../../types.js';

export class FailureTracker {
  private readonly log: FailureEvent[] = [];

  record(page: PageResult, error: CrawlerError): FailureEvent {
    const event = createFailureEvent(page, error);
    this.log.push(event);
    return event;
  }

  list(): FailureEvent[] {
    return this.log;
  }

  get size(): number {
    return this.log.length;
  }
}

export function createFailureEvent(page: PageResult, error: CrawlerError): FailureEvent {
  return {
    url: page.url,
    depth: page.depth,
    kind: error.kind,
    reason: error.message,
    attempts: page.fetch.attempts,
  };
}
