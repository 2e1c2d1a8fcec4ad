import type { CrawlHandlers } from '../../types.js';
import { writeLevel, writePage, writeSummary } from '../../util/output.js';

export function createDefaultHandlers(): CrawlHandlers {
  return {
    onPage: writePage,
    onLevel: writeLevel,
    onComplete: writeSummary,
  };
}
