import type { CrawlSummary, LevelSummary, OutputFormat, PageResult } from '../types.js';

let quietMode = false;
let outputFormat: OutputFormat = 'text';

export function setOutputConfig(config: { quiet: boolean; format: OutputFormat }): void {
  quietMode = config.quiet;
  outputFormat = config.format;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false, format: 'text' });
}

export function writePage(page: PageResult): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(outputFormat === 'json' ? renderJsonLine(pageRecord(page)) : renderText(page));
}

/** Quiet mode replaces per-page output with one line per finished depth level. */
export function writeLevel(level: LevelSummary): void {
  if (!quietMode) {
    return;
  }

  process.stdout.write(
    outputFormat === 'json'
      ? renderJsonLine({ type: 'level', ...level })
      : `${renderLevelLine(level)}\n`,
  );
}

export function writeSummary(summary: CrawlSummary): void {
  process.stdout.write(
    outputFormat === 'json'
      ? renderJsonLine({ type: 'summary', ...summary })
      : renderTextSummary(summary),
  );
}

export function logError(message: string): void {
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function renderText(page: PageResult): string {
  const { fetch } = page;
  const status = fetch.status === null ? '---' : String(fetch.status);
  const header = [`VISITED: ${page.url}`, `[depth ${page.depth}]`, status];

  if (fetch.contentType) {
    header.push(fetch.contentType);
  }

  const lines: string[] = [header.join(' ')];

  if (fetch.finalUrl !== page.url) {
    lines.push(`  > redirected to ${fetch.finalUrl}`);
  }

  if (fetch.error) {
    lines.push(`  ! ${fetch.error.name}: ${fetch.error.message}`);
  } else if (fetch.content?.kind === 'binary') {
    const note = fetch.content.supported ? 'document' : 'unsupported content';
    lines.push(`  * binary ${note}, ${fetch.content.bytes.byteLength} bytes`);
  }

  for (const link of page.links) {
    lines.push(`  - ${link}`);
  }

  return `${lines.join('\n')}\n`;
}

export function renderLevelLine(level: LevelSummary): string {
  return [
    `[depth ${level.depth}]`,
    `fetched:${level.dispatched}`,
    `ok:${level.succeeded}`,
    `fail:${level.failed}`,
    `next:${level.enqueuedNext}`,
  ].join(' ');
}

export function pageRecord(page: PageResult): Record<string, unknown> {
  const { fetch } = page;
  return {
    type: 'page',
    url: page.url,
    finalUrl: fetch.finalUrl,
    depth: page.depth,
    status: fetch.status,
    contentType: fetch.contentType ?? null,
    content: describeContent(page),
    attempts: fetch.attempts,
    error: fetch.error ? { kind: fetch.error.kind, message: fetch.error.message } : null,
    links: page.links,
  };
}

function describeContent(page: PageResult): Record<string, unknown> | null {
  const content = page.fetch.content;
  if (!content) {
    return null;
  }

  if (content.kind === 'text') {
    return { kind: 'text', length: content.text.length };
  }

  return { kind: 'binary', bytes: content.bytes.byteLength, supported: content.supported };
}

function renderJsonLine(record: Record<string, unknown>): string {
  return `${JSON.stringify(record)}\n`;
}

export function renderTextSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Pages fetched: ${summary.pagesFetched}`,
    `Successful pages: ${summary.pagesSucceeded}`,
    `Failed pages: ${summary.pagesFailed}`,
    `Forbidden by robots.txt: ${summary.pagesForbidden}`,
    `Client errors: ${summary.clientErrors}`,
    `Transient failures: ${summary.transientFailures}`,
    `Binary pages: ${summary.binaryPages} (unsupported: ${summary.unsupportedContent})`,
    `Unique URLs discovered: ${summary.uniqueUrlsDiscovered}`,
    `Duplicates filtered: ${summary.duplicatesFiltered}`,
    `Out of scope filtered: ${summary.outOfScopeFiltered}`,
    `Rejected by page cap: ${summary.capRejected}`,
    `Total links extracted: ${summary.totalLinksExtracted}`,
    `Max depth reached: ${summary.maxDepth}`,
    `Levels completed: ${summary.levelsCompleted}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Peak frontier size: ${summary.peakFrontierSize}`,
    `Retry attempts: ${summary.retryAttempts}`,
    `Cancelled: ${summary.cancelled ? 'yes' : 'no'}`,
  ];

  const statusEntries = Object.entries(summary.statusCounts).sort(
    ([statusA], [statusB]) => Number(statusA) - Number(statusB),
  );

  if (statusEntries.length > 0) {
    lines.push('Status codes:');
    for (const [status, count] of statusEntries) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  const failureEntries = Object.entries(summary.failureReasons).sort(
    ([, countA], [, countB]) => countB - countA,
  );

  if (failureEntries.length > 0) {
    lines.push('Failure reasons:');
    for (const [reason, count] of failureEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  if (summary.failureLog.length > 0) {
    lines.push('Failure log:');
    for (const event of summary.failureLog) {
      lines.push(
        `  [${event.kind}] ${event.url} (depth ${event.depth}, attempts ${event.attempts}) - ${event.reason}`,
      );
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 999.5) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 9.995) {
    return `${seconds.toFixed(2)}s`;
  }

  // Round once to the displayed precision so carries reach the minutes.
  const tenths = Math.round(seconds * 10);
  if (tenths < 600) {
    return `${(tenths / 10).toFixed(1)}s`;
  }

  let minutes = Math.floor(tenths / 600);
  const remainingTenths = tenths - minutes * 600;
  if (remainingTenths < 100) {
    return `${minutes}m ${(remainingTenths / 10).toFixed(1)}s`;
  }

  const wholeSeconds = Math.round(remainingTenths / 10);
  if (wholeSeconds === 60) {
    minutes += 1;
    return `${minutes}m 0.0s`;
  }
  return `${minutes}m ${wholeSeconds}s`;
}
