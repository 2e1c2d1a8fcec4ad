#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { loadConfigFile } from './config.js';
import { createDefaultHandlers } from './crawler/handlers/defaultHandlers.js';
import { createConfigurationError } from './errors.js';
import {
  VALID_FORMATS,
  VALID_ROBOTS_POLICIES,
  VALID_SCOPES,
  crawlOrchestrator,
  resolveOptions,
} from './index.js';
import { configureLogger, getLogger } from './logger.js';
import type { CrawlOrchestratorOptions } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';
import { logError, resetOutputConfig, setOutputConfig } from './util/output.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version?: string };

const program = new Command();

program
  .name('sitewalk')
  .description('Crawl a website breadth-first and report every page outcome.')
  .version(pkg.version ?? '0.0.0');

program
  .command('crawl')
  .description('Start crawling from the provided URL.')
  .argument('[startUrl]', 'Starting URL for the crawl (may also come from --config).')
  .option('--config <path>', 'JSON file with crawl options; flags override its values.')
  .option('--max-depth <number>', 'Deepest link level to follow from the seed. (default: 2)')
  .option('--max-pages <number>', 'Stop queueing new URLs once this many pages are known.')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 10000)')
  .option('--rate-limit <number>', 'Requests per second across the whole crawl. (default: 2)')
  .option('--burst <number>', 'Requests allowed back-to-back before pacing. (default: rate limit)')
  .option('--user-agent <string>', 'User-Agent header and robots.txt identity. (default: sitewalk/1.0)')
  .option('--retry-times <number>', 'Extra attempts for 5xx and network failures. (default: 1)')
  .option('--retry-base-delay-ms <number>', 'First retry backoff, doubled per attempt. (default: 1000)')
  .option('--retry-max-delay-ms <number>', 'Upper bound for a single backoff. (default: 30000)')
  .option('--concurrency <number>', 'Maximum number of concurrent requests. (default: 8)')
  .option('--scope <scope>', 'same-domain, same-subdomain or unrestricted. (default: same-domain)')
  .option('--robots-policy <policy>', 'fail-open or fail-closed when robots.txt is unreachable.')
  .option('--no-crawl-delay', 'Ignore the Crawl-delay directive of the seed origin.')
  .option('--quiet', 'Suppress per-page output and print one progress line per depth level.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal).')
  .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
  .action(async (startUrl: string | undefined, options: Record<string, unknown>) => {
    try {
      await runCrawl(startUrl, options);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

async function runCrawl(startUrl: string | undefined, rawOptions: Record<string, unknown>): Promise<void> {
  const fromFile =
    rawOptions.config !== undefined ? await loadConfigFile(String(rawOptions.config)) : undefined;
  const seed = startUrl ?? fromFile?.startUrl;
  if (!seed) {
    throw createConfigurationError('A start URL is required (argument or "startUrl" in --config).');
  }

  const config: CrawlOrchestratorOptions = { ...fromFile?.options, ...buildConfig(rawOptions) };
  const options = resolveOptions(config);

  configureLogger({ level: options.logLevel });
  setOutputConfig({ quiet: options.quiet, format: options.format });

  try {
    await crawlOrchestrator(seed, {
      ...options,
      logger: getLogger(),
      handlers: createDefaultHandlers(),
    });
  } finally {
    resetOutputConfig();
  }
}

function buildConfig(rawOptions: Record<string, unknown>): CrawlOrchestratorOptions {
  const config: CrawlOrchestratorOptions = {};

  if (rawOptions.maxDepth !== undefined) {
    config.maxDepth = asNumber(rawOptions.maxDepth, 'max-depth');
  }

  if (rawOptions.maxPages !== undefined) {
    config.maxPages = asNumber(rawOptions.maxPages, 'max-pages');
  }

  if (rawOptions.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.rateLimit !== undefined) {
    config.rateLimit = asNumber(rawOptions.rateLimit, 'rate-limit');
  }

  if (rawOptions.burst !== undefined) {
    config.burst = asNumber(rawOptions.burst, 'burst');
  }

  if (rawOptions.userAgent !== undefined) {
    config.userAgent = String(rawOptions.userAgent);
  }

  if (rawOptions.retryTimes !== undefined) {
    config.retryTimes = asNumber(rawOptions.retryTimes, 'retry-times');
  }

  if (rawOptions.retryBaseDelayMs !== undefined) {
    config.retryBaseDelayMs = asNumber(rawOptions.retryBaseDelayMs, 'retry-base-delay-ms');
  }

  if (rawOptions.retryMaxDelayMs !== undefined) {
    config.retryMaxDelayMs = asNumber(rawOptions.retryMaxDelayMs, 'retry-max-delay-ms');
  }

  if (rawOptions.concurrency !== undefined) {
    config.concurrency = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.scope !== undefined) {
    config.scope = pick(rawOptions.scope, VALID_SCOPES, 'scope');
  }

  if (rawOptions.robotsPolicy !== undefined) {
    config.robotsPolicy = pick(rawOptions.robotsPolicy, VALID_ROBOTS_POLICIES, 'robots-policy');
  }

  // commander turns --no-crawl-delay into crawlDelay: false.
  if (rawOptions.crawlDelay === false) {
    config.respectCrawlDelay = false;
  }

  if (rawOptions.format !== undefined) {
    config.format = pick(rawOptions.format, VALID_FORMATS, 'format');
  }

  if (rawOptions.quiet === true) {
    config.quiet = true;
  }

  if (rawOptions.logLevel !== undefined) {
    config.logLevel = String(rawOptions.logLevel);
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function pick<T extends string>(value: unknown, allowed: readonly T[], label: string): T {
  const normalized = String(value).toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw createConfigurationError(`Unsupported ${label}: ${normalized}`, { value: normalized, allowed });
  }

  return match;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'internal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}
