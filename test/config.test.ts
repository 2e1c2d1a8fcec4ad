import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadConfigFile, parseConfigObject } from '../src/config.js';
import { CrawlerError } from '../src/errors.js';
import { DEFAULT_OPTIONS, resolveOptions, validateStartUrl } from '../src/index.js';

describe('resolveOptions', () => {
  it('fills in defaults', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it('derives the burst from the rate limit', () => {
    expect(resolveOptions({ rateLimit: 5 }).burst).toBe(5);
    expect(resolveOptions({ rateLimit: 0.5 }).burst).toBe(1);
    expect(resolveOptions({ rateLimit: 5, burst: 2 }).burst).toBe(2);
  });

  it('rejects fractional integer options', () => {
    expect(() => resolveOptions({ maxDepth: 1.9 })).toThrowError(
      'max-depth must be zero or a positive integer.',
    );
    expect(() => resolveOptions({ retryTimes: 2.5 })).toThrowError(
      'retry-times must be zero or a positive integer.',
    );
    expect(() => resolveOptions({ maxPages: 10.9 })).toThrowError('max-pages must be a positive integer.');
    expect(() => resolveOptions({ concurrency: 3.7 })).toThrowError(
      'concurrency must be a positive integer.',
    );
  });

  it('keeps whole-number values as given', () => {
    expect(resolveOptions({ maxDepth: 0, retryTimes: 3, maxPages: 10 })).toMatchObject({
      maxDepth: 0,
      retryTimes: 3,
      maxPages: 10,
    });
  });

  it('rejects out-of-range values as configuration errors', () => {
    expect(() => resolveOptions({ concurrency: 0 })).toThrowError('concurrency must be a positive integer.');
    expect(() => resolveOptions({ maxDepth: -1 })).toThrowError(
      'max-depth must be zero or a positive integer.',
    );
    expect(() => resolveOptions({ rateLimit: Number.NaN })).toThrowError(
      'rate-limit must be greater than zero.',
    );
    expect(() => resolveOptions({ userAgent: '   ' })).toThrowError('user-agent must not be empty.');
    expect(() => resolveOptions({ logLevel: 'loud' })).toThrowError('Unsupported log-level: loud');
  });

  it('requires the backoff cap to be at least the base delay', () => {
    expect(() => resolveOptions({ retryBaseDelayMs: 500, retryMaxDelayMs: 100 })).toThrowError(
      'retry-max-delay-ms must not be below retry-base-delay-ms.',
    );
  });

  it('raises fatal config errors', () => {
    try {
      resolveOptions({ timeoutMs: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CrawlerError);
      expect(error).toMatchObject({ kind: 'config', severity: 'fatal', name: 'ConfigError' });
    }
  });
});

describe('validateStartUrl', () => {
  it('accepts http and https URLs', () => {
    expect(validateStartUrl('https://example.com/docs').href).toBe('https://example.com/docs');
  });

  it('rejects other protocols and garbage', () => {
    expect(() => validateStartUrl('ftp://example.com')).toThrowError(
      'Start URL must use http or https protocol.',
    );
    expect(() => validateStartUrl('example')).toThrowError('Invalid URL: example');
  });
});

describe('parseConfigObject', () => {
  it('maps known keys onto options', () => {
    const loaded = parseConfigObject({
      startUrl: 'https://example.com/',
      maxDepth: 3,
      rateLimit: 1.5,
      scope: 'same-subdomain',
      robotsPolicy: 'fail-closed',
      respectCrawlDelay: false,
      userAgent: 'docs-bot/2.0',
      format: 'json',
    });

    expect(loaded).toEqual({
      startUrl: 'https://example.com/',
      options: {
        maxDepth: 3,
        rateLimit: 1.5,
        scope: 'same-subdomain',
        robotsPolicy: 'fail-closed',
        respectCrawlDelay: false,
        userAgent: 'docs-bot/2.0',
        format: 'json',
      },
    });
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfigObject({ depth: 2 })).toThrowError(
      "Invalid config in config: Unrecognized key(s) in object: 'depth'",
    );
  });

  it('rejects mistyped values and names the offending key', () => {
    expect(() => parseConfigObject({ maxDepth: '2' }, 'crawl.json')).toThrowError(
      'Invalid config in crawl.json: maxDepth: Expected number, received string',
    );
    expect(() => parseConfigObject({ quiet: 'yes' })).toThrowError(
      'Invalid config in config: quiet: Expected boolean, received string',
    );
    expect(() => parseConfigObject({ scope: 'everywhere' })).toThrowError(
      "Invalid config in config: scope: Invalid enum value. Expected 'same-domain' | 'same-subdomain' | 'unrestricted', received 'everywhere'",
    );
  });

  it('carries the issue path on the configuration error', () => {
    try {
      parseConfigObject({ robotsPolicy: 'sometimes' }, 'crawl.json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CrawlerError);
      expect(error).toMatchObject({
        kind: 'config',
        severity: 'fatal',
        details: { source: 'crawl.json', path: 'robotsPolicy', issues: 1 },
      });
    }
  });

  it('requires a JSON object', () => {
    expect(() => parseConfigObject([1, 2], 'crawl.json')).toThrowError(
      'Invalid config in crawl.json: Expected object, received array',
    );
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sitewalk-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads options from a JSON file', async () => {
    const path = join(dir, 'crawl.json');
    await writeFile(path, JSON.stringify({ startUrl: 'https://example.com/', concurrency: 2 }));

    await expect(loadConfigFile(path)).resolves.toEqual({
      startUrl: 'https://example.com/',
      options: { concurrency: 2 },
    });
  });

  it('reports unreadable and malformed files', async () => {
    const missing = join(dir, 'missing.json');
    await expect(loadConfigFile(missing)).rejects.toMatchObject({
      kind: 'config',
      message: `Unable to read config file: ${missing}`,
    });

    const broken = join(dir, 'broken.json');
    await writeFile(broken, '{ "maxDepth": ');
    await expect(loadConfigFile(broken)).rejects.toMatchObject({
      kind: 'config',
      message: `Config file is not valid JSON: ${broken}`,
    });
  });
});
