import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { createConfigurationError } from './errors.js';
import { VALID_FORMATS, VALID_ROBOTS_POLICIES, VALID_SCOPES } from './index.js';
import type { CrawlOrchestratorOptions } from './types.js';

export const CrawlConfigSchema = z
  .object({
    startUrl: z.string().optional(),
    maxDepth: z.number().optional(),
    maxPages: z.number().optional(),
    timeoutMs: z.number().optional(),
    rateLimit: z.number().optional(),
    burst: z.number().optional(),
    userAgent: z.string().optional(),
    retryTimes: z.number().optional(),
    retryBaseDelayMs: z.number().optional(),
    retryMaxDelayMs: z.number().optional(),
    concurrency: z.number().optional(),
    scope: z.enum(VALID_SCOPES).optional(),
    robotsPolicy: z.enum(VALID_ROBOTS_POLICIES).optional(),
    robotsTimeoutMs: z.number().optional(),
    respectCrawlDelay: z.boolean().optional(),
    format: z.enum(VALID_FORMATS).optional(),
    quiet: z.boolean().optional(),
    logLevel: z.string().optional(),
  })
  .strict();

export interface LoadedConfig {
  /** Seed URL, when the file names one. */
  startUrl?: string;
  options: CrawlOrchestratorOptions;
}

/**
 * Reads a JSON config file. Keys mirror the option names; `startUrl` may
 * name the seed. Unknown keys and mistyped values are configuration errors.
 */
export async function loadConfigFile(path: string): Promise<LoadedConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read config file: ${path}`, { path }, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw createConfigurationError(`Config file is not valid JSON: ${path}`, { path }, { cause: error });
  }

  return parseConfigObject(parsed, path);
}

export function parseConfigObject(value: unknown, source = 'config'): LoadedConfig {
  const result = CrawlConfigSchema.safeParse(value);
  if (!result.success) {
    const [issue] = result.error.issues;
    const path = issue ? issue.path.join('.') : '';
    const reason = issue?.message ?? 'invalid value';
    throw createConfigurationError(
      path ? `Invalid config in ${source}: ${path}: ${reason}` : `Invalid config in ${source}: ${reason}`,
      { source, path, issues: result.error.issues.length },
      { cause: result.error },
    );
  }

  const { startUrl, ...options } = result.data;
  return { startUrl, options };
}
