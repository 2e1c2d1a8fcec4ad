import pino, { type DestinationStream, type LoggerOptions } from 'pino';

import { createConfigurationError } from './errors.js';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfiguration {
  /** One of `LOG_LEVELS`; anything else is a configuration error. */
  level?: string;
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: LogLevel = 'silent';
const DEFAULT_BASE = { service: 'sitewalk' } as const;

let activeLogger: LoggerLike = createPinoInstance();

/** Replaces the shared logger. Crawl logs go to stderr unless a destination is given. */
export function configureLogger(config: LoggerConfiguration = {}): LoggerLike {
  const { level = DEFAULT_LEVEL, base = DEFAULT_BASE, destination } = config;
  if (!isLogLevel(level)) {
    throw createConfigurationError(`Unsupported log-level: ${level}`, {
      value: level,
      allowed: LOG_LEVELS,
    });
  }

  activeLogger = createPinoInstance({ level, base }, destination);
  return activeLogger;
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createPinoInstance(
  options: { level?: LogLevel; base?: LoggerOptions['base'] } = {},
  destination?: DestinationStream,
): LoggerLike {
  const merged: LoggerOptions = {
    level: options.level ?? DEFAULT_LEVEL,
    base: options.base ?? DEFAULT_BASE,
  };

  if (destination) {
    return pino(merged, destination);
  }

  // Logs go to stderr so stdout stays reserved for crawl output.
  return pino(merged, pino.destination(2));
}
