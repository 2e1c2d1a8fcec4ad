export type ErrorKind =
  | 'forbidden'
  | 'transient'
  | 'client'
  | 'parse'
  | 'config'
  | 'seed'
  | 'cancelled'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

const ERROR_NAMES: Record<ErrorKind, string> = {
  forbidden: 'ForbiddenError',
  transient: 'TransientError',
  client: 'ClientError',
  parse: 'ParseError',
  config: 'ConfigError',
  seed: 'SeedUnreachableError',
  cancelled: 'CancelledError',
  internal: 'InternalError',
};

// Config, seed and internal errors end the run; everything else is per page.
const DEFAULT_SEVERITY: Record<ErrorKind, ErrorSeverity> = {
  forbidden: 'recoverable',
  transient: 'recoverable',
  client: 'recoverable',
  parse: 'recoverable',
  config: 'fatal',
  seed: 'fatal',
  cancelled: 'recoverable',
  internal: 'fatal',
};

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = DEFAULT_SEVERITY[kind], details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = ERROR_NAMES[kind];
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}


export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

type FactoryOptions = { severity?: ErrorSeverity; cause?: unknown };

function factory(kind: ErrorKind) {
  return (
    message: string,
    details: Record<string, unknown> = {},
    options: FactoryOptions = {},
  ): CrawlerError =>
    new CrawlerError({ message, kind, severity: options.severity, details, cause: options.cause });
}

/** robots.txt disallows the path; the page is skipped and never retried. */
export const createForbiddenError = factory('forbidden');

/** Timeout, connection failure or 5xx that outlived the retry budget. */
export const createTransientError = factory('transient');

/** 4xx response; recorded immediately. */
export const createClientError = factory('client');

export const createParseError = factory('parse');

export const createCancelledError = factory('cancelled');

export const createInternalError = factory('internal');

export const createConfigurationError = factory('config');

/** The seed URL could not be reached at all; aborts the run. */
export const createSeedError = factory('seed');
