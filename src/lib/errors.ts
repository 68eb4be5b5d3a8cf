import { Data } from 'effect';

/**
 * robots.txt forbids the URL. Recoverable: the caller skips the URL and
 * carries on with the run.
 */
export class PolicyDenied extends Data.TaggedError('PolicyDenied')<{
  readonly url: string;
  readonly userAgent: string;
  readonly message: string;
}> {
  static forUrl(url: string, userAgent: string): PolicyDenied {
    return new PolicyDenied({
      url,
      userAgent,
      message: `URL disallowed by robots.txt for ${userAgent}: ${url}`,
    });
  }

  static offOrigin(url: string, origin: string, userAgent: string): PolicyDenied {
    return new PolicyDenied({
      url,
      userAgent,
      message: `URL outside the configured origin ${origin}: ${url}`,
    });
  }
}

/**
 * The origin answered with a client error (4xx). Recoverable, never retried
 * and never counted toward the halt threshold.
 */
export class FetchFailed extends Data.TaggedError('FetchFailed')<{
  readonly url: string;
  readonly statusCode: number;
  readonly message: string;
}> {
  static clientError(url: string, statusCode: number): FetchFailed {
    return new FetchFailed({
      url,
      statusCode,
      message: `HTTP ${statusCode} for ${url}`,
    });
  }

  static invalidUrl(url: string): FetchFailed {
    return new FetchFailed({
      url,
      statusCode: 0,
      message: `Invalid URL: ${url}`,
    });
  }
}

/**
 * The origin is not currently scrapable. Fatal: it must propagate out of the
 * fetcher and terminate the run.
 */
export class HaltRequired extends Data.TaggedError('HaltRequired')<{
  readonly url: string;
  readonly reason: string;
  readonly consecutiveErrors: number;
  readonly message: string;
}> {
  static thresholdReached(
    url: string,
    consecutiveErrors: number,
    lastOutcome: 'server_error' | 'network_error'
  ): HaltRequired {
    const kind = lastOutcome === 'server_error' ? 'server' : 'server/network';
    const reason = `${consecutiveErrors} consecutive ${kind} errors`;
    return new HaltRequired({
      url,
      reason,
      consecutiveErrors,
      message: `Halting due to ${reason}`,
    });
  }

  static retriesExhausted(
    url: string,
    attempts: number,
    consecutiveErrors: number
  ): HaltRequired {
    const reason = `${url} still failing after ${attempts} attempts`;
    return new HaltRequired({
      url,
      reason,
      consecutiveErrors,
      message: `Halting due to ${reason}`,
    });
  }
}

/**
 * Input handed to the parser is not HTML at all. Recoverable for that page.
 */
export class ParseError extends Data.TaggedError('ParseError')<{
  readonly context: string;
  readonly input?: string;
  readonly message: string;
}> {
  static notHtml(context: string, input: string): ParseError {
    const preview = input.trim().substring(0, 60);
    return new ParseError({
      context,
      input: preview,
      message: `Input for ${context} is not HTML${preview ? `: "${preview}"` : ' (empty)'}`,
    });
  }
}

/**
 * Invalid configuration, detected before any network activity.
 */
export class ConfigError extends Data.TaggedError('ConfigError')<{
  readonly field?: string;
  readonly message: string;
  readonly cause?: unknown;
}> {
  static invalid(field: string, reason: string): ConfigError {
    return new ConfigError({
      field,
      message: `Invalid configuration for '${field}': ${reason}`,
    });
  }
}

/**
 * Transport-level failure (timeout, refused connection, DNS). Produced by the
 * HTTP client and turned into a retry/halt outcome by the fetcher.
 */
export class NetworkError extends Data.TaggedError('NetworkError')<{
  readonly url: string;
  readonly reason: 'timeout' | 'connection';
  readonly cause?: unknown;
  readonly message: string;
}> {
  static timeout(url: string, timeoutMs: number): NetworkError {
    return new NetworkError({
      url,
      reason: 'timeout',
      message: `Request to ${url} timed out after ${timeoutMs}ms`,
    });
  }

  static fromCause(url: string, cause: unknown): NetworkError {
    return new NetworkError({
      url,
      reason: 'connection',
      cause,
      message: `Failed to fetch ${url}: ${cause instanceof Error ? cause.message : String(cause)}`,
    });
  }
}

/**
 * Page cache read/write failures.
 */
export class CacheError extends Data.TaggedError('CacheError')<{
  readonly operation: 'read' | 'write' | 'clear' | 'stat';
  readonly path: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(
    operation: CacheError['operation'],
    path: string,
    cause: unknown
  ): CacheError {
    return new CacheError({
      operation,
      path,
      cause,
      message: `Cache ${operation} failed for ${path}: ${cause}`,
    });
  }
}

/**
 * SQLite failures.
 */
export class StorageError extends Data.TaggedError('StorageError')<{
  readonly operation: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(operation: string, cause: unknown): StorageError {
    return new StorageError({
      operation,
      cause,
      message: `Failed to ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
    });
  }
}

/**
 * PDF export failures.
 */
export class ExportError extends Data.TaggedError('ExportError')<{
  readonly target: string;
  readonly cause?: unknown;
  readonly message: string;
}> {}

/** Errors the fetcher can surface to its caller. */
export type FetchError = PolicyDenied | FetchFailed | HaltRequired;

/** Errors after which a run continues with the next resource. */
export type RecoverableError =
  | PolicyDenied
  | FetchFailed
  | ParseError
  | StorageError;

export type ScraperError =
  | PolicyDenied
  | FetchFailed
  | HaltRequired
  | ParseError
  | ConfigError
  | NetworkError
  | CacheError
  | StorageError
  | ExportError;
