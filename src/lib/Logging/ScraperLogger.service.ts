import { Clock, Console, Context, Effect, Layer } from 'effect';
import * as fs from 'fs';
import * as path from 'path';

export type RequestOutcome =
  | 'cache_hit'
  | 'success'
  | 'client_error'
  | 'server_error'
  | 'network_error';

export interface ScraperLogEvent {
  timestamp: string;
  type:
    | 'request'
    | 'policy_denial'
    | 'robots_fallback'
    | 'retry'
    | 'halt'
    | 'parse_warning'
    | 'discovery'
    | 'extraction'
    | 'pdf_generated'
    | 'run_lifecycle'
    | 'error';
  url?: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * One network attempt or cache hit as seen by the fetcher.
 */
export interface RequestLogEntry {
  readonly url: string;
  readonly outcome: RequestOutcome;
  /** Milliseconds slept by the rate limiter before this attempt */
  readonly delayMs: number;
  readonly cacheHit: boolean;
  readonly statusCode?: number;
  readonly error?: string;
  readonly attempt?: number;
}

export interface ScraperLogger {
  readonly logEvent: (
    event: Omit<ScraperLogEvent, 'timestamp'>
  ) => Effect.Effect<void>;
  readonly logRequest: (entry: RequestLogEntry) => Effect.Effect<void>;
  /** `reason` replaces the default robots.txt message */
  readonly logPolicyDenial: (
    url: string,
    userAgent: string,
    reason?: string
  ) => Effect.Effect<void>;
  readonly logRobotsFallback: (
    robotsUrl: string,
    reason: string
  ) => Effect.Effect<void>;
  readonly logRetry: (
    url: string,
    attempt: number,
    backoffMs: number,
    reason: string
  ) => Effect.Effect<void>;
  readonly logHalt: (reason: string, url?: string) => Effect.Effect<void>;
  readonly logParseWarning: (
    context: string,
    message: string
  ) => Effect.Effect<void>;
  readonly logDiscovery: (
    entityType: 'region' | 'river' | 'section',
    count: number,
    parent?: string
  ) => Effect.Effect<void>;
  readonly logExtraction: (
    riverName: string,
    counts: { flies: number; regulations: number; sections: number }
  ) => Effect.Effect<void>;
  readonly logPdfGenerated: (
    filePath: string,
    entity: string
  ) => Effect.Effect<void>;
  readonly logRun: (
    event: 'start' | 'complete' | 'halted' | 'error',
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logError: (
    message: string,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
}

export const ScraperLogger = Context.GenericTag<ScraperLogger>('ScraperLogger');

/** Where finished events go. */
export type LogWriter = (event: ScraperLogEvent) => Effect.Effect<void>;

const IMPORTANT_TYPES: ReadonlyArray<ScraperLogEvent['type']> = [
  'policy_denial',
  'robots_fallback',
  'halt',
  'run_lifecycle',
  'error',
];

/**
 * Appends events as JSON lines to `logPath`, echoing the important ones to
 * the console.
 */
export const fileLogWriter = (logPath: string): LogWriter => {
  const dir = path.dirname(logPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  return (event) =>
    Effect.gen(function* () {
      yield* Effect.sync(() =>
        fs.appendFileSync(logPath, JSON.stringify(event) + '\n')
      );
      if (IMPORTANT_TYPES.includes(event.type)) {
        yield* Console.log(`[${event.type}] ${event.message}`);
      }
    });
};

export const makeScraperLoggerWith = (write: LogWriter): ScraperLogger => {
  const emit = (event: Omit<ScraperLogEvent, 'timestamp'>) =>
    Effect.gen(function* () {
      const now = yield* Clock.currentTimeMillis;
      yield* write({ timestamp: new Date(now).toISOString(), ...event });
    });

  return {
    logEvent: emit,

    logRequest: (entry) =>
      emit({
        type: 'request',
        url: entry.url,
        message: `${entry.outcome}${entry.statusCode !== undefined ? ` (${entry.statusCode})` : ''} ${entry.url}`,
        details: {
          outcome: entry.outcome,
          delayMs: entry.delayMs,
          cacheHit: entry.cacheHit,
          statusCode: entry.statusCode,
          error: entry.error,
          attempt: entry.attempt,
        },
      }),

    logPolicyDenial: (url, userAgent, reason) =>
      emit({
        type: 'policy_denial',
        url,
        message: reason ?? `robots.txt disallows ${url}`,
        details: { userAgent },
      }),

    logRobotsFallback: (robotsUrl, reason) =>
      emit({
        type: 'robots_fallback',
        url: robotsUrl,
        message: `robots.txt unavailable (${reason}), allowing all paths`,
        details: { reason },
      }),

    logRetry: (url, attempt, backoffMs, reason) =>
      emit({
        type: 'retry',
        url,
        message: `Retrying ${url} after ${backoffMs}ms (attempt ${attempt} failed: ${reason})`,
        details: { attempt, backoffMs, reason },
      }),

    logHalt: (reason, url) =>
      emit({
        type: 'halt',
        url,
        message: `Halting: ${reason}`,
        details: { reason },
      }),

    logParseWarning: (context, message) =>
      emit({
        type: 'parse_warning',
        message: `[${context}] ${message}`,
        details: { context },
      }),

    logDiscovery: (entityType, count, parent) =>
      emit({
        type: 'discovery',
        message: `Discovered ${count} ${entityType}(s)${parent ? ` in ${parent}` : ''}`,
        details: { entityType, count, parent },
      }),

    logExtraction: (riverName, counts) =>
      emit({
        type: 'extraction',
        message: `Extracted ${counts.flies} flies, ${counts.regulations} regulations and ${counts.sections} sections for ${riverName}`,
        details: { river: riverName, ...counts },
      }),

    logPdfGenerated: (filePath, entity) =>
      emit({
        type: 'pdf_generated',
        message: `Wrote ${filePath} for ${entity}`,
        details: { path: filePath, entity },
      }),

    logRun: (event, details) =>
      emit({
        type: 'run_lifecycle',
        message: `Run ${event}`,
        details,
      }),

    logError: (message, details) => emit({ type: 'error', message, details }),
  };
};

export const makeScraperLogger = (logPath: string): ScraperLogger =>
  makeScraperLoggerWith(fileLogWriter(logPath));

export const ScraperLoggerLive = (logPath: string) =>
  Layer.sync(ScraperLogger, () => makeScraperLogger(logPath));
