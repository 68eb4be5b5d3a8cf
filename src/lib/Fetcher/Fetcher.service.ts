import { Context, Duration, Effect, Either, Layer, Ref } from 'effect';
import { PageCache } from '../Cache/PageCache.service.js';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import {
  FetchFailed,
  HaltRequired,
  PolicyDenied,
  type FetchError,
} from '../errors.js';
import { HttpClient } from '../HttpClient/HttpClient.service.js';
import { ScraperLogger } from '../Logging/ScraperLogger.service.js';
import {
  RequestLimiter,
  type OutcomeKind,
  type RateLimiterState,
} from '../RateLimiter/RateLimiter.js';
import { RobotsGate, type RobotsPolicy } from '../Robots/RobotsGate.service.js';

export interface FetchOptions {
  /** Consult the cache before the network (default: true) */
  readonly useCache?: boolean;
  /** Skip the cache lookup but still store the fresh body (default: false) */
  readonly forceRefresh?: boolean;
}

/**
 * Polite page fetching: robots.txt first, then the cache, then the rate
 * limiter and the network with retry, backoff and halt. URLs outside the
 * configured origin are denied outright.
 *
 * The consecutive error counter is shared by every URL this fetcher handles.
 *
 * @group Services
 * @public
 */
export interface FetcherService {
  /**
   * Fetches `url` (absolute, or relative to the base URL) and succeeds with
   * the response body.
   *
   * Fails with `PolicyDenied` or `FetchFailed` when only this URL is
   * unavailable, and with `HaltRequired` when the run must stop.
   */
  readonly fetch: (
    url: string,
    options?: FetchOptions
  ) => Effect.Effect<string, FetchError>;
  readonly rateLimiterState: Effect.Effect<RateLimiterState>;
}

type FailureKind = Extract<OutcomeKind, 'server_error' | 'network_error'>;

export const makeFetcher = Effect.gen(function* () {
  const config = yield* ScraperConfig;
  const cache = yield* PageCache;
  const robots = yield* RobotsGate;
  const http = yield* HttpClient;
  const logger = yield* ScraperLogger;

  const limiter = yield* RequestLimiter;
  const origin = new URL(config.baseUrl).origin;
  const lastFailure = yield* Ref.make<FailureKind>('server_error');
  const fallbackNoted = yield* Ref.make<RobotsPolicy | undefined>(undefined);

  const noteFallback = (policy: RobotsPolicy) =>
    Effect.gen(function* () {
      if (!policy.fallback || (yield* Ref.get(fallbackNoted)) === policy) return;
      yield* Ref.set(fallbackNoted, policy);
      yield* logger.logRobotsFallback(
        `${policy.origin}/robots.txt`,
        policy.fallbackReason ?? 'unavailable'
      );
    });

  const halt = (error: HaltRequired) =>
    logger.logHalt(error.reason, error.url).pipe(Effect.zipRight(Effect.fail(error)));

  const lookupCache = (url: string) =>
    cache.get(url).pipe(
      Effect.catchTag('CacheError', (error) =>
        Effect.logWarning(`Cache lookup failed, fetching instead: ${error.message}`).pipe(
          Effect.as({ _tag: 'Miss' } as const)
        )
      )
    );

  const storeInCache = (url: string, body: string) =>
    cache.put(url, body).pipe(
      Effect.catchTag('CacheError', (error) =>
        Effect.logWarning(`Could not cache ${url}: ${error.message}`)
      )
    );

  const attempt = (
    url: string,
    attemptNumber: number
  ): Effect.Effect<string, FetchFailed | HaltRequired> =>
    Effect.gen(function* () {
      if (yield* limiter.shouldHalt) {
        const { consecutiveErrors } = yield* limiter.snapshot;
        return yield* halt(
          HaltRequired.thresholdReached(
            url,
            consecutiveErrors,
            yield* Ref.get(lastFailure)
          )
        );
      }

      const crawlDelayMs = yield* robots.crawlDelayMs;
      const delayMs = yield* limiter.beforeRequest(crawlDelayMs);
      const result = yield* Effect.either(http.get(url));

      if (Either.isRight(result) && result.right.status < 400) {
        const { status, body } = result.right;
        yield* limiter.recordOutcome('success');
        yield* logger.logRequest({
          url,
          outcome: 'success',
          delayMs,
          cacheHit: false,
          statusCode: status,
          attempt: attemptNumber,
        });
        yield* storeInCache(url, body);
        return body;
      }

      if (Either.isRight(result) && result.right.status < 500) {
        const { status } = result.right;
        yield* limiter.recordOutcome('client_error');
        yield* logger.logRequest({
          url,
          outcome: 'client_error',
          delayMs,
          cacheHit: false,
          statusCode: status,
          attempt: attemptNumber,
        });
        return yield* Effect.fail(FetchFailed.clientError(url, status));
      }

      const kind: FailureKind = Either.isRight(result) ? 'server_error' : 'network_error';
      const statusCode = Either.isRight(result) ? result.right.status : undefined;
      const reason = Either.isRight(result)
        ? `HTTP ${result.right.status}`
        : result.left.message;

      const consecutive = yield* limiter.recordOutcome(kind);
      yield* Ref.set(lastFailure, kind);
      yield* logger.logRequest({
        url,
        outcome: kind,
        delayMs,
        cacheHit: false,
        statusCode,
        error: reason,
        attempt: attemptNumber,
      });

      if (consecutive >= config.haltThreshold) {
        return yield* halt(HaltRequired.thresholdReached(url, consecutive, kind));
      }
      if (attemptNumber >= config.maxRetries) {
        return yield* halt(
          HaltRequired.retriesExhausted(url, attemptNumber, consecutive)
        );
      }

      const schedule = config.retryBackoffMs;
      const backoffMs = schedule[Math.min(attemptNumber - 1, schedule.length - 1)];
      yield* logger.logRetry(url, attemptNumber, backoffMs, reason);
      yield* Effect.sleep(Duration.millis(backoffMs));
      return yield* attempt(url, attemptNumber + 1);
    });

  const fetch = (
    input: string,
    options: FetchOptions = {}
  ): Effect.Effect<string, FetchError> =>
    Effect.gen(function* () {
      const { useCache = true, forceRefresh = false } = options;
      if (!URL.canParse(input, config.baseUrl)) {
        return yield* Effect.fail(FetchFailed.invalidUrl(input));
      }
      const target = new URL(input, config.baseUrl);
      const url = target.toString();
      if (target.origin !== origin) {
        const denied = PolicyDenied.offOrigin(url, origin, config.userAgent);
        yield* logger.logPolicyDenial(url, config.userAgent, denied.message);
        return yield* Effect.fail(denied);
      }

      yield* noteFallback(yield* robots.load);
      if (!(yield* robots.isAllowed(url))) {
        yield* logger.logPolicyDenial(url, config.userAgent);
        return yield* Effect.fail(PolicyDenied.forUrl(url, config.userAgent));
      }

      if (useCache && !forceRefresh) {
        const cached = yield* lookupCache(url);
        if (cached._tag === 'Hit') {
          yield* logger.logRequest({
            url,
            outcome: 'cache_hit',
            delayMs: 0,
            cacheHit: true,
          });
          return cached.body;
        }
        if (cached._tag === 'Stale') {
          yield* Effect.logDebug(`Cache entry for ${url} is stale (${cached.ageMs}ms old)`);
        }
      }

      return yield* attempt(url, 1);
    });

  return {
    fetch,
    rateLimiterState: limiter.snapshot,
  } satisfies FetcherService;
});

export class Fetcher extends Context.Tag('Fetcher')<Fetcher, FetcherService>() {
  static Live = Layer.effect(Fetcher, makeFetcher);
}
