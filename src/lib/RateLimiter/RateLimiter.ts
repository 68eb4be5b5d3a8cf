import { Clock, Context, Duration, Effect, Layer, Option, Random, Ref } from 'effect';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';

/** How a finished network attempt is classified for halt tracking. */
export type OutcomeKind =
  | 'success'
  | 'client_error'
  | 'server_error'
  | 'network_error';

export interface RateLimiterConfig {
  /** Minimum gap between the starts of two requests */
  readonly requestDelayMs: number;
  /** Upper bound (inclusive) of random extra delay per request */
  readonly jitterMaxMs: number;
  /** Consecutive server/network errors after which `shouldHalt` is true */
  readonly haltThreshold: number;
}

export interface RateLimiterState {
  readonly lastRequestStart: Option.Option<number>;
  readonly consecutiveErrors: number;
  readonly requestCount: number;
}

/**
 * Request pacing and consecutive-failure tracking for every request sent to
 * the origin.
 *
 * Time and sleeping go through the Effect `Clock`, jitter through `Random`,
 * so both can be replaced in tests.
 */
export interface RateLimiter {
  /**
   * Sleeps until the configured delay (plus jitter) has passed since the
   * previous request started, then marks the new start. Succeeds with the
   * milliseconds slept. `floorMs` can only lengthen the delay.
   */
  readonly beforeRequest: (floorMs?: number) => Effect.Effect<number>;
  /** Updates the consecutive error counter and returns its new value. */
  readonly recordOutcome: (kind: OutcomeKind) => Effect.Effect<number>;
  readonly shouldHalt: Effect.Effect<boolean>;
  readonly snapshot: Effect.Effect<RateLimiterState>;
}

const isErrorOutcome = (kind: OutcomeKind): boolean =>
  kind === 'server_error' || kind === 'network_error';

export const makeRateLimiter = (
  config: RateLimiterConfig
): Effect.Effect<RateLimiter> =>
  Effect.gen(function* () {
    const state = yield* Ref.make<RateLimiterState>({
      lastRequestStart: Option.none(),
      consecutiveErrors: 0,
      requestCount: 0,
    });

    const nextJitter =
      config.jitterMaxMs > 0
        ? Random.nextIntBetween(0, config.jitterMaxMs + 1)
        : Effect.succeed(0);

    const beforeRequest = (floorMs = 0) =>
      Effect.gen(function* () {
        const { lastRequestStart } = yield* Ref.get(state);
        let waitedMs = 0;

        if (Option.isSome(lastRequestStart)) {
          const jitter = yield* nextJitter;
          const now = yield* Clock.currentTimeMillis;
          const delayMs = Math.max(config.requestDelayMs, floorMs);
          const earliest = lastRequestStart.value + delayMs + jitter;
          waitedMs = Math.max(0, earliest - now);
          if (waitedMs > 0) {
            yield* Effect.sleep(Duration.millis(waitedMs));
          }
        }

        const start = yield* Clock.currentTimeMillis;
        yield* Ref.update(state, (s) => ({
          ...s,
          lastRequestStart: Option.some(start),
          requestCount: s.requestCount + 1,
        }));
        return waitedMs;
      });

    const recordOutcome = (kind: OutcomeKind) =>
      Ref.modify(state, (s) => {
        const consecutiveErrors = isErrorOutcome(kind)
          ? s.consecutiveErrors + 1
          : 0;
        return [consecutiveErrors, { ...s, consecutiveErrors }];
      });

    return {
      beforeRequest,
      recordOutcome,
      shouldHalt: Ref.get(state).pipe(
        Effect.map((s) => s.consecutiveErrors >= config.haltThreshold)
      ),
      snapshot: Ref.get(state),
    };
  });

/**
 * The limiter shared by the fetcher and the robots.txt gate, so that the
 * robots.txt request is paced like any page.
 *
 * @group Services
 */
export class RequestLimiter extends Context.Tag('RequestLimiter')<
  RequestLimiter,
  RateLimiter
>() {
  static Live = Layer.effect(
    RequestLimiter,
    Effect.flatMap(ScraperConfig, (config) =>
      makeRateLimiter({
        requestDelayMs: config.requestDelayMs,
        jitterMaxMs: config.jitterMaxMs,
        haltThreshold: config.haltThreshold,
      })
    )
  );
}
