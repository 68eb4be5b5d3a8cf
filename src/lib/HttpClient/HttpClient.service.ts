import { Context, Effect, Layer } from 'effect';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import { NetworkError } from '../errors.js';

export interface HttpResponse {
  readonly url: string;
  readonly status: number;
  readonly body: string;
}

/**
 * A single HTTP GET. Any status code is a successful response here; only
 * transport failures and timeouts fail with {@link NetworkError}.
 */
export interface HttpClientService {
  readonly get: (url: string) => Effect.Effect<HttpResponse, NetworkError>;
}

export const makeHttpClient = (options: {
  readonly userAgent: string;
  readonly timeoutMs: number;
}): HttpClientService => ({
  get: (url) =>
    Effect.tryPromise({
      try: async () => {
        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, options.timeoutMs);

        try {
          const response = await fetch(url, {
            headers: {
              'User-Agent': options.userAgent,
              Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
            },
            signal: controller.signal,
          });
          const body = await response.text();
          return { url, status: response.status, body };
        } catch (error) {
          throw timedOut ? NetworkError.timeout(url, options.timeoutMs) : error;
        } finally {
          clearTimeout(timeoutId);
        }
      },
      catch: (error) =>
        error instanceof NetworkError ? error : NetworkError.fromCause(url, error),
    }),
});

export class HttpClient extends Context.Tag('HttpClient')<
  HttpClient,
  HttpClientService
>() {
  static Live = Layer.effect(
    HttpClient,
    Effect.map(ScraperConfig, (config) =>
      makeHttpClient({
        userAgent: config.userAgent,
        timeoutMs: config.requestTimeoutMs,
      })
    )
  );
}
