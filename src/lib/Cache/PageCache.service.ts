import { Clock, Context, Effect, Either, Layer, Ref, Schema } from 'effect';
import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import { CacheError } from '../errors.js';

/**
 * Result of a cache lookup. `Stale` entries are fetched again like a `Miss`
 * but counted separately.
 */
export type CacheLookup =
  | { readonly _tag: 'Hit'; readonly body: string }
  | { readonly _tag: 'Miss' }
  | { readonly _tag: 'Stale'; readonly ageMs: number };

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly stale: number;
  readonly total: number;
  /** hits / total, 0 before the first lookup */
  readonly hitRate: number;
  /** Size on disk of all entries */
  readonly bytesCached: number;
}

export interface PageCacheService {
  readonly get: (url: string) => Effect.Effect<CacheLookup, CacheError>;
  readonly put: (url: string, body: string) => Effect.Effect<void, CacheError>;
  /** Deletes every entry and resets the counters; returns entries removed. */
  readonly clear: Effect.Effect<number, CacheError>;
  readonly stats: Effect.Effect<CacheStats, CacheError>;
}

const CacheEntry = Schema.Struct({
  url: Schema.String,
  body: Schema.String,
  storedAt: Schema.Number,
});

const decodeEntry = Schema.decodeUnknownEither(Schema.parseJson(CacheEntry));

/** Stable file name for a URL. */
export const cacheKey = (url: string): string =>
  createHash('sha256').update(url).digest('hex');

const errnoCode = (error: unknown): string | undefined =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  typeof error.code === 'string'
    ? error.code
    : undefined;

interface Counters {
  readonly hits: number;
  readonly misses: number;
  readonly stale: number;
}

const emptyCounters: Counters = { hits: 0, misses: 0, stale: 0 };

export const makePageCache = (options: {
  readonly cacheDir: string;
  readonly ttlMs: number;
}): Effect.Effect<PageCacheService> =>
  Effect.gen(function* () {
    const counters = yield* Ref.make(emptyCounters);
    const entryPath = (url: string) =>
      path.join(options.cacheDir, `${cacheKey(url)}.json`);

    const count = (field: keyof Counters) =>
      Ref.update(counters, (c) => ({ ...c, [field]: c[field] + 1 }));

    const listEntries = Effect.tryPromise({
      try: async () => {
        try {
          const names = await fs.readdir(options.cacheDir);
          return names.filter((name) => name.endsWith('.json'));
        } catch (error) {
          if (errnoCode(error) === 'ENOENT') return [];
          throw error;
        }
      },
      catch: (cause) => CacheError.fromCause('stat', options.cacheDir, cause),
    });

    const get = (url: string) =>
      Effect.gen(function* () {
        const file = entryPath(url);
        const text = yield* Effect.tryPromise({
          try: async () => {
            try {
              return await fs.readFile(file, 'utf-8');
            } catch (error) {
              if (errnoCode(error) === 'ENOENT') return undefined;
              throw error;
            }
          },
          catch: (cause) => CacheError.fromCause('read', file, cause),
        });

        if (text === undefined) {
          yield* count('misses');
          return { _tag: 'Miss' } as const;
        }

        const decoded = decodeEntry(text);
        if (Either.isLeft(decoded) || decoded.right.url !== url) {
          yield* Effect.logWarning(`Ignoring unreadable cache entry ${file}`);
          yield* count('misses');
          return { _tag: 'Miss' } as const;
        }

        const now = yield* Clock.currentTimeMillis;
        const ageMs = now - decoded.right.storedAt;
        if (ageMs > options.ttlMs) {
          yield* count('stale');
          return { _tag: 'Stale', ageMs } as const;
        }

        yield* count('hits');
        return { _tag: 'Hit', body: decoded.right.body } as const;
      });

    const put = (url: string, body: string) =>
      Effect.gen(function* () {
        const storedAt = yield* Clock.currentTimeMillis;
        const file = entryPath(url);
        yield* Effect.tryPromise({
          try: async () => {
            await fs.mkdir(options.cacheDir, { recursive: true });
            await fs.writeFile(file, JSON.stringify({ url, body, storedAt }));
          },
          catch: (cause) => CacheError.fromCause('write', file, cause),
        });
      });

    const clear = Effect.gen(function* () {
      const names = yield* listEntries;
      yield* Effect.tryPromise({
        try: () =>
          Promise.all(
            names.map((name) => fs.unlink(path.join(options.cacheDir, name)))
          ),
        catch: (cause) => CacheError.fromCause('clear', options.cacheDir, cause),
      });
      yield* Ref.set(counters, emptyCounters);
      return names.length;
    });

    const stats = Effect.gen(function* () {
      const names = yield* listEntries;
      const sizes = yield* Effect.tryPromise({
        try: () =>
          Promise.all(
            names.map((name) => fs.stat(path.join(options.cacheDir, name)))
          ),
        catch: (cause) => CacheError.fromCause('stat', options.cacheDir, cause),
      });
      const { hits, misses, stale } = yield* Ref.get(counters);
      const total = hits + misses + stale;
      return {
        hits,
        misses,
        stale,
        total,
        hitRate: total === 0 ? 0 : hits / total,
        bytesCached: sizes.reduce((sum, s) => sum + s.size, 0),
      };
    });

    return { get, put, clear, stats };
  });

export class PageCache extends Context.Tag('PageCache')<
  PageCache,
  PageCacheService
>() {
  static Live = Layer.effect(
    PageCache,
    Effect.flatMap(ScraperConfig, (config) =>
      makePageCache({ cacheDir: config.cacheDir, ttlMs: config.cacheTtlMs })
    )
  );
}
