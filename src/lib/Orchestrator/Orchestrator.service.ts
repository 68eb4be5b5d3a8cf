import { Clock, Context, Effect, Layer, Option, Ref } from 'effect';
import { createHash } from 'crypto';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import {
  ConfigError,
  type HaltRequired,
  type RecoverableError,
  type StorageError,
} from '../errors.js';
import { Fetcher } from '../Fetcher/Fetcher.service.js';
import { ScraperLogger } from '../Logging/ScraperLogger.service.js';
import { PageParser } from '../Parser/PageParser.service.js';
import type { DetailResult } from '../Parser/Parser.js';
import {
  Storage,
  type RegionRow,
  type RiverRow,
} from '../Storage/SqliteStorage.service.js';

export type Phase = 'regions' | 'rivers' | 'details';

export interface ScrapeOptions {
  readonly phases: readonly Phase[];
  /** Limit river discovery to one region, by id or slug */
  readonly region?: string;
  /** Bypass the cache and re-extract recently crawled rivers */
  readonly refresh?: boolean;
}

export interface SkippedEntity {
  readonly phase: Phase;
  readonly target: string;
  readonly reason: RecoverableError['_tag'];
  readonly message: string;
}

export interface RunSummary {
  readonly sessionId: string;
  readonly regionsDiscovered: number;
  readonly riversDiscovered: number;
  readonly sectionsStored: number;
  readonly riversExtracted: number;
  readonly riversUnchanged: number;
  readonly riversFresh: number;
  readonly fliesStored: number;
  readonly regulationsStored: number;
  readonly skipped: readonly SkippedEntity[];
}

type Tally = Omit<RunSummary, 'sessionId' | 'skipped'>;

const emptyTally: Tally = {
  regionsDiscovered: 0,
  riversDiscovered: 0,
  sectionsStored: 0,
  riversExtracted: 0,
  riversUnchanged: 0,
  riversFresh: 0,
  fliesStored: 0,
  regulationsStored: 0,
};

/** Detail pages crawled more recently than this are skipped unless refreshing. */
export const DETAIL_FRESHNESS_MS = 24 * 60 * 60 * 1000;

const sha256 = (text: string): string =>
  createHash('sha256').update(text).digest('hex');

/**
 * Sequences fetch, parse and store for the three discovery phases.
 *
 * @group Services
 * @public
 */
export interface OrchestratorService {
  /**
   * Runs the requested phases in order. Fails only with `HaltRequired`, a
   * storage failure outside a single record, or an unknown `region`.
   */
  readonly run: (
    options: ScrapeOptions
  ) => Effect.Effect<RunSummary, HaltRequired | StorageError | ConfigError>;
}

export const makeOrchestrator = Effect.gen(function* () {
  const config = yield* ScraperConfig;
  const fetcher = yield* Fetcher;
  const parser = yield* PageParser;
  const storage = yield* Storage;
  const logger = yield* ScraperLogger;

  const nowIso = Clock.currentTimeMillis.pipe(
    Effect.map((ms) => new Date(ms).toISOString())
  );

  const run = (options: ScrapeOptions) =>
    Effect.gen(function* () {
      const startedAt = yield* nowIso;
      const sessionId = `scrape-${startedAt.replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z')}`;
      const tally = yield* Ref.make(emptyTally);
      const skipped = yield* Ref.make<SkippedEntity[]>([]);
      const fetchOptions = {
        useCache: !options.refresh,
        forceRefresh: options.refresh === true,
      };

      const add = (field: keyof Tally, n = 1) =>
        Ref.update(tally, (t) => ({ ...t, [field]: t[field] + n }));

      /** Runs `effect`; a recoverable failure is logged and yields None. */
      const orSkip = <A>(
        phase: Phase,
        target: string,
        effect: Effect.Effect<A, RecoverableError | HaltRequired>
      ): Effect.Effect<Option.Option<A>, HaltRequired> => {
        const skip = (error: RecoverableError) =>
          Effect.gen(function* () {
            yield* logger.logError(`Skipping ${target}: ${error.message}`, {
              phase,
              reason: error._tag,
            });
            yield* Ref.update(skipped, (list) => [
              ...list,
              { phase, target, reason: error._tag, message: error.message },
            ]);
            return Option.none<A>();
          });

        return effect.pipe(
          Effect.map(Option.some),
          Effect.catchTags({
            PolicyDenied: skip,
            FetchFailed: skip,
            ParseError: skip,
            StorageError: skip,
          })
        );
      };

      const discoverRegions = Effect.gen(function* () {
        const indexUrl = new URL(config.discovery.indexPath, config.baseUrl).toString();
        const found = yield* orSkip(
          'regions',
          indexUrl,
          fetcher
            .fetch(indexUrl, fetchOptions)
            .pipe(Effect.flatMap((html) => parser.parseIndex(html, indexUrl)))
        );
        if (Option.isNone(found)) return;

        const crawlTimestamp = yield* nowIso;
        for (const region of found.value) {
          const stored = yield* orSkip(
            'regions',
            region.canonicalUrl,
            storage.upsertRegion({
              name: region.name,
              slug: region.slug,
              canonicalUrl: region.canonicalUrl,
              sourceUrl: indexUrl,
              rawHtml: null,
              description: region.description,
              crawlTimestamp,
            })
          );
          if (Option.isSome(stored)) yield* add('regionsDiscovered');
        }
        yield* logger.logDiscovery('region', found.value.length);
      });

      const regionsToVisit = Effect.gen(function* () {
        if (options.region === undefined) {
          return yield* storage.getRegions;
        }
        const key = options.region;
        const match = /^\d+$/.test(key)
          ? yield* storage.getRegion(Number(key))
          : yield* storage.findRegionBySlug(key);
        if (Option.isNone(match)) {
          return yield* Effect.fail(
            ConfigError.invalid('region', `no stored region with id or slug '${key}'`)
          );
        }
        return [match.value];
      });

      const discoverRivers = (region: RegionRow) =>
        Effect.gen(function* () {
          const found = yield* orSkip(
            'rivers',
            region.canonicalUrl,
            Effect.gen(function* () {
              const html = yield* fetcher.fetch(region.canonicalUrl, fetchOptions);
              const rivers = yield* parser.parseRegion(html, region);
              return { html, rivers };
            })
          );
          if (Option.isNone(found)) return;

          const crawlTimestamp = yield* nowIso;
          yield* orSkip(
            'rivers',
            region.canonicalUrl,
            storage.upsertRegion({ ...region, rawHtml: found.value.html, crawlTimestamp })
          );

          for (const river of found.value.rivers) {
            const riverId = yield* orSkip(
              'rivers',
              river.canonicalUrl,
              storage.upsertRiver({
                regionId: region.id,
                name: river.name,
                slug: river.slug,
                canonicalUrl: river.canonicalUrl,
                sourceUrl: region.canonicalUrl,
                rawHtml: null,
                description: null,
                crawlTimestamp,
              })
            );
            if (Option.isNone(riverId)) continue;
            yield* add('riversDiscovered');

            for (const section of river.sections) {
              const stored = yield* orSkip(
                'rivers',
                `${river.canonicalUrl}#${section.slug}`,
                storage.upsertSection({ riverId: riverId.value, ...section, crawlTimestamp })
              );
              if (Option.isSome(stored)) yield* add('sectionsStored');
            }
          }
          yield* logger.logDiscovery('river', found.value.rivers.length, region.name);
        });

      const storeDetail = (river: RiverRow, html: string, detail: DetailResult) =>
        Effect.gen(function* () {
          const crawlTimestamp = yield* nowIso;

          for (const section of detail.sections) {
            const stored = yield* orSkip(
              'details',
              `${river.canonicalUrl}#${section.slug}`,
              storage.upsertSection({ riverId: river.id, ...section, crawlTimestamp })
            );
            if (Option.isSome(stored)) yield* add('sectionsStored');
          }

          const sectionIds = new Map(
            (yield* storage.getChildren(river.id, 'section')).map((s) => [s.slug, s.id])
          );
          const sectionIdOf = (slug: string | null) =>
            slug === null ? null : sectionIds.get(slug) ?? null;

          for (const fly of detail.flies) {
            const stored = yield* orSkip(
              'details',
              river.canonicalUrl,
              storage.upsertFly({
                riverId: river.id,
                sectionId: sectionIdOf(fly.sectionSlug),
                name: fly.name,
                rawText: fly.rawText,
                category: fly.category,
                size: fly.size,
                color: fly.color,
                notes: fly.notes,
                crawlTimestamp,
              })
            );
            if (Option.isSome(stored)) yield* add('fliesStored');
          }

          for (const regulation of detail.regulations) {
            const stored = yield* orSkip(
              'details',
              river.canonicalUrl,
              storage.upsertRegulation({
                riverId: river.id,
                sectionId: sectionIdOf(regulation.sectionSlug),
                type: regulation.type,
                value: regulation.value,
                rawText: regulation.rawText,
                sourceSection: regulation.sourceSection,
                crawlTimestamp,
              })
            );
            if (Option.isSome(stored)) yield* add('regulationsStored');
          }

          yield* storage.upsertRiver({
            ...river,
            rawHtml: html,
            description: detail.fishType,
            crawlTimestamp,
          });

          const rawContentHash = sha256(html);
          if (!(yield* storage.hasChanged('river', river.id, rawContentHash))) {
            yield* add('riversUnchanged');
          }
          yield* storage.recordCrawl({
            sessionId,
            entityType: 'river',
            entityId: river.id,
            rawContentHash,
            parsedHash: sha256(JSON.stringify(detail)),
            pageVersion: null,
            crawlTimestamp,
          });

          yield* logger.logExtraction(river.name, {
            flies: detail.flies.length,
            regulations: detail.regulations.length,
            sections: detail.sections.length,
          });
          yield* add('riversExtracted');
        });

      const extractDetails = (river: RiverRow) =>
        Effect.gen(function* () {
          if (!options.refresh) {
            const latest = yield* storage.latestCrawl('river', river.id);
            const now = yield* Clock.currentTimeMillis;
            if (
              Option.isSome(latest) &&
              now - Date.parse(latest.value.crawlTimestamp) < DETAIL_FRESHNESS_MS
            ) {
              yield* add('riversFresh');
              return;
            }
          }

          yield* orSkip(
            'details',
            river.canonicalUrl,
            Effect.gen(function* () {
              const html = yield* fetcher.fetch(river.canonicalUrl, fetchOptions);
              const detail = yield* parser.parseDetail(html, river);
              yield* storeDetail(river, html, detail);
            })
          );
        });

      yield* logger.logRun('start', { sessionId, phases: options.phases, region: options.region });

      const body = Effect.gen(function* () {
        if (options.phases.includes('regions')) {
          yield* discoverRegions;
        }
        if (options.phases.includes('rivers')) {
          for (const region of yield* regionsToVisit) {
            yield* discoverRivers(region);
          }
        }
        if (options.phases.includes('details')) {
          const rivers =
            options.region === undefined
              ? yield* storage.getRivers
              : (yield* Effect.forEach(yield* regionsToVisit, (region) =>
                  storage.getChildren(region.id, 'river')
                )).flat();
          for (const river of rivers) {
            yield* extractDetails(river);
          }
        }

        const summary: RunSummary = {
          sessionId,
          ...(yield* Ref.get(tally)),
          skipped: yield* Ref.get(skipped),
        };
        return summary;
      });

      return yield* body.pipe(
        Effect.tap((summary) => logger.logRun('complete', { ...summary })),
        Effect.tapErrorTag('HaltRequired', (error) =>
          logger.logRun('halted', { sessionId, reason: error.reason, url: error.url })
        )
      );
    });

  return { run } satisfies OrchestratorService;
});

export class Orchestrator extends Context.Tag('Orchestrator')<
  Orchestrator,
  OrchestratorService
>() {
  static Live = Layer.effect(Orchestrator, makeOrchestrator);
}
