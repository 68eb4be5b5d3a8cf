/**
 * SqliteStorage Tests
 * Upserts, write-once raw content and crawl metadata on an in-memory database
 */

import { describe, expect, it } from 'vitest';
import { Effect, Option } from 'effect';
import {
  makeSqliteStorage,
  type StorageService,
} from '../../../lib/Storage/SqliteStorage.service.js';

const T1 = '2024-05-01T12:00:00.000Z';
const T2 = '2024-05-02T12:00:00.000Z';

const withStorage = <A, E>(use: (storage: StorageService) => Effect.Effect<A, E>) =>
  Effect.runPromise(
    Effect.acquireUseRelease(makeSqliteStorage(':memory:'), use, (storage) => storage.close)
  );

const region = {
  name: 'North Valley',
  slug: 'north',
  canonicalUrl: 'https://waters.test/regions/north.html',
  sourceUrl: 'https://waters.test/index.html',
  rawHtml: null,
  description: 'Upland streams',
  crawlTimestamp: T1,
};

const riverOf = (regionId: number) => ({
  regionId,
  name: 'Alder River',
  slug: 'alder',
  canonicalUrl: 'https://waters.test/rivers/alder.html',
  sourceUrl: 'https://waters.test/regions/north.html',
  rawHtml: null,
  description: null,
  crawlTimestamp: T1,
});

describe('SqliteStorage', () => {
  it('upserts regions by canonical URL', async () => {
    const result = await withStorage((storage) =>
      Effect.gen(function* () {
        const first = yield* storage.upsertRegion(region);
        const second = yield* storage.upsertRegion({
          ...region,
          name: 'North Valley (renamed)',
          description: null,
          crawlTimestamp: T2,
        });
        return { first, second, regions: yield* storage.getRegions };
      })
    );

    expect(result.second).toBe(result.first);
    expect(result.regions).toEqual([
      {
        id: result.first,
        name: 'North Valley (renamed)',
        slug: 'north',
        canonicalUrl: region.canonicalUrl,
        sourceUrl: region.sourceUrl,
        rawHtml: null,
        description: 'Upland streams',
        crawlTimestamp: T2,
      },
    ]);
  });

  it('never replaces stored raw HTML', async () => {
    const river = await withStorage((storage) =>
      Effect.gen(function* () {
        const regionId = yield* storage.upsertRegion(region);
        const id = yield* storage.upsertRiver(riverOf(regionId));
        yield* storage.upsertRiver({ ...riverOf(regionId), rawHtml: '<p>Alder</p>' });
        yield* storage.upsertRiver({
          ...riverOf(regionId),
          rawHtml: '<p>  Alder </p>\n',
          description: 'Brown trout',
          crawlTimestamp: T2,
        });
        return yield* storage.getRiver(id);
      })
    );

    expect(Option.isSome(river)).toBe(true);
    if (Option.isSome(river)) {
      expect(river.value.rawHtml).toBe('<p>Alder</p>');
      expect(river.value.description).toBe('Brown trout');
      expect(river.value.crawlTimestamp).toBe(T2);
    }
  });

  it('keeps section raw HTML write-once as well', async () => {
    const sections = await withStorage((storage) =>
      Effect.gen(function* () {
        const regionId = yield* storage.upsertRegion(region);
        const riverId = yield* storage.upsertRiver(riverOf(regionId));
        const section = {
          riverId,
          name: 'Upper',
          slug: 'upper',
          canonicalUrl: null,
          rawHtml: '<div>upper</div>',
          description: null,
          crawlTimestamp: T1,
        };
        yield* storage.upsertSection(section);
        yield* storage.upsertSection({ ...section, name: 'Upper Alder', rawHtml: '<div>other</div>' });
        return yield* storage.getChildren(riverId, 'section');
      })
    );

    expect(sections.map((s) => [s.name, s.slug, s.rawHtml])).toEqual([
      ['Upper Alder', 'upper', '<div>upper</div>'],
    ]);
  });

  it('keys flies by river, section and raw text', async () => {
    const result = await withStorage((storage) =>
      Effect.gen(function* () {
        const regionId = yield* storage.upsertRegion(region);
        const riverId = yield* storage.upsertRiver(riverOf(regionId));
        const fly = {
          riverId,
          sectionId: null,
          name: 'Pheasant Tail Nymph #16',
          rawText: 'Pheasant Tail Nymph #16',
          category: null,
          size: '16',
          color: null,
          notes: null,
          crawlTimestamp: T1,
        };
        const first = yield* storage.upsertFly(fly);
        const again = yield* storage.upsertFly({ ...fly, category: 'nymph', crawlTimestamp: T2 });
        const other = yield* storage.upsertFly({
          ...fly,
          name: 'Adams #14',
          rawText: 'Adams #14',
          size: '14',
        });
        return {
          first,
          again,
          other,
          flies: yield* storage.getChildren(riverId, 'fly'),
        };
      })
    );

    expect(result.again).toBe(result.first);
    expect(result.other).not.toBe(result.first);
    expect(result.flies.map((f) => [f.rawText, f.category, f.size, f.crawlTimestamp])).toEqual([
      ['Pheasant Tail Nymph #16', 'nymph', '16', T2],
      ['Adams #14', null, '14', T1],
    ]);
  });

  it('keys regulations by river, section and raw text', async () => {
    const regulations = await withStorage((storage) =>
      Effect.gen(function* () {
        const regionId = yield* storage.upsertRegion(region);
        const riverId = yield* storage.upsertRiver(riverOf(regionId));
        const sectionId = yield* storage.upsertSection({
          riverId,
          name: 'Upper',
          slug: 'upper',
          canonicalUrl: null,
          rawHtml: null,
          description: null,
          crawlTimestamp: T1,
        });
        const regulation = {
          riverId,
          sectionId,
          type: 'unclassified',
          value: 'Catch limit: 2 trout',
          rawText: 'Catch limit: 2 trout',
          sourceSection: null,
          crawlTimestamp: T1,
        };
        yield* storage.upsertRegulation(regulation);
        yield* storage.upsertRegulation({ ...regulation, type: 'catch_limit', value: '2 fish' });
        yield* storage.upsertRegulation({ ...regulation, sectionId: null });
        return yield* storage.getChildren(riverId, 'regulation');
      })
    );

    expect(regulations.map((r) => [r.sectionId === null, r.type, r.value])).toEqual([
      [false, 'catch_limit', '2 fish'],
      [true, 'unclassified', 'Catch limit: 2 trout'],
    ]);
  });

  it('lists rivers per region and finds regions by slug', async () => {
    const result = await withStorage((storage) =>
      Effect.gen(function* () {
        const northId = yield* storage.upsertRegion(region);
        const southId = yield* storage.upsertRegion({
          ...region,
          name: 'South Coast',
          slug: 'south',
          canonicalUrl: 'https://waters.test/regions/south/',
        });
        yield* storage.upsertRiver(riverOf(northId));
        yield* storage.upsertRiver({
          ...riverOf(southId),
          name: 'Birch Brook',
          slug: 'birch',
          canonicalUrl: 'https://waters.test/rivers/birch.html',
        });
        return {
          north: (yield* storage.getChildren(northId, 'river')).map((r) => r.slug),
          south: (yield* storage.getChildren(southId, 'river')).map((r) => r.slug),
          all: (yield* storage.getRivers).map((r) => r.slug),
          bySlug: Option.map(yield* storage.findRegionBySlug('south'), (r) => r.id),
          missing: yield* storage.findRegionBySlug('east'),
          southId,
          counts: yield* storage.counts,
        };
      })
    );

    expect(result.north).toEqual(['alder']);
    expect(result.south).toEqual(['birch']);
    expect(result.all).toEqual(['alder', 'birch']);
    expect(result.bySlug).toEqual(Option.some(result.southId));
    expect(Option.isNone(result.missing)).toBe(true);
    expect(result.counts).toEqual({
      regions: 2,
      rivers: 2,
      sections: 0,
      flies: 0,
      regulations: 0,
    });
  });

  it('records crawl metadata and detects content changes', async () => {
    const result = await withStorage((storage) =>
      Effect.gen(function* () {
        const regionId = yield* storage.upsertRegion(region);
        const riverId = yield* storage.upsertRiver(riverOf(regionId));
        const before = yield* storage.hasChanged('river', riverId, 'hash-a');
        yield* storage.recordCrawl({
          sessionId: 'scrape-1',
          entityType: 'river',
          entityId: riverId,
          rawContentHash: 'hash-a',
          parsedHash: 'parsed-a',
          pageVersion: null,
          crawlTimestamp: T1,
        });
        yield* storage.recordCrawl({
          sessionId: 'scrape-2',
          entityType: 'river',
          entityId: riverId,
          rawContentHash: 'hash-b',
          parsedHash: 'parsed-b',
          pageVersion: null,
          crawlTimestamp: T2,
        });
        return {
          before,
          same: yield* storage.hasChanged('river', riverId, 'hash-b'),
          different: yield* storage.hasChanged('river', riverId, 'hash-a'),
          latest: Option.map(yield* storage.latestCrawl('river', riverId), (m) => m.sessionId),
        };
      })
    );

    expect(result).toEqual({
      before: true,
      same: false,
      different: true,
      latest: Option.some('scrape-2'),
    });
  });

  it('rejects a river whose region does not exist', async () => {
    const error = await withStorage((storage) => Effect.flip(storage.upsertRiver(riverOf(999))));
    expect(error._tag).toBe('StorageError');
    expect(error.message.startsWith('Failed to upsert river:')).toBe(true);
  });

  it('fails to open a database under an unusable path', async () => {
    const error = await Effect.runPromise(
      Effect.flip(makeSqliteStorage(':memory:', '/nonexistent/schema.sql'))
    );
    expect(error._tag).toBe('StorageError');
    expect(error.operation).toBe('open database');
  });
});
