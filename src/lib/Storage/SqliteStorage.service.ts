import Database from 'better-sqlite3';
import { Context, Effect, Layer, Option } from 'effect';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import { StorageError } from '../errors.js';

export const SCHEMA_PATH = fileURLToPath(
  new URL('../../../database/schema.sql', import.meta.url)
);

export interface RegionRow {
  readonly id: number;
  readonly name: string;
  readonly slug: string;
  readonly canonicalUrl: string;
  readonly sourceUrl: string | null;
  readonly rawHtml: string | null;
  readonly description: string | null;
  readonly crawlTimestamp: string | null;
}

export interface RiverRow {
  readonly id: number;
  readonly regionId: number;
  readonly name: string;
  readonly slug: string;
  readonly canonicalUrl: string;
  readonly sourceUrl: string | null;
  readonly rawHtml: string | null;
  readonly description: string | null;
  readonly crawlTimestamp: string | null;
}

export interface SectionRow {
  readonly id: number;
  readonly riverId: number;
  readonly name: string;
  readonly slug: string;
  readonly canonicalUrl: string | null;
  readonly rawHtml: string | null;
  readonly description: string | null;
  readonly crawlTimestamp: string | null;
}

export interface FlyRow {
  readonly id: number;
  readonly riverId: number;
  readonly sectionId: number | null;
  readonly name: string;
  readonly rawText: string;
  readonly category: string | null;
  readonly size: string | null;
  readonly color: string | null;
  readonly notes: string | null;
  readonly crawlTimestamp: string | null;
}

export interface RegulationRow {
  readonly id: number;
  readonly riverId: number;
  readonly sectionId: number | null;
  readonly type: string;
  readonly value: string;
  readonly rawText: string;
  readonly sourceSection: string | null;
  readonly crawlTimestamp: string | null;
}

export interface CrawlMetadataRow {
  readonly id: number;
  readonly sessionId: string;
  readonly entityType: string;
  readonly entityId: number;
  readonly rawContentHash: string;
  readonly parsedHash: string;
  readonly pageVersion: string | null;
  readonly crawlTimestamp: string;
}

type Insert<Row> = Omit<Row, 'id'>;

export type RegionInput = Insert<RegionRow>;
export type RiverInput = Insert<RiverRow>;
export type SectionInput = Insert<SectionRow>;
export type FlyInput = Insert<FlyRow>;
export type RegulationInput = Insert<RegulationRow>;
export type CrawlMetadataInput = Insert<CrawlMetadataRow>;

/** Row type per child kind for {@link StorageService.getChildren}. */
export interface ChildRows {
  readonly river: RiverRow;
  readonly section: SectionRow;
  readonly fly: FlyRow;
  readonly regulation: RegulationRow;
}

export interface StorageCounts {
  readonly regions: number;
  readonly rivers: number;
  readonly sections: number;
  readonly flies: number;
  readonly regulations: number;
}

/**
 * Durable store for discovered entities.
 *
 * Upserts return the row id. A raw_html / raw_text value, once stored, is
 * never replaced; re-crawls update parsed fields and timestamps only.
 *
 * @group Services
 * @public
 */
export interface StorageService {
  readonly upsertRegion: (region: RegionInput) => Effect.Effect<number, StorageError>;
  readonly upsertRiver: (river: RiverInput) => Effect.Effect<number, StorageError>;
  readonly upsertSection: (section: SectionInput) => Effect.Effect<number, StorageError>;
  readonly upsertFly: (fly: FlyInput) => Effect.Effect<number, StorageError>;
  readonly upsertRegulation: (
    regulation: RegulationInput
  ) => Effect.Effect<number, StorageError>;
  /**
   * Rivers of a region, or sections, flies and regulations of a river.
   */
  readonly getChildren: <K extends keyof ChildRows>(
    parentId: number,
    kind: K
  ) => Effect.Effect<ChildRows[K][], StorageError>;
  readonly getRegion: (id: number) => Effect.Effect<Option.Option<RegionRow>, StorageError>;
  readonly getRegions: Effect.Effect<RegionRow[], StorageError>;
  readonly findRegionBySlug: (
    slug: string
  ) => Effect.Effect<Option.Option<RegionRow>, StorageError>;
  readonly getRiver: (id: number) => Effect.Effect<Option.Option<RiverRow>, StorageError>;
  readonly getRivers: Effect.Effect<RiverRow[], StorageError>;
  readonly recordCrawl: (
    metadata: CrawlMetadataInput
  ) => Effect.Effect<number, StorageError>;
  readonly latestCrawl: (
    entityType: string,
    entityId: number
  ) => Effect.Effect<Option.Option<CrawlMetadataRow>, StorageError>;
  /** True when there is no earlier crawl or its raw content hash differs. */
  readonly hasChanged: (
    entityType: string,
    entityId: number,
    rawContentHash: string
  ) => Effect.Effect<boolean, StorageError>;
  readonly counts: Effect.Effect<StorageCounts, StorageError>;
  readonly close: Effect.Effect<void>;
}

const REGION_COLUMNS = `id, name, slug, canonical_url AS canonicalUrl, source_url AS sourceUrl,
  raw_html AS rawHtml, description, crawl_timestamp AS crawlTimestamp`;
const RIVER_COLUMNS = `id, region_id AS regionId, name, slug, canonical_url AS canonicalUrl,
  source_url AS sourceUrl, raw_html AS rawHtml, description, crawl_timestamp AS crawlTimestamp`;
const SECTION_COLUMNS = `id, river_id AS riverId, name, slug, canonical_url AS canonicalUrl,
  raw_html AS rawHtml, description, crawl_timestamp AS crawlTimestamp`;
const FLY_COLUMNS = `id, river_id AS riverId, section_id AS sectionId, name, raw_text AS rawText,
  category, size, color, notes, crawl_timestamp AS crawlTimestamp`;
const REGULATION_COLUMNS = `id, river_id AS riverId, section_id AS sectionId, type, value,
  raw_text AS rawText, source_section AS sourceSection, crawl_timestamp AS crawlTimestamp`;
const METADATA_COLUMNS = `id, session_id AS sessionId, entity_type AS entityType,
  entity_id AS entityId, raw_content_hash AS rawContentHash, parsed_hash AS parsedHash,
  page_version AS pageVersion, crawl_timestamp AS crawlTimestamp`;

interface IdRow {
  readonly id: number;
}

/**
 * Opens (creating if needed) the database at `databasePath` and applies the
 * schema. `:memory:` gives a private in-memory database.
 */
export const makeSqliteStorage = (
  databasePath: string,
  schemaPath: string = SCHEMA_PATH
): Effect.Effect<StorageService, StorageError> =>
  Effect.try({
    try: () => {
      if (databasePath !== ':memory:') {
        fs.mkdirSync(path.dirname(databasePath), { recursive: true });
      }
      const db = new Database(databasePath);
      db.pragma('journal_mode = WAL');
      db.exec(fs.readFileSync(schemaPath, 'utf-8'));
      return db;
    },
    catch: (cause) => StorageError.fromCause('open database', cause),
  }).pipe(Effect.map(buildStorage));

const buildStorage = (db: Database.Database): StorageService => {
  const attempt = <A>(operation: string, run: () => A) =>
    Effect.try({
      try: run,
      catch: (cause) => StorageError.fromCause(operation, cause),
    });

  const upsertRegionStmt = db.prepare<
    [string, string, string, string | null, string | null, string | null, string | null],
    IdRow
  >(`
    INSERT INTO regions (name, slug, canonical_url, source_url, raw_html, description, crawl_timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(canonical_url) DO UPDATE SET
      name = excluded.name,
      slug = excluded.slug,
      source_url = COALESCE(excluded.source_url, regions.source_url),
      raw_html = COALESCE(regions.raw_html, excluded.raw_html),
      description = COALESCE(excluded.description, regions.description),
      crawl_timestamp = excluded.crawl_timestamp,
      updated_at = CURRENT_TIMESTAMP
    RETURNING id
  `);

  const upsertRiverStmt = db.prepare<
    [number, string, string, string, string | null, string | null, string | null, string | null],
    IdRow
  >(`
    INSERT INTO rivers (region_id, name, slug, canonical_url, source_url, raw_html, description, crawl_timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(canonical_url) DO UPDATE SET
      region_id = excluded.region_id,
      name = excluded.name,
      slug = excluded.slug,
      source_url = COALESCE(excluded.source_url, rivers.source_url),
      raw_html = COALESCE(rivers.raw_html, excluded.raw_html),
      description = COALESCE(excluded.description, rivers.description),
      crawl_timestamp = excluded.crawl_timestamp,
      updated_at = CURRENT_TIMESTAMP
    RETURNING id
  `);

  const upsertSectionStmt = db.prepare<
    [number, string, string, string | null, string | null, string | null, string | null],
    IdRow
  >(`
    INSERT INTO sections (river_id, name, slug, canonical_url, raw_html, description, crawl_timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(river_id, slug) DO UPDATE SET
      name = excluded.name,
      canonical_url = COALESCE(excluded.canonical_url, sections.canonical_url),
      raw_html = COALESCE(sections.raw_html, excluded.raw_html),
      description = COALESCE(excluded.description, sections.description),
      crawl_timestamp = excluded.crawl_timestamp,
      updated_at = CURRENT_TIMESTAMP
    RETURNING id
  `);

  const findFlyStmt = db.prepare<[number, number | null, string], IdRow>(
    `SELECT id FROM recommended_flies WHERE river_id = ? AND section_id IS ? AND raw_text = ?`
  );
  const insertFlyStmt = db.prepare<
    [number, number | null, string, string, string | null, string | null, string | null, string | null, string | null],
    IdRow
  >(`
    INSERT INTO recommended_flies
      (river_id, section_id, name, raw_text, category, size, color, notes, crawl_timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    RETURNING id
  `);
  const updateFlyStmt = db.prepare<
    [string, string | null, string | null, string | null, string | null, string | null, number]
  >(`
    UPDATE recommended_flies
    SET name = ?, category = ?, size = ?, color = ?, notes = ?, crawl_timestamp = ?,
        updated_at = CURRENT_TIMESTAMP
    WHERE id = ?
  `);

  const findRegulationStmt = db.prepare<[number, number | null, string], IdRow>(
    `SELECT id FROM regulations WHERE river_id = ? AND section_id IS ? AND raw_text = ?`
  );
  const insertRegulationStmt = db.prepare<
    [number, number | null, string, string, string, string | null, string | null],
    IdRow
  >(`
    INSERT INTO regulations
      (river_id, section_id, type, value, raw_text, source_section, crawl_timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    RETURNING id
  `);
  const updateRegulationStmt = db.prepare<
    [string, string, string | null, string | null, number]
  >(`
    UPDATE regulations
    SET type = ?, value = ?, source_section = ?, crawl_timestamp = ?,
        updated_at = CURRENT_TIMESTAMP
    WHERE id = ?
  `);

  const recordCrawlStmt = db.prepare<
    [string, string, number, string, string, string | null, string],
    IdRow
  >(`
    INSERT INTO crawl_metadata
      (session_id, entity_type, entity_id, raw_content_hash, parsed_hash, page_version, crawl_timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(session_id, entity_type, entity_id) DO UPDATE SET
      raw_content_hash = excluded.raw_content_hash,
      parsed_hash = excluded.parsed_hash,
      page_version = excluded.page_version,
      crawl_timestamp = excluded.crawl_timestamp
    RETURNING id
  `);
  const latestCrawlStmt = db.prepare<[string, number], CrawlMetadataRow>(`
    SELECT ${METADATA_COLUMNS} FROM crawl_metadata
    WHERE entity_type = ? AND entity_id = ?
    ORDER BY crawl_timestamp DESC, id DESC
    LIMIT 1
  `);

  const regionByIdStmt = db.prepare<[number], RegionRow>(
    `SELECT ${REGION_COLUMNS} FROM regions WHERE id = ?`
  );
  const regionBySlugStmt = db.prepare<[string], RegionRow>(
    `SELECT ${REGION_COLUMNS} FROM regions WHERE slug = ?`
  );
  const regionsStmt = db.prepare<[], RegionRow>(
    `SELECT ${REGION_COLUMNS} FROM regions ORDER BY name, id`
  );
  const riverByIdStmt = db.prepare<[number], RiverRow>(
    `SELECT ${RIVER_COLUMNS} FROM rivers WHERE id = ?`
  );
  const riversStmt = db.prepare<[], RiverRow>(
    `SELECT ${RIVER_COLUMNS} FROM rivers ORDER BY name, id`
  );

  const riversOfRegionStmt = db.prepare<[number], RiverRow>(
    `SELECT ${RIVER_COLUMNS} FROM rivers WHERE region_id = ? ORDER BY name, id`
  );
  const sectionsOfRiverStmt = db.prepare<[number], SectionRow>(
    `SELECT ${SECTION_COLUMNS} FROM sections WHERE river_id = ? ORDER BY id`
  );
  const fliesOfRiverStmt = db.prepare<[number], FlyRow>(
    `SELECT ${FLY_COLUMNS} FROM recommended_flies WHERE river_id = ? ORDER BY id`
  );
  const regulationsOfRiverStmt = db.prepare<[number], RegulationRow>(
    `SELECT ${REGULATION_COLUMNS} FROM regulations WHERE river_id = ? ORDER BY id`
  );

  const childQueries: { [K in keyof ChildRows]: (parentId: number) => ChildRows[K][] } = {
    river: (id) => riversOfRegionStmt.all(id),
    section: (id) => sectionsOfRiverStmt.all(id),
    fly: (id) => fliesOfRiverStmt.all(id),
    regulation: (id) => regulationsOfRiverStmt.all(id),
  };

  const returnedId = (row: IdRow | undefined, operation: string): number => {
    if (row === undefined) {
      throw new Error(`${operation} returned no row`);
    }
    return row.id;
  };

  const upsertByRawText = (
    find: () => IdRow | undefined,
    insert: () => IdRow | undefined,
    update: (id: number) => void,
    operation: string
  ) =>
    attempt(operation, () =>
      db.transaction(() => {
        const existing = find();
        if (existing) {
          update(existing.id);
          return existing.id;
        }
        return returnedId(insert(), operation);
      })()
    );

  const count = (table: string): number => {
    const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
    return row?.n ?? 0;
  };

  return {
    upsertRegion: (r) =>
      attempt('upsert region', () =>
        returnedId(
          upsertRegionStmt.get(
            r.name,
            r.slug,
            r.canonicalUrl,
            r.sourceUrl,
            r.rawHtml,
            r.description,
            r.crawlTimestamp
          ),
          'upsert region'
        )
      ),

    upsertRiver: (r) =>
      attempt('upsert river', () =>
        returnedId(
          upsertRiverStmt.get(
            r.regionId,
            r.name,
            r.slug,
            r.canonicalUrl,
            r.sourceUrl,
            r.rawHtml,
            r.description,
            r.crawlTimestamp
          ),
          'upsert river'
        )
      ),

    upsertSection: (s) =>
      attempt('upsert section', () =>
        returnedId(
          upsertSectionStmt.get(
            s.riverId,
            s.name,
            s.slug,
            s.canonicalUrl,
            s.rawHtml,
            s.description,
            s.crawlTimestamp
          ),
          'upsert section'
        )
      ),

    upsertFly: (f) =>
      upsertByRawText(
        () => findFlyStmt.get(f.riverId, f.sectionId, f.rawText),
        () =>
          insertFlyStmt.get(
            f.riverId,
            f.sectionId,
            f.name,
            f.rawText,
            f.category,
            f.size,
            f.color,
            f.notes,
            f.crawlTimestamp
          ),
        (id) => {
          updateFlyStmt.run(f.name, f.category, f.size, f.color, f.notes, f.crawlTimestamp, id);
        },
        'upsert fly'
      ),

    upsertRegulation: (r) =>
      upsertByRawText(
        () => findRegulationStmt.get(r.riverId, r.sectionId, r.rawText),
        () =>
          insertRegulationStmt.get(
            r.riverId,
            r.sectionId,
            r.type,
            r.value,
            r.rawText,
            r.sourceSection,
            r.crawlTimestamp
          ),
        (id) => {
          updateRegulationStmt.run(r.type, r.value, r.sourceSection, r.crawlTimestamp, id);
        },
        'upsert regulation'
      ),

    getChildren: (parentId, kind) =>
      attempt(`read ${kind} rows`, () => childQueries[kind](parentId)),

    getRegion: (id) =>
      attempt('read region', () => Option.fromNullable(regionByIdStmt.get(id))),
    getRegions: attempt('read regions', () => regionsStmt.all()),
    findRegionBySlug: (slug) =>
      attempt('read region', () => Option.fromNullable(regionBySlugStmt.get(slug))),
    getRiver: (id) =>
      attempt('read river', () => Option.fromNullable(riverByIdStmt.get(id))),
    getRivers: attempt('read rivers', () => riversStmt.all()),

    recordCrawl: (m) =>
      attempt('record crawl metadata', () =>
        returnedId(
          recordCrawlStmt.get(
            m.sessionId,
            m.entityType,
            m.entityId,
            m.rawContentHash,
            m.parsedHash,
            m.pageVersion,
            m.crawlTimestamp
          ),
          'record crawl metadata'
        )
      ),

    latestCrawl: (entityType, entityId) =>
      attempt('read crawl metadata', () =>
        Option.fromNullable(latestCrawlStmt.get(entityType, entityId))
      ),

    hasChanged: (entityType, entityId, rawContentHash) =>
      attempt('read crawl metadata', () => {
        const latest = latestCrawlStmt.get(entityType, entityId);
        return latest === undefined || latest.rawContentHash !== rawContentHash;
      }),

    counts: attempt('count rows', () => ({
      regions: count('regions'),
      rivers: count('rivers'),
      sections: count('sections'),
      flies: count('recommended_flies'),
      regulations: count('regulations'),
    })),

    close: Effect.sync(() => {
      if (db.open) db.close();
    }),
  };
};

/**
 * @group Services
 * @public
 */
export class Storage extends Context.Tag('Storage')<Storage, StorageService>() {
  /** Opens the configured database and closes it when the scope ends. */
  static Live = Layer.scoped(
    Storage,
    Effect.gen(function* () {
      const config = yield* ScraperConfig;
      return yield* Effect.acquireRelease(
        makeSqliteStorage(config.databasePath),
        (storage) => storage.close
      );
    })
  );
}
