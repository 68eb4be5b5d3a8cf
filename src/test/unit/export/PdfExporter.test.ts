import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Effect } from 'effect';
import * as fs from 'fs';
import * as path from 'path';
import { PdfExporter } from '../../../lib/Export/PdfExporter.service.js';
import { Storage } from '../../../lib/Storage/SqliteStorage.service.js';
import {
  BASE_URL,
  expectFailure,
  expectSuccess,
  makeHarness,
  makeTempDir,
  removeDir,
} from '../../infrastructure/EffectTestUtils.js';

const T1 = '2024-05-01T12:00:00.000Z';

/** One region with two rivers; only Alder has flies and regulations. */
const seed = Effect.gen(function* () {
  const storage = yield* Storage;
  const regionId = yield* storage.upsertRegion({
    name: 'North Valley',
    slug: 'north',
    canonicalUrl: `${BASE_URL}/regions/north.html`,
    sourceUrl: `${BASE_URL}/index.html`,
    rawHtml: null,
    description: null,
    crawlTimestamp: T1,
  });
  const river = (name: string, slug: string) =>
    storage.upsertRiver({
      regionId,
      name,
      slug,
      canonicalUrl: `${BASE_URL}/rivers/${slug}.html`,
      sourceUrl: `${BASE_URL}/regions/north.html`,
      rawHtml: null,
      description: null,
      crawlTimestamp: T1,
    });
  const alderId = yield* river('Alder River', 'alder');
  yield* river('Birch Brook', 'birch');
  const sectionId = yield* storage.upsertSection({
    riverId: alderId,
    name: 'Upper Alder',
    slug: 'upper',
    canonicalUrl: null,
    rawHtml: null,
    description: 'Moorland stretch above the weir.',
    crawlTimestamp: T1,
  });
  yield* storage.upsertFly({
    riverId: alderId,
    sectionId,
    name: 'Pheasant Tail Nymph #16',
    rawText: 'Pheasant Tail Nymph #16',
    category: 'nymph',
    size: '16',
    color: null,
    notes: null,
    crawlTimestamp: T1,
  });
  yield* storage.upsertRegulation({
    riverId: alderId,
    sectionId: null,
    type: 'catch_limit',
    value: '2 fish',
    rawText: 'Catch limit: 2 trout per day',
    sourceSection: 'Rules',
    crawlTimestamp: T1,
  });
  return { regionId, alderId };
});

describe('PdfExporter', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('renders a river report as a PDF document', async () => {
    const harness = makeHarness(dir, {});

    const pdf = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const { alderId } = yield* seed;
          const exporter = yield* PdfExporter;
          return yield* exporter.renderRiver(alderId);
        })
      )
    );

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('writes a river PDF under the output directory named by region and river', async () => {
    const harness = makeHarness(dir, {});

    const written = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const { alderId } = yield* seed;
          const exporter = yield* PdfExporter;
          return yield* exporter.exportRiver(alderId);
        })
      )
    );

    const expected = path.join(dir, 'pdfs', 'north-alder.pdf');
    expect(written).toBe(expected);
    expect(fs.readFileSync(expected).subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(harness.log.ofType('pdf_generated').map((e) => e.message)).toEqual([
      `Wrote ${expected} for river:alder`,
    ]);
    expect(harness.http.requests).toEqual([]);
  });

  it('writes to an explicit output path', async () => {
    const harness = makeHarness(dir, {});
    const target = path.join(dir, 'custom', 'alder.pdf');

    const written = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const { alderId } = yield* seed;
          const exporter = yield* PdfExporter;
          return yield* exporter.exportRiver(alderId, target);
        })
      )
    );

    expect(written).toBe(target);
    expect(fs.existsSync(target)).toBe(true);
  });

  it('writes one PDF per river of a region, including rivers with no data', async () => {
    const harness = makeHarness(dir, {});

    const written = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const { regionId } = yield* seed;
          const exporter = yield* PdfExporter;
          return yield* exporter.exportRegion(regionId);
        })
      )
    );

    expect(written).toEqual([
      path.join(dir, 'pdfs', 'north', 'alder.pdf'),
      path.join(dir, 'pdfs', 'north', 'birch.pdf'),
    ]);
    expect(written.every((file) => fs.existsSync(file))).toBe(true);
  });

  it('fails for a river that is not stored', async () => {
    const harness = makeHarness(dir, {});

    const error = expectFailure(
      await harness.run(Effect.flatMap(PdfExporter, (exporter) => exporter.exportRiver(99)))
    );

    expect(error._tag).toBe('ExportError');
    expect(error.message).toBe('River 99 does not exist');
  });

  it('fails for a region that is not stored', async () => {
    const harness = makeHarness(dir, {});

    const error = expectFailure(
      await harness.run(Effect.flatMap(PdfExporter, (exporter) => exporter.exportRegion(7)))
    );

    expect(error.message).toBe('Region 7 does not exist');
  });
});
