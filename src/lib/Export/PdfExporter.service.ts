import { Context, Effect, Layer, Option } from 'effect';
import * as fs from 'fs/promises';
import * as path from 'path';
import PDFDocument from 'pdfkit';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import { ExportError } from '../errors.js';
import { ScraperLogger } from '../Logging/ScraperLogger.service.js';
import {
  Storage,
  type FlyRow,
  type RegionRow,
  type RegulationRow,
  type RiverRow,
  type SectionRow,
} from '../Storage/SqliteStorage.service.js';

/** Everything printed for one river. */
export interface RiverReport {
  readonly river: RiverRow;
  readonly region: RegionRow;
  readonly sections: readonly SectionRow[];
  readonly flies: readonly FlyRow[];
  readonly regulations: readonly RegulationRow[];
}

/**
 * Offline PDF export of stored rivers. Reads only the database.
 *
 * @group Services
 * @public
 */
export interface PdfExporterService {
  readonly renderRiver: (riverId: number) => Effect.Effect<Buffer, ExportError>;
  /** Writes one PDF and returns its path. */
  readonly exportRiver: (
    riverId: number,
    outputPath?: string
  ) => Effect.Effect<string, ExportError>;
  /** Writes one PDF per river of the region into its own directory. */
  readonly exportRegion: (regionId: number) => Effect.Effect<string[], ExportError>;
}

const field = (label: string, value: string | null): string =>
  `${label}: ${value ?? '(not stated)'}`;

/**
 * Lays out a river report. Parsed values are printed next to the raw text
 * they were read from.
 */
export const renderReport = (report: RiverReport): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    const doc = new PDFDocument({ margin: 50, info: { Title: report.river.name } });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    const { river, region, sections, flies, regulations } = report;
    const sectionName = new Map(sections.map((s) => [s.id, s.name]));

    doc.fontSize(22).text(river.name, { align: 'center' });
    doc.fontSize(12).text(region.name, { align: 'center' });
    doc.moveDown();
    doc.fontSize(9);
    doc.text(field('Source', river.canonicalUrl));
    doc.text(field('Last crawled', river.crawlTimestamp));
    if (river.description) {
      doc.moveDown(0.5).text(river.description);
    }

    doc.moveDown();
    doc.fontSize(14).text('Sections', { underline: true });
    doc.moveDown(0.3).fontSize(10);
    if (sections.length === 0) doc.text('None listed.');
    for (const section of sections) {
      doc.text(`${section.name}${section.description ? ` - ${section.description}` : ''}`);
    }

    doc.moveDown();
    doc.fontSize(14).text('Recommended flies', { underline: true });
    doc.moveDown(0.3);
    if (flies.length === 0) doc.fontSize(10).text('None listed.');
    for (const fly of flies) {
      doc.fontSize(11).font('Helvetica-Bold').text(fly.name);
      doc.font('Helvetica').fontSize(9);
      if (fly.sectionId !== null) {
        doc.text(field('Section', sectionName.get(fly.sectionId) ?? null));
      }
      doc.text(
        [
          field('Category', fly.category),
          field('Size', fly.size),
          field('Colour', fly.color),
        ].join('   ')
      );
      if (fly.notes) doc.text(field('Notes', fly.notes));
      doc.fillColor('#555555').text(`Source text: "${fly.rawText}"`).fillColor('black');
      doc.moveDown(0.5);
    }

    doc.moveDown();
    doc.fontSize(14).text('Regulations', { underline: true });
    doc.moveDown(0.3);
    if (regulations.length === 0) doc.fontSize(10).text('None listed.');
    for (const regulation of regulations) {
      doc.fontSize(10).font('Helvetica-Bold').text(`${regulation.type}: `, { continued: true });
      doc.font('Helvetica').text(regulation.value);
      doc.fontSize(9);
      if (regulation.sourceSection) doc.text(field('Listed under', regulation.sourceSection));
      doc.fillColor('#555555').text(`Source text: "${regulation.rawText}"`).fillColor('black');
      doc.moveDown(0.5);
    }

    doc.end();
  });

export const makePdfExporter = Effect.gen(function* () {
  const config = yield* ScraperConfig;
  const storage = yield* Storage;
  const logger = yield* ScraperLogger;

  const fromStorage = <A, E extends { readonly message: string }>(
    target: string,
    effect: Effect.Effect<A, E>
  ) =>
    effect.pipe(
      Effect.mapError(
        (cause) => new ExportError({ target, cause, message: `Cannot export ${target}: ${cause.message}` })
      )
    );

  const loadReport = (riverId: number) =>
    Effect.gen(function* () {
      const target = `river ${riverId}`;
      const river = yield* fromStorage(target, storage.getRiver(riverId));
      if (Option.isNone(river)) {
        return yield* Effect.fail(
          new ExportError({ target, message: `River ${riverId} does not exist` })
        );
      }
      const region = yield* fromStorage(target, storage.getRegion(river.value.regionId));
      if (Option.isNone(region)) {
        return yield* Effect.fail(
          new ExportError({ target, message: `Region of river ${riverId} does not exist` })
        );
      }
      const [sections, flies, regulations] = yield* fromStorage(
        target,
        Effect.all([
          storage.getChildren(riverId, 'section'),
          storage.getChildren(riverId, 'fly'),
          storage.getChildren(riverId, 'regulation'),
        ])
      );
      return { river: river.value, region: region.value, sections, flies, regulations };
    });

  const render = (report: RiverReport) =>
    Effect.tryPromise({
      try: () => renderReport(report),
      catch: (cause) =>
        new ExportError({
          target: `river ${report.river.id}`,
          cause,
          message: `Failed to render PDF for ${report.river.name}: ${cause}`,
        }),
    });

  const write = (report: RiverReport, filePath: string) =>
    Effect.gen(function* () {
      const pdf = yield* render(report);
      yield* Effect.tryPromise({
        try: async () => {
          await fs.mkdir(path.dirname(filePath), { recursive: true });
          await fs.writeFile(filePath, pdf);
        },
        catch: (cause) =>
          new ExportError({ target: filePath, cause, message: `Failed to write ${filePath}: ${cause}` }),
      });
      yield* logger.logPdfGenerated(filePath, `river:${report.river.slug}`);
      return filePath;
    });

  return {
    renderRiver: (riverId) => loadReport(riverId).pipe(Effect.flatMap(render)),

    exportRiver: (riverId, outputPath) =>
      Effect.gen(function* () {
        const report = yield* loadReport(riverId);
        return yield* write(
          report,
          outputPath ??
            path.join(config.outputDir, `${report.region.slug}-${report.river.slug}.pdf`)
        );
      }),

    exportRegion: (regionId) =>
      Effect.gen(function* () {
        const target = `region ${regionId}`;
        const region = yield* fromStorage(target, storage.getRegion(regionId));
        if (Option.isNone(region)) {
          return yield* Effect.fail(
            new ExportError({ target, message: `Region ${regionId} does not exist` })
          );
        }
        const rivers = yield* fromStorage(target, storage.getChildren(regionId, 'river'));
        const dir = path.join(config.outputDir, region.value.slug);
        return yield* Effect.forEach(rivers, (river) =>
          loadReport(river.id).pipe(
            Effect.flatMap((report) => write(report, path.join(dir, `${river.slug}.pdf`)))
          )
        );
      }),
  } satisfies PdfExporterService;
});

export class PdfExporter extends Context.Tag('PdfExporter')<
  PdfExporter,
  PdfExporterService
>() {
  static Live = Layer.effect(PdfExporter, makePdfExporter);
}
