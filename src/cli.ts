#!/usr/bin/env node
import { Console, Data, Effect, Either, Option } from 'effect';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { parseArgs } from 'util';
import { PageCache } from './lib/Cache/PageCache.service.js';
import { loadConfigFile } from './lib/Config/ScraperConfig.service.js';
import type {
  CacheError,
  ConfigError,
  ExportError,
  HaltRequired,
  StorageError,
} from './lib/errors.js';
import { PdfExporter } from './lib/Export/PdfExporter.service.js';
import {
  Orchestrator,
  type Phase,
  type RunSummary,
} from './lib/Orchestrator/Orchestrator.service.js';
import {
  makeScraperLayer,
  type ScraperLayerOverrides,
} from './lib/ScraperLayer.js';
import { Storage } from './lib/Storage/SqliteStorage.service.js';

export const DEFAULT_CONFIG_PATH = 'config/fishing-waters.yaml';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_HALTED = 2;

export const USAGE = `Usage: fishing-waters [--config path] <command>

Commands:
  scrape [--all] [--refresh] [--region id|slug] [--details]
      no flags           discover regions from the index page
      --region X         discover rivers of region X (add --details for their pages)
      --details          extract detail pages of every stored river
      --all              regions, rivers and details in one run
      --refresh          bypass the cache and re-extract recently crawled rivers
  query regions
  query rivers [--region-id n]
  query river --river-id n
  cache clear|stats
  pdf --river-id n | --region n`;

export type Command =
  | {
      readonly _tag: 'Scrape';
      readonly phases: readonly Phase[];
      readonly region?: string;
      readonly refresh: boolean;
    }
  | { readonly _tag: 'QueryRegions' }
  | { readonly _tag: 'QueryRivers'; readonly regionId?: number }
  | { readonly _tag: 'QueryRiver'; readonly riverId: number }
  | { readonly _tag: 'Cache'; readonly action: 'clear' | 'stats' }
  | { readonly _tag: 'PdfRiver'; readonly riverId: number }
  | { readonly _tag: 'PdfRegion'; readonly regionId: number }
  | { readonly _tag: 'Help' };

export interface Invocation {
  readonly configPath: string;
  readonly command: Command;
}

export class UsageError extends Data.TaggedError('UsageError')<{
  readonly message: string;
}> {}

const parseId = (flag: string, value: string): Either.Either<number, UsageError> =>
  /^\d+$/.test(value) && Number(value) > 0
    ? Either.right(Number(value))
    : Either.left(new UsageError({ message: `--${flag} expects a positive integer, got '${value}'` }));

const scrapePhases = (values: {
  all: boolean;
  details: boolean;
  region: string | undefined;
}): Phase[] => {
  if (values.all) return ['regions', 'rivers', 'details'];
  if (values.region !== undefined) {
    return values.details ? ['rivers', 'details'] : ['rivers'];
  }
  if (values.details) return ['details'];
  return ['regions'];
};

/**
 * Turns command-line arguments (without the node and script entries) into
 * an invocation.
 */
export const parseCommand = (
  argv: readonly string[]
): Either.Either<Invocation, UsageError> =>
  Either.gen(function* () {
    const { values, positionals } = yield* Either.try({
      try: () =>
        parseArgs({
          args: [...argv],
          allowPositionals: true,
          strict: true,
          options: {
            config: { type: 'string', short: 'c' },
            all: { type: 'boolean', default: false },
            refresh: { type: 'boolean', default: false },
            details: { type: 'boolean', default: false },
            region: { type: 'string' },
            'region-id': { type: 'string' },
            'river-id': { type: 'string' },
            help: { type: 'boolean', short: 'h', default: false },
          },
        }),
      catch: (cause) =>
        new UsageError({ message: cause instanceof Error ? cause.message : String(cause) }),
    });

    const configPath = values.config ?? DEFAULT_CONFIG_PATH;
    const [name, target, ...rest] = positionals;
    const invocation = (command: Command): Invocation => ({ configPath, command });

    if (values.help || name === undefined || name === 'help') {
      return invocation({ _tag: 'Help' });
    }
    if (rest.length > 0) {
      return yield* Either.left(new UsageError({ message: `Unexpected argument '${rest[0]}'` }));
    }

    switch (name) {
      case 'scrape': {
        if (target !== undefined) {
          return yield* Either.left(new UsageError({ message: `Unexpected argument '${target}'` }));
        }
        return invocation({
          _tag: 'Scrape',
          phases: scrapePhases({ all: values.all, details: values.details, region: values.region }),
          ...(values.region !== undefined ? { region: values.region } : {}),
          refresh: values.refresh,
        });
      }

      case 'query': {
        if (target === 'regions') return invocation({ _tag: 'QueryRegions' });
        if (target === 'rivers') {
          const raw = values['region-id'];
          if (raw === undefined) return invocation({ _tag: 'QueryRivers' });
          const regionId = yield* parseId('region-id', raw);
          return invocation({ _tag: 'QueryRivers', regionId });
        }
        if (target === 'river') {
          const raw = values['river-id'];
          if (raw === undefined) {
            return yield* Either.left(new UsageError({ message: 'query river needs --river-id' }));
          }
          const riverId = yield* parseId('river-id', raw);
          return invocation({ _tag: 'QueryRiver', riverId });
        }
        return yield* Either.left(
          new UsageError({ message: 'query expects one of: regions, rivers, river' })
        );
      }

      case 'cache': {
        if (target === 'clear' || target === 'stats') {
          return invocation({ _tag: 'Cache', action: target });
        }
        return yield* Either.left(new UsageError({ message: 'cache expects clear or stats' }));
      }

      case 'pdf': {
        const riverRaw = values['river-id'];
        const regionRaw = values.region;
        if ((riverRaw === undefined) === (regionRaw === undefined)) {
          return yield* Either.left(
            new UsageError({ message: 'pdf needs exactly one of --river-id or --region' })
          );
        }
        if (riverRaw !== undefined) {
          const riverId = yield* parseId('river-id', riverRaw);
          return invocation({ _tag: 'PdfRiver', riverId });
        }
        const regionId = yield* parseId('region', regionRaw ?? '');
        return invocation({ _tag: 'PdfRegion', regionId });
      }

      default:
        return yield* Either.left(new UsageError({ message: `Unknown command '${name}'` }));
    }
  });

export const formatSummary = (summary: RunSummary): string[] => [
  `Session ${summary.sessionId}`,
  `  regions discovered: ${summary.regionsDiscovered}`,
  `  rivers discovered:  ${summary.riversDiscovered}`,
  `  sections stored:    ${summary.sectionsStored}`,
  `  rivers extracted:   ${summary.riversExtracted} (${summary.riversUnchanged} unchanged, ${summary.riversFresh} skipped as fresh)`,
  `  flies stored:       ${summary.fliesStored}`,
  `  regulations stored: ${summary.regulationsStored}`,
  `  skipped:            ${summary.skipped.length}`,
  ...summary.skipped.map((s) => `    [${s.phase}] ${s.target}: ${s.message}`),
];

const printLines = (lines: readonly string[]) =>
  Effect.forEach(lines, (line) => Console.log(line), { discard: true });

type CommandError = HaltRequired | ConfigError | StorageError | CacheError | ExportError;
type CommandServices = Orchestrator | Storage | PageCache | PdfExporter;

const execute = (
  command: Exclude<Command, { _tag: 'Help' }>
): Effect.Effect<number, CommandError, CommandServices> => {
  switch (command._tag) {
    case 'Scrape':
      return Effect.gen(function* () {
        const orchestrator = yield* Orchestrator;
        const summary = yield* orchestrator.run({
          phases: command.phases,
          region: command.region,
          refresh: command.refresh,
        });
        yield* printLines(formatSummary(summary));
        return EXIT_OK;
      });

    case 'QueryRegions':
      return Effect.gen(function* () {
        const storage = yield* Storage;
        const regions = yield* storage.getRegions;
        if (regions.length === 0) yield* Console.log('No regions stored.');
        yield* printLines(regions.map((r) => `[${r.id}] ${r.name} (${r.slug}) ${r.canonicalUrl}`));
        return EXIT_OK;
      });

    case 'QueryRivers':
      return Effect.gen(function* () {
        const storage = yield* Storage;
        const rivers =
          command.regionId === undefined
            ? yield* storage.getRivers
            : yield* storage.getChildren(command.regionId, 'river');
        if (rivers.length === 0) yield* Console.log('No rivers stored.');
        yield* printLines(
          rivers.map((r) => `[${r.id}] ${r.name} (${r.slug}) region ${r.regionId} ${r.canonicalUrl}`)
        );
        return EXIT_OK;
      });

    case 'QueryRiver':
      return Effect.gen(function* () {
        const storage = yield* Storage;
        const river = yield* storage.getRiver(command.riverId);
        if (Option.isNone(river)) {
          yield* Console.error(`River ${command.riverId} does not exist`);
          return EXIT_ERROR;
        }
        const { id, name, canonicalUrl, description, crawlTimestamp } = river.value;
        const sections = yield* storage.getChildren(id, 'section');
        const flies = yield* storage.getChildren(id, 'fly');
        const regulations = yield* storage.getChildren(id, 'regulation');
        yield* printLines([
          `[${id}] ${name}`,
          `  url: ${canonicalUrl}`,
          `  description: ${description ?? '(none)'}`,
          `  last crawled: ${crawlTimestamp ?? '(never)'}`,
          `  sections: ${sections.map((s) => s.name).join(', ') || '(none)'}`,
          `  flies (${flies.length}):`,
          ...flies.map(
            (f) =>
              `    ${f.name} [category=${f.category ?? '-'} size=${f.size ?? '-'} color=${f.color ?? '-'}]`
          ),
          `  regulations (${regulations.length}):`,
          ...regulations.map((r) => `    ${r.type}: ${r.value}`),
        ]);
        return EXIT_OK;
      });

    case 'Cache':
      return Effect.gen(function* () {
        const cache = yield* PageCache;
        if (command.action === 'clear') {
          const removed = yield* cache.clear;
          yield* Console.log(`Removed ${removed} cached page(s).`);
          return EXIT_OK;
        }
        const stats = yield* cache.stats;
        yield* printLines([
          `hits: ${stats.hits}`,
          `misses: ${stats.misses}`,
          `stale: ${stats.stale}`,
          `total: ${stats.total}`,
          `hit rate: ${(stats.hitRate * 100).toFixed(1)}%`,
          `bytes cached: ${stats.bytesCached}`,
        ]);
        return EXIT_OK;
      });

    case 'PdfRiver':
      return Effect.gen(function* () {
        const exporter = yield* PdfExporter;
        const file = yield* exporter.exportRiver(command.riverId);
        yield* Console.log(`Wrote ${file}`);
        return EXIT_OK;
      });

    case 'PdfRegion':
      return Effect.gen(function* () {
        const exporter = yield* PdfExporter;
        const files = yield* exporter.exportRegion(command.regionId);
        yield* printLines(files.map((file) => `Wrote ${file}`));
        return EXIT_OK;
      });
  }
};

const fail = (message: string, code: number) =>
  Console.error(message).pipe(Effect.as(code));

/**
 * Runs one command and resolves to the process exit code: 0 on success, 1
 * for usage, configuration or unexpected errors, 2 when a run halted.
 */
export const runCli = (
  argv: readonly string[],
  overrides: ScraperLayerOverrides = {}
): Effect.Effect<number> => {
  const parsed = parseCommand(argv);
  if (Either.isLeft(parsed)) {
    return fail(`${parsed.left.message}\n\n${USAGE}`, EXIT_ERROR);
  }
  const { configPath, command } = parsed.right;
  if (command._tag === 'Help') {
    return Console.log(USAGE).pipe(Effect.as(EXIT_OK));
  }

  return Effect.gen(function* () {
    const options = yield* loadConfigFile(configPath);
    return yield* execute(command).pipe(
      Effect.provide(makeScraperLayer(options, overrides))
    );
  }).pipe(
    Effect.catchTags({
      HaltRequired: (error) => fail(`Run halted: ${error.reason}`, EXIT_HALTED),
      ConfigError: (error) => fail(error.message, EXIT_ERROR),
      StorageError: (error) => fail(error.message, EXIT_ERROR),
      CacheError: (error) => fail(error.message, EXIT_ERROR),
      ExportError: (error) => fail(error.message, EXIT_ERROR),
    }),
    Effect.catchAllDefect((defect) => fail(`Unexpected error: ${String(defect)}`, EXIT_ERROR))
  );
};

const invokedDirectly = (): boolean => {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
};

if (invokedDirectly()) {
  Effect.runPromise(runCli(process.argv.slice(2)))
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error('Unexpected error:', error);
      process.exit(EXIT_ERROR);
    });
}
