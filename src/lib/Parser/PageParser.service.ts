import { Context, Effect, Either, Layer } from 'effect';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import type { ParseError } from '../errors.js';
import { ScraperLogger } from '../Logging/ScraperLogger.service.js';
import {
  parseDetail,
  parseIndex,
  parseRegion,
  type DetailResult,
  type PageRef,
  type Parsed,
  type RegionCandidate,
  type RiverCandidate,
} from './Parser.js';

/**
 * The parse functions bound to the configured discovery rules, with
 * structural warnings sent to the log.
 *
 * @group Services
 * @public
 */
export interface PageParserService {
  readonly parseIndex: (
    html: string,
    pageUrl: string
  ) => Effect.Effect<RegionCandidate[], ParseError>;
  readonly parseRegion: (
    html: string,
    region: PageRef
  ) => Effect.Effect<RiverCandidate[], ParseError>;
  readonly parseDetail: (
    html: string,
    river: PageRef
  ) => Effect.Effect<DetailResult, ParseError>;
}

export const makePageParser = Effect.gen(function* () {
  const { discovery } = yield* ScraperConfig;
  const logger = yield* ScraperLogger;

  const run = <A>(
    context: string,
    result: Either.Either<Parsed<A>, ParseError>
  ): Effect.Effect<A, ParseError> =>
    Effect.gen(function* () {
      const { value, warnings } = yield* result;
      yield* Effect.forEach(warnings, (warning) =>
        logger.logParseWarning(context, warning)
      );
      return value;
    });

  return {
    parseIndex: (html, pageUrl) =>
      run('index', parseIndex(html, pageUrl, discovery)),
    parseRegion: (html, region) =>
      run(`region:${region.name}`, parseRegion(html, region, discovery)),
    parseDetail: (html, river) =>
      run(`detail:${river.name}`, parseDetail(html, river, discovery)),
  } satisfies PageParserService;
});

export class PageParser extends Context.Tag('PageParser')<
  PageParser,
  PageParserService
>() {
  static Live = Layer.effect(PageParser, makePageParser);
}
