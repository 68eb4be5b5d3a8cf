import { Layer } from 'effect';
import { PageCache } from './Cache/PageCache.service.js';
import {
  ScraperConfig,
  type ScraperConfigOptions,
} from './Config/ScraperConfig.service.js';
import { PdfExporter } from './Export/PdfExporter.service.js';
import { Fetcher } from './Fetcher/Fetcher.service.js';
import { HttpClient } from './HttpClient/HttpClient.service.js';
import {
  ScraperLogger,
  ScraperLoggerLive,
} from './Logging/ScraperLogger.service.js';
import { Orchestrator } from './Orchestrator/Orchestrator.service.js';
import { PageParser } from './Parser/PageParser.service.js';
import { RequestLimiter } from './RateLimiter/RateLimiter.js';
import { RobotsGate } from './Robots/RobotsGate.service.js';
import { Storage } from './Storage/SqliteStorage.service.js';

export interface ScraperLayerOverrides {
  readonly http?: Layer.Layer<HttpClient, never, ScraperConfig>;
  readonly logger?: Layer.Layer<ScraperLogger>;
}

/**
 * Every service of the scraper, built from resolved options. One rate
 * limiter, shared by the fetcher and the robots.txt gate, exists per layer.
 */
export const makeScraperLayer = (
  options: ScraperConfigOptions,
  overrides: ScraperLayerOverrides = {}
) => {
  const config = Layer.succeed(ScraperConfig, options);

  const infrastructure = Layer.mergeAll(
    overrides.logger ?? ScraperLoggerLive(options.logPath),
    overrides.http ?? HttpClient.Live,
    PageCache.Live,
    Storage.Live,
    RequestLimiter.Live
  ).pipe(Layer.provideMerge(config));

  const policy = Layer.mergeAll(RobotsGate.Default, PageParser.Live).pipe(
    Layer.provideMerge(infrastructure)
  );

  return Layer.mergeAll(Orchestrator.Live, PdfExporter.Live).pipe(
    Layer.provideMerge(Fetcher.Live.pipe(Layer.provideMerge(policy)))
  );
};
