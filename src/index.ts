export * from './lib/errors.js';

export type {
  DiscoveryRules,
  ScraperConfigOptions,
  ConfigFile,
} from './lib/Config/ScraperConfig.service.js';
export {
  ScraperConfig,
  makeScraperConfig,
  loadConfigFile,
  parseConfigText,
  DEFAULT_DISCOVERY_RULES,
  MIN_REQUEST_DELAY_MS,
} from './lib/Config/ScraperConfig.service.js';

export * from './lib/Logging/ScraperLogger.service.js';
export * from './lib/RateLimiter/RateLimiter.js';
export * from './lib/Cache/PageCache.service.js';
export * from './lib/HttpClient/HttpClient.service.js';
export * from './lib/Robots/RobotsGate.service.js';
export * from './lib/Fetcher/Fetcher.service.js';

export * from './lib/Parser/Parser.js';
export * from './lib/Parser/classify.js';
export * from './lib/Parser/PageParser.service.js';

export * from './lib/Storage/SqliteStorage.service.js';
export * from './lib/Orchestrator/Orchestrator.service.js';
export * from './lib/Export/PdfExporter.service.js';

export { makeScraperLayer } from './lib/ScraperLayer.js';
export type { ScraperLayerOverrides } from './lib/ScraperLayer.js';
