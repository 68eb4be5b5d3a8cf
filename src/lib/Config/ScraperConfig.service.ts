import * as cheerio from 'cheerio';
import { Context, Effect, Layer, Schema } from 'effect';
import * as fs from 'fs/promises';
import yaml from 'js-yaml';
import { ConfigError } from '../errors.js';

/** Hard politeness floor for the gap between two outbound requests. */
export const MIN_REQUEST_DELAY_MS = 3000;

/**
 * CSS selectors and keyword lists the parser runs on.
 *
 * Containers are tried in order; the first one present in the page wins.
 * Keyword lists are policy data: the parser only ever reports what one of
 * these explicitly matches.
 *
 * @group Configuration
 * @public
 */
export interface DiscoveryRules {
  /** Path of the region index page, relative to the base URL */
  readonly indexPath: string;
  readonly index: {
    readonly containers: readonly string[];
    readonly link: string;
  };
  readonly region: {
    readonly containers: readonly string[];
    readonly link: string;
    /** Reach qualifiers that turn into Section candidates */
    readonly sectionKeywords: readonly string[];
  };
  readonly detail: {
    readonly fishType: string;
    readonly situation: string;
    readonly flies: string;
    readonly regulations: string;
    readonly sections: string;
  };
  /** Category name → keywords that identify it */
  readonly flyCategories: Readonly<Record<string, readonly string[]>>;
  readonly flyColors: readonly string[];
  /** Ordered; the first rule with a matching keyword names the type */
  readonly regulationRules: ReadonlyArray<{
    readonly type: string;
    readonly keywords: readonly string[];
  }>;
}

/**
 * Fully resolved scraper configuration. Durations are milliseconds.
 *
 * @group Configuration
 * @public
 */
export interface ScraperConfigOptions {
  readonly baseUrl: string;
  readonly userAgent: string;
  /** Minimum gap between request starts, never below 3000 */
  readonly requestDelayMs: number;
  /** Upper bound of the random jitter added to each delay (default: 0) */
  readonly jitterMaxMs: number;
  readonly cacheDir: string;
  /** How long a cached page stays fresh (default: 24 hours) */
  readonly cacheTtlMs: number;
  /** Network attempts per fetch, first attempt included (default: 3) */
  readonly maxRetries: number;
  /** Backoff before each retry; the last value repeats (default: 1s, 2s, 4s, 8s) */
  readonly retryBackoffMs: readonly number[];
  /** Consecutive server/network errors that stop the run (default: 3) */
  readonly haltThreshold: number;
  readonly requestTimeoutMs: number;
  readonly databasePath: string;
  readonly logPath: string;
  readonly outputDir: string;
  readonly discovery: DiscoveryRules;
}

export const DEFAULT_DISCOVERY_RULES: DiscoveryRules = {
  indexPath: '/index.html',
  index: {
    containers: ['div.region-list'],
    link: 'a',
  },
  region: {
    containers: ['div.fishing-waters'],
    link: 'a',
    sectionKeywords: ['Upper', 'Middle', 'Lower'],
  },
  detail: {
    fishType: '.fish-type',
    situation: '.situation',
    flies: '.recommended-lures',
    regulations: '.regulations',
    sections: '.section[data-slug]',
  },
  flyCategories: {
    nymph: ['nymph', "hare's ear", 'pheasant tail', 'prince'],
    dry: ['dry', 'wulff', 'adams', 'elk hair', 'parachute'],
    streamer: ['streamer', 'woolly bugger', 'muddler', 'zonker'],
    wet: ['wet', 'soft hackle'],
  },
  flyColors: [
    'black',
    'brown',
    'olive',
    'gray',
    'grey',
    'white',
    'red',
    'yellow',
    'orange',
    'green',
    'blue',
    'purple',
    'pink',
    'tan',
    'gold',
    'silver',
  ],
  regulationRules: [
    { type: 'catch_limit', keywords: ['catch limit', 'bag limit'] },
    { type: 'season_dates', keywords: ['season'] },
    { type: 'method', keywords: ['method', 'fly only', 'artificial'] },
    { type: 'permit_required', keywords: ['permit', 'license', 'licence'] },
    { type: 'flow_status', keywords: ['flow status'] },
  ],
};

const DEFAULTS = {
  jitterMaxMs: 0,
  cacheDir: '.cache/fishing-waters/',
  cacheTtlMs: 86_400_000,
  maxRetries: 3,
  retryBackoffMs: [1000, 2000, 4000, 8000],
  haltThreshold: 3,
  requestTimeoutMs: 30_000,
  outputDir: 'pdfs/',
} as const;

const Selectors = Schema.Union(Schema.String, Schema.Array(Schema.String));

/**
 * Shape of the YAML configuration file. Durations are seconds, keys are
 * snake_case.
 */
export const ConfigFileSchema = Schema.Struct({
  base_url: Schema.String.pipe(
    Schema.filter((s) => /^https?:\/\//.test(s) && URL.canParse(s), {
      message: () => 'base_url must start with http:// or https://',
    })
  ),
  user_agent: Schema.NonEmptyString,
  request_delay: Schema.Number.pipe(
    Schema.greaterThanOrEqualTo(MIN_REQUEST_DELAY_MS / 1000, {
      message: () => 'request_delay must be >= 3.0 seconds',
    })
  ),
  database_path: Schema.NonEmptyString,
  log_path: Schema.NonEmptyString,
  jitter_max: Schema.optional(Schema.NonNegative),
  cache_dir: Schema.optional(Schema.NonEmptyString),
  cache_ttl: Schema.optional(Schema.NonNegative),
  max_retries: Schema.optional(Schema.Int.pipe(Schema.greaterThanOrEqualTo(1))),
  retry_backoff: Schema.optional(Schema.NonEmptyArray(Schema.NonNegative)),
  halt_on_consecutive_5xx: Schema.optional(
    Schema.Int.pipe(Schema.greaterThanOrEqualTo(1))
  ),
  request_timeout: Schema.optional(Schema.Positive),
  output_dir: Schema.optional(Schema.NonEmptyString),
  discovery_rules: Schema.optional(
    Schema.Struct({
      index_path: Schema.optional(Schema.String),
      region_selector: Schema.optional(Selectors),
      region_link: Schema.optional(Schema.String),
      river_selector: Schema.optional(Selectors),
      river_link: Schema.optional(Schema.String),
      section_keywords: Schema.optional(Schema.Array(Schema.String)),
      detail_selectors: Schema.optional(
        Schema.Struct({
          fish_type: Schema.optional(Schema.String),
          situation: Schema.optional(Schema.String),
          recommended_lures: Schema.optional(Schema.String),
          regulations: Schema.optional(Schema.String),
          sections: Schema.optional(Schema.String),
        })
      ),
      fly_categories: Schema.optional(
        Schema.Record({ key: Schema.String, value: Schema.Array(Schema.String) })
      ),
      fly_colors: Schema.optional(Schema.Array(Schema.String)),
      regulation_rules: Schema.optional(
        Schema.Array(
          Schema.Struct({
            type: Schema.NonEmptyString,
            keywords: Schema.Array(Schema.String),
          })
        )
      ),
    })
  ),
});

export type ConfigFile = Schema.Schema.Type<typeof ConfigFileSchema>;

const toList = (value: string | readonly string[]): readonly string[] =>
  typeof value === 'string' ? [value] : value;

const seconds = (value: number): number => Math.round(value * 1000);

/**
 * Maps a decoded configuration file onto resolved options.
 */
export const fromConfigFile = (file: ConfigFile): ScraperConfigOptions => {
  const rules = file.discovery_rules;
  const detail = rules?.detail_selectors;
  const defaults = DEFAULT_DISCOVERY_RULES;

  return {
    baseUrl: file.base_url,
    userAgent: file.user_agent,
    requestDelayMs: seconds(file.request_delay),
    jitterMaxMs:
      file.jitter_max !== undefined ? seconds(file.jitter_max) : DEFAULTS.jitterMaxMs,
    cacheDir: file.cache_dir ?? DEFAULTS.cacheDir,
    cacheTtlMs:
      file.cache_ttl !== undefined ? seconds(file.cache_ttl) : DEFAULTS.cacheTtlMs,
    maxRetries: file.max_retries ?? DEFAULTS.maxRetries,
    retryBackoffMs: file.retry_backoff
      ? file.retry_backoff.map(seconds)
      : DEFAULTS.retryBackoffMs,
    haltThreshold: file.halt_on_consecutive_5xx ?? DEFAULTS.haltThreshold,
    requestTimeoutMs:
      file.request_timeout !== undefined
        ? seconds(file.request_timeout)
        : DEFAULTS.requestTimeoutMs,
    databasePath: file.database_path,
    logPath: file.log_path,
    outputDir: file.output_dir ?? DEFAULTS.outputDir,
    discovery: {
      indexPath: rules?.index_path ?? defaults.indexPath,
      index: {
        containers: rules?.region_selector
          ? toList(rules.region_selector)
          : defaults.index.containers,
        link: rules?.region_link ?? defaults.index.link,
      },
      region: {
        containers: rules?.river_selector
          ? toList(rules.river_selector)
          : defaults.region.containers,
        link: rules?.river_link ?? defaults.region.link,
        sectionKeywords:
          rules?.section_keywords ?? defaults.region.sectionKeywords,
      },
      detail: {
        fishType: detail?.fish_type ?? defaults.detail.fishType,
        situation: detail?.situation ?? defaults.detail.situation,
        flies: detail?.recommended_lures ?? defaults.detail.flies,
        regulations: detail?.regulations ?? defaults.detail.regulations,
        sections: detail?.sections ?? defaults.detail.sections,
      },
      flyCategories: rules?.fly_categories ?? defaults.flyCategories,
      flyColors: rules?.fly_colors ?? defaults.flyColors,
      regulationRules: rules?.regulation_rules ?? defaults.regulationRules,
    },
  };
};

/**
 * Checks invariants that hold however the options were produced.
 */
const selectorsOf = (rules: DiscoveryRules): readonly string[] => [
  ...rules.index.containers,
  rules.index.link,
  ...rules.region.containers,
  rules.region.link,
  ...Object.values(rules.detail),
];

export const validateOptions = (
  options: ScraperConfigOptions
): Effect.Effect<ScraperConfigOptions, ConfigError> => {
  if (options.requestDelayMs < MIN_REQUEST_DELAY_MS) {
    return Effect.fail(
      ConfigError.invalid(
        'request_delay',
        `request_delay must be >= 3.0 seconds, got ${options.requestDelayMs / 1000}`
      )
    );
  }
  if (!/^https?:\/\//.test(options.baseUrl) || !URL.canParse(options.baseUrl)) {
    return Effect.fail(
      ConfigError.invalid('base_url', 'base_url must start with http:// or https://')
    );
  }
  if (!options.userAgent.trim()) {
    return Effect.fail(ConfigError.invalid('user_agent', 'user_agent must not be empty'));
  }
  if (options.maxRetries < 1) {
    return Effect.fail(ConfigError.invalid('max_retries', 'max_retries must be >= 1'));
  }
  if (options.retryBackoffMs.length === 0) {
    return Effect.fail(
      ConfigError.invalid('retry_backoff', 'retry_backoff needs at least one delay')
    );
  }
  if (options.haltThreshold < 1) {
    return Effect.fail(
      ConfigError.invalid('halt_on_consecutive_5xx', 'halt threshold must be >= 1')
    );
  }
  if (options.jitterMaxMs < 0) {
    return Effect.fail(ConfigError.invalid('jitter_max', 'jitter_max must be >= 0'));
  }

  // every selector is compiled once here so a typo fails before any request
  const $ = cheerio.load('<p></p>');
  return Effect.forEach(
    selectorsOf(options.discovery),
    (selector) =>
      Effect.try({
        try: () => $(selector),
        catch: (cause) =>
          ConfigError.invalid(
            'discovery_rules',
            `invalid CSS selector '${selector}': ${cause instanceof Error ? cause.message : String(cause)}`
          ),
      }),
    { discard: true }
  ).pipe(Effect.as(options));
};

/**
 * Builds options from the required fields plus overrides, applying the same
 * defaults and validation as a configuration file.
 *
 * @example
 * ```typescript
 * const options = yield* makeScraperConfig({
 *   baseUrl: 'https://fishing.example',
 *   userAgent: 'FishingWatersScraper/1.0',
 *   requestDelayMs: 3000,
 * });
 * ```
 */
export const makeScraperConfig = (
  options: Pick<ScraperConfigOptions, 'baseUrl' | 'userAgent'> &
    Partial<ScraperConfigOptions>
): Effect.Effect<ScraperConfigOptions, ConfigError> =>
  validateOptions({
    requestDelayMs: MIN_REQUEST_DELAY_MS,
    databasePath: 'data/fishing-waters.db',
    logPath: 'logs/scraper.jsonl',
    discovery: DEFAULT_DISCOVERY_RULES,
    ...DEFAULTS,
    ...options,
  });

/**
 * Parses and validates YAML configuration text.
 */
export const parseConfigText = (
  text: string,
  source = 'configuration'
): Effect.Effect<ScraperConfigOptions, ConfigError> =>
  Effect.gen(function* () {
    const raw = yield* Effect.try({
      try: () => yaml.load(text),
      catch: (cause) =>
        new ConfigError({ message: `Failed to parse ${source} as YAML: ${cause}`, cause }),
    });

    const file = yield* Effect.try({
      try: () => Schema.decodeUnknownSync(ConfigFileSchema)(raw),
      catch: (cause) =>
        new ConfigError({
          message: `Invalid ${source}: ${cause instanceof Error ? cause.message : String(cause)}`,
          cause,
        }),
    });

    return yield* validateOptions(fromConfigFile(file));
  });

/**
 * Reads a YAML configuration file from disk.
 */
export const loadConfigFile = (
  configPath: string
): Effect.Effect<ScraperConfigOptions, ConfigError> =>
  Effect.tryPromise({
    try: () => fs.readFile(configPath, 'utf-8'),
    catch: (cause) =>
      new ConfigError({ message: `Configuration file not found: ${configPath}`, cause }),
  }).pipe(Effect.flatMap((text) => parseConfigText(text, configPath)));

/**
 * Read-only configuration consumed by every service at construction time.
 *
 * @group Configuration
 * @public
 */
export class ScraperConfig extends Context.Tag('ScraperConfig')<
  ScraperConfig,
  ScraperConfigOptions
>() {
  static fromFile = (configPath: string) =>
    Layer.effect(ScraperConfig, loadConfigFile(configPath));

  static Live = (options: Parameters<typeof makeScraperConfig>[0]) =>
    Layer.effect(ScraperConfig, makeScraperConfig(options));
}
