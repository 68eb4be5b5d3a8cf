import { Effect, Option, Ref } from 'effect';
import { ScraperConfig } from '../Config/ScraperConfig.service.js';
import { HttpClient } from '../HttpClient/HttpClient.service.js';
import { RequestLimiter } from '../RateLimiter/RateLimiter.js';

/**
 * A single Allow/Disallow line.
 *
 * @group Data Types
 * @internal
 */
interface RobotsRule {
  readonly allow: boolean;
  readonly pattern: string;
  readonly matcher: RegExp;
}

/**
 * Rules shared by one or more consecutive User-agent lines.
 *
 * @group Data Types
 */
export interface RobotsGroup {
  /** Lower-cased product tokens, `*` for the catch-all group */
  readonly userAgents: readonly string[];
  readonly rules: readonly RobotsRule[];
  readonly crawlDelaySeconds?: number;
}

/**
 * Parsed robots.txt for the configured origin.
 *
 * @group Data Types
 * @public
 */
export interface RobotsPolicy {
  readonly origin: string;
  readonly groups: readonly RobotsGroup[];
  readonly sitemaps: readonly string[];
  /** True when robots.txt could not be read and every path is allowed */
  readonly fallback: boolean;
  readonly fallbackReason?: string;
}

const toMatcher = (pattern: string): RegExp => {
  const anchored = pattern.endsWith('$');
  const body = (anchored ? pattern.slice(0, -1) : pattern)
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\\\*/g, '.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
};

/**
 * Parses robots.txt text into groups (RFC 9309). Unknown directives and
 * rules outside any group are ignored.
 */
export const parseRobotsTxt = (
  content: string
): { groups: RobotsGroup[]; sitemaps: string[] } => {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];

  let agents: string[] = [];
  let rules: RobotsRule[] = [];
  let crawlDelaySeconds: number | undefined;
  let collectingAgents = false;

  const flush = () => {
    if (agents.length > 0) {
      groups.push({ userAgents: agents, rules, crawlDelaySeconds });
    }
    agents = [];
    rules = [];
    crawlDelaySeconds = undefined;
  };

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.replace(/#.*$/, '').trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf(':');
    if (separator === -1) continue;
    const directive = trimmed.slice(0, separator).trim().toLowerCase();
    const value = trimmed.slice(separator + 1).trim();

    switch (directive) {
      case 'user-agent':
        if (!collectingAgents) {
          flush();
          collectingAgents = true;
        }
        agents.push(value.toLowerCase());
        break;
      case 'allow':
      case 'disallow':
        collectingAgents = false;
        // An empty Disallow allows everything and adds no rule
        if (agents.length > 0 && value) {
          rules.push({
            allow: directive === 'allow',
            pattern: value,
            matcher: toMatcher(value),
          });
        }
        break;
      case 'crawl-delay': {
        collectingAgents = false;
        const seconds = Number.parseFloat(value);
        if (agents.length > 0 && Number.isFinite(seconds) && seconds >= 0) {
          crawlDelaySeconds = seconds;
        }
        break;
      }
      case 'sitemap':
        sitemaps.push(value);
        break;
      default:
        break;
    }
  }
  flush();

  return { groups, sitemaps };
};

const productToken = (userAgent: string): string =>
  userAgent.split(/[\s/]/)[0].toLowerCase();

/**
 * Rules that apply to `userAgent`: every group naming the longest matching
 * product token, otherwise every `*` group.
 */
export const rulesFor = (
  groups: readonly RobotsGroup[],
  userAgent: string
): { rules: RobotsRule[]; crawlDelaySeconds?: number } => {
  const token = productToken(userAgent);
  let best = '';
  for (const group of groups) {
    for (const agent of group.userAgents) {
      if (agent !== '*' && token.includes(agent) && agent.length > best.length) {
        best = agent;
      }
    }
  }

  const key = best || '*';
  const selected = groups.filter((g) => g.userAgents.includes(key));
  const delays = selected.flatMap((g) =>
    g.crawlDelaySeconds === undefined ? [] : [g.crawlDelaySeconds]
  );

  return {
    rules: selected.flatMap((g) => g.rules),
    crawlDelaySeconds: delays.length > 0 ? Math.max(...delays) : undefined,
  };
};

/**
 * Decides whether `userAgent` may fetch `url` under `policy`. The longest
 * matching rule wins and Allow wins a tie. URLs on another origin are not
 * governed by the policy.
 */
export const isAllowedBy = (
  policy: RobotsPolicy,
  userAgent: string,
  url: string
): boolean => {
  if (!URL.canParse(url)) return true;
  const target = new URL(url);
  if (target.origin !== policy.origin) return true;

  const pathAndQuery = `${target.pathname}${target.search}`;
  if (target.pathname === '/robots.txt') return true;

  let winner: RobotsRule | undefined;
  for (const rule of rulesFor(policy.groups, userAgent).rules) {
    if (!rule.matcher.test(pathAndQuery)) continue;
    if (
      winner === undefined ||
      rule.pattern.length > winner.pattern.length ||
      (rule.pattern.length === winner.pattern.length && rule.allow)
    ) {
      winner = rule;
    }
  }

  return winner === undefined || winner.allow;
};

/**
 * robots.txt gate for the configured origin.
 *
 * The policy is fetched on first use and kept until {@link reload}. A missing
 * or unreachable robots.txt yields an allow-all policy flagged `fallback`.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const robots = yield* RobotsGate;
 *   const allowed = yield* robots.isAllowed('https://fishing.example/admin/');
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class RobotsGate extends Effect.Service<RobotsGate>()('RobotsGate', {
  effect: Effect.gen(function* () {
    const config = yield* ScraperConfig;
    const http = yield* HttpClient;
    const limiter = yield* RequestLimiter;
    const origin = new URL(config.baseUrl).origin;
    const robotsUrl = new URL('/robots.txt', origin).toString();
    const current = yield* Ref.make<Option.Option<RobotsPolicy>>(Option.none());

    const crawlDelayOf = (policy: RobotsPolicy): number | undefined => {
      const { crawlDelaySeconds } = rulesFor(policy.groups, config.userAgent);
      return crawlDelaySeconds === undefined ? undefined : Math.round(crawlDelaySeconds * 1000);
    };

    const fallbackPolicy = (reason: string): RobotsPolicy => ({
      origin,
      groups: [],
      sitemaps: [],
      fallback: true,
      fallbackReason: reason,
    });

    // paced like a page, honouring the crawl delay of a policy being reloaded
    const fetchPolicy = Effect.gen(function* () {
      const previous = yield* Ref.get(current);
      yield* limiter.beforeRequest(
        Option.isSome(previous) ? crawlDelayOf(previous.value) : undefined
      );
      return yield* http.get(robotsUrl);
    }).pipe(
      Effect.map((response): RobotsPolicy => {
        if (response.status < 200 || response.status >= 300) {
          return fallbackPolicy(`HTTP ${response.status}`);
        }
        return { origin, ...parseRobotsTxt(response.body), fallback: false };
      }),
      Effect.catchTag('NetworkError', (error) =>
        Effect.succeed(fallbackPolicy(error.message))
      )
    );

    const reload = Effect.gen(function* () {
      const policy = yield* fetchPolicy;
      yield* Ref.set(current, Option.some(policy));
      yield* Effect.logDebug(
        `Loaded robots.txt from ${robotsUrl} (fallback: ${policy.fallback})`
      );
      return policy;
    });

    const load = Effect.gen(function* () {
      const cached = yield* Ref.get(current);
      return Option.isSome(cached) ? cached.value : yield* reload;
    });

    return {
      load,
      reload,
      isAllowed: (url: string) =>
        load.pipe(
          Effect.map((policy) => isAllowedBy(policy, config.userAgent, url))
        ),
      crawlDelayMs: load.pipe(Effect.map(crawlDelayOf)),
    };
  }),
}) {}
