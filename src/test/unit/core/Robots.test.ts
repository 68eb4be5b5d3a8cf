/**
 * RobotsGate Tests
 * robots.txt parsing, rule precedence and the unavailable-file fallback
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Effect } from 'effect';
import {
  isAllowedBy,
  parseRobotsTxt,
  RobotsGate,
  rulesFor,
  type RobotsPolicy,
} from '../../../lib/Robots/RobotsGate.service.js';
import {
  BASE_URL,
  expectSuccess,
  makeHarness,
  makeTempDir,
  removeDir,
  START_MS,
  USER_AGENT,
} from '../../infrastructure/EffectTestUtils.js';

const policyFrom = (content: string): RobotsPolicy => ({
  origin: BASE_URL,
  ...parseRobotsTxt(content),
  fallback: false,
});

describe('parseRobotsTxt', () => {
  it('groups consecutive user-agent lines and collects sitemaps', () => {
    const parsed = parseRobotsTxt(
      [
        '# comment line',
        'User-agent: TestScraper',
        'User-agent: OtherBot',
        'Disallow: /private # trailing comment',
        'Crawl-delay: 4.5',
        '',
        'User-agent: *',
        'Disallow:',
        'Allow: /',
        'Sitemap: https://waters.test/sitemap.xml',
      ].join('\n')
    );

    expect(parsed.sitemaps).toEqual(['https://waters.test/sitemap.xml']);
    expect(parsed.groups).toHaveLength(2);
    expect(parsed.groups[0].userAgents).toEqual(['testscraper', 'otherbot']);
    expect(parsed.groups[0].rules.map((r) => [r.allow, r.pattern])).toEqual([
      [false, '/private'],
    ]);
    expect(parsed.groups[0].crawlDelaySeconds).toBe(4.5);
    expect(parsed.groups[1].userAgents).toEqual(['*']);
    expect(parsed.groups[1].rules.map((r) => [r.allow, r.pattern])).toEqual([[true, '/']]);
  });

  it('ignores rules that appear before any user-agent line', () => {
    const parsed = parseRobotsTxt('Disallow: /\nUser-agent: *\nDisallow: /admin/');
    expect(parsed.groups).toHaveLength(1);
    expect(parsed.groups[0].rules.map((r) => r.pattern)).toEqual(['/admin/']);
  });
});

describe('rulesFor', () => {
  it('prefers the group naming the product token over the catch-all', () => {
    const { groups } = parseRobotsTxt(
      'User-agent: *\nDisallow: /\n\nUser-agent: testscraper\nDisallow: /admin/\nCrawl-delay: 5'
    );
    const selected = rulesFor(groups, USER_AGENT);
    expect(selected.rules.map((r) => r.pattern)).toEqual(['/admin/']);
    expect(selected.crawlDelaySeconds).toBe(5);
  });

  it('falls back to the catch-all group for other agents', () => {
    const { groups } = parseRobotsTxt(
      'User-agent: *\nDisallow: /tmp/\n\nUser-agent: otherbot\nDisallow: /'
    );
    const selected = rulesFor(groups, USER_AGENT);
    expect(selected.rules.map((r) => r.pattern)).toEqual(['/tmp/']);
    expect(selected.crawlDelaySeconds).toBeUndefined();
  });
});

describe('isAllowedBy', () => {
  const policy = policyFrom(
    [
      'User-agent: *',
      'Disallow: /admin/',
      'Allow: /admin/public/',
      'Disallow: /*.pdf$',
      'Disallow: /search?',
      'Allow: /page',
      'Disallow: /page',
    ].join('\n')
  );
  const allowed = (path: string) => isAllowedBy(policy, USER_AGENT, `${BASE_URL}${path}`);

  it('denies paths under a disallowed prefix', () => {
    expect(allowed('/admin/report')).toBe(false);
  });

  it('lets the longest matching rule win', () => {
    expect(allowed('/admin/public/list')).toBe(true);
  });

  it('honours wildcards and end anchors', () => {
    expect(allowed('/regions/north/map.pdf')).toBe(false);
    expect(allowed('/regions/north/map.pdf.html')).toBe(true);
  });

  it('matches against the query string', () => {
    expect(allowed('/search?q=trout')).toBe(false);
    expect(allowed('/search')).toBe(true);
  });

  it('lets Allow win a tie between rules of equal length', () => {
    expect(allowed('/page')).toBe(true);
  });

  it('allows paths no rule mentions', () => {
    expect(allowed('/rivers/alder')).toBe(true);
  });

  it('always allows robots.txt itself', () => {
    const denyAll = policyFrom('User-agent: *\nDisallow: /');
    expect(isAllowedBy(denyAll, USER_AGENT, `${BASE_URL}/robots.txt`)).toBe(true);
    expect(isAllowedBy(denyAll, USER_AGENT, `${BASE_URL}/index.html`)).toBe(false);
  });

  it('does not govern other origins', () => {
    const denyAll = policyFrom('User-agent: *\nDisallow: /');
    expect(isAllowedBy(denyAll, USER_AGENT, 'https://elsewhere.test/index.html')).toBe(true);
  });
});

describe('RobotsGate', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('loads robots.txt once and answers from the cached policy', async () => {
    const harness = makeHarness(dir, {
      [`${BASE_URL}/robots.txt`]: { status: 200, body: 'User-agent: *\nDisallow: /admin/' },
    });

    const answers = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const robots = yield* RobotsGate;
          return [
            yield* robots.isAllowed(`${BASE_URL}/admin/report`),
            yield* robots.isAllowed(`${BASE_URL}/rivers/alder`),
          ];
        })
      )
    );

    expect(answers).toEqual([false, true]);
    expect(harness.http.requests.map((r) => r.url)).toEqual([`${BASE_URL}/robots.txt`]);
  });

  it('falls back to allow-all when robots.txt is missing', async () => {
    const harness = makeHarness(dir, {});

    const policy = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const robots = yield* RobotsGate;
          return yield* robots.load;
        })
      )
    );

    expect(policy.fallback).toBe(true);
    expect(policy.fallbackReason).toBe('HTTP 404');
    expect(isAllowedBy(policy, USER_AGENT, `${BASE_URL}/admin/`)).toBe(true);
  });

  it('falls back to allow-all when the origin is unreachable', async () => {
    const harness = makeHarness(dir, {
      [`${BASE_URL}/robots.txt`]: { networkError: 'connection' },
    });

    const policy = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const robots = yield* RobotsGate;
          return yield* robots.load;
        })
      )
    );

    expect(policy.fallback).toBe(true);
    expect(policy.fallbackReason).toBe(
      `Failed to fetch ${BASE_URL}/robots.txt: connect ECONNREFUSED`
    );
  });

  it('fetches the file again on reload', async () => {
    const harness = makeHarness(dir, {
      [`${BASE_URL}/robots.txt`]: [
        { status: 200, body: 'User-agent: *\nDisallow: /admin/' },
        { status: 200, body: 'User-agent: *\nDisallow:' },
      ],
    });

    const answers = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const robots = yield* RobotsGate;
          const before = yield* robots.isAllowed(`${BASE_URL}/admin/report`);
          yield* robots.reload;
          const after = yield* robots.isAllowed(`${BASE_URL}/admin/report`);
          return [before, after];
        })
      )
    );

    expect(answers).toEqual([false, true]);
    expect(harness.http.requests.map((r) => r.at)).toEqual([START_MS, START_MS + 3000]);
  });

  it('waits out the crawl delay of the current policy before reloading', async () => {
    const harness = makeHarness(dir, {
      [`${BASE_URL}/robots.txt`]: { status: 200, body: 'User-agent: *\nCrawl-delay: 8' },
    });

    expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const robots = yield* RobotsGate;
          yield* robots.load;
          yield* robots.reload;
        })
      )
    );

    expect(harness.http.requests.map((r) => r.at)).toEqual([START_MS, START_MS + 8000]);
    expect(harness.time.sleeps).toEqual([8000]);
  });

  it('reports the crawl delay for the configured agent in milliseconds', async () => {
    const harness = makeHarness(dir, {
      [`${BASE_URL}/robots.txt`]: { status: 200, body: 'User-agent: *\nCrawl-delay: 4.5' },
    });

    const delay = expectSuccess(
      await harness.run(
        Effect.gen(function* () {
          const robots = yield* RobotsGate;
          return yield* robots.crawlDelayMs;
        })
      )
    );

    expect(delay).toBe(4500);
  });
});
