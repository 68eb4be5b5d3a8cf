import * as cheerio from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { Either } from 'effect';
import {
  DEFAULT_DISCOVERY_RULES,
  type DiscoveryRules,
} from '../Config/ScraperConfig.service.js';
import { ParseError } from '../errors.js';
import { classifyFly, classifyRegulation, flowLevel } from './classify.js';

export interface RegionCandidate {
  readonly name: string;
  readonly slug: string;
  readonly canonicalUrl: string;
  readonly description: string | null;
}

export interface SectionCandidate {
  readonly name: string;
  readonly slug: string;
  readonly canonicalUrl: string | null;
  readonly description: string | null;
  readonly rawHtml: string | null;
}

export interface RiverCandidate {
  readonly name: string;
  readonly slug: string;
  readonly canonicalUrl: string;
  readonly sections: readonly SectionCandidate[];
}

export interface FlyRecord {
  readonly name: string;
  /** Verbatim (trimmed) source text */
  readonly rawText: string;
  readonly sectionSlug: string | null;
  readonly category: string | null;
  readonly size: string | null;
  readonly color: string | null;
  readonly notes: string | null;
}

export interface RegulationRecord {
  readonly type: string;
  readonly value: string;
  readonly rawText: string;
  readonly sectionSlug: string | null;
  /** Heading the regulation appeared under */
  readonly sourceSection: string | null;
}

export interface Conditions {
  readonly rawText: string;
  readonly flowLevel: 'low' | 'medium' | 'high' | null;
}

export interface DetailResult {
  readonly fishType: string | null;
  readonly conditions: Conditions | null;
  readonly sections: readonly SectionCandidate[];
  readonly flies: readonly FlyRecord[];
  readonly regulations: readonly RegulationRecord[];
}

/** Parsed records plus non-fatal structural warnings. */
export interface Parsed<A> {
  readonly value: A;
  readonly warnings: readonly string[];
}

export interface PageRef {
  readonly name: string;
  readonly canonicalUrl: string;
}

const collapse = (text: string): string => text.replace(/\s+/g, ' ').trim();

/** Lower-case, hyphenated slug from free text or a URL path segment. */
export const slugify = (text: string): string =>
  text
    .toLowerCase()
    .replace(/[_\s]+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');

const slugFromUrl = (url: string): string => {
  const segment = new URL(url).pathname.replace(/\/+$/, '').split('/').pop() ?? '';
  return slugify(segment.replace(/\.[a-z0-9]+$/i, ''));
};

/**
 * Rejects input that is clearly not an HTML document: empty text, JSON, PDF
 * bytes, or text without a single tag.
 */
export const ensureHtml = (
  html: string,
  context: string
): Either.Either<cheerio.CheerioAPI, ParseError> => {
  const trimmed = html.trim();
  if (!trimmed || trimmed.startsWith('%PDF') || !/<[a-zA-Z!][^>]*>/.test(trimmed)) {
    return Either.left(ParseError.notHtml(context, html));
  }
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    const json = Either.try(() => JSON.parse(trimmed));
    if (Either.isRight(json)) {
      return Either.left(ParseError.notHtml(context, html));
    }
  }
  return Either.right(cheerio.load(html));
};

const findContainer = (
  $: cheerio.CheerioAPI,
  selectors: readonly string[]
): cheerio.Cheerio<Element> | undefined =>
  selectors.map((selector) => $<Element, string>(selector)).find((found) => found.length > 0);

interface LinkMatch {
  readonly element: Element;
  readonly name: string;
  readonly canonicalUrl: string;
  readonly slug: string;
}

const collectLinks = (
  $: cheerio.CheerioAPI,
  container: cheerio.Cheerio<Element>,
  linkSelector: string,
  pageUrl: string
): LinkMatch[] => {
  const origin = new URL(pageUrl).origin;
  const seen = new Set<string>();
  const links: LinkMatch[] = [];

  container.find(linkSelector).each((_, element) => {
    const href = $(element).attr('href')?.trim();
    if (!href || href === '#' || !URL.canParse(href, pageUrl)) return;

    const target = new URL(href, pageUrl);
    if (target.origin !== origin) return;

    const canonicalUrl = target.toString();
    const name = collapse($(element).text());
    if (!name || seen.has(canonicalUrl)) return;
    seen.add(canonicalUrl);

    const dataSlug = $(element).attr('data-slug');
    const slug = dataSlug ? slugify(dataSlug) : slugFromUrl(canonicalUrl);
    links.push({ element, name, canonicalUrl, slug: slug || slugify(name) });
  });

  return links;
};

/**
 * Discovers regions on the index page. A missing container yields no regions
 * and a warning. Links to other origins are ignored.
 */
export const parseIndex = (
  html: string,
  pageUrl: string,
  rules: DiscoveryRules = DEFAULT_DISCOVERY_RULES
): Either.Either<Parsed<RegionCandidate[]>, ParseError> =>
  Either.map(ensureHtml(html, `index ${pageUrl}`), ($) => {
    const container = findContainer($, rules.index.containers);
    if (!container) {
      return {
        value: [],
        warnings: [
          `Structural mismatch: no region container (${rules.index.containers.join(', ')}) on ${pageUrl}`,
        ],
      };
    }

    const regions = collectLinks($, container, rules.index.link, pageUrl).map(
      (link) => {
        // only the element directly after the link describes it
        const next = $(link.element).next();
        const description = next.is('p, div') ? collapse(next.text()) : '';
        return {
          name: link.name,
          slug: link.slug,
          canonicalUrl: link.canonicalUrl,
          description: description || null,
        };
      }
    );

    return {
      value: regions,
      warnings:
        regions.length === 0 ? [`Region container on ${pageUrl} holds no region links`] : [],
    };
  });

/**
 * Text describing a link, without the link text itself: the rest of its
 * parent, or the loose text up to the next link when the parent is the
 * container.
 */
const contextText = (
  $: cheerio.CheerioAPI,
  link: Element,
  container: cheerio.Cheerio<Element>
): string => {
  const parent = link.parent;
  if (parent && isTag(parent) && !container.is(parent)) {
    return collapse(
      $(parent)
        .contents()
        .toArray()
        .filter((node) => node !== link)
        .map((node) => $(node).text())
        .join(' ')
    );
  }

  const parts: string[] = [];
  for (let node = link.next; node; node = node.next) {
    if (isTag(node) && (node.name === 'a' || $(node).find('a').length > 0)) break;
    parts.push($(node).text());
  }
  return collapse(parts.join(' '));
};

const mentions = (text: string, keyword: string): boolean =>
  text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .includes(keyword.toLowerCase());

/**
 * Discovers rivers in a region's fishing-waters block. Reach keywords in a
 * river's context text become sections of that river. Only links on the
 * region page's origin count as rivers.
 */
export const parseRegion = (
  html: string,
  region: PageRef,
  rules: DiscoveryRules = DEFAULT_DISCOVERY_RULES
): Either.Either<Parsed<RiverCandidate[]>, ParseError> =>
  Either.map(ensureHtml(html, `region ${region.name}`), ($) => {
    const container = findContainer($, rules.region.containers);
    if (!container) {
      return {
        value: [],
        warnings: [
          `Structural mismatch: no fishing waters block (${rules.region.containers.join(', ')}) for region ${region.name}`,
        ],
      };
    }

    const rivers = collectLinks($, container, rules.region.link, region.canonicalUrl).map(
      (link): RiverCandidate => {
        const context = contextText($, link.element, container);
        const sections = rules.region.sectionKeywords
          .filter((keyword) => mentions(context, keyword))
          .map((keyword) => ({
            name: keyword,
            slug: slugify(keyword),
            canonicalUrl: null,
            description: null,
            rawHtml: null,
          }));
        return {
          name: link.name,
          slug: link.slug,
          canonicalUrl: link.canonicalUrl,
          sections,
        };
      }
    );

    return {
      value: rivers,
      warnings:
        rivers.length === 0 ? [`Fishing waters block for ${region.name} holds no river links`] : [],
    };
  });

const sectionSlugOf = (
  $: cheerio.CheerioAPI,
  element: Element,
  sectionSelector: string
): string | null => {
  const slug = $(element).closest(sectionSelector).attr('data-slug');
  return slug ? slugify(slug) : null;
};

/**
 * Extracts sections, recommended flies, regulations, fish type and
 * conditions from a river page.
 */
export const parseDetail = (
  html: string,
  river: PageRef,
  rules: DiscoveryRules = DEFAULT_DISCOVERY_RULES
): Either.Either<Parsed<DetailResult>, ParseError> =>
  Either.map(ensureHtml(html, `detail ${river.name}`), ($) => {
    const selectors = rules.detail;
    const warnings: string[] = [];

    const seenSections = new Set<string>();
    const sections: SectionCandidate[] = [];
    $(selectors.sections).each((_, element) => {
      const $section = $(element);
      const slug = slugify($section.attr('data-slug') ?? '');
      if (!slug || seenSections.has(slug)) return;
      seenSections.add(slug);
      const heading = collapse($section.find('h2, h3, h4').first().text());
      const description = collapse($section.children('p').first().text());
      sections.push({
        name: heading || slug,
        slug,
        canonicalUrl: null,
        description: description || null,
        rawHtml: $.html(element),
      });
    });

    const flies: FlyRecord[] = [];
    $<Element, string>(selectors.flies).each((_, container) => {
      const sectionSlug = sectionSlugOf($, container, selectors.sections);
      const items = $(container).find('li').toArray();
      for (const item of items.length > 0 ? items : [container]) {
        const rawText = $(item).text().trim();
        if (!rawText) continue;
        flies.push({
          name: collapse(rawText),
          rawText,
          sectionSlug,
          ...classifyFly(rawText, rules),
        });
      }
    });

    const regulations: RegulationRecord[] = [];
    $<Element, string>(selectors.regulations).each((_, container) => {
      const sectionSlug = sectionSlugOf($, container, selectors.sections);
      const $container = $(container);
      const heading = collapse(
        $container.prevAll('h1, h2, h3, h4, h5, h6').first().text() ||
          $container.find('h1, h2, h3, h4, h5, h6').first().text()
      );
      const items = $container.find('p, li').toArray();
      const texts =
        items.length > 0
          ? items.map((item) => $(item).text().trim())
          : $container.text().split('\n').map((line) => line.trim());

      for (const rawText of texts) {
        if (!rawText) continue;
        regulations.push({
          ...classifyRegulation(rawText, rules),
          rawText,
          sectionSlug,
          sourceSection: heading || null,
        });
      }
    });

    const fishTypeText = collapse($(selectors.fishType).first().text());
    const situationText = collapse($(selectors.situation).first().text());

    if (flies.length === 0 && regulations.length === 0) {
      warnings.push(
        `No recommended flies (${selectors.flies}) or regulations (${selectors.regulations}) on page for ${river.name}`
      );
    }

    return {
      value: {
        fishType: fishTypeText || null,
        conditions: situationText
          ? { rawText: situationText, flowLevel: flowLevel(situationText) }
          : null,
        sections,
        flies,
        regulations,
      },
      warnings,
    };
  });
