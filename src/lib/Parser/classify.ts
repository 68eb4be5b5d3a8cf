import type { DiscoveryRules } from '../Config/ScraperConfig.service.js';

/**
 * Structured reading of a fly recommendation. Every field is null unless the
 * text states it exactly once.
 */
export interface FlyClassification {
  readonly category: string | null;
  readonly size: string | null;
  readonly color: string | null;
  readonly notes: string | null;
}

export interface RegulationClassification {
  readonly type: string;
  readonly value: string;
}

export const UNCLASSIFIED = 'unclassified';

const escapeRegex = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Whole-word, case-insensitive test for a keyword or phrase. */
const containsWord = (text: string, keyword: string): boolean =>
  new RegExp(`(?<![\\w'])${escapeRegex(keyword)}(?![\\w'])`, 'i').test(text);

const single = <T>(values: readonly T[]): T | null => {
  const distinct = [...new Set(values)];
  return distinct.length === 1 ? distinct[0] : null;
};

const SIZE_PATTERN =
  /(?:#\s*(\d{1,2})(?:\s*[-–]\s*#?\s*(\d{1,2}))?)|(?:\bsizes?\s+(\d{1,2})(?:\s*(?:[-–]|to)\s*(\d{1,2}))?)/gi;

// A further number listed straight after a size ("#12 or 14", "sizes 12, 14").
const LISTED_SIZE = /^\s*(?:,|\/|&|\bor\b|\band\b)\s*#?\s*(\d{1,2})(?!\d)/i;

const sizeTokens = (text: string): string[] =>
  [...text.matchAll(SIZE_PATTERN)].flatMap((match) => {
    const from = match[1] ?? match[3];
    const to = match[2] ?? match[4];
    const token = to ? `${from}-${to}` : from;
    const listed = LISTED_SIZE.exec(text.slice((match.index ?? 0) + match[0].length));
    return listed ? [token, listed[1]] : [token];
  });

/**
 * Reads category, hook size, colour and a parenthesised note from fly text.
 *
 * @example
 * ```typescript
 * classifyFly('Pheasant Tail Nymph #16', rules);
 * // { category: 'nymph', size: '16', color: null, notes: null }
 * classifyFly('Woolly Bugger - black or olive', rules);
 * // { category: 'streamer', size: null, color: null, notes: null }
 * ```
 */
export const classifyFly = (
  rawText: string,
  rules: Pick<DiscoveryRules, 'flyCategories' | 'flyColors'>
): FlyClassification => {
  const categories = Object.entries(rules.flyCategories)
    .filter(([, keywords]) => keywords.some((k) => containsWord(rawText, k)))
    .map(([category]) => category);

  const colors = rules.flyColors.filter((color) => containsWord(rawText, color));

  const notes = [...rawText.matchAll(/\(([^()]+)\)/g)]
    .map((match) => match[1].trim())
    .filter((note) => note.length > 0);

  return {
    category: single(categories),
    size: single(sizeTokens(rawText)),
    color: single(colors.map((c) => c.toLowerCase())),
    notes: single(notes),
  };
};

const LABELLED = /^([^:\d]{1,40}):\s*(\S[\s\S]*)$/;
const CATCH_COUNT = /(\d+)\s*(?:fish|trout)\b/i;

/**
 * Names a regulation by the first rule with a keyword in the text. The value
 * is the text after a leading `Label:`, or the whole text; catch limits with
 * an explicit count become `"N fish"`.
 */
export const classifyRegulation = (
  rawText: string,
  rules: Pick<DiscoveryRules, 'regulationRules'>
): RegulationClassification => {
  const text = rawText.trim();
  const rule = rules.regulationRules.find((r) =>
    r.keywords.some((k) => containsWord(text, k))
  );
  const type = rule?.type ?? UNCLASSIFIED;

  if (type === 'catch_limit') {
    const count = CATCH_COUNT.exec(text);
    if (count) {
      return { type, value: `${count[1]} fish` };
    }
  }

  const labelled = LABELLED.exec(text);
  return { type, value: labelled ? labelled[2].trim() : text };
};

/** Flow level, only when "low flow", "medium flow" or "high flow" is stated. */
export const flowLevel = (text: string): 'low' | 'medium' | 'high' | null => {
  const levels = (['low', 'medium', 'high'] as const).filter((level) =>
    containsWord(text, `${level} flow`)
  );
  return levels.length === 1 ? levels[0] : null;
};
