import { describe, expect, it } from 'vitest';
import { DEFAULT_DISCOVERY_RULES } from '../../../lib/Config/ScraperConfig.service.js';
import {
  classifyFly,
  classifyRegulation,
  flowLevel,
  UNCLASSIFIED,
} from '../../../lib/Parser/classify.js';

const rules = DEFAULT_DISCOVERY_RULES;

describe('classifyFly', () => {
  it('reads category and hook size from explicit tokens', () => {
    expect(classifyFly('Pheasant Tail Nymph #16', rules)).toEqual({
      category: 'nymph',
      size: '16',
      color: null,
      notes: null,
    });
  });

  it('leaves colour and size null when the text offers two colours and no size', () => {
    expect(classifyFly('Woolly Bugger - black or olive', rules)).toEqual({
      category: 'streamer',
      size: null,
      color: null,
      notes: null,
    });
  });

  it('reads a single colour', () => {
    expect(classifyFly('Olive Woolly Bugger #8', rules)).toEqual({
      category: 'streamer',
      size: '8',
      color: 'olive',
      notes: null,
    });
  });

  it('reads size ranges and a parenthesised note', () => {
    expect(classifyFly('Elk Hair Caddis sizes 14-18 (evening rise)', rules)).toEqual({
      category: 'dry',
      size: '14-18',
      color: null,
      notes: 'evening rise',
    });
    expect(classifyFly('Prince Nymph size 12 to 16', rules).size).toBe('12-16');
    expect(classifyFly('Adams #14-#18', rules).size).toBe('14-18');
  });

  it('leaves the size null when two different sizes are offered', () => {
    const fly = classifyFly("Hare's Ear Nymph #12 or #14", rules);
    expect(fly.category).toBe('nymph');
    expect(fly.size).toBeNull();
  });

  it('leaves the size null when a list of sizes follows one size token', () => {
    expect(classifyFly("Hare's Ear Nymph sizes 12, 14 or 16", rules).size).toBeNull();
    expect(classifyFly('Pheasant Tail #12 or 14', rules).size).toBeNull();
    expect(classifyFly('Adams #14/16', rules).size).toBeNull();
    expect(classifyFly('Royal Wulff size 12 and 14', rules).size).toBeNull();
    expect(classifyFly('Copper John #14 & #16', rules).size).toBeNull();
  });

  it('keeps a single size followed by other listed words', () => {
    expect(classifyFly('Klinkhamer #14, parachute or upright', rules).size).toBe('14');
  });

  it('leaves the category null when keywords of two categories appear', () => {
    expect(classifyFly('Dry fly or nymph, angler choice', rules).category).toBeNull();
  });

  it('does not guess anything from unrecognised text', () => {
    expect(classifyFly('Local favourite pattern', rules)).toEqual({
      category: null,
      size: null,
      color: null,
      notes: null,
    });
  });

  it('matches keywords as whole words only', () => {
    // "wetland" is not "wet", "tangerine" is not "tan"
    expect(classifyFly('Wetland tangerine special', rules)).toEqual({
      category: null,
      size: null,
      color: null,
      notes: null,
    });
  });

  it('uses the configured keyword lists', () => {
    const custom = { flyCategories: { emerger: ['emerger'] }, flyColors: ['claret'] };
    expect(classifyFly('Claret Emerger', custom)).toEqual({
      category: 'emerger',
      size: null,
      color: 'claret',
      notes: null,
    });
  });
});

describe('classifyRegulation', () => {
  it('turns an explicit catch count into "N fish"', () => {
    expect(classifyRegulation('Catch limit: 2 trout per day', rules)).toEqual({
      type: 'catch_limit',
      value: '2 fish',
    });
  });

  it('keeps the labelled text when a catch limit has no count', () => {
    expect(classifyRegulation('Catch limit: see the notice board', rules)).toEqual({
      type: 'catch_limit',
      value: 'see the notice board',
    });
  });

  it('reads the value after a label', () => {
    expect(classifyRegulation('Season: 1 April to 30 September', rules)).toEqual({
      type: 'season_dates',
      value: '1 April to 30 September',
    });
  });

  it('keeps the whole text when there is no label', () => {
    expect(classifyRegulation('  Fly only, barbless hooks  ', rules)).toEqual({
      type: 'method',
      value: 'Fly only, barbless hooks',
    });
  });

  it('takes the first rule in order when several match', () => {
    expect(classifyRegulation('Season permit required', rules).type).toBe('season_dates');
  });

  it('marks text no rule recognises as unclassified', () => {
    expect(classifyRegulation('Parking at the bridge', rules)).toEqual({
      type: UNCLASSIFIED,
      value: 'Parking at the bridge',
    });
  });
});

describe('flowLevel', () => {
  it('reads a single stated flow level', () => {
    expect(flowLevel('Low flow, clear water')).toBe('low');
    expect(flowLevel('Currently HIGH FLOW after rain')).toBe('high');
  });

  it('is null for conflicting or absent levels', () => {
    expect(flowLevel('Low flow upstream, high flow below the weir')).toBeNull();
    expect(flowLevel('Clear and settled')).toBeNull();
  });
});
