import { describe, it, expect } from 'vitest';
import { normalize, normalizeIdentifier, tokenize, classify, jaccard, sharedTokenCount } from '../src/services/normalizer.js';

describe('normalize', () => {
  it('lower-cases and strips punctuation', () => {
    expect(normalize('X-RESTRAINT PACKAGE')).toBe('x restraint package');
  });

  it('strips sizes and units', () => {
    expect(normalize('Nitrile Gloves, 12oz Bottle (5 ml)')).toBe('nitrile gloves bottle');
    expect(normalize('Floor Cleaner 3.5 gal')).toBe('floor cleaner');
    expect(normalize('Exam Gloves 100ct')).toBe('exam gloves');
  });

  it('drops standalone pack and size words', () => {
    expect(normalize('Gloves XL pk')).toBe('gloves');
  });

  it('keeps decimals that are not sizes as separate words', () => {
    expect(normalize('Copy Paper 8.5 x 11')).toBe('copy paper 8 5 x 11');
  });

  it('is deterministic and never throws on empty input', () => {
    const text = 'Black Toner Cartridge, High Yield (2 pk)';
    expect(normalize(text)).toBe(normalize(text));
    expect(normalize(text)).toBe('black toner cartridge high yield');
    expect(normalize('')).toBe('');
    expect(normalize('!!! ---')).toBe('');
  });
});

describe('normalizeIdentifier', () => {
  it('compares on alphanumerics only', () => {
    expect(normalizeIdentifier('6500-001-430')).toBe('6500001430');
    expect(normalizeIdentifier(' NG 4410 ')).toBe('ng4410');
    expect(normalizeIdentifier(undefined)).toBe('');
  });
});

describe('tokenize', () => {
  it('removes stop words and short words', () => {
    expect(tokenize('x restraint package')).toEqual(new Set(['restraint']));
    expect(tokenize('the set of 12 ab')).toEqual(new Set(['ab']));
  });

  it('keeps numbers of three or more digits', () => {
    expect(tokenize('model 4410 gloves gloves')).toEqual(new Set(['model', '4410', 'gloves']));
  });

  it('never returns an empty set for non-empty text', () => {
    expect(tokenize('the and')).toEqual(new Set(['the', 'and']));
    expect(tokenize('')).toEqual(new Set());
  });
});

describe('classify', () => {
  it('applies the first matching rule', () => {
    expect(classify(new Set(['gloves', 'toner']))).toBe('medical');
    expect(classify(new Set(['toner']))).toBe('office');
    expect(classify(['bleach'])).toBe('janitorial');
    expect(classify(new Set(['pump']))).toBe('industrial');
  });

  it('falls back to general', () => {
    expect(classify(new Set(['wool', 'blanket']))).toBe('general');
    expect(classify(new Set())).toBe('general');
  });

  it('classifies a normalized description end to end', () => {
    expect(classify(tokenize(normalize('Disinfectant Wipes 80 ct canister')))).toBe('janitorial');
  });
});

describe('token overlap', () => {
  it('computes jaccard over sets', () => {
    const a = new Set(['a1', 'b1', 'c1']), b = new Set(['b1', 'c1', 'd1']);
    expect(sharedTokenCount(a, b)).toBe(2);
    expect(jaccard(a, b)).toBe(0.5);
    expect(jaccard(a, a)).toBe(1);
    expect(jaccard(a, new Set())).toBe(0);
  });
});
