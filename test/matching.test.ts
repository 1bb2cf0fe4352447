import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { createTestEngine, cleanupTestDatabase, observation, monthsAgo, NOW } from './setup.js';
import type { RecordStore } from '../src/services/record-store.js';
import { MatchingEngine, buildQuery, scoreTier, freshnessWeight, estimateWinProbability } from '../src/services/matching.js';
import type { PriceSummary } from '../src/models/index.js';

describe('MatchingEngine', () => {
  let db: Database.Database, store: RecordStore, engine: MatchingEngine;

  beforeEach(() => { const s = createTestEngine(); db = s.db; store = s.store; engine = s.engine; });
  afterEach(() => cleanupTestDatabase(db));

  it('matches an exact item identifier at full confidence when fresh', () => {
    store.ingest(observation({ itemIdentifier: '6500-001-430', description: 'X-RESTRAINT PACKAGE', unitPrice: 1245, awardDate: monthsAgo(6) }));
    const [top] = engine.findSimilar('x restraint package', '6500-001-430');
    expect(top?.tier).toBe('exact_identifier');
    expect(top?.freshnessWeight).toBe(1);
    expect(top?.confidence).toBe(1);
  });

  it('scales an exact match by freshness when the award is 20 months old', () => {
    store.ingest(observation({ itemIdentifier: '6500-001-430', description: 'X-RESTRAINT PACKAGE', unitPrice: 1245, awardDate: monthsAgo(20) }));
    const [top] = engine.findSimilar('x restraint package', '6500-001-430');
    expect(top?.tier).toBe('exact_identifier');
    expect(top?.baseConfidence).toBe(1);
    expect(top?.freshnessWeight).toBe(0.5);
    expect(top?.confidence).toBe(0.5);
  });

  it('returns an empty list when nothing matches', () => {
    expect(engine.findSimilar('Nitrile Exam Gloves Large')).toEqual([]);
    store.ingest(observation({ description: 'Wool Blanket Twin' }));
    expect(engine.findSimilar('Nitrile Exam Gloves Large')).toEqual([]);
  });

  it('maps token overlap into the overlap tier', () => {
    store.ingest(observation({ itemIdentifier: '', description: 'Nitrile Exam Gloves Large Blue' }));
    const [top] = engine.findSimilar('Nitrile Exam Gloves Large');
    expect(top?.tier).toBe('token_overlap');
    expect(top?.overlap).toBe(0.8);
    expect(top?.confidence).toBeCloseTo(0.783333, 5);
  });

  it('falls to the category tier below the overlap threshold', () => {
    store.ingest(observation({ itemIdentifier: '', description: 'Nitrile Exam Gloves Large Powder Free' }));
    const [top] = engine.findSimilar('Nitrile Exam Gloves Large');
    expect(top?.tier).toBe('category_keyword');
    expect(top?.confidence).toBeCloseTo(0.685714, 5);
  });

  it('orders by confidence, then newer award, then insertion order', () => {
    const glove = (po: string, item: string, months: number) => observation({ sourceIdentifier: po, itemIdentifier: item, awardDate: monthsAgo(months) });
    store.ingestBulk([glove('PO-1', 'NG-2', 2), glove('PO-2', 'NG-1', 8), glove('PO-3', 'NG-3', 1), glove('PO-4', 'NG-4', 1)]);

    const results = engine.findSimilar('Nitrile Exam Gloves Large', 'NG-1');
    expect(results.map(m => m.observation.sourceIdentifier)).toEqual(['PO-3', 'PO-4', 'PO-1', 'PO-2']);
    expect(results.map(m => m.confidence)).toEqual([0.95, 0.95, 0.95, 0.8]);
    expect(new Set(results.map(m => m.observation.id)).size).toBe(results.length);

    expect(engine.findSimilar('Nitrile Exam Gloves Large', 'NG-1', 1)).toHaveLength(1);
    expect(engine.findSimilar('Nitrile Exam Gloves Large', 'NG-1', 10, { minConfidence: 0.9 })).toHaveLength(3);
    expect(engine.findSimilar('Nitrile Exam Gloves Large', 'NG-1', 10, { maxAgeMonths: 1 }).map(m => m.observation.sourceIdentifier)).toEqual(['PO-3', 'PO-4']);
  });

  it('records when an observation was last matched', () => {
    store.ingestBulk([observation(), observation({ sourceIdentifier: 'PO-2', itemIdentifier: 'WB-1', description: 'Wool Blanket' })]);
    engine.findSimilar('Nitrile Exam Gloves Large');
    expect(store.query().map(o => o.lastMatchedAt)).toEqual([NOW.toISOString(), null]);
  });

  it('summarizes matched prices with a recent-vs-older trend', () => {
    const toner = (po: string, unitPrice: number, months: number) =>
      observation({ sourceIdentifier: po, itemIdentifier: '', description: 'Black Toner Cartridge', unitPrice, awardDate: monthsAgo(months) });
    store.ingestBulk([toner('PO-1', 100, 1), toner('PO-2', 110, 3), toner('PO-3', 80, 14), toner('PO-4', 90, 9)]);

    expect(engine.priceSummary('Black Toner Cartridge')).toEqual({
      matches: 4, minPrice: 80, maxPrice: 110, medianPrice: 95, averagePrice: 95, recentAverage: 100, trend: 'rising',
    });
  });

  it('reports an empty summary without history', () => {
    expect(engine.priceSummary('Black Toner Cartridge')).toEqual({
      matches: 0, minPrice: null, maxPrice: null, medianPrice: null, averagePrice: null, recentAverage: null, trend: 'insufficient_data',
    });
    expect(engine.winProbability(100, 'Black Toner Cartridge').confidenceLevel).toBe('no_data');
  });
});

describe('scoreTier', () => {
  it('scores an observation by exactly one tier, the first satisfied', () => {
    const query = buildQuery('Nitrile Exam Gloves Large', 'NG-1');
    const base = {
      id: 'obs-1', sourceIdentifier: 'PO-1', itemIdentifier: 'NG-1', rawDescription: 'Nitrile Exam Gloves Large',
      normalizedDescription: 'nitrile exam gloves large', tokens: new Set(['nitrile', 'exam', 'gloves', 'large']), category: 'medical' as const,
      departmentOrAgency: '', unitPrice: 10, quantity: 1, totalPrice: 10, awardDate: '2026-09-19', sourceKind: 'live_lookup' as const,
      ingestedAt: NOW.toISOString(), lastMatchedAt: null,
    };
    expect(scoreTier(query, base)).toEqual({ tier: 'exact_identifier', baseConfidence: 1, overlap: 1 });
    expect(scoreTier(query, { ...base, itemIdentifier: 'NG-9' })).toEqual({ tier: 'token_overlap', baseConfidence: 0.95, overlap: 1 });
  });

  it('does not use the general bucket as a category match', () => {
    const query = buildQuery('Wool Blanket');
    expect(query.category).toBe('general');
    const blanket = {
      id: 'obs-2', sourceIdentifier: 'PO-2', itemIdentifier: '', rawDescription: 'Wool Blanket Twin',
      normalizedDescription: 'wool blanket twin', tokens: new Set(['wool', 'blanket', 'twin']), category: 'general' as const,
      departmentOrAgency: '', unitPrice: 38, quantity: 1, totalPrice: 38, awardDate: '2026-09-19', sourceKind: 'manual_entry' as const,
      ingestedAt: NOW.toISOString(), lastMatchedAt: null,
    };
    expect(scoreTier(query, blanket)).toBeNull();
  });
});

describe('freshnessWeight', () => {
  it('applies the calendar-month bands at their boundaries', () => {
    expect(freshnessWeight('2026-12-01', NOW)).toBe(1);
    expect(freshnessWeight('2026-04-19', NOW)).toBe(1);
    expect(freshnessWeight('2026-04-18', NOW)).toBe(0.8);
    expect(freshnessWeight('2025-10-19', NOW)).toBe(0.8);
    expect(freshnessWeight('2025-10-18', NOW)).toBe(0.5);
    expect(freshnessWeight('2024-10-19', NOW)).toBe(0.5);
    expect(freshnessWeight('2024-10-18', NOW)).toBe(0.2);
    expect(freshnessWeight('not-a-date', NOW)).toBe(0.2);
  });
});

describe('estimateWinProbability', () => {
  const summary: PriceSummary = { matches: 4, minPrice: 80, maxPrice: 110, medianPrice: 95, averagePrice: 95, recentAverage: 100, trend: 'rising' };

  it('is even at the reference price', () => {
    expect(estimateWinProbability(100, summary)).toEqual({
      probability: 0.5, confidenceLevel: 'medium', vsReferencePercent: 0, dataPoints: 4,
      reasoning: 'Proposed $100.00 is 0.0% above the recent average of $100.00 (4 data points). Price is competitive.',
    });
  });

  it('falls as the price rises above recent wins', () => {
    const estimate = estimateWinProbability(110, summary);
    expect(estimate.probability).toBe(0.182);
    expect(estimate.vsReferencePercent).toBe(10);
    expect(estimate.reasoning).toBe('Proposed $110.00 is 10.0% above the recent average of $100.00 (4 data points). Price is more than 3% above recent wins; consider adjusting down.');
  });

  it('is clamped and uses the median with little history', () => {
    expect(estimateWinProbability(50, summary).probability).toBe(0.95);
    const single: PriceSummary = { matches: 1, minPrice: 95, maxPrice: 95, medianPrice: 95, averagePrice: 95, recentAverage: 95, trend: 'insufficient_data' };
    const estimate = estimateWinProbability(95, single);
    expect(estimate.confidenceLevel).toBe('low');
    expect(estimate.reasoning).toBe('Proposed $95.00 is 0.0% above the median of $95.00 (1 data points). Price is competitive.');
  });
});
