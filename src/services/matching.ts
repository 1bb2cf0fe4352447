//MatchingEngine: ranks stored observations against a query item
//it answers: what have we seen this item (or something like it) sell for?
import { MATCHING_CONFIG, PRICING_CONFIG, type Category, type MatchTier, type ObservationMatch, type PriceObservation, type PriceSummary, type WinProbability } from '../models/index.js';
import type { IRecordStore } from './record-store.js';
import { classify, jaccard, normalize, normalizeIdentifier, sharedTokenCount, tokenize } from './normalizer.js';
import { isWithinMonths, toIsoDate } from './dates.js';
import { formatMoney, formatPercent, round2 } from './money.js';

export interface MatchQuery {
  key: string;
  tokens: ReadonlySet<string>;
  category: Category;
}

export interface TierScore {
  tier: MatchTier;
  baseConfidence: number;
  overlap: number;
}

export interface FindOptions {
  minConfidence?: number;
  maxAgeMonths?: number;
}

export interface IMatchingEngine {
  findSimilar(description: string, itemIdentifier?: string, maxResults?: number, options?: FindOptions): ObservationMatch[];
  priceSummary(description: string, itemIdentifier?: string): PriceSummary;
  winProbability(price: number, description: string, itemIdentifier?: string): WinProbability;
}

export function buildQuery(description: string, itemIdentifier?: string): MatchQuery {
  const tokens = tokenize(normalize(description));
  return { key: normalizeIdentifier(itemIdentifier), tokens, category: classify(tokens) };
}

//tiers are tried in order and the first one satisfied wins, so an observation is scored by exactly one
export function scoreTier(query: MatchQuery, o: PriceObservation): TierScore | null {
  const overlap = jaccard(query.tokens, o.tokens);
  if (query.key !== '' && normalizeIdentifier(o.itemIdentifier) === query.key) {
    return { tier: 'exact_identifier', baseConfidence: 1.0, overlap };
  }

  const { overlapThreshold, overlapConfidence: [lo, hi], categoryConfidence: [catLo, catHi] } = MATCHING_CONFIG;
  if (overlap >= overlapThreshold) {
    return { tier: 'token_overlap', baseConfidence: lo + (overlap - overlapThreshold) * (hi - lo) / (1 - overlapThreshold), overlap };
  }
  //"general" is the fallback bucket, sharing it says nothing about the item
  if (query.category !== 'general' && query.category === o.category && sharedTokenCount(query.tokens, o.tokens) > 0) {
    return { tier: 'category_keyword', baseConfidence: catLo + (overlap / overlapThreshold) * (catHi - catLo), overlap };
  }
  return null;
}

//piecewise by calendar-month age: <=6 → 1.0, <=12 → 0.8, <=24 → 0.5, older → 0.2
export function freshnessWeight(awardDate: string, now: Date): number {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(awardDate)) return MATCHING_CONFIG.staleWeight;
  const today = toIsoDate(now);
  const band = MATCHING_CONFIG.freshnessBands.find(b => isWithinMonths(awardDate, b.maxMonths, today));
  return band ? band.weight : MATCHING_CONFIG.staleWeight;
}

const round1 = (n: number): number => Math.round(n * 10) / 10;
const round3 = (n: number): number => Math.round(n * 1000) / 1000;
const mean = (xs: readonly number[]): number => xs.reduce((a, b) => a + b, 0) / xs.length;

//min/max/median/average plus a recent-vs-older trend over the well-matched subset
export function summarizeMatches(matches: readonly ObservationMatch[], minBaseConfidence = MATCHING_CONFIG.summaryMinBaseConfidence): PriceSummary {
  const used = matches.filter(m => m.baseConfidence >= minBaseConfidence);
  if (used.length === 0) {
    return { matches: 0, minPrice: null, maxPrice: null, medianPrice: null, averagePrice: null, recentAverage: null, trend: 'insufficient_data' };
  }

  const prices = used.map(m => m.observation.unitPrice);
  const sorted = [...prices].sort((a, b) => a - b), n = sorted.length, mid = Math.floor(n / 2);
  const median = n % 2 ? (sorted[mid] ?? 0) : ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;

  const { recentWeightThreshold, trendThreshold } = MATCHING_CONFIG;
  const recent = used.filter(m => m.freshnessWeight >= recentWeightThreshold).map(m => m.observation.unitPrice);
  const older = used.filter(m => m.freshnessWeight < recentWeightThreshold).map(m => m.observation.unitPrice);
  const recentAverage = recent.length ? mean(recent) : null;

  let trend: PriceSummary['trend'] = 'insufficient_data';
  if (recentAverage !== null && older.length > 0 && n >= 3) {
    const change = (recentAverage - mean(older)) / mean(older);
    trend = change > trendThreshold ? 'rising' : change < -trendThreshold ? 'falling' : 'stable';
  }

  return {
    matches: n,
    minPrice: round2(sorted[0] ?? 0),
    maxPrice: round2(sorted[n - 1] ?? 0),
    medianPrice: round2(median),
    averagePrice: round2(mean(prices)),
    recentAverage: recentAverage === null ? null : round2(recentAverage),
    trend,
  };
}

//share of bids expected to win at this price: 0.5 at the reference, falling as price rises above it
export function logisticWinShare(price: number, reference: number, steepness: number = PRICING_CONFIG.logisticSteepness): number {
  return 1 / (1 + Math.exp(steepness * (price - reference) / reference));
}

//win probability of a proposed price against what similar items have recently sold for
export function estimateWinProbability(price: number, summary: PriceSummary): WinProbability {
  if (summary.matches === 0 || summary.medianPrice === null) {
    return { probability: 0.5, confidenceLevel: 'no_data', vsReferencePercent: null, dataPoints: 0, reasoning: 'No historical pricing data available. Manual review recommended.' };
  }

  const useRecent = summary.matches >= 3 && summary.recentAverage !== null;
  const reference = useRecent && summary.recentAverage !== null ? summary.recentAverage : summary.medianPrice;
  const change = (price - reference) / reference;
  const probability = round3(Math.min(0.95, Math.max(0.05, logisticWinShare(price, reference))));
  const confidenceLevel = summary.matches >= 5 && summary.recentAverage !== null ? 'high' : summary.matches >= 2 ? 'medium' : 'low';

  let reasoning = `Proposed ${formatMoney(price)} is ${formatPercent(Math.abs(change))} ${change < 0 ? 'below' : 'above'} the ${useRecent ? 'recent average' : 'median'} of ${formatMoney(reference)} (${summary.matches} data points).`;
  if (change > 0.03) reasoning += ' Price is more than 3% above recent wins; consider adjusting down.';
  else if (change < -0.10) reasoning += ' Price is aggressive: high win probability, thin margins.';
  else reasoning += ' Price is competitive.';

  return { probability, confidenceLevel, vsReferencePercent: round1(change * 100), dataPoints: summary.matches, reasoning };
}

export class MatchingEngine implements IMatchingEngine {
  private readonly now: () => Date;

  constructor(private store: IRecordStore, options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  //no history is a normal answer: an empty list, never an error
  findSimilar(description: string, itemIdentifier?: string, maxResults: number = MATCHING_CONFIG.defaultMaxResults, options: FindOptions = {}): ObservationMatch[] {
    const query = buildQuery(description, itemIdentifier);
    const now = this.now(), today = toIsoDate(now);
    const { minConfidence = 0, maxAgeMonths } = options;

    const scored: { match: ObservationMatch; order: number }[] = [];
    this.store.query().forEach((observation, order) => {
      const score = scoreTier(query, observation);
      if (!score) return;
      if (maxAgeMonths !== undefined && !isWithinMonths(observation.awardDate, maxAgeMonths, today)) return;

      const weight = freshnessWeight(observation.awardDate, now);
      const confidence = score.baseConfidence * weight;
      if (confidence < minConfidence) return;
      scored.push({ order, match: { observation, confidence, baseConfidence: score.baseConfidence, freshnessWeight: weight, tier: score.tier, overlap: score.overlap } });
    });

    //confidence desc, then newer award first, then insertion order
    const results = scored
      .sort((a, b) => b.match.confidence - a.match.confidence
        || b.match.observation.awardDate.localeCompare(a.match.observation.awardDate)
        || a.order - b.order)
      .slice(0, Math.max(0, maxResults))
      .map(s => s.match);

    this.store.touch(results.map(m => m.observation.id));
    return results;
  }

  priceSummary(description: string, itemIdentifier?: string): PriceSummary {
    return summarizeMatches(this.findSimilar(description, itemIdentifier, MATCHING_CONFIG.summaryMaxResults));
  }

  winProbability(price: number, description: string, itemIdentifier?: string): WinProbability {
    return estimateWinProbability(price, this.priceSummary(description, itemIdentifier));
  }
}
