//Quote pipeline orchestrator: Match → Recommend → Grade, per line and for the whole quote
import type {
  Category, ConfidenceResult, GradingConfig, ObservationMatch, PriceSummary, PricingConfig, PricingRecommendation, QuoteConfidenceResult, Urgency,
} from '../models/index.js';
import type { IRecordStore } from './record-store.js';
import { MatchingEngine, buildQuery, summarizeMatches, type IMatchingEngine } from './matching.js';
import { PricingOracle, type IPricingOracle } from './oracle.js';
import { ConfidenceGrader, toGradableItem, type IConfidenceGrader } from './grader.js';
import { round2 } from './money.js';

export interface QuoteLine {
  description: string;
  itemIdentifier?: string;
  supplierCost?: number | null;
  marketPrice?: number | null;
  quantity?: number;
}

export interface PricedLine {
  line: QuoteLine;
  category: Category;
  matches: ObservationMatch[];
  summary: PriceSummary;
  recommendation: PricingRecommendation;
  confidence: ConfidenceResult;
}

export interface QuoteSummary {
  totalItems: number;
  priced: number;
  needsManual: number;
  averageWinProbability: number | null;
  totalRecommended: number;
  totalAggressive: number;
  totalSafe: number;
}

export interface QuoteResult {
  lines: PricedLine[];
  summary: QuoteSummary;
  confidence: QuoteConfidenceResult;
  autoGenerateAllowed: boolean;
}

export interface QuoteProcessorOptions {
  now?: () => Date;
  pricing?: PricingConfig;
  grading?: GradingConfig;
}

//public processor interface
export interface IQuoteProcessor {
  priceLine(line: QuoteLine, agency: string, urgency?: Urgency): PricedLine;
  priceQuote(lines: readonly QuoteLine[], agency: string, urgency?: Urgency): QuoteResult;
}

export class QuoteProcessor implements IQuoteProcessor {
  private matching: IMatchingEngine;
  private oracle: IPricingOracle;
  private grader: IConfidenceGrader;

  constructor(store: IRecordStore, options: QuoteProcessorOptions = {}) {
    this.matching = new MatchingEngine(store, { now: options.now });
    this.oracle = new PricingOracle({ config: options.pricing, now: options.now });
    this.grader = new ConfidenceGrader(options.grading);
  }

  priceLine(line: QuoteLine, agency: string, urgency: Urgency = 'normal'): PricedLine {
    //Step 1: match history
    const matches = this.matching.findSimilar(line.description, line.itemIdentifier);
    const summary = summarizeMatches(matches);
    const { category } = buildQuery(line.description, line.itemIdentifier);

    //Step 2: recommend
    const recommendation = this.oracle.recommend(line.supplierCost, matches, agency, category, urgency, { trend: summary.trend });

    //Step 3: grade
    const confidence = this.grader.gradeItem(toGradableItem(line.description, recommendation, line.supplierCost, line.marketPrice));
    return { line, category, matches, summary, recommendation, confidence };
  }

  priceQuote(lines: readonly QuoteLine[], agency: string, urgency: Urgency = 'normal'): QuoteResult {
    const priced = lines.map(line => this.priceLine(line, agency, urgency));
    const confidence = this.grader.gradeQuote(priced.map(p => toGradableItem(p.line.description, p.recommendation, p.line.supplierCost, p.line.marketPrice)));

    let totalRecommended = 0, totalAggressive = 0, totalSafe = 0, winSum = 0, pricedCount = 0;
    for (const { line, recommendation: rec } of priced) {
      if (rec.status !== 'priced') continue;
      const qty = line.quantity ?? 1;
      totalRecommended += rec.recommended.price * qty;
      totalAggressive += rec.aggressive.price * qty;
      totalSafe += rec.safe.price * qty;
      winSum += rec.recommended.winProbabilityEstimate;
      pricedCount++;
    }

    return {
      lines: priced,
      summary: {
        totalItems: priced.length,
        priced: pricedCount,
        needsManual: priced.length - pricedCount,
        averageWinProbability: pricedCount ? Math.round(winSum / pricedCount * 1000) / 1000 : null,
        totalRecommended: round2(totalRecommended),
        totalAggressive: round2(totalAggressive),
        totalSafe: round2(totalSafe),
      },
      confidence,
      autoGenerateAllowed: confidence.autoSendEligible,
    };
  }
}
