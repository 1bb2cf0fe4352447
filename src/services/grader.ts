//ConfidenceGrader: how well-supported is a price, and may the quote go out untouched?
import { GRADES, GRADING_CONFIG } from '../models/index.js';
import type { ConfidenceResult, Grade, GradableItem, GradingConfig, GradingFactor, PricingRecommendation, QuoteConfidenceResult } from '../models/index.js';

export interface IConfidenceGrader {
  gradeFor(score: number): Grade;
  gradeItem(item: GradableItem): ConfidenceResult;
  gradeQuote(items: readonly GradableItem[]): QuoteConfidenceResult;
}

const FACTOR_ORDER: readonly GradingFactor[] = ['has_cost', 'has_history', 'has_market_price', 'margin'];

const present = (n: number | null | undefined): n is number => typeof n === 'number' && Number.isFinite(n) && n > 0;
const rank = (g: Grade): number => GRADES.indexOf(g);

//bridges oracle output to grader input
export function toGradableItem(description: string, recommendation: PricingRecommendation, supplierCost?: number | null, marketPrice?: number | null): GradableItem {
  return { description, recommendation, supplierCost, marketPrice };
}

export class ConfidenceGrader implements IConfidenceGrader {
  constructor(private readonly config: GradingConfig = GRADING_CONFIG) {}

  gradeFor(score: number): Grade {
    const { A, B, C } = this.config.thresholds;
    if (score >= A) return 'A';
    if (score >= B) return 'B';
    if (score >= C) return 'C';
    return 'F';
  }

  gradeItem(item: GradableItem): ConfidenceResult {
    const rec = item.recommendation;
    if (rec?.status === 'insufficient_data') {
      return { score: 0, grade: 'F', factors: { has_cost: false, has_history: false, has_market_price: false, margin: 0 }, notes: ['No pricing data; requires human input'] };
    }

    const cost = present(item.supplierCost) ? item.supplierCost : null;
    const anchor = rec ? rec.marketAnchor : null;
    const history = present(item.historyPrice) ? item.historyPrice : present(anchor) ? anchor : null;
    const market = present(item.marketPrice) ? item.marketPrice : null;
    const quoted = present(item.quotedPrice) ? item.quotedPrice : rec ? rec.recommended.price : null;

    //fixed boundary, not a soft threshold
    if (cost === null && history === null && market === null) {
      return { score: 0, grade: 'F', factors: { has_cost: false, has_history: false, has_market_price: false, margin: 0 }, notes: ['No pricing information available'] };
    }

    const { weights, minMarginPercent, thinMarginCredit } = this.config;
    const marginPercent = cost !== null && quoted !== null ? (quoted - cost) / cost * 100 : null;
    const credit: Record<GradingFactor, number> = {
      has_cost: cost !== null ? weights.has_cost : 0,
      has_history: history !== null ? weights.has_history : 0,
      has_market_price: market !== null ? weights.has_market_price : 0,
      margin: marginPercent === null || marginPercent <= 0 ? 0 : marginPercent >= minMarginPercent ? weights.margin : thinMarginCredit,
    };

    const score = Math.round(FACTOR_ORDER.reduce((s, f) => s + credit[f], 0) * 100) / 100;
    const grade = this.gradeFor(score);

    //largest shortfall first, so notes[0] is what holds the grade down
    const shortfalls = FACTOR_ORDER
      .map(f => ({ factor: f, gap: weights[f] - credit[f] }))
      .filter(s => s.gap > 1e-9)
      .sort((a, b) => b.gap - a.gap);
    const notes = shortfalls.map(s => this.shortfallNote(s.factor, marginPercent));
    if (notes.length === 0) notes.push(`Supplier cost, history and market price all present at ${(marginPercent ?? 0).toFixed(1)}% margin`);

    return {
      score,
      grade,
      factors: {
        has_cost: cost !== null,
        has_history: history !== null,
        has_market_price: market !== null,
        margin: credit.margin,
        ...(marginPercent !== null ? { margin_percent: Math.round(marginPercent * 10) / 10 } : {}),
      },
      notes,
    };
  }

  //mean score, but never more than one letter above the weakest line
  gradeQuote(items: readonly GradableItem[]): QuoteConfidenceResult {
    const gradeDistribution: Record<Grade, number> = { A: 0, B: 0, C: 0, F: 0 };
    if (items.length === 0) {
      return {
        score: 0, grade: 'F', factors: { average_score: 0, weakest_item_score: 0, capped_by_weakest_item: false },
        notes: ['No items to score'], itemsScored: 0, gradeDistribution, items: [], autoSendEligible: false,
        recommendation: 'Add line items before grading the quote.',
      };
    }

    const results = items.map(item => this.gradeItem(item));
    for (const r of results) gradeDistribution[r.grade] += 1;

    const average = Math.round(results.reduce((s, r) => s + r.score, 0) / results.length * 100) / 100;
    const weakest = results.reduce((w, r) => rank(r.grade) > rank(w.grade) || (r.grade === w.grade && r.score < w.score) ? r : w);
    const ceiling = GRADES[Math.max(0, rank(weakest.grade) - 1)] ?? 'A';
    const uncapped = this.gradeFor(average);
    const capped = rank(uncapped) < rank(ceiling);
    const grade = capped ? ceiling : uncapped;

    const notes = [capped
      ? `Grade capped at ${grade} by weakest item (grade ${weakest.grade}, score ${weakest.score.toFixed(2)})`
      : `Average item score ${average.toFixed(2)} across ${results.length} item${results.length === 1 ? '' : 's'}`];
    if (gradeDistribution.F > 0) notes.push(`${gradeDistribution.F} item${gradeDistribution.F === 1 ? ' needs' : 's need'} manual pricing`);

    const autoSendEligible = grade === 'A' && gradeDistribution.C === 0 && gradeDistribution.F === 0;
    return {
      score: average,
      grade,
      factors: { average_score: average, weakest_item_score: weakest.score, capped_by_weakest_item: capped },
      notes,
      itemsScored: results.length,
      gradeDistribution,
      items: results,
      autoSendEligible,
      recommendation: this.recommendation(grade, autoSendEligible),
    };
  }

  private recommendation(grade: Grade, autoSendEligible: boolean): string {
    if (autoSendEligible) return 'Auto-send eligible: every line is well supported.';
    switch (grade) {
      case 'A':
      case 'B': return 'Review flagged lines, then send.';
      case 'C': return 'Manual review required before sending.';
      case 'F': return 'Do not send: price the unsupported lines manually.';
    }
  }

  private shortfallNote(factor: GradingFactor, marginPercent: number | null): string {
    switch (factor) {
      case 'has_cost': return 'No supplier cost; margin cannot be verified';
      case 'has_history': return 'No matched price history for this item';
      case 'has_market_price': return 'No live market price to compare against';
      case 'margin': return marginPercent === null
        ? 'Margin unknown without both a supplier cost and a quoted price'
        : `Margin ${marginPercent.toFixed(1)}% is below the ${this.config.minMarginPercent}% minimum`;
    }
  }
}
