//PricingOracle: turns ranked matches and a supplier cost into three price tiers
//every number in the output, reasoning included, is a pure function of the inputs and the clock
import { PRICING_CONFIG } from '../models/index.js';
import type {
  Category, InsufficientDataRecommendation, ObservationMatch, PriceTier, PriceTrend, PricingConfig,
  PricingFlag, PricingRecommendation, TierName, Urgency,
} from '../models/index.js';
import { isWithinMonths, toIsoDate } from './dates.js';
import { logisticWinShare } from './matching.js';
import { ceil2, formatMoney, formatPercent, round2 } from './money.js';

export interface RecommendOptions {
  trend?: PriceTrend;
}

export interface IPricingOracle {
  recommend(
    supplierCost: number | null | undefined,
    matches: readonly ObservationMatch[],
    agency: string,
    category: Category,
    urgency?: Urgency,
    options?: RecommendOptions,
  ): PricingRecommendation;
}

const round1 = (n: number): number => Math.round(n * 10) / 10;
const round3 = (n: number): number => Math.round(n * 1000) / 1000;

export class PricingOracle implements IPricingOracle {
  private readonly config: PricingConfig;
  private readonly now: () => Date;

  constructor(options: { config?: PricingConfig; now?: () => Date } = {}) {
    this.config = options.config ?? PRICING_CONFIG;
    this.now = options.now ?? (() => new Date());
  }

  recommend(
    supplierCost: number | null | undefined,
    matches: readonly ObservationMatch[],
    agency: string,
    category: Category,
    urgency: Urgency = 'normal',
    options: RecommendOptions = {},
  ): PricingRecommendation {
    const cfg = this.config;
    const cost = typeof supplierCost === 'number' && Number.isFinite(supplierCost) && supplierCost > 0 ? supplierCost : null;
    const usable = matches.filter(m => m.observation.unitPrice > 0 && m.confidence > 0);

    //market anchor: confidence-weighted mean of matched prices
    const totalWeight = usable.reduce((s, m) => s + m.confidence, 0);
    const anchor = usable.length ? usable.reduce((s, m) => s + m.confidence * m.observation.unitPrice, 0) / totalWeight : null;
    const lowest = usable.length ? Math.min(...usable.map(m => m.observation.unitPrice)) : null;
    const markup = cfg.categoryMarkup[category];
    const costPlus = cost === null ? null : cost * (1 + markup);

    let reference: number;
    if (anchor !== null && cost !== null) {
      const w = cfg.weights;
      reference = w.history * anchor + w.supplierCost * cost * (1 + markup) + w.marginGoal * cost * (1 + cfg.marginGoalMarkup);
    } else if (anchor !== null) {
      reference = anchor;
    } else if (cost !== null) {
      reference = cost * (1 + markup);
    } else {
      return this.insufficient(agency, category);
    }

    const flags = new Set<PricingFlag>();
    const profile = cfg.urgency[urgency];

    //profit floors give way when meeting them would price above recent wins
    const softFloor = (price: number, floor: number, tier: 'recommended' | 'aggressive'): number => {
      if (cost === null || price >= cost + floor) return price;
      if (anchor !== null && cost + floor > anchor) {
        flags.add(`profit_floor_unmet_${tier}`);
        return price;
      }
      flags.add(`profit_floor_applied_${tier}`);
      return cost + floor;
    };

    let recommended = softFloor(reference * (1 - profile.recommendedUndercut), cfg.profitFloorRecommended, 'recommended');
    let aggressive = softFloor((lowest ?? recommended) * (1 - profile.aggressiveUndercut), cfg.profitFloorAggressive, 'aggressive');
    let safe = cost !== null ? cost * (1 + profile.safeMarkup) : (anchor ?? recommended) * cfg.safeCapRatio;
    if (anchor !== null && safe >= anchor) {
      safe = anchor * cfg.safeCapRatio;
      flags.add('safe_capped_at_market');
    }

    //the hard floor is the one guardrail that changes a price instead of only flagging it
    const hardFloor = cost === null ? null : ceil2(cost + cfg.hardFloorMargin);
    const floored = (price: number, tier: TierName): number => {
      if (hardFloor === null || round2(price) >= hardFloor) return round2(price);
      flags.add(`hard_floor_applied_${tier}`);
      return hardFloor;
    };
    recommended = floored(recommended, 'recommended');
    aggressive = floored(aggressive, 'aggressive');
    safe = floored(safe, 'safe');

    //aggressive <= recommended <= safe, aggressive clamped first
    if (aggressive > recommended) {
      aggressive = recommended;
      flags.add('tier_order_clamped');
    }
    if (safe < recommended) {
      safe = recommended;
      flags.add('tier_order_clamped');
    }

    if (anchor !== null && recommended > anchor * cfg.ceilingAlertRatio) flags.add('price_above_recent_wins');

    const mostRecent = usable.reduce<string | null>((latest, m) => latest === null || m.observation.awardDate > latest ? m.observation.awardDate : latest, null);
    const stale = mostRecent !== null && !isWithinMonths(mostRecent, cfg.staleDataMonths, toIsoDate(this.now()));
    if (stale) flags.add('stale_data');
    if (usable.length > 0 && usable.length < cfg.limitedHistoryCount) flags.add('limited_history');
    if (cost !== null && anchor !== null && cost / anchor > cfg.thinMarginRatio) flags.add('thin_margin_opportunity');
    if (options.trend === 'rising') flags.add('prices_trending_up');
    else if (options.trend === 'falling') flags.add('prices_trending_down');

    const tier = (price: number, winProbabilityEstimate: number): PriceTier => ({
      price,
      marginPercent: cost === null ? null : round1((price - cost) / cost * 100),
      winProbabilityEstimate,
    });
    //a tier sitting at the recommended price carries the recommended estimate
    const recommendedWin = this.winEstimate(recommended, anchor, 'recommended');
    const winFor = (price: number, name: TierName) => price === recommended ? recommendedWin : this.winEstimate(price, anchor, name);
    const result = {
      recommended: tier(recommended, recommendedWin),
      aggressive: tier(aggressive, winFor(aggressive, 'aggressive')),
      safe: tier(safe, winFor(safe, 'safe')),
    };

    //templated from the numbers above, never free text
    const best = usable.reduce<ObservationMatch | null>((b, m) => b === null || m.confidence > b.confidence ? m : b, null);
    const parts: string[] = [];
    if (best) {
      const o = best.observation;
      parts.push(`Best match ${formatMoney(o.unitPrice)} on ${o.awardDate} for ${o.departmentOrAgency || 'an unknown agency'} (${best.tier.replace(/_/g, ' ')}, confidence ${best.confidence.toFixed(2)}).`);
    } else {
      parts.push('No matched history; priced from supplier cost.');
    }
    if (anchor !== null) parts.push(`Market anchor ${formatMoney(anchor)} from ${usable.length} match${usable.length === 1 ? '' : 'es'}.`);
    if (cost !== null && costPlus !== null) parts.push(`Cost-plus ${formatMoney(costPlus)} at ${formatPercent(markup)} markup on cost ${formatMoney(cost)}.`);
    const margin = result.recommended.marginPercent;
    parts.push(`Recommended ${formatMoney(recommended)} for ${agency || 'the agency'} (${category}, ${urgency} urgency) ${margin === null ? 'with margin unknown without a supplier cost.' : `at ${margin.toFixed(1)}% margin.`}`);
    if (stale) parts.push(`Most recent match is from ${mostRecent}; research current market pricing before quoting.`);

    return {
      status: 'priced',
      ...result,
      flags: [...flags],
      reasoning: parts.join(' '),
      marketAnchor: anchor === null ? null : round2(anchor),
      costPlusPrice: costPlus === null ? null : round2(costPlus),
      dataQuality: anchor !== null && cost !== null ? 'full' : anchor !== null ? 'history_only' : 'cost_only',
    };
  }

  //tier target band, positioned inside it by where the price sits against the market anchor
  private winEstimate(price: number, anchor: number | null, tier: TierName): number {
    const [lo, hi] = this.config.winBands[tier];
    if (anchor === null) return round3((lo + hi) / 2);
    return round3(lo + (hi - lo) * logisticWinShare(price, anchor, this.config.logisticSteepness));
  }

  private insufficient(agency: string, category: Category): InsufficientDataRecommendation {
    return {
      status: 'insufficient_data',
      flags: ['no_pricing_data'],
      reasoning: `No matched history or supplier cost for ${category} item for ${agency || 'the agency'}. Manual pricing required.`,
      requiresHumanInput: true,
    };
  }
}
