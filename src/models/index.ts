//data contracts for the pricing knowledge base
//observations are what persists, everything else is derived on demand

export const CATEGORIES = ['medical', 'janitorial', 'office', 'industrial', 'general'] as const;
export type Category = typeof CATEGORIES[number];

export const SOURCE_KINDS = ['live_lookup', 'bulk_import', 'manual_entry'] as const;
export type SourceKind = typeof SOURCE_KINDS[number];

//one historical record of an item sold at a price on a date
export interface PriceObservation {
  id: string;
  sourceIdentifier: string;
  itemIdentifier: string;
  rawDescription: string;
  normalizedDescription: string;
  tokens: Set<string>;
  category: Category;
  supplierName?: string;
  departmentOrAgency: string;
  unitPrice: number;
  quantity: number;
  totalPrice: number;
  awardDate: string; // YYYY-MM-DD
  sourceKind: SourceKind;
  ingestedAt: string;
  lastMatchedAt: string | null;
}

//Ingestion
export type IngestReason =
  | 'stored'
  | 'duplicate'
  | 'invalid_price'
  | 'invalid_quantity'
  | 'missing_description'
  | 'invalid_date'
  | 'invalid_input'
  | 'capacity_exceeded';

export interface IngestResult {
  stored: boolean;
  reason: IngestReason;
  id?: string;
  message?: string;
}

export interface BulkIngestResult {
  storedCount: number;
  skippedCount: number;
  results: IngestResult[];
}

export interface PricePoint {
  price: number;
  date: string;
}

export interface StoreStats {
  recordCount: number;
  categoryBreakdown: Partial<Record<Category, number>>;
  dateRange: { earliest: string; latest: string } | null;
  departments: Record<string, number>;
  suppliers: Record<string, number>;
  averageUnitPrice: number | null;
  totalValue: number;
}

export interface StoreHealth {
  status: 'healthy' | 'degraded';
  recordCount: number;
  categoriesCovered: number;
  issues: string[];
}

//Audit trail
export interface AuditEntry {
  step: 'ingest' | 'ingest_bulk' | 'evict';
  timestamp: string;
  details: string;
}

//Matching
export type MatchTier = 'exact_identifier' | 'token_overlap' | 'category_keyword';

export interface ObservationMatch {
  observation: PriceObservation;
  confidence: number;
  baseConfidence: number;
  freshnessWeight: number;
  tier: MatchTier;
  overlap: number;
}

export type PriceTrend = 'rising' | 'falling' | 'stable' | 'insufficient_data';

export interface PriceSummary {
  matches: number;
  minPrice: number | null;
  maxPrice: number | null;
  medianPrice: number | null;
  averagePrice: number | null;
  recentAverage: number | null;
  trend: PriceTrend;
}

export interface WinProbability {
  probability: number;
  confidenceLevel: 'high' | 'medium' | 'low' | 'no_data';
  vsReferencePercent: number | null;
  dataPoints: number;
  reasoning: string;
}

//Pricing
export type Urgency = 'low' | 'normal' | 'high';
export type TierName = 'recommended' | 'aggressive' | 'safe';

export interface PriceTier {
  price: number;
  marginPercent: number | null;
  winProbabilityEstimate: number;
}

export type PricingFlag =
  | 'no_pricing_data'
  | 'price_above_recent_wins'
  | 'stale_data'
  | 'limited_history'
  | 'thin_margin_opportunity'
  | 'prices_trending_up'
  | 'prices_trending_down'
  | 'safe_capped_at_market'
  | 'tier_order_clamped'
  | `profit_floor_applied_${Exclude<TierName, 'safe'>}`
  | `profit_floor_unmet_${Exclude<TierName, 'safe'>}`
  | `hard_floor_applied_${TierName}`;

export interface PricedRecommendation {
  status: 'priced';
  recommended: PriceTier;
  aggressive: PriceTier;
  safe: PriceTier;
  flags: PricingFlag[];
  reasoning: string;
  marketAnchor: number | null;
  costPlusPrice: number | null;
  dataQuality: 'full' | 'history_only' | 'cost_only';
}

//callers must treat this as "requires human input", never as a price
export interface InsufficientDataRecommendation {
  status: 'insufficient_data';
  flags: ['no_pricing_data'];
  reasoning: string;
  requiresHumanInput: true;
}

export type PricingRecommendation = PricedRecommendation | InsufficientDataRecommendation;

//Grading
export const GRADES = ['A', 'B', 'C', 'F'] as const;
export type Grade = typeof GRADES[number];

export interface ConfidenceResult {
  score: number;
  grade: Grade;
  factors: Record<string, number | boolean>;
  notes: string[];
}

export interface QuoteConfidenceResult extends ConfidenceResult {
  itemsScored: number;
  gradeDistribution: Record<Grade, number>;
  items: ConfidenceResult[];
  autoSendEligible: boolean;
  recommendation: string;
}

export interface GradableItem {
  description?: string;
  supplierCost?: number | null;
  historyPrice?: number | null;
  marketPrice?: number | null;
  quotedPrice?: number | null;
  recommendation?: PricingRecommendation;
}

//Configuration
export interface StoreConfig {
  maxRecords: number;
  dbPath: string;
  auditEntriesPerSubject: number;
}

export const STORE_CONFIG: StoreConfig = {
  maxRecords: 10_000,
  dbPath: 'data/pricebook.db',
  auditEntriesPerSubject: 20,
} as const;

export interface FreshnessBand {
  maxMonths: number;
  weight: number;
}

export interface MatchingConfig {
  minTokenLength: number;
  overlapThreshold: number;
  overlapConfidence: readonly [number, number];
  categoryConfidence: readonly [number, number];
  freshnessBands: readonly FreshnessBand[];
  staleWeight: number;
  defaultMaxResults: number;
  summaryMaxResults: number;
  summaryMinBaseConfidence: number;
  recentWeightThreshold: number;
  trendThreshold: number;
}

export const MATCHING_CONFIG: MatchingConfig = {
  minTokenLength: 2,
  overlapThreshold: 0.70,
  overlapConfidence: [0.70, 0.95],
  categoryConfidence: [0.40, 0.70],
  freshnessBands: [
    { maxMonths: 6, weight: 1.0 },
    { maxMonths: 12, weight: 0.8 },
    { maxMonths: 24, weight: 0.5 },
  ],
  staleWeight: 0.2,
  defaultMaxResults: 10,
  summaryMaxResults: 50,
  summaryMinBaseConfidence: 0.5,
  recentWeightThreshold: 0.8,
  trendThreshold: 0.05,
} as const;

export interface UrgencyProfile {
  recommendedUndercut: number;
  aggressiveUndercut: number;
  safeMarkup: number;
}

export interface PricingConfig {
  weights: { history: number; supplierCost: number; marginGoal: number };
  categoryMarkup: Record<Category, number>;
  marginGoalMarkup: number;
  urgency: Record<Urgency, UrgencyProfile>;
  profitFloorRecommended: number;
  profitFloorAggressive: number;
  hardFloorMargin: number;
  ceilingAlertRatio: number;
  safeCapRatio: number;
  staleDataMonths: number;
  limitedHistoryCount: number;
  thinMarginRatio: number;
  logisticSteepness: number;
  winBands: Record<TierName, readonly [number, number]>;
}

export const PRICING_CONFIG: PricingConfig = {
  weights: { history: 0.60, supplierCost: 0.30, marginGoal: 0.10 },
  categoryMarkup: { medical: 0.30, janitorial: 0.20, office: 0.20, industrial: 0.25, general: 0.25 },
  marginGoalMarkup: 0.30,
  urgency: {
    low: { recommendedUndercut: 0.01, aggressiveUndercut: 0.02, safeMarkup: 0.35 },
    normal: { recommendedUndercut: 0.02, aggressiveUndercut: 0.03, safeMarkup: 0.30 },
    high: { recommendedUndercut: 0.03, aggressiveUndercut: 0.05, safeMarkup: 0.25 },
  },
  profitFloorRecommended: 100,
  profitFloorAggressive: 50,
  hardFloorMargin: 25,
  ceilingAlertRatio: 1.10,
  safeCapRatio: 0.99,
  staleDataMonths: 18,
  limitedHistoryCount: 3,
  thinMarginRatio: 0.85,
  logisticSteepness: 15,
  winBands: { recommended: [0.65, 0.75], aggressive: [0.80, 0.90], safe: [0.40, 0.55] },
} as const;

export type GradingFactor = 'has_cost' | 'has_history' | 'has_market_price' | 'margin';

export interface GradingConfig {
  weights: Record<GradingFactor, number>;
  thinMarginCredit: number;
  minMarginPercent: number;
  thresholds: { A: number; B: number; C: number };
}

export const GRADING_CONFIG: GradingConfig = {
  weights: { has_cost: 0.30, has_history: 0.25, has_market_price: 0.20, margin: 0.25 },
  thinMarginCredit: 0.10,
  minMarginPercent: 10,
  thresholds: { A: 0.85, B: 0.65, C: 0.40 },
} as const;
