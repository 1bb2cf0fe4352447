//public API for the pricing knowledge base services

export { normalize, normalizeIdentifier, tokenize, classify, jaccard, sharedTokenCount, CATEGORY_RULES, type CategoryRule } from './normalizer.js';
export { validateObservation, ObservationInputSchema, type ObservationInput, type ValidObservation, type ValidationOutcome } from './validation.js';
export { RecordStore, RecordStoreError, observationId, type IRecordStore, type RecordStoreOptions, type QueryOptions, type RecordStoreErrorCode } from './record-store.js';
export { MatchingEngine, buildQuery, scoreTier, freshnessWeight, summarizeMatches, logisticWinShare, estimateWinProbability, type IMatchingEngine, type MatchQuery, type TierScore, type FindOptions } from './matching.js';
export { PricingOracle, type IPricingOracle, type RecommendOptions } from './oracle.js';
export { ConfidenceGrader, toGradableItem, type IConfidenceGrader } from './grader.js';
export { QuoteProcessor, type IQuoteProcessor, type QuoteLine, type PricedLine, type QuoteSummary, type QuoteResult, type QuoteProcessorOptions } from './processor.js';
export { parseAwardDate, shiftMonths, isWithinMonths, toIsoDate } from './dates.js';
