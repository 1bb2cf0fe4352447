/**
 * Pricing Knowledge Base
 *
 * Stores historical price observations, matches new line items against them,
 * recommends tiered prices and grades how well-supported each price is.
 */

export * from './models/index.js';
export * from './services/index.js';
export * from './repository/index.js';
export { loadEnvConfig, resolvePricingConfig, ConfigError, type PricingOverrides } from './config.js';
