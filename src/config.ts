//runtime configuration: environment for the store, overrides for pricing
import { z } from 'zod';
import { PRICING_CONFIG, STORE_CONFIG } from './models/index.js';
import type { PricingConfig, StoreConfig, Urgency, UrgencyProfile } from './models/index.js';

const EnvSchema = z.object({
  PRICEBOOK_DB_PATH: z.string().trim().min(1).default(STORE_CONFIG.dbPath),
  PRICEBOOK_MAX_RECORDS: z.coerce.number().int().positive().default(STORE_CONFIG.maxRecords),
  PRICEBOOK_AUDIT_ENTRIES_PER_SUBJECT: z.coerce.number().int().positive().default(STORE_CONFIG.auditEntriesPerSubject),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

//reads PRICEBOOK_* variables; callers load .env themselves (the demo does via dotenv/config)
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid environment: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`);
  }
  return {
    dbPath: parsed.data.PRICEBOOK_DB_PATH,
    maxRecords: parsed.data.PRICEBOOK_MAX_RECORDS,
    auditEntriesPerSubject: parsed.data.PRICEBOOK_AUDIT_ENTRIES_PER_SUBJECT,
  };
}

export interface PricingOverrides extends Partial<Omit<PricingConfig, 'weights' | 'categoryMarkup' | 'urgency' | 'winBands'>> {
  weights?: Partial<PricingConfig['weights']>;
  categoryMarkup?: Partial<PricingConfig['categoryMarkup']>;
  urgency?: Partial<Record<Urgency, Partial<UrgencyProfile>>>;
  winBands?: Partial<PricingConfig['winBands']>;
}

//nested tables merge key by key, everything else replaces
export function resolvePricingConfig(overrides: PricingOverrides = {}, base: PricingConfig = PRICING_CONFIG): PricingConfig {
  const { weights, categoryMarkup, urgency, winBands, ...scalars } = overrides;
  return {
    ...base,
    ...scalars,
    weights: { ...base.weights, ...weights },
    categoryMarkup: { ...base.categoryMarkup, ...categoryMarkup },
    urgency: {
      low: { ...base.urgency.low, ...urgency?.low },
      normal: { ...base.urgency.normal, ...urgency?.normal },
      high: { ...base.urgency.high, ...urgency?.high },
    },
    winBands: { ...base.winBands, ...winBands },
  };
}
