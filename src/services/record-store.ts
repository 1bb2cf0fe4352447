//RecordStore: durable, deduplicated, capacity-bounded collection of price observations
//the only writer of the knowledge base; matching reads through query()
import { v5 as uuidv5 } from 'uuid';
import { CATEGORIES, STORE_CONFIG } from '../models/index.js';
import type { AuditEntry, BulkIngestResult, Category, IngestResult, PriceObservation, PricePoint, StoreHealth, StoreStats } from '../models/index.js';
import type { IObservationRepository } from '../repository/observation-repository.js';
import { classify, normalize, normalizeIdentifier, tokenize } from './normalizer.js';
import { validateObservation, type ObservationInput, type ValidObservation } from './validation.js';
import { round2 } from './money.js';

const OBSERVATION_NAMESPACE = '6f1d2c84-3a5b-4e7f-9c10-2b8e4d6a1f35';

export type RecordStoreErrorCode = 'storage_failure' | 'invalid_capacity';

//storage problems reach the caller as-is; retry policy belongs to whoever feeds the store
export class RecordStoreError extends Error {
  constructor(readonly code: RecordStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordStoreError';
  }
}

export interface RecordStoreOptions {
  maxRecords?: number;
  auditEntriesPerSubject?: number;
  now?: () => Date;
}

export interface QueryOptions {
  orderBy?: 'awardDate' | 'ingestedAt';
  direction?: 'asc' | 'desc';
  limit?: number;
}

export interface IRecordStore {
  ingest(input: ObservationInput): IngestResult;
  ingestBulk(inputs: readonly ObservationInput[]): BulkIngestResult;
  query(predicate?: (o: PriceObservation) => boolean, options?: QueryOptions): PriceObservation[];
  evict(protectedIds?: Iterable<string>): string[];
  touch(ids: readonly string[]): void;
  stats(): StoreStats;
  priceHistory(itemIdentifierOrCategory: string): PricePoint[];
  healthCheck(): StoreHealth;
  getAuditTrail(subjectId: string): AuditEntry[];
}

//same source PO + item + normalized description always yields the same id
export function observationId(sourceIdentifier: string, itemIdentifier: string, description: string): string {
  return uuidv5(`${sourceIdentifier}|${itemIdentifier}|${normalize(description)}`, OBSERVATION_NAMESPACE);
}

function isCategory(value: string): value is Category {
  return CATEGORIES.some(c => c === value);
}

export class RecordStore implements IRecordStore {
  private readonly maxRecords: number;
  private readonly auditEntriesPerSubject: number;
  private readonly now: () => Date;

  constructor(private repository: IObservationRepository, options: RecordStoreOptions = {}) {
    this.maxRecords = options.maxRecords ?? STORE_CONFIG.maxRecords;
    if (!Number.isInteger(this.maxRecords) || this.maxRecords < 1) {
      throw new RecordStoreError('invalid_capacity', `maxRecords must be a positive integer, got ${this.maxRecords}`);
    }
    this.auditEntriesPerSubject = options.auditEntriesPerSubject ?? STORE_CONFIG.auditEntriesPerSubject;
    if (!Number.isInteger(this.auditEntriesPerSubject) || this.auditEntriesPerSubject < 1) {
      throw new RecordStoreError('invalid_capacity', `auditEntriesPerSubject must be a positive integer, got ${this.auditEntriesPerSubject}`);
    }
    this.now = options.now ?? (() => new Date());
  }

  //idempotent: re-ingesting the same observation is a reported skip, not an error
  ingest(input: ObservationInput): IngestResult {
    const at = this.now().toISOString();
    return this.write(() => this.ingestOne(input, at, new Set()));
  }

  //one transaction for the whole batch, same per-record rule as ingest
  ingestBulk(inputs: readonly ObservationInput[]): BulkIngestResult {
    const at = this.now().toISOString();
    return this.write(() => {
      const protectedIds = new Set<string>();
      const results = inputs.map(input => this.ingestOne(input, at, protectedIds));
      const storedCount = results.filter(r => r.stored).length;
      const skippedCount = results.length - storedCount;
      this.audit('bulk', 'ingest_bulk', `Bulk ingest of ${results.length}: stored ${storedCount}, skipped ${skippedCount}`, at);
      return { storedCount, skippedCount, results };
    });
  }

  query(predicate: (o: PriceObservation) => boolean = () => true, options: QueryOptions = {}): PriceObservation[] {
    const rows = this.read(() => this.repository.findAll()).filter(predicate);
    const { orderBy, direction = 'asc', limit } = options;
    if (orderBy) {
      const sign = direction === 'asc' ? 1 : -1;
      rows.sort((a, b) => sign * a[orderBy].localeCompare(b[orderBy]));
    }
    return limit === undefined ? rows : rows.slice(0, limit);
  }

  evict(protectedIds: Iterable<string> = []): string[] {
    const at = this.now().toISOString();
    return this.write(() => this.evictExcess(new Set(protectedIds), at));
  }

  //match bookkeeping for the eviction order
  touch(ids: readonly string[]): void {
    if (ids.length === 0) return;
    const at = this.now().toISOString();
    this.write(() => this.repository.touch(ids, at));
  }

  stats(): StoreStats {
    const { recordCount, aggregates: a } = this.read(() => ({ recordCount: this.repository.count(), aggregates: this.repository.aggregates() }));
    const categoryBreakdown: StoreStats['categoryBreakdown'] = {};
    for (const { category, count } of a.categories) categoryBreakdown[category] = count;
    return {
      recordCount,
      categoryBreakdown,
      dateRange: a.earliest !== null && a.latest !== null ? { earliest: a.earliest, latest: a.latest } : null,
      departments: Object.fromEntries(a.departments.map(d => [d.name, d.count])),
      suppliers: Object.fromEntries(a.suppliers.map(s => [s.name, s.count])),
      averageUnitPrice: a.averageUnitPrice === null ? null : round2(a.averageUnitPrice),
      totalValue: round2(a.totalValue),
    };
  }

  //a category name selects the whole category, anything else is an item identifier
  priceHistory(itemIdentifierOrCategory: string): PricePoint[] {
    const key = itemIdentifierOrCategory.trim().toLowerCase();
    if (isCategory(key)) return this.read(() => this.repository.findPriceHistory('category', key));
    const itemKey = normalizeIdentifier(itemIdentifierOrCategory);
    return itemKey ? this.read(() => this.repository.findPriceHistory('item_key', itemKey)) : [];
  }

  healthCheck(): StoreHealth {
    const stats = this.stats();
    const issues: string[] = [];
    if (stats.recordCount === 0) issues.push('Knowledge base is empty; ingest price observations to populate it');
    else if (stats.recordCount < 50) issues.push(`Only ${stats.recordCount} records in the knowledge base; matching improves past 100 records`);
    return {
      status: stats.recordCount === 0 ? 'degraded' : 'healthy',
      recordCount: stats.recordCount,
      categoriesCovered: Object.keys(stats.categoryBreakdown).length,
      issues,
    };
  }

  getAuditTrail(subjectId: string): AuditEntry[] {
    return this.read(() => this.repository.getAuditTrail(subjectId));
  }

  private ingestOne(input: ObservationInput, at: string, protectedIds: Set<string>): IngestResult {
    const checked = validateObservation(input);
    if (!checked.ok) {
      this.audit('rejected', 'ingest', `Rejected (${checked.reason}): ${checked.message}`, at);
      return { stored: false, reason: checked.reason, message: checked.message };
    }

    const observation = this.build(checked.value, at);
    if (!this.repository.insert(observation, normalizeIdentifier(observation.itemIdentifier))) {
      this.audit(observation.id, 'ingest', 'Duplicate observation skipped', at);
      return { stored: false, reason: 'duplicate', id: observation.id };
    }

    protectedIds.add(observation.id);
    this.evictExcess(protectedIds, at);
    //everything left is protected by this operation: refuse the new record rather than break the bound
    if (this.repository.count() > this.maxRecords) {
      this.repository.deleteMany([observation.id]);
      protectedIds.delete(observation.id);
      const message = `Store is at capacity (${this.maxRecords}) with records protected by this operation`;
      this.audit('rejected', 'ingest', `Rejected ${observation.id} (capacity_exceeded): ${message}`, at);
      return { stored: false, reason: 'capacity_exceeded', id: observation.id, message };
    }

    this.audit(observation.id, 'ingest', `Stored ${observation.category} observation at $${observation.unitPrice.toFixed(2)} (${observation.awardDate})`, at);
    return { stored: true, reason: 'stored', id: observation.id };
  }

  private evictExcess(protectedIds: ReadonlySet<string>, at: string): string[] {
    const excess = this.repository.count() - this.maxRecords;
    if (excess <= 0) return [];
    const victims = this.repository.evictionOrder().filter(id => !protectedIds.has(id)).slice(0, excess);
    this.repository.deleteMany(victims);
    for (const id of victims) this.audit('evict', 'evict', `Evicted ${id} to keep the store within ${this.maxRecords} records`, at);
    return victims;
  }

  private build(v: ValidObservation, at: string): PriceObservation {
    const normalizedDescription = normalize(v.description);
    const tokens = tokenize(normalizedDescription);
    return {
      id: observationId(v.sourceIdentifier, v.itemIdentifier, v.description),
      sourceIdentifier: v.sourceIdentifier, itemIdentifier: v.itemIdentifier,
      rawDescription: v.description, normalizedDescription, tokens, category: classify(tokens),
      ...(v.supplierName ? { supplierName: v.supplierName } : {}),
      departmentOrAgency: v.departmentOrAgency, unitPrice: v.unitPrice, quantity: v.quantity,
      totalPrice: round2(v.unitPrice * v.quantity), awardDate: v.awardDate, sourceKind: v.sourceKind,
      ingestedAt: at, lastMatchedAt: null,
    };
  }

  //subjects are live observations or the shared bulk/rejected/evict trails, each capped
  private audit(subjectId: string, step: AuditEntry['step'], details: string, timestamp: string): void {
    this.repository.saveAuditEntry({ subjectId, step, details, timestamp });
    this.repository.pruneAuditTrail(subjectId, this.auditEntriesPerSubject);
  }

  private write<T>(fn: () => T): T {
    try {
      return this.repository.transaction(fn);
    } catch (err) {
      throw this.wrap(err, 'write');
    }
  }

  private read<T>(fn: () => T): T {
    try {
      return this.repository.snapshot(fn);
    } catch (err) {
      throw this.wrap(err, 'read');
    }
  }

  private wrap(err: unknown, op: 'read' | 'write'): RecordStoreError {
    if (err instanceof RecordStoreError) return err;
    return new RecordStoreError('storage_failure', `Price observation ${op} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}
