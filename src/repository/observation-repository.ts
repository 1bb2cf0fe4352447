//persistence layer for price observations using SQLite
//it answers: how does observed pricing survive process restarts and stay auditable?
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { PriceObservation, AuditEntry, Category, SourceKind, PricePoint } from '../models/index.js';

//audit entries are linked to the observation (or batch) they describe
export interface StoredAuditEntry extends AuditEntry { subjectId: string; }

export interface ObservationAggregates {
  categories: { category: Category; count: number }[];
  departments: { name: string; count: number }[];
  suppliers: { name: string; count: number }[];
  earliest: string | null;
  latest: string | null;
  averageUnitPrice: number | null;
  totalValue: number;
}

export interface IObservationRepository {
  //writes run inside one IMMEDIATE transaction: all or nothing, one writer at a time
  transaction<T>(fn: () => T): T;
  //reads run inside one DEFERRED transaction: one consistent snapshot
  snapshot<T>(fn: () => T): T;
  insert(observation: PriceObservation, itemKey: string): boolean;
  findById(id: string): PriceObservation | undefined;
  findAll(): PriceObservation[];
  findPriceHistory(by: 'category' | 'item_key', value: string): PricePoint[];
  count(): number;
  evictionOrder(): string[];
  deleteMany(ids: readonly string[]): number;
  touch(ids: readonly string[], at: string): void;
  aggregates(): ObservationAggregates;
  saveAuditEntry(entry: StoredAuditEntry): void;
  pruneAuditTrail(subjectId: string, keep: number): number;
  getAuditTrail(subjectId: string): AuditEntry[];
}

export class ObservationRepository implements IObservationRepository {
  constructor(private db: Database.Database) {}

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  snapshot<T>(fn: () => T): T {
    return this.db.transaction(fn).deferred();
  }

  //INSERT OR IGNORE keeps re-ingestion a no-op; changes tells us whether the row is new
  insert(o: PriceObservation, itemKey: string): boolean {
    const info = this.db.prepare(`INSERT OR IGNORE INTO observations (id, source_identifier, item_identifier, item_key, raw_description, normalized_description, tokens, category, supplier_name, department_or_agency, unit_price, quantity, total_price, award_date, source_kind, ingested_at, last_matched_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(o.id, o.sourceIdentifier, o.itemIdentifier, itemKey, o.rawDescription, o.normalizedDescription, JSON.stringify([...o.tokens].sort()), o.category, o.supplierName ?? null, o.departmentOrAgency, o.unitPrice, o.quantity, o.totalPrice, o.awardDate, o.sourceKind, o.ingestedAt, o.lastMatchedAt);
    return info.changes === 1;
  }

  findById(id: string): PriceObservation | undefined {
    const row = this.db.prepare(`SELECT * FROM observations WHERE id = ?`).get(id) as ObservationRow | undefined;
    return row ? this.toObservation(row) : undefined;
  }

  //insertion order is the tie-breaker of last resort for matching
  findAll(): PriceObservation[] {
    return (this.db.prepare(`SELECT * FROM observations ORDER BY rowid ASC`).all() as ObservationRow[]).map(this.toObservation);
  }

  findPriceHistory(by: 'category' | 'item_key', value: string): PricePoint[] {
    const column = by === 'category' ? 'category' : 'item_key';
    return (this.db.prepare(`SELECT unit_price, award_date FROM observations WHERE ${column} = ? ORDER BY award_date ASC, rowid ASC`).all(value) as PricePointRow[])
      .map(r => ({ price: r.unit_price, date: r.award_date }));
  }

  count(): number {
    return (this.db.prepare(`SELECT COUNT(*) AS n FROM observations`).get() as { n: number }).n;
  }

  //least recently matched first; never-matched records fall back to their ingestion time
  evictionOrder(): string[] {
    return (this.db.prepare(`SELECT id FROM observations ORDER BY COALESCE(last_matched_at, ingested_at) ASC, rowid ASC`).all() as { id: string }[]).map(r => r.id);
  }

  //an observation's audit rows go with it
  deleteMany(ids: readonly string[]): number {
    const stmt = this.db.prepare(`DELETE FROM observations WHERE id = ?`);
    const trail = this.db.prepare(`DELETE FROM audit_trail WHERE subject_id = ?`);
    return ids.reduce((n, id) => {
      trail.run(id);
      return n + stmt.run(id).changes;
    }, 0);
  }

  touch(ids: readonly string[], at: string): void {
    const stmt = this.db.prepare(`UPDATE observations SET last_matched_at = ? WHERE id = ?`);
    for (const id of ids) stmt.run(at, id);
  }

  aggregates(): ObservationAggregates {
    const categories = this.db.prepare(`SELECT category, COUNT(*) AS count FROM observations GROUP BY category ORDER BY category`).all() as { category: Category; count: number }[];
    const departments = this.db.prepare(`SELECT department_or_agency AS name, COUNT(*) AS count FROM observations WHERE department_or_agency != '' GROUP BY department_or_agency ORDER BY count DESC, name ASC LIMIT 10`).all() as { name: string; count: number }[];
    const suppliers = this.db.prepare(`SELECT supplier_name AS name, COUNT(*) AS count FROM observations WHERE supplier_name IS NOT NULL AND supplier_name != '' GROUP BY supplier_name ORDER BY count DESC, name ASC LIMIT 10`).all() as { name: string; count: number }[];
    const totals = this.db.prepare(`SELECT MIN(award_date) AS earliest, MAX(award_date) AS latest, AVG(unit_price) AS avg_price, COALESCE(SUM(total_price), 0) AS total_value FROM observations`).get() as TotalsRow;
    return { categories, departments, suppliers, earliest: totals.earliest, latest: totals.latest, averageUnitPrice: totals.avg_price, totalValue: totals.total_value };
  }

  //audit Trail
  saveAuditEntry(entry: StoredAuditEntry): void {
    this.db.prepare(`INSERT INTO audit_trail (id, subject_id, step, timestamp, details) VALUES (?, ?, ?, ?, ?)`).run(uuidv4(), entry.subjectId, entry.step, entry.timestamp, entry.details);
  }

  //keeps the newest rows of one subject
  pruneAuditTrail(subjectId: string, keep: number): number {
    return this.db.prepare(`DELETE FROM audit_trail WHERE subject_id = ? AND rowid NOT IN (SELECT rowid FROM audit_trail WHERE subject_id = ? ORDER BY rowid DESC LIMIT ?)`)
      .run(subjectId, subjectId, keep).changes;
  }

  getAuditTrail(subjectId: string): AuditEntry[] {
    return (this.db.prepare(`SELECT step, timestamp, details FROM audit_trail WHERE subject_id = ? ORDER BY timestamp ASC, rowid ASC`).all(subjectId) as AuditEntryRow[])
      .map(r => ({ step: r.step, timestamp: r.timestamp, details: r.details }));
  }

  private toObservation(r: ObservationRow): PriceObservation {
    return {
      id: r.id, sourceIdentifier: r.source_identifier, itemIdentifier: r.item_identifier, rawDescription: r.raw_description,
      normalizedDescription: r.normalized_description, tokens: new Set(JSON.parse(r.tokens) as string[]), category: r.category,
      ...(r.supplier_name !== null && { supplierName: r.supplier_name }), departmentOrAgency: r.department_or_agency,
      unitPrice: r.unit_price, quantity: r.quantity, totalPrice: r.total_price, awardDate: r.award_date,
      sourceKind: r.source_kind, ingestedAt: r.ingested_at, lastMatchedAt: r.last_matched_at,
    };
  }
}

//row types (DB → App mapping)
interface ObservationRow { id: string; source_identifier: string; item_identifier: string; item_key: string; raw_description: string; normalized_description: string; tokens: string; category: Category; supplier_name: string | null; department_or_agency: string; unit_price: number; quantity: number; total_price: number; award_date: string; source_kind: SourceKind; ingested_at: string; last_matched_at: string | null; }
interface PricePointRow { unit_price: number; award_date: string; }
interface TotalsRow { earliest: string | null; latest: string | null; avg_price: number | null; total_value: number; }
interface AuditEntryRow { step: AuditEntry['step']; timestamp: string; details: string; }
