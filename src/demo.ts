#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync, existsSync, unlinkSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { initializeDatabase, closeDatabase } from './repository/database.js';
import { ObservationRepository } from './repository/observation-repository.js';
import { RecordStore } from './services/record-store.js';
import { MatchingEngine } from './services/matching.js';
import { PricingOracle } from './services/oracle.js';
import { QuoteProcessor, type QuoteLine } from './services/processor.js';
import { ObservationInputSchema } from './services/validation.js';
import { loadEnvConfig } from './config.js';
import type { Grade, PricingRecommendation } from './models/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

//parse CLI flags
const args = process.argv.slice(2);
const [useFresh, useMemory] = [['--fresh', '-f'], ['--memory', '-m']].map(f => f.some(x => args.includes(x)));

//ANSI color helpers
const c = { reset: '\x1b[0m', bright: '\x1b[1m', dim: '\x1b[2m', green: '\x1b[32m', yellow: '\x1b[33m', blue: '\x1b[34m', magenta: '\x1b[35m', cyan: '\x1b[36m', red: '\x1b[31m' };

//logging helpers
const log = console.log, gradeColor = (g: Grade) => g === 'A' ? c.green : g === 'B' ? c.yellow : c.red;
const money = (n: number) => `$${n.toFixed(2)}`;

//pretty headers
const header = (t: string) => log(`\n${c.bright}${c.cyan}${'='.repeat(70)}\n ${t}\n${'='.repeat(70)}${c.reset}`);
const subHeader = (t: string) => log(`\n${c.bright}${c.blue}${'-'.repeat(50)}\n ${t}\n${'-'.repeat(50)}${c.reset}`);

const loadObservations = () => z.array(ObservationInputSchema).parse(JSON.parse(readFileSync(join(__dirname, '..', 'test', 'fixtures', 'observations.json'), 'utf-8')));

const printRecommendation = (rec: PricingRecommendation) => {
  if (rec.status !== 'priced') { log(`${c.red}Insufficient data: ${rec.reasoning}${c.reset}`); return; }
  for (const tier of ['aggressive', 'recommended', 'safe'] as const) {
    const t = rec[tier];
    log(`  ${tier.padEnd(12)} ${c.bright}${money(t.price)}${c.reset}  margin=${t.marginPercent === null ? 'n/a' : `${t.marginPercent.toFixed(1)}%`}  win=${(t.winProbabilityEstimate * 100).toFixed(1)}%`);
  }
  if (rec.flags.length) log(`${c.magenta}  flags: ${rec.flags.join(', ')}${c.reset}`);
  log(`${c.dim}  ${rec.reasoning}${c.reset}`);
};

//Demo 1: ingestion
const demoIngest = (store: RecordStore) => {
  header('Demo 1: Bulk Ingestion');
  const first = store.ingestBulk(loadObservations());
  log(`${c.green}Stored ${first.storedCount}${c.reset}, skipped ${first.skippedCount}`);
  const again = store.ingestBulk(loadObservations());
  log(`${c.yellow}Re-ingest: stored ${again.storedCount}, skipped ${again.skippedCount} (idempotent)${c.reset}`);
  const rejected = store.ingest({ sourceIdentifier: 'PO-DEMO-0', itemIdentifier: 'ZERO-1', description: 'Parsing artifact', unitPrice: 0, awardDate: '2026-01-01' });
  log(`${c.red}Zero price: stored=${rejected.stored} reason=${rejected.reason}${c.reset}`);

  const stats = store.stats();
  log(`${c.cyan}Records: ${stats.recordCount} | ${Object.entries(stats.categoryBreakdown).map(([k, v]) => `${k}=${v}`).join(' ')} | ${stats.dateRange?.earliest ?? '-'} → ${stats.dateRange?.latest ?? '-'}${c.reset}`);
  const health = store.healthCheck();
  log(`${health.status === 'healthy' ? c.green : c.red}Health: ${health.status}${c.reset} ${health.issues.join('; ')}`);
};

//Demo 2: matching
const demoMatching = (engine: MatchingEngine) => {
  header('Demo 2: Matching');
  for (const [description, item] of [['x restraint package', '6500-001-430'], ['Nitrile Exam Gloves Large', undefined]] as const) {
    subHeader(`findSimilar("${description}"${item ? `, "${item}"` : ''})`);
    const matches = engine.findSimilar(description, item);
    if (!matches.length) log(`${c.yellow}No history${c.reset}`);
    matches.forEach((m, i) => log(`  ${i + 1}. ${money(m.observation.unitPrice)} ${m.observation.awardDate} ${m.tier} conf=${m.confidence.toFixed(3)} (${m.observation.departmentOrAgency})`));
    const summary = engine.priceSummary(description, item);
    log(`${c.dim}  median=${summary.medianPrice ?? '-'} recent=${summary.recentAverage ?? '-'} trend=${summary.trend}${c.reset}`);
  }
};

//Demo 3: recommendations
const demoOracle = (engine: MatchingEngine, oracle: PricingOracle) => {
  header('Demo 3: Pricing Oracle');
  const matches = engine.findSimilar('X-Restraint Package', '6500-001-430');
  for (const urgency of ['low', 'normal', 'high'] as const) {
    subHeader(`Cost $900, urgency ${urgency}`);
    printRecommendation(oracle.recommend(900, matches, 'Dept of State Hospitals', 'medical', urgency));
  }
  subHeader('No cost, no history');
  printRecommendation(oracle.recommend(null, [], 'Dept of State Hospitals', 'general'));
};

//Demo 4: quote pipeline
const demoQuote = (processor: QuoteProcessor) => {
  header('Demo 4: Quote Grading');
  const lines: QuoteLine[] = [
    { description: 'X-Restraint Package', itemIdentifier: '6500-001-430', supplierCost: 900, marketPrice: 1250, quantity: 2 },
    { description: 'Black Toner Cartridge High Yield', itemIdentifier: 'TN-8821', supplierCost: 52, quantity: 6 },
    { description: 'Hand-forged titanium sculpture' },
  ];
  const result = processor.priceQuote(lines, 'Dept of State Hospitals');
  result.lines.forEach(l => log(`  ${gradeColor(l.confidence.grade)}${l.confidence.grade}${c.reset} ${l.line.description} → ${l.recommendation.status === 'priced' ? money(l.recommendation.recommended.price) : 'manual'} (${l.confidence.notes[0] ?? ''})`));
  const s = result.summary;
  log(`${c.cyan}Totals: recommended=${money(s.totalRecommended)} aggressive=${money(s.totalAggressive)} safe=${money(s.totalSafe)} | priced ${s.priced}/${s.totalItems}${c.reset}`);
  log(`Quote grade: ${gradeColor(result.confidence.grade)}${result.confidence.grade}${c.reset} ${JSON.stringify(result.confidence.gradeDistribution)}`);
  log(`${result.autoGenerateAllowed ? c.green : c.yellow}${result.confidence.recommendation}${c.reset}`);
};

//entry point
function main() {
  log(`${c.bright}${c.cyan}\n${'='.repeat(70)}\n  PRICING KNOWLEDGE BASE - DEMO\n${'='.repeat(70)}${c.reset}`);
  const config = loadEnvConfig();
  const dbPath = useMemory ? ':memory:' : config.dbPath;
  if (useFresh && !useMemory) {
    for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) if (existsSync(file)) unlinkSync(file);
    log(`${c.yellow}Cleared database${c.reset}`);
  }
  if (!useMemory) mkdirSync(dirname(dbPath), { recursive: true });

  const db = initializeDatabase(dbPath);
  const store = new RecordStore(new ObservationRepository(db), { maxRecords: config.maxRecords, auditEntriesPerSubject: config.auditEntriesPerSubject });
  log(`${c.dim}Usage: npm run demo [--fresh|-f] [--memory|-m]  (db: ${dbPath}, capacity: ${config.maxRecords})${c.reset}\n`);
  try {
    demoIngest(store);
    const engine = new MatchingEngine(store);
    demoMatching(engine);
    demoOracle(engine, new PricingOracle());
    demoQuote(new QuoteProcessor(store));
    header('Demo Complete');
  } finally { closeDatabase(db); }
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
