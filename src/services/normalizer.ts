//text canonicalization shared by ingestion and matching
//everything here is pure: same input, same output, on every run and every process
import { readFileSync } from 'fs';
import { z } from 'zod';
import { CATEGORIES, MATCHING_CONFIG, type Category } from '../models/index.js';

const LexiconSchema = z.object({
  stopWords: z.array(z.string()),
  sizeUnits: z.array(z.string().min(1)),
  packWords: z.array(z.string()),
  categoryRules: z.array(z.object({ category: z.enum(CATEGORIES), keywords: z.array(z.string()).min(1) })),
});

const lexicon = LexiconSchema.parse(JSON.parse(readFileSync(new URL('../../data/lexicon.json', import.meta.url), 'utf-8')));

const STOP_WORDS = new Set(lexicon.stopWords);
const PACK_WORDS = new Set(lexicon.packWords);
//longest unit first so "floz" wins over "oz"
const SIZE_PATTERN = new RegExp(`\\b\\d+(?:\\.\\d+)?\\s*(?:${[...lexicon.sizeUnits].sort((a, b) => b.length - a.length).join('|')})\\b`, 'g');

//ordered rules, first match wins
export interface CategoryRule {
  category: Category;
  matches(tokens: ReadonlySet<string>): boolean;
}

export const CATEGORY_RULES: readonly CategoryRule[] = lexicon.categoryRules.map(({ category, keywords }) => ({
  category,
  matches: (tokens: ReadonlySet<string>) => keywords.some(k => tokens.has(k)),
}));

//lower-case, drop sizes, units and punctuation, collapse whitespace
export function normalize(text: string): string {
  if (typeof text !== 'string') return '';
  return text.toLowerCase()
    .replace(/[^a-z0-9.]+/g, ' ')
    .replace(SIZE_PATTERN, ' ')
    .replace(/\./g, ' ')
    .split(' ')
    .filter(w => w && !PACK_WORDS.has(w))
    .join(' ');
}

//item identifiers compare on alphanumerics only ("6500-001-430" == "6500001430")
export function normalizeIdentifier(identifier: string | null | undefined): string {
  return typeof identifier === 'string' ? identifier.toLowerCase().replace(/[^a-z0-9]/g, '') : '';
}

const isMeaningful = (w: string): boolean =>
  !STOP_WORDS.has(w) && w.length >= MATCHING_CONFIG.minTokenLength && !(/^\d+$/.test(w) && w.length < 3);

//non-empty text never yields an empty set: if every word is filtered out the raw words are kept
export function tokenize(normalizedText: string): Set<string> {
  const words = typeof normalizedText === 'string' ? normalizedText.split(/\s+/).filter(Boolean) : [];
  const tokens = new Set(words.filter(isMeaningful));
  return tokens.size > 0 ? tokens : new Set(words);
}

export function classify(tokens: Iterable<string>): Category {
  const set = tokens instanceof Set ? tokens : new Set(tokens);
  return CATEGORY_RULES.find(rule => rule.matches(set))?.category ?? 'general';
}

//|a ∩ b| / |a ∪ b|
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  const shared = sharedTokenCount(a, b);
  return shared / (a.size + b.size - shared);
}

export function sharedTokenCount(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let shared = 0;
  for (const t of a) if (b.has(t)) shared++;
  return shared;
}
