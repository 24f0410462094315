import { z } from 'zod';
import lexiconJson from '../data/lexicon.json';
import type { ConfidenceHint, ExtractedFields, ExtractionResult } from '../schemas/extraction.js';
import type { SlotNameT } from '../schemas/requirements.js';
import { CLEAR_PREFERENCES_CUE, MONTH_PATTERN, REJECT_FIELD_CUE, hasAffirmation, hasCorrectionCue } from './cues.js';
import type { ExtractContext, FieldExtractor } from './extractor.js';
import {
  monthIndex,
  normalizeBudget,
  normalizeDateRange,
  normalizeDestination,
  normalizePreference,
} from './normalize.js';

const Lexicon = z.object({
  destinations: z.array(z.object({ name: z.string().min(1), aliases: z.array(z.string().min(1)) })),
  preferences: z.array(z.object({ label: z.string().min(1), patterns: z.array(z.string().min(1)) })),
  numberWords: z.record(z.number().int().positive()),
});

const lexicon = Lexicon.parse(lexiconJson);

function escapeRe(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const DESTINATIONS = lexicon.destinations.flatMap((d) =>
  d.aliases.map((alias) => ({ name: d.name, re: new RegExp(`\\b${escapeRe(alias)}\\b`, 'i') })),
);

const PREFERENCES = lexicon.preferences.map((p) => ({
  label: p.label,
  re: new RegExp(`\\b(?:${p.patterns.map(escapeRe).join('|')})\\b`, 'i'),
}));

const M = `(${MONTH_PATTERN})`;
const NUM = `(\\d+|${Object.keys(lexicon.numberWords).join('|')})`;
const AMOUNT = '(\\d[\\d,]*(?:\\.\\d+)?)\\s*(k\\b|thousand\\b)?';
const CURRENCY_SYMBOL = '(s\\$|a\\$|c\\$|us\\$|[$€£¥])';
const CURRENCY_WORD =
  '(usd|eur|gbp|jpy|sgd|aud|cad|chf|nzd|hkd|inr|thb|krw|cny|mxn|dollars?|euros?|pounds?|yen|bucks|quid)';
const RANGE_SEP = '\\s*(?:-|–|—|to|until|through|till)\\s*';
const ORD = '(?:st|nd|rd|th)?';

const NEGATED_BEFORE = /\b(?:not|instead of|rather than|from|except)\s+(?:to\s+|in\s+)?$/i;
const DESTINATION_TRIGGER =
  /\b(?:go(?:ing)? to|travel(?:l?ing)? to|fly(?:ing)? to|trip to|head(?:ing)? to|visit(?:ing)?)\s+([A-Z][\p{L}'’-]*(?:\s+(?:[A-Z][\p{L}'’-]*|de|del|da))*)/u;

const ISO_RANGE = /\b(\d{4}-\d{1,2}(?:-\d{1,2})?)\s*(?:to|until|through|till|\.\.)\s*(\d{4}-\d{1,2}(?:-\d{1,2})?)\b/i;
const ISO_SINGLE = /\b(\d{4}-\d{1,2}(?:-\d{1,2})?)\b/;
const MONTH_DAY_RANGE = new RegExp(
  `\\b${M}\\.?\\s+(\\d{1,2})${ORD}${RANGE_SEP}(?:${M}\\.?\\s+)?(\\d{1,2})${ORD}(?:,?\\s+(\\d{4}))?`,
  'i',
);
const MONTH_YEAR_RANGE = new RegExp(`\\b${M}\\s+(\\d{4})${RANGE_SEP}${M}\\s+(\\d{4})\\b`, 'i');
const MONTH_MONTH_YEAR = new RegExp(`\\b${M}${RANGE_SEP}${M}\\s+(\\d{4})\\b`, 'i');
const MONTH_DAY_YEAR = new RegExp(`\\b${M}\\.?\\s+(?:(\\d{1,2})${ORD},?\\s+)?(\\d{4})\\b`, 'i');
const DAY_MONTH_YEAR = new RegExp(`\\b(\\d{1,2})${ORD}\\s+${M}\\.?,?\\s+(\\d{4})\\b`, 'i');
// After "this" or "by", "may" is read as the verb ("this may change").
const BARE_MONTH = new RegExp(
  `(?:\\b(?:in|during|around|early|late|mid-?|next)\\s+${M}\\b)|(?:\\b(?:this|by)\\s+(?!may\\b)${M}\\b)|(?:^\\s*${M}\\.?\\s*$)`,
  'i',
);

const PARTY_MIXED = new RegExp(
  `\\b${NUM}\\s+adults?\\s*(?:and|,|\\+|&)\\s*${NUM}\\s+(?:kids?|children|child|teens?|teenagers?|infants?|bab(?:y|ies))\\b`,
  'i',
);
const PARTY_COUNT = new RegExp(`\\b${NUM}\\s+(?:people|persons?|travell?ers?|adults?|guests?|pax|of us)\\b`, 'i');
const PARTY_OF = new RegExp(`\\b(?:party|group|family)\\s+of\\s+${NUM}\\b`, 'i');
const PARTY_SOLO = /\b(?:solo|alone|by myself|just me|on my own)\b/i;
const PARTY_PAIR =
  /\b(?:as a couple|we're a couple|honeymoon|my (?:partner|wife|husband|girlfriend|boyfriend|spouse) and (?:i|me)|me and my (?:partner|wife|husband|girlfriend|boyfriend|spouse))\b/i;
const BARE_NUMBER = new RegExp(`^\\s*(?:just\\s+|maybe\\s+)?${NUM}\\s*\\.?\\s*$`, 'i');

const BUDGET_SYMBOL = new RegExp(`${CURRENCY_SYMBOL}\\s?${AMOUNT}`, 'i');
const BUDGET_WORD = new RegExp(`\\b${AMOUNT}\\s*${CURRENCY_WORD}\\b`, 'i');
const BUDGET_KEYWORD = new RegExp(`\\bbudget\\b[^\\d$€£¥]{0,20}?${AMOUNT}`, 'i');
const BARE_AMOUNT = new RegExp(`^\\s*(?:about|around|roughly|maybe|up to)?\\s*${AMOUNT}\\s*\\.?\\s*$`, 'i');

function parseCount(raw: string): number | null {
  const lower = raw.toLowerCase();
  const n = /^\d+$/.test(lower) ? Number(lower) : lexicon.numberWords[lower];
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : null;
}

function monthNumber(name: string): number | null {
  const idx = monthIndex(name);
  return idx < 0 ? null : idx + 1;
}

/** Year of the next occurrence of a month (this month counts as upcoming). */
function upcomingYear(month: number, now: Date): number {
  return month - 1 < now.getUTCMonth() ? now.getUTCFullYear() + 1 : now.getUTCFullYear();
}

interface Found<T> {
  value: T;
  span: string;
}

function findDestination(text: string): Found<string> | null {
  const hits: Array<Found<string> & { index: number }> = [];
  for (const entry of DESTINATIONS) {
    const m = entry.re.exec(text);
    if (!m || NEGATED_BEFORE.test(text.slice(0, m.index))) continue;
    hits.push({ value: entry.name, span: m[0], index: m.index });
  }
  if (hits.length > 0) {
    hits.sort((a, b) => b.value.split(',').length - a.value.split(',').length || a.index - b.index);
    return hits[0];
  }

  const m = DESTINATION_TRIGGER.exec(text);
  if (!m) return null;
  const place = normalizeDestination(m[1]);
  if (!place || monthIndex(place) >= 0) return null;
  return { value: place, span: m[1] };
}

function findDateRange(text: string, now: Date): Found<{ start: string; end: string }> | null {
  const range = (start: string, end: string, span: string) => {
    const value = normalizeDateRange({ start, end });
    return value ? { value, span } : null;
  };

  let m = ISO_RANGE.exec(text);
  if (m) return range(m[1], m[2], m[0]);

  m = MONTH_DAY_RANGE.exec(text);
  if (m) {
    const startMonth = monthNumber(m[1]);
    const endMonth = m[3] ? monthNumber(m[3]) : startMonth;
    if (startMonth && endMonth) {
      const year = m[5] ? Number(m[5]) : upcomingYear(startMonth, now);
      const endYear = endMonth < startMonth ? year + 1 : year;
      return range(`${year}-${startMonth}-${m[2]}`, `${endYear}-${endMonth}-${m[4]}`, m[0]);
    }
  }

  m = MONTH_YEAR_RANGE.exec(text);
  if (m) {
    const a = monthNumber(m[1]);
    const b = monthNumber(m[3]);
    if (a && b) return range(`${m[2]}-${a}`, `${m[4]}-${b}`, m[0]);
  }

  m = MONTH_MONTH_YEAR.exec(text);
  if (m) {
    const a = monthNumber(m[1]);
    const b = monthNumber(m[2]);
    if (a && b) return range(`${m[3]}-${a}`, `${m[3]}-${b}`, m[0]);
  }

  m = DAY_MONTH_YEAR.exec(text);
  if (m) {
    const month = monthNumber(m[2]);
    if (month) {
      const date = `${m[3]}-${month}-${m[1]}`;
      return range(date, date, m[0]);
    }
  }

  m = MONTH_DAY_YEAR.exec(text);
  if (m) {
    const month = monthNumber(m[1]);
    if (month) {
      const date = m[2] ? `${m[3]}-${month}-${m[2]}` : `${m[3]}-${month}`;
      return range(date, date, m[0]);
    }
  }

  m = ISO_SINGLE.exec(text);
  if (m) return range(m[1], m[1], m[0]);

  m = BARE_MONTH.exec(text);
  if (m) {
    const month = monthNumber(m[1] ?? m[2] ?? m[3]);
    if (month) {
      const date = `${upcomingYear(month, now)}-${month}`;
      return range(date, date, m[0].trim());
    }
  }
  return null;
}

function findTravelerCount(text: string, ctx: ExtractContext): Found<number> | null {
  let m = PARTY_MIXED.exec(text);
  if (m) {
    const adults = parseCount(m[1]);
    const kids = parseCount(m[2]);
    if (adults && kids) return { value: adults + kids, span: m[0] };
  }
  for (const re of [PARTY_COUNT, PARTY_OF]) {
    m = re.exec(text);
    const n = m ? parseCount(m[1]) : null;
    if (m && n) return { value: n, span: m[0] };
  }
  m = PARTY_SOLO.exec(text);
  if (m) return { value: 1, span: m[0] };
  m = PARTY_PAIR.exec(text);
  if (m) return { value: 2, span: m[0] };

  if (ctx.pendingQuestion?.field === 'travelerCount') {
    m = BARE_NUMBER.exec(text);
    const n = m ? parseCount(m[1]) : null;
    if (m && n) return { value: n, span: m[0].trim() };
  }
  return null;
}

function findBudget(
  text: string,
  ctx: ExtractContext,
  defaultCurrency: string,
): Found<{ amount: number; currency: string }> | null {
  const budget = (amount: string, unit: string | undefined, currency: string | null, span: string) => {
    const value = normalizeBudget({ amount: `${amount}${unit ?? ''}`, currency }, defaultCurrency);
    return value ? { value, span } : null;
  };

  let m = BUDGET_SYMBOL.exec(text);
  if (m) return budget(m[2], m[3], m[1], m[0]);
  m = BUDGET_WORD.exec(text);
  if (m) return budget(m[1], m[2], m[3], m[0]);
  m = BUDGET_KEYWORD.exec(text);
  if (m) return budget(m[1], m[2], null, m[0]);
  if (ctx.pendingQuestion?.field === 'budget') {
    m = BARE_AMOUNT.exec(text);
    if (m) return budget(m[1], m[2], null, m[0].trim());
  }
  return null;
}

function findRejected(text: string): SlotNameT[] {
  const m = REJECT_FIELD_CUE.exec(text);
  if (!m) return [];
  const word = m[1].toLowerCase();
  if (word === 'destination') return ['destination'];
  if (word.startsWith('date')) return ['dateRange'];
  if (word === 'budget') return ['budget'];
  return ['travelerCount'];
}

export interface HeuristicExtractorOptions {
  defaultCurrency: string;
  now?: () => Date;
}

/**
 * Rule-based extractor: gazetteer and preference lexicon from `data/lexicon.json`,
 * date, party-size and budget patterns. Used when no LLM provider is configured.
 */
export function extractHeuristically(
  text: string,
  ctx: ExtractContext,
  opts: HeuristicExtractorOptions,
): ExtractionResult {
  const now = opts.now ? opts.now() : new Date();
  const confidenceHint: ConfidenceHint = hasAffirmation(text) ? 'CONFIRMED' : 'TENTATIVE';
  const correction = hasCorrectionCue(text);
  const candidate = <T>(found: Found<T> | null) =>
    found ? { value: found.value, confidenceHint, sourceSpan: found.span, correction } : undefined;

  const fields: ExtractedFields = {};
  const destination = candidate(findDestination(text));
  if (destination) fields.destination = destination;
  const dateRange = candidate(findDateRange(text, now));
  if (dateRange) fields.dateRange = dateRange;
  const travelerCount = candidate(findTravelerCount(text, ctx));
  if (travelerCount) fields.travelerCount = travelerCount;
  const budget = candidate(findBudget(text, ctx, opts.defaultCurrency));
  if (budget) fields.budget = budget;

  const preferences = PREFERENCES.filter((p) => p.re.test(text))
    .map((p) => normalizePreference(p.label))
    .filter((p): p is string => p !== null);

  return {
    fields,
    preferences,
    rejected: findRejected(text),
    clearPreferences: CLEAR_PREFERENCES_CUE.test(text),
  };
}

export function createHeuristicExtractor(opts: HeuristicExtractorOptions): FieldExtractor {
  return {
    kind: 'heuristic',
    async extract(text, _requirements, ctx = {}) {
      return { ok: true, result: extractHeuristically(text, ctx, opts) };
    },
  };
}

export function mentionsKnownDestination(text: string): boolean {
  return DESTINATIONS.some((d) => d.re.test(text));
}
