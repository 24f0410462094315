import type { BudgetT, DateRangeT } from '../schemas/requirements.js';

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const DAY_MS = 86_400_000;

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

// ---------------------------------------------------------------------------
// Destination

export function normalizeDestination(raw: string): string | null {
  const cleaned = collapse(raw)
    .replace(/^[\s"'.,;:!?-]+|[\s"'.,;:!?-]+$/g, '')
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean)
    .join(', ');
  return cleaned.length > 0 ? cleaned : null;
}

function destinationParts(dest: string): string[] {
  return dest
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .split(',')
    .map((p) => collapse(p))
    .filter(Boolean);
}

/** "Tokyo, Japan" and "japan" are compatible; "Kyoto" and "Tokyo" are not. */
export function destinationsCompatible(a: string, b: string): boolean {
  const pa = destinationParts(a);
  const pb = destinationParts(b);
  const [small, large] = pa.length <= pb.length ? [pa, pb] : [pb, pa];
  return small.every((p) => large.includes(p));
}

export function destinationsEqual(a: string, b: string): boolean {
  const pa = destinationParts(a);
  const pb = destinationParts(b);
  return pa.length === pb.length && pa.every((p) => pb.includes(p));
}

export function refineDestination(current: string, incoming: string): string {
  return destinationParts(incoming).length > destinationParts(current).length ? incoming : current;
}

// ---------------------------------------------------------------------------
// Dates

export function monthIndex(name: string): number {
  const lower = name.toLowerCase();
  if (lower.length < 3) return -1;
  return MONTH_NAMES.findIndex((m) => m.toLowerCase().startsWith(lower));
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function buildPartial(year: number, month?: number, day?: number): string | null {
  if (year < 1900 || year > 2200) return null;
  if (month === undefined) return String(year);
  if (month < 1 || month > 12) return null;
  if (day === undefined) return `${year}-${pad(month)}`;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Accepts `YYYY`, `YYYY-MM`, `YYYY-MM-DD` (single-digit parts allowed), `April 2026`,
 * `April 10, 2026` and `10 April 2026`. Returns the canonical partial ISO form.
 */
export function parsePartialDate(raw: string): string | null {
  const s = collapse(raw).replace(/(\d)(?:st|nd|rd|th)\b/gi, '$1');

  const iso = s.match(/^(\d{4})(?:-(\d{1,2})(?:-(\d{1,2}))?)?$/);
  if (iso) {
    return buildPartial(
      Number(iso[1]),
      iso[2] === undefined ? undefined : Number(iso[2]),
      iso[3] === undefined ? undefined : Number(iso[3]),
    );
  }

  const monthFirst = s.match(/^([A-Za-z]+)\.?\s+(?:(\d{1,2}),?\s+)?(\d{4})$/);
  if (monthFirst) {
    const m = monthIndex(monthFirst[1]);
    if (m < 0) return null;
    return buildPartial(Number(monthFirst[3]), m + 1, monthFirst[2] === undefined ? undefined : Number(monthFirst[2]));
  }

  const dayFirst = s.match(/^(\d{1,2})\s+([A-Za-z]+)\.?,?\s+(\d{4})$/);
  if (dayFirst) {
    const m = monthIndex(dayFirst[2]);
    if (m < 0) return null;
    return buildPartial(Number(dayFirst[3]), m + 1, Number(dayFirst[1]));
  }

  return null;
}

/** First and last day (as UTC day numbers) covered by a partial date. */
export function partialDateBounds(partial: string): [number, number] {
  const parts = partial.split('-').map(Number);
  const [y, m, d] = parts;
  if (parts.length === 1) {
    return [Date.UTC(y, 0, 1) / DAY_MS, Date.UTC(y, 11, 31) / DAY_MS];
  }
  if (parts.length === 2) {
    return [Date.UTC(y, m - 1, 1) / DAY_MS, Date.UTC(y, m, 0) / DAY_MS];
  }
  const day = Date.UTC(y, m - 1, d) / DAY_MS;
  return [day, day];
}

function rangeBounds(range: DateRangeT): [number, number] {
  return [partialDateBounds(range.start)[0], partialDateBounds(range.end)[1]];
}

export function normalizeDateRange(raw: { start: string; end?: string | null }): DateRangeT | null {
  const start = parsePartialDate(raw.start);
  if (!start) return null;
  const end = raw.end ? parsePartialDate(raw.end) : start;
  if (!end) return null;
  if (partialDateBounds(end)[0] < partialDateBounds(start)[0]) return null;
  return { start, end };
}

/** Compatible when one range contains the other. */
export function dateRangesCompatible(a: DateRangeT, b: DateRangeT): boolean {
  const [as, ae] = rangeBounds(a);
  const [bs, be] = rangeBounds(b);
  return (as <= bs && be <= ae) || (bs <= as && ae <= be);
}

export function refineDateRange(current: DateRangeT, incoming: DateRangeT): DateRangeT {
  const [cs, ce] = rangeBounds(current);
  const [is, ie] = rangeBounds(incoming);
  return ie - is < ce - cs ? incoming : current;
}

export function formatPartialDate(partial: string): string {
  const parts = partial.split('-').map(Number);
  const [y, m, d] = parts;
  if (parts.length === 1) return String(y);
  if (parts.length === 2) return `${MONTH_NAMES[m - 1]} ${y}`;
  return `${MONTH_NAMES[m - 1]} ${d}, ${y}`;
}

export function formatDateRange(range: DateRangeT): string {
  if (range.start === range.end) return formatPartialDate(range.start);
  return `${formatPartialDate(range.start)} to ${formatPartialDate(range.end)}`;
}

// ---------------------------------------------------------------------------
// Travelers

export function normalizeTravelerCount(raw: number | string): number | null {
  const n = typeof raw === 'number' ? raw : Number(collapse(raw));
  return Number.isInteger(n) && n > 0 ? n : null;
}

// ---------------------------------------------------------------------------
// Budget

const CURRENCY_ALIASES: Record<string, string> = {
  $: 'USD',
  'us$': 'USD',
  'usd': 'USD',
  dollar: 'USD',
  dollars: 'USD',
  bucks: 'USD',
  '€': 'EUR',
  euro: 'EUR',
  euros: 'EUR',
  '£': 'GBP',
  pound: 'GBP',
  pounds: 'GBP',
  quid: 'GBP',
  '¥': 'JPY',
  yen: 'JPY',
  's$': 'SGD',
  'a$': 'AUD',
  'c$': 'CAD',
};

export function normalizeCurrency(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const key = collapse(raw).toLowerCase();
  const alias = CURRENCY_ALIASES[key];
  if (alias) return alias;
  return /^[a-z]{3}$/.test(key) ? key.toUpperCase() : null;
}

const CURRENCY_IN_TEXT = /(s\$|a\$|c\$|us\$|[$€£¥])|\b(usd|eur|gbp|jpy|sgd|aud|cad|chf|nzd|hkd|inr|thb|krw|cny|mxn|dollars?|euros?|pounds?|yen|bucks|quid)\b/i;

/** Parses "3000", "3,000", "3.5k", "$3000" into a number. */
export function parseAmount(raw: number | string): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) && raw > 0 ? raw : null;
  const m = raw.replace(/,/g, '').match(/(\d+(?:\.\d+)?)\s*(k\b|thousand\b)?/i);
  if (!m) return null;
  const n = Number(m[1]) * (m[2] ? 1000 : 1);
  return Number.isFinite(n) && n > 0 ? n : null;
}

export function normalizeBudget(
  raw: { amount: number | string; currency?: string | null },
  defaultCurrency: string,
): BudgetT | null {
  const amount = parseAmount(raw.amount);
  if (amount === null) return null;
  let currency = normalizeCurrency(raw.currency);
  if (!currency && typeof raw.amount === 'string') {
    const m = raw.amount.match(CURRENCY_IN_TEXT);
    if (m) currency = normalizeCurrency(m[1] ?? m[2]);
  }
  return { amount: Math.round(amount * 100) / 100, currency: currency ?? defaultCurrency };
}

export function budgetsEqual(a: BudgetT, b: BudgetT): boolean {
  return a.currency === b.currency && Math.abs(a.amount - b.amount) < 0.01;
}

const amountFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

export function formatBudget(budget: BudgetT): string {
  return `${amountFormat.format(budget.amount)} ${budget.currency}`;
}

// ---------------------------------------------------------------------------
// Preferences

export function normalizePreference(raw: string): string | null {
  const p = collapse(raw).toLowerCase().replace(/[.!?]+$/, '');
  return p.length > 0 ? p : null;
}
