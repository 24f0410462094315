/**
 * Redaction utilities for logs. Replaces travel details and contact data in strings.
 * Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

const MONTHS =
  /\b(Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|Jun(?:e)?|Jul(?:y)?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)\b/g;

function scrubString(input: string): string {
  let out = input;
  out = out.replace(/[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g, '[REDACTED_EMAIL]');
  // Card-like digit runs, with or without separators
  out = out.replace(/\b(?:\d[ -]?){13,19}\b/g, '[REDACTED_NUMBER]');
  out = out.replace(
    /\b\d{4}-\d{2}(?:-\d{2})?\s*(?:\.\.|to)\s*\d{4}-\d{2}(?:-\d{2})?\b/g,
    '[REDACTED_DATES]',
  );
  out = out.replace(/\b\d{4}-\d{2}-\d{2}\b/g, '[REDACTED_DATE]');
  out = out.replace(MONTHS, '[REDACTED_MONTH]');
  out = out.replace(/\b(in|to|visit)\s+[A-Z][\p{L}'-]+(?:[ ,]+[A-Z][\p{L}'-]+)*/gu, '$1 [REDACTED_PLACE]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Error) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub PII-like patterns from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
