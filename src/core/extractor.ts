import type { Dispatcher } from 'undici';
import type { ProvidersConfig } from '../config/providers.js';
import {
  RawExtraction,
  type ConfidenceHint,
  type ExtractedFields,
  type ExtractionFailure,
  type ExtractionOutcome,
  type ExtractionResult,
  type FieldCandidate,
  type RawExtractionT,
} from '../schemas/extraction.js';
import type { PendingQuestionT, SlotNameT, TravelRequirementsT } from '../schemas/requirements.js';
import type { Logger } from '../util/logging.js';
import { withResilience } from '../util/resilience.js';
import { hasCorrectionCue } from './cues.js';
import { ExtractionError, MalformedResponseError, isTimeoutError, toStdError } from './errors.js';
import { createHeuristicExtractor } from './heuristic_extractor.js';
import { createLlmClient, safeExtractJson, type LlmClient } from './llm.js';
import {
  normalizeBudget,
  normalizeDateRange,
  normalizeDestination,
  normalizePreference,
  normalizeTravelerCount,
} from './normalize.js';
import { fillPrompt, getPrompt } from './prompts.js';

export interface ExtractContext {
  pendingQuestion?: PendingQuestionT | null;
}

export interface FieldExtractor {
  readonly kind: 'llm' | 'heuristic';
  /** Never rejects; provider trouble comes back as `{ ok: false }`. */
  extract(text: string, requirements: TravelRequirementsT, ctx?: ExtractContext): Promise<ExtractionOutcome>;
}

const REJECTED_ALIASES = new Map<string, SlotNameT>([
  ['destination', 'destination'],
  ['date_range', 'dateRange'],
  ['dateRange', 'dateRange'],
  ['dates', 'dateRange'],
  ['traveler_count', 'travelerCount'],
  ['travelerCount', 'travelerCount'],
  ['travelers', 'travelerCount'],
  ['budget', 'budget'],
]);

type RawCandidate<V> = { value: V; confidence?: string; span?: string | null; correction?: boolean } | null | undefined;

function toCandidate<V, T>(
  raw: RawCandidate<V>,
  normalize: (value: V) => T | null,
  textIsCorrection: boolean,
): FieldCandidate<T> | undefined {
  if (!raw) return undefined;
  const value = normalize(raw.value);
  if (value === null) return undefined;
  const confidenceHint: ConfidenceHint = raw.confidence?.toLowerCase() === 'confirmed' ? 'CONFIRMED' : 'TENTATIVE';
  return {
    value,
    confidenceHint,
    sourceSpan: raw.span ?? null,
    correction: raw.correction === true || textIsCorrection,
  };
}

/** Turns a validated model answer into normalized candidates. Unusable values are dropped per field. */
export function normalizeRawExtraction(raw: RawExtractionT, text: string, defaultCurrency: string): ExtractionResult {
  const correction = hasCorrectionCue(text);
  const fields: ExtractedFields = {};

  const destination = toCandidate(raw.destination, normalizeDestination, correction);
  if (destination) fields.destination = destination;
  const dateRange = toCandidate(raw.date_range, normalizeDateRange, correction);
  if (dateRange) fields.dateRange = dateRange;
  const travelerCount = toCandidate(raw.traveler_count, normalizeTravelerCount, correction);
  if (travelerCount) fields.travelerCount = travelerCount;
  const budget = toCandidate(raw.budget, (v) => normalizeBudget(v, defaultCurrency), correction);
  if (budget) fields.budget = budget;

  const preferences = raw.preferences
    .map(normalizePreference)
    .filter((p): p is string => p !== null);
  const rejected = [...new Set(raw.rejected.map((r) => REJECTED_ALIASES.get(r)).filter((r): r is SlotNameT => r !== undefined))];

  return { fields, preferences, rejected, clearPreferences: raw.clear_preferences };
}

function describePending(q: PendingQuestionT | null | undefined): string {
  if (!q) return 'none';
  return q.kind === 'ASK' ? `asked for ${q.field}` : `asked the user to confirm ${q.field}`;
}

function toFailure(err: unknown): ExtractionFailure {
  if (err instanceof ExtractionError) return { kind: err.kind, message: err.message };
  if (isTimeoutError(err)) return { kind: 'TIMEOUT', message: 'extraction timed out' };
  if (err instanceof MalformedResponseError) return { kind: 'MALFORMED', message: err.message };
  return { kind: 'PROVIDER_ERROR', message: toStdError(err).message };
}

export interface LlmExtractorOptions {
  llm: LlmClient;
  defaultCurrency: string;
  timeoutMs?: number;
  log?: Logger;
  now?: () => Date;
}

export function createLlmExtractor(opts: LlmExtractorOptions): FieldExtractor {
  return {
    kind: 'llm',
    async extract(text, requirements, ctx = {}) {
      try {
        const template = await getPrompt('extract_requirements');
        const prompt = fillPrompt(template, {
          today: (opts.now ? opts.now() : new Date()).toISOString().slice(0, 10),
          default_currency: opts.defaultCurrency,
          requirements: JSON.stringify(requirements),
          pending_question: describePending(ctx.pendingQuestion),
          text,
        });

        const response = await withResilience(
          'extractor',
          (signal) => opts.llm.complete(prompt, { responseFormat: 'json', signal }),
          { timeoutMs: opts.timeoutMs },
        );

        const json = safeExtractJson(response);
        if (json === undefined) throw new ExtractionError('MALFORMED', 'no JSON object in extractor response');
        const parsed = RawExtraction.safeParse(json);
        if (!parsed.success) {
          throw new ExtractionError('MALFORMED', `extractor response failed validation: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }
        return { ok: true, result: normalizeRawExtraction(parsed.data, text, opts.defaultCurrency) };
      } catch (err) {
        const failure = toFailure(err);
        opts.log?.warn({ kind: failure.kind, err: toStdError(err, 'extractor') }, 'extraction_failed');
        return { ok: false, failure };
      }
    },
  };
}

export function createFieldExtractor(
  cfg: ProvidersConfig,
  deps: { log?: Logger; dispatcher?: Dispatcher; now?: () => Date } = {},
): FieldExtractor {
  if (cfg.extractor.kind === 'llm') {
    return createLlmExtractor({
      llm: createLlmClient({ ...cfg.llm, dispatcher: deps.dispatcher }),
      defaultCurrency: cfg.defaultCurrency,
      timeoutMs: cfg.extractor.timeoutMs,
      log: deps.log,
      now: deps.now,
    });
  }
  return createHeuristicExtractor({ defaultCurrency: cfg.defaultCurrency, now: deps.now });
}
