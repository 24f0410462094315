import { z } from 'zod';
import type { BudgetT, DateRangeT, SlotNameT } from './requirements.js';

const looseNumber = z.union([z.number(), z.string()]);

function candidate<T extends z.ZodTypeAny>(value: T) {
  return z
    .object({
      value,
      confidence: z.string().optional(),
      span: z.string().nullable().optional(),
      correction: z.boolean().optional(),
    })
    .nullable()
    .optional();
}

/**
 * Shape the extraction prompt asks the model to return. Values are loose here and
 * normalized afterwards, field by field.
 */
export const RawExtraction = z.object({
  destination: candidate(z.string()),
  date_range: candidate(
    z.object({
      start: z.string(),
      end: z.string().nullable().optional(),
    }),
  ),
  traveler_count: candidate(looseNumber),
  budget: candidate(
    z.object({
      amount: looseNumber,
      currency: z.string().nullable().optional(),
    }),
  ),
  preferences: z.array(z.string()).optional().default([]),
  rejected: z.array(z.string()).optional().default([]),
  clear_preferences: z.boolean().optional().default(false),
});
export type RawExtractionT = z.infer<typeof RawExtraction>;

export type ConfidenceHint = 'TENTATIVE' | 'CONFIRMED';

export interface FieldCandidate<T> {
  value: T;
  confidenceHint: ConfidenceHint;
  sourceSpan: string | null;
  correction: boolean;
}

export interface ExtractedFields {
  destination?: FieldCandidate<string>;
  dateRange?: FieldCandidate<DateRangeT>;
  travelerCount?: FieldCandidate<number>;
  budget?: FieldCandidate<BudgetT>;
}

export interface ExtractionResult {
  fields: ExtractedFields;
  preferences: string[];
  rejected: SlotNameT[];
  clearPreferences: boolean;
}

export type ExtractionFailureKind = 'TIMEOUT' | 'PROVIDER_ERROR' | 'MALFORMED';

export interface ExtractionFailure {
  kind: ExtractionFailureKind;
  message: string;
}

export type ExtractionOutcome =
  | { ok: true; result: ExtractionResult }
  | { ok: false; failure: ExtractionFailure };
