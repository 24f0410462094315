import { z } from 'zod';

/** Slot order doubles as the fixed next-question priority. */
export const SLOT_ORDER = ['destination', 'dateRange', 'travelerCount', 'budget'] as const;

export const SlotName = z.enum(SLOT_ORDER);
export type SlotNameT = z.infer<typeof SlotName>;

export const Confidence = z.enum(['UNSET', 'TENTATIVE', 'CONFIRMED']);
export type ConfidenceT = z.infer<typeof Confidence>;

export const RequirementsStatus = z.enum(['COLLECTING', 'COMPLETE']);
export type RequirementsStatusT = z.infer<typeof RequirementsStatus>;

export const Intent = z.enum(['GREETING', 'PLANNING', 'OFF_TOPIC', 'UNKNOWN']);
export type IntentT = z.infer<typeof Intent>;

export const ConversationState = z.enum([
  'collecting_requirements',
  'requirements_complete',
  'greeting_processed',
  'input_blocked',
]);
export type ConversationStateT = z.infer<typeof ConversationState>;

/** `YYYY`, `YYYY-MM` or `YYYY-MM-DD`. */
export const PartialDate = z.string().regex(/^\d{4}(?:-(?:0[1-9]|1[0-2])(?:-(?:0[1-9]|[12]\d|3[01]))?)?$/);

export const DateRange = z.object({
  start: PartialDate,
  end: PartialDate,
});
export type DateRangeT = z.infer<typeof DateRange>;

export const Budget = z.object({
  amount: z.number().positive(),
  currency: z.string().regex(/^[A-Z]{3}$/),
});
export type BudgetT = z.infer<typeof Budget>;

function slot<T extends z.ZodTypeAny>(value: T) {
  return z
    .object({
      value: value.nullable(),
      confidence: Confidence,
    })
    .refine((s) => (s.value === null) === (s.confidence === 'UNSET'), {
      message: 'a slot holds a value exactly when it is not UNSET',
    });
}

export const TravelRequirements = z.object({
  destination: slot(z.string().min(1)),
  dateRange: slot(DateRange),
  travelerCount: slot(z.number().int().positive()),
  budget: slot(Budget),
  preferences: z.array(z.string()),
  status: RequirementsStatus,
});
export type TravelRequirementsT = z.infer<typeof TravelRequirements>;

export interface Slot<T> {
  value: T | null;
  confidence: ConfidenceT;
}

export const PendingQuestion = z.object({
  field: SlotName,
  kind: z.enum(['ASK', 'CONFIRM']),
});
export type PendingQuestionT = z.infer<typeof PendingQuestion>;

export const Msg = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});
export type MsgT = z.infer<typeof Msg>;

export const ConversationSession = z.object({
  sessionId: z.string().min(1).max(128),
  requirements: TravelRequirements,
  turnCount: z.number().int().min(0),
  lastIntent: Intent,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  version: z.number().int().min(0),
  pendingQuestion: PendingQuestion.nullable(),
  history: z.array(Msg),
  /** 1 for a new session; lowered by blocked input. Older snapshots load at 1. */
  trustScore: z.number().min(0).max(1).default(1),
});
export type ConversationSessionT = z.infer<typeof ConversationSession>;

export function emptyRequirements(): TravelRequirementsT {
  return {
    destination: { value: null, confidence: 'UNSET' },
    dateRange: { value: null, confidence: 'UNSET' },
    travelerCount: { value: null, confidence: 'UNSET' },
    budget: { value: null, confidence: 'UNSET' },
    preferences: [],
    status: 'COLLECTING',
  };
}
