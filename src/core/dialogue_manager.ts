import type { ExtractionFailure } from '../schemas/extraction.js';
import type {
  ConversationSessionT,
  IntentT,
  PendingQuestionT,
  SlotNameT,
  TravelRequirementsT,
} from '../schemas/requirements.js';
import type { Logger } from '../util/logging.js';
import { buildClarifyingQuestion, buildSummary, formatFieldValue, selectNextQuestion } from './clarifier.js';
import { hasCorrectionCue, hasRejectionCue, isBareNegation } from './cues.js';
import type { FieldExtractor } from './extractor.js';
import { mergeExtraction } from './merge.js';

export const GREETING_PREFIX = "Hello! I'm here to help you plan your trip. ";
export const REDIRECT_PREFIX = "I'd love to chat, but let's focus on planning your trip first. ";
export const INTRO_PREFIX = "I'm here to help you plan your travels. ";
export const REASK_PREFIX = "Sorry, I didn't quite catch that. ";
export const FIX_PREFIX = "No problem, let's fix that. ";
export const ALL_SET = 'Your trip details are all set. Let me know if anything needs to change.';

export interface DialogueDeps {
  extractor: FieldExtractor;
  log?: Logger;
  now?: () => Date;
}

export interface TurnResult {
  session: ConversationSessionT;
  reply: string;
  readyForHandoff: boolean;
  /** Set when the extractor failed and the turn fell back to a re-ask. */
  extractionFailure?: ExtractionFailure;
}

function hasAnyData(req: TravelRequirementsT): boolean {
  return (
    req.destination.confidence !== 'UNSET' ||
    req.dateRange.confidence !== 'UNSET' ||
    req.travelerCount.confidence !== 'UNSET' ||
    req.budget.confidence !== 'UNSET' ||
    req.preferences.length > 0
  );
}

/** The question to put next, plus its text. Null question means COMPLETE. */
function nextPrompt(req: TravelRequirementsT): { question: PendingQuestionT | null; text: string } {
  const question = selectNextQuestion(req);
  if (!question) return { question: null, text: buildSummary(req) };
  return { question, text: buildClarifyingQuestion(question, req) };
}

/** Re-asks what was pending before the turn, or the next question when nothing was. */
function repeatPrompt(session: ConversationSessionT): { question: PendingQuestionT | null; text: string } {
  const pending = session.pendingQuestion;
  if (pending && session.requirements[pending.field].confidence !== 'CONFIRMED') {
    return { question: pending, text: buildClarifyingQuestion(pending, session.requirements) };
  }
  return nextPrompt(session.requirements);
}

function acknowledgement(req: TravelRequirementsT, updated: SlotNameT[], addedPreferences: string[]): string {
  const parts = updated
    .map((f) => formatFieldValue(f, req))
    .filter((v): v is string => v !== null);
  if (addedPreferences.length > 0) parts.push(`preferences: ${addedPreferences.join(', ')}`);
  return parts.length > 0 ? `Got it: ${parts.join(', ')}. ` : '';
}

/**
 * Runs one turn of the slot-filling dialogue. The input session is not mutated; the
 * returned session carries the new state with `turnCount` advanced by one.
 */
export async function processTurn(
  session: ConversationSessionT,
  userText: string,
  intent: IntentT,
  deps: DialogueDeps,
): Promise<TurnResult> {
  const now = deps.now ? deps.now() : new Date();
  const text = userText.trim();
  const wasComplete = session.requirements.status === 'COMPLETE';

  const finish = (
    requirements: TravelRequirementsT,
    pendingQuestion: PendingQuestionT | null,
    reply: string,
    extractionFailure?: ExtractionFailure,
  ): TurnResult => ({
    session: {
      ...session,
      requirements,
      pendingQuestion,
      turnCount: session.turnCount + 1,
      lastIntent: intent,
      updatedAt: now.toISOString(),
    },
    reply,
    readyForHandoff: requirements.status === 'COMPLETE',
    ...(extractionFailure ? { extractionFailure } : {}),
  });

  const unchanged = (prefix: string) => {
    if (wasComplete) return finish(session.requirements, null, prefix ? `${prefix}${ALL_SET}` : buildSummary(session.requirements));
    const { question, text: ask } = repeatPrompt(session);
    return finish(session.requirements, question, `${prefix}${ask}`);
  };

  if (text.length === 0) return unchanged('');

  switch (intent) {
    case 'GREETING': {
      if (wasComplete) return finish(session.requirements, null, `Hello again! ${ALL_SET}`);
      const { question, text: ask } = nextPrompt(session.requirements);
      return finish(session.requirements, question, `${GREETING_PREFIX}${ask}`);
    }
    case 'OFF_TOPIC': {
      if (wasComplete) return finish(session.requirements, null, ALL_SET);
      const { question, text: ask } = nextPrompt(session.requirements);
      const prefix = hasAnyData(session.requirements) ? REDIRECT_PREFIX : INTRO_PREFIX;
      return finish(session.requirements, question, `${prefix}${ask}`);
    }
    case 'UNKNOWN':
      return unchanged(REASK_PREFIX);
    case 'PLANNING':
      break;
  }

  // A finished trip only reopens on a correction, a withdrawn field or a plain "no".
  if (wasComplete && !hasCorrectionCue(text) && !hasRejectionCue(text) && !isBareNegation(text)) {
    return finish(session.requirements, null, buildSummary(session.requirements));
  }

  const outcome = await deps.extractor.extract(text, session.requirements, {
    pendingQuestion: session.pendingQuestion,
  });

  if (!outcome.ok) {
    deps.log?.warn({ sessionId: session.sessionId, kind: outcome.failure.kind }, 'extraction failed, re-asking');
    const { question, text: ask } = wasComplete
      ? { question: null, text: buildSummary(session.requirements) }
      : repeatPrompt(session);
    return finish(session.requirements, question, `${REASK_PREFIX}${ask}`, outcome.failure);
  }

  // A bare "no" to a confirmation question rejects the field being confirmed.
  const pending = session.pendingQuestion;
  const result =
    pending?.kind === 'CONFIRM' && isBareNegation(text) && !outcome.result.fields[pending.field]
      ? { ...outcome.result, rejected: [...new Set([...outcome.result.rejected, pending.field])] }
      : outcome.result;

  const merged = mergeExtraction(session.requirements, result);
  const { question, text: ask } = nextPrompt(merged.requirements);
  const prefix = merged.cleared.length > 0 ? FIX_PREFIX : acknowledgement(merged.requirements, merged.updated, merged.addedPreferences);

  deps.log?.debug(
    { sessionId: session.sessionId, updated: merged.updated, cleared: merged.cleared, status: merged.requirements.status },
    'requirements merged',
  );
  return finish(merged.requirements, question, `${prefix}${ask}`);
}
