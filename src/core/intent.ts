import { z } from 'zod';
import type { IntentT } from '../schemas/requirements.js';
import type { Logger } from '../util/logging.js';
import { withResilience } from '../util/resilience.js';
import { GREETING_CUE, hasAffirmation, isBareNegation, looksLikePlanning } from './cues.js';
import { toStdError } from './errors.js';
import { mentionsKnownDestination } from './heuristic_extractor.js';
import { safeExtractJson, type LlmClient } from './llm.js';
import { fillPrompt, getPrompt } from './prompts.js';

export interface IntentContext {
  hasPendingQuestion: boolean;
}

export interface IntentClassifier {
  classify(text: string, ctx: IntentContext): Promise<IntentT>;
}

const LlmIntent = z.object({
  intent: z.enum(['planning', 'greeting', 'other']),
});

const FROM_LLM: Record<z.infer<typeof LlmIntent>['intent'], IntentT> = {
  planning: 'PLANNING',
  greeting: 'GREETING',
  other: 'OFF_TOPIC',
};

/**
 * Keyword fallback. Trip details, destinations and withdrawals are planning; a bare
 * yes or no is planning only as the answer to a pending question. Anything else is
 * off-topic.
 */
export function classifyByKeywords(text: string, ctx: IntentContext): IntentT {
  const t = text.trim();
  if (!t) return 'UNKNOWN';
  if (looksLikePlanning(t) || mentionsKnownDestination(t)) return 'PLANNING';
  if (GREETING_CUE.test(t)) return 'GREETING';
  if (hasAffirmation(t) || isBareNegation(t)) return ctx.hasPendingQuestion ? 'PLANNING' : 'UNKNOWN';
  return 'OFF_TOPIC';
}

export function createIntentClassifier(opts: { llm?: LlmClient; timeoutMs?: number; log?: Logger } = {}): IntentClassifier {
  return {
    async classify(text, ctx) {
      const llm = opts.llm;
      if (!llm || !text.trim()) return classifyByKeywords(text, ctx);
      try {
        const prompt = fillPrompt(await getPrompt('intent_classifier'), {
          pending: ctx.hasPendingQuestion ? 'yes' : 'no',
          text,
        });
        const raw = await withResilience(
          'intent',
          (signal) => llm.complete(prompt, { responseFormat: 'json', signal }),
          { timeoutMs: opts.timeoutMs },
        );
        const parsed = LlmIntent.safeParse(safeExtractJson(raw));
        if (parsed.success) return FROM_LLM[parsed.data.intent];
        opts.log?.debug({ raw }, 'intent_classifier_invalid_json');
      } catch (err) {
        opts.log?.debug({ err: toStdError(err, 'intent') }, 'intent classification failed, using keywords');
      }
      return classifyByKeywords(text, ctx);
    },
  };
}
