import type { SessionConfig } from '../config/session.js';
import type {
  ConversationStateT,
  IntentT,
  MsgT,
  RequirementsStatusT,
  TravelRequirementsT,
} from '../schemas/requirements.js';
import type { Logger } from '../util/logging.js';
import {
  incCompletion,
  incExtractionFailure,
  incSafetyBlock,
  incSessionConflict,
  incTurn,
  observeTurn,
} from '../util/metrics.js';
import { withResilience } from '../util/resilience.js';
import { processTurn } from './dialogue_manager.js';
import { SessionBusyError, SessionStoreUnavailableError } from './errors.js';
import type { FieldExtractor } from './extractor.js';
import type { IntentClassifier } from './intent.js';
import { SAFE_INPUT_MESSAGE, SAFE_OUTPUT_MESSAGE, type SafetyGate } from './safety_gate.js';
import { adjustTrustScore, createSession, generateSessionId } from './session_manager.js';
import type { SessionStore } from './session_store.js';

export interface TurnRequest {
  sessionId?: string;
  text: string;
}

export interface TurnResponse {
  sessionId: string;
  reply: string;
  status: RequirementsStatusT;
  readyForHandoff: boolean;
  requirements: TravelRequirementsT;
  intent: IntentT;
  turnCount: number;
  blocked: boolean;
  conversationState: ConversationStateT;
  trustScore: number;
}

export interface OrchestratorDeps {
  store: SessionStore;
  safety: SafetyGate;
  extractor: FieldExtractor;
  intent: IntentClassifier;
  log: Logger;
  session?: Pick<SessionConfig, 'timeoutMs' | 'maxMessages'>;
  now?: () => Date;
}

export interface Orchestrator {
  handleTurn(req: TurnRequest): Promise<TurnResponse>;
}

const MAX_ATTEMPTS = 2;

export function conversationState(blocked: boolean, intent: IntentT, status: RequirementsStatusT): ConversationStateT {
  if (blocked) return 'input_blocked';
  if (status === 'COMPLETE') return 'requirements_complete';
  if (intent === 'GREETING') return 'greeting_processed';
  return 'collecting_requirements';
}

function appendHistory(history: MsgT[], msgs: MsgT[], max: number): MsgT[] {
  if (max <= 0) return [];
  return [...history, ...msgs].slice(-max);
}

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const timeoutMs = deps.session?.timeoutMs;
  const maxMessages = deps.session?.maxMessages ?? 10;
  const now = deps.now ?? (() => new Date());

  async function storeCall<T>(op: string, sessionId: string, fn: () => Promise<T>, retries?: number): Promise<T> {
    try {
      return await withResilience('session_store', () => fn(), { timeoutMs, retries });
    } catch (err) {
      deps.log.error({ err, op, sessionId }, 'session store call failed');
      throw new SessionStoreUnavailableError(`session store ${op} failed`, { cause: err });
    }
  }

  return {
    async handleTurn(req) {
      const started = Date.now();
      const sessionId = req.sessionId ?? generateSessionId();
      const text = req.text.trim();
      const log = deps.log.child({ sessionId });

      // Input screening runs once; retries after a conflict reuse the verdict.
      const inbound = text ? await deps.safety.check(text, 'IN') : undefined;
      const blocked = inbound?.action === 'BLOCK';
      if (inbound?.action === 'BLOCK') {
        incSafetyBlock('IN', inbound.source);
        log.warn({ reason: inbound.reason, riskScore: inbound.riskScore, source: inbound.source }, 'input blocked');
      }

      for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
        const loaded = await storeCall('get', sessionId, () => deps.store.get(sessionId));
        const session = loaded ?? createSession(sessionId, now());
        const wasComplete = session.requirements.status === 'COMPLETE';

        let next = session;
        let reply: string;
        let intent: IntentT;
        let readyForHandoff: boolean;

        if (blocked) {
          intent = session.lastIntent;
          next = { ...session, turnCount: session.turnCount + 1, updatedAt: now().toISOString() };
          reply = SAFE_INPUT_MESSAGE;
          readyForHandoff = next.requirements.status === 'COMPLETE';
        } else {
          intent = text
            ? await deps.intent.classify(text, { hasPendingQuestion: session.pendingQuestion !== null })
            : 'UNKNOWN';
          const turn = await processTurn(session, text, intent, { extractor: deps.extractor, log, now });
          if (turn.extractionFailure) incExtractionFailure(turn.extractionFailure.kind);
          next = turn.session;
          readyForHandoff = turn.readyForHandoff;

          const outbound = await deps.safety.check(turn.reply, 'OUT');
          if (outbound.action === 'BLOCK') {
            incSafetyBlock('OUT', outbound.source);
            log.warn({ reason: outbound.reason, riskScore: outbound.riskScore, source: outbound.source }, 'reply blocked');
            reply = SAFE_OUTPUT_MESSAGE;
          } else {
            reply = outbound.text;
          }
        }

        next = {
          ...next,
          history: appendHistory(
            session.history,
            text
              ? [
                  { role: 'user', content: blocked ? '[blocked]' : text },
                  { role: 'assistant', content: reply },
                ]
              : [{ role: 'assistant', content: reply }],
            maxMessages,
          ),
          trustScore: adjustTrustScore(session.trustScore, inbound),
        };

        const result = await storeCall('put', sessionId, () => deps.store.put(sessionId, next, session.version), 0);
        if (!result.ok) {
          incSessionConflict();
          log.info({ attempt, ...result.conflict }, 'session version conflict');
          continue;
        }

        if (!wasComplete && next.requirements.status === 'COMPLETE') incCompletion();
        incTurn(intent);
        observeTurn(Date.now() - started);
        log.info(
          { intent, status: next.requirements.status, turnCount: next.turnCount, blocked, version: result.version },
          'turn handled',
        );

        return {
          sessionId,
          reply,
          status: next.requirements.status,
          readyForHandoff,
          requirements: next.requirements,
          intent,
          turnCount: next.turnCount,
          blocked,
          conversationState: conversationState(blocked, intent, next.requirements.status),
          trustScore: next.trustScore,
        };
      }

      throw new SessionBusyError(sessionId);
    },
  };
}
