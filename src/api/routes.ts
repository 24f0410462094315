import type { Router } from 'express';
import express from 'express';
import type pino from 'pino';
import { SessionBusyError, SessionStoreUnavailableError, toStdError } from '../core/errors.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { SessionStore } from '../core/session_store.js';
import { TurnInput, toRequirementsSnapshot, type TurnOutputT } from '../schemas/chat.js';

export const UNAVAILABLE_REPLY = "Sorry, I'm having trouble right now. Please try again in a moment.";
export const INVALID_REPLY = 'Please send a message of up to 2000 characters.';

export interface RouteDeps {
  orchestrator: Orchestrator;
  store: SessionStore;
}

export const router = (log: pino.Logger, deps: RouteDeps): Router => {
  const r = express.Router();

  r.post('/chat', async (req, res) => {
    const parsed = TurnInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten(), reply_text: INVALID_REPLY });
    }
    try {
      const out = await deps.orchestrator.handleTurn({
        sessionId: parsed.data.session_id,
        text: parsed.data.text,
      });
      const body: TurnOutputT = {
        session_id: out.sessionId,
        reply_text: out.reply,
        status: out.status,
        ready_for_handoff: out.readyForHandoff,
        requirements_snapshot: toRequirementsSnapshot(out.requirements),
        intent: out.intent,
        turn_count: out.turnCount,
        conversation_state: out.conversationState,
        trust_score: out.trustScore,
      };
      return res.json(body);
    } catch (err) {
      const std = toStdError(err, 'chat');
      if (err instanceof SessionBusyError) {
        log.warn({ sessionId: err.sessionId }, 'session busy');
        return res.status(409).json({ error: std.code, reply_text: std.message });
      }
      if (err instanceof SessionStoreUnavailableError) {
        return res.status(503).json({ error: std.code, reply_text: UNAVAILABLE_REPLY });
      }
      log.error({ err }, 'chat handler failed');
      return res.status(500).json({ error: 'internal_error', reply_text: UNAVAILABLE_REPLY });
    }
  });

  r.get('/session/:id', async (req, res) => {
    try {
      const session = await deps.store.get(req.params.id);
      if (!session) {
        return res.status(404).json({ error: 'not_found' });
      }
      return res.json({
        session_id: session.sessionId,
        status: session.requirements.status,
        requirements_snapshot: toRequirementsSnapshot(session.requirements),
        turn_count: session.turnCount,
        last_intent: session.lastIntent,
        pending_question: session.pendingQuestion,
        history: session.history,
        version: session.version,
        trust_score: session.trustScore,
        created_at: session.createdAt,
        updated_at: session.updatedAt,
      });
    } catch (err) {
      log.error({ err }, 'session lookup failed');
      return res.status(503).json({ error: toStdError(err).code, reply_text: UNAVAILABLE_REPLY });
    }
  });

  r.delete('/session/:id', async (req, res) => {
    try {
      await deps.store.clear(req.params.id);
      return res.status(204).end();
    } catch (err) {
      log.error({ err }, 'session clear failed');
      return res.status(503).json({ error: toStdError(err).code, reply_text: UNAVAILABLE_REPLY });
    }
  });

  return r;
};
