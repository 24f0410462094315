import { randomUUID } from 'crypto';
import { emptyRequirements, type ConversationSessionT } from '../schemas/requirements.js';
import type { SafetyVerdict } from '../schemas/safety.js';

export const INITIAL_TRUST = 1;
const TRUST_RECOVERY = 0.05;

export function generateSessionId(): string {
  return `session_${Date.now()}_${randomUUID().slice(0, 8)}`;
}

/** A brand-new conversation: COLLECTING, every field UNSET, never saved (version 0). */
export function createSession(sessionId: string, now: Date = new Date()): ConversationSessionT {
  const ts = now.toISOString();
  return {
    sessionId,
    requirements: emptyRequirements(),
    turnCount: 0,
    lastIntent: 'UNKNOWN',
    createdAt: ts,
    updatedAt: ts,
    version: 0,
    pendingQuestion: null,
    history: [],
    trustScore: INITIAL_TRUST,
  };
}

/**
 * Blocked input costs half its risk score; each screened turn that passes wins back
 * a little. Kept within [0, 1] at two decimals. No verdict (empty input) leaves it.
 */
export function adjustTrustScore(current: number, inbound: SafetyVerdict | undefined): number {
  if (!inbound) return current;
  const next = inbound.action === 'BLOCK' ? current - inbound.riskScore / 2 : current + TRUST_RECOVERY;
  return Math.round(Math.min(1, Math.max(0, next)) * 100) / 100;
}
