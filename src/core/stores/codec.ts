import { ConversationSession, type ConversationSessionT } from '../../schemas/requirements.js';

export class CorruptSessionError extends Error {
  constructor(public readonly sessionId: string, message: string) {
    super(`Stored session ${sessionId} is unreadable: ${message}`);
    this.name = 'CorruptSessionError';
  }
}

export function encodeSession(session: ConversationSessionT, version: number): string {
  return JSON.stringify({ ...session, version });
}

export function decodeSession(sessionId: string, data: string, version: number): ConversationSessionT {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err) {
    throw new CorruptSessionError(sessionId, err instanceof Error ? err.message : 'invalid JSON');
  }
  const parsed = ConversationSession.safeParse(json);
  if (!parsed.success) {
    throw new CorruptSessionError(sessionId, parsed.error.issues[0]?.message ?? 'schema mismatch');
  }
  return { ...parsed.data, version };
}
