import type { SessionConfig } from '../config/session.js';
import type { ConversationSessionT } from '../schemas/requirements.js';
import { createInMemoryStore } from './stores/inmemory.js';
import { createRedisStore, type RedisLike } from './stores/redis.js';

export interface VersionConflict {
  expectedVersion: number;
  actualVersion: number;
}

export type PutResult = { ok: true; version: number } | { ok: false; conflict: VersionConflict };

/**
 * One snapshot per conversation, written with optimistic concurrency: `put` only
 * succeeds when the stored version equals `expectedVersion` (0 for a session never
 * saved), and the stored version becomes `expectedVersion + 1`.
 */
export interface SessionStore {
  get(id: string): Promise<ConversationSessionT | undefined>;
  put(id: string, session: ConversationSessionT, expectedVersion: number): Promise<PutResult>;
  clear(id: string): Promise<void>;
  healthCheck?(): Promise<boolean>;
  close?(): Promise<void>;
}

export function createStore(cfg: SessionConfig, deps?: { redis?: RedisLike }): SessionStore {
  if (cfg.kind === 'redis') {
    return createRedisStore(cfg, deps?.redis);
  }
  return createInMemoryStore(cfg);
}
