import type { SessionConfig } from '../../config/session.js';
import type { SessionStore } from '../session_store.js';
import { decodeSession, encodeSession } from './codec.js';

interface Entry {
  data: string;
  version: number;
  expiresAt: number;
}

export interface InMemoryStore extends SessionStore {
  /** Stops the TTL sweeper. */
  close(): Promise<void>;
}

/**
 * Process-local store. Snapshots are kept serialized so callers never share
 * references with stored state.
 */
export function createInMemoryStore(cfg: Pick<SessionConfig, 'ttlSec'>, now: () => number = Date.now): InMemoryStore {
  const store = new Map<string, Entry>();
  const ttlMs = cfg.ttlSec * 1000;

  const sweepInterval = setInterval(() => {
    const t = now();
    for (const [id, entry] of store.entries()) {
      if (entry.expiresAt <= t) {
        store.delete(id);
      }
    }
  }, 60_000);
  sweepInterval.unref();

  function live(id: string): Entry | undefined {
    const entry = store.get(id);
    if (entry && entry.expiresAt <= now()) {
      store.delete(id);
      return undefined;
    }
    return entry;
  }

  return {
    async get(id) {
      const entry = live(id);
      return entry ? decodeSession(id, entry.data, entry.version) : undefined;
    },

    async put(id, session, expectedVersion) {
      const actualVersion = live(id)?.version ?? 0;
      if (actualVersion !== expectedVersion) {
        return { ok: false, conflict: { expectedVersion, actualVersion } };
      }
      const version = expectedVersion + 1;
      store.set(id, { data: encodeSession(session, version), version, expiresAt: now() + ttlMs });
      return { ok: true, version };
    },

    async clear(id) {
      store.delete(id);
    },

    async healthCheck() {
      return true;
    },

    async close() {
      clearInterval(sweepInterval);
    },
  };
}
