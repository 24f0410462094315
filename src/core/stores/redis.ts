import { createClient } from 'redis';
import { z } from 'zod';
import type { SessionConfig } from '../../config/session.js';
import type { SessionStore } from '../session_store.js';
import { decodeSession, encodeSession } from './codec.js';

/** The handful of Redis commands the store needs. */
export interface RedisLike {
  hGetAll(key: string): Promise<Record<string, string>>;
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

type NodeRedisClient = ReturnType<typeof createClient>;

export function fromNodeRedis(client: NodeRedisClient): RedisLike {
  return {
    async hGetAll(key) {
      const raw = await client.hGetAll(key);
      return Object.fromEntries(Object.entries(raw).map(([k, v]) => [k, v.toString()]));
    },
    eval: (script, options) => client.eval(script, options),
    del: (key) => client.del(key),
    ping: () => client.ping(),
    quit: () => client.quit(),
  };
}

/**
 * Compare-and-set on the hash's `version` field. Returns {1, newVersion} on
 * success and {0, currentVersion} on a mismatch.
 */
export const PUT_SCRIPT = `
local current = tonumber(redis.call('HGET', KEYS[1], 'version') or '0')
if current ~= tonumber(ARGV[1]) then
  return {0, current}
end
local nextVersion = current + 1
redis.call('HSET', KEYS[1], 'version', nextVersion, 'data', ARGV[2])
redis.call('EXPIRE', KEYS[1], tonumber(ARGV[3]))
return {1, nextVersion}
`;

const PutReply = z.tuple([z.coerce.number(), z.coerce.number()]);

export function sessionKey(prefix: string, id: string): string {
  return `${prefix}:session:${id}`;
}

export interface RedisStore extends SessionStore {
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

export function createRedisStore(
  cfg: Pick<SessionConfig, 'ttlSec' | 'keyPrefix' | 'redisUrl'>,
  injectedClient?: RedisLike,
): RedisStore {
  let client: RedisLike | undefined = injectedClient;
  let connecting: Promise<RedisLike> | undefined;

  async function getClient(): Promise<RedisLike> {
    if (client) return client;
    if (!connecting) {
      const raw = createClient({ url: cfg.redisUrl });
      connecting = raw
        .connect()
        .then(() => {
          client = fromNodeRedis(raw);
          return client;
        })
        .catch((error: unknown) => {
          connecting = undefined;
          throw new Error(`Failed to connect to Redis: ${error instanceof Error ? error.message : String(error)}`);
        });
    }
    return connecting;
  }

  return {
    async get(id) {
      const redis = await getClient();
      const hash = await redis.hGetAll(sessionKey(cfg.keyPrefix, id));
      if (hash.data === undefined) return undefined;
      return decodeSession(id, hash.data, Number(hash.version ?? '0'));
    },

    async put(id, session, expectedVersion) {
      const redis = await getClient();
      const reply = await redis.eval(PUT_SCRIPT, {
        keys: [sessionKey(cfg.keyPrefix, id)],
        arguments: [
          String(expectedVersion),
          encodeSession(session, expectedVersion + 1),
          String(cfg.ttlSec),
        ],
      });
      const [ok, version] = PutReply.parse(reply);
      if (ok === 1) return { ok: true, version };
      return { ok: false, conflict: { expectedVersion, actualVersion: version } };
    },

    async clear(id) {
      const redis = await getClient();
      await redis.del(sessionKey(cfg.keyPrefix, id));
    },

    async healthCheck() {
      try {
        const redis = await getClient();
        return (await redis.ping()) === 'PONG';
      } catch {
        return false;
      }
    },

    async close() {
      if (client) await client.quit();
      client = undefined;
    },
  };
}
