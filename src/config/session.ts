import { z } from 'zod';

const SessionConfigSchema = z.object({
  kind: z.enum(['memory', 'redis']).default('memory'),
  ttlSec: z.coerce.number().min(60).default(86_400),
  timeoutMs: z.coerce.number().min(100).default(2000),
  redisUrl: z.string().url().optional(),
  keyPrefix: z.string().min(1).default('travel-intake'),
  maxMessages: z.coerce.number().int().min(0).default(10),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(): SessionConfig {
  const config = SessionConfigSchema.parse({
    kind: process.env.SESSION_STORE || 'memory',
    ttlSec: process.env.SESSION_TTL_SEC || 86_400,
    timeoutMs: process.env.SESSION_ADAPTER_TIMEOUT_MS || 2000,
    redisUrl: process.env.REDIS_URL || undefined,
    keyPrefix: process.env.SESSION_KEY_PREFIX || 'travel-intake',
    maxMessages: process.env.SESSION_MAX_MESSAGES || 10,
  });
  if (config.kind === 'redis' && !config.redisUrl) {
    throw new Error('SESSION_STORE=redis requires REDIS_URL');
  }
  return config;
}
