import {
  retry,
  handleWhen,
  timeout,
  ExponentialBackoff,
  TimeoutStrategy,
  wrap,
  circuitBreaker,
  ConsecutiveBreaker,
  type CircuitBreakerPolicy,
} from 'cockatiel';
import Bottleneck from 'bottleneck';
import { ProviderHttpError } from '../core/errors.js';
import { observeExternal } from './metrics.js';

export type ServiceName = 'extractor' | 'intent' | 'moderation' | 'session_store';

interface ServiceConfig {
  retries: number;
  initialDelay: number;
  maxDelay: number;
  timeoutMs: number;
  maxConcurrent: number;
  minTime: number;
  breakerThreshold: number;
  breakerHalfOpenAfter: number;
}

const DEFAULT_CONFIG: ServiceConfig = {
  retries: 0,
  initialDelay: 100,
  maxDelay: 1000,
  timeoutMs: 4000,
  maxConcurrent: 8,
  minTime: 0,
  breakerThreshold: 5,
  breakerHalfOpenAfter: 30_000,
};

// Retries always run inside the overall timeout, so the budget holds either way.
const SERVICE_CONFIGS: Record<ServiceName, Partial<ServiceConfig>> = {
  extractor: { timeoutMs: 4000, maxConcurrent: 4 },
  intent: { timeoutMs: 3000, maxConcurrent: 4 },
  moderation: { retries: 1, timeoutMs: 3000, maxConcurrent: 4 },
  session_store: { retries: 2, timeoutMs: 2000, maxConcurrent: 32, initialDelay: 50 },
};

const limiters = new Map<ServiceName, Bottleneck>();
const breakers = new Map<ServiceName, CircuitBreakerPolicy>();

function getServiceConfig(service: ServiceName): ServiceConfig {
  return { ...DEFAULT_CONFIG, ...SERVICE_CONFIGS[service] };
}

function getLimiter(service: ServiceName): Bottleneck {
  let limiter = limiters.get(service);
  if (!limiter) {
    const config = getServiceConfig(service);
    limiter = new Bottleneck({
      minTime: config.minTime,
      maxConcurrent: config.maxConcurrent,
    });
    limiters.set(service, limiter);
  }
  return limiter;
}

function getBreaker(service: ServiceName): CircuitBreakerPolicy {
  let breaker = breakers.get(service);
  if (!breaker) {
    const config = getServiceConfig(service);
    breaker = circuitBreaker(isRetryable, {
      halfOpenAfter: config.breakerHalfOpenAfter,
      breaker: new ConsecutiveBreaker(config.breakerThreshold),
    });
    breakers.set(service, breaker);
  }
  return breaker;
}

// Client errors (4xx other than 429) say nothing about provider health.
const isRetryable = handleWhen(
  (err) => !(err instanceof ProviderHttpError) || err.status >= 500 || err.status === 429,
);

/**
 * Execute a call to an external service under its circuit breaker, an aggressive
 * timeout, bounded retries and a concurrency limiter. The timeout covers all retries.
 * The callee receives an AbortSignal that fires when the timeout elapses.
 */
export async function withResilience<T>(
  service: ServiceName,
  fn: (signal: AbortSignal) => Promise<T>,
  opts: { timeoutMs?: number; retries?: number } = {},
): Promise<T> {
  const config = getServiceConfig(service);
  const policy = wrap(
    getBreaker(service),
    timeout(opts.timeoutMs ?? config.timeoutMs, TimeoutStrategy.Aggressive),
    retry(isRetryable, {
      maxAttempts: opts.retries ?? config.retries,
      backoff: new ExponentialBackoff({
        initialDelay: config.initialDelay,
        maxDelay: config.maxDelay,
      }),
    }),
  );

  const started = Date.now();
  try {
    const result = await getLimiter(service).schedule(() => policy.execute(({ signal }) => fn(signal)));
    observeExternal(service, 'ok', Date.now() - started);
    return result;
  } catch (err) {
    observeExternal(service, 'error', Date.now() - started);
    throw err;
  }
}

export function resetResilienceForTests(): void {
  breakers.clear();
  limiters.clear();
}
