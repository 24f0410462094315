/**
 * Prometheus metrics on a dedicated registry.
 * - METRICS=off disables the /metrics endpoint (counters still record in-process)
 */
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const MODE = (process.env.METRICS || 'on').toLowerCase();

export const register = new Registry();

if (process.env.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register });
}

const counterTurns = new Counter({
  name: 'chat_turn_total',
  help: 'Chat turns by intent',
  labelNames: ['intent'] as const,
  registers: [register],
});

const counterSafetyBlocks = new Counter({
  name: 'safety_block_total',
  help: 'Safety gate blocks',
  labelNames: ['direction', 'source'] as const,
  registers: [register],
});

const counterExtractionFailures = new Counter({
  name: 'extraction_failure_total',
  help: 'Field extraction failures by kind',
  labelNames: ['kind'] as const,
  registers: [register],
});

const counterSessionConflicts = new Counter({
  name: 'session_conflict_total',
  help: 'Optimistic write conflicts on session save',
  registers: [register],
});

const counterCompletions = new Counter({
  name: 'requirements_complete_total',
  help: 'Conversations whose requirements became complete',
  registers: [register],
});

const counterExtReq = new Counter({
  name: 'external_requests_total',
  help: 'External adapter requests',
  labelNames: ['target', 'status'] as const,
  registers: [register],
});

const histExtLatency = new Histogram({
  name: 'external_request_latency_ms',
  help: 'Latency of external adapter requests in milliseconds',
  labelNames: ['target', 'status'] as const,
  buckets: [50, 100, 200, 400, 800, 2000, 4000],
  registers: [register],
});

const histTurnSeconds = new Histogram({
  name: 'chat_turn_duration_seconds',
  help: 'End-to-end turn latency',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 4, 8],
  registers: [register],
});

export function metricsEnabled(): boolean {
  return MODE !== 'off';
}

export function incTurn(intent: string): void {
  counterTurns.inc({ intent });
}

export function incSafetyBlock(direction: 'IN' | 'OUT', source: string): void {
  counterSafetyBlocks.inc({ direction, source });
}

export function incExtractionFailure(kind: string): void {
  counterExtractionFailures.inc({ kind });
}

export function incSessionConflict(): void {
  counterSessionConflicts.inc();
}

export function incCompletion(): void {
  counterCompletions.inc();
}

export function observeExternal(target: string, status: 'ok' | 'error', durationMs: number): void {
  counterExtReq.inc({ target, status });
  histExtLatency.observe({ target, status }, durationMs);
}

export function observeTurn(durationMs: number): void {
  histTurnSeconds.observe(durationMs / 1000);
}

export async function getPrometheusText(): Promise<string> {
  return register.metrics();
}

export function resetMetricsForTests(): void {
  register.resetMetrics();
}
