import { describe, it, expect } from '@jest/globals';
import { BrokenCircuitError } from 'cockatiel';
import { ProviderHttpError } from '../../../src/core/errors.js';
import { getPrometheusText } from '../../../src/util/metrics.js';
import { withResilience } from '../../../src/util/resilience.js';

describe('withResilience', () => {
  it('should retry a server error within the budget', async () => {
    let calls = 0;
    const result = await withResilience('moderation', async () => {
      calls += 1;
      if (calls === 1) throw new ProviderHttpError('HTTP 503', 503, 'moderation');
      return 'ok';
    });
    expect(result).toBe('ok');
    expect(calls).toBe(2);
  });

  it('should not retry a client error', async () => {
    let calls = 0;
    const attempt = withResilience('moderation', async () => {
      calls += 1;
      throw new ProviderHttpError('HTTP 400', 400, 'moderation');
    });
    await expect(attempt).rejects.toBeInstanceOf(ProviderHttpError);
    expect(calls).toBe(1);
  });

  it('should honor a per-call retry override', async () => {
    let calls = 0;
    const attempt = withResilience(
      'session_store',
      async () => {
        calls += 1;
        throw new Error('connection reset');
      },
      { retries: 0 },
    );
    await expect(attempt).rejects.toThrow('connection reset');
    expect(calls).toBe(1);
  });

  it('should open the circuit after consecutive failures', async () => {
    const failing = async (): Promise<string> => {
      throw new Error('down');
    };
    for (let i = 0; i < 5; i++) {
      await expect(withResilience('intent', failing)).rejects.toThrow('down');
    }
    let called = false;
    const blocked = withResilience('intent', async () => {
      called = true;
      return 'ok';
    });
    await expect(blocked).rejects.toBeInstanceOf(BrokenCircuitError);
    expect(called).toBe(false);
  });

  it('should record outcomes per target', async () => {
    await withResilience('extractor', async () => 'ok');
    const text = await getPrometheusText();
    expect(text).toContain('external_requests_total{target="extractor",status="ok"} 1');
  });
});
