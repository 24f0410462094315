import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent } from 'undici';
import { ModerationError, ProviderHttpError } from '../../src/core/errors.js';
import { createModerationProvider } from '../../src/core/moderation.js';

describe('createModerationProvider', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  function provider() {
    return createModerationProvider({
      baseUrl: 'https://moderation.test/v1',
      apiKey: 'test-secret',
      model: 'test-moderation',
      dispatcher: agent,
    });
  }

  function intercept() {
    return agent.get('https://moderation.test').intercept({ path: '/v1/moderations', method: 'POST' });
  }

  it('should list only the categories that were hit', async () => {
    intercept().reply(200, {
      results: [
        {
          flagged: true,
          categories: { violence: true, hate: false },
          category_scores: { violence: 0.91, hate: 0.02 },
        },
      ],
    });
    await expect(provider().moderate('some text')).resolves.toEqual({
      flagged: true,
      categories: ['violence'],
      score: 0.91,
    });
  });

  it('should accept a result without categories', async () => {
    intercept().reply(200, { results: [{ flagged: false }] });
    await expect(provider().moderate('some text')).resolves.toEqual({ flagged: false, categories: [], score: 0 });
  });

  it('should raise a provider error on a non-2xx answer', async () => {
    intercept().reply(401, 'bad key');
    const err = await provider().moderate('some text').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderHttpError);
    if (err instanceof ProviderHttpError) expect(err.status).toBe(401);
  });

  it('should reject an unexpected response shape', async () => {
    intercept().reply(200, { results: [] });
    await expect(provider().moderate('some text')).rejects.toBeInstanceOf(ModerationError);
  });
});
