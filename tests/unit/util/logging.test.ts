import { describe, it, expect, afterEach } from '@jest/globals';
import { createLogger } from '../../../src/util/logging.js';

describe('createLogger', () => {
  const saved = process.env.LOG_LEVEL;

  afterEach(() => {
    process.env.LOG_LEVEL = saved;
  });

  it('should take its level from LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    expect(createLogger().level).toBe('warn');
  });

  it('should default to info', () => {
    delete process.env.LOG_LEVEL;
    expect(createLogger().level).toBe('info');
  });
});
