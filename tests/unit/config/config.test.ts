import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { loadProvidersConfig } from '../../../src/config/providers.js';
import { loadSessionConfig } from '../../../src/config/session.js';

const KEYS = [
  'SESSION_STORE',
  'SESSION_TTL_SEC',
  'SESSION_ADAPTER_TIMEOUT_MS',
  'SESSION_MAX_MESSAGES',
  'SESSION_KEY_PREFIX',
  'REDIS_URL',
  'LLM_API_KEY',
  'LLM_PROVIDER_BASEURL',
  'LLM_MODEL',
  'EXTRACTOR',
  'EXTRACTOR_TIMEOUT_MS',
  'MODERATION_BASEURL',
  'MODERATION_API_KEY',
  'DEFAULT_CURRENCY',
];

describe('config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  describe('loadSessionConfig', () => {
    it('should default to the in-memory store', () => {
      expect(loadSessionConfig()).toEqual({
        kind: 'memory',
        ttlSec: 86_400,
        timeoutMs: 2000,
        keyPrefix: 'travel-intake',
        maxMessages: 10,
      });
    });

    it('should coerce numeric settings from the environment', () => {
      process.env.SESSION_TTL_SEC = '3600';
      process.env.SESSION_MAX_MESSAGES = '4';
      const cfg = loadSessionConfig();
      expect(cfg.ttlSec).toBe(3600);
      expect(cfg.maxMessages).toBe(4);
    });

    it('should require a URL for the redis store', () => {
      process.env.SESSION_STORE = 'redis';
      expect(() => loadSessionConfig()).toThrow('SESSION_STORE=redis requires REDIS_URL');
      process.env.REDIS_URL = 'redis://localhost:6379';
      expect(loadSessionConfig().kind).toBe('redis');
    });

    it('should reject a TTL below one minute', () => {
      process.env.SESSION_TTL_SEC = '30';
      expect(() => loadSessionConfig()).toThrow();
    });
  });

  describe('loadProvidersConfig', () => {
    it('should use the heuristic extractor without an LLM key', () => {
      const cfg = loadProvidersConfig();
      expect(cfg.extractor).toEqual({ kind: 'heuristic', timeoutMs: 4000 });
      expect(cfg.llm.apiKey).toBeUndefined();
      expect(cfg.defaultCurrency).toBe('USD');
    });

    it('should switch to the LLM extractor when a key is present', () => {
      process.env.LLM_API_KEY = 'test-secret';
      process.env.LLM_PROVIDER_BASEURL = 'https://llm.test/v1';
      process.env.DEFAULT_CURRENCY = 'eur';
      const cfg = loadProvidersConfig();
      expect(cfg.extractor.kind).toBe('llm');
      expect(cfg.llm.baseUrl).toBe('https://llm.test/v1');
      expect(cfg.moderation.baseUrl).toBe('https://llm.test/v1');
      expect(cfg.defaultCurrency).toBe('EUR');
    });

    it('should let EXTRACTOR force the heuristic rules', () => {
      process.env.LLM_API_KEY = 'test-secret';
      process.env.EXTRACTOR = 'heuristic';
      expect(loadProvidersConfig().extractor.kind).toBe('heuristic');
    });
  });
});
