import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createSession } from '../../../src/core/session_manager.js';
import { createInMemoryStore, type InMemoryStore } from '../../../src/core/stores/inmemory.js';
import { FIXED_NOW } from '../../helpers/fakes.js';

describe('InMemoryStore', () => {
  let clock: number;
  let store: InMemoryStore;

  beforeEach(() => {
    clock = 1_000_000;
    store = createInMemoryStore({ ttlSec: 60 }, () => clock);
  });

  afterEach(async () => {
    await store.close();
  });

  it('should return undefined for an unknown session', async () => {
    await expect(store.get('missing')).resolves.toBeUndefined();
  });

  it('should save a new session at version 1', async () => {
    const session = createSession('s1', FIXED_NOW);
    await expect(store.put('s1', session, 0)).resolves.toEqual({ ok: true, version: 1 });
    await expect(store.get('s1')).resolves.toEqual({ ...session, version: 1 });
  });

  it('should reject a write based on a stale version', async () => {
    const session = createSession('s1', FIXED_NOW);
    await store.put('s1', session, 0);
    await expect(store.put('s1', { ...session, turnCount: 1 }, 0)).resolves.toEqual({
      ok: false,
      conflict: { expectedVersion: 0, actualVersion: 1 },
    });
    await expect(store.put('s1', { ...session, turnCount: 1 }, 1)).resolves.toEqual({ ok: true, version: 2 });
    const stored = await store.get('s1');
    expect(stored?.turnCount).toBe(1);
  });

  it('should not share state with callers', async () => {
    const session = createSession('s1', FIXED_NOW);
    await store.put('s1', session, 0);
    const first = await store.get('s1');
    first?.requirements.preferences.push('beaches');
    session.history.push({ role: 'user', content: 'hi' });
    const second = await store.get('s1');
    expect(second?.requirements.preferences).toEqual([]);
    expect(second?.history).toEqual([]);
  });

  it('should forget sessions after the TTL', async () => {
    await store.put('s1', createSession('s1', FIXED_NOW), 0);
    clock += 60_000;
    await expect(store.get('s1')).resolves.toBeUndefined();
    await expect(store.put('s1', createSession('s1', FIXED_NOW), 0)).resolves.toEqual({ ok: true, version: 1 });
  });

  it('should clear a session', async () => {
    await store.put('s1', createSession('s1', FIXED_NOW), 0);
    await store.clear('s1');
    await expect(store.get('s1')).resolves.toBeUndefined();
    await expect(store.healthCheck?.()).resolves.toBe(true);
  });
});
