import type express from 'express';
import { createApp } from '../../src/api/app.js';
import { createHeuristicExtractor } from '../../src/core/heuristic_extractor.js';
import { createIntentClassifier } from '../../src/core/intent.js';
import { createOrchestrator, type Orchestrator } from '../../src/core/orchestrator.js';
import { createSafetyGate } from '../../src/core/safety_gate.js';
import type { SessionStore } from '../../src/core/session_store.js';
import { createInMemoryStore } from '../../src/core/stores/inmemory.js';
import { FIXED_NOW, silentLogger } from './fakes.js';

export interface TestApp {
  app: express.Express;
  store: SessionStore;
  close(): Promise<void>;
}

// Create an express app wired with local rules only (no providers, no listen)
export function makeTestApp(overrides: { orchestrator?: Orchestrator; store?: SessionStore } = {}): TestApp {
  const log = silentLogger();
  const memory = createInMemoryStore({ ttlSec: 3600 });
  const store = overrides.store ?? memory;
  const orchestrator =
    overrides.orchestrator ??
    createOrchestrator({
      store,
      safety: createSafetyGate({ log }),
      extractor: createHeuristicExtractor({ defaultCurrency: 'USD', now: () => FIXED_NOW }),
      intent: createIntentClassifier({ log }),
      log,
      now: () => FIXED_NOW,
    });
  return {
    app: createApp({ orchestrator, store, log }),
    store,
    close: () => memory.close(),
  };
}
