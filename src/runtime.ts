import { loadProvidersConfig, type ProvidersConfig } from './config/providers.js';
import { loadSessionConfig, type SessionConfig } from './config/session.js';
import { createFieldExtractor } from './core/extractor.js';
import { createIntentClassifier } from './core/intent.js';
import { createLlmClient } from './core/llm.js';
import { createModerationProvider } from './core/moderation.js';
import { createOrchestrator, type Orchestrator } from './core/orchestrator.js';
import { createSafetyGate } from './core/safety_gate.js';
import { createStore, type SessionStore } from './core/session_store.js';
import type { Logger } from './util/logging.js';

export interface Runtime {
  orchestrator: Orchestrator;
  store: SessionStore;
  sessionConfig: SessionConfig;
  providers: ProvidersConfig;
  close(): Promise<void>;
}

/** Wires configuration, providers and the session store into an orchestrator. */
export function createRuntime(log: Logger): Runtime {
  const sessionConfig = loadSessionConfig();
  const providers = loadProvidersConfig();
  const store = createStore(sessionConfig);

  const llm = providers.llm.apiKey ? createLlmClient(providers.llm) : undefined;
  const moderation = providers.moderation.apiKey ? createModerationProvider(providers.moderation) : undefined;

  const orchestrator = createOrchestrator({
    store,
    safety: createSafetyGate({ provider: moderation, timeoutMs: providers.moderation.timeoutMs, log }),
    extractor: createFieldExtractor(providers, { log }),
    intent: createIntentClassifier({ llm, timeoutMs: providers.intent.timeoutMs, log }),
    log,
    session: sessionConfig,
  });

  log.info(
    {
      sessionStore: sessionConfig.kind,
      ttlSec: sessionConfig.ttlSec,
      extractor: providers.extractor.kind,
      moderation: moderation ? 'provider' : 'local',
      intent: llm ? 'llm' : 'keywords',
    },
    'runtime initialized',
  );

  return {
    orchestrator,
    store,
    sessionConfig,
    providers,
    async close() {
      if (store.close) await store.close();
    },
  };
}
