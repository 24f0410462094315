import express from 'express';
import type { Orchestrator } from '../core/orchestrator.js';
import type { SessionStore } from '../core/session_store.js';
import type { Logger } from '../util/logging.js';
import { getPrometheusText, metricsEnabled } from '../util/metrics.js';
import { router } from './routes.js';

export interface AppDeps {
  orchestrator: Orchestrator;
  store: SessionStore;
  log: Logger;
}

function resOnFinish(res: express.Response, cb: () => void) {
  res.once('finish', cb);
}

export function createApp(deps: AppDeps): express.Express {
  const { log } = deps;
  const app = express();

  app.use(express.json({ limit: '64kb' }));

  // CORS support for frontend integration
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.get('/healthz', async (_req, res) => {
    let store = 'ok';
    if (deps.store.healthCheck) {
      store = (await deps.store.healthCheck()) ? 'ok' : 'degraded';
    }
    res.status(200).json({ ok: true, store });
  });

  if (metricsEnabled()) {
    app.get('/metrics', async (_req, res) => {
      res.setHeader('Content-Type', 'text/plain; version=0.0.4');
      res.send(await getPrometheusText());
    });
  }

  app.use('/', router(log, { orchestrator: deps.orchestrator, store: deps.store }));

  // Malformed JSON bodies from express.json()
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'invalid_json', reply_text: 'Please send a valid JSON body.' });
      return;
    }
    next(err);
  });

  return app;
}
