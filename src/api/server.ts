import 'dotenv/config';
import { createRuntime } from '../runtime.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger();
const runtime = createRuntime(log);
const app = createApp({ orchestrator: runtime.orchestrator, store: runtime.store, log });

const port = Number(process.env.PORT ?? 3000);
const server = app.listen(port, () => log.info({ port }, 'HTTP server started'));

function shutdown(signal: string) {
  log.info({ signal }, 'shutting down');
  server.close(() => {
    runtime
      .close()
      .catch((err: unknown) => log.error({ err }, 'session store close failed'))
      .finally(() => process.exit(0));
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
