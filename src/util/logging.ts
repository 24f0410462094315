import pino from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with PII redaction unless LOG_LEVEL=debug.
 */
export function createLogger(): Logger {
  const level = process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  const log = pino({
    level,
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubPII(a, redactEnabled),
        );
        method.apply(this, scrubbed as Parameters<pino.LogFn>);
      },
    },
  });
  return log;
}
