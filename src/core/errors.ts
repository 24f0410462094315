import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';

export interface StandardError {
  code: string;
  message: string;
  details?: unknown;
  causeId?: string;
}

/** Non-2xx answer from an LLM or moderation provider. */
export class ProviderHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly provider: string,
  ) {
    super(message);
    this.name = 'ProviderHttpError';
  }
}

/** Provider answered, but not with something we can use. */
export class MalformedResponseError extends Error {
  constructor(message: string, public readonly provider: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export class ExtractionError extends Error {
  constructor(
    public readonly kind: 'TIMEOUT' | 'PROVIDER_ERROR' | 'MALFORMED',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export class ModerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModerationError';
  }
}

/** Two conflicting saves in a row for the same session. */
export class SessionBusyError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} is busy`);
    this.name = 'SessionBusyError';
  }
}

export class SessionStoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionStoreUnavailableError';
  }
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof TaskCancelledError) return true;
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Maps provider and store failures to the standard error shape used in logs and
 * API bodies. Messages are safe to show; raw provider text stays in `details`.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error instanceof SessionBusyError) {
    return {
      code: 'session_busy',
      message: 'This conversation is being updated. Please try again.',
      causeId: ctx,
    };
  }

  if (error instanceof SessionStoreUnavailableError) {
    return {
      code: 'service_unavailable',
      message: 'Conversation storage is unavailable',
      details: error.cause instanceof Error ? error.cause.message : undefined,
      causeId: ctx,
    };
  }

  if (error instanceof ProviderHttpError) {
    if (error.status === 401 || error.status === 403) {
      return { code: 'auth_error', message: 'Authentication failed', details: { status: error.status }, causeId: ctx };
    }
    if (error.status === 429) {
      return { code: 'rate_limit', message: 'Rate limit exceeded', details: { status: error.status }, causeId: ctx };
    }
    return {
      code: error.status >= 500 ? 'server_error' : 'provider_error',
      message: 'Provider request failed',
      details: { status: error.status, provider: error.provider },
      causeId: ctx,
    };
  }

  if (error instanceof BrokenCircuitError) {
    return { code: 'circuit_open', message: 'Provider temporarily disabled', causeId: ctx };
  }

  if (isTimeoutError(error)) {
    return { code: 'timeout', message: 'Request timeout', causeId: ctx };
  }

  if (error instanceof MalformedResponseError) {
    return { code: 'malformed_response', message: 'Provider returned an unusable response', causeId: ctx };
  }

  if (error instanceof Error) {
    return { code: 'internal_error', message: error.message, causeId: ctx };
  }

  return {
    code: 'unknown_error',
    message: 'Unknown error occurred',
    details: error,
    causeId: ctx,
  };
}
