import { describe, it, expect } from '@jest/globals';
import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';
import {
  MalformedResponseError,
  ProviderHttpError,
  SessionBusyError,
  SessionStoreUnavailableError,
  isTimeoutError,
  toStdError,
} from '../../../src/core/errors.js';

describe('toStdError', () => {
  it('should give a user-safe message for a busy session', () => {
    expect(toStdError(new SessionBusyError('s1'), 'chat')).toEqual({
      code: 'session_busy',
      message: 'This conversation is being updated. Please try again.',
      causeId: 'chat',
    });
  });

  it('should keep the store failure cause in details', () => {
    const err = new SessionStoreUnavailableError('session store get failed', { cause: new Error('ECONNREFUSED') });
    expect(toStdError(err)).toMatchObject({ code: 'service_unavailable', details: 'ECONNREFUSED' });
  });

  it('should classify provider HTTP errors by status', () => {
    expect(toStdError(new ProviderHttpError('HTTP 401', 401, 'llm')).code).toBe('auth_error');
    expect(toStdError(new ProviderHttpError('HTTP 429', 429, 'llm')).code).toBe('rate_limit');
    expect(toStdError(new ProviderHttpError('HTTP 502', 502, 'llm')).code).toBe('server_error');
    expect(toStdError(new ProviderHttpError('HTTP 400', 400, 'llm')).code).toBe('provider_error');
  });

  it('should recognize resilience failures', () => {
    expect(toStdError(new BrokenCircuitError()).code).toBe('circuit_open');
    expect(toStdError(new TaskCancelledError()).code).toBe('timeout');
    expect(toStdError(new MalformedResponseError('empty completion', 'llm')).code).toBe('malformed_response');
  });

  it('should fall back to internal and unknown errors', () => {
    expect(toStdError(new Error('boom'))).toEqual({ code: 'internal_error', message: 'boom', causeId: undefined });
    expect(toStdError('boom').code).toBe('unknown_error');
  });
});

describe('isTimeoutError', () => {
  it('should accept abort and timeout errors by name', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(isTimeoutError(abort)).toBe(true);
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });
});
