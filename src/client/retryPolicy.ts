import { DiigoError } from './errors.js';

export interface RetryPolicy {
  maxRetries: number;            // total attempts, including the first
  backoffBase: number;           // wait before retry n+1 is backoffBase ** n seconds
}

// What one HTTP attempt produced
export type AttemptOutcome =
  | { type: 'success'; payload: unknown }
  | { type: 'status'; status: number; body: string }
  | { type: 'timeout' }
  | { type: 'transport'; cause: string };

export type RetryState =
  | { state: 'attempting'; attempt: number; delaySeconds: number }
  | { state: 'succeeded'; payload: unknown }
  | { state: 'failedTerminal'; error: DiigoError }
  | { state: 'failedTransientExhausted'; error: DiigoError };

type TransientReason = 'bad_request' | 'server_busy' | 'timeout';

export type Classification =
  | { type: 'success'; payload: unknown }
  | { type: 'transient'; reason: TransientReason; status?: number; body?: string }
  | { type: 'terminal'; error: DiigoError };

/**
 * Sort an attempt outcome into success / transient / terminal.
 *
 * 400 and 503 are transient (Diigo answers 400 when rate limited), as is a timeout.
 * 401, 403, 404, every other status and any non-timeout transport fault are terminal.
 */
export function classifyOutcome(outcome: AttemptOutcome): Classification {
  switch (outcome.type) {
    case 'success':
      return { type: 'success', payload: outcome.payload };
    case 'timeout':
      return { type: 'transient', reason: 'timeout' };
    case 'transport':
      return {
        type: 'terminal',
        error: {
          kind: 'TransportError',
          message: `Request failed: ${outcome.cause}`,
          cause: outcome.cause
        }
      };
    case 'status':
      return classifyStatus(outcome.status, outcome.body);
  }
}

function classifyStatus(status: number, body: string): Classification {
  switch (status) {
    case 400:
      return { type: 'transient', reason: 'bad_request', status, body };
    case 503:
      return { type: 'transient', reason: 'server_busy', status, body };
    case 401:
      return {
        type: 'terminal',
        error: { kind: 'AuthenticationError', message: `Authentication failed: ${body}`, status, body }
      };
    case 403:
      return {
        type: 'terminal',
        error: { kind: 'ForbiddenError', message: `Access forbidden: ${body}`, status, body }
      };
    case 404:
      return {
        type: 'terminal',
        error: { kind: 'NotFoundError', message: `Resource not found: ${body}`, status, body }
      };
    default:
      return {
        type: 'terminal',
        error: { kind: 'UnexpectedStatusError', message: `HTTP ${status}: ${body}`, status, body }
      };
  }
}

function exhaustedMessage(reason: TransientReason, attempts: number, body: string): string {
  switch (reason) {
    case 'bad_request':
      return `Request failed after ${attempts} attempts: ${body}`;
    case 'server_busy':
      return `Server busy after ${attempts} attempts: ${body}`;
    case 'timeout':
      return `Request timeout after ${attempts} attempts`;
  }
}

export function backoffSeconds(policy: RetryPolicy, attemptIndex: number): number {
  return policy.backoffBase ** attemptIndex;
}

/**
 * Starting state. With no attempts allowed the loop never runs and yields the generic fallback.
 */
export function initialState(policy: RetryPolicy): RetryState {
  if (policy.maxRetries < 1) {
    return {
      state: 'failedTransientExhausted',
      error: {
        kind: 'TransientServiceError',
        message: 'Max retries exceeded',
        attempts: 0,
        reason: 'max_retries'
      }
    };
  }
  return { state: 'attempting', attempt: 0, delaySeconds: 0 };
}

/**
 * Next state after the attempt at `attempt` produced `outcome`
 */
export function transition(attempt: number, outcome: AttemptOutcome, policy: RetryPolicy): RetryState {
  const classification = classifyOutcome(outcome);

  if (classification.type === 'success') {
    return { state: 'succeeded', payload: classification.payload };
  }
  if (classification.type === 'terminal') {
    return { state: 'failedTerminal', error: classification.error };
  }

  if (attempt < policy.maxRetries - 1) {
    return {
      state: 'attempting',
      attempt: attempt + 1,
      delaySeconds: backoffSeconds(policy, attempt)
    };
  }

  return {
    state: 'failedTransientExhausted',
    error: {
      kind: 'TransientServiceError',
      message: exhaustedMessage(classification.reason, policy.maxRetries, classification.body ?? ''),
      attempts: policy.maxRetries,
      reason: classification.reason,
      status: classification.status,
      body: classification.body
    }
  };
}
