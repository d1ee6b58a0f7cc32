import { describe, it, expect } from 'vitest'
import { backoffSeconds, classifyOutcome, initialState, transition } from './retryPolicy.js'
import type { RetryPolicy } from './retryPolicy.js'

const policy: RetryPolicy = { maxRetries: 3, backoffBase: 2 }

describe('classifyOutcome', () => {
  it('should treat 400, 503 and timeouts as transient', () => {
    expect(classifyOutcome({ type: 'status', status: 400, body: 'slow down' })).toEqual({
      type: 'transient',
      reason: 'bad_request',
      status: 400,
      body: 'slow down',
    })
    expect(classifyOutcome({ type: 'status', status: 503, body: '' }).type).toBe('transient')
    expect(classifyOutcome({ type: 'timeout' })).toEqual({ type: 'transient', reason: 'timeout' })
  })

  it('should map terminal statuses to their error kinds', () => {
    const kindOf = (status: number) => {
      const result = classifyOutcome({ type: 'status', status, body: 'x' })
      return result.type === 'terminal' ? result.error.kind : result.type
    }
    expect(kindOf(401)).toBe('AuthenticationError')
    expect(kindOf(403)).toBe('ForbiddenError')
    expect(kindOf(404)).toBe('NotFoundError')
    expect(kindOf(500)).toBe('UnexpectedStatusError')
    expect(kindOf(201)).toBe('UnexpectedStatusError')
  })

  it('should keep the status and body in the message', () => {
    const result = classifyOutcome({ type: 'status', status: 502, body: 'bad gateway' })
    expect(result).toEqual({
      type: 'terminal',
      error: { kind: 'UnexpectedStatusError', message: 'HTTP 502: bad gateway', status: 502, body: 'bad gateway' },
    })
  })

  it('should treat non-timeout transport faults as terminal', () => {
    expect(classifyOutcome({ type: 'transport', cause: 'ECONNREFUSED' })).toEqual({
      type: 'terminal',
      error: { kind: 'TransportError', message: 'Request failed: ECONNREFUSED', cause: 'ECONNREFUSED' },
    })
  })
})

describe('backoffSeconds', () => {
  it('should be base to the power of the attempt index', () => {
    expect(backoffSeconds(policy, 0)).toBe(1)
    expect(backoffSeconds(policy, 1)).toBe(2)
    expect(backoffSeconds(policy, 2)).toBe(4)
    expect(backoffSeconds({ maxRetries: 3, backoffBase: 1.5 }, 2)).toBe(2.25)
  })
})

describe('initialState', () => {
  it('should start attempting at index 0 without delay', () => {
    expect(initialState(policy)).toEqual({ state: 'attempting', attempt: 0, delaySeconds: 0 })
  })

  it('should give up immediately when no attempts are allowed', () => {
    const state = initialState({ maxRetries: 0, backoffBase: 2 })
    expect(state.state).toBe('failedTransientExhausted')
    expect(state.state === 'failedTransientExhausted' && state.error.message).toBe('Max retries exceeded')
  })
})

describe('transition', () => {
  it('should succeed on a success outcome', () => {
    expect(transition(0, { type: 'success', payload: [1] }, policy)).toEqual({ state: 'succeeded', payload: [1] })
  })

  it('should schedule the next attempt with backoff on a transient outcome', () => {
    expect(transition(0, { type: 'status', status: 503, body: '' }, policy)).toEqual({
      state: 'attempting',
      attempt: 1,
      delaySeconds: 1,
    })
    expect(transition(1, { type: 'timeout' }, policy)).toEqual({
      state: 'attempting',
      attempt: 2,
      delaySeconds: 2,
    })
  })

  it('should stop on a terminal outcome regardless of attempts left', () => {
    const state = transition(0, { type: 'status', status: 401, body: 'bad key' }, policy)
    expect(state).toEqual({
      state: 'failedTerminal',
      error: { kind: 'AuthenticationError', message: 'Authentication failed: bad key', status: 401, body: 'bad key' },
    })
  })

  it('should report exhaustion on the last attempt', () => {
    expect(transition(2, { type: 'status', status: 400, body: 'rate limited' }, policy)).toEqual({
      state: 'failedTransientExhausted',
      error: {
        kind: 'TransientServiceError',
        message: 'Request failed after 3 attempts: rate limited',
        attempts: 3,
        reason: 'bad_request',
        status: 400,
        body: 'rate limited',
      },
    })
  })

  it('should use a server busy message for 503 exhaustion', () => {
    const state = transition(2, { type: 'status', status: 503, body: 'busy' }, policy)
    expect(state.state === 'failedTransientExhausted' && state.error.message).toBe('Server busy after 3 attempts: busy')
  })

  it('should cite the timeout rather than a body on timeout exhaustion', () => {
    const state = transition(2, { type: 'timeout' }, policy)
    expect(state.state === 'failedTransientExhausted' && state.error.message).toBe('Request timeout after 3 attempts')
  })
})
