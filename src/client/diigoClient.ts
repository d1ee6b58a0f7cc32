import { logger } from '../utils/logger.js';
import { sleepSeconds } from '../utils/index.js';
import { DiigoError, OperationResult, describeCause, fail, ok } from './errors.js';
import { AttemptOutcome, RetryPolicy, RetryState, initialState, transition } from './retryPolicy.js';

export type HttpMethod = 'GET' | 'POST';

export type QueryParams = Record<string, string | number | undefined>;

export type FormBody = Record<string, string>;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (seconds: number, signal?: AbortSignal) => Promise<void>;

export interface DiigoClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  apiKey: string;
  timeoutSeconds: number;
  maxRetries: number;
  backoffBase: number;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

const CLOSED_ERROR: DiigoError = {
  kind: 'TransportError',
  message: 'Request failed: client is closed',
  cause: 'client is closed'
};

/**
 * Authenticated client for the Diigo API v2.
 *
 * Every call carries Basic auth and the `key` query parameter. 400, 503 and timeouts are
 * retried with deterministic exponential backoff (backoffBase ** attempt seconds); every
 * other failure ends the call at once. `request` never throws: all outcomes come back as
 * an OperationResult.
 *
 * One instance serves one tool invocation. `close()` aborts anything in flight,
 * including a pending backoff wait.
 */
export class DiigoClient {
  private readonly controller = new AbortController();
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly policy: RetryPolicy;
  private readonly authHeader: string;

  constructor(private readonly options: DiigoClientOptions) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? sleepSeconds;
    this.policy = {
      maxRetries: options.maxRetries,
      backoffBase: options.backoffBase
    };
    const credentials = Buffer.from(`${options.username}:${options.password}`).toString('base64');
    this.authHeader = `Basic ${credentials}`;
  }

  get isClosed(): boolean {
    return this.controller.signal.aborted;
  }

  close(): void {
    if (!this.isClosed) {
      this.controller.abort();
    }
  }

  async request(
    method: HttpMethod,
    endpoint: string,
    params: QueryParams = {},
    body?: FormBody
  ): Promise<OperationResult<unknown>> {
    if (this.isClosed) {
      return fail(CLOSED_ERROR);
    }

    const url = this.buildUrl(endpoint, params);
    let state: RetryState = initialState(this.policy);

    while (state.state === 'attempting') {
      if (state.delaySeconds > 0) {
        logger.info(`Retrying in ${state.delaySeconds}s...`);
        try {
          await this.sleep(state.delaySeconds, this.controller.signal);
        } catch (error) {
          logger.warn(`Backoff interrupted: ${describeCause(error)}`);
          return fail(CLOSED_ERROR);
        }
      }

      const outcome = await this.attempt(method, url, body);
      this.logOutcome(outcome, state.attempt);
      state = transition(state.attempt, outcome, this.policy);
    }

    if (state.state === 'succeeded') {
      return ok(state.payload);
    }
    return fail(state.error);
  }

  private buildUrl(endpoint: string, params: QueryParams): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    const search = new URLSearchParams();
    for (const [name, value] of Object.entries(params)) {
      if (value !== undefined) {
        search.append(name, String(value));
      }
    }
    search.set('key', this.options.apiKey);
    return `${base}/${endpoint.replace(/^\/+/, '')}?${search.toString()}`;
  }

  private async attempt(method: HttpMethod, url: string, body?: FormBody): Promise<AttemptOutcome> {
    const attemptController = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      attemptController.abort();
    }, this.options.timeoutSeconds * 1000);
    const onClose = () => attemptController.abort();
    this.controller.signal.addEventListener('abort', onClose, { once: true });

    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: 'application/json'
    };
    let payload: string | undefined;
    if (body) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      payload = new URLSearchParams(body).toString();
    }

    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body: payload,
        signal: attemptController.signal
      });
      const text = await response.text();

      if (response.status === 200) {
        return { type: 'success', payload: parsePayload(text) };
      }
      return { type: 'status', status: response.status, body: text };
    } catch (error) {
      if (timedOut || isTimeoutError(error)) {
        return { type: 'timeout' };
      }
      return { type: 'transport', cause: describeCause(error) };
    } finally {
      clearTimeout(timer);
      this.controller.signal.removeEventListener('abort', onClose);
    }
  }

  private logOutcome(outcome: AttemptOutcome, attempt: number): void {
    const progress = `(attempt ${attempt + 1}/${this.policy.maxRetries})`;
    switch (outcome.type) {
      case 'success':
        return;
      case 'timeout':
        logger.error(`Request timeout ${progress}`);
        return;
      case 'transport':
        logger.error(`Request error: ${outcome.cause}`);
        return;
      case 'status':
        if (outcome.status === 400) {
          logger.warn(`400 error ${progress}: ${outcome.body}`);
        } else if (outcome.status === 503) {
          logger.warn(`503 server busy ${progress}`);
        } else {
          logger.warn(`HTTP ${outcome.status} ${progress}`);
        }
    }
  }
}

// Diigo sometimes answers 200 with plain text; keep it as a message instead of failing
function parsePayload(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    logger.warn(`Non-JSON response: ${text}`);
    return { message: text };
  }
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Run `fn` with a fresh client and always close it afterwards
 */
export async function withDiigoClient<T>(
  options: DiigoClientOptions,
  fn: (client: DiigoClient) => Promise<T>
): Promise<T> {
  const client = new DiigoClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
