// Failure kinds surfaced by the client and the orchestrator
export type DiigoError =
  | { kind: 'ValidationError'; message: string }
  | { kind: 'AuthenticationError'; message: string; status: 401; body: string }
  | { kind: 'ForbiddenError'; message: string; status: 403; body: string }
  | { kind: 'NotFoundError'; message: string; status?: 404; body?: string }
  | {
      kind: 'TransientServiceError';
      message: string;
      attempts: number;
      reason: 'bad_request' | 'server_busy' | 'timeout' | 'max_retries';
      status?: number;
      body?: string;
    }
  | { kind: 'TransportError'; message: string; cause: string }
  | { kind: 'UnexpectedStatusError'; message: string; status: number; body: string };

export type DiigoErrorKind = DiigoError['kind'];

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DiigoError };

export function ok<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: DiigoError): OperationResult<T> {
  return { ok: false, error };
}

export function validationError(message: string): DiigoError {
  return { kind: 'ValidationError', message };
}

export function notFoundError(message: string): DiigoError {
  return { kind: 'NotFoundError', message };
}

export function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
