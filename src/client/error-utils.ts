export type ClientError = Error & {
  status?: number;
  retryable?: boolean;
};

/** Raised when a stream is used in a state that no longer allows it (no body, consumed, disposed). */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

/** Classification reported for cancelled calls. */
export const CANCELLED_ERROR_TYPE = 'cancelled';
/** Classification for failures without a more specific kind. */
export const GENERIC_ERROR_TYPE = 'error';

const RE_CONN_REFUSED = /ECONNREFUSED|fetch failed/i;

export function makeClientError(msg: string, status?: number, retryable?: boolean): ClientError {
  const e: ClientError = new Error(msg);
  e.name = 'ClientError';
  e.status = status;
  e.retryable = retryable;
  return e;
}

export function isClientError(e: unknown): e is ClientError & { status: number } {
  return e instanceof Error && 'status' in e && typeof e.status === 'number';
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError');
}

export function isConnRefused(e: unknown): boolean {
  if (!(e instanceof Error)) return false;
  const cause = e.cause;
  if (cause instanceof Error && 'code' in cause && cause.code === 'ECONNREFUSED') return true;
  return RE_CONN_REFUSED.test(e.message);
}

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}

/**
 * Map a call outcome to the `error.type` telemetry value: cancellation is its
 * own class, service errors report their HTTP status, other errors their name.
 */
export function classifyError(error: unknown, cancelled = false): string {
  if (cancelled) return CANCELLED_ERROR_TYPE;
  if (isClientError(error)) return String(error.status);
  if (error instanceof InvalidStateError) return GENERIC_ERROR_TYPE;
  if (error instanceof Error && error.name) return error.name;
  return GENERIC_ERROR_TYPE;
}
