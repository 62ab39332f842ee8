/** Error taxonomy for adapters, engines and the store */
export class MonitorError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeout, connection reset, 5xx or rate limit; retried with backoff */
export class TransientTransportError extends MonitorError {
  constructor(
    message: string,
    source: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, source, options);
  }
}

/** 4xx other than 429, malformed URL; surfaced without retry */
export class PermanentTransportError extends MonitorError {
  constructor(
    message: string,
    source: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, source, options);
  }
}

/** Unexpected payload shape; scoped to one payload or row */
export class ParseError extends MonitorError {}

/** Storage unavailable or transaction failed; the batch rolled back */
export class PersistenceError extends MonitorError {}

export type FetchError =
  | TransientTransportError
  | PermanentTransportError
  | ParseError;

export function isFetchError(e: unknown): e is FetchError {
  return (
    e instanceof TransientTransportError ||
    e instanceof PermanentTransportError ||
    e instanceof ParseError
  );
}
