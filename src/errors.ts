/**
 * Error taxonomy for the storage layer.
 *
 * All three propagate to the caller unmodified; nothing in this package
 * retries or recovers from them.
 */

/**
 * Raised before any I/O when a credential, path or mode is missing or invalid.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when no record exists for the requested identifier.
 */
export class NotFoundError extends Error {
  readonly resultId: string;

  constructor(resultId: string, message = `No results found for ID: ${resultId}`) {
    super(message);
    this.name = 'NotFoundError';
    this.resultId = resultId;
  }
}

export interface PersistenceErrorOptions {
  /** HTTP status of a rejected remote request. */
  status?: number;
  /** Response body of a rejected remote request. */
  body?: string;
  cause?: Error;
}

/**
 * Raised when the medium (disk, network) rejects a read or write, or when a
 * record cannot be serialized or parsed.
 */
export class PersistenceError extends Error {
  readonly status: number | null;
  readonly body: string | null;

  constructor(message: string, opts?: PersistenceErrorOptions) {
    super(message, opts?.cause ? { cause: opts.cause } : undefined);
    this.name = 'PersistenceError';
    this.status = opts?.status ?? null;
    this.body = opts?.body ?? null;
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
