/** Details attached to a failed remote call. */
export interface DispatchErrorOptions {
  /** HTTP status returned by the remote API, when there was a response. */
  readonly status?: number;
  /** Index of the batch whose call failed. */
  readonly batchIndex?: number;
  readonly cause?: unknown;
}

/** Base class for failures of a single batch call. */
export abstract class DispatchError extends Error {
  readonly status: number | undefined;
  readonly batchIndex: number | undefined;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: DispatchErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.status = options?.status;
    this.batchIndex = options?.batchIndex;
  }
}

/**
 * Transient failure (HTTP 429, 5xx, connection fault, timeout). The same batch
 * is sent again with exponential backoff until the attempt limit is reached.
 */
export class RetryableDispatchError extends DispatchError {
  readonly retryable = true;
}

/** Non-recoverable failure. Aborts the round and the invocation without a retry. */
export class FatalDispatchError extends DispatchError {
  readonly retryable = false;
}
