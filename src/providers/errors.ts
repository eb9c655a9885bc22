/**
 * Provider Errors
 *
 * Standard error taxonomy shared by the external clients (LLM, transcriber,
 * ticket tracker, wiki). The pipeline and the retry policy only look at `type`.
 */

import { APICallError } from 'ai';

// ============================================================
// ERROR TYPES
// ============================================================

export type ProviderErrorType =
  | 'CONFIGURATION_ERROR' // Missing credentials or settings (never retried)
  | 'AUTH_ERROR' // 401/403 from the remote service (never retried)
  | 'NOT_FOUND' // Resource does not exist
  | 'REQUEST_ERROR' // Rejected request (4xx other than auth)
  | 'TRANSIENT_ERROR'; // Network failure, timeout, 408/429/5xx (retry possible)

export type ProviderName = 'llm' | 'transcriber' | 'tracker' | 'wiki';

export class ProviderError extends Error {
  public override readonly cause?: Error;
  /** HTTP status, when the failure came from a response */
  public readonly status?: number;

  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly provider: ProviderName,
    options: { status?: number; cause?: Error } = {}
  ) {
    super(message);
    this.name = 'ProviderError';
    this.status = options.status;
    this.cause = options.cause;
  }

  /**
   * Whether this error is retryable (transient failures).
   */
  get retryable(): boolean {
    return this.type === 'TRANSIENT_ERROR';
  }
}

// ============================================================
// CLASSIFICATION
// ============================================================

/**
 * Map an HTTP status code to a ProviderErrorType.
 */
export function classifyHttpStatus(status: number): ProviderErrorType {
  if (status === 401 || status === 403) return 'AUTH_ERROR';
  if (status === 404) return 'NOT_FOUND';
  if (status === 408 || status === 429 || status >= 500) return 'TRANSIENT_ERROR';
  return 'REQUEST_ERROR';
}

/**
 * Wrap a thrown fetch failure (DNS, connection reset, abort) as transient.
 */
export function networkError(
  provider: ProviderName,
  operation: string,
  error: unknown
): ProviderError {
  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(`${operation} failed: ${message}`, 'TRANSIENT_ERROR', provider, {
    cause
  });
}

/**
 * Wrap a failure from an AI SDK call. API errors are classified by their
 * status; anything else the SDK throws (network, timeouts) is transient.
 */
export function sdkError(provider: ProviderName, operation: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    const type = status === undefined ? 'TRANSIENT_ERROR' : classifyHttpStatus(status);
    return new ProviderError(`${operation} failed: ${error.message}`, type, provider, {
      status,
      cause: error
    });
  }
  return networkError(provider, operation, error);
}

/**
 * Whether an arbitrary error is worth retrying.
 * Provider errors decide by type; anything else (SDK/network errors) is retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) return error.retryable;
  return true;
}

/**
 * Missing credentials or rejected credentials. The service is unusable for
 * the rest of the run, so callers skip it instead of failing.
 */
export function isConfigurationError(error: unknown): error is ProviderError {
  return (
    error instanceof ProviderError &&
    (error.type === 'CONFIGURATION_ERROR' || error.type === 'AUTH_ERROR')
  );
}

/** Render any thrown value as a single-line message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
