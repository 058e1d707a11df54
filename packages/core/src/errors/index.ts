/**
 * Bridge Error Taxonomy
 *
 * Every failure the bridge can meet while serving a request maps onto one
 * of these classes. The bridge recovers all of them locally except
 * InvalidConfigurationError, which is thrown at construction time.
 */

import type { BridgeErrorCode } from '@resilient-bridge/types';

export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Admission budget exhausted
 */
export class AdmissionRejectedError extends BridgeError {
  readonly code = 'ADMISSION_REJECTED';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly availableTokens: number
  ) {
    super(message);
  }
}

/**
 * Backend presumed unhealthy; the call was not attempted
 */
export class CircuitBreakerError extends BridgeError {
  readonly code = 'BREAKER_OPEN';
  readonly retryable = true;
}

export class BackendFailureError extends BridgeError {
  readonly code = 'BACKEND_FAILURE';
  readonly retryable = false;
}

/**
 * The backend call timed out or was cancelled
 */
export class BackendTimeoutError extends BridgeError {
  readonly code = 'BACKEND_TIMEOUT';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
  }
}

export class InvalidConfigurationError extends BridgeError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/**
 * Normalise an unknown throwable into a BridgeError
 */
export function toBridgeError(error: unknown): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }
  if (error instanceof Error) {
    return new BackendFailureError(error.message, { cause: error });
  }
  return new BackendFailureError(String(error), { cause: error });
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}
