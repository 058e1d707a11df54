/**
 * Circuit Breaker Pattern Implementation
 *
 * Prevents cascading failures by wrapping calls to a backend with a
 * breaker that trips when consecutive failures reach a threshold.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Circuit tripped, requests fail immediately
 * - HALF_OPEN: A single trial call is probing whether the backend recovered
 */

import { BackendTimeoutError, CircuitBreakerError, InvalidConfigurationError } from '../errors';
import type { StructuredLogger } from '../observability/structured-logger';

/** Longest delay a Node timer honours; larger values fire after 1 ms */
export const MAX_CALL_TIMEOUT_MS = 2_147_483_647;

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open',
}

export interface CircuitBreakerOptions {
  /** Name of the circuit breaker for logging */
  name: string;
  /** Consecutive failures before opening the circuit */
  failureThreshold: number;
  /** Time in ms after the last failure before a trial call is allowed */
  resetTimeout: number;
  /** Timeout for individual calls in ms */
  callTimeout: number;
  /** Clock source, epoch ms */
  now?: () => number;
  logger?: StructuredLogger;
  /** Optional callback when state changes */
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  /** Optional callback for metrics */
  onMetric?: (metric: CircuitBreakerMetric) => void;
}

export interface CircuitBreakerMetric {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  rejectedCalls: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
}

export type GuardedOperation<T> = (signal: AbortSignal) => Promise<T>;

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount: number = 0;
  private lastFailureTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private trialInFlight: boolean = false;
  private totalCalls: number = 0;
  private successfulCalls: number = 0;
  private failedCalls: number = 0;
  private rejectedCalls: number = 0;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    const issues: string[] = [];
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      issues.push(`failureThreshold must be a positive integer, got ${options.failureThreshold}`);
    }
    if (!Number.isFinite(options.resetTimeout) || options.resetTimeout < 0) {
      issues.push(`resetTimeout must be non-negative, got ${options.resetTimeout}`);
    }
    if (!Number.isFinite(options.callTimeout) || options.callTimeout <= 0 || options.callTimeout > MAX_CALL_TIMEOUT_MS) {
      issues.push(`callTimeout must be between 1 and ${MAX_CALL_TIMEOUT_MS} ms, got ${options.callTimeout}`);
    }
    if (issues.length > 0) {
      throw new InvalidConfigurationError(`Circuit breaker '${options.name}' misconfigured`, issues);
    }
    this.now = options.now ?? Date.now;
  }

  /**
   * Execute an operation through the circuit breaker.
   * Rejects with CircuitBreakerError without invoking the operation while
   * the circuit is open or a half-open trial is already running.
   */
  async execute<T>(fn: GuardedOperation<T>): Promise<T> {
    this.totalCalls++;
    const isTrial = this.admit();

    try {
      const result = await this.executeWithTimeout(fn);
      this.onSuccess(isTrial);
      return result;
    } catch (error) {
      this.onFailure(isTrial, error);
      throw error;
    } finally {
      if (isTrial) {
        this.trialInFlight = false;
      }
    }
  }

  /**
   * Decide whether a call may proceed. Returns true when the call is the
   * half-open trial, throws when it must be rejected.
   */
  private admit(): boolean {
    if (this.state === CircuitState.CLOSED) {
      return false;
    }

    if (this.state === CircuitState.OPEN) {
      const elapsed = this.now() - (this.lastFailureTime ?? 0);
      if (elapsed < this.options.resetTimeout) {
        this.reject(`Circuit breaker '${this.options.name}' is OPEN. Request rejected.`);
      }
      this.transitionTo(CircuitState.HALF_OPEN);
    } else if (this.trialInFlight) {
      this.reject(`Circuit breaker '${this.options.name}' is HALF_OPEN with a trial in flight. Request rejected.`);
    }

    this.trialInFlight = true;
    return true;
  }

  private reject(message: string): never {
    this.rejectedCalls++;
    this.emitMetric();
    throw new CircuitBreakerError(message);
  }

  /**
   * Execute function with timeout; the operation's signal aborts on expiry
   */
  private async executeWithTimeout<T>(fn: GuardedOperation<T>): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new BackendTimeoutError(
          `Circuit breaker '${this.options.name}' call timed out after ${this.options.callTimeout}ms`,
          this.options.callTimeout
        ));
      }, this.options.callTimeout);

      let pending: Promise<T>;
      try {
        pending = fn(controller.signal);
      } catch (error) {
        clearTimeout(timer);
        reject(error);
        return;
      }

      pending
        .then((result) => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  /**
   * Handle successful call
   */
  private onSuccess(isTrial: boolean): void {
    this.successfulCalls++;
    this.lastSuccessTime = this.now();

    if (isTrial) {
      this.transitionTo(CircuitState.CLOSED);
    } else if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }

    this.emitMetric();
  }

  /**
   * Handle failed call. Outcomes of calls admitted before the circuit
   * opened only count towards statistics.
   */
  private onFailure(isTrial: boolean, error: unknown): void {
    this.failedCalls++;

    if (isTrial || this.state === CircuitState.CLOSED) {
      this.failureCount++;
      this.lastFailureTime = this.now();

      if (isTrial || this.failureCount >= this.options.failureThreshold) {
        this.transitionTo(CircuitState.OPEN);
        this.options.logger?.error(`Circuit breaker '${this.options.name}' opened`, error instanceof Error ? error : undefined, {
          consecutiveFailures: this.failureCount,
        });
      }
    }

    this.emitMetric();
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    if (oldState === newState) return;

    this.state = newState;
    if (newState === CircuitState.CLOSED) {
      this.failureCount = 0;
    }

    this.options.logger?.info(`Circuit breaker '${this.options.name}' ${oldState} -> ${newState}`);
    this.options.onStateChange?.(oldState, newState);
  }

  private emitMetric(): void {
    this.options.onMetric?.(this.getMetrics());
  }

  getState(): CircuitState {
    return this.state;
  }

  getMetrics(): CircuitBreakerMetric {
    return {
      name: this.options.name,
      state: this.state,
      consecutiveFailures: this.failureCount,
      totalCalls: this.totalCalls,
      successfulCalls: this.successfulCalls,
      failedCalls: this.failedCalls,
      rejectedCalls: this.rejectedCalls,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
    };
  }

  /**
   * Reset the circuit breaker
   */
  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.trialInFlight = false;
    this.totalCalls = 0;
    this.successfulCalls = 0;
    this.failedCalls = 0;
    this.rejectedCalls = 0;
    this.lastFailureTime = null;
    this.lastSuccessTime = null;
  }
}
