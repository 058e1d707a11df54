/**
 * Resilience Module
 *
 * Admission control and fault isolation for backend calls:
 * - Token Bucket: Immediate admit/reject against a refilling budget
 * - Circuit Breaker: Fails fast while the backend is unhealthy
 *
 * Usage:
 * ```typescript
 * import { CircuitBreaker, TokenBucketLimiter } from '@resilient-bridge/core';
 *
 * const limiter = new TokenBucketLimiter({
 *   name: 'classifier',
 *   capacity: 1000,
 *   refillRate: 100,
 * });
 * if (!limiter.tryAcquire()) {
 *   // reject
 * }
 *
 * const breaker = new CircuitBreaker({
 *   name: 'classifier',
 *   failureThreshold: 5,
 *   resetTimeout: 60000,
 *   callTimeout: 10000,
 * });
 * const result = await breaker.execute((signal) => classify(text, signal));
 * ```
 */

export {
  CircuitBreaker,
  CircuitState,
  MAX_CALL_TIMEOUT_MS,
  type CircuitBreakerOptions,
  type CircuitBreakerMetric,
  type GuardedOperation,
} from './circuit-breaker';

export {
  TokenBucketLimiter,
  type TokenBucketOptions,
  type RateLimitInfo,
} from './rate-limiter';
