/**
 * Resilient Bridge
 *
 * Wraps a BackendHandler with admission control, a result cache, a
 * circuit breaker and telemetry. Every request gets a BridgeResult;
 * failures come back as `success: false` results carrying an error code.
 *
 * Pipeline, short-circuiting on the first terminal condition:
 * ```
 * admission -> cache lookup -> breaker(backend) -> cache store -> telemetry
 * ```
 * Bookkeeping between the stages is synchronous, so the only suspension
 * point is the backend call and each component's state is touched by one
 * step at a time.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type {
  BackendHandler,
  BackendStatus,
  BridgeRequest,
  BridgeRequestInput,
  BridgeResult,
} from '@resilient-bridge/types';
import { resolveConfig, type BridgeConfig, type BridgeConfigInput } from '../config';
import {
  AdmissionRejectedError,
  BackendFailureError,
  toBridgeError,
  type BridgeError,
} from '../errors';
import { ResultCache, type CacheMetric } from '../cache/result-cache';
import { CircuitBreaker, type CircuitBreakerMetric, type CircuitState } from '../resilience/circuit-breaker';
import { TokenBucketLimiter } from '../resilience/rate-limiter';
import { createLogger, type StructuredLogger } from '../observability/structured-logger';
import {
  TelemetryRecorder,
  type TelemetrySink,
  type TelemetrySnapshot,
} from '../observability/telemetry-recorder';
import { cacheKeyFor, createRequest } from './request';

export interface ResilientBridgeOptions {
  backend: BackendHandler;
  /** Name used in logs and component names */
  name?: string;
  config?: BridgeConfigInput;
  logger?: StructuredLogger;
  /** Receives flushed telemetry batches */
  telemetrySink?: TelemetrySink;
  /** Clock source, epoch ms */
  now?: () => number;
}

/**
 * Read-only view of the bridge's accumulated state
 */
export interface BridgeStateView {
  breakerState: CircuitState;
  breaker: CircuitBreakerMetric;
  admissionTokens: number;
  cache: CacheMetric;
  telemetry: TelemetrySnapshot;
  backendMetrics: Record<string, unknown>;
  backendStatus: BackendStatus | 'unknown';
}

export interface BridgeStateSource {
  inspect(): BridgeStateView;
}

/**
 * Shape a backend result must have before it is trusted
 */
const BackendResultSchema = z.object({
  content: z.string(),
  confidence: z.number(),
  processingTime: z.number(),
  stagesInvoked: z.array(z.string()),
  success: z.boolean(),
});

const FAILURE_MESSAGES: Record<BridgeError['code'], string> = {
  ADMISSION_REJECTED: 'Rate limit exceeded - please retry shortly.',
  BREAKER_OPEN: 'The service is temporarily unavailable. Please try again later.',
  BACKEND_FAILURE: 'I apologize, but I encountered an error. Please try again.',
  BACKEND_TIMEOUT: 'The request took too long to process. Please try again.',
  INVALID_CONFIGURATION: 'The service is misconfigured.',
};

export class ResilientBridge implements BridgeStateSource {
  readonly name: string;
  readonly config: BridgeConfig;
  private readonly backend: BackendHandler;
  private readonly limiter: TokenBucketLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly cache: ResultCache<BridgeResult>;
  private readonly telemetry: TelemetryRecorder;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private initialized: boolean = false;

  constructor(options: ResilientBridgeOptions) {
    this.name = options.name ?? 'resilient-bridge';
    this.config = resolveConfig(options.config);
    this.backend = options.backend;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createLogger()).child({ component: this.name });

    this.limiter = new TokenBucketLimiter({
      name: `${this.name}:admission`,
      capacity: this.config.admission.capacity,
      refillRate: this.config.admission.refillRate,
      now: this.now,
      logger: this.logger,
    });
    this.breaker = new CircuitBreaker({
      name: `${this.name}:backend`,
      failureThreshold: this.config.breaker.failureThreshold,
      resetTimeout: this.config.breaker.resetTimeoutMs,
      callTimeout: this.config.breaker.callTimeoutMs,
      now: this.now,
      logger: this.logger,
    });
    this.cache = new ResultCache<BridgeResult>({
      ttl: this.config.cache.ttlMs,
      maxEntries: this.config.cache.maxEntries,
      now: this.now,
    });
    this.telemetry = new TelemetryRecorder({
      flushSize: this.config.telemetry.flushSize,
      sink: options.telemetrySink,
      now: this.now,
      logger: this.logger,
    });
  }

  /**
   * Mark the bridge ready. Optional; execute() works without it.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;
    this.logger.info('Resilient bridge initialized', {
      admission: this.config.admission,
      breaker: this.config.breaker,
      cache: this.config.cache,
    });
  }

  /**
   * Flush pending telemetry and drop cached results
   */
  async shutdown(): Promise<void> {
    this.telemetry.flush();
    this.cache.destroy();
    this.initialized = false;
    this.logger.info('Resilient bridge shut down');
  }

  /**
   * Build a request from raw input and execute it
   */
  async submit(input: BridgeRequestInput): Promise<BridgeResult> {
    return this.execute(createRequest(input, this.now));
  }

  /**
   * Process a request through admission, cache and breaker.
   * Never rejects.
   */
  async execute(request: BridgeRequest): Promise<BridgeResult> {
    const traceId = `trace-${uuidv4()}`;
    const log = this.logger.child({ traceId, requestId: request.id });
    const start = this.now();

    if (!this.limiter.tryAcquire()) {
      const error = new AdmissionRejectedError('Rate limit exceeded', this.limiter.availableTokens());
      this.telemetry.record('request_error', 1, { reason: error.code });
      return this.fail(error, start, traceId, [], log);
    }

    const cacheKey = cacheKeyFor(request, this.config.cache.scope);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.telemetry.record('cache_hit', 1);
      this.telemetry.recordRequest(this.elapsed(start), cached.success, true);
      log.debug('Cache hit', { cacheKey });
      return { ...cached, cached: true, traceId };
    }

    let backendStages: readonly string[] = [];
    let result: BridgeResult;
    try {
      result = await this.breaker.execute(async (signal) => {
        const parsed = BackendResultSchema.safeParse(await this.backend.handle(request, signal));
        if (!parsed.success) {
          const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
          throw new BackendFailureError(`Backend returned a malformed result (${issues.join('; ')})`);
        }
        const outcome = parsed.data;
        backendStages = outcome.stagesInvoked;
        if (!outcome.success) {
          throw new BackendFailureError(`Backend reported failure: ${outcome.content}`);
        }
        return outcome;
      });
    } catch (error) {
      const bridgeError = toBridgeError(error);
      this.telemetry.record('request_error', 1, { reason: bridgeError.code });
      const failed = this.fail(bridgeError, start, traceId, backendStages, log);
      this.telemetry.record('error_rate', this.telemetry.snapshot().errorRate);
      return failed;
    }

    const normalized: BridgeResult = {
      ...result,
      confidence: clampConfidence(result.confidence),
      stagesInvoked: [...result.stagesInvoked],
      traceId,
    };
    this.cache.put(cacheKey, normalized);

    const latency = this.elapsed(start);
    this.telemetry.recordRequest(latency, true);
    this.telemetry.record('request_success', 1);
    this.telemetry.record('response_time', latency);
    this.telemetry.record('confidence', normalized.confidence, {
      intent: normalized.content.slice(0, 20),
    });

    log.debug('Trace completed', {
      success: true,
      latencyMs: latency,
      stages: normalized.stagesInvoked,
    });

    return normalized;
  }

  inspect(): BridgeStateView {
    const breaker = this.breaker.getMetrics();
    return {
      breakerState: breaker.state,
      breaker,
      admissionTokens: this.limiter.availableTokens(),
      cache: this.cache.getMetrics(),
      telemetry: this.telemetry.snapshot(),
      backendMetrics: this.readBackendMetrics(),
      backendStatus: this.readBackendStatus(),
    };
  }

  /**
   * Force a telemetry flush regardless of buffer size
   */
  flushTelemetry(): number {
    return this.telemetry.flush();
  }

  private fail(
    error: BridgeError,
    start: number,
    traceId: string,
    stagesInvoked: readonly string[],
    log: StructuredLogger
  ): BridgeResult {
    const latency = this.elapsed(start);
    this.telemetry.recordRequest(latency, false);

    if (error instanceof AdmissionRejectedError) {
      log.warn('Request rejected by admission control', { availableTokens: error.availableTokens });
    } else {
      log.error('Error processing request', error, { code: error.code, latencyMs: latency });
    }

    return {
      content: FAILURE_MESSAGES[error.code],
      confidence: 0,
      processingTime: latency,
      stagesInvoked: [...stagesInvoked],
      success: false,
      errorCode: error.code,
      retryable: error.retryable,
      traceId,
    };
  }

  private readBackendMetrics(): Record<string, unknown> {
    if (!this.backend.getMetrics) {
      return {};
    }
    try {
      return { ...this.backend.getMetrics() };
    } catch (error) {
      this.logger.warn('Backend metrics unavailable', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private readBackendStatus(): BackendStatus | 'unknown' {
    if (!this.backend.status) {
      return 'unknown';
    }
    try {
      return this.backend.status();
    } catch (error) {
      this.logger.warn('Backend status unavailable', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return 'error';
    }
  }

  private elapsed(start: number): number {
    return Math.max(0, this.now() - start);
  }
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
