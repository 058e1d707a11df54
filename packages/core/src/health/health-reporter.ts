/**
 * Health & Metrics Reporter
 *
 * Read-only façade over a bridge's accumulated state, backing the
 * operational /health and /metrics endpoints. It never mutates the
 * components it reports on.
 */

import type { BackendStatus } from '@resilient-bridge/types';
import { CircuitState } from '../resilience/circuit-breaker';
import type { BridgeStateSource } from '../bridge/resilient-bridge';

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
}

export interface BridgeMetrics {
  requestsTotal: number;
  errorsTotal: number;
  errorRate: number;
  /** Running average latency in ms */
  avgLatency: number;
  cacheHits: number;
  cacheSize: number;
  breakerState: CircuitState;
  admissionTokens: number;
  backendMetrics: Record<string, unknown>;
}

export interface BridgeHealth {
  status: HealthStatus;
  timestamp: string;
  components: {
    backend: BackendStatus | 'unknown';
    circuitBreaker: CircuitState;
    cache: HealthStatus;
    admission: HealthStatus;
    telemetry: HealthStatus;
  };
  metrics: BridgeMetrics;
}

export class BridgeHealthReporter {
  constructor(
    private readonly source: BridgeStateSource,
    private readonly now: () => number = Date.now
  ) {}

  metrics(): BridgeMetrics {
    const state = this.source.inspect();
    return {
      requestsTotal: state.telemetry.requestCount,
      errorsTotal: state.telemetry.errorCount,
      errorRate: state.telemetry.errorRate,
      avgLatency: state.telemetry.avgLatency,
      cacheHits: state.telemetry.cacheHits,
      cacheSize: state.cache.size,
      breakerState: state.breakerState,
      admissionTokens: state.admissionTokens,
      backendMetrics: state.backendMetrics,
    };
  }

  /**
   * Degraded exactly when the breaker is open
   */
  health(): BridgeHealth {
    const state = this.source.inspect();
    const status = state.breakerState === CircuitState.OPEN
      ? HealthStatus.DEGRADED
      : HealthStatus.HEALTHY;

    return {
      status,
      timestamp: new Date(this.now()).toISOString(),
      components: {
        backend: state.backendStatus,
        circuitBreaker: state.breakerState,
        cache: HealthStatus.HEALTHY,
        admission: HealthStatus.HEALTHY,
        telemetry: state.telemetry.droppedSamples > 0 ? HealthStatus.DEGRADED : HealthStatus.HEALTHY,
      },
      metrics: this.metrics(),
    };
  }
}
