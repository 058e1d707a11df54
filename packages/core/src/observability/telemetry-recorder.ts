/**
 * Telemetry Recorder
 *
 * Buffers named samples and hands them to a sink once the buffer reaches
 * the flush size. Also keeps the aggregate request counters behind the
 * metrics façade. Recording never throws: a failing sink loses the batch.
 */

import { InvalidConfigurationError } from '../errors';
import type { StructuredLogger } from './structured-logger';

export type TelemetryLabels = Record<string, string>;

export interface TelemetrySample {
  readonly name: string;
  readonly value: number;
  /** Epoch ms */
  readonly timestamp: number;
  readonly labels: Readonly<TelemetryLabels>;
}

export type TelemetrySink = (samples: readonly TelemetrySample[]) => void;

export interface TelemetryRecorderOptions {
  /** Buffered samples that trigger a flush */
  flushSize: number;
  /** Receives each flushed batch; defaults to a debug log line */
  sink?: TelemetrySink;
  now?: () => number;
  logger?: StructuredLogger;
}

export interface TelemetrySnapshot {
  readonly requestCount: number;
  readonly errorCount: number;
  readonly cacheHits: number;
  /** Sum of request latencies in ms */
  readonly totalLatency: number;
  /** Running average latency in ms */
  readonly avgLatency: number;
  readonly errorRate: number;
  readonly bufferedSamples: number;
  readonly flushedSamples: number;
  readonly droppedSamples: number;
}

export class TelemetryRecorder {
  private buffer: TelemetrySample[] = [];
  private requestCount: number = 0;
  private errorCount: number = 0;
  private cacheHits: number = 0;
  private totalLatency: number = 0;
  private avgLatency: number = 0;
  private flushedSamples: number = 0;
  private droppedSamples: number = 0;
  private readonly now: () => number;
  private readonly sink: TelemetrySink;

  constructor(private readonly options: TelemetryRecorderOptions) {
    if (!Number.isInteger(options.flushSize) || options.flushSize < 1) {
      throw new InvalidConfigurationError('Telemetry recorder misconfigured', [
        `flushSize must be a positive integer, got ${options.flushSize}`,
      ]);
    }
    this.now = options.now ?? Date.now;
    this.sink = options.sink ?? ((samples) => {
      this.options.logger?.debug(`Flushing ${samples.length} metrics`, {
        metrics: samples.map(s => s.name),
      });
    });
  }

  /**
   * Append a sample, flushing when the buffer is full
   */
  record(name: string, value: number, labels: TelemetryLabels = {}): void {
    this.buffer.push({ name, value, timestamp: this.now(), labels: { ...labels } });
    this.flushIfDue();
  }

  /**
   * Account one finished request in the aggregate counters.
   * The average is maintained incrementally.
   */
  recordRequest(latencyMs: number, success: boolean, cacheHit: boolean = false): void {
    this.requestCount++;
    if (!success) {
      this.errorCount++;
    }
    if (cacheHit) {
      this.cacheHits++;
    }
    this.totalLatency += latencyMs;
    this.avgLatency = (this.avgLatency * (this.requestCount - 1) + latencyMs) / this.requestCount;
  }

  /**
   * Flush if the buffer has reached the flush size
   */
  flushIfDue(): boolean {
    if (this.buffer.length < this.options.flushSize) {
      return false;
    }
    this.flush();
    return true;
  }

  /**
   * Hand the buffer to the sink and clear it
   */
  flush(): number {
    if (this.buffer.length === 0) {
      return 0;
    }

    const batch = this.buffer;
    this.buffer = [];

    try {
      this.sink(batch);
      this.flushedSamples += batch.length;
    } catch (error) {
      this.droppedSamples += batch.length;
      this.options.logger?.warn('Telemetry sink failed; batch dropped', {
        dropped: batch.length,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    return batch.length;
  }

  /**
   * Samples waiting for the next flush
   */
  pending(): readonly TelemetrySample[] {
    return [...this.buffer];
  }

  snapshot(): TelemetrySnapshot {
    return Object.freeze({
      requestCount: this.requestCount,
      errorCount: this.errorCount,
      cacheHits: this.cacheHits,
      totalLatency: this.totalLatency,
      avgLatency: this.avgLatency,
      errorRate: this.errorCount / Math.max(this.requestCount, 1),
      bufferedSamples: this.buffer.length,
      flushedSamples: this.flushedSamples,
      droppedSamples: this.droppedSamples,
    });
  }
}
