/**
 * Pipeline Backend
 *
 * A BackendHandler built from named async stages run in order. Each stage
 * receives the previous stage's output; the last one must yield either a
 * string or `{ content, confidence }`. A failing stage ends the run with a
 * `success: false` result listing the stages that completed.
 */

import { z } from 'zod';
import type {
  BackendHandler,
  BackendStatus,
  BridgeRequest,
  BridgeResult,
} from '@resilient-bridge/types';

export interface PipelineStage {
  readonly name: string;
  run(input: unknown, request: BridgeRequest, signal?: AbortSignal): Promise<unknown>;
}

export interface PipelineBackendOptions {
  id: string;
  stages: PipelineStage[];
  /** Confidence reported when the last stage returns a bare string */
  defaultConfidence?: number;
  now?: () => number;
}

export interface PipelineMetrics {
  [key: string]: unknown;
  pipelineId: string;
  status: BackendStatus;
  messagesProcessed: number;
  failures: number;
  /** Running average in ms */
  avgResponseTime: number;
  successRate: number;
  stageUsage: Record<string, number>;
}

const StageOutputSchema = z.union([
  z.string().transform(content => ({ content, confidence: undefined })),
  z.object({
    content: z.string(),
    confidence: z.number().min(0).max(1).optional(),
  }),
]);

export class PipelineBackend implements BackendHandler {
  private state: BackendStatus = 'initializing';
  private messagesProcessed: number = 0;
  private successes: number = 0;
  private avgResponseTime: number = 0;
  private readonly stageUsage: Map<string, number> = new Map();
  private readonly now: () => number;

  constructor(private readonly options: PipelineBackendOptions) {
    if (options.stages.length === 0) {
      throw new Error(`Pipeline '${options.id}' needs at least one stage`);
    }
    for (const stage of options.stages) {
      this.stageUsage.set(stage.name, 0);
    }
    this.now = options.now ?? Date.now;
    this.state = 'ready';
  }

  async handle(request: BridgeRequest, signal?: AbortSignal): Promise<BridgeResult> {
    const start = this.now();
    const stagesInvoked: string[] = [];
    this.state = 'processing';

    try {
      let value: unknown = request.content;
      for (const stage of this.options.stages) {
        signal?.throwIfAborted();
        this.stageUsage.set(stage.name, (this.stageUsage.get(stage.name) ?? 0) + 1);
        value = await stage.run(value, request, signal);
        stagesInvoked.push(stage.name);
      }

      const output = StageOutputSchema.parse(value);
      const processingTime = this.now() - start;
      this.updateMetrics(processingTime, true);
      this.state = 'ready';

      return {
        content: output.content,
        confidence: output.confidence ?? this.options.defaultConfidence ?? 1,
        processingTime,
        stagesInvoked,
        success: true,
      };
    } catch (error) {
      const processingTime = this.now() - start;
      this.updateMetrics(processingTime, false);
      this.state = 'error';

      return {
        content: `I apologize, but I encountered an error: ${error instanceof Error ? error.message : String(error)}`,
        confidence: 0,
        processingTime,
        stagesInvoked,
        success: false,
      };
    }
  }

  status(): BackendStatus {
    return this.state;
  }

  getMetrics(): PipelineMetrics {
    return {
      pipelineId: this.options.id,
      status: this.state,
      messagesProcessed: this.messagesProcessed,
      failures: this.messagesProcessed - this.successes,
      avgResponseTime: this.avgResponseTime,
      successRate: this.messagesProcessed > 0 ? this.successes / this.messagesProcessed : 0,
      stageUsage: Object.fromEntries(this.stageUsage),
    };
  }

  private updateMetrics(processingTime: number, success: boolean): void {
    this.messagesProcessed++;
    if (success) {
      this.successes++;
    }
    const count = this.messagesProcessed;
    this.avgResponseTime = (this.avgResponseTime * (count - 1) + processingTime) / count;
  }
}
