/**
 * @worker gateway
 * HTTP surface of the resilience bridge.
 *
 * Handles: message submission, health and metrics endpoints
 * Framework: Hono.js
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { ApiResponse, MessageResponse } from '@resilient-bridge/types';
import {
  BridgeHealthReporter,
  HealthStatus,
  type ResilientBridge,
  type StructuredLogger,
} from '@resilient-bridge/core';

type GatewayEnv = { Variables: { requestId: string } };

export interface GatewayOptions {
  bridge: ResilientBridge;
  logger: StructuredLogger;
  service?: string;
  version?: string;
  /** CORS origins; any origin when omitted */
  allowedOrigins?: string[];
  now?: () => number;
}

// ============================================================
// VALIDATION SCHEMAS
// ============================================================

const MessageSchema = z
  .object({
    message: z.string().min(1).optional(),
    content: z.string().min(1).optional(),
    user_id: z.string().min(1).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .refine(body => body.message !== undefined || body.content !== undefined, {
    message: 'message is required',
    path: ['message'],
  });

// ============================================================
// MIDDLEWARE
// ============================================================

/**
 * Assigns or propagates X-Request-ID and logs one line per request
 */
export function requestLogger(logger: StructuredLogger, now: () => number = Date.now): MiddlewareHandler<GatewayEnv> {
  return async (c, next) => {
    const start = now();
    const requestId = c.req.header('X-Request-ID') ?? uuidv4();
    c.set('requestId', requestId);
    c.header('X-Request-ID', requestId);

    await next();

    logger.request(c.req.method, c.req.path, c.res.status, now() - start, {
      requestId,
      userAgent: c.req.header('User-Agent'),
    });
  };
}

// ============================================================
// HONO APP
// ============================================================

export function createApp(options: GatewayOptions): Hono<GatewayEnv> {
  const now = options.now ?? Date.now;
  const startTime = now();
  const reporter = new BridgeHealthReporter(options.bridge, now);
  const app = new Hono<GatewayEnv>();

  app.use('*', cors({
    origin: options.allowedOrigins ?? '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-ID'],
    exposeHeaders: ['X-Request-ID'],
    maxAge: 86400,
  }));
  app.use('*', requestLogger(options.logger, now));

  /**
   * POST /messages
   * Submit a message to the backend through the bridge
   */
  app.post('/messages', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json<ApiResponse>(
        {
          success: false,
          error: { code: 'INVALID_JSON', message: 'Request body must be valid JSON', requestId: c.get('requestId') },
        },
        400
      );
    }

    const parsed = MessageSchema.safeParse(body);
    if (!parsed.success) {
      return c.json<ApiResponse>(
        {
          success: false,
          error: {
            code: 'VALIDATION_ERROR',
            message: 'Invalid message request',
            details: { issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) },
            requestId: c.get('requestId'),
          },
        },
        400
      );
    }

    const data = parsed.data;
    const result = await options.bridge.submit({
      content: data.message ?? data.content ?? '',
      userId: data.user_id,
      metadata: data.metadata,
    });

    const response: MessageResponse = {
      response: result.content,
      confidence: result.confidence,
      processing_time: result.processingTime,
      success: result.success,
      timestamp: new Date(now()).toISOString(),
      request_id: c.get('requestId'),
      ...(result.errorCode ? { error_code: result.errorCode, retryable: result.retryable } : {}),
    };
    return c.json(response);
  });

  /**
   * GET /health
   * 503 while the circuit breaker is open
   */
  app.get('/health', (c) => {
    const health = reporter.health();
    const body = {
      ...health,
      service: options.service ?? 'gateway',
      version: options.version ?? '0.1.0',
      uptime: now() - startTime,
    };
    return c.json(body, health.status === HealthStatus.DEGRADED ? 503 : 200);
  });

  app.get('/metrics', (c) => {
    return c.json(reporter.metrics());
  });

  app.notFound((c) => {
    return c.json<ApiResponse>(
      {
        success: false,
        error: { code: 'NOT_FOUND', message: `Route ${c.req.path} not found` },
      },
      404
    );
  });

  app.onError((err, c) => {
    options.logger.error('Unhandled gateway error', err);
    return c.json<ApiResponse>(
      {
        success: false,
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          details: { message: err.message },
        },
      },
      500
    );
  });

  return app;
}
