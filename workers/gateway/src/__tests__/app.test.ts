/**
 * Tests for the gateway HTTP surface
 */

import type { BackendHandler, BridgeRequest, BridgeResult } from '@resilient-bridge/types';
import {
  LogLevel,
  ResilientBridge,
  StructuredLogger,
  type BridgeConfigInput,
  type LogEntry,
} from '@resilient-bridge/core';
import { createApp } from '../app';

const NOW = 1_700_000_000_000;

class EchoBackend implements BackendHandler {
  failing = false;

  async handle(request: BridgeRequest): Promise<BridgeResult> {
    if (this.failing) {
      throw new Error('backend down');
    }
    return {
      content: `echo: ${request.content}`,
      confidence: 0.9,
      processingTime: 0,
      stagesInvoked: ['echo'],
      success: true,
    };
  }
}

function setup(config: BridgeConfigInput = {}, allowedOrigins?: string[]) {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    service: 'gateway-test',
    level: LogLevel.DEBUG,
    pretty: false,
    includeStackTrace: false,
    output: entry => entries.push(entry),
  });
  const backend = new EchoBackend();
  const bridge = new ResilientBridge({ backend, config, logger, now: () => NOW });
  const app = createApp({ bridge, logger, service: 'gateway-test', version: '1.2.3', allowedOrigins, now: () => NOW });
  return { app, backend, entries };
}

const postMessage = (body: string, requestId = 'req-1') => ({
  method: 'POST',
  body,
  headers: { 'Content-Type': 'application/json', 'X-Request-ID': requestId },
});

describe('gateway', () => {
  describe('POST /messages', () => {
    it('should answer through the bridge', async () => {
      const { app } = setup();

      const res = await app.request('/messages', postMessage(JSON.stringify({ message: 'hello', user_id: 'u1' })));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        response: 'echo: hello',
        confidence: 0.9,
        processing_time: 0,
        success: true,
        timestamp: '2023-11-14T22:13:20.000Z',
        request_id: 'req-1',
      });
    });

    it('should accept content as an alias of message', async () => {
      const { app } = setup();

      const res = await app.request('/messages', postMessage(JSON.stringify({ content: 'hi' })));

      expect(await res.json()).toMatchObject({ response: 'echo: hi', success: true });
    });

    it('should carry the error code of a failed result', async () => {
      const { app } = setup({ admission: { capacity: 1, refillRate: 0 } });

      await app.request('/messages', postMessage(JSON.stringify({ message: 'first' })));
      const res = await app.request('/messages', postMessage(JSON.stringify({ message: 'second' })));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        response: 'Rate limit exceeded - please retry shortly.',
        confidence: 0,
        success: false,
        error_code: 'ADMISSION_REJECTED',
        retryable: true,
      });
    });

    it('should reject malformed JSON', async () => {
      const { app } = setup();

      const res = await app.request('/messages', postMessage('{not json', 'req-2'));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'INVALID_JSON', message: 'Request body must be valid JSON', requestId: 'req-2' },
      });
    });

    it('should reject a body without a message', async () => {
      const { app } = setup();

      const res = await app.request('/messages', postMessage(JSON.stringify({ user_id: 'u1' }), 'req-3'));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid message request',
          details: { issues: ['message: message is required'] },
          requestId: 'req-3',
        },
      });
    });
  });

  describe('request ids', () => {
    it('should echo a supplied X-Request-ID', async () => {
      const { app } = setup();

      const res = await app.request('/metrics', { headers: { 'X-Request-ID': 'abc-123' } });

      expect(res.headers.get('X-Request-ID')).toBe('abc-123');
    });

    it('should generate one when absent', async () => {
      const { app } = setup();

      const res = await app.request('/metrics');

      expect(res.headers.get('X-Request-ID')).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should log one line per request', async () => {
      const { app, entries } = setup();

      await app.request('/metrics', { headers: { 'X-Request-ID': 'abc-123' } });

      const line = entries.find(entry => entry.message === 'GET /metrics 200');
      expect(line).toMatchObject({
        level: 'INFO',
        requestId: 'abc-123',
        http: { method: 'GET', path: '/metrics', statusCode: 200 },
        duration: 0,
      });
    });
  });

  describe('GET /health', () => {
    it('should report healthy with service details', async () => {
      const { app } = setup();

      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'healthy',
        service: 'gateway-test',
        version: '1.2.3',
        uptime: 0,
        components: { circuitBreaker: 'closed', backend: 'unknown' },
      });
    });

    it('should answer 503 while the breaker is open', async () => {
      const { app, backend } = setup({ breaker: { failureThreshold: 1 } });
      backend.failing = true;

      const failed = await (await app.request('/messages', postMessage(JSON.stringify({ message: 'boom' })))).json();
      const res = await app.request('/health');

      expect(res.status).toBe(503);
      expect(failed).toMatchObject({ success: false, error_code: 'BACKEND_FAILURE', retryable: false });
      expect(await res.json()).toMatchObject({
        status: 'degraded',
        components: { circuitBreaker: 'open' },
      });
    });
  });

  describe('GET /metrics', () => {
    it('should expose the aggregate counters', async () => {
      const { app } = setup();

      await app.request('/messages', postMessage(JSON.stringify({ message: 'a' })));
      await app.request('/messages', postMessage(JSON.stringify({ message: 'a' })));
      const res = await app.request('/metrics');

      expect(await res.json()).toEqual({
        requestsTotal: 2,
        errorsTotal: 0,
        errorRate: 0,
        avgLatency: 0,
        cacheHits: 1,
        cacheSize: 1,
        breakerState: 'closed',
        admissionTokens: 998,
        backendMetrics: {},
      });
    });
  });

  describe('CORS', () => {
    it('should allow any origin by default', async () => {
      const { app } = setup();

      const res = await app.request('/metrics', { headers: { Origin: 'https://ui.example.test' } });

      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should reflect a configured origin', async () => {
      const { app } = setup({}, ['https://ui.example.test']);

      const res = await app.request('/metrics', { headers: { Origin: 'https://ui.example.test' } });

      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('https://ui.example.test');
      expect(res.headers.get('Access-Control-Expose-Headers')).toBe('X-Request-ID');
    });
  });

  it('should answer unknown routes with 404', async () => {
    const { app } = setup();

    const res = await app.request('/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route /nope not found' },
    });
  });
});
