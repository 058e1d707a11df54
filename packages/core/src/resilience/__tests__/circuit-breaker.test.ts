/**
 * Unit tests for Circuit Breaker
 */

import { CircuitBreaker, CircuitState, MAX_CALL_TIMEOUT_MS, type CircuitBreakerMetric } from '../circuit-breaker';
import { BackendTimeoutError, CircuitBreakerError, InvalidConfigurationError } from '../../errors';

const fail = () => Promise.reject(new Error('fail'));
const succeed = () => Promise.resolve('success');

describe('CircuitBreaker', () => {
  let clock: number;
  let breaker: CircuitBreaker;

  const tripBreaker = async (target: CircuitBreaker, times: number = 3) => {
    for (let i = 0; i < times; i++) {
      await expect(target.execute(fail)).rejects.toThrow('fail');
    }
  };

  beforeEach(() => {
    clock = 0;
    breaker = new CircuitBreaker({
      name: 'test-breaker',
      failureThreshold: 3,
      resetTimeout: 1000,
      callTimeout: 5000,
      now: () => clock,
    });
  });

  describe('CLOSED state', () => {
    it('should start in CLOSED state', () => {
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('should pass through successful calls', async () => {
      await expect(breaker.execute(succeed)).resolves.toBe('success');
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('should propagate the operation failure and count it', async () => {
      await expect(breaker.execute(fail)).rejects.toThrow('fail');

      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.getMetrics().consecutiveFailures).toBe(1);
      expect(breaker.getMetrics().failedCalls).toBe(1);
    });

    it('should open after reaching failure threshold', async () => {
      await tripBreaker(breaker);

      expect(breaker.getState()).toBe(CircuitState.OPEN);
      expect(breaker.getMetrics().lastFailureTime).toBe(0);
    });

    it('should reset failure count on success', async () => {
      await tripBreaker(breaker, 2);
      await breaker.execute(succeed);
      await tripBreaker(breaker, 2);

      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.getMetrics().consecutiveFailures).toBe(2);
    });
  });

  describe('OPEN state', () => {
    beforeEach(async () => {
      await tripBreaker(breaker);
    });

    it('should reject calls without invoking the operation', async () => {
      const operation = jest.fn(succeed);

      await expect(breaker.execute(operation)).rejects.toThrow(CircuitBreakerError);
      expect(operation).not.toHaveBeenCalled();
    });

    it('should track rejected calls', async () => {
      await expect(breaker.execute(succeed)).rejects.toThrow(CircuitBreakerError);

      expect(breaker.getMetrics().rejectedCalls).toBe(1);
    });

    it('should still reject just before the reset timeout', async () => {
      clock = 500;
      const operation = jest.fn(succeed);

      await expect(breaker.execute(operation)).rejects.toThrow(CircuitBreakerError);
      expect(operation).not.toHaveBeenCalled();
      expect(breaker.getState()).toBe(CircuitState.OPEN);
    });

    it('should let a trial call through once the reset timeout elapsed', async () => {
      clock = 1100;
      const operation = jest.fn(() => Promise.resolve('recovered'));

      await expect(breaker.execute(operation)).resolves.toBe('recovered');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('HALF_OPEN state', () => {
    beforeEach(async () => {
      await tripBreaker(breaker);
      clock = 1000;
    });

    it('should close and reset the counter after a successful trial', async () => {
      await breaker.execute(succeed);

      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.getMetrics().consecutiveFailures).toBe(0);
    });

    it('should open again on a failed trial and refresh the failure time', async () => {
      await expect(breaker.execute(fail)).rejects.toThrow('fail');

      expect(breaker.getState()).toBe(CircuitState.OPEN);
      expect(breaker.getMetrics().consecutiveFailures).toBe(4);
      expect(breaker.getMetrics().lastFailureTime).toBe(1000);
    });

    it('should allow only one trial in flight', async () => {
      let finishTrial: (value: string) => void = () => undefined;
      const trial = breaker.execute(() => new Promise<string>(resolve => {
        finishTrial = resolve;
      }));

      expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

      const competing = jest.fn(succeed);
      await expect(breaker.execute(competing)).rejects.toThrow(CircuitBreakerError);
      expect(competing).not.toHaveBeenCalled();

      finishTrial('done');
      await expect(trial).resolves.toBe('done');
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });
  });

  describe('timeout', () => {
    it('should time out slow calls, abort them and count a failure', async () => {
      const slowBreaker = new CircuitBreaker({
        name: 'slow-breaker',
        failureThreshold: 3,
        resetTimeout: 1000,
        callTimeout: 50,
      });
      let observed: AbortSignal | undefined;

      const call = slowBreaker.execute((signal) => {
        observed = signal;
        return new Promise<string>((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')));
        });
      });

      await expect(call).rejects.toThrow(BackendTimeoutError);
      expect(observed?.aborted).toBe(true);
      expect(slowBreaker.getMetrics().consecutiveFailures).toBe(1);
    });
  });

  describe('metrics', () => {
    it('should track all metrics', async () => {
      await breaker.execute(succeed);
      await expect(breaker.execute(fail)).rejects.toThrow('fail');

      const metrics = breaker.getMetrics();
      expect(metrics.totalCalls).toBe(2);
      expect(metrics.successfulCalls).toBe(1);
      expect(metrics.failedCalls).toBe(1);
      expect(metrics.name).toBe('test-breaker');
    });
  });

  describe('state change callback', () => {
    it('should call onStateChange for every transition', async () => {
      const stateChanges: Array<{ from: CircuitState; to: CircuitState }> = [];

      const callbackBreaker = new CircuitBreaker({
        name: 'callback-breaker',
        failureThreshold: 2,
        resetTimeout: 1000,
        callTimeout: 5000,
        now: () => clock,
        onStateChange: (from, to) => stateChanges.push({ from, to }),
      });

      await tripBreaker(callbackBreaker, 2);
      clock = 1000;
      await callbackBreaker.execute(succeed);

      expect(stateChanges).toEqual([
        { from: CircuitState.CLOSED, to: CircuitState.OPEN },
        { from: CircuitState.OPEN, to: CircuitState.HALF_OPEN },
        { from: CircuitState.HALF_OPEN, to: CircuitState.CLOSED },
      ]);
    });
  });

  describe('metric hook', () => {
    it('should emit a metric after every outcome and rejection', async () => {
      const emitted: CircuitBreakerMetric[] = [];
      const observed = new CircuitBreaker({
        name: 'observed',
        failureThreshold: 3,
        resetTimeout: 1000,
        callTimeout: 5000,
        now: () => clock,
        onMetric: metric => emitted.push(metric),
      });

      await tripBreaker(observed);
      await expect(observed.execute(succeed)).rejects.toThrow(CircuitBreakerError);

      expect(emitted.map(m => m.consecutiveFailures)).toEqual([1, 2, 3, 3]);
      expect(emitted[2].state).toBe(CircuitState.OPEN);
      expect(emitted[3].rejectedCalls).toBe(1);
    });
  });

  describe('reset', () => {
    it('should reset all state', async () => {
      await tripBreaker(breaker);
      breaker.reset();

      const metrics = breaker.getMetrics();
      expect(metrics.totalCalls).toBe(0);
      expect(metrics.failedCalls).toBe(0);
      expect(metrics.lastFailureTime).toBeNull();
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });
  });

  describe('configuration', () => {
    it('should fail fast on invalid options', () => {
      expect(() => new CircuitBreaker({
        name: 'bad',
        failureThreshold: 0,
        resetTimeout: -1,
        callTimeout: 100,
      })).toThrow(InvalidConfigurationError);
    });

    it('should refuse a call timeout beyond the timer limit', () => {
      expect(() => new CircuitBreaker({
        name: 'too-patient',
        failureThreshold: 1,
        resetTimeout: 1000,
        callTimeout: MAX_CALL_TIMEOUT_MS + 1,
      })).toThrow('callTimeout must be between 1 and 2147483647 ms');
      expect(() => new CircuitBreaker({
        name: 'at-limit',
        failureThreshold: 1,
        resetTimeout: 1000,
        callTimeout: MAX_CALL_TIMEOUT_MS,
      })).not.toThrow();
    });
  });
});
