/**
 * Resilience Tests
 * ================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  AdapterError,
  CircuitBreaker,
  CircuitOpenError,
  MockModelAdapter,
  ResilientAdapter,
  ResilientExecutor,
  RetryExecutor,
  RetryExhaustedError,
  withTimeout,
} from '../index.js';
import type { TransformContext } from '../index.js';

const context: TransformContext = {
  intent_id: 'request_test',
  run_id: 'session_test_a1',
  mode: 'draft',
  constraints: [],
  metadata: {},
};

const fastRetry = { initialDelay: 1, maxDelay: 2, jitter: 0 };

// =============================================================================
// CircuitBreaker
// =============================================================================

describe('CircuitBreaker', () => {
  it('should open after the failure threshold', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2 });

    breaker.recordFailure();
    assert.equal(breaker.getState(), 'closed');
    breaker.recordFailure();
    assert.equal(breaker.getState(), 'open');
    assert.equal(breaker.canExecute(), false);
  });

  it('should move to half-open after the reset timeout and close on successes', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, resetTimeout: 0, successThreshold: 2 });

    breaker.recordFailure();
    assert.equal(breaker.getState(), 'half-open');
    breaker.recordSuccess();
    assert.equal(breaker.getState(), 'half-open');
    breaker.recordSuccess();
    assert.equal(breaker.getState(), 'closed');
  });

  it('should report totals', () => {
    const breaker = new CircuitBreaker();
    breaker.recordSuccess();
    breaker.recordFailure();

    const stats = breaker.getStats();
    assert.equal(stats.state, 'closed');
    assert.equal(stats.successes, 1);
    assert.equal(stats.failures, 1);
    assert.equal(stats.recentFailures, 1);
  });

  it('should reset to closed', () => {
    const breaker = new CircuitBreaker();
    breaker.forceOpen();
    assert.equal(breaker.getState(), 'open');
    breaker.reset();
    assert.equal(breaker.getState(), 'closed');
  });
});

// =============================================================================
// RetryExecutor
// =============================================================================

describe('RetryExecutor', () => {
  it('should retry retryable adapter errors until success', async () => {
    const executor = new RetryExecutor({ ...fastRetry, maxAttempts: 3 });
    let calls = 0;

    const result = await executor.execute(async () => {
      calls++;
      if (calls < 3) throw new AdapterError('RATE_LIMITED', 'slow down', true);
      return 'ok';
    });

    assert.equal(result, 'ok');
    assert.equal(calls, 3);
    assert.equal(executor.getStats().retrySuccesses, 1);
  });

  it('should not retry non-retryable errors', async () => {
    const executor = new RetryExecutor({ ...fastRetry, maxAttempts: 3 });
    let calls = 0;

    await assert.rejects(
      () =>
        executor.execute(async () => {
          calls++;
          throw new AdapterError('INVALID_REQUEST', 'bad request', false);
        }),
      (err: unknown) => err instanceof AdapterError && err.code === 'INVALID_REQUEST'
    );
    assert.equal(calls, 1);
  });

  it('should give up after maxAttempts with the last error attached', async () => {
    const executor = new RetryExecutor({ ...fastRetry, maxAttempts: 2 });

    await assert.rejects(
      () =>
        executor.execute(async () => {
          throw new AdapterError('NETWORK_ERROR', 'reset', true);
        }),
      (err: unknown) => {
        assert.ok(err instanceof RetryExhaustedError);
        assert.equal(err.message, 'Exhausted 2 retry attempts');
        assert.ok(err.lastError instanceof AdapterError);
        return true;
      }
    );
    assert.equal(executor.getStats().exhaustedFailures, 1);
  });
});

// =============================================================================
// ResilientExecutor / ResilientAdapter
// =============================================================================

describe('ResilientExecutor', () => {
  it('should reject immediately while the circuit is open', async () => {
    const executor = new ResilientExecutor({}, fastRetry);
    executor.getCircuitBreaker().forceOpen();

    await assert.rejects(() => executor.execute(async () => 'never'), CircuitOpenError);
  });
});

describe('ResilientAdapter', () => {
  it('should retry transient failures invisibly', async () => {
    const inner = new MockModelAdapter();
    inner.enqueue({ error: new AdapterError('MODEL_ERROR', 'overloaded', true) }, { content: 'done' });

    const adapter = new ResilientAdapter(inner, {}, { ...fastRetry, maxAttempts: 2 });
    const result = await adapter.transform('prompt', context);

    assert.equal(result.content, 'done');
    assert.equal(inner.getCallCount(), 2);
    assert.equal(adapter.adapter_id, `resilient_${inner.adapter_id}`);
  });

  it('should surface exhausted retries as a non-retryable AdapterError', async () => {
    const inner = new MockModelAdapter();
    inner.enqueue(
      { error: new AdapterError('RATE_LIMITED', 'quota', true) },
      { error: new AdapterError('RATE_LIMITED', 'quota', true) }
    );

    const adapter = new ResilientAdapter(inner, {}, { ...fastRetry, maxAttempts: 2 });
    await assert.rejects(
      () => adapter.transform('prompt', context),
      (err: unknown) => {
        assert.ok(err instanceof AdapterError);
        assert.equal(err.code, 'RATE_LIMITED');
        assert.equal(err.message, 'Retry exhausted: quota');
        assert.equal(err.retryable, false);
        return true;
      }
    );
  });

  it('should map an open circuit to RATE_LIMITED', async () => {
    const inner = new MockModelAdapter();
    inner.enqueue({ error: new AdapterError('NETWORK_ERROR', 'reset', true) });
    const adapter = new ResilientAdapter(inner, { failureThreshold: 1 }, { ...fastRetry, maxAttempts: 1 });
    await assert.rejects(() => adapter.transform('miss', context), AdapterError);

    await assert.rejects(
      () => adapter.transform('miss', context),
      (err: unknown) => err instanceof AdapterError && err.code === 'RATE_LIMITED' && err.retryable
    );
    assert.equal(await adapter.isReady(), false);
  });
});

// =============================================================================
// withTimeout
// =============================================================================

describe('withTimeout', () => {
  it('should resolve when the call finishes first', async () => {
    assert.equal(await withTimeout(Promise.resolve(42), 50), 42);
  });

  it('should reject with a retryable TIMEOUT', async () => {
    const slow = new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200));

    await assert.rejects(
      () => withTimeout(slow, 10),
      (err: unknown) => {
        assert.ok(err instanceof AdapterError);
        assert.equal(err.code, 'TIMEOUT');
        assert.equal(err.message, 'Model call timed out after 10ms');
        assert.equal(err.retryable, true);
        return true;
      }
    );
    await slow;
  });

  it('should pass through without a positive bound', async () => {
    assert.equal(await withTimeout(Promise.resolve('x'), 0), 'x');
  });
});
