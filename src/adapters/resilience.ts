/**
 * Adapter Resilience Patterns
 * ===========================
 *
 * Circuit breaker, retry/backoff and call timeouts for model adapters.
 * These act below the generation session: a transient provider error is
 * retried here and never costs the session a repair attempt.
 */

import { AdapterError } from './model.js';

// =============================================================================
// Types
// =============================================================================

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  /**
   * Number of failures before opening circuit.
   */
  failureThreshold: number;

  /**
   * Time in ms before attempting recovery.
   */
  resetTimeout: number;

  /**
   * Number of successes in half-open to close circuit.
   */
  successThreshold: number;

  /**
   * Time window for counting failures (ms).
   */
  failureWindow: number;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;

  /**
   * Failures inside the current window.
   */
  recentFailures: number;

  lastOpenedAt?: number;
  recoveryAt?: number;
}

export interface RetryConfig {
  /**
   * Total attempts including the first call.
   */
  maxAttempts: number;

  initialDelay: number;

  maxDelay: number;

  backoffMultiplier: number;

  /**
   * Jitter factor (0-1).
   */
  jitter: number;

  /**
   * Which errors to retry. Defaults to retryable `AdapterError`s.
   */
  retryOn: (error: Error) => boolean;
}

export interface RetryStats {
  totalAttempts: number;
  firstTrySuccesses: number;
  retrySuccesses: number;
  exhaustedFailures: number;
  avgAttempts: number;
}

// =============================================================================
// Circuit Breaker
// =============================================================================

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private state: CircuitState = 'closed';
  private failures: number[] = [];
  private successes = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private lastOpenedAt: number | null = null;
  private recoveryAt: number | null = null;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = {
      failureThreshold: config.failureThreshold ?? 5,
      resetTimeout: config.resetTimeout ?? 30_000,
      successThreshold: config.successThreshold ?? 2,
      failureWindow: config.failureWindow ?? 60_000,
    };
  }

  /**
   * Check if circuit allows requests.
   */
  canExecute(): boolean {
    return this.getState() !== 'open';
  }

  recordSuccess(): void {
    this.totalSuccesses++;

    if (this.state === 'half-open') {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.state = 'closed';
        this.failures = [];
        this.recoveryAt = null;
      }
    }
  }

  recordFailure(): void {
    this.failures.push(Date.now());
    this.totalFailures++;
    this.cleanupOldFailures();

    if (this.state === 'closed') {
      if (this.failures.length >= this.config.failureThreshold) {
        this.openCircuit();
      }
    } else if (this.state === 'half-open') {
      // Any failure in half-open reopens the circuit
      this.openCircuit();
    }
  }

  getState(): CircuitState {
    this.cleanupOldFailures();

    if (this.state === 'open' && this.recoveryAt !== null && Date.now() >= this.recoveryAt) {
      this.state = 'half-open';
      this.successes = 0;
    }

    return this.state;
  }

  getStats(): CircuitBreakerStats {
    const stats: CircuitBreakerStats = {
      state: this.getState(),
      failures: this.totalFailures,
      successes: this.totalSuccesses,
      recentFailures: this.failures.length,
    };

    if (this.lastOpenedAt !== null) stats.lastOpenedAt = this.lastOpenedAt;
    if (this.recoveryAt !== null) stats.recoveryAt = this.recoveryAt;

    return stats;
  }

  reset(): void {
    this.state = 'closed';
    this.failures = [];
    this.successes = 0;
    this.lastOpenedAt = null;
    this.recoveryAt = null;
  }

  /**
   * Force open the circuit (manual override).
   */
  forceOpen(): void {
    this.openCircuit();
  }

  private openCircuit(): void {
    this.state = 'open';
    this.lastOpenedAt = Date.now();
    this.recoveryAt = Date.now() + this.config.resetTimeout;
  }

  private cleanupOldFailures(): void {
    const cutoff = Date.now() - this.config.failureWindow;
    this.failures = this.failures.filter((t) => t > cutoff);
  }
}

export class CircuitOpenError extends Error {
  readonly recoveryAt?: number;

  constructor(message: string, recoveryAt?: number) {
    super(message);
    this.name = 'CircuitOpenError';
    if (recoveryAt !== undefined) this.recoveryAt = recoveryAt;
  }
}

// =============================================================================
// Retry with Backoff
// =============================================================================

/**
 * Default retry condition: only adapter errors flagged retryable.
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof AdapterError && error.retryable;
}

export class RetryExecutor {
  private readonly config: RetryConfig;
  private stats = {
    totalAttempts: 0,
    firstTrySuccesses: 0,
    retrySuccesses: 0,
    exhaustedFailures: 0,
  };

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      initialDelay: config.initialDelay ?? 1000,
      maxDelay: config.maxDelay ?? 30_000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitter: config.jitter ?? 0.1,
      retryOn: config.retryOn ?? isRetryableError,
    };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    let lastError: Error | undefined;
    let attempt = 0;

    while (attempt < this.config.maxAttempts) {
      attempt++;
      this.stats.totalAttempts++;

      try {
        const result = await fn();
        if (attempt === 1) {
          this.stats.firstTrySuccesses++;
        } else {
          this.stats.retrySuccesses++;
        }
        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.config.retryOn(lastError)) {
          throw lastError;
        }
        if (attempt >= this.config.maxAttempts) {
          break;
        }

        await sleep(this.calculateDelay(attempt));
      }
    }

    this.stats.exhaustedFailures++;
    throw new RetryExhaustedError(
      `Exhausted ${this.config.maxAttempts} retry attempts`,
      lastError
    );
  }

  getStats(): RetryStats {
    const total = this.stats.firstTrySuccesses + this.stats.retrySuccesses + this.stats.exhaustedFailures;
    return {
      ...this.stats,
      avgAttempts: total > 0 ? this.stats.totalAttempts / total : 0,
    };
  }

  resetStats(): void {
    this.stats = {
      totalAttempts: 0,
      firstTrySuccesses: 0,
      retrySuccesses: 0,
      exhaustedFailures: 0,
    };
  }

  private calculateDelay(attempt: number): number {
    let delay = this.config.initialDelay * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelay);

    const jitterRange = delay * this.config.jitter;
    delay += Math.random() * jitterRange * 2 - jitterRange;

    return Math.max(0, Math.round(delay));
  }
}

export class RetryExhaustedError extends Error {
  readonly lastError?: Error;

  constructor(message: string, lastError?: Error) {
    super(message);
    this.name = 'RetryExhaustedError';
    if (lastError) this.lastError = lastError;
  }
}

// =============================================================================
// Combined Resilient Executor
// =============================================================================

export class ResilientExecutor {
  private readonly circuitBreaker: CircuitBreaker;
  private readonly retryExecutor: RetryExecutor;

  constructor(
    circuitConfig: Partial<CircuitBreakerConfig> = {},
    retryConfig: Partial<RetryConfig> = {}
  ) {
    this.circuitBreaker = new CircuitBreaker(circuitConfig);
    this.retryExecutor = new RetryExecutor(retryConfig);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.circuitBreaker.canExecute()) {
      throw new CircuitOpenError('Circuit breaker is open', this.circuitBreaker.getStats().recoveryAt);
    }

    try {
      const result = await this.retryExecutor.execute(fn);
      this.circuitBreaker.recordSuccess();
      return result;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        this.circuitBreaker.recordFailure();
      }
      throw error;
    }
  }

  getStats(): { circuit: CircuitBreakerStats; retry: RetryStats } {
    return {
      circuit: this.circuitBreaker.getStats(),
      retry: this.retryExecutor.getStats(),
    };
  }

  reset(): void {
    this.circuitBreaker.reset();
    this.retryExecutor.resetStats();
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }
}

// =============================================================================
// Timeouts
// =============================================================================

/**
 * Bound a single call. Rejects with `AdapterError('TIMEOUT')` when `ms`
 * elapses first; the underlying promise is left to settle on its own.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label = 'Model call'): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new AdapterError('TIMEOUT', `${label} timed out after ${ms}ms`, true, { timeout_ms: ms }));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
