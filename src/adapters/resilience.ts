/**
 * Backend Resilience Patterns
 * ===========================
 *
 * Circuit breaker and retry/backoff around generation backend calls.
 * The breaker wraps the retry loop, so one exhausted retry sequence counts
 * as a single breaker failure.
 */

import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';
import {
  BackendCallError,
  classifyError,
  type ErrorClassification,
} from './classify.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Circuit breaker state.
 */
export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/**
 * Circuit breaker configuration.
 */
export interface CircuitBreakerConfig {
  /**
   * Consecutive failures before opening the circuit.
   */
  failureThreshold: number;

  /**
   * Time in ms an open circuit waits before admitting a probe.
   */
  recoveryTimeout: number;

  /**
   * Clock in ms.
   */
  now?: () => number;
}

/**
 * Circuit breaker statistics.
 */
export interface CircuitBreakerStats {
  state: CircuitState;

  /**
   * Consecutive failures since the last success.
   */
  failureCount: number;

  totalFailures: number;
  totalSuccesses: number;

  /**
   * Calls rejected without being attempted.
   */
  rejected: number;

  lastFailureAt?: number;
}

export type BackoffStrategy = 'fixed' | 'linear' | 'exponential' | 'exponential_jitter';

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /**
   * Total attempts, including the first.
   */
  maxAttempts: number;

  /**
   * Base delay in ms.
   */
  baseDelay: number;

  /**
   * Upper bound for a single delay in ms.
   */
  maxDelay: number;

  backoffStrategy: BackoffStrategy;

  /**
   * Growth factor for the exponential strategies.
   */
  backoffMultiplier: number;

  /**
   * Which classified failures to retry. Defaults to the classification's own flag.
   */
  retryOn?: (classification: ErrorClassification) => boolean;

  sleep?: (ms: number) => Promise<void>;

  /**
   * Source of randomness in [0, 1) for jitter.
   */
  random?: () => number;
}

/**
 * Retry statistics.
 */
export interface RetryStats {
  totalAttempts: number;
  firstTrySuccesses: number;
  retrySuccesses: number;
  exhaustedFailures: number;
  nonRetryableFailures: number;
}

export const DEFAULT_CIRCUIT_CONFIG: Readonly<Omit<CircuitBreakerConfig, 'now'>> = {
  failureThreshold: 5,
  recoveryTimeout: 60000,
};

export const DEFAULT_RETRY_CONFIG: Readonly<Omit<RetryConfig, 'retryOn' | 'sleep' | 'random'>> = {
  maxAttempts: 3,
  baseDelay: 1000,
  maxDelay: 60000,
  backoffStrategy: 'exponential_jitter',
  backoffMultiplier: 2,
};

// =============================================================================
// Circuit Breaker
// =============================================================================

/**
 * Circuit breaker error.
 */
export class CircuitOpenError extends Error {
  readonly retryAt?: number;

  constructor(message: string, retryAt?: number) {
    super(message);
    this.name = 'CircuitOpenError';
    if (retryAt !== undefined) this.retryAt = retryAt;
  }
}

/**
 * Circuit breaker.
 *
 * `admit`, `recordSuccess` and `recordFailure` never await, so each state
 * transition runs to completion before another caller can observe it.
 */
export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly recoveryTimeout: number;
  private readonly now: () => number;

  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private lastFailureAt: number | null = null;
  private probeInFlight = false;

  private totalFailures = 0;
  private totalSuccesses = 0;
  private rejected = 0;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.failureThreshold = config.failureThreshold ?? DEFAULT_CIRCUIT_CONFIG.failureThreshold;
    this.recoveryTimeout = config.recoveryTimeout ?? DEFAULT_CIRCUIT_CONFIG.recoveryTimeout;
    this.now = config.now ?? Date.now;
  }

  /**
   * Run fn through the breaker.
   *
   * @throws CircuitOpenError without calling fn when the circuit is open
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.admit();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }

    this.recordSuccess();
    return result;
  }

  /**
   * Admit a call or throw. Moves OPEN to HALF_OPEN once the timeout elapsed.
   */
  admit(): void {
    if (this.state === 'OPEN') {
      const retryAt = (this.lastFailureAt ?? 0) + this.recoveryTimeout;
      if (this.now() < retryAt) {
        this.rejected++;
        throw new CircuitOpenError(`Circuit breaker is open after ${this.failureCount} failures`, retryAt);
      }
      this.state = 'HALF_OPEN';
      this.probeInFlight = false;
    }

    if (this.state === 'HALF_OPEN') {
      if (this.probeInFlight) {
        this.rejected++;
        throw new CircuitOpenError('Circuit breaker is half-open and a probe is in flight');
      }
      this.probeInFlight = true;
    }
  }

  recordSuccess(): void {
    this.totalSuccesses++;

    if (this.state === 'HALF_OPEN') {
      this.state = 'CLOSED';
      this.probeInFlight = false;
      this.failureCount = 0;
    } else if (this.state === 'CLOSED') {
      this.failureCount = 0;
    }
  }

  recordFailure(): void {
    this.totalFailures++;
    this.failureCount++;
    this.lastFailureAt = this.now();

    if (this.state === 'HALF_OPEN') {
      this.state = 'OPEN';
      this.probeInFlight = false;
    } else if (this.state === 'CLOSED' && this.failureCount >= this.failureThreshold) {
      this.state = 'OPEN';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    const stats: CircuitBreakerStats = {
      state: this.state,
      failureCount: this.failureCount,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      rejected: this.rejected,
    };
    if (this.lastFailureAt !== null) stats.lastFailureAt = this.lastFailureAt;
    return stats;
  }

  /**
   * Reset to CLOSED.
   */
  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.lastFailureAt = null;
    this.probeInFlight = false;
  }
}

// =============================================================================
// Retry with Backoff
// =============================================================================

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based),
 * capped at maxDelay.
 */
export function computeBackoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelay' | 'maxDelay' | 'backoffStrategy' | 'backoffMultiplier'>,
  random: () => number = Math.random
): number {
  const raw = rawBackoffDelay(attempt, config, random);
  return Math.min(raw, config.maxDelay);
}

function rawBackoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelay' | 'backoffStrategy' | 'backoffMultiplier'>,
  random: () => number
): number {
  switch (config.backoffStrategy) {
    case 'fixed':
      return config.baseDelay;
    case 'linear':
      return config.baseDelay * attempt;
    case 'exponential':
      return config.baseDelay * Math.pow(config.backoffMultiplier, attempt - 1);
    case 'exponential_jitter':
      // +/-25%
      return config.baseDelay * Math.pow(config.backoffMultiplier, attempt - 1) * (0.75 + random() * 0.5);
  }
}

/**
 * Retry executor with configurable backoff.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly retryOn: (classification: ErrorClassification) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: MetricsCollector;

  private stats: RetryStats = {
    totalAttempts: 0,
    firstTrySuccesses: 0,
    retrySuccesses: 0,
    exhaustedFailures: 0,
    nonRetryableFailures: 0,
  };

  constructor(config: Partial<RetryConfig> = {}, logger?: MetricsCollector) {
    this.config = {
      maxAttempts: Math.max(1, config.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts),
      baseDelay: config.baseDelay ?? DEFAULT_RETRY_CONFIG.baseDelay,
      maxDelay: config.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay,
      backoffStrategy: config.backoffStrategy ?? DEFAULT_RETRY_CONFIG.backoffStrategy,
      backoffMultiplier: config.backoffMultiplier ?? DEFAULT_RETRY_CONFIG.backoffMultiplier,
    };
    this.retryOn = config.retryOn ?? ((c) => c.retryable);
    this.sleep = config.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = config.random ?? Math.random;
    this.logger = logger ?? createMetricsCollector('retry');
  }

  /**
   * Execute with retry.
   *
   * @throws BackendCallError once a failure is not retryable or attempts run out
   */
  async execute<T>(fn: () => Promise<T>, label: string = 'backend call'): Promise<T> {
    const { maxAttempts } = this.config;

    for (let attempt = 1; ; attempt++) {
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
        const classification = classifyError(error);

        if (!this.retryOn(classification)) {
          this.stats.nonRetryableFailures++;
          throw new BackendCallError(
            `${label} failed: ${classification.message} (${classification.category}, not retryable)`,
            classification,
            attempt,
            error
          );
        }

        if (attempt >= maxAttempts) {
          this.stats.exhaustedFailures++;
          throw new BackendCallError(
            `${label} failed after ${attempt} attempts: ${classification.message} (${classification.category})`,
            classification,
            attempt,
            error
          );
        }

        const delay = computeBackoffDelay(attempt, this.config, this.random);
        this.logger.warn('Retrying after failure', {
          label,
          attempt,
          max_attempts: maxAttempts,
          category: classification.category,
          delay_ms: Math.round(delay),
          error: classification.message,
        });
        await this.sleep(delay);
      }
    }
  }

  getConfig(): Readonly<RetryConfig> {
    return this.config;
  }

  getStats(): RetryStats {
    return { ...this.stats };
  }
}

// =============================================================================
// Combined Resilient Executor
// =============================================================================

export interface ResilientExecutorOptions {
  circuit?: Partial<CircuitBreakerConfig>;
  retry?: Partial<RetryConfig>;
  logger?: MetricsCollector;
}

/**
 * Circuit breaker around retry. One instance per backend, shared by every
 * worker for the whole run.
 */
export class ResilientExecutor {
  private readonly circuitBreaker: CircuitBreaker;
  private readonly retryExecutor: RetryExecutor;

  constructor(options: ResilientExecutorOptions = {}) {
    const logger = options.logger ?? createMetricsCollector('resilience');
    this.circuitBreaker = new CircuitBreaker(options.circuit);
    this.retryExecutor = new RetryExecutor(options.retry, logger);
  }

  /**
   * Execute with circuit breaker and retry.
   */
  execute<T>(fn: () => Promise<T>, label?: string): Promise<T> {
    return this.circuitBreaker.execute(() => this.retryExecutor.execute(fn, label));
  }

  getStats(): { circuit: CircuitBreakerStats; retry: RetryStats } {
    return {
      circuit: this.circuitBreaker.getStats(),
      retry: this.retryExecutor.getStats(),
    };
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a resilient executor.
 */
export function createResilientExecutor(options: ResilientExecutorOptions = {}): ResilientExecutor {
  return new ResilientExecutor(options);
}
