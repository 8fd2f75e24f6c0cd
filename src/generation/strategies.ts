/**
 * Execution Strategies
 * ====================
 *
 * Schedule generation tasks. Every strategy returns one result per task,
 * ordered by task index, and turns processor errors into failed results.
 */

import { classifyError, errorMessage } from '../adapters/classify.js';
import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';
import {
  failedResult,
  type GenerationResult,
  type GenerationTask,
  type StrategyName,
  type TaskProcessor,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export const STRATEGY_NAMES: readonly StrategyName[] = ['sequential', 'concurrent', 'adaptive'];

export function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

export interface ExecutionStrategy {
  /**
   * Descriptive name, e.g. `concurrent_w4`.
   */
  readonly name: string;

  execute(tasks: readonly GenerationTask[], processor: TaskProcessor): Promise<GenerationResult[]>;
}

export interface StrategyOptions {
  /**
   * Pause between sequential tasks, in ms.
   * @default 1000
   */
  delayBetweenRequests?: number;

  /**
   * Pool size for the concurrent strategy, ceiling for the adaptive one.
   */
  maxWorkers?: number;

  /**
   * Floor for the adaptive strategy.
   * @default 1
   */
  minWorkers?: number;

  /**
   * Starting pool size for the adaptive strategy.
   * @default 3
   */
  initialWorkers?: number;

  sleep?: (ms: number) => Promise<void>;
  logger?: MetricsCollector;
}

export const DEFAULT_DELAY_MS = 1000;
export const DEFAULT_CONCURRENT_WORKERS = 3;
export const ADAPTIVE_DEFAULTS = { initialWorkers: 3, minWorkers: 1, maxWorkers: 5 } as const;

/**
 * Task counts at or below this run sequentially under the adaptive strategy.
 */
export const ADAPTIVE_SEQUENTIAL_THRESHOLD = 5;

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// =============================================================================
// Helpers
// =============================================================================

async function runGuarded(task: GenerationTask, processor: TaskProcessor, logger: MetricsCollector): Promise<GenerationResult> {
  try {
    return await processor(task);
  } catch (error) {
    const classification = classifyError(error);
    logger.error('Task processor threw', { function: task.function.name, index: task.index, error: errorMessage(error) });
    return failedResult(task, errorMessage(error), classification.category, '');
  }
}

function byTaskIndex(a: GenerationResult, b: GenerationResult): number {
  return a.task.index - b.task.index;
}

// =============================================================================
// Sequential
// =============================================================================

export class SequentialStrategy implements ExecutionStrategy {
  readonly name = 'sequential';

  private readonly delay: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: MetricsCollector;

  constructor(options: StrategyOptions = {}) {
    this.delay = Math.max(0, options.delayBetweenRequests ?? DEFAULT_DELAY_MS);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createMetricsCollector('strategy');
  }

  async execute(tasks: readonly GenerationTask[], processor: TaskProcessor): Promise<GenerationResult[]> {
    const results: GenerationResult[] = [];

    for (const [i, task] of tasks.entries()) {
      this.logger.debug('Processing task', { index: task.index, function: task.function.name, position: i + 1, total: tasks.length });
      results.push(await runGuarded(task, processor, this.logger));

      if (i < tasks.length - 1 && this.delay > 0) {
        await this.sleep(this.delay);
      }
    }

    return results.sort(byTaskIndex);
  }
}

// =============================================================================
// Concurrent
// =============================================================================

export class ConcurrentStrategy implements ExecutionStrategy {
  private readonly maxWorkers: number;
  private readonly logger: MetricsCollector;

  constructor(options: StrategyOptions = {}) {
    this.maxWorkers = Math.max(1, options.maxWorkers ?? DEFAULT_CONCURRENT_WORKERS);
    this.logger = options.logger ?? createMetricsCollector('strategy');
  }

  get name(): string {
    return `concurrent_w${this.maxWorkers}`;
  }

  async execute(tasks: readonly GenerationTask[], processor: TaskProcessor): Promise<GenerationResult[]> {
    const results: GenerationResult[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      for (;;) {
        const task = tasks[next++];
        if (task === undefined) return;
        results.push(await runGuarded(task, processor, this.logger));
      }
    };

    const poolSize = Math.min(this.maxWorkers, tasks.length);
    this.logger.debug('Starting worker pool', { workers: poolSize, tasks: tasks.length });
    await Promise.all(Array.from({ length: poolSize }, () => worker()));

    // Completion order is arbitrary.
    return results.sort(byTaskIndex);
  }
}

// =============================================================================
// Adaptive
// =============================================================================

/**
 * Concurrent execution whose pool size moves by one between batches,
 * following the previous batch's success rate.
 */
export class AdaptiveStrategy implements ExecutionStrategy {
  private readonly minWorkers: number;
  private readonly maxWorkers: number;
  private readonly options: StrategyOptions;
  private readonly logger: MetricsCollector;
  private currentWorkers: number;

  constructor(options: StrategyOptions = {}) {
    this.minWorkers = Math.max(1, options.minWorkers ?? ADAPTIVE_DEFAULTS.minWorkers);
    this.maxWorkers = Math.max(this.minWorkers, options.maxWorkers ?? ADAPTIVE_DEFAULTS.maxWorkers);
    const initial = options.initialWorkers ?? ADAPTIVE_DEFAULTS.initialWorkers;
    this.currentWorkers = Math.min(this.maxWorkers, Math.max(this.minWorkers, initial));
    this.options = options;
    this.logger = options.logger ?? createMetricsCollector('strategy');
  }

  get name(): string {
    return `adaptive_w${this.currentWorkers}`;
  }

  get workers(): number {
    return this.currentWorkers;
  }

  async execute(tasks: readonly GenerationTask[], processor: TaskProcessor): Promise<GenerationResult[]> {
    if (tasks.length <= ADAPTIVE_SEQUENTIAL_THRESHOLD) {
      return new SequentialStrategy(this.options).execute(tasks, processor);
    }

    const concurrent = new ConcurrentStrategy({ ...this.options, maxWorkers: this.currentWorkers });
    const results = await concurrent.execute(tasks, processor);
    this.adjust(results);
    return results;
  }

  private adjust(results: readonly GenerationResult[]): void {
    if (results.length === 0) return;

    const successRate = results.filter((r) => r.success).length / results.length;
    const previous = this.currentWorkers;

    if (successRate < 0.5) {
      this.currentWorkers = Math.max(this.minWorkers, this.currentWorkers - 1);
    } else if (successRate > 0.8) {
      this.currentWorkers = Math.min(this.maxWorkers, this.currentWorkers + 1);
    }

    if (previous !== this.currentWorkers) {
      this.logger.info('Adjusted worker count', { from: previous, to: this.currentWorkers, success_rate: successRate });
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createExecutionStrategy(name: StrategyName, options: StrategyOptions = {}): ExecutionStrategy {
  switch (name) {
    case 'sequential':
      return new SequentialStrategy(options);
    case 'concurrent':
      return new ConcurrentStrategy(options);
    case 'adaptive':
      return new AdaptiveStrategy(options);
  }
}
