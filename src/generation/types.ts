/**
 * Generation Types
 * ================
 *
 * Tasks, per-task results and the run-level aggregate.
 */

import type { ErrorCategory } from '../adapters/classify.js';
import type { ProviderName, TokenUsage } from '../adapters/model.js';
import type { CircuitBreakerConfig, RetryConfig } from '../adapters/resilience.js';
import type { ExistingTestsContext, FunctionDescriptor, RawContext } from '../types/analysis.js';

// =============================================================================
// Tasks
// =============================================================================

/**
 * One function to generate tests for.
 *
 * Everything except `prompt` is fixed at creation; `index` is the task's
 * position in the run and is what results are ordered by.
 */
export interface GenerationTask {
  readonly index: number;
  readonly function: FunctionDescriptor;
  readonly context: RawContext;

  /**
   * Aggregate test file this function's tests are merged into.
   */
  readonly target_filepath: string;

  readonly suite_name: string;
  readonly existing_fixture_code?: string;
  readonly existing_tests_context?: ExistingTestsContext;

  /**
   * Rendered prompt, attached once.
   */
  prompt?: string;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Debug artefact paths written for one task.
 */
export interface DebugFileInfo {
  prompt_file?: string;
  raw_response_file?: string;
  pure_test_file?: string;
}

/**
 * Outcome of one task.
 */
export interface GenerationResult {
  readonly task: GenerationTask;
  success: boolean;

  /**
   * Generated code, kept even when a later merge step fails.
   */
  test_code: string;

  /**
   * Backend text before code extraction.
   */
  raw_response: string;

  prompt: string;
  error?: string;
  error_category?: ErrorCategory;
  usage: TokenUsage;
  model: string;
  prompt_length: number;
  test_length: number;

  /**
   * Aggregate file the code was merged into.
   */
  output_path?: string;

  file_info?: DebugFileInfo;

  /**
   * Content validation findings. Never fatal.
   */
  warnings: string[];
}

/**
 * Processes one task. Strategies never let a processor error escape.
 */
export type TaskProcessor = (task: GenerationTask) => Promise<GenerationResult>;

// =============================================================================
// Pipeline Configuration
// =============================================================================

export type StrategyName = 'sequential' | 'concurrent' | 'adaptive';

/**
 * Settings for one pipeline run.
 */
export interface PipelineConfig {
  project_name: string;

  /**
   * Aggregate test files and debug artefacts are written here.
   */
  output_dir: string;

  /**
   * Write into `<output_dir>/<project>_<YYYYMMDD_HHMMSS>` instead.
   */
  timestamped_output: boolean;

  strategy: StrategyName;
  max_workers: number;

  /**
   * Pause between sequential tasks, in ms.
   */
  delay_ms: number;

  compression_enabled: boolean;
  base_prompt_tokens: number;

  /**
   * Searched for existing fixtures when set.
   */
  unit_test_dir?: string;

  write_readme: boolean;
  retry: Partial<Pick<RetryConfig, 'maxAttempts' | 'baseDelay' | 'maxDelay' | 'backoffStrategy' | 'backoffMultiplier'>>;
  circuit: Partial<Pick<CircuitBreakerConfig, 'failureThreshold' | 'recoveryTimeout'>>;
}

// =============================================================================
// Run Aggregate
// =============================================================================

/**
 * Run settings echoed into the aggregate.
 */
export interface RunSettings {
  project_name: string;
  provider: ProviderName;
  model: string;

  /**
   * Directory actually written, after any timestamp suffix.
   */
  output_dir: string;

  strategy: string;
  max_workers: number;
  compression_enabled: boolean;
  unit_test_dir?: string;
}

export interface TokenStats {
  total_prompt_tokens: number;
  total_completion_tokens: number;
  total_tokens: number;

  /**
   * Average total tokens per successful task.
   */
  average_tokens_per_success: number;
}

export interface GenerationInfo {
  total_functions: number;
  skipped_static: number;
  successful: number;
  failed: number;
  success_rate: number;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  token_stats: TokenStats;

  /**
   * Failure counts keyed by the first 50 characters of the error.
   */
  failure_breakdown: Record<string, number>;

  summary_file?: string;
}

/**
 * Complete record of one run.
 */
export interface AggregatedResult {
  readonly config: RunSettings;
  readonly results: readonly GenerationResult[];
  readonly generation_info: GenerationInfo;
}

/**
 * Build a failed result for a task.
 */
export function failedResult(
  task: GenerationTask,
  error: string,
  error_category: ErrorCategory,
  model: string
): GenerationResult {
  const prompt = task.prompt ?? '';
  return {
    task,
    success: false,
    test_code: '',
    raw_response: '',
    prompt,
    error,
    error_category,
    usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
    model,
    prompt_length: prompt.length,
    test_length: 0,
    warnings: [],
  };
}
