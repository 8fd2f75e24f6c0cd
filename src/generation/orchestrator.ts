/**
 * Generation Orchestrator
 * =======================
 *
 * Runs the pipeline for a batch of analyzed functions:
 *
 *   1. Prepare   - one task per non-static function, fixtures resolved
 *   2. Prompts   - render every prompt and save it before any backend call
 *   3. Execute   - strategy runs generate -> merge -> debug artefacts per task
 *   4. Aggregate - counts, failure breakdown, token stats, README
 *
 * A failed task is recorded and the run continues.
 */

import { basename, extname, join } from 'node:path';

import { classifyError, errorMessage } from '../adapters/classify.js';
import type { GenerationBackend } from '../adapters/model.js';
import { createResilientExecutor, type ResilientExecutor } from '../adapters/resilience.js';
import { ContextCompressor } from '../context/compressor.js';
import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';
import { renderTestPrompt, type RenderPromptOptions } from '../prompt/index.js';
import type { AnalyzedFunction } from '../types/analysis.js';
import { MergeError, TestFileAggregator } from './aggregator.js';
import { TestFileOrganizer } from './file_organizer.js';
import { FixtureFinder } from './fixture_finder.js';
import { createExecutionStrategy, type ExecutionStrategy } from './strategies.js';
import { CoreTestGenerator } from './test_generator.js';
import type {
  AggregatedResult,
  GenerationInfo,
  GenerationResult,
  GenerationTask,
  PipelineConfig,
  RunSettings,
  TokenStats,
} from './types.js';

// =============================================================================
// Options
// =============================================================================

export interface OrchestratorOptions {
  backend: GenerationBackend;

  /**
   * Defaults to one built from the run's retry and circuit settings.
   */
  executor?: ResilientExecutor;

  /**
   * Defaults to the strategy named in the run config.
   */
  strategy?: ExecutionStrategy;

  compressor?: ContextCompressor;
  aggregator?: TestFileAggregator;
  fixtureFinder?: FixtureFinder;
  logger?: MetricsCollector;

  /**
   * Clock for timestamps and durations.
   */
  now?: () => Date;
}

/**
 * Length of the error prefix failures are grouped by.
 */
export const FAILURE_KEY_LENGTH = 50;

// =============================================================================
// Naming
// =============================================================================

/**
 * File name without its last extension.
 */
export function sourceStem(file: string): string {
  return basename(file, extname(file));
}

/**
 * `<stem with dots replaced by _>Test`.
 */
export function suiteNameFor(file: string): string {
  return `${sourceStem(file).replace(/\./g, '_')}Test`;
}

export function targetPathFor(outputDir: string, file: string): string {
  return join(outputDir, `test_${sourceStem(file)}.cpp`);
}

// =============================================================================
// Orchestrator
// =============================================================================

export class TestGenerationOrchestrator {
  private readonly backend: GenerationBackend;
  private readonly options: OrchestratorOptions;
  private readonly aggregator: TestFileAggregator;
  private readonly fixtureFinder: FixtureFinder;
  private readonly logger: MetricsCollector;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.backend = options.backend;
    this.options = options;
    this.logger = options.logger ?? createMetricsCollector('orchestrator');
    this.aggregator = options.aggregator ?? new TestFileAggregator();
    this.fixtureFinder = options.fixtureFinder ?? new FixtureFinder();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the whole pipeline.
   */
  async run(functions: readonly AnalyzedFunction[], config: PipelineConfig): Promise<AggregatedResult> {
    const startedAt = this.now();
    this.logger.info('Starting test generation', {
      project: config.project_name,
      functions: functions.length,
      provider: this.backend.provider,
      model: this.backend.model_id,
    });

    const outputDir = config.timestamped_output
      ? await TestFileOrganizer.createTimestampedDirectory(config.output_dir, config.project_name, startedAt)
      : config.output_dir;
    const organizer = new TestFileOrganizer(outputDir);

    const compressor =
      this.options.compressor ??
      new ContextCompressor({
        provider: this.backend.provider,
        model: this.backend.model_id,
        basePromptTokens: config.base_prompt_tokens,
        enabled: config.compression_enabled,
      });
    const strategy =
      this.options.strategy ??
      createExecutionStrategy(config.strategy, {
        maxWorkers: config.max_workers,
        delayBetweenRequests: config.delay_ms,
      });
    const executor =
      this.options.executor ?? createResilientExecutor({ retry: config.retry, circuit: config.circuit });
    const generator = new CoreTestGenerator({ backend: this.backend, executor });

    // Phase 1
    const { tasks, skipped } = await this.prepareTasks(functions, config, outputDir);
    this.logger.info('Prepared generation tasks', { tasks: tasks.length, skipped_static: skipped });

    // Phase 2
    const render = (task: GenerationTask): string => {
      const compressed = compressor.compress(task.function, task.context);
      const renderOptions: RenderPromptOptions = { suiteName: task.suite_name };
      if (task.existing_fixture_code !== undefined) renderOptions.existingFixtureCode = task.existing_fixture_code;
      if (task.existing_tests_context !== undefined) renderOptions.existingTestsContext = task.existing_tests_context;
      return renderTestPrompt(compressed, renderOptions);
    };
    for (const task of tasks) {
      task.prompt = render(task);
      await organizer.savePrompt(task.function.name, task.prompt);
    }
    this.logger.info('Saved prompts', { count: tasks.length });

    // Phase 3
    this.logger.info('Executing generation', { strategy: strategy.name });
    const results = await strategy.execute(tasks, async (task) => {
      const prompt = task.prompt ?? render(task);
      const result = await generator.generate(task, prompt);
      if (result.success) {
        await this.mergeResult(result);
      }
      try {
        result.file_info = await organizer.saveResult(result);
      } catch (error) {
        this.logger.warn('Could not write debug artefacts', { function: task.function.name, error: errorMessage(error) });
      }
      return result;
    });

    // Phase 4
    const finishedAt = this.now();
    const info = summarize(results, skipped, startedAt, finishedAt);
    this.logOutcome(results, info);

    const settings: RunSettings = {
      project_name: config.project_name,
      provider: this.backend.provider,
      model: this.backend.model_id,
      output_dir: outputDir,
      strategy: strategy.name,
      max_workers: config.max_workers,
      compression_enabled: config.compression_enabled,
    };
    if (config.unit_test_dir !== undefined) settings.unit_test_dir = config.unit_test_dir;

    if (config.write_readme) {
      try {
        info.summary_file = await organizer.writeReadme({
          timestamp: finishedAt.toISOString(),
          project_name: config.project_name,
          provider: this.backend.provider,
          model: this.backend.model_id,
          total_functions: info.total_functions,
          successful: info.successful,
          failed: info.failed,
          total_tokens: info.token_stats.total_tokens,
        });
      } catch (error) {
        this.logger.error('Failed to write README', { error: errorMessage(error) });
      }
    }

    this.logger.info('Test generation completed', {
      successful: info.successful,
      total: info.total_functions,
      duration_ms: info.duration_ms,
    });

    return { config: settings, results, generation_info: info };
  }

  /**
   * Text report of a finished run.
   */
  getSummaryReport(aggregated: AggregatedResult): string {
    const info = aggregated.generation_info;
    const lines = [
      '=== Test Generation Summary ===',
      `Project: ${aggregated.config.project_name}`,
      `Provider: ${aggregated.config.provider} (${aggregated.config.model})`,
      `Total functions processed: ${info.total_functions}`,
      `Successful generations: ${info.successful}`,
      `Failed generations: ${info.failed}`,
      `Success rate: ${(info.success_rate * 100).toFixed(1)}%`,
      `Duration: ${(info.duration_ms / 1000).toFixed(2)} seconds`,
      `Tokens: ${info.token_stats.total_tokens} total, ${Math.round(info.token_stats.average_tokens_per_success)} per success`,
    ];

    const failures = aggregated.results.filter((r) => !r.success);
    if (failures.length > 0) {
      lines.push('', 'Failed functions:');
      for (const r of failures) {
        lines.push(`  - ${r.task.function.name}: ${r.error ?? 'unknown error'}`);
      }
    }
    return lines.join('\n');
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  private async prepareTasks(
    functions: readonly AnalyzedFunction[],
    config: PipelineConfig,
    outputDir: string
  ): Promise<{ tasks: GenerationTask[]; skipped: number }> {
    const tasks: GenerationTask[] = [];
    let skipped = 0;

    for (const entry of functions) {
      const fn = entry.function;
      if (fn.is_static) {
        this.logger.info('Skipping static function', { function: fn.name });
        skipped++;
        continue;
      }

      const suite_name = suiteNameFor(fn.file);
      let fixture: string | undefined;
      if (config.unit_test_dir !== undefined) {
        fixture = await this.fixtureFinder.find(suite_name, config.unit_test_dir);
      }

      const task: GenerationTask = {
        index: tasks.length,
        function: fn,
        context: entry.context,
        target_filepath: targetPathFor(outputDir, fn.file),
        suite_name,
        ...(fixture !== undefined ? { existing_fixture_code: fixture } : {}),
        ...(entry.existing_tests_context !== undefined ? { existing_tests_context: entry.existing_tests_context } : {}),
      };
      tasks.push(task);
    }

    return { tasks, skipped };
  }

  /**
   * Merge a successful result into its aggregate file. Failures keep the code.
   */
  private async mergeResult(result: GenerationResult): Promise<void> {
    const target = result.task.target_filepath;
    try {
      await this.aggregator.aggregate(target, result.test_code);
      result.output_path = target;
    } catch (error) {
      result.success = false;
      result.error = errorMessage(error);
      result.error_category = error instanceof MergeError ? 'CONTENT' : classifyError(error).category;
      this.logger.error('Merge failed', { function: result.task.function.name, path: target, error: result.error });
    }
  }

  private logOutcome(results: readonly GenerationResult[], info: GenerationInfo): void {
    this.logger.info('Generation finished', { successful: info.successful, failed: info.failed });

    if (info.failed > 0) {
      const names = results.filter((r) => !r.success).map((r) => r.task.function.name);
      this.logger.warn('Failed to generate tests', { functions: names });
      for (const [error, count] of Object.entries(info.failure_breakdown)) {
        this.logger.info('Failure group', { error, count });
      }
    }

    if (info.successful > 0) {
      this.logger.info('Token usage', {
        total: info.token_stats.total_tokens,
        average_per_function: Math.round(info.token_stats.average_tokens_per_success),
      });
    }
  }
}

// =============================================================================
// Summary
// =============================================================================

export function summarize(
  results: readonly GenerationResult[],
  skippedStatic: number,
  startedAt: Date,
  finishedAt: Date
): GenerationInfo {
  const successes = results.filter((r) => r.success);
  const failures = results.filter((r) => !r.success);

  const failure_breakdown: Record<string, number> = {};
  for (const r of failures) {
    const key = (r.error ?? 'Unknown error').slice(0, FAILURE_KEY_LENGTH);
    failure_breakdown[key] = (failure_breakdown[key] ?? 0) + 1;
  }

  const token_stats: TokenStats = {
    total_prompt_tokens: 0,
    total_completion_tokens: 0,
    total_tokens: 0,
    average_tokens_per_success: 0,
  };
  for (const r of successes) {
    token_stats.total_prompt_tokens += r.usage.prompt_tokens;
    token_stats.total_completion_tokens += r.usage.completion_tokens;
    token_stats.total_tokens += r.usage.total_tokens;
  }
  if (successes.length > 0) {
    token_stats.average_tokens_per_success = token_stats.total_tokens / successes.length;
  }

  return {
    total_functions: results.length,
    skipped_static: skippedStatic,
    successful: successes.length,
    failed: failures.length,
    success_rate: results.length === 0 ? 0 : successes.length / results.length,
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    duration_ms: finishedAt.getTime() - startedAt.getTime(),
    token_stats,
    failure_breakdown,
  };
}
