/**
 * Generation Module
 * =================
 *
 * Task scheduling, test generation, merging and the run orchestrator.
 */

export {
  failedResult,
  type GenerationTask,
  type GenerationResult,
  type DebugFileInfo,
  type TaskProcessor,
  type StrategyName,
  type PipelineConfig,
  type RunSettings,
  type TokenStats,
  type GenerationInfo,
  type AggregatedResult,
} from './types.js';

export {
  CoreTestGenerator,
  extractTestCode,
  validateTestCode,
  GENERATION_MAX_TOKENS,
  GENERATION_TEMPERATURE,
  type TestGeneratorOptions,
} from './test_generator.js';

export {
  SequentialStrategy,
  ConcurrentStrategy,
  AdaptiveStrategy,
  createExecutionStrategy,
  isStrategyName,
  STRATEGY_NAMES,
  DEFAULT_DELAY_MS,
  DEFAULT_CONCURRENT_WORKERS,
  ADAPTIVE_DEFAULTS,
  ADAPTIVE_SEQUENTIAL_THRESHOLD,
  type ExecutionStrategy,
  type StrategyOptions,
} from './strategies.js';

export {
  TestFileAggregator,
  MergeError,
  extractParts,
  mergeTestContent,
  bracesBalanced,
  type TestFileParts,
} from './aggregator.js';

export {
  TestFileOrganizer,
  fileSafeName,
  formatRunTimestamp,
  renderReadme,
  PROMPTS_DIR,
  RAW_RESPONSES_DIR,
  PURE_TESTS_DIR,
  type ReadmeInfo,
} from './file_organizer.js';

export { FixtureFinder } from './fixture_finder.js';

export {
  TestGenerationOrchestrator,
  summarize,
  sourceStem,
  suiteNameFor,
  targetPathFor,
  FAILURE_KEY_LENGTH,
  type OrchestratorOptions,
} from './orchestrator.js';
