/**
 * testforge
 * =========
 *
 * Generates Google Test files for analyzed C/C++ functions by driving a
 * text-generation backend under token, concurrency and reliability budgets.
 *
 * Pipeline:
 * - Context: token estimates, dependency ranking, progressive compression
 * - Prompt: Markdown prompt per function
 * - Adapters: generation backends behind one interface, retry and circuit breaker
 * - Generation: scheduling strategies, merging into per-source test files
 *
 * @packageDocumentation
 */

// Analyzer records
export { emptyRawContext } from './types/analysis.js';
export type {
  SourceLanguage,
  Parameter,
  AccessSpecifier,
  FunctionDescriptor,
  CalledFunction,
  MacroDefinition,
  DataStructure,
  CallSite,
  RawContext,
  ExistingTestsContext,
  AnalyzedFunction,
} from './types/analysis.js';
export { verifyAnalysisInput, type AnalysisViolation, type AnalysisVerificationResult } from './consumer/analysis_verify.js';

// Context
export * from './context/index.js';

// Prompt
export { renderTestPrompt, getSystemPrompt, isMemoryFunction, type RenderPromptOptions } from './prompt/index.js';

// Backends and resilience
export * from './adapters/index.js';

// Generation
export * from './generation/index.js';

// Configuration
export {
  DEFAULT_RUN_CONFIG,
  ConfigError,
  verifyRunConfig,
  resolveRunConfig,
  resolveCredentials,
  type RunConfig,
  type ConfigViolation,
  type ConfigVerificationResult,
} from './config/index.js';

// Infrastructure
export * from './infra/index.js';
