/**
 * Context Module
 * ==============
 *
 * Token estimates, dependency ranking and context compression.
 */

export {
  TokenCounter,
  lookupTokenLimit,
  tokenizerFor,
  type TokenizerName,
  MODEL_TOKEN_LIMITS,
  DEFAULT_TOKEN_LIMIT,
  MIN_AVAILABLE_TOKENS,
  CONTEXT_USAGE_RATIO,
  CHARS_PER_TOKEN,
} from './token_counter.js';

export {
  DependencyRanker,
  selectTop,
  selectTopNames,
  importanceForScore,
  meetsImportance,
  isCriticalName,
  RANKING_WEIGHTS,
  CRITICAL_BONUS,
  type ImportanceLevel,
  type DependencyKind,
  type DependencyCandidates,
  type RankedDependency,
  type RankedFunction,
  type RankedStruct,
  type RankedMacro,
} from './dependency_ranker.js';

export {
  ContextCompressor,
  formatSignature,
  selectUsagePatterns,
  compilationInfo,
  SELECTION_LIMITS,
  KEY_FLAG_PREFIXES,
  DEFAULT_BASE_PROMPT_TOKENS,
  type ContextCompressorOptions,
} from './compressor.js';

export type {
  CompressedContext,
  CompressedDependencies,
  CompressedCalledFunction,
  CompressedMacro,
  CompressedStruct,
  CompressionLevel,
  TargetFunctionSummary,
  UsagePattern,
  CompilationInfo,
} from './types.js';
