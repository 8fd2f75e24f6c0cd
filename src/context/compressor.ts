/**
 * Context Compressor
 * ==================
 *
 * Builds a bounded CompressedContext from an analyzer record. When the
 * estimate exceeds the model budget, up to three progressively stricter
 * passes are applied. The target body is never shortened by any pass, and
 * the compressor never fails on over-budget input.
 */

import type {
  CalledFunction,
  CallSite,
  FunctionDescriptor,
  RawContext,
} from '../types/analysis.js';
import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';
import {
  DependencyRanker,
  selectTop,
  type ImportanceLevel,
  type RankedFunction,
  type RankedMacro,
  type RankedStruct,
} from './dependency_ranker.js';
import { TokenCounter } from './token_counter.js';
import type {
  CompilationInfo,
  CompressedCalledFunction,
  CompressedContext,
  CompressedDependencies,
  CompressedMacro,
  CompressedStruct,
  CompressionLevel,
  TargetFunctionSummary,
  UsagePattern,
} from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface ContextCompressorOptions {
  /**
   * Provider used for the token limit lookup.
   */
  provider?: string;

  /**
   * Model used for the token limit lookup.
   */
  model?: string;

  /**
   * Tokens reserved for the fixed parts of the prompt.
   */
  basePromptTokens?: number;

  /**
   * When false, the full context is returned without selection or passes.
   */
  enabled?: boolean;

  logger?: MetricsCollector;
}

/**
 * Selection sizes for the first, unconstrained build.
 */
export const SELECTION_LIMITS = {
  functions: 5,
  structs: 3,
  macros: 4,
  usage_patterns: 2,
  preview_chars: 200,
  key_flags: 3,
} as const;

export const DEFAULT_BASE_PROMPT_TOKENS = 800;

/**
 * Compiler flag prefixes worth showing in a prompt.
 */
export const KEY_FLAG_PREFIXES = ['-I', '-D', '-std=', '-O'] as const;

const LEVEL1_PREVIEW_CHARS = 150;
const STRICT_IMPORTANCE: ImportanceLevel = 'MEDIUM';

interface RankedSets {
  functions: RankedFunction[];
  structs: RankedStruct[];
  macros: RankedMacro[];
}

type ContextBody = Pick<
  CompressedContext,
  'target_function' | 'dependencies' | 'usage_patterns' | 'compilation_info'
>;

// =============================================================================
// Compressor
// =============================================================================

export class ContextCompressor {
  private readonly counter: TokenCounter;
  private readonly basePromptTokens: number;
  private readonly enabled: boolean;
  private readonly logger: MetricsCollector;

  constructor(options: ContextCompressorOptions = {}) {
    this.counter = new TokenCounter(options.provider ?? 'openai', options.model ?? 'gpt-3.5-turbo');
    this.basePromptTokens = options.basePromptTokens ?? DEFAULT_BASE_PROMPT_TOKENS;
    this.enabled = options.enabled ?? true;
    this.logger = options.logger ?? createMetricsCollector('compressor');
  }

  /**
   * Token budget for context sections.
   */
  get availableTokens(): number {
    return this.counter.getAvailableTokens(this.basePromptTokens);
  }

  /**
   * Compress the context for one function.
   */
  compress(fn: FunctionDescriptor, raw: RawContext): CompressedContext {
    const available = this.availableTokens;
    const target = summarizeTarget(fn);

    if (!this.enabled) {
      const body: ContextBody = {
        target_function: target,
        dependencies: fullDependencies(raw),
        usage_patterns: raw.call_sites.map((site) => toUsagePattern(site, site.context.length)),
        compilation_info: compilationInfo(raw.compilation_flags, Number.POSITIVE_INFINITY),
      };
      return this.finish(body, 0, available);
    }

    const ranker = new DependencyRanker(fn);
    const ranked: RankedSets = {
      functions: ranker.rankCalledFunctions(raw.called_functions),
      structs: ranker.rankDataStructures(raw.data_structures),
      macros: ranker.rankMacros(raw.macros_used, raw.macro_definitions),
    };

    let body: ContextBody = {
      target_function: target,
      dependencies: {
        called_functions: selectTop(ranked.functions, SELECTION_LIMITS.functions).map((d) => toCalledFunction(d.data)),
        macros: selectTop(ranked.macros, SELECTION_LIMITS.macros).map((d) => withDefinition(d.data)),
        data_structures: selectTop(ranked.structs, SELECTION_LIMITS.structs).map((d) => withDefinition(d.data)),
      },
      usage_patterns: selectUsagePatterns(raw.call_sites),
      compilation_info: compilationInfo(raw.compilation_flags, SELECTION_LIMITS.key_flags),
    };

    let level: CompressionLevel = 0;
    let tokens = this.counter.countTokensFromValue(body);

    while (tokens > available && level < 3) {
      level = nextLevel(level);
      body = applyLevel(body, level, ranked);
      tokens = this.counter.countTokensFromValue(body);
      this.logger.debug('Applied compression pass', { function: fn.name, level, tokens, available });
    }

    if (tokens > available) {
      this.logger.warn('Context still over budget after final pass', {
        function: fn.name,
        tokens,
        available,
      });
    }

    return this.finish(body, level, available);
  }

  private finish(body: ContextBody, level: CompressionLevel, available: number): CompressedContext {
    return {
      ...body,
      compression_level: level,
      token_count: this.counter.countTokensFromValue(body),
      available_tokens: available,
    };
  }
}

// =============================================================================
// Building Blocks
// =============================================================================

/**
 * `<return> <name>(<type> <name>, ...)`.
 */
export function formatSignature(fn: Pick<FunctionDescriptor, 'name' | 'return_type' | 'parameters'>): string {
  const params = fn.parameters.map((p) => `${p.type} ${p.name}`.trim()).join(', ');
  return `${fn.return_type} ${fn.name}(${params})`;
}

function summarizeTarget(fn: FunctionDescriptor): TargetFunctionSummary {
  return {
    name: fn.name,
    signature: formatSignature(fn),
    return_type: fn.return_type,
    parameters: fn.parameters.map((p) => ({ name: p.name, type: p.type })),
    body: fn.body,
    location: `${fn.file}:${fn.line}`,
    file: fn.file,
    language: fn.language,
    is_static: fn.is_static,
    access_specifier: fn.access_specifier,
  };
}

function toCalledFunction(fn: CalledFunction): CompressedCalledFunction {
  const out: CompressedCalledFunction = {
    name: fn.name,
    location: fn.location ?? 'unknown',
    is_static: fn.is_static ?? false,
  };
  if (fn.declaration !== undefined) out.declaration = fn.declaration;
  if (fn.return_type !== undefined) out.return_type = fn.return_type;
  if (fn.parameters !== undefined) out.parameters = fn.parameters.map((p) => ({ name: p.name, type: p.type }));
  if (fn.is_static && fn.definition) out.definition = fn.definition;
  return out;
}

function withDefinition(record: { name: string; definition?: string }): CompressedMacro | CompressedStruct {
  return record.definition ? { name: record.name, definition: record.definition } : { name: record.name };
}

function nameOnly(record: { name: string }): CompressedMacro | CompressedStruct {
  return { name: record.name };
}

function fullDependencies(raw: RawContext): CompressedDependencies {
  const defs = new Map(raw.macro_definitions.map((m) => [m.name, m]));
  return {
    called_functions: raw.called_functions.map(toCalledFunction),
    macros: raw.macros_used.map((name) => withDefinition(defs.get(name) ?? { name })),
    data_structures: raw.data_structures.map(withDefinition),
  };
}

function toUsagePattern(site: CallSite, maxChars: number): UsagePattern {
  return {
    file: site.file,
    line: site.line,
    context_preview: site.context.slice(0, maxChars),
  };
}

/**
 * First call site of each file, up to the selection limit.
 */
export function selectUsagePatterns(sites: readonly CallSite[]): UsagePattern[] {
  const seen = new Set<string>();
  const patterns: UsagePattern[] = [];
  for (const site of sites) {
    if (patterns.length >= SELECTION_LIMITS.usage_patterns) break;
    if (seen.has(site.file)) continue;
    seen.add(site.file);
    patterns.push(toUsagePattern(site, SELECTION_LIMITS.preview_chars));
  }
  return patterns;
}

/**
 * Flags whose prefix is in KEY_FLAG_PREFIXES, in input order.
 */
export function compilationInfo(flags: readonly string[], maxFlags: number): CompilationInfo {
  const keyFlags = flags.filter((flag) => KEY_FLAG_PREFIXES.some((prefix) => flag.startsWith(prefix)));
  return {
    key_flags: keyFlags.slice(0, maxFlags),
    total_flags_count: flags.length,
  };
}

// =============================================================================
// Compression Passes
// =============================================================================

function nextLevel(level: CompressionLevel): CompressionLevel {
  switch (level) {
    case 0:
      return 1;
    case 1:
      return 2;
    default:
      return 3;
  }
}

function applyLevel(body: ContextBody, level: CompressionLevel, ranked: RankedSets): ContextBody {
  switch (level) {
    case 0:
      return body;
    case 1:
      return {
        ...body,
        usage_patterns: body.usage_patterns.map((p) => ({
          ...p,
          context_preview: p.context_preview.slice(0, LEVEL1_PREVIEW_CHARS),
        })),
      };
    case 2:
      return {
        ...body,
        dependencies: {
          called_functions: selectTop(ranked.functions, 3, STRICT_IMPORTANCE).map((d) => toCalledFunction(d.data)),
          macros: selectTop(ranked.macros, 2, STRICT_IMPORTANCE).map((d) => withDefinition(d.data)),
          data_structures: selectTop(ranked.structs, 1, STRICT_IMPORTANCE).map((d) => withDefinition(d.data)),
        },
      };
    case 3:
      return {
        ...body,
        usage_patterns: [],
        dependencies: {
          called_functions: selectTop(ranked.functions, 1, STRICT_IMPORTANCE).map((d) => toCalledFunction(d.data)),
          macros: selectTop(ranked.macros, 2, STRICT_IMPORTANCE).map((d) => nameOnly(d.data)),
          data_structures: selectTop(ranked.structs, 1, STRICT_IMPORTANCE).map((d) => nameOnly(d.data)),
        },
      };
  }
}
