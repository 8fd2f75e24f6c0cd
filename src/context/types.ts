/**
 * Compressed Context Types
 * ========================
 *
 * The bounded view of a function and its surroundings that goes into a prompt.
 */

import type { AccessSpecifier, Parameter, SourceLanguage } from '../types/analysis.js';

// =============================================================================
// Target Function
// =============================================================================

/**
 * Summary of the function under test. `body` is always the full text.
 */
export interface TargetFunctionSummary {
  name: string;
  signature: string;
  return_type: string;
  parameters: Parameter[];
  body: string;

  /**
   * `file:line` of the definition.
   */
  location: string;

  file: string;
  language: SourceLanguage;
  is_static: boolean;
  access_specifier: AccessSpecifier;
}

// =============================================================================
// Dependencies
// =============================================================================

export interface CompressedCalledFunction {
  name: string;
  location: string;
  declaration?: string;
  return_type?: string;
  parameters?: Parameter[];
  is_static: boolean;

  /**
   * Implementation text. Only carried for static helpers, which the
   * generated test cannot link against.
   */
  definition?: string;
}

export interface CompressedMacro {
  name: string;
  definition?: string;
}

export interface CompressedStruct {
  name: string;
  definition?: string;
}

export interface CompressedDependencies {
  called_functions: CompressedCalledFunction[];
  macros: CompressedMacro[];
  data_structures: CompressedStruct[];
}

// =============================================================================
// Usage / Compilation
// =============================================================================

/**
 * Preview of one call site.
 */
export interface UsagePattern {
  file: string;
  line: number;
  context_preview: string;
}

export interface CompilationInfo {
  key_flags: string[];
  total_flags_count: number;
}

// =============================================================================
// Compressed Context
// =============================================================================

/**
 * 0 means uncompressed; 3 is the most aggressive pass.
 */
export type CompressionLevel = 0 | 1 | 2 | 3;

/**
 * Prompt-ready context for one function.
 */
export interface CompressedContext {
  target_function: TargetFunctionSummary;
  dependencies: CompressedDependencies;
  usage_patterns: UsagePattern[];
  compilation_info: CompilationInfo;

  compression_level: CompressionLevel;

  /**
   * Estimated token cost of the four content sections.
   */
  token_count: number;

  /**
   * Budget the context was measured against.
   */
  available_tokens: number;
}
