/**
 * Analyzer Interchange Types
 * ==========================
 *
 * Records handed over by the code analyzer. The pipeline reads them and
 * never mutates them.
 */

// =============================================================================
// Function Descriptors
// =============================================================================

/**
 * Source language of an analyzed function.
 */
export type SourceLanguage = 'c' | 'cpp';

/**
 * A single formal parameter.
 */
export interface Parameter {
  readonly name: string;
  readonly type: string;
}

/**
 * Access specifier for C++ members. Free functions are `public`.
 */
export type AccessSpecifier = 'public' | 'protected' | 'private';

/**
 * A function extracted from the code under test.
 */
export interface FunctionDescriptor {
  readonly name: string;
  readonly return_type: string;
  readonly parameters: readonly Parameter[];

  /**
   * Full body text. Never truncated anywhere in the pipeline.
   */
  readonly body: string;

  /**
   * Path of the source file declaring the function.
   */
  readonly file: string;

  readonly line: number;
  readonly language: SourceLanguage;
  readonly is_static: boolean;
  readonly access_specifier: AccessSpecifier;
}

// =============================================================================
// Raw Context
// =============================================================================

/**
 * A function called from the target function.
 */
export interface CalledFunction {
  readonly name: string;

  /**
   * Declaration or signature text, when the analyzer resolved one.
   */
  readonly declaration?: string;

  /**
   * `path:line` of the definition, when known.
   */
  readonly location?: string;

  readonly parameters?: readonly Parameter[];
  readonly return_type?: string;
  readonly is_static?: boolean;

  /**
   * Full definition text. Only forwarded for static helpers.
   */
  readonly definition?: string;
}

/**
 * A macro definition as written in the source.
 */
export interface MacroDefinition {
  readonly name: string;
  readonly definition: string;
  readonly location?: string;
}

/**
 * A struct/class/typedef the target touches.
 */
export interface DataStructure {
  readonly name: string;
  readonly definition?: string;
  readonly location?: string;
}

/**
 * A place where the target function is called.
 */
export interface CallSite {
  readonly file: string;
  readonly line: number;

  /**
   * Surrounding source text.
   */
  readonly context: string;
}

/**
 * Everything the analyzer collected around one function.
 */
export interface RawContext {
  readonly called_functions: readonly CalledFunction[];
  readonly macros_used: readonly string[];
  readonly macro_definitions: readonly MacroDefinition[];
  readonly data_structures: readonly DataStructure[];
  readonly call_sites: readonly CallSite[];
  readonly compilation_flags: readonly string[];
}

// =============================================================================
// Existing Tests
// =============================================================================

/**
 * Summary of tests that already cover the source file, from the test matcher.
 */
export interface ExistingTestsContext {
  readonly matched_files: readonly string[];
  readonly existing_test_functions: readonly string[];
  readonly existing_test_classes: readonly string[];
  readonly coverage_summary: string;
}

/**
 * One analyzer record: the function, its context and optional test info.
 */
export interface AnalyzedFunction {
  readonly function: FunctionDescriptor;
  readonly context: RawContext;
  readonly existing_tests_context?: ExistingTestsContext;
}

/**
 * Build an empty raw context.
 */
export function emptyRawContext(): RawContext {
  return {
    called_functions: [],
    macros_used: [],
    macro_definitions: [],
    data_structures: [],
    call_sites: [],
    compilation_flags: [],
  };
}
