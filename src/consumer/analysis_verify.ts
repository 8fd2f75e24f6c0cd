/**
 * Analysis Input Verification
 * ===========================
 *
 * Checks analyzer output before it enters the pipeline and converts it to
 * typed records. Returns violations deterministically without throwing.
 *
 * Accepted shapes:
 *   { "functions": [ AnalyzedFunction, ... ] }
 *   [ AnalyzedFunction, ... ]
 *
 * Rule IDs:
 * - AN1: Top level is an array or an object with a `functions` array
 * - AN2: Function descriptor fields present and typed
 * - AN3: Language is `c` or `cpp`
 * - AN4: Access specifier is public, protected or private
 * - AN5: Raw context lists present and typed
 * - AN6: Existing tests context typed when present
 */

import type {
  AccessSpecifier,
  AnalyzedFunction,
  CallSite,
  CalledFunction,
  DataStructure,
  ExistingTestsContext,
  FunctionDescriptor,
  MacroDefinition,
  Parameter,
  RawContext,
  SourceLanguage,
} from '../types/analysis.js';

export interface AnalysisViolation {
  rule_id: string;
  message: string;
  path: string;
}

export type AnalysisVerificationResult =
  | { ok: true; functions: AnalyzedFunction[] }
  | { ok: false; violations: AnalysisViolation[] };

// =============================================================================
// Helpers
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

function isLanguage(value: unknown): value is SourceLanguage {
  return value === 'c' || value === 'cpp';
}

function isAccessSpecifier(value: unknown): value is AccessSpecifier {
  return value === 'public' || value === 'protected' || value === 'private';
}

class Collector {
  readonly violations: AnalysisViolation[] = [];

  add(rule_id: string, path: string, message: string): void {
    this.violations.push({ rule_id, path, message });
  }
}

// =============================================================================
// Records
// =============================================================================

function parseParameters(value: unknown, path: string, out: Collector): Parameter[] | undefined {
  if (!Array.isArray(value)) {
    out.add('AN2', path, 'parameters must be an array');
    return undefined;
  }
  const params: Parameter[] = [];
  value.forEach((p, i) => {
    if (isObject(p) && isString(p.name) && isString(p.type)) {
      params.push({ name: p.name, type: p.type });
    } else {
      out.add('AN2', `${path}[${i}]`, 'parameter must have string name and type');
    }
  });
  return params;
}

function parseFunction(value: unknown, path: string, out: Collector): FunctionDescriptor | undefined {
  if (!isObject(value)) {
    out.add('AN2', path, 'function must be an object');
    return undefined;
  }
  const before = out.violations.length;

  for (const key of ['name', 'return_type', 'body', 'file'] as const) {
    if (!isString(value[key])) out.add('AN2', `${path}.${key}`, `${key} must be a string`);
  }
  if (!(typeof value.line === 'number' && Number.isInteger(value.line) && value.line >= 0)) {
    out.add('AN2', `${path}.line`, 'line must be a non-negative integer');
  }
  if (typeof value.is_static !== 'boolean' && value.is_static !== undefined) {
    out.add('AN2', `${path}.is_static`, 'is_static must be a boolean');
  }
  if (!isLanguage(value.language)) {
    out.add('AN3', `${path}.language`, "language must be 'c' or 'cpp'");
  }
  if (value.access_specifier !== undefined && !isAccessSpecifier(value.access_specifier)) {
    out.add('AN4', `${path}.access_specifier`, 'access_specifier must be public, protected or private');
  }
  const parameters = parseParameters(value.parameters ?? [], `${path}.parameters`, out);

  const { name, return_type, body, file, line, language, is_static, access_specifier } = value;
  if (
    out.violations.length > before ||
    !isString(name) ||
    !isString(return_type) ||
    !isString(body) ||
    !isString(file) ||
    typeof line !== 'number' ||
    !isLanguage(language) ||
    parameters === undefined
  ) {
    return undefined;
  }

  return {
    name,
    return_type,
    parameters,
    body,
    file,
    line,
    language,
    is_static: is_static === true,
    access_specifier: isAccessSpecifier(access_specifier) ? access_specifier : 'public',
  };
}

function parseCalledFunction(value: unknown, path: string, out: Collector): CalledFunction | undefined {
  if (!isObject(value) || !isString(value.name)) {
    out.add('AN5', path, 'called function must have a string name');
    return undefined;
  }
  const called: {
    name: string;
    declaration?: string;
    location?: string;
    parameters?: Parameter[];
    return_type?: string;
    is_static?: boolean;
    definition?: string;
  } = { name: value.name };
  if (isString(value.declaration)) called.declaration = value.declaration;
  if (isString(value.location)) called.location = value.location;
  if (isString(value.return_type)) called.return_type = value.return_type;
  if (typeof value.is_static === 'boolean') called.is_static = value.is_static;
  if (isString(value.definition)) called.definition = value.definition;
  if (value.parameters !== undefined) {
    const params = parseParameters(value.parameters, `${path}.parameters`, out);
    if (params !== undefined) called.parameters = params;
  }
  return called;
}

function parseMacro(value: unknown, path: string, out: Collector): MacroDefinition | undefined {
  if (!isObject(value) || !isString(value.name) || !isString(value.definition)) {
    out.add('AN5', path, 'macro definition must have string name and definition');
    return undefined;
  }
  return isString(value.location)
    ? { name: value.name, definition: value.definition, location: value.location }
    : { name: value.name, definition: value.definition };
}

function parseStructure(value: unknown, path: string, out: Collector): DataStructure | undefined {
  if (!isObject(value) || !isString(value.name)) {
    out.add('AN5', path, 'data structure must have a string name');
    return undefined;
  }
  const ds: { name: string; definition?: string; location?: string } = { name: value.name };
  if (isString(value.definition)) ds.definition = value.definition;
  if (isString(value.location)) ds.location = value.location;
  return ds;
}

function parseCallSite(value: unknown, path: string, out: Collector): CallSite | undefined {
  if (!isObject(value) || !isString(value.file) || typeof value.line !== 'number' || !isString(value.context)) {
    out.add('AN5', path, 'call site must have file, line and context');
    return undefined;
  }
  return { file: value.file, line: value.line, context: value.context };
}

function parseList<T>(
  value: unknown,
  path: string,
  out: Collector,
  parse: (item: unknown, itemPath: string, out: Collector) => T | undefined
): T[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    out.add('AN5', path, 'must be an array');
    return [];
  }
  const items: T[] = [];
  value.forEach((item, i) => {
    const parsed = parse(item, `${path}[${i}]`, out);
    if (parsed !== undefined) items.push(parsed);
  });
  return items;
}

function parseContext(value: unknown, path: string, out: Collector): RawContext {
  const ctx: Record<string, unknown> = isObject(value) ? value : {};
  if (value !== undefined && !isObject(value)) {
    out.add('AN5', path, 'context must be an object');
  }

  const stringList = (key: string): string[] => {
    const v = ctx[key];
    if (v === undefined) return [];
    if (!isStringArray(v)) {
      out.add('AN5', `${path}.${key}`, 'must be an array of strings');
      return [];
    }
    return v;
  };

  return {
    called_functions: parseList(ctx.called_functions, `${path}.called_functions`, out, parseCalledFunction),
    macros_used: stringList('macros_used'),
    macro_definitions: parseList(ctx.macro_definitions, `${path}.macro_definitions`, out, parseMacro),
    data_structures: parseList(ctx.data_structures, `${path}.data_structures`, out, parseStructure),
    call_sites: parseList(ctx.call_sites, `${path}.call_sites`, out, parseCallSite),
    compilation_flags: stringList('compilation_flags'),
  };
}

function parseExistingTests(value: unknown, path: string, out: Collector): ExistingTestsContext | undefined {
  if (
    !isObject(value) ||
    !isStringArray(value.matched_files) ||
    !isStringArray(value.existing_test_functions) ||
    !isStringArray(value.existing_test_classes) ||
    !isString(value.coverage_summary)
  ) {
    out.add('AN6', path, 'existing_tests_context must carry matched_files, existing_test_functions, existing_test_classes and coverage_summary');
    return undefined;
  }
  return {
    matched_files: value.matched_files,
    existing_test_functions: value.existing_test_functions,
    existing_test_classes: value.existing_test_classes,
    coverage_summary: value.coverage_summary,
  };
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Verify and convert analyzer output.
 */
export function verifyAnalysisInput(value: unknown): AnalysisVerificationResult {
  const list = Array.isArray(value) ? value : isObject(value) ? value.functions : undefined;
  if (!Array.isArray(list)) {
    return {
      ok: false,
      violations: [{ rule_id: 'AN1', path: '$', message: "input must be an array or an object with a 'functions' array" }],
    };
  }

  const out = new Collector();
  const functions: AnalyzedFunction[] = [];

  list.forEach((entry, i) => {
    const path = `functions[${i}]`;
    if (!isObject(entry)) {
      out.add('AN2', path, 'entry must be an object');
      return;
    }
    const fn = parseFunction(entry.function, `${path}.function`, out);
    const context = parseContext(entry.context, `${path}.context`, out);
    const existing =
      entry.existing_tests_context === undefined || entry.existing_tests_context === null
        ? undefined
        : parseExistingTests(entry.existing_tests_context, `${path}.existing_tests_context`, out);

    if (fn !== undefined) {
      functions.push(existing !== undefined ? { function: fn, context, existing_tests_context: existing } : { function: fn, context });
    }
  });

  return out.violations.length === 0 ? { ok: true, functions } : { ok: false, violations: out.violations };
}
