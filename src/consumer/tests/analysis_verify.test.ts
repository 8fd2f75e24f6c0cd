/**
 * Analysis Input Verification Tests
 * =================================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { verifyAnalysisInput } from '../analysis_verify.js';

// =============================================================================
// Fixtures
// =============================================================================

function validFunction(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'add',
    return_type: 'int',
    parameters: [
      { name: 'a', type: 'int' },
      { name: 'b', type: 'int' },
    ],
    body: 'int add(int a, int b) { return a + b; }',
    file: 'src/calc.c',
    line: 3,
    language: 'c',
    ...overrides,
  };
}

function entry(fn: unknown, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { function: fn, ...extra };
}

function violationsOf(value: unknown): Array<[string, string]> {
  const result = verifyAnalysisInput(value);
  return result.ok ? [] : result.violations.map((v) => [v.rule_id, v.path]);
}

// =============================================================================
// Shape Tests
// =============================================================================

describe('verifyAnalysisInput shape', () => {
  it('should accept a bare array', () => {
    const result = verifyAnalysisInput([entry(validFunction())]);
    assert.equal(result.ok, true);
  });

  it('should accept an object with a functions array', () => {
    const result = verifyAnalysisInput({ functions: [entry(validFunction())] });
    assert.ok(result.ok);
    assert.equal(result.functions.length, 1);
  });

  it('should accept an empty batch', () => {
    assert.deepEqual(verifyAnalysisInput([]), { ok: true, functions: [] });
  });

  it('should reject other top-level values (AN1)', () => {
    assert.deepEqual(violationsOf('functions'), [['AN1', '$']]);
    assert.deepEqual(violationsOf({ items: [] }), [['AN1', '$']]);
    assert.deepEqual(violationsOf(null), [['AN1', '$']]);
  });
});

// =============================================================================
// Function Descriptor Tests
// =============================================================================

describe('verifyAnalysisInput functions', () => {
  it('should fill defaults for optional fields', () => {
    const result = verifyAnalysisInput([entry(validFunction({ parameters: undefined }))]);
    assert.ok(result.ok);

    const [first] = result.functions;
    assert.deepEqual(first, {
      function: {
        name: 'add',
        return_type: 'int',
        parameters: [],
        body: 'int add(int a, int b) { return a + b; }',
        file: 'src/calc.c',
        line: 3,
        language: 'c',
        is_static: false,
        access_specifier: 'public',
      },
      context: {
        called_functions: [],
        macros_used: [],
        macro_definitions: [],
        data_structures: [],
        call_sites: [],
        compilation_flags: [],
      },
    });
  });

  it('should report missing and mistyped fields (AN2)', () => {
    assert.deepEqual(violationsOf([entry(validFunction({ name: 7, line: -1 }))]), [
      ['AN2', 'functions[0].function.name'],
      ['AN2', 'functions[0].function.line'],
    ]);
    assert.deepEqual(violationsOf([entry(validFunction({ is_static: 'no' }))]), [['AN2', 'functions[0].function.is_static']]);
    assert.deepEqual(violationsOf([entry(validFunction({ parameters: [{ name: 'a' }] }))]), [
      ['AN2', 'functions[0].function.parameters[0]'],
    ]);
    assert.deepEqual(violationsOf(['add']), [['AN2', 'functions[0]']]);
    assert.deepEqual(violationsOf([{}]), [['AN2', 'functions[0].function']]);
  });

  it('should check language and access specifier (AN3, AN4)', () => {
    assert.deepEqual(violationsOf([entry(validFunction({ language: 'rust' }))]), [['AN3', 'functions[0].function.language']]);
    assert.deepEqual(violationsOf([entry(validFunction({ access_specifier: 'internal' }))]), [
      ['AN4', 'functions[0].function.access_specifier'],
    ]);
  });

  it('should keep a valid access specifier and static flag', () => {
    const result = verifyAnalysisInput([
      entry(validFunction({ language: 'cpp', is_static: true, access_specifier: 'private' })),
    ]);
    assert.ok(result.ok);
    assert.equal(result.functions[0]?.function.is_static, true);
    assert.equal(result.functions[0]?.function.access_specifier, 'private');
  });

  it('should collect violations across entries', () => {
    assert.deepEqual(violationsOf([entry(validFunction()), entry(validFunction({ body: null }))]), [
      ['AN2', 'functions[1].function.body'],
    ]);
  });
});

// =============================================================================
// Context Tests
// =============================================================================

describe('verifyAnalysisInput context', () => {
  it('should convert a full context', () => {
    const context = {
      called_functions: [
        { name: 'helper', location: 'src/h.c:1', is_static: true, definition: 'static int helper(void);', extra: 1 },
      ],
      macros_used: ['MAX'],
      macro_definitions: [{ name: 'MAX', definition: '#define MAX 10', location: 'src/defs.h:2' }],
      data_structures: [{ name: 'pair' }],
      call_sites: [{ file: 'src/main.c', line: 9, context: 'add(1, 2);' }],
      compilation_flags: ['-Iinclude'],
    };

    const result = verifyAnalysisInput([entry(validFunction(), { context })]);
    assert.ok(result.ok);
    assert.deepEqual(result.functions[0]?.context, {
      called_functions: [{ name: 'helper', location: 'src/h.c:1', is_static: true, definition: 'static int helper(void);' }],
      macros_used: ['MAX'],
      macro_definitions: [{ name: 'MAX', definition: '#define MAX 10', location: 'src/defs.h:2' }],
      data_structures: [{ name: 'pair' }],
      call_sites: [{ file: 'src/main.c', line: 9, context: 'add(1, 2);' }],
      compilation_flags: ['-Iinclude'],
    });
  });

  it('should report malformed context lists (AN5)', () => {
    const context = {
      called_functions: 'helper',
      macros_used: [1],
      call_sites: [{ file: 'src/main.c' }],
    };
    assert.deepEqual(violationsOf([entry(validFunction(), { context })]), [
      ['AN5', 'functions[0].context.called_functions'],
      ['AN5', 'functions[0].context.macros_used'],
      ['AN5', 'functions[0].context.call_sites[0]'],
    ]);
  });

  it('should reject a context that is not an object', () => {
    assert.deepEqual(violationsOf([entry(validFunction(), { context: [] })]), [['AN5', 'functions[0].context']]);
  });

  it('should check the existing tests context (AN6)', () => {
    const existing = {
      matched_files: ['tests/test_calc.cpp'],
      existing_test_functions: ['calcTest.Adds'],
      existing_test_classes: [],
      coverage_summary: '1 test',
    };

    const ok = verifyAnalysisInput([entry(validFunction(), { existing_tests_context: existing })]);
    assert.ok(ok.ok);
    assert.deepEqual(ok.functions[0]?.existing_tests_context, existing);

    assert.deepEqual(violationsOf([entry(validFunction(), { existing_tests_context: { matched_files: [] } })]), [
      ['AN6', 'functions[0].existing_tests_context'],
    ]);
    assert.ok(verifyAnalysisInput([entry(validFunction(), { existing_tests_context: null })]).ok);
  });
});
