/**
 * Prompt Tests
 * ============
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { getSystemPrompt, isMemoryFunction, renderTestPrompt } from '../prompt/index.js';
import type { CompressedContext } from '../context/types.js';

// =============================================================================
// Test Fixtures
// =============================================================================

function createContext(overrides: Partial<CompressedContext> = {}): CompressedContext {
  return {
    target_function: {
      name: 'add',
      signature: 'int add(int a, int b)',
      return_type: 'int',
      parameters: [
        { name: 'a', type: 'int' },
        { name: 'b', type: 'int' },
      ],
      body: 'int add(int a, int b) {\n    return a + b;\n}',
      location: 'src/calc.c:3',
      file: 'src/calc.c',
      language: 'c',
      is_static: false,
      access_specifier: 'public',
    },
    dependencies: { called_functions: [], macros: [], data_structures: [] },
    usage_patterns: [],
    compilation_info: { key_flags: [], total_flags_count: 0 },
    compression_level: 0,
    token_count: 40,
    available_tokens: 5600,
    ...overrides,
  };
}

function section(prompt: string, heading: string): string {
  const start = prompt.indexOf(`## ${heading}\n`);
  assert.notEqual(start, -1, `missing section ${heading}`);
  const next = prompt.indexOf('\n## ', start + 1);
  return next === -1 ? prompt.slice(start) : prompt.slice(start, next);
}

// =============================================================================
// System Prompt Tests
// =============================================================================

describe('getSystemPrompt', () => {
  it('should mention extern "C" only for C', () => {
    assert.ok(getSystemPrompt('c').includes('extern "C"'));
    assert.ok(!getSystemPrompt('cpp').includes('extern "C"'));
  });

  it('should fall back to the default prompt', () => {
    assert.ok(getSystemPrompt('rust').startsWith('You are an expert developer'));
  });
});

// =============================================================================
// Memory Detection Tests
// =============================================================================

describe('isMemoryFunction', () => {
  it('should detect allocation and release names', () => {
    assert.equal(isMemoryFunction({ name: 'buffer_Free', return_type: 'void' }), true);
    assert.equal(isMemoryFunction({ name: 'pool_alloc', return_type: 'int' }), true);
    assert.equal(isMemoryFunction({ name: 'destroyNode', return_type: 'void' }), true);
  });

  it('should detect pointer returns', () => {
    assert.equal(isMemoryFunction({ name: 'lookup', return_type: 'const char *' }), true);
  });

  it('should ignore plain value functions', () => {
    assert.equal(isMemoryFunction({ name: 'add', return_type: 'int' }), false);
  });
});

// =============================================================================
// Rendering Tests
// =============================================================================

describe('renderTestPrompt', () => {
  it('should render the target function header', () => {
    const prompt = renderTestPrompt(createContext(), { suiteName: 'calcTest' });

    assert.equal(
      section(prompt, 'Target Function'),
      [
        '## Target Function',
        '',
        'Function name: `add`',
        'Test suite name: `calcTest`',
        'Signature: `int add(int a, int b)`',
        'Return type: `int`',
        'Parameters: `int a`, `int b`',
        'Language: C',
        'Static: no',
        'Access: public',
        'Location: src/calc.c:3',
        '',
      ].join('\n')
    );
    assert.ok(prompt.startsWith('# Unit Test Generation\n'));
    assert.ok(prompt.endsWith('Return the complete test file in one ```cpp block.'));
  });

  it('should include the full body in a fence', () => {
    const prompt = renderTestPrompt(createContext(), { suiteName: 'calcTest' });
    assert.equal(
      section(prompt, 'Implementation'),
      '## Implementation\n\n```c\nint add(int a, int b) {\n    return a + b;\n}\n```\n'
    );
  });

  it('should say none for empty dependency lists and skip mocking', () => {
    const prompt = renderTestPrompt(createContext(), { suiteName: 'calcTest' });

    assert.equal(
      section(prompt, 'Dependencies'),
      '## Dependencies\n\nCalled functions: none\n\nMacros: none\n\nData structures: none\n'
    );
    assert.ok(!prompt.includes('## Mocking'));
    assert.ok(!prompt.includes('## Usage Examples'));
    assert.ok(!prompt.includes('## Memory Management Guidance'));
  });

  it('should list dependencies and static helper definitions', () => {
    const prompt = renderTestPrompt(
      createContext({
        dependencies: {
          called_functions: [
            { name: 'log_msg', location: 'src/log.c:1', is_static: false, declaration: 'void log_msg(const char *m)' },
            { name: 'clamp', location: 'src/calc.c:1', is_static: true, definition: 'static int clamp(int v) { return v; }' },
          ],
          macros: [{ name: 'MAX', definition: '#define MAX 10' }, { name: 'MIN' }],
          data_structures: [{ name: 'pair', definition: 'struct pair { int a; };' }],
        },
      }),
      { suiteName: 'calcTest' }
    );

    assert.equal(
      section(prompt, 'Dependencies'),
      [
        '## Dependencies',
        '',
        'Called functions:',
        '- `void log_msg(const char *m)` (src/log.c:1)',
        '- `clamp` (src/calc.c:1) [static]',
        '',
        'Implementation of static helper `clamp`:',
        '```c',
        'static int clamp(int v) { return v; }',
        '```',
        '',
        'Macros:',
        '- `MAX`: `#define MAX 10`',
        '- `MIN`',
        '',
        'Data structures:',
        '- `pair`:',
        '```c',
        'struct pair { int a; };',
        '```',
        '',
      ].join('\n')
    );
    assert.ok(prompt.includes('## Mocking\n\nMock the external functions this function calls:'));
  });

  it('should render usage examples and compilation flags', () => {
    const prompt = renderTestPrompt(
      createContext({
        usage_patterns: [{ file: 'src/main.c', line: 9, context_preview: 'add(1, 2);' }],
        compilation_info: { key_flags: ['-Iinclude', '-DNDEBUG'], total_flags_count: 5 },
      }),
      { suiteName: 'calcTest' }
    );

    assert.equal(
      section(prompt, 'Usage Examples'),
      '## Usage Examples\n\nExample 1 - src/main.c:9:\n```c\nadd(1, 2);\n```\n\n'
    );
    assert.equal(section(prompt, 'Compilation'), '## Compilation\n\nKey flags: -Iinclude -DNDEBUG\nTotal flags: 5\n');
  });

  it('should ask C++ functions about exception safety', () => {
    const base = createContext();
    const prompt = renderTestPrompt(
      createContext({ target_function: { ...base.target_function, language: 'cpp' } }),
      { suiteName: 'calcTest' }
    );

    assert.ok(prompt.includes('Language: C++'));
    assert.ok(prompt.includes('```cpp\nint add(int a, int b) {'));
    assert.ok(prompt.includes('5. Cover error handling.\n6. Pay attention to C++ memory management and exception safety.'));
  });

  it('should add memory guidance for pointer-returning functions', () => {
    const base = createContext();
    const prompt = renderTestPrompt(
      createContext({ target_function: { ...base.target_function, name: 'make_node', return_type: 'node_t*' } }),
      { suiteName: 'nodeTest' }
    );

    assert.ok(prompt.includes('## Memory Management Guidance\n\nThis function manages memory. In the tests:'));
  });

  it('should point at an existing fixture', () => {
    const fixture = 'class calcTest : public ::testing::Test {\n};';
    const prompt = renderTestPrompt(createContext(), { suiteName: 'calcTest', existingFixtureCode: fixture });

    assert.equal(
      section(prompt, 'Existing Fixture'),
      [
        '## Existing Fixture',
        '',
        'A fixture named `calcTest` already exists. Reuse it with `TEST_F(calcTest, ...)`; do not redefine it.',
        '',
        '```cpp',
        fixture,
        '```',
        '',
      ].join('\n')
    );
  });

  it('should list existing tests to avoid', () => {
    const prompt = renderTestPrompt(createContext(), {
      suiteName: 'calcTest',
      existingTestsContext: {
        matched_files: ['tests/test_calc.cpp'],
        existing_test_functions: ['calcTest.AddsZero'],
        existing_test_classes: [],
        coverage_summary: '1 existing test',
      },
    });

    assert.equal(
      section(prompt, 'Existing Tests'),
      '## Existing Tests\n\n1 existing test\n\nDo not duplicate these tests:\n- calcTest.AddsZero\n'
    );
  });
});
