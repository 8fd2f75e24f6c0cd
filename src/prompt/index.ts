/**
 * Prompt Rendering
 * ================
 *
 * Markdown prompts for Google Test generation, built from a CompressedContext.
 */

import type { CompressedContext, TargetFunctionSummary } from '../context/types.js';
import type { ExistingTestsContext } from '../types/analysis.js';

// =============================================================================
// Types
// =============================================================================

export interface RenderPromptOptions {
  /**
   * Google Test suite (or fixture) name the tests must use.
   */
  suiteName: string;

  /**
   * Source of an existing fixture class. Tests then use TEST_F on it.
   */
  existingFixtureCode?: string;

  existingTestsContext?: ExistingTestsContext;
}

// =============================================================================
// System Prompts
// =============================================================================

const SYSTEM_PROMPTS: Record<string, string> = {
  c: [
    'You are an expert C developer who writes unit tests with Google Test.',
    'Wrap C headers in extern "C" when including them from C++ test files.',
    'Return one complete, compilable C++ test file inside a single ```cpp block.',
  ].join(' '),
  cpp: [
    'You are an expert C++ developer who writes unit tests with Google Test and Google Mock.',
    'Return one complete, compilable C++ test file inside a single ```cpp block.',
  ].join(' '),
  default: [
    'You are an expert developer who writes thorough unit tests with Google Test.',
    'Return one complete, compilable test file inside a single ```cpp block.',
  ].join(' '),
};

/**
 * System prompt for a source language.
 */
export function getSystemPrompt(language: string): string {
  return SYSTEM_PROMPTS[language] ?? SYSTEM_PROMPTS['default'] ?? '';
}

// =============================================================================
// Memory Functions
// =============================================================================

const MEMORY_KEYWORDS = ['free', 'delete', 'alloc', 'malloc', 'new', 'release', 'destroy'];

/**
 * Whether a function allocates, releases or returns memory.
 */
export function isMemoryFunction(fn: Pick<TargetFunctionSummary, 'name' | 'return_type'>): boolean {
  const name = fn.name.toLowerCase();
  if (MEMORY_KEYWORDS.some((keyword) => name.includes(keyword))) {
    return true;
  }
  return fn.return_type.includes('*');
}

const MEMORY_GUIDANCE = [
  '## Memory Management Guidance',
  '',
  'This function manages memory. In the tests:',
  '1. Check that allocation and release pair up correctly.',
  '2. Verify that null pointers are handled safely.',
  '3. Do not exercise undefined behaviour such as double free.',
  '4. Release everything a test allocates so no test leaks.',
  '5. For C++ delete/delete[], check exception safety.',
];

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render the generation prompt for one function.
 */
export function renderTestPrompt(context: CompressedContext, options: RenderPromptOptions): string {
  const target = context.target_function;
  const deps = context.dependencies;
  const languageLabel = target.language === 'cpp' ? 'C++' : 'C';
  const fence = target.language === 'cpp' ? 'cpp' : 'c';
  const lines: string[] = [];

  lines.push(
    '# Unit Test Generation',
    '',
    '## Target Function',
    '',
    `Function name: \`${target.name}\``,
    `Test suite name: \`${options.suiteName}\``,
    `Signature: \`${target.signature}\``,
    `Return type: \`${target.return_type}\``,
    `Parameters: ${target.parameters.map((p) => `\`${p.type} ${p.name}\``).join(', ') || 'none'}`,
    `Language: ${languageLabel}`,
    `Static: ${target.is_static ? 'yes' : 'no'}`,
    `Access: ${target.access_specifier}`,
    `Location: ${target.location}`,
    '',
    '## Implementation',
    '',
    `\`\`\`${fence}`,
    target.body,
    '```',
    '',
    '## Dependencies',
    ''
  );

  if (deps.called_functions.length === 0) {
    lines.push('Called functions: none');
  } else {
    lines.push('Called functions:');
    for (const fn of deps.called_functions) {
      lines.push(`- \`${fn.declaration ?? fn.name}\` (${fn.location})${fn.is_static ? ' [static]' : ''}`);
    }
    const staticHelpers = deps.called_functions.filter((fn) => fn.definition !== undefined);
    for (const fn of staticHelpers) {
      lines.push('', `Implementation of static helper \`${fn.name}\`:`, `\`\`\`${fence}`, fn.definition ?? '', '```');
    }
  }

  lines.push('');
  if (deps.macros.length === 0) {
    lines.push('Macros: none');
  } else {
    lines.push('Macros:');
    for (const macro of deps.macros) {
      lines.push(macro.definition !== undefined ? `- \`${macro.name}\`: \`${macro.definition}\`` : `- \`${macro.name}\``);
    }
  }

  lines.push('');
  if (deps.data_structures.length === 0) {
    lines.push('Data structures: none');
  } else {
    lines.push('Data structures:');
    for (const ds of deps.data_structures) {
      if (ds.definition !== undefined) {
        lines.push(`- \`${ds.name}\`:`, `\`\`\`${fence}`, ds.definition, '```');
      } else {
        lines.push(`- \`${ds.name}\``);
      }
    }
  }

  if (context.usage_patterns.length > 0) {
    lines.push('', '## Usage Examples', '');
    context.usage_patterns.forEach((site, i) => {
      lines.push(`Example ${i + 1} - ${site.file}:${site.line}:`, `\`\`\`${fence}`, site.context_preview, '```', '');
    });
  }

  const info = context.compilation_info;
  lines.push(
    '',
    '## Compilation',
    '',
    `Key flags: ${info.key_flags.join(' ') || 'none'}`,
    `Total flags: ${info.total_flags_count}`
  );

  if (options.existingFixtureCode) {
    lines.push(
      '',
      '## Existing Fixture',
      '',
      `A fixture named \`${options.suiteName}\` already exists. Reuse it with \`TEST_F(${options.suiteName}, ...)\`; do not redefine it.`,
      '',
      '```cpp',
      options.existingFixtureCode,
      '```'
    );
  }

  const existing = options.existingTestsContext;
  if (existing && existing.existing_test_functions.length > 0) {
    lines.push(
      '',
      '## Existing Tests',
      '',
      existing.coverage_summary,
      '',
      'Do not duplicate these tests:',
      ...existing.existing_test_functions.map((name) => `- ${name}`)
    );
  }

  lines.push(
    '',
    '## Requirements',
    '',
    `Generate ${languageLabel} unit tests with Google Test:`,
    '1. A complete test file with every required #include.',
    `2. Use \`${options.suiteName}\` as the test suite name.`,
    '3. Use Google Test assertions (EXPECT_* / ASSERT_*).',
    '4. Cover the normal path and boundary conditions.',
    '5. Cover error handling.'
  );
  if (target.language === 'cpp') {
    lines.push('6. Pay attention to C++ memory management and exception safety.');
  }

  if (deps.called_functions.length > 0) {
    lines.push(
      '',
      '## Mocking',
      '',
      'Mock the external functions this function calls:',
      '1. Include the headers the mocks need.',
      '2. Provide a mock for each external function.',
      '3. Set reasonable expectations and return values.'
    );
  }

  if (isMemoryFunction(target)) {
    lines.push('', ...MEMORY_GUIDANCE);
  }

  lines.push('', 'Return the complete test file in one ```cpp block.');

  return lines.join('\n');
}
