/**
 * Generate CLI Tests
 * ==================
 *
 * Tests for the generate-tests command: argument parsing, exit codes and
 * a full run against the mock provider. The command runs in-process.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { BackendError, MockBackend } from '../../adapters/index.js';
import {
  EXIT_GENERATION_FAILED,
  EXIT_IO_ERROR,
  EXIT_OK,
  EXIT_PARSE_ERROR,
  EXIT_VALIDATION_ERROR,
  USAGE,
  parseGenerateArgs,
  runGenerate,
  type GenerateDeps,
} from '../generate_command.js';

// =============================================================================
// Helper: Run CLI
// =============================================================================

interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

async function runCli(args: string[], deps: GenerateDeps = {}): Promise<CliResult> {
  const out: string[] = [];
  const err: string[] = [];
  const exitCode = await runGenerate(args, {
    env: {},
    ...deps,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  });
  return { stdout: out.join('\n'), stderr: err.join('\n'), exitCode };
}

const ANALYSIS = {
  functions: [
    {
      function: {
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
      },
      context: {},
    },
  ],
};

// =============================================================================
// Argument Parsing Tests
// =============================================================================

describe('parseGenerateArgs', () => {
  it('should map flags onto a config layer', () => {
    const parsed = parseGenerateArgs([
      '--input',
      'analysis.json',
      '--config',
      'run.json',
      '--provider',
      'mock',
      '--output',
      'out',
      '--workers',
      '4',
      '--delay',
      '0',
      '--strategy',
      'adaptive',
      '--no-compression',
      '--timestamped',
    ]);

    assert.deepEqual(parsed, {
      ok: true,
      args: {
        input: 'analysis.json',
        config_path: 'run.json',
        overrides: {
          provider: 'mock',
          output_dir: 'out',
          max_workers: 4,
          delay_ms: 0,
          strategy: 'adaptive',
          compression_enabled: false,
          timestamped_output: true,
        },
      },
    });
  });

  it('should require --input', () => {
    assert.deepEqual(parseGenerateArgs(['--provider', 'mock']), { ok: false, help: false, message: '--input is required' });
  });

  it('should reject unknown and incomplete options', () => {
    assert.deepEqual(parseGenerateArgs(['--input', 'a.json', '--verbose']), {
      ok: false,
      help: false,
      message: 'Unknown or incomplete option: --verbose',
    });
    assert.deepEqual(parseGenerateArgs(['--input', 'a.json', '--model']), {
      ok: false,
      help: false,
      message: 'Unknown or incomplete option: --model',
    });
  });

  it('should reject non-numeric counts', () => {
    assert.deepEqual(parseGenerateArgs(['--input', 'a.json', '--workers', 'many']), {
      ok: false,
      help: false,
      message: "--workers expects a number, got 'many'",
    });
  });

  it('should recognise help', () => {
    assert.deepEqual(parseGenerateArgs(['-h']), { ok: false, help: true });
  });
});

// =============================================================================
// Exit Code Tests
// =============================================================================

describe('generate-tests CLI', () => {
  let dir: string;
  let inputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'testforge-cli-'));
    inputPath = join(dir, 'analysis.json');
    await writeFile(inputPath, JSON.stringify(ANALYSIS), 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function baseArgs(): string[] {
    return [
      '--input',
      inputPath,
      '--provider',
      'mock',
      '--strategy',
      'sequential',
      '--delay',
      '0',
      '--output',
      join(dir, 'out'),
      '--project',
      'calc',
      '--log-level',
      'silent',
    ];
  }

  it('should print usage for --help', async () => {
    const result = await runCli(['--help']);
    assert.equal(result.exitCode, EXIT_OK);
    assert.equal(result.stdout, USAGE);
  });

  it('should exit 3 on bad arguments', async () => {
    const result = await runCli(['--provider', 'mock']);
    assert.equal(result.exitCode, EXIT_VALIDATION_ERROR);
    assert.ok(result.stderr.startsWith('ERROR: --input is required\n'));
  });

  it('should generate tests and exit 0', async () => {
    const result = await runCli(baseArgs());

    assert.equal(result.exitCode, EXIT_OK);
    assert.equal(result.stderr, '');
    assert.ok(result.stdout.startsWith('=== Test Generation Summary ===\nProject: calc\nProvider: mock (mock)\n'));
    assert.equal(
      await readFile(join(dir, 'out', 'test_calc.cpp'), 'utf-8'),
      '#include <gtest/gtest.h>\n\nTEST(calcTest, add_ReturnsExpectedValue) {\n    // add\n    EXPECT_TRUE(true);\n}'
    );
  });

  it('should exit 4 when a generation fails', async () => {
    const backend = new MockBackend();
    backend.enqueue({ error: new BackendError('HTTP_STATUS', 'bad key', 401) });

    const result = await runCli(baseArgs(), { createBackend: () => backend });

    assert.equal(result.exitCode, EXIT_GENERATION_FAILED);
    assert.ok(result.stdout.includes('Failed generations: 1\n'));
    assert.equal(await backend.isReady(), false);
  });

  it('should exit 1 when the input is missing', async () => {
    const result = await runCli(['--input', join(dir, 'absent.json'), '--provider', 'mock', '--log-level', 'silent']);
    assert.equal(result.exitCode, EXIT_IO_ERROR);
    assert.ok(result.stderr.startsWith('IO_ERROR: '));
  });

  it('should exit 2 on invalid JSON', async () => {
    await writeFile(inputPath, '{ not json', 'utf-8');
    const result = await runCli(baseArgs());
    assert.equal(result.exitCode, EXIT_PARSE_ERROR);
    assert.ok(result.stderr.startsWith('PARSE_ERROR: '));
  });

  it('should exit 3 on an invalid analysis file', async () => {
    await writeFile(inputPath, JSON.stringify({ functions: [{ function: { name: 'add' } }] }), 'utf-8');

    const result = await runCli(baseArgs());

    assert.equal(result.exitCode, EXIT_VALIDATION_ERROR);
    assert.ok(result.stderr.startsWith('VALIDATION_ERROR: {"ok":false,"violations":[{"rule_id":"AN2"'));
  });

  it('should exit 3 on an invalid configuration', async () => {
    const result = await runCli([...baseArgs(), '--workers', '0']);

    assert.equal(result.exitCode, EXIT_VALIDATION_ERROR);
    assert.equal(
      result.stderr,
      'CONFIG_ERROR: {"ok":false,"violations":[{"rule_id":"CF4","message":"max_workers must be a positive integer","path":"max_workers"}]}'
    );
  });

  it('should exit 3 without credentials', async () => {
    const result = await runCli(['--input', inputPath, '--provider', 'deepseek'], { env: {} });

    assert.equal(result.exitCode, EXIT_VALIDATION_ERROR);
    assert.ok(result.stderr.includes('"rule_id":"CF11"'));
  });

  it('should read a config file beneath the flags', async () => {
    const configPath = join(dir, 'run.json');
    await writeFile(
      configPath,
      JSON.stringify({ provider: 'mock', project_name: 'from-file', strategy: 'sequential', delay_ms: 0, log_level: 'silent' }),
      'utf-8'
    );

    const result = await runCli(['--input', inputPath, '--config', configPath, '--output', join(dir, 'cfg'), '--project', 'from-flag']);

    assert.equal(result.exitCode, EXIT_OK);
    assert.ok(result.stdout.includes('Project: from-flag\n'));
  });

  it('should exit 2 on an invalid config file', async () => {
    const configPath = join(dir, 'run.json');
    await writeFile(configPath, 'provider = mock', 'utf-8');

    const result = await runCli(['--input', inputPath, '--config', configPath]);

    assert.equal(result.exitCode, EXIT_PARSE_ERROR);
  });
});
