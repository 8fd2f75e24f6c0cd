/**
 * Generate Command
 * ================
 *
 * Argument parsing and the run behind the generate-tests CLI. Returns an
 * exit code instead of exiting so it can be driven in-process.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { createBackend, type BackendFactoryOptions } from '../adapters/factory.js';
import { BackendError, type GenerationBackend } from '../adapters/model.js';
import { ConfigError, resolveCredentials, resolveRunConfig, type RunConfig } from '../config/index.js';
import { verifyAnalysisInput } from '../consumer/analysis_verify.js';
import { TestGenerationOrchestrator } from '../generation/orchestrator.js';
import { configureLogging } from '../infra/metrics.js';

// Exit codes
export const EXIT_OK = 0;
export const EXIT_IO_ERROR = 1;
export const EXIT_PARSE_ERROR = 2;
export const EXIT_VALIDATION_ERROR = 3;
export const EXIT_GENERATION_FAILED = 4;

export const USAGE = `Usage: generate-tests --input <analysis.json> [options]

Generates Google Test files for analyzed C/C++ functions.

Options:
  --input <path>          Analyzer output (required)
  --config <path>         JSON run configuration
  --provider <name>       openai | deepseek | anthropic | dify | local | mock
  --model <name>          Model name (provider default when omitted)
  --output <dir>          Output directory
  --project <name>        Project name for the run summary
  --strategy <name>       sequential | concurrent | adaptive
  --workers <n>           Worker count
  --delay <ms>            Pause between sequential requests
  --unit-test-dir <dir>   Directory searched for existing fixtures
  --timestamped           Write into <output>/<project>_<YYYYMMDD_HHMMSS>
  --no-compression        Send the full context
  --log-level <level>     debug | info | warn | error | silent
  --help, -h              Show this help message

Exit codes:
  0 - All generations succeeded
  1 - IO error
  2 - Parse error (invalid JSON)
  3 - Validation or configuration error
  4 - One or more generations failed`;

// =============================================================================
// Argument Parsing
// =============================================================================

export interface GenerateArgs {
  input: string;
  config_path?: string;

  /**
   * Config layer built from flags, verified like a config file.
   */
  overrides: Record<string, unknown>;
}

export type ParseArgsResult = { ok: true; args: GenerateArgs } | { ok: false; help: boolean; message?: string };

const VALUE_FLAGS: Readonly<Record<string, string>> = {
  '--provider': 'provider',
  '--model': 'model',
  '--output': 'output_dir',
  '--project': 'project_name',
  '--strategy': 'strategy',
  '--unit-test-dir': 'unit_test_dir',
  '--log-level': 'log_level',
};

const NUMBER_FLAGS: Readonly<Record<string, string>> = {
  '--workers': 'max_workers',
  '--delay': 'delay_ms',
};

export function parseGenerateArgs(argv: readonly string[]): ParseArgsResult {
  let input: string | undefined;
  let configPath: string | undefined;
  const overrides: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === undefined) continue;
    const valueKey = VALUE_FLAGS[arg];
    const numberKey = NUMBER_FLAGS[arg];

    if (arg === '--help' || arg === '-h') {
      return { ok: false, help: true };
    } else if (arg === '--no-compression') {
      overrides.compression_enabled = false;
    } else if (arg === '--timestamped') {
      overrides.timestamped_output = true;
    } else if (arg === '--input' && next !== undefined) {
      input = next;
      i++;
    } else if (arg === '--config' && next !== undefined) {
      configPath = next;
      i++;
    } else if (valueKey !== undefined && next !== undefined) {
      overrides[valueKey] = next;
      i++;
    } else if (numberKey !== undefined && next !== undefined) {
      const n = Number(next);
      if (next.trim() === '' || !Number.isFinite(n)) {
        return { ok: false, help: false, message: `${arg} expects a number, got '${next}'` };
      }
      overrides[numberKey] = n;
      i++;
    } else {
      return { ok: false, help: false, message: `Unknown or incomplete option: ${arg}` };
    }
  }

  if (input === undefined) {
    return { ok: false, help: false, message: '--input is required' };
  }

  const args: GenerateArgs = { input, overrides };
  if (configPath !== undefined) args.config_path = configPath;
  return { ok: true, args };
}

// =============================================================================
// Run
// =============================================================================

export interface GenerateDeps {
  env?: Readonly<Record<string, string | undefined>>;
  createBackend?: (options: BackendFactoryOptions) => GenerationBackend;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

type ReadOutcome = { ok: true; value: unknown } | { ok: false; code: number; message: string };

async function readJson(path: string): Promise<ReadOutcome> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    return { ok: false, code: EXIT_IO_ERROR, message: `IO_ERROR: ${err instanceof Error ? err.message : String(err)}` };
  }
  try {
    return { ok: true, value: JSON.parse(content) };
  } catch (err) {
    return { ok: false, code: EXIT_PARSE_ERROR, message: `PARSE_ERROR: ${err instanceof Error ? err.message : String(err)}` };
  }
}

/**
 * Run the generate command and return its exit code.
 */
export async function runGenerate(argv: readonly string[], deps: GenerateDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => console.log(text));
  const stderr = deps.stderr ?? ((text: string) => console.error(text));

  const parsed = parseGenerateArgs(argv);
  if (!parsed.ok) {
    if (parsed.help) {
      stdout(USAGE);
      return EXIT_OK;
    }
    stderr(`ERROR: ${parsed.message ?? 'invalid arguments'}`);
    stderr(USAGE);
    return EXIT_VALIDATION_ERROR;
  }
  const { args } = parsed;

  // Configuration
  const layers: unknown[] = [];
  if (args.config_path !== undefined) {
    const file = await readJson(resolve(args.config_path));
    if (!file.ok) {
      stderr(file.message);
      return file.code;
    }
    layers.push(file.value);
  }
  layers.push(args.overrides);

  let config: RunConfig;
  let apiKey: string | undefined;
  try {
    config = resolveRunConfig(...layers);
    apiKey = resolveCredentials(config, deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      stderr(`CONFIG_ERROR: ${JSON.stringify({ ok: false, violations: error.violations })}`);
      return EXIT_VALIDATION_ERROR;
    }
    throw error;
  }
  configureLogging({ level: config.log_level });

  // Input
  const input = await readJson(resolve(args.input));
  if (!input.ok) {
    stderr(input.message);
    return input.code;
  }
  const verified = verifyAnalysisInput(input.value);
  if (!verified.ok) {
    stderr(`VALIDATION_ERROR: ${JSON.stringify({ ok: false, violations: verified.violations })}`);
    return EXIT_VALIDATION_ERROR;
  }

  // Backend
  const backendOptions: BackendFactoryOptions = { provider: config.provider, timeout_ms: config.timeout_ms };
  if (config.model !== undefined) backendOptions.model = config.model;
  if (apiKey !== undefined) backendOptions.api_key = apiKey;
  if (config.base_url !== undefined) backendOptions.base_url = config.base_url;

  let backend: GenerationBackend;
  try {
    backend = (deps.createBackend ?? createBackend)(backendOptions);
  } catch (error) {
    if (error instanceof BackendError) {
      stderr(`CONFIG_ERROR: ${error.message}`);
      return EXIT_VALIDATION_ERROR;
    }
    throw error;
  }

  // Run
  const orchestrator = new TestGenerationOrchestrator({ backend });
  try {
    const aggregated = await orchestrator.run(verified.functions, config);
    stdout(orchestrator.getSummaryReport(aggregated));
    return aggregated.generation_info.failed > 0 ? EXIT_GENERATION_FAILED : EXIT_OK;
  } catch (error) {
    stderr(`IO_ERROR: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_IO_ERROR;
  } finally {
    await backend.shutdown();
  }
}
