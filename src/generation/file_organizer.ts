/**
 * Debug Artefact Layout
 * =====================
 *
 * Per-function files for inspecting a run:
 *
 *   <base>/1_prompts/prompt_<fn>.txt
 *   <base>/2_raw_responses/response_<fn>.txt
 *   <base>/3_pure_tests/test_<fn>.cpp
 *   <base>/README.md
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { DebugFileInfo, GenerationResult } from './types.js';

export const PROMPTS_DIR = '1_prompts';
export const RAW_RESPONSES_DIR = '2_raw_responses';
export const PURE_TESTS_DIR = '3_pure_tests';

/**
 * Values rendered into the run README.
 */
export interface ReadmeInfo {
  timestamp: string;
  project_name: string;
  provider: string;
  model: string;
  total_functions: number;
  successful: number;
  failed: number;
  total_tokens: number;
}

/**
 * Make a function name usable as a file name component.
 */
export function fileSafeName(name: string): string {
  return name.replace(/[\\/:*?"<>|\s]/g, '_');
}

/**
 * `YYYYMMDD_HHMMSS` in local time.
 */
export function formatRunTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class TestFileOrganizer {
  constructor(readonly baseDir: string) {}

  /**
   * Create `<base>/<project>_<YYYYMMDD_HHMMSS>` and return its path.
   */
  static async createTimestampedDirectory(baseDir: string, projectName: string, now: Date = new Date()): Promise<string> {
    const dir = join(baseDir, `${projectName}_${formatRunTimestamp(now)}`);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async savePrompt(functionName: string, prompt: string): Promise<string> {
    const dir = join(this.baseDir, PROMPTS_DIR);
    await mkdir(dir, { recursive: true });
    const path = join(dir, `prompt_${fileSafeName(functionName)}.txt`);
    await writeFile(path, prompt, 'utf-8');
    return path;
  }

  /**
   * Write all artefacts for one result. Failed results record the prompt and
   * the failure text in place of a response; no pure test file is written.
   */
  async saveResult(result: GenerationResult): Promise<DebugFileInfo> {
    const name = fileSafeName(result.task.function.name);
    const info: DebugFileInfo = {};

    if (result.prompt) {
      info.prompt_file = await this.savePrompt(result.task.function.name, result.prompt);
    }

    const responsesDir = join(this.baseDir, RAW_RESPONSES_DIR);
    await mkdir(responsesDir, { recursive: true });
    info.raw_response_file = join(responsesDir, `response_${name}.txt`);
    const response = result.success ? result.raw_response : `GENERATION FAILED: ${result.error ?? 'unknown error'}\n`;
    await writeFile(info.raw_response_file, response, 'utf-8');

    if (result.success && result.test_code) {
      const testsDir = join(this.baseDir, PURE_TESTS_DIR);
      await mkdir(testsDir, { recursive: true });
      info.pure_test_file = join(testsDir, `test_${name}.cpp`);
      await writeFile(info.pure_test_file, result.test_code, 'utf-8');
    }

    return info;
  }

  async writeReadme(info: ReadmeInfo): Promise<string> {
    await mkdir(this.baseDir, { recursive: true });
    const path = join(this.baseDir, 'README.md');
    await writeFile(path, renderReadme(info), 'utf-8');
    return path;
  }
}

export function renderReadme(info: ReadmeInfo): string {
  return [
    '# Test Generation Results',
    '',
    '## Generation Information',
    `- **Timestamp**: ${info.timestamp}`,
    `- **Project**: ${info.project_name}`,
    `- **Provider**: ${info.provider}`,
    `- **Model**: ${info.model}`,
    `- **Total Functions**: ${info.total_functions}`,
    `- **Successful**: ${info.successful}`,
    `- **Failed**: ${info.failed}`,
    `- **Total Tokens**: ${info.total_tokens}`,
    '',
    '## Directory Structure',
    `- \`${PROMPTS_DIR}/\`: prompts sent to the backend`,
    `- \`${RAW_RESPONSES_DIR}/\`: raw backend responses`,
    `- \`${PURE_TESTS_DIR}/\`: extracted Google Test code`,
    '',
  ].join('\n');
}
