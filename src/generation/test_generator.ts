/**
 * Core Test Generator
 * ===================
 *
 * Sends one rendered prompt through the resilient executor and turns the
 * response into a GenerationResult. Content validation only warns.
 */

import { classifyError, errorMessage } from '../adapters/classify.js';
import type { GenerationBackend, GenerationResponse } from '../adapters/model.js';
import type { ResilientExecutor } from '../adapters/resilience.js';
import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';
import type { SourceLanguage } from '../types/analysis.js';
import { failedResult, type GenerationResult, type GenerationTask } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export const GENERATION_MAX_TOKENS = 2500;
export const GENERATION_TEMPERATURE = 0.3;

export interface TestGeneratorOptions {
  backend: GenerationBackend;

  /**
   * Shared for the whole run so the circuit breaker sees every call.
   */
  executor: ResilientExecutor;

  logger?: MetricsCollector;
}

// =============================================================================
// Generator
// =============================================================================

export class CoreTestGenerator {
  private readonly backend: GenerationBackend;
  private readonly executor: ResilientExecutor;
  private readonly logger: MetricsCollector;

  constructor(options: TestGeneratorOptions) {
    this.backend = options.backend;
    this.executor = options.executor;
    this.logger = options.logger ?? createMetricsCollector('generator');
  }

  /**
   * Generate tests for a task. Never throws; terminal errors become failed results.
   */
  async generate(task: GenerationTask, prompt: string): Promise<GenerationResult> {
    const fnName = task.function.name;
    const stopTimer = this.logger.startTimer('generate');

    let response: GenerationResponse;
    try {
      response = await this.executor.execute(async () => {
        const r = await this.backend.generate({
          prompt,
          max_tokens: GENERATION_MAX_TOKENS,
          temperature: GENERATION_TEMPERATURE,
          language: task.function.language,
        });
        if (!r.success) {
          throw new Error(r.error ?? 'Backend reported failure without a message');
        }
        return r;
      }, `generate ${fnName}`);
    } catch (error) {
      stopTimer();
      // BackendCallError keeps its own category; CircuitOpenError lands on PROVIDER.
      const classification = classifyError(error);
      const message = errorMessage(error);
      this.logger.error('Generation failed', { function: fnName, category: classification.category, error: message });
      this.logger.increment('generation.failed');
      return { ...failedResult(task, message, classification.category, this.backend.model_id), prompt, prompt_length: prompt.length };
    }

    const duration = stopTimer();
    const testCode = extractTestCode(response.code);
    const warnings = validateTestCode(testCode, task.function.language);
    for (const warning of warnings) {
      this.logger.warn('Generated code failed validation', { function: fnName, category: 'CONTENT', warning });
    }

    this.logger.increment('generation.succeeded');
    this.logger.info('Generated tests', {
      function: fnName,
      tokens: response.usage.total_tokens,
      duration_ms: Math.round(duration),
    });

    return {
      task,
      success: true,
      test_code: testCode,
      raw_response: response.code,
      prompt,
      usage: response.usage,
      model: response.model,
      prompt_length: prompt.length,
      test_length: testCode.length,
      warnings,
    };
  }
}

// =============================================================================
// Code Extraction / Validation
// =============================================================================

const CPP_FENCE = /```(?:cpp|c\+\+|cc|c)\s*\n([\s\S]*?)```/;
const ANY_FENCE = /```[\w+-]*\s*\n([\s\S]*?)```/;

/**
 * Pull the test file out of a fenced response. Unfenced text is returned trimmed.
 */
export function extractTestCode(response: string): string {
  const match = CPP_FENCE.exec(response) ?? ANY_FENCE.exec(response);
  return (match?.[1] ?? response).trim();
}

/**
 * Check generated code for the markers every Google Test file needs.
 * Returns one message per problem.
 */
export function validateTestCode(code: string, language: SourceLanguage): string[] {
  if (code.trim().length === 0) {
    return ['Generated code is empty'];
  }

  const warnings: string[] = [];
  if (code.includes('```')) {
    warnings.push('Generated code still contains code fence markers');
  }
  if (!code.includes('#include')) {
    warnings.push('Generated code has no #include directive');
  }
  if (!/\bTEST(?:_F|_P)?\s*\(/.test(code)) {
    warnings.push('Generated code defines no TEST, TEST_F or TEST_P case');
  }
  if (!/\b(?:EXPECT|ASSERT)_[A-Z_]+\s*\(/.test(code)) {
    warnings.push('Generated code has no EXPECT_ or ASSERT_ assertion');
  }
  if (language === 'c' && !code.includes('extern "C"') && /#include\s+"[^"]+\.h"/.test(code)) {
    warnings.push('C header included without extern "C"');
  }
  return warnings;
}
