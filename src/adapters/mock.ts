/**
 * Mock Backend
 * ============
 *
 * Deterministic offline backend. Produces a small Google Test file built
 * from the suite and function named in the prompt. Does not make any
 * network calls.
 *
 * Usage:
 * ```typescript
 * const backend = new MockBackend();
 * backend.addSubstringMatch('divide', { content: '```cpp\n...\n```' });
 * backend.enqueue({ error: new BackendError('HTTP_STATUS', 'busy', 503) });
 * ```
 */

import {
  BackendError,
  validateRequest,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResponse,
  type TokenUsage,
} from './model.js';

// =============================================================================
// Mock Response Configuration
// =============================================================================

/**
 * Configured reply.
 */
export interface MockResponse {
  /**
   * Text to return.
   */
  content: string;

  /**
   * Report `success: false` with this error instead of the content.
   */
  failure?: string;

  /**
   * Simulated usage (default: estimated from prompt and content).
   */
  usage?: TokenUsage;
}

/**
 * One scripted call outcome, consumed in call order.
 */
export type MockStep = MockResponse | { error: Error };

/**
 * Options for MockBackend.
 */
export interface MockBackendOptions {
  /**
   * Model ID to report (default: 'mock').
   */
  model_id?: string;

  /**
   * Simulated latency in ms, fixed or per request.
   */
  latency_ms?: number | ((request: GenerationRequest) => number);
}

const SUITE_PATTERN = /Test suite name: `([^`]+)`/;
const FUNCTION_PATTERN = /Function name: `([^`]+)`/;

// =============================================================================
// Mock Backend Implementation
// =============================================================================

/**
 * Responses are picked in this order:
 * 1. Scripted steps (enqueue)
 * 2. First substring match
 * 3. Generated default test
 */
export class MockBackend implements GenerationBackend {
  readonly provider = 'mock';
  readonly model_id: string;

  private readonly latency: number | ((request: GenerationRequest) => number);
  private readonly substringMatches: Map<string, MockResponse> = new Map();
  private readonly script: MockStep[] = [];
  private readonly requests: GenerationRequest[] = [];
  private ready = true;

  constructor(options: MockBackendOptions = {}) {
    this.model_id = options.model_id ?? 'mock';
    this.latency = options.latency_ms ?? 0;
  }

  /**
   * Add a response for any prompt containing the substring.
   */
  addSubstringMatch(substring: string, response: MockResponse): void {
    this.substringMatches.set(substring, response);
  }

  /**
   * Queue outcomes for the next calls.
   */
  enqueue(...steps: MockStep[]): void {
    this.script.push(...steps);
  }

  /**
   * Requests received so far, in call order.
   */
  getRequests(): readonly GenerationRequest[] {
    return this.requests;
  }

  get callCount(): number {
    return this.requests.length;
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    if (!this.ready) {
      throw new BackendError('CONFIGURATION', 'Backend is not ready');
    }
    validateRequest(request);
    this.requests.push(request);

    const delay = typeof this.latency === 'function' ? this.latency(request) : this.latency;
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const step = this.script.shift();
    if (step && 'error' in step) {
      throw step.error;
    }

    const response = step ?? this.matchSubstring(request.prompt) ?? { content: defaultTestFile(request.prompt) };
    const usage = response.usage ?? estimateUsage(request.prompt, response.content);

    if (response.failure !== undefined) {
      return { success: false, code: '', error: response.failure, usage, model: this.model_id };
    }
    return { success: true, code: response.content, usage, model: this.model_id };
  }

  async isReady(): Promise<boolean> {
    return this.ready;
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }

  private matchSubstring(prompt: string): MockResponse | undefined {
    for (const [substring, response] of this.substringMatches) {
      if (prompt.includes(substring)) {
        return response;
      }
    }
    return undefined;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Fenced Google Test file for the suite and function named in the prompt.
 */
export function defaultTestFile(prompt: string): string {
  const suite = SUITE_PATTERN.exec(prompt)?.[1] ?? 'MockTest';
  const fn = FUNCTION_PATTERN.exec(prompt)?.[1] ?? 'generated';
  return [
    '```cpp',
    '#include <gtest/gtest.h>',
    '',
    `TEST(${suite}, ${fn}_ReturnsExpectedValue) {`,
    `    // ${fn}`,
    '    EXPECT_TRUE(true);',
    '}',
    '```',
  ].join('\n');
}

function estimateUsage(prompt: string, content: string): TokenUsage {
  const prompt_tokens = Math.floor(prompt.length / 4);
  const completion_tokens = Math.floor(content.length / 4);
  return { prompt_tokens, completion_tokens, total_tokens: prompt_tokens + completion_tokens };
}
