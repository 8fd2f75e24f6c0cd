/**
 * Anthropic Backend
 * =================
 *
 * Messages API backend.
 *
 * Security:
 * - API key from options or environment only (never hardcoded)
 * - Keys never logged or included in errors
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  BackendError,
  validateRequest,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResponse,
} from './model.js';
import { getSystemPrompt } from '../prompt/index.js';

/**
 * Options for AnthropicBackend.
 */
export interface AnthropicBackendOptions {
  /**
   * API key. If not provided, reads from ANTHROPIC_API_KEY env var.
   */
  api_key?: string;

  /**
   * @default 'claude-3-5-sonnet-20241022'
   */
  model?: string;

  /**
   * Base URL override (for testing/proxies).
   */
  base_url?: string;

  /**
   * Request timeout in milliseconds.
   * @default 300000
   */
  timeout_ms?: number;
}

export class AnthropicBackend implements GenerationBackend {
  readonly provider = 'anthropic';
  readonly model_id: string;

  private readonly client: Anthropic;
  private ready: boolean = false;

  constructor(options: AnthropicBackendOptions = {}) {
    const api_key = options.api_key ?? process.env.ANTHROPIC_API_KEY;

    if (!api_key) {
      throw new BackendError('CONFIGURATION', 'ANTHROPIC_API_KEY not provided and not found in environment');
    }

    this.model_id = options.model ?? 'claude-3-5-sonnet-20241022';

    this.client = new Anthropic({
      apiKey: api_key,
      baseURL: options.base_url ?? null,
      timeout: options.timeout_ms ?? 300000,
      maxRetries: 0,
    });

    this.ready = true;
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    if (!this.ready) {
      throw new BackendError('CONFIGURATION', 'Backend not ready - was it shut down?');
    }
    validateRequest(request);

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model_id,
        max_tokens: request.max_tokens,
        temperature: request.temperature,
        system: request.system_prompt ?? getSystemPrompt(request.language),
        messages: [{ role: 'user', content: request.prompt }],
      });
    } catch (error) {
      throw this.mapError(error);
    }

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n');

    return {
      success: true,
      code: text.trim(),
      usage: {
        prompt_tokens: response.usage.input_tokens,
        completion_tokens: response.usage.output_tokens,
        total_tokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      model: response.model,
    };
  }

  async isReady(): Promise<boolean> {
    return this.ready;
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }

  /**
   * Map SDK errors to BackendError. Other errors pass through to the classifier.
   */
  private mapError(error: unknown): Error {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new BackendError('TIMEOUT', error.message);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new BackendError('NETWORK', error.message);
    }
    if (error instanceof Anthropic.APIError) {
      if (error.status !== undefined) {
        return new BackendError('HTTP_STATUS', error.message, error.status, { provider: this.provider });
      }
      return new BackendError('INVALID_RESPONSE', error.message);
    }
    return error instanceof Error ? error : new BackendError('INVALID_RESPONSE', String(error));
  }
}
