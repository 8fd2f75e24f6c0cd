/**
 * OpenAI-Compatible Backend
 * =========================
 *
 * Chat-completions backend for OpenAI and for DeepSeek, which serves the
 * same API under its own base URL.
 *
 * Security:
 * - API key from options or environment only (never hardcoded)
 * - Keys never logged or included in errors
 */

import OpenAI from 'openai';
import {
  BackendError,
  validateRequest,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResponse,
} from './model.js';
import { getSystemPrompt } from '../prompt/index.js';

// =============================================================================
// Types
// =============================================================================

export type OpenAICompatibleProvider = 'openai' | 'deepseek';

interface ProviderDefaults {
  env_key: string;
  model: string;
  base_url?: string;
}

const PROVIDER_DEFAULTS: Record<OpenAICompatibleProvider, ProviderDefaults> = {
  openai: {
    env_key: 'OPENAI_API_KEY',
    model: 'gpt-3.5-turbo',
  },
  deepseek: {
    env_key: 'DEEPSEEK_API_KEY',
    model: 'deepseek-chat',
    base_url: 'https://api.deepseek.com/v1',
  },
};

/**
 * Options for OpenAICompatibleBackend.
 */
export interface OpenAICompatibleBackendOptions {
  /**
   * @default 'openai'
   */
  provider?: OpenAICompatibleProvider;

  /**
   * API key. If not provided, reads OPENAI_API_KEY or DEEPSEEK_API_KEY.
   */
  api_key?: string;

  /**
   * Model to use. Defaults per provider.
   */
  model?: string;

  /**
   * Base URL override (for proxies and compatible servers).
   */
  base_url?: string;

  /**
   * Request timeout in milliseconds.
   * @default 300000
   */
  timeout_ms?: number;
}

// =============================================================================
// Implementation
// =============================================================================

export class OpenAICompatibleBackend implements GenerationBackend {
  readonly provider: OpenAICompatibleProvider;
  readonly model_id: string;

  private readonly client: OpenAI;
  private ready: boolean = false;

  constructor(options: OpenAICompatibleBackendOptions = {}) {
    this.provider = options.provider ?? 'openai';
    const defaults = PROVIDER_DEFAULTS[this.provider];
    const api_key = options.api_key ?? process.env[defaults.env_key];

    if (!api_key) {
      throw new BackendError(
        'CONFIGURATION',
        `${defaults.env_key} not provided and not found in environment`
      );
    }

    this.model_id = options.model ?? defaults.model;

    // Retries are owned by the resilience layer.
    this.client = new OpenAI({
      apiKey: api_key,
      baseURL: options.base_url ?? defaults.base_url ?? null,
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

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model_id,
        max_tokens: request.max_tokens,
        temperature: request.temperature,
        messages: [
          { role: 'system', content: request.system_prompt ?? getSystemPrompt(request.language) },
          { role: 'user', content: request.prompt },
        ],
      });
    } catch (error) {
      throw this.mapError(error);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new BackendError('INVALID_RESPONSE', `${this.provider} returned no choices`);
    }

    const usage = response.usage;
    return {
      success: true,
      code: (choice.message.content ?? '').trim(),
      usage: {
        prompt_tokens: usage?.prompt_tokens ?? 0,
        completion_tokens: usage?.completion_tokens ?? 0,
        total_tokens: usage?.total_tokens ?? 0,
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
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new BackendError('TIMEOUT', error.message);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new BackendError('NETWORK', error.message);
    }
    if (error instanceof OpenAI.APIError) {
      if (error.status !== undefined) {
        return new BackendError('HTTP_STATUS', error.message, error.status, { provider: this.provider });
      }
      return new BackendError('INVALID_RESPONSE', error.message);
    }
    return error instanceof Error ? error : new BackendError('INVALID_RESPONSE', String(error));
  }
}
