/**
 * Local Backend
 * =============
 *
 * Local model server speaking the Ollama generate API, for offline runs.
 *
 * Ollama API: https://github.com/ollama/ollama/blob/main/docs/api.md
 *
 * No SDK required - uses native fetch.
 */

import { isRecord, numberField, postJson, stringField } from './http.js';
import {
  BackendError,
  validateRequest,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResponse,
} from './model.js';
import { getSystemPrompt } from '../prompt/index.js';

export const LOCAL_DEFAULT_BASE_URL = 'http://localhost:11434';

/**
 * Options for LocalBackend.
 */
export interface LocalBackendOptions {
  /**
   * Base URL of the server. Falls back to OLLAMA_BASE_URL.
   * @default 'http://localhost:11434'
   */
  base_url?: string;

  /**
   * @default 'qwen2.5-coder'
   */
  model?: string;

  /**
   * @default 300000 (local models can be slow)
   */
  timeout_ms?: number;
}

export class LocalBackend implements GenerationBackend {
  readonly provider = 'local';
  readonly model_id: string;

  private readonly base_url: string;
  private readonly timeout_ms: number;
  private ready: boolean = false;

  constructor(options: LocalBackendOptions = {}) {
    this.base_url = (options.base_url ?? process.env.OLLAMA_BASE_URL ?? LOCAL_DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.model_id = options.model ?? 'qwen2.5-coder';
    this.timeout_ms = options.timeout_ms ?? 300000;
    this.ready = true;
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    if (!this.ready) {
      throw new BackendError('CONFIGURATION', 'Backend not ready - was it shut down?');
    }
    validateRequest(request);

    const data = await postJson(
      `${this.base_url}/api/generate`,
      {
        model: this.model_id,
        prompt: request.prompt,
        system: request.system_prompt ?? getSystemPrompt(request.language),
        stream: false,
        options: {
          temperature: request.temperature,
          num_predict: request.max_tokens,
        },
      },
      { timeout_ms: this.timeout_ms }
    );

    if (!isRecord(data)) {
      throw new BackendError('INVALID_RESPONSE', 'Local server response is not an object');
    }
    const text = stringField(data, 'response');
    if (text === undefined) {
      throw new BackendError('INVALID_RESPONSE', "Local server response missing 'response'");
    }

    const prompt_tokens = numberField(data, 'prompt_eval_count');
    const completion_tokens = numberField(data, 'eval_count');
    return {
      success: true,
      code: text.trim(),
      usage: {
        prompt_tokens,
        completion_tokens,
        total_tokens: prompt_tokens + completion_tokens,
      },
      model: stringField(data, 'model') ?? this.model_id,
    };
  }

  /**
   * Whether the server answers on /api/tags.
   */
  async isReady(): Promise<boolean> {
    if (!this.ready) return false;

    try {
      const response = await fetch(`${this.base_url}/api/tags`, {
        method: 'GET',
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }
}
