/**
 * Dify Backend
 * ============
 *
 * Dify chat-messages API in blocking mode. The model is configured on the
 * Dify application, so `model_id` is only a label.
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
  type TokenUsage,
} from './model.js';

export const DIFY_DEFAULT_BASE_URL = 'https://api.dify.ai/v1';

/**
 * Options for DifyBackend.
 */
export interface DifyBackendOptions {
  /**
   * API key. If not provided, reads from DIFY_API_KEY env var.
   */
  api_key?: string;

  /**
   * @default 'https://api.dify.ai/v1'
   */
  base_url?: string;

  /**
   * Label reported as the serving model.
   * @default 'dify_model'
   */
  model?: string;

  /**
   * End-user identifier sent with each request.
   * @default 'testforge'
   */
  user?: string;

  /**
   * @default 300000
   */
  timeout_ms?: number;
}

export class DifyBackend implements GenerationBackend {
  readonly provider = 'dify';
  readonly model_id: string;

  private readonly api_key: string;
  private readonly endpoint: string;
  private readonly user: string;
  private readonly timeout_ms: number;
  private ready: boolean = false;

  constructor(options: DifyBackendOptions = {}) {
    const api_key = options.api_key ?? process.env.DIFY_API_KEY;
    if (!api_key) {
      throw new BackendError('CONFIGURATION', 'DIFY_API_KEY not provided and not found in environment');
    }

    this.api_key = api_key;
    this.endpoint = `${(options.base_url ?? DIFY_DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat-messages`;
    this.model_id = options.model ?? 'dify_model';
    this.user = options.user ?? 'testforge';
    this.timeout_ms = options.timeout_ms ?? 300000;
    this.ready = true;
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    if (!this.ready) {
      throw new BackendError('CONFIGURATION', 'Backend not ready - was it shut down?');
    }
    validateRequest(request);

    const data = await postJson(
      this.endpoint,
      {
        inputs: {},
        query: request.prompt,
        response_mode: 'blocking',
        user: this.user,
      },
      {
        headers: { Authorization: `Bearer ${this.api_key}` },
        timeout_ms: this.timeout_ms,
      }
    );

    if (!isRecord(data)) {
      throw new BackendError('INVALID_RESPONSE', 'Dify response is not an object');
    }
    const answer = stringField(data, 'answer');
    if (answer === undefined) {
      throw new BackendError('INVALID_RESPONSE', "Dify response missing 'answer'");
    }

    return {
      success: true,
      code: answer.trim(),
      usage: readUsage(data),
      model: stringField(data, 'model') ?? this.model_id,
    };
  }

  async isReady(): Promise<boolean> {
    return this.ready;
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }
}

function readUsage(data: Record<string, unknown>): TokenUsage {
  const metadata = data['metadata'];
  const usage = isRecord(metadata) ? metadata['usage'] : undefined;
  if (!isRecord(usage)) {
    return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
  }
  return {
    prompt_tokens: numberField(usage, 'prompt_tokens'),
    completion_tokens: numberField(usage, 'completion_tokens'),
    total_tokens: numberField(usage, 'total_tokens'),
  };
}
