/**
 * Backend Factory
 * ===============
 *
 * The single place that maps a provider name onto a backend class.
 */

import { AnthropicBackend, type AnthropicBackendOptions } from './anthropic.js';
import { DifyBackend, type DifyBackendOptions } from './dify.js';
import { LocalBackend, type LocalBackendOptions } from './local.js';
import { MockBackend } from './mock.js';
import { BackendError, isProviderName, type GenerationBackend, type ProviderName } from './model.js';
import { OpenAICompatibleBackend, type OpenAICompatibleBackendOptions } from './openai.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for creating a backend.
 */
export interface BackendFactoryOptions {
  provider: ProviderName;

  /**
   * Model name (provider-specific). Provider default when omitted.
   */
  model?: string;

  /**
   * Credential. Provider environment variable when omitted.
   */
  api_key?: string;

  base_url?: string;

  /**
   * Request timeout in milliseconds.
   */
  timeout_ms?: number;
}

/**
 * Environment variable holding each provider's credential.
 */
export const CREDENTIAL_ENV_KEYS: Readonly<Record<ProviderName, string | null>> = {
  openai: 'OPENAI_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  dify: 'DIFY_API_KEY',
  local: null,
  mock: null,
};

// =============================================================================
// Factory Implementation
// =============================================================================

/**
 * Create a generation backend.
 *
 * @throws BackendError CONFIGURATION for an unknown provider or missing credentials
 */
export function createBackend(options: BackendFactoryOptions): GenerationBackend {
  const { provider, model, api_key, base_url, timeout_ms } = options;

  switch (provider) {
    case 'openai':
    case 'deepseek': {
      const opts: OpenAICompatibleBackendOptions = { provider };
      if (model !== undefined) opts.model = model;
      if (api_key !== undefined) opts.api_key = api_key;
      if (base_url !== undefined) opts.base_url = base_url;
      if (timeout_ms !== undefined) opts.timeout_ms = timeout_ms;
      return new OpenAICompatibleBackend(opts);
    }

    case 'anthropic': {
      const opts: AnthropicBackendOptions = {};
      if (model !== undefined) opts.model = model;
      if (api_key !== undefined) opts.api_key = api_key;
      if (base_url !== undefined) opts.base_url = base_url;
      if (timeout_ms !== undefined) opts.timeout_ms = timeout_ms;
      return new AnthropicBackend(opts);
    }

    case 'dify': {
      const opts: DifyBackendOptions = {};
      if (model !== undefined) opts.model = model;
      if (api_key !== undefined) opts.api_key = api_key;
      if (base_url !== undefined) opts.base_url = base_url;
      if (timeout_ms !== undefined) opts.timeout_ms = timeout_ms;
      return new DifyBackend(opts);
    }

    case 'local': {
      const opts: LocalBackendOptions = {};
      if (model !== undefined) opts.model = model;
      if (base_url !== undefined) opts.base_url = base_url;
      if (timeout_ms !== undefined) opts.timeout_ms = timeout_ms;
      return new LocalBackend(opts);
    }

    case 'mock':
      return new MockBackend(model !== undefined ? { model_id: model } : {});

    default:
      throw new BackendError('CONFIGURATION', `Unknown provider: ${String(provider)}`);
  }
}

/**
 * Create a backend from an unchecked provider string.
 */
export function createBackendByName(provider: string, options: Omit<BackendFactoryOptions, 'provider'> = {}): GenerationBackend {
  if (!isProviderName(provider)) {
    throw new BackendError('CONFIGURATION', `Unknown provider: ${provider}`);
  }
  return createBackend({ ...options, provider });
}
