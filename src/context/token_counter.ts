/**
 * Token Counter
 * =============
 *
 * Token counts and per-model context limits. OpenAI-style providers are
 * counted with their BPE encoding; mock and local models use a character
 * estimate.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';

import type { ProviderName } from '../adapters/model.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Characters per token for the estimate.
 */
export const CHARS_PER_TOKEN = 4;

/**
 * Share of the model limit a single request may use.
 */
export const CONTEXT_USAGE_RATIO = 0.8;

/**
 * Lower bound for the context budget, whatever the prompt overhead.
 */
export const MIN_AVAILABLE_TOKENS = 500;

/**
 * Limit used for unknown provider/model pairs.
 */
export const DEFAULT_TOKEN_LIMIT = 4000;

/**
 * Known context limits. A `default` entry covers every model of a provider.
 */
export const MODEL_TOKEN_LIMITS: Record<ProviderName, Record<string, number>> = {
  openai: {
    'gpt-3.5-turbo': 4096,
    'gpt-4': 8192,
    'gpt-4-turbo': 128000,
    'gpt-4o': 128000,
    'gpt-4o-mini': 128000,
  },
  deepseek: {
    'deepseek-chat': 128000,
    'deepseek-coder': 16384,
  },
  anthropic: {
    default: 200000,
  },
  dify: {
    default: 8000,
  },
  local: {
    default: 8192,
  },
  mock: {
    mock: 8000,
  },
};

type EncodingName = Parameters<typeof getEncoding>[0];

/**
 * How a counter turns text into tokens.
 */
export type TokenizerName = EncodingName | 'chars';

/**
 * Encoding of models that do not use the fallback.
 */
const MODEL_ENCODINGS: Readonly<Record<string, EncodingName>> = {
  'gpt-4o': 'o200k_base',
  'gpt-4o-mini': 'o200k_base',
};

const FALLBACK_ENCODING: EncodingName = 'cl100k_base';

/**
 * Providers counted with a BPE encoding.
 */
const ENCODED_PROVIDERS: ReadonlySet<string> = new Set<ProviderName>(['openai', 'deepseek', 'anthropic', 'dify']);

const encoders = new Map<EncodingName, Tiktoken>();

function encoderFor(name: EncodingName): Tiktoken {
  let encoder = encoders.get(name);
  if (encoder === undefined) {
    encoder = getEncoding(name);
    encoders.set(name, encoder);
  }
  return encoder;
}

/**
 * Tokenizer for a provider/model pair.
 */
export function tokenizerFor(provider: string, model: string): TokenizerName {
  if (!ENCODED_PROVIDERS.has(provider)) return 'chars';
  return MODEL_ENCODINGS[model] ?? FALLBACK_ENCODING;
}

// =============================================================================
// Token Counter
// =============================================================================

/**
 * Counts tokens for one provider/model pair.
 */
export class TokenCounter {
  readonly provider: string;
  readonly model: string;
  readonly limit: number;
  readonly tokenizer: TokenizerName;

  constructor(provider: string, model: string) {
    this.provider = provider;
    this.model = model;
    this.limit = lookupTokenLimit(provider, model);
    this.tokenizer = tokenizerFor(provider, model);
  }

  /**
   * Tokens in a string. Special-token markers count as one token each.
   */
  countTokens(text: string): number {
    if (this.tokenizer === 'chars') {
      return Math.floor(text.length / CHARS_PER_TOKEN);
    }
    return encoderFor(this.tokenizer).encode(text, 'all').length;
  }

  /**
   * Tokens in the JSON serialisation of a value.
   */
  countTokensFromValue(value: unknown): number {
    const text = JSON.stringify(value);
    return text === undefined ? 0 : this.countTokens(text);
  }

  /**
   * Tokens left for context once the base prompt is accounted for.
   */
  getAvailableTokens(basePromptTokens: number): number {
    const budget = Math.floor(this.limit * CONTEXT_USAGE_RATIO) - basePromptTokens;
    return Math.max(budget, MIN_AVAILABLE_TOKENS);
  }
}

/**
 * Context limit for a provider/model pair.
 */
export function lookupTokenLimit(provider: string, model: string): number {
  if (!isProviderName(provider)) {
    return DEFAULT_TOKEN_LIMIT;
  }
  const table = MODEL_TOKEN_LIMITS[provider];
  return table[model] ?? table['default'] ?? DEFAULT_TOKEN_LIMIT;
}

function isProviderName(value: string): value is ProviderName {
  return Object.prototype.hasOwnProperty.call(MODEL_TOKEN_LIMITS, value);
}
