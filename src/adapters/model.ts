/**
 * Generation Backend Interface
 * ============================
 *
 * Boundary between the pipeline and text-generation providers.
 *
 * Design Principles:
 * - All calls are async and return a GenerationResponse or throw BackendError
 * - No provider SDK types leak through the interface
 * - Provider selection happens once, in the factory
 */

// =============================================================================
// Provider Types
// =============================================================================

/**
 * Supported providers.
 */
export type ProviderName = 'openai' | 'deepseek' | 'anthropic' | 'dify' | 'local' | 'mock';

export const PROVIDER_NAMES: readonly ProviderName[] = [
  'openai',
  'deepseek',
  'anthropic',
  'dify',
  'local',
  'mock',
];

/**
 * Check whether a string names a supported provider.
 */
export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

// =============================================================================
// Request / Response
// =============================================================================

/**
 * A single generation request.
 */
export interface GenerationRequest {
  prompt: string;

  /**
   * Completion token cap.
   */
  max_tokens: number;

  temperature: number;

  /**
   * Source language of the function under test (`c`, `cpp`).
   */
  language: string;

  /**
   * Overrides the language default system prompt.
   */
  system_prompt?: string;
}

/**
 * Token accounting for one call.
 */
export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

/**
 * Result of a generation call.
 */
export interface GenerationResponse {
  success: boolean;

  /**
   * Raw generated text. Empty on failure.
   */
  code: string;

  error?: string;
  usage: TokenUsage;

  /**
   * Model that served the request.
   */
  model: string;
}

export function emptyUsage(): TokenUsage {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error codes for backend failures.
 */
export type BackendErrorCode =
  | 'HTTP_STATUS'        // Provider answered with a non-2xx status
  | 'NETWORK'            // Connection failure
  | 'TIMEOUT'            // Request timed out
  | 'INVALID_REQUEST'    // Request rejected before sending
  | 'INVALID_RESPONSE'   // Response could not be interpreted
  | 'CONFIGURATION';     // Backend cannot be built or used as configured

/**
 * Structured error from backend operations.
 */
export class BackendError extends Error {
  constructor(
    public readonly code: BackendErrorCode,
    message: string,
    public readonly status?: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

// =============================================================================
// Backend Interface
// =============================================================================

/**
 * Interface for generation backends.
 *
 * Implementations:
 * - OpenAICompatibleBackend: OpenAI and DeepSeek chat completions
 * - AnthropicBackend: Anthropic messages API
 * - DifyBackend: Dify chat-messages API in blocking mode
 * - LocalBackend: Ollama-compatible local server
 * - MockBackend: deterministic offline output
 */
export interface GenerationBackend {
  readonly provider: ProviderName;

  /**
   * Model identifier sent to the provider.
   */
  readonly model_id: string;

  /**
   * Generate text for a request.
   *
   * @throws BackendError on failure
   */
  generate(request: GenerationRequest): Promise<GenerationResponse>;

  /**
   * Whether the backend can accept requests.
   */
  isReady(): Promise<boolean>;

  shutdown(): Promise<void>;
}

// =============================================================================
// Request Validation
// =============================================================================

/**
 * Reject malformed requests before they reach a provider.
 *
 * @throws BackendError with code INVALID_REQUEST
 */
export function validateRequest(request: GenerationRequest): void {
  if (request.prompt.trim().length === 0) {
    throw new BackendError('INVALID_REQUEST', 'Prompt must not be empty');
  }
  if (!Number.isInteger(request.max_tokens) || request.max_tokens <= 0) {
    throw new BackendError('INVALID_REQUEST', `max_tokens must be a positive integer, got ${request.max_tokens}`);
  }
  if (!(request.temperature >= 0 && request.temperature <= 2)) {
    throw new BackendError('INVALID_REQUEST', `temperature must be within [0, 2], got ${request.temperature}`);
  }
}
