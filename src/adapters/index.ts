/**
 * Backend Module
 * ==============
 *
 * Generation backends, error classification and resilience.
 */

// Interface
export {
  BackendError,
  PROVIDER_NAMES,
  isProviderName,
  emptyUsage,
  validateRequest,
  type ProviderName,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResponse,
  type TokenUsage,
  type BackendErrorCode,
} from './model.js';

// Backends
export { OpenAICompatibleBackend, type OpenAICompatibleBackendOptions, type OpenAICompatibleProvider } from './openai.js';
export { AnthropicBackend, type AnthropicBackendOptions } from './anthropic.js';
export { DifyBackend, DIFY_DEFAULT_BASE_URL, type DifyBackendOptions } from './dify.js';
export { LocalBackend, LOCAL_DEFAULT_BASE_URL, type LocalBackendOptions } from './local.js';
export {
  MockBackend,
  defaultTestFile,
  type MockBackendOptions,
  type MockResponse,
  type MockStep,
} from './mock.js';

// Factory
export {
  createBackend,
  createBackendByName,
  CREDENTIAL_ENV_KEYS,
  type BackendFactoryOptions,
} from './factory.js';

// Classification
export {
  BackendCallError,
  classifyError,
  classifyStatus,
  classifyByKeywords,
  errorMessage,
  type ErrorCategory,
  type ErrorClassification,
} from './classify.js';

// Resilience
export {
  CircuitBreaker,
  CircuitOpenError,
  RetryExecutor,
  ResilientExecutor,
  computeBackoffDelay,
  createResilientExecutor,
  DEFAULT_CIRCUIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  type CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  type BackoffStrategy,
  type RetryConfig,
  type RetryStats,
  type ResilientExecutorOptions,
} from './resilience.js';
