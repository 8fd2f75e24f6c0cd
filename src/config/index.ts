/**
 * Run Configuration
 * =================
 *
 * Layered run settings: defaults, then a JSON file, then CLI overrides.
 * Each layer is verified before it is applied and violations are reported
 * deterministically.
 *
 * Rule IDs:
 * - CF1: Unknown key
 * - CF2: Provider is supported
 * - CF3: Strategy is supported
 * - CF4: Worker count is a positive integer
 * - CF5: Durations and token budgets are non-negative numbers
 * - CF6: String fields are non-empty strings
 * - CF7: Boolean fields are booleans
 * - CF8: Retry settings are valid
 * - CF9: Circuit breaker settings are valid
 * - CF10: Log level is supported
 * - CF11: Credentials are available for the provider
 */

import { CREDENTIAL_ENV_KEYS } from '../adapters/factory.js';
import { isProviderName, PROVIDER_NAMES, type ProviderName } from '../adapters/model.js';
import type { BackoffStrategy } from '../adapters/resilience.js';
import { isStrategyName, STRATEGY_NAMES } from '../generation/strategies.js';
import type { PipelineConfig } from '../generation/types.js';
import { isLogThreshold, type LogThreshold } from '../infra/metrics.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Everything one CLI run needs.
 */
export interface RunConfig extends PipelineConfig {
  provider: ProviderName;

  /**
   * Provider default when omitted.
   */
  model?: string;

  /**
   * Credential. Provider environment variable when omitted.
   */
  api_key?: string;

  base_url?: string;
  timeout_ms: number;
  log_level: LogThreshold;
}

export interface ConfigViolation {
  rule_id: string;
  message: string;

  /**
   * Dotted key the violation refers to.
   */
  path?: string;
}

export type ConfigVerificationResult = { ok: true } | { ok: false; violations: ConfigViolation[] };

/**
 * Raised when configuration cannot be used.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly violations: readonly ConfigViolation[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_RUN_CONFIG: Readonly<RunConfig> = {
  provider: 'openai',
  project_name: 'project',
  output_dir: './generated_tests',
  timestamped_output: false,
  strategy: 'concurrent',
  max_workers: 3,
  delay_ms: 1000,
  compression_enabled: true,
  base_prompt_tokens: 800,
  write_readme: true,
  timeout_ms: 300000,
  log_level: 'info',
  retry: {},
  circuit: {},
};

const BACKOFF_STRATEGIES: readonly BackoffStrategy[] = ['fixed', 'linear', 'exponential', 'exponential_jitter'];

const STRING_KEYS = ['model', 'api_key', 'base_url', 'project_name', 'output_dir', 'unit_test_dir'] as const;
const BOOLEAN_KEYS = ['timestamped_output', 'compression_enabled', 'write_readme'] as const;
const NUMBER_KEYS = ['delay_ms', 'base_prompt_tokens', 'timeout_ms'] as const;
const KNOWN_KEYS = new Set<string>([
  ...STRING_KEYS,
  ...BOOLEAN_KEYS,
  ...NUMBER_KEYS,
  'provider',
  'strategy',
  'max_workers',
  'log_level',
  'retry',
  'circuit',
]);

// =============================================================================
// Verification
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function verifyRetry(value: unknown, violations: ConfigViolation[]): void {
  if (!isObject(value)) {
    violations.push({ rule_id: 'CF8', message: 'retry must be an object', path: 'retry' });
    return;
  }
  for (const [key, v] of Object.entries(value)) {
    const path = `retry.${key}`;
    switch (key) {
      case 'maxAttempts':
        if (!isPositiveInteger(v)) violations.push({ rule_id: 'CF8', message: 'maxAttempts must be a positive integer', path });
        break;
      case 'baseDelay':
      case 'maxDelay':
        if (!isNonNegativeNumber(v)) violations.push({ rule_id: 'CF8', message: `${key} must be a non-negative number`, path });
        break;
      case 'backoffMultiplier':
        if (!(typeof v === 'number' && Number.isFinite(v) && v >= 1)) {
          violations.push({ rule_id: 'CF8', message: 'backoffMultiplier must be a number >= 1', path });
        }
        break;
      case 'backoffStrategy':
        if (!BACKOFF_STRATEGIES.some((s) => s === v)) {
          violations.push({ rule_id: 'CF8', message: `backoffStrategy must be one of ${BACKOFF_STRATEGIES.join(', ')}`, path });
        }
        break;
      default:
        violations.push({ rule_id: 'CF1', message: `Unknown retry setting '${key}'`, path });
    }
  }
}

function verifyCircuit(value: unknown, violations: ConfigViolation[]): void {
  if (!isObject(value)) {
    violations.push({ rule_id: 'CF9', message: 'circuit must be an object', path: 'circuit' });
    return;
  }
  for (const [key, v] of Object.entries(value)) {
    const path = `circuit.${key}`;
    switch (key) {
      case 'failureThreshold':
        if (!isPositiveInteger(v)) violations.push({ rule_id: 'CF9', message: 'failureThreshold must be a positive integer', path });
        break;
      case 'recoveryTimeout':
        if (!isNonNegativeNumber(v)) violations.push({ rule_id: 'CF9', message: 'recoveryTimeout must be a non-negative number', path });
        break;
      default:
        violations.push({ rule_id: 'CF1', message: `Unknown circuit setting '${key}'`, path });
    }
  }
}

/**
 * Verify one configuration layer. Every key is optional.
 */
export function verifyRunConfig(value: unknown): ConfigVerificationResult {
  if (!isObject(value)) {
    return { ok: false, violations: [{ rule_id: 'CF1', message: 'Configuration must be a JSON object' }] };
  }

  const violations: ConfigViolation[] = [];

  for (const key of Object.keys(value).sort()) {
    if (!KNOWN_KEYS.has(key)) {
      violations.push({ rule_id: 'CF1', message: `Unknown key '${key}'`, path: key });
    }
  }

  if ('provider' in value && !(typeof value.provider === 'string' && isProviderName(value.provider))) {
    violations.push({ rule_id: 'CF2', message: `provider must be one of ${PROVIDER_NAMES.join(', ')}`, path: 'provider' });
  }
  if ('strategy' in value && !(typeof value.strategy === 'string' && isStrategyName(value.strategy))) {
    violations.push({ rule_id: 'CF3', message: `strategy must be one of ${STRATEGY_NAMES.join(', ')}`, path: 'strategy' });
  }
  if ('max_workers' in value && !isPositiveInteger(value.max_workers)) {
    violations.push({ rule_id: 'CF4', message: 'max_workers must be a positive integer', path: 'max_workers' });
  }
  for (const key of NUMBER_KEYS) {
    if (key in value && !isNonNegativeNumber(value[key])) {
      violations.push({ rule_id: 'CF5', message: `${key} must be a non-negative number`, path: key });
    }
  }
  for (const key of STRING_KEYS) {
    const v = value[key];
    if (key in value && !(typeof v === 'string' && v.length > 0)) {
      violations.push({ rule_id: 'CF6', message: `${key} must be a non-empty string`, path: key });
    }
  }
  for (const key of BOOLEAN_KEYS) {
    if (key in value && typeof value[key] !== 'boolean') {
      violations.push({ rule_id: 'CF7', message: `${key} must be a boolean`, path: key });
    }
  }
  if ('retry' in value) verifyRetry(value.retry, violations);
  if ('circuit' in value) verifyCircuit(value.circuit, violations);
  if ('log_level' in value && !(typeof value.log_level === 'string' && isLogThreshold(value.log_level))) {
    violations.push({ rule_id: 'CF10', message: 'log_level must be one of debug, info, warn, error, silent', path: 'log_level' });
  }

  return violations.length === 0 ? { ok: true } : { ok: false, violations };
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Apply one verified layer on top of a config.
 */
function applyLayer(base: RunConfig, layer: Record<string, unknown>): RunConfig {
  const next: RunConfig = { ...base, retry: { ...base.retry }, circuit: { ...base.circuit } };

  const { provider, strategy, max_workers, log_level, retry, circuit } = layer;
  if (typeof provider === 'string' && isProviderName(provider)) next.provider = provider;
  if (typeof strategy === 'string' && isStrategyName(strategy)) next.strategy = strategy;
  if (typeof max_workers === 'number') next.max_workers = max_workers;
  if (typeof log_level === 'string' && isLogThreshold(log_level)) next.log_level = log_level;

  for (const key of STRING_KEYS) {
    const v = layer[key];
    if (typeof v === 'string') next[key] = v;
  }
  for (const key of BOOLEAN_KEYS) {
    const v = layer[key];
    if (typeof v === 'boolean') next[key] = v;
  }
  for (const key of NUMBER_KEYS) {
    const v = layer[key];
    if (typeof v === 'number') next[key] = v;
  }

  if (isObject(retry)) {
    const { maxAttempts, baseDelay, maxDelay, backoffMultiplier, backoffStrategy } = retry;
    if (typeof maxAttempts === 'number') next.retry.maxAttempts = maxAttempts;
    if (typeof baseDelay === 'number') next.retry.baseDelay = baseDelay;
    if (typeof maxDelay === 'number') next.retry.maxDelay = maxDelay;
    if (typeof backoffMultiplier === 'number') next.retry.backoffMultiplier = backoffMultiplier;
    const strategyName = BACKOFF_STRATEGIES.find((s) => s === backoffStrategy);
    if (strategyName !== undefined) next.retry.backoffStrategy = strategyName;
  }
  if (isObject(circuit)) {
    const { failureThreshold, recoveryTimeout } = circuit;
    if (typeof failureThreshold === 'number') next.circuit.failureThreshold = failureThreshold;
    if (typeof recoveryTimeout === 'number') next.circuit.recoveryTimeout = recoveryTimeout;
  }

  return next;
}

/**
 * Defaults, then each layer in order.
 *
 * @throws ConfigError listing every violation of the first invalid layer
 */
export function resolveRunConfig(...layers: readonly unknown[]): RunConfig {
  let config: RunConfig = { ...DEFAULT_RUN_CONFIG, retry: {}, circuit: {} };

  for (const layer of layers) {
    const result = verifyRunConfig(layer);
    if (!result.ok) {
      throw new ConfigError(`Invalid configuration: ${result.violations.map((v) => v.message).join('; ')}`, result.violations);
    }
    if (isObject(layer)) {
      config = applyLayer(config, layer);
    }
  }

  return config;
}

/**
 * Credential for the configured provider: config value, then environment.
 * Providers that need none resolve to undefined.
 *
 * @throws ConfigError (CF11) when a required credential is missing
 */
export function resolveCredentials(
  config: Pick<RunConfig, 'provider' | 'api_key'>,
  env: Readonly<Record<string, string | undefined>> = process.env
): string | undefined {
  const envKey = CREDENTIAL_ENV_KEYS[config.provider];
  if (envKey === null) {
    return undefined;
  }

  const key = config.api_key ?? env[envKey];
  if (key === undefined || key.length === 0) {
    const violation: ConfigViolation = {
      rule_id: 'CF11',
      message: `No credentials for provider '${config.provider}': set ${envKey} or api_key`,
      path: 'api_key',
    };
    throw new ConfigError(violation.message, [violation]);
  }
  return key;
}
