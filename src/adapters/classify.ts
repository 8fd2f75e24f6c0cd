/**
 * Error Classification
 * ====================
 *
 * Maps backend failures onto a small taxonomy that drives retry decisions.
 * Typed errors are classified structurally; anything else falls back to
 * keyword matching on the message.
 */

import { BackendError } from './model.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Failure category.
 */
export type ErrorCategory =
  | 'AUTHENTICATION'   // Bad or missing credentials. Never retried.
  | 'RATE_LIMIT'       // Provider throttling. Retried with backoff.
  | 'NETWORK'          // Connection failure. Retried.
  | 'TIMEOUT'          // Request timed out. Retried.
  | 'CONTENT'          // Generated output failed validation. Logged only.
  | 'CONFIGURATION'    // Bad request or setup. Never retried.
  | 'PROVIDER'         // Provider-side failure. Retried for 5xx only.
  | 'UNKNOWN';         // Unrecognised. Never retried.

export interface ErrorClassification {
  category: ErrorCategory;
  retryable: boolean;
  message: string;
}

// =============================================================================
// Terminal Error
// =============================================================================

/**
 * Final error surfaced after retries end, carrying the classification of
 * the last failure and that failure as `cause`.
 */
export class BackendCallError extends Error {
  readonly category: ErrorCategory;
  readonly retryable: boolean;
  readonly attempts: number;

  constructor(message: string, classification: ErrorClassification, attempts: number, cause: unknown) {
    super(message, { cause });
    this.name = 'BackendCallError';
    this.category = classification.category;
    this.retryable = classification.retryable;
    this.attempts = attempts;
  }
}

// =============================================================================
// Classification
// =============================================================================

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

/**
 * Keyword sets, checked in order.
 */
const KEYWORD_RULES: ReadonlyArray<{ category: ErrorCategory; retryable: boolean; keywords: readonly string[] }> = [
  {
    category: 'AUTHENTICATION',
    retryable: false,
    keywords: ['unauthorized', 'authenticat', 'api key', 'invalid key', 'forbidden', 'permission denied'],
  },
  {
    category: 'RATE_LIMIT',
    retryable: true,
    keywords: ['rate limit', 'rate_limit', 'too many requests', 'quota', '429'],
  },
  {
    category: 'TIMEOUT',
    retryable: true,
    keywords: ['timeout', 'timed out', 'deadline exceeded'],
  },
  {
    category: 'PROVIDER',
    retryable: true,
    keywords: ['server error', 'internal error', 'service unavailable', 'bad gateway', 'overloaded', 'api error'],
  },
];

/**
 * Classify an HTTP status. Only 5xx is retried; every other status is
 * final, with 401/403 labelled AUTHENTICATION.
 */
export function classifyStatus(status: number): Omit<ErrorClassification, 'message'> {
  if (status >= 500) return { category: 'PROVIDER', retryable: true };
  if (status === 401 || status === 403) return { category: 'AUTHENTICATION', retryable: false };
  return { category: 'PROVIDER', retryable: false };
}

/**
 * Classify any thrown value.
 */
export function classifyError(error: unknown): ErrorClassification {
  const message = errorMessage(error);

  if (error instanceof BackendCallError) {
    return { category: error.category, retryable: error.retryable, message };
  }

  if (error instanceof BackendError) {
    switch (error.code) {
      case 'HTTP_STATUS':
        return { ...classifyStatus(error.status ?? 0), message };
      case 'NETWORK':
        return { category: 'NETWORK', retryable: true, message };
      case 'TIMEOUT':
        return { category: 'TIMEOUT', retryable: true, message };
      case 'INVALID_RESPONSE':
        return { category: 'PROVIDER', retryable: true, message };
      case 'INVALID_REQUEST':
      case 'CONFIGURATION':
        return { category: 'CONFIGURATION', retryable: false, message };
    }
  }

  if (error instanceof Error) {
    if (error.name === 'CircuitOpenError') {
      return { category: 'PROVIDER', retryable: false, message };
    }
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return { category: 'TIMEOUT', retryable: true, message };
    }

    const code = systemErrorCode(error);
    if (code !== undefined) {
      if (NETWORK_CODES.has(code)) return { category: 'NETWORK', retryable: true, message };
      if (TIMEOUT_CODES.has(code)) return { category: 'TIMEOUT', retryable: true, message };
    }
  }

  return classifyByKeywords(message);
}

/**
 * Keyword fallback for untyped errors.
 */
export function classifyByKeywords(message: string): ErrorClassification {
  const lowered = message.toLowerCase();
  for (const rule of KEYWORD_RULES) {
    if (rule.keywords.some((keyword) => lowered.includes(keyword))) {
      return { category: rule.category, retryable: rule.retryable, message };
    }
  }
  return { category: 'UNKNOWN', retryable: false, message };
}

// =============================================================================
// Helpers
// =============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node system error code, looking one level into `cause` (fetch wraps them).
 */
function systemErrorCode(error: Error): string | undefined {
  const own = readCode(error);
  if (own !== undefined) return own;
  return error.cause instanceof Error ? readCode(error.cause) : undefined;
}

function readCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
