/**
 * HTTP Helpers
 * ============
 *
 * JSON POST over the global fetch for backends without an SDK. Transport
 * failures come back as BackendError.
 */

import { BackendError } from './model.js';

export interface PostJsonOptions {
  headers?: Record<string, string>;
  timeout_ms: number;
}

/**
 * POST a JSON body and parse the JSON reply.
 *
 * @throws BackendError HTTP_STATUS, TIMEOUT, NETWORK or INVALID_RESPONSE
 */
export async function postJson(url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeout_id = setTimeout(() => controller.abort(), options.timeout_ms);

  // The timeout covers the body as well as the headers.
  let response: Response;
  let text: string;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    text = await response.text();
  } catch (error) {
    throw mapTransportError(error, url, options.timeout_ms);
  } finally {
    clearTimeout(timeout_id);
  }

  if (!response.ok) {
    throw new BackendError('HTTP_STATUS', `HTTP ${response.status} from ${url}: ${text.slice(0, 500)}`, response.status);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new BackendError('INVALID_RESPONSE', `Response from ${url} is not JSON`, response.status, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function mapTransportError(error: unknown, url: string, timeout_ms: number): BackendError {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new BackendError('TIMEOUT', `Request to ${url} timed out after ${timeout_ms}ms`);
  }
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return new BackendError('NETWORK', `Cannot reach ${url} (${message}${cause})`);
}

// =============================================================================
// Response Narrowing
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a numeric field, or 0.
 */
export function numberField(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Read a string field, or undefined.
 */
export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
