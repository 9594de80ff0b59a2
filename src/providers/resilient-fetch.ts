/**
 * Resilient Fetch
 *
 * Network resilience for model requests:
 * - Per-attempt timeout so a stalled connection cannot hang the REPL
 * - Retry with exponential backoff for transient failures
 * - Rate limit handling with Retry-After header parsing
 * - AbortSignal support for user interrupts
 */

import type { FetchLike } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface NetworkConfig {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Maximum attempts for timeouts, network errors and 5xx (default: 3) */
  maxRetries?: number;
  /** Base delay between retries in ms (default: 1000) */
  baseRetryDelay?: number;
  /** Maximum delay between retries in ms (default: 30000) */
  maxRetryDelay?: number;
  /** HTTP status codes that trigger retry (default: [429, 500, 502, 503, 504]) */
  retryableStatusCodes?: number[];
  /** Extra attempts for HTTP 429 (default: 2, so total = maxRetries + 2) */
  maxRetriesFor429?: number;
}

export interface ResilientFetchOptions {
  url: string;
  init: RequestInit;
  /** Provider name for error messages */
  providerName: string;
  networkConfig?: NetworkConfig;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delay: number, error: Error) => void;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export interface ResilientFetchResult {
  response: Response;
  attempts: number;
  /** Total duration in milliseconds */
  duration: number;
}

/**
 * Thrown when every attempt failed. Non-retryable HTTP statuses are not
 * errors here; the response is returned for the caller to inspect.
 */
export class ResilientFetchError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly attempts: number,
    public readonly lastError?: Error,
    public readonly isTimeout: boolean = false,
    public readonly isCancelled: boolean = false,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ResilientFetchError';
  }
}

const DEFAULT_CONFIG: Required<NetworkConfig> = {
  timeout: 30000,
  maxRetries: 3,
  baseRetryDelay: 1000,
  maxRetryDelay: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
  maxRetriesFor429: 2,
};

// =============================================================================
// RESILIENT FETCH
// =============================================================================

/**
 * @example
 * ```typescript
 * const { response } = await resilientFetch({
 *   url: 'https://api.anthropic.com/v1/messages',
 *   init: { method: 'POST', headers, body: JSON.stringify(body) },
 *   providerName: 'anthropic',
 *   networkConfig: { timeout: 120000 },
 * });
 * ```
 */
export async function resilientFetch(options: ResilientFetchOptions): Promise<ResilientFetchResult> {
  const { url, init, providerName, signal, onRetry } = options;
  const config = { ...DEFAULT_CONFIG, ...options.networkConfig };
  const doFetch: FetchLike = options.fetchImpl ?? ((input, requestInit) => fetch(input, requestInit));
  const wait = options.sleep ?? sleep;

  const startTime = Date.now();
  let lastError: Error | undefined;
  let attempts = 0;

  for (;;) {
    attempts++;

    if (signal?.aborted) {
      throw new ResilientFetchError('Request cancelled by user', providerName, attempts, lastError, false, true);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let response: Response;
    try {
      response = await doFetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      const isAbort = error instanceof Error && error.name === 'AbortError';
      if (isAbort && signal?.aborted) {
        throw new ResilientFetchError('Request cancelled by user', providerName, attempts, error, false, true);
      }

      lastError = isAbort
        ? new Error(`Request timeout after ${config.timeout}ms`)
        : error instanceof Error
          ? error
          : new Error(String(error));

      if (attempts >= config.maxRetries) {
        throw new ResilientFetchError(
          isAbort
            ? `${providerName} request timed out after ${attempts} attempts`
            : `${providerName} network error after ${attempts} attempts: ${lastError.message}`,
          providerName,
          attempts,
          lastError,
          isAbort
        );
      }

      const delay = calculateBackoff(attempts, config, 2);
      onRetry?.(attempts, delay, lastError);
      await wait(delay);
      continue;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!config.retryableStatusCodes.includes(response.status)) {
      return { response, attempts, duration: Date.now() - startTime };
    }

    const is429 = response.status === 429;
    // 429 gets extra retry budget and steeper backoff
    const effectiveMaxRetries = is429 ? config.maxRetries + config.maxRetriesFor429 : config.maxRetries;
    lastError = new Error(`HTTP ${response.status}: ${response.statusText}`);

    if (attempts >= effectiveMaxRetries) {
      throw new ResilientFetchError(
        `${providerName} request failed after ${attempts} attempts: HTTP ${response.status}`,
        providerName,
        attempts,
        lastError,
        false,
        false,
        response.status
      );
    }

    const delay =
      parseRetryAfter(response.headers.get('Retry-After')) ?? calculateBackoff(attempts, config, is429 ? 3 : 2);
    onRetry?.(attempts, delay, lastError);
    await wait(delay);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Retry-After is either a number of seconds or an HTTP-date.
 */
export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;

  const seconds = Number.parseInt(header, 10);
  if (!Number.isNaN(seconds)) {
    return seconds * 1000;
  }

  const delay = new Date(header).getTime() - Date.now();
  return Number.isNaN(delay) || delay <= 0 ? null : delay;
}

/**
 * baseDelay * base^(attempt-1), ±25% jitter, clamped to maxRetryDelay.
 */
function calculateBackoff(attempt: number, config: Required<NetworkConfig>, base: number): number {
  const exponentialDelay = config.baseRetryDelay * Math.pow(base, attempt - 1);
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.min(exponentialDelay + jitter, config.maxRetryDelay);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isResilientFetchError(error: unknown): error is ResilientFetchError {
  return error instanceof ResilientFetchError;
}
