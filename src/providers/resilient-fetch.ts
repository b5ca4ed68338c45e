/**
 * Resilient Fetch Utility
 *
 * Network resilience for provider requests:
 * - per-attempt timeout
 * - retry with exponential backoff and jitter for transient failures
 * - steeper backoff and extra attempts for HTTP 429, honouring Retry-After
 * - an external AbortSignal that cancels the request and any pending retry
 */

// =============================================================================
// TYPES
// =============================================================================

export interface NetworkConfig {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Maximum retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay between retries in ms (default: 1000) */
  baseRetryDelay?: number;
  /** Maximum delay between retries in ms (default: 30000) */
  maxRetryDelay?: number;
  /** HTTP status codes that trigger retry (default: [429, 500, 502, 503, 504]) */
  retryableStatusCodes?: number[];
  /** Extra attempts for HTTP 429 (default: 2) */
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
}

export interface ResilientFetchResult {
  response: Response;
  attempts: number;
  /** Total duration in milliseconds */
  duration: number;
}

/**
 * Thrown when a request fails after all retries, times out, or is cancelled.
 */
export class ResilientFetchError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly attempts: number,
    public readonly lastError?: Error,
    public readonly isTimeout: boolean = false,
    public readonly isCancelled: boolean = false
  ) {
    super(message);
    this.name = 'ResilientFetchError';
  }
}

// =============================================================================
// DEFAULT CONFIG
// =============================================================================

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
 * Perform a fetch with timeout, retry, and cancellation support.
 *
 * @example
 * ```typescript
 * const { response } = await resilientFetch({
 *   url: `${endpoint}/openai/deployments/${deployment}/chat/completions?api-version=${version}`,
 *   init: { method: 'POST', headers, body: JSON.stringify(body) },
 *   providerName: 'azure',
 *   networkConfig: { timeout: 60000 },
 * });
 * ```
 */
export async function resilientFetch(options: ResilientFetchOptions): Promise<ResilientFetchResult> {
  const { url, init, providerName, networkConfig = {}, signal, onRetry } = options;

  const config = { ...DEFAULT_CONFIG, ...networkConfig };
  const startTime = Date.now();
  let lastError: Error | undefined;
  let attempts = 0;

  const cancelled = (cause?: Error) =>
    new ResilientFetchError('Request cancelled', providerName, attempts, cause, false, true);

  const maxPossibleAttempts = config.maxRetries + config.maxRetriesFor429;
  while (attempts < maxPossibleAttempts) {
    attempts++;

    if (signal?.aborted) {
      throw cancelled(lastError);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });

      if (config.retryableStatusCodes.includes(response.status)) {
        const is429 = response.status === 429;
        const effectiveMaxRetries = is429
          ? config.maxRetries + config.maxRetriesFor429
          : config.maxRetries;

        const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
        const delay =
          retryAfter ?? (is429 ? calculate429Backoff(attempts, config) : calculateBackoff(attempts, config));

        lastError = new Error(`HTTP ${response.status}: ${response.statusText}`);

        if (attempts >= effectiveMaxRetries) {
          throw new ResilientFetchError(
            `${providerName} request failed after ${attempts} attempts: HTTP ${response.status}`,
            providerName,
            attempts,
            lastError
          );
        }

        onRetry?.(attempts, delay, lastError);
        await sleep(delay, signal);
        continue;
      }

      // Success, or a non-retryable status the caller maps to an error
      return {
        response,
        attempts,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      if (error instanceof ResilientFetchError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        if (signal?.aborted) {
          throw cancelled(error);
        }
        lastError = new Error(`Request timeout after ${config.timeout}ms`);

        if (attempts >= config.maxRetries) {
          throw new ResilientFetchError(
            `${providerName} request timed out after ${attempts} attempts`,
            providerName,
            attempts,
            lastError,
            true
          );
        }
      } else {
        // ECONNREFUSED, DNS failure, etc.
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempts >= config.maxRetries) {
          throw new ResilientFetchError(
            `${providerName} network error after ${attempts} attempts: ${lastError.message}`,
            providerName,
            attempts,
            lastError
          );
        }
      }

      const delay = calculateBackoff(attempts, config);
      onRetry?.(attempts, delay, lastError);
      await sleep(delay, signal);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  throw new ResilientFetchError(
    `${providerName} request failed after ${attempts} attempts`,
    providerName,
    attempts,
    lastError
  );
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Parse a Retry-After header: seconds, or an HTTP-date.
 */
export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;

  const seconds = parseInt(header, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const time = new Date(header).getTime();
  if (isNaN(time)) return null;
  const delay = time - Date.now();
  return delay > 0 ? delay : null;
}

/**
 * baseDelay * 2^(attempt-1), ±25% jitter, clamped to maxRetryDelay.
 */
function calculateBackoff(attempt: number, config: Required<NetworkConfig>): number {
  const exponentialDelay = config.baseRetryDelay * Math.pow(2, attempt - 1);
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.min(exponentialDelay + jitter, config.maxRetryDelay);
}

/**
 * Rate limits get 3^n instead of 2^n.
 */
function calculate429Backoff(attempt: number, config: Required<NetworkConfig>): number {
  const exponentialDelay = config.baseRetryDelay * Math.pow(3, attempt - 1);
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.min(exponentialDelay + jitter, config.maxRetryDelay);
}

/**
 * Resolves after `ms`, or early (without throwing) when the signal aborts;
 * the next loop iteration reports the cancellation.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

// =============================================================================
// UTILITIES
// =============================================================================

export function isResilientFetchError(error: unknown): error is ResilientFetchError {
  return error instanceof ResilientFetchError;
}

export function isTimeoutError(error: unknown): boolean {
  return isResilientFetchError(error) && error.isTimeout;
}

export function isCancellationError(error: unknown): boolean {
  return isResilientFetchError(error) && error.isCancelled;
}
