/**
 * Resilient HTTP Client for muni-harvest
 *
 * The sole I/O primitive of the extraction core:
 * - Bounded attempts with deterministic exponential backoff
 * - Per-attempt timeout via AbortController, covering headers and body
 * - External cancellation via AbortSignal (job timeout, run abort)
 * - Every non-2xx status and every network/timeout failure (including a
 *   body stream that breaks mid-read) is retried;
 *   4xx is NOT fast-failed, so callers must not rely on that for 404s
 *
 * One instance is constructed per run and shared by all workers. It carries
 * no per-request state.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxAttempts: 3, initialDelayMs: 2000 });
 * const html = await client.fetchText('https://de.wikipedia.org/wiki/Bonn');
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type FetchImplementation = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * HTTP client configuration
 */
export interface HTTPClientConfig {
  /** Total attempts per request, first one included (default: 3) */
  readonly maxAttempts: number;

  /** Delay before the second attempt in milliseconds (default: 2000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between attempts in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Per-attempt timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** fetch implementation (default: global fetch) */
  readonly fetchImpl: FetchImplementation;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly maxAttempts?: number;
  readonly headers?: Record<string, string>;
  readonly method?: 'GET' | 'POST' | 'PATCH' | 'PUT';
  readonly body?: string;
  /** External cancellation; aborting stops retrying immediately */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Per-attempt timeout elapsed
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection failed, DNS resolution, reset, ...
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

/**
 * Response body is not valid JSON (not retried)
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
  }
}

/**
 * All attempts exhausted. `cause` is the last underlying failure.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly cause: Error;

  constructor(url: string, attempts: number, cause: Error) {
    super(`Fetch failed after ${attempts} attempts: ${cause.message}`);
    this.name = 'FetchError';
    this.url = url;
    this.attempts = attempts;
    this.cause = cause;
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

interface AttemptResult {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  readonly body: string;
}

export const DEFAULT_HTTP_CLIENT_CONFIG: Omit<HTTPClientConfig, 'fetchImpl'> = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  userAgent: 'muni-harvest/1.0 (municipal data extraction)',
};

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      ...DEFAULT_HTTP_CLIENT_CONFIG,
      fetchImpl: (input, init) => fetch(input, init),
      ...config,
    };
  }

  /**
   * GET a page and return its body text
   *
   * @throws {FetchError} when every attempt failed
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    return this.fetchWithRetry(url, options);
  }

  /**
   * Fetch and parse a JSON response. Callers validate the shape.
   *
   * @throws {FetchError} when every attempt failed
   * @throws {HTTPJSONParseError} if the body is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const text = await this.fetchWithRetry(url, options);

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Body of the first 2xx attempt. An attempt spans the request and the
   * full body read.
   */
  private async fetchWithRetry(url: string, options?: FetchOptions): Promise<string> {
    const maxAttempts = Math.max(1, options?.maxAttempts ?? this.config.maxAttempts);
    let lastError: Error = new Error('No attempt made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfAborted(options?.signal);

      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response.body;
        }

        lastError = new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url
        );
      } catch (error) {
        if (options?.signal?.aborted) {
          throw abortReason(options.signal);
        }
        lastError = error instanceof Error ? error : new Error(String(error));
      }

      if (attempt < maxAttempts) {
        const delay = this.calculateBackoffDelay(attempt);
        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts,
          error: lastError.message,
          retryInMs: delay,
          url,
        });
        await sleep(delay, options?.signal);
      }
    }

    throw new FetchError(url, maxAttempts, lastError);
  }

  /**
   * Single attempt bounded by the per-request timeout. The body is read
   * before the timer is cleared; non-2xx bodies are drained too.
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<AttemptResult> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    const signal = options?.signal
      ? mergeAbortSignals([controller.signal, options.signal])
      : controller.signal;

    try {
      const response = await this.config.fetchImpl(url, {
        method: options?.method ?? 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        body: options?.body,
        redirect: 'follow',
        signal,
      });
      const body = await response.text();

      return {
        ok: response.ok,
        status: response.status,
        statusText: response.statusText,
        body,
      };
    } catch (error) {
      if (controller.signal.aborted && !options?.signal?.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      if (options?.signal?.aborted) {
        throw abortReason(options.signal);
      }
      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * initialDelay * multiplier^(attempt - 1), capped
   */
  calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    return Math.floor(Math.min(exponentialDelay, this.config.maxDelayMs));
  }
}

// ============================================================================
// Helpers
// ============================================================================

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Request aborted');
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * The merged signal aborts when ANY of the input signals abort
 */
function mergeAbortSignals(signals: readonly AbortSignal[]): AbortSignal {
  const controller = new AbortController();

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }

  return controller.signal;
}

/**
 * Sleep that wakes up early (and rejects) when the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('Request aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

