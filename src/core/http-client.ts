/**
 * HTTP Transport for ComCat
 *
 * Centralizes all fetch operations with:
 * - A fixed per-request timeout via AbortController
 * - A single retry after a fixed wait when the server answers 503
 * - Every other failure surfaced as ConnectionError carrying the URL
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 30_000 });
 * const doc = await client.fetchJSON('https://earthquake.usgs.gov/fdsnws/event/1/count?format=geojson');
 * const bytes = await client.fetchBytes(product.getContentURL('grid.xml'));
 * ```
 */

import { CancelledError, ConnectionError, ParsingError } from './errors.js';
import { LIBRARY_VERSION, REQUEST_TIMEOUT_MS, RETRY_WAIT_MS } from './constants.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Retries after the first attempt for retryable statuses (default: 1) */
  readonly maxRetries: number;

  /** Fixed wait before each retry in milliseconds (default: 3000) */
  readonly retryWaitMs: number;

  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** Statuses that earn a retry (default: [503]) */
  readonly retryableStatuses: readonly number[];

  /** User-Agent header */
  readonly userAgent: string;

  readonly logger: Logger;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  /** External cancellation */
  readonly signal?: AbortSignal;
}

/**
 * What the catalog client needs from a transport. Tests and embedding
 * callers may supply their own.
 */
export interface Transport {
  fetchJSON(url: string, options?: FetchOptions): Promise<unknown>;
  fetchBytes(url: string, options?: FetchOptions): Promise<Uint8Array>;
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient implements Transport {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 1,
      retryWaitMs: RETRY_WAIT_MS,
      timeoutMs: REQUEST_TIMEOUT_MS,
      retryableStatuses: [503],
      userAgent: `quakecat v${LIBRARY_VERSION}`,
      logger: defaultLogger,
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {ConnectionError} For error responses, network failures and timeouts
   * @throws {ParsingError} If the body is not valid JSON
   * @throws {CancelledError} If the caller's signal aborts the request
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const response = await this.fetchWithRetry(url, options);
    const text = await this.readBody(url, response, () => response.text());

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ParsingError(
        `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`,
        { url, issues: [text.slice(0, 200)] }
      );
    }
  }

  /**
   * Fetch a response body as raw bytes
   */
  async fetchBytes(url: string, options?: FetchOptions): Promise<Uint8Array> {
    const response = await this.fetchWithRetry(url, options);
    const buffer = await this.readBody(url, response, () => response.arrayBuffer());
    return new Uint8Array(buffer);
  }

  /**
   * Fetch raw response, retrying retryable statuses after a fixed wait
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxAttempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      const response = await this.fetchWithTimeout(url, options);
      if (response.ok) {
        return response;
      }

      const retryable = this.config.retryableStatuses.includes(response.status);
      if (!retryable || attempt >= maxAttempts) {
        throw new ConnectionError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
          statusCode: response.status,
        });
      }

      this.config.logger.warn('Request failed, retrying', {
        attempt,
        maxAttempts,
        statusCode: response.status,
        waitMs: this.config.retryWaitMs,
        url,
      });
      await this.sleep(this.config.retryWaitMs, options?.signal);
    }
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    if (options?.signal?.aborted) {
      throw new CancelledError(`Request to ${url}`);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onExternalAbort = (): void => controller.abort();
    options?.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (options?.signal?.aborted) {
        throw new CancelledError(`Request to ${url}`);
      }
      if (controller.signal.aborted) {
        throw new ConnectionError(url, `Request timeout after ${timeoutMs}ms`);
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConnectionError(url, `Network error: ${cause.message}`, { cause });
    } finally {
      clearTimeout(timeoutId);
      options?.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  private async readBody<T>(url: string, response: Response, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConnectionError(url, `Failed reading response body: ${cause.message}`, {
        statusCode: response.status,
        cause,
      });
    }
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError('Retry wait'));
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new CancelledError('Retry wait'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

let defaultClient: HTTPClient | null = null;

/**
 * Get or create the shared HTTP client
 */
export function getHTTPClient(): HTTPClient {
  if (!defaultClient) {
    defaultClient = new HTTPClient();
  }
  return defaultClient;
}

export function createHTTPClient(config?: Partial<HTTPClientConfig>): HTTPClient {
  return new HTTPClient(config);
}
