/**
 * Transport Module
 *
 * Responsibilities:
 * - Fetch pages over HTTP with bounded retry and backoff
 * - Parse HTML into title, description and link candidates
 *
 * Non-2xx responses raise FetchError. 4xx other than 408/429 are not retried.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { FetchError, toError } from '../errors/index.js';
import { createLogger, type Logger } from '../logger/index.js';

export {
  cheerioPageParser,
  extractLinks,
  parsePage,
  resolveLink,
  canonicalUrl,
  type PageParser,
  type ParsedPage,
} from './parser.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface FetchedPage {
  /** Final URL after redirects */
  url: string;
  status: number;
  contentType: string;
  html: string;
}

export interface PageFetcher {
  /**
   * @throws FetchError once retries are exhausted
   */
  fetch(url: string): Promise<FetchedPage>;
}

export interface FetcherConfig {
  /** Request timeout in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Total attempts per URL, including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before each retry (default: 1s, 2s, 4s) */
  retryDelaysMs?: number[];
  userAgent?: string;
}

const DEFAULT_TIMEOUT_MS = 15000;
const DEFAULT_MAX_ATTEMPTS = 3;
const RETRY_DELAYS_MS = [1000, 2000, 4000];
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

// ============================================================================
// Retry Logic
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute fn up to maxAttempts times. Stops early on a FetchError that a
 * retry cannot fix.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxAttempts: number,
  delaysMs: readonly number[],
  logger: Logger,
  context: string
): Promise<T> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);
      logger.warn(`${context} attempt ${attempt + 1} failed`, {
        error: lastError.message,
        attempt: attempt + 1,
        maxAttempts,
      });

      if (error instanceof FetchError && !error.retryable) break;

      if (attempt < maxAttempts - 1) {
        const delayMs = delaysMs[attempt] ?? delaysMs[delaysMs.length - 1] ?? 0;
        await sleep(delayMs);
      }
    }
  }

  throw lastError ?? new Error(`${context} failed after ${maxAttempts} attempts`);
}

/**
 * URL the response came from after redirects. The node http adapter records
 * it on the underlying response as `responseUrl`.
 */
function redirectedUrl(request: unknown): string | null {
  if (typeof request !== 'object' || request === null || !('res' in request)) return null;
  const res = request.res;
  if (typeof res !== 'object' || res === null || !('responseUrl' in res)) return null;
  return typeof res.responseUrl === 'string' && res.responseUrl.length > 0 ? res.responseUrl : null;
}

// ============================================================================
// HTTP Fetcher
// ============================================================================

/**
 * axios-backed page fetcher. One instance per crawl.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly client: AxiosInstance;
  private readonly maxAttempts: number;
  private readonly retryDelaysMs: number[];

  constructor(
    config: FetcherConfig = {},
    private readonly logger: Logger = createLogger('transport'),
    client?: AxiosInstance
  ) {
    this.maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryDelaysMs = config.retryDelaysMs ?? RETRY_DELAYS_MS;
    this.client =
      client ??
      axios.create({
        timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxRedirects: 5,
        responseType: 'text',
        validateStatus: () => true,
        headers: {
          'User-Agent': config.userAgent ?? DEFAULT_USER_AGENT,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        },
      });
  }

  async fetch(url: string): Promise<FetchedPage> {
    try {
      return await withRetry(() => this.fetchOnce(url), this.maxAttempts, this.retryDelaysMs, this.logger, `Fetch ${url}`);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(toError(error).message, url);
    }
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    let response: AxiosResponse<string>;
    try {
      response = await this.client.get<string>(url);
    } catch (error) {
      const message = axios.isAxiosError(error) ? `${error.code ?? 'NETWORK_ERROR'}: ${error.message}` : toError(error).message;
      throw new FetchError(message, url);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(`HTTP ${response.status} for ${url}`, url, response.status);
    }

    const contentType = String(response.headers['content-type'] ?? '');
    const html = typeof response.data === 'string' ? response.data : '';
    const finalUrl = redirectedUrl(response.request) ?? url;
    if (finalUrl !== url) {
      this.logger.debug('Request redirected', { url, finalUrl });
    }
    this.logger.debug('Fetched page', { url: finalUrl, status: response.status, bytes: html.length });
    return { url: finalUrl, status: response.status, contentType, html };
  }
}
