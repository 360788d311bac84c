/**
 * HTTP Access Layer
 *
 * Performs GET requests against the upstream APIs and hands back the status
 * and parsed JSON body. HTTP statuses never throw here: interpreting 401,
 * 404 and 429 is the caller's job. 5xx responses and network failures are
 * retried with linear backoff before the last outcome is returned or thrown.
 */

import axios, { AxiosInstance } from 'axios';
import { EnvironmentConfig } from './environment';
import { QueryParams } from '../utils/cache-policy';
import { log, LogLevel, logUpstreamRequest } from '../utils/logger';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';

/**
 * Upstream response
 */
export interface HttpResponse {
  status: number;
  body: unknown;
  cached?: boolean;                  // Served from the response cache
}

/**
 * GET-only client contract the repositories depend on
 */
export interface HttpClient {
  get(url: string, params?: QueryParams): Promise<HttpResponse>;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const RETRY_BASE_DELAY_MS = 1000;

/**
 * Create the shared axios instance
 *
 * `validateStatus` accepts every status so non-2xx responses resolve.
 */
export function createAxiosInstance(config: EnvironmentConfig): AxiosInstance {
  return axios.create({
    timeout: config.httpTimeoutMs,
    responseType: 'json',
    validateStatus: () => true,
    headers: {
      'User-Agent': config.userAgent,
      'X-Requested-With': 'XMLHttpRequest',
      Accept: 'application/json',
    },
  });
}

/**
 * Axios-backed HTTP client with transport-level retries
 */
export class AxiosHttpClient implements HttpClient {
  private readonly maxAttempts: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly axiosInstance: AxiosInstance,
    options: { maxAttempts?: number; sleep?: Sleep } = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * GET a URL
   *
   * @param url - Absolute URL
   * @param params - Optional query parameters
   * @returns Status and body of the last attempt
   * @throws The last network error when every attempt failed without a response
   */
  async get(url: string, params?: QueryParams): Promise<HttpResponse> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const startTime = Date.now();
      try {
        const response = await this.axiosInstance.get<unknown>(url, { params });
        logUpstreamRequest({
          url,
          statusCode: response.status,
          latencyMs: Date.now() - startTime,
          cached: false,
        });

        if (response.status >= 500 && attempt < this.maxAttempts) {
          await this.sleep(RETRY_BASE_DELAY_MS * attempt);
          continue;
        }
        return { status: response.status, body: response.data };
      } catch (error) {
        lastError = error;
        log(LogLevel.WARN, 'Upstream request failed', {
          url,
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        if (attempt < this.maxAttempts) {
          await this.sleep(RETRY_BASE_DELAY_MS * attempt);
        }
      }
    }

    throw lastError instanceof Error
      ? lastError
      : new Error(`Failed to fetch ${url}`);
  }
}
